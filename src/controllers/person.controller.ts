/**
 * Person Controller
 * CRUD endpoints for persons
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import logger from '../utils/logger';
import { NotFoundError } from '../utils/errors';
import { commonSchemas, parseRequest } from '../utils/validation';
import type { PersonService } from '../services/person.service';

const optionalText = z.string().optional();

const PersonSchema = z.object({
  firstName: commonSchemas.nonBlank('firstName'),
  lastName: commonSchemas.nonBlank('lastName'),
  address: optionalText,
  city: optionalText,
  zip: optionalText,
  phone: optionalText,
  email: optionalText,
});

const PersonIdentityQuerySchema = z.object({
  firstName: commonSchemas.nonBlank('firstName'),
  lastName: commonSchemas.nonBlank('lastName'),
});

export class PersonController {
  constructor(private readonly personService: PersonService) {}

  // GET /person
  getPersons = (_req: Request, res: Response) => {
    const persons = this.personService.getAllPersons();
    if (persons.length === 0) {
      logger.info('No person stored');
      res.status(204).end();
      return;
    }
    res.json(persons);
  };

  // POST /person
  createPerson = async (req: Request, res: Response) => {
    const body = parseRequest(PersonSchema, req, res);
    if (!body) return;

    const created = await this.personService.addPerson({
      firstName: body.firstName,
      lastName: body.lastName,
      address: body.address ?? '',
      city: body.city ?? '',
      zip: body.zip ?? '',
      phone: body.phone ?? '',
      email: body.email ?? '',
    });
    res.status(201).json(created);
  };

  // PUT /person
  updatePerson = async (req: Request, res: Response) => {
    const body = parseRequest(PersonSchema, req, res);
    if (!body) return;

    const updated = await this.personService.updatePerson(body);
    if (!updated) {
      throw new NotFoundError(`Person ${body.firstName} ${body.lastName} not found`);
    }
    res.json(updated);
  };

  // DELETE /person?firstName=&lastName=
  deletePerson = async (req: Request, res: Response) => {
    const query = parseRequest(PersonIdentityQuerySchema, req, res, 'query');
    if (!query) return;

    const deleted = await this.personService.deletePerson(query.firstName, query.lastName);
    if (!deleted) {
      throw new NotFoundError(`Person ${query.firstName} ${query.lastName} not found`);
    }
    res.status(204).end();
  };
}
