/**
 * Medical Record Controller
 * CRUD endpoints for medical records
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../utils/errors';
import { commonSchemas, parseRequest } from '../utils/validation';
import type { MedicalRecordService } from '../services/medicalRecord.service';

const MedicalRecordSchema = z.object({
  firstName: commonSchemas.nonBlank('firstName'),
  lastName: commonSchemas.nonBlank('lastName'),
  birthdate: commonSchemas.birthdate.optional(),
  medications: z.array(z.string()).nullish(),
  allergies: z.array(z.string()).nullish(),
});

const IdentityQuerySchema = z.object({
  firstName: commonSchemas.nonBlank('firstName'),
  lastName: commonSchemas.nonBlank('lastName'),
});

const LookupQuerySchema = z.object({
  firstName: z.string().optional(),
  lastName: z.string().optional(),
});

export class MedicalRecordController {
  constructor(private readonly medicalRecordService: MedicalRecordService) {}

  // GET /medicalRecord[?firstName=&lastName=]
  getMedicalRecords = (req: Request, res: Response) => {
    const lookup = parseRequest(LookupQuerySchema, req, res, 'query');
    if (!lookup) return;

    if (lookup.firstName === undefined && lookup.lastName === undefined) {
      res.json(this.medicalRecordService.getAllMedicalRecords());
      return;
    }

    const identity = parseRequest(IdentityQuerySchema, req, res, 'query');
    if (!identity) return;

    const record = this.medicalRecordService.getMedicalRecord(identity.firstName, identity.lastName);
    if (!record) {
      throw new NotFoundError(`No medical record for ${identity.firstName} ${identity.lastName}`);
    }
    res.json(record);
  };

  // POST /medicalRecord
  createMedicalRecord = async (req: Request, res: Response) => {
    const body = parseRequest(MedicalRecordSchema, req, res);
    if (!body) return;

    const created = await this.medicalRecordService.addMedicalRecord(body);
    res.status(201).json(created);
  };

  // PUT /medicalRecord
  updateMedicalRecord = async (req: Request, res: Response) => {
    const body = parseRequest(MedicalRecordSchema, req, res);
    if (!body) return;

    const updated = await this.medicalRecordService.updateMedicalRecord(body);
    if (!updated) {
      throw new NotFoundError(`No medical record for ${body.firstName} ${body.lastName}`);
    }
    res.json(updated);
  };

  // DELETE /medicalRecord?firstName=&lastName=
  deleteMedicalRecord = async (req: Request, res: Response) => {
    const query = parseRequest(IdentityQuerySchema, req, res, 'query');
    if (!query) return;

    const deleted = await this.medicalRecordService.deleteMedicalRecord(query.firstName, query.lastName);
    if (!deleted) {
      throw new NotFoundError(`No medical record for ${query.firstName} ${query.lastName}`);
    }
    res.status(204).end();
  };
}
