/**
 * Alert Controller
 * Read-only views joining persons, stations and medical records
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../utils/errors';
import { commonSchemas, parseRequest } from '../utils/validation';
import type { PersonService } from '../services/person.service';
import type { FireStationService } from '../services/fireStation.service';

const AddressQuerySchema = z.object({ address: commonSchemas.nonBlank('address') });
const LastNameQuerySchema = z.object({ lastName: commonSchemas.nonBlank('lastName') });
const CityQuerySchema = z.object({ city: commonSchemas.nonBlank('city') });
const StationNumberQuerySchema = z.object({ stationNumber: commonSchemas.stationNumber });
const PhoneAlertQuerySchema = z.object({ firestation: commonSchemas.stationNumber });
const FloodQuerySchema = z.object({ stations: commonSchemas.stationList });

export class AlertController {
  constructor(
    private readonly personService: PersonService,
    private readonly fireStationService: FireStationService
  ) {}

  // GET /childAlert?address=
  getChildAlert = (req: Request, res: Response) => {
    const query = parseRequest(AddressQuerySchema, req, res, 'query');
    if (!query) return;

    const alert = this.personService.getChildAlert(query.address);
    if (!alert) {
      throw new NotFoundError(`No child lives at ${query.address}`);
    }
    res.json(alert);
  };

  // GET /fire?address=
  getFireAlert = (req: Request, res: Response) => {
    const query = parseRequest(AddressQuerySchema, req, res, 'query');
    if (!query) return;

    const alert = this.personService.getFireAlert(query.address);
    if (!alert) {
      throw new NotFoundError(`No resident found at ${query.address}`);
    }
    res.json(alert);
  };

  // GET /personInfolastName?lastName=
  getPersonInfo = (req: Request, res: Response) => {
    const query = parseRequest(LastNameQuerySchema, req, res, 'query');
    if (!query) return;

    const info = this.personService.getPersonInfoByLastName(query.lastName);
    if (!info) {
      throw new NotFoundError(`No person named ${query.lastName}`);
    }
    res.json(info);
  };

  // GET /communityEmail?city=
  getCommunityEmail = (req: Request, res: Response) => {
    const query = parseRequest(CityQuerySchema, req, res, 'query');
    if (!query) return;

    const emails = this.personService.getCommunityEmail(query.city);
    if (!emails) {
      throw new NotFoundError(`No resident in ${query.city}`);
    }
    res.json(emails);
  };

  // GET /firestation?stationNumber=
  getStationCoverage = (req: Request, res: Response) => {
    const query = parseRequest(StationNumberQuerySchema, req, res, 'query');
    if (!query) return;

    const coverage = this.fireStationService.getStationCoverage(query.stationNumber);
    if (!coverage) {
      throw new NotFoundError(`Station ${query.stationNumber} covers no address`);
    }
    res.json(coverage);
  };

  // GET /phoneAlert?firestation=
  getPhoneAlert = (req: Request, res: Response) => {
    const query = parseRequest(PhoneAlertQuerySchema, req, res, 'query');
    if (!query) return;

    const alert = this.fireStationService.getPhoneAlert(query.firestation);
    if (!alert) {
      throw new NotFoundError(`Station ${query.firestation} covers no address`);
    }
    res.json(alert);
  };

  // GET /flood/stations?stations=1,2
  getFloodStations = (req: Request, res: Response) => {
    const query = parseRequest(FloodQuerySchema, req, res, 'query');
    if (!query) return;

    res.json(this.fireStationService.getFloodStations(query.stations));
  };
}
