/**
 * Fire Station Controller
 * CRUD endpoints for address → station mappings
 */

import type { Request, Response } from 'express';
import { z } from 'zod';
import { NotFoundError } from '../utils/errors';
import { commonSchemas, parseRequest } from '../utils/validation';
import type { FireStationService } from '../services/fireStation.service';

const FireStationSchema = z.object({
  address: commonSchemas.nonBlank('address'),
  // Station numbers may be sent as JSON numbers
  station: z.union([z.string(), z.number().int().nonnegative()])
    .transform((value) => String(value))
    .pipe(commonSchemas.stationNumber),
});

const AddressQuerySchema = z.object({
  address: commonSchemas.nonBlank('address'),
});

export class FireStationController {
  constructor(private readonly fireStationService: FireStationService) {}

  // GET /firestation/all
  getFireStations = (_req: Request, res: Response) => {
    res.json(this.fireStationService.getAllFireStations());
  };

  // POST /firestation
  createFireStation = async (req: Request, res: Response) => {
    const body = parseRequest(FireStationSchema, req, res);
    if (!body) return;

    const created = await this.fireStationService.addFireStation(body);
    res.status(201).json(created);
  };

  // PUT /firestation
  updateFireStation = async (req: Request, res: Response) => {
    const body = parseRequest(FireStationSchema, req, res);
    if (!body) return;

    const updated = await this.fireStationService.updateFireStation(body);
    if (!updated) {
      throw new NotFoundError(`No fire station mapped to ${body.address}`);
    }
    res.json(updated);
  };

  // DELETE /firestation?address=
  deleteFireStation = async (req: Request, res: Response) => {
    const query = parseRequest(AddressQuerySchema, req, res, 'query');
    if (!query) return;

    const deleted = await this.fireStationService.deleteFireStation(query.address);
    if (!deleted) {
      throw new NotFoundError(`No fire station mapped to ${query.address}`);
    }
    res.status(204).end();
  };
}
