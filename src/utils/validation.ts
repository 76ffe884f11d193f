/**
 * Request Validation Utility
 *
 * Validates request body, query params, and params against a Zod schema and
 * answers 400 on failure, so that controllers only see typed data.
 *
 * Usage:
 * ```typescript
 * const query = parseRequest(addressQuerySchema, req, res, 'query');
 * if (!query) return;
 * ```
 */

import type { Request, Response } from 'express';
import { z, ZodError } from 'zod';
import logger from './logger';
import { calculateAge } from './age';
import { InvalidInputError } from './errors';
import { canonicalStation } from './keys';

export type RequestSource = 'body' | 'query' | 'params';

export const formatValidationError = (error: ZodError) => {
  return {
    message: 'Validation error',
    errors: error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
      code: issue.code
    }))
  };
};

/**
 * Parse one part of the request. On failure the 400 response has already been
 * sent and `undefined` is returned.
 */
export const parseRequest = <T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  req: Request,
  res: Response,
  source: RequestSource = 'body'
): T | undefined => {
  const result = schema.safeParse(req[source]);
  if (result.success) {
    return result.data;
  }

  const formatted = formatValidationError(result.error);
  logger.warn('Request validation failed', {
    path: req.path,
    method: req.method,
    errors: formatted.errors
  });
  res.status(400).json(formatted);
  return undefined;
};

const nonBlank = (field: string) =>
  z.string({ required_error: `${field} is required` })
    .refine((value) => value.trim().length > 0, `${field} must not be blank`);

/**
 * Schemas shared by the controllers
 */
export const commonSchemas = {
  nonBlank,

  // Station numbers travel as digit strings
  stationNumber: z.string().trim().regex(/^\d+$/, 'Station number must be a positive integer').transform(canonicalStation),

  // `?stations=1,2` and `?stations=1&stations=2` are both accepted
  stationList: z.union([z.string(), z.array(z.string())])
    .transform((value) => (Array.isArray(value) ? value : [value])
      .flatMap((entry) => entry.split(','))
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0))
    .pipe(z.array(z.string().regex(/^\d+$/, 'Station numbers must be positive integers').transform(canonicalStation))
      .min(1, 'At least one station number is required'))
    .transform((stations) => [...new Set(stations)]),

  // MM/dd/yyyy, an existing calendar day not in the future
  birthdate: z.string().superRefine((value, ctx) => {
    try {
      calculateAge(value);
    } catch (error) {
      if (!(error instanceof InvalidInputError)) {
        throw error;
      }
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error.message });
    }
  }),
};

