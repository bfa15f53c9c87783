/**
 * PROGNOSIS — Request Validator
 *
 * Shape and domain checks for the patient payload. Category membership is left
 * to the encoder so that an unknown value reports UNKNOWN_CATEGORY, not a shape error.
 */

import { z } from 'zod';
import { ValidationError, type InvalidField } from '../../common/errors.js';
import { toPatientInput } from './prognosis.encoder.js';
import type { PatientInput, PatientPayload } from './prognosis.types.js';

const category = z.string({ invalid_type_error: 'Expected a string' }).min(1, 'Must not be empty');

export const PatientPayloadSchema = z.object({
  age: z
    .number({ invalid_type_error: 'Expected a number' })
    .int('Must be a whole number of years')
    .positive('Must be greater than 0'),
  sex: category,
  cancer_type: category,
  stage: category,
  grade: category,
  tumor_size_cm: z
    .number({ invalid_type_error: 'Expected a number' })
    .finite()
    .nonnegative('Must be 0 or greater'),
  treatment: category,
  performance_status: category,
}) satisfies z.ZodType<PatientPayload>;

export const REQUIRED_FIELDS = Object.keys(PatientPayloadSchema.shape);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function validatePatientPayload(body: unknown): PatientPayload {
  const input = body ?? {};
  if (!isPlainObject(input)) {
    throw new ValidationError('Request body must be a JSON object');
  }

  const parsed = PatientPayloadSchema.safeParse(input);
  if (parsed.success) {
    return parsed.data;
  }

  const missing: string[] = [];
  const invalid: InvalidField[] = [];
  for (const issue of parsed.error.issues) {
    const field = String(issue.path[0] ?? '');
    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      if (!missing.includes(field)) missing.push(field);
    } else if (!invalid.some((entry) => entry.field === field)) {
      invalid.push({ field, message: issue.message });
    }
  }

  throw new ValidationError(
    missing.length ? 'Missing required fields' : 'Invalid field values',
    missing,
    invalid
  );
}

/** Full request check: shape first, then vocabulary */
export function parsePatientInput(body: unknown): PatientInput {
  return toPatientInput(validatePatientPayload(body));
}
