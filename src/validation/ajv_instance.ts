/**
 * Ajv validation instance with schema validators
 * Input files from the data collectors must validate before use
 */

import Ajv2020, { type ValidateFunction } from 'ajv/dist/2020';
import addFormats from 'ajv-formats';
import type { DailySnapshot, RealizedReturns } from '@/providers/types';
import { loadSchema } from './schema_loader';

// Draft 2020-12
const ajv = new Ajv2020({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// date, date-time, ...
addFormats(ajv);

let snapshotValidator: ValidateFunction<DailySnapshot> | null = null;
let realizedReturnsValidator: ValidateFunction<RealizedReturns> | null = null;

export function getDailySnapshotValidator(): ValidateFunction<DailySnapshot> {
  if (!snapshotValidator) {
    snapshotValidator = ajv.compile<DailySnapshot>(loadSchema('daily_snapshot.v1'));
  }
  return snapshotValidator;
}

export function getRealizedReturnsValidator(): ValidateFunction<RealizedReturns> {
  if (!realizedReturnsValidator) {
    realizedReturnsValidator = ajv.compile<RealizedReturns>(loadSchema('realized_returns.v1'));
  }
  return realizedReturnsValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

function runValidator<T>(validate: ValidateFunction<T>, data: unknown): ValidationResult<T> {
  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}

export function validateDailySnapshot(data: unknown): ValidationResult<DailySnapshot> {
  return runValidator(getDailySnapshotValidator(), data);
}

export function validateRealizedReturns(data: unknown): ValidationResult<RealizedReturns> {
  return runValidator(getRealizedReturnsValidator(), data);
}
