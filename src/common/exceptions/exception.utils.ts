import { HttpException } from '@nestjs/common';
import { QueryFailedError } from 'typeorm';
import { DuplicateEmailException, StoreException } from './students.exceptions';

/** SQLSTATE raised by PostgreSQL for a unique constraint violation. */
export const UNIQUE_VIOLATION = '23505';

function readCode(value: unknown): string | undefined {
  if (typeof value === 'object' && value !== null && 'code' in value) {
    return typeof value.code === 'string' ? value.code : undefined;
  }
  return undefined;
}

export function describeException(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isUniqueViolation(error: unknown): boolean {
  const driverError = error instanceof QueryFailedError ? error.driverError : error;
  return readCode(driverError) === UNIQUE_VIOLATION;
}

/**
 * Maps a failure raised while talking to the store onto the students taxonomy.
 * Exceptions that already belong to it pass through untouched.
 */
export function translateStoreError(error: unknown, action: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (isUniqueViolation(error)) {
    return new DuplicateEmailException(error);
  }
  return new StoreException(action, describeException(error), error);
}
