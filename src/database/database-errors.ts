import {
  ConflictException,
  Logger,
  UnprocessableEntityException,
} from '@nestjs/common';
import { QueryFailedError } from 'typeorm';

/**
 * Uniqueness, primary-key, NOT NULL or CHECK constraint rejected a write.
 */
export class ConstraintViolationException extends ConflictException {
  constructor(message: string, readonly driverCode: string) {
    super(message);
  }
}

/**
 * A foreign key pointed at a row that does not exist.
 */
export class ReferentialIntegrityException extends UnprocessableEntityException {
  constructor(message: string, readonly driverCode: string) {
    super(message);
  }
}

// SQLite extended result codes (better-sqlite3) and PostgreSQL SQLSTATEs
const CONSTRAINT_CODES = new Set([
  'SQLITE_CONSTRAINT_UNIQUE',
  'SQLITE_CONSTRAINT_PRIMARYKEY',
  'SQLITE_CONSTRAINT_NOTNULL',
  'SQLITE_CONSTRAINT_CHECK',
  '23505', // unique_violation
  '23502', // not_null_violation
  '23514', // check_violation
]);

const REFERENTIAL_CODES = new Set(['SQLITE_CONSTRAINT_FOREIGNKEY', '23503']);

const logger = new Logger('DatabaseErrors');

export function driverErrorCode(error: unknown): string | undefined {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    typeof driverError.code === 'string'
  ) {
    return driverError.code;
  }
  return undefined;
}

/**
 * Map a storage-engine failure onto the persistence error taxonomy.
 * Anything that is not a recognised constraint failure is returned unchanged
 * so the caller can rethrow it as-is.
 *
 * @param subject - what was being written, used in the exception message
 */
export function translateDatabaseError(error: unknown, subject: string): unknown {
  const code = driverErrorCode(error);
  if (code === undefined) {
    return error;
  }

  if (CONSTRAINT_CODES.has(code)) {
    logger.warn(`Constraint violation (${code}) writing ${subject}`);
    return new ConstraintViolationException(`${subject} violates a uniqueness or value constraint`, code);
  }

  if (REFERENTIAL_CODES.has(code)) {
    logger.warn(`Foreign key violation (${code}) writing ${subject}`);
    return new ReferentialIntegrityException(`${subject} references a user or room that does not exist`, code);
  }

  return error;
}
