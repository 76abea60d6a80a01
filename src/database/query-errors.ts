import { QueryFailedError } from 'typeorm';

// Postgres unique_violation and the node SQLite drivers' constraint codes; sql.js errors carry no code.
const UNIQUE_VIOLATION_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);

export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    return typeof driverError.code === 'string' && UNIQUE_VIOLATION_CODES.has(driverError.code);
  }
  return /UNIQUE constraint failed/.test(error.message);
}
