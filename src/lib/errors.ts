import { QueryFailedError } from 'typeorm';

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;
  isOperational: boolean;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.isOperational = true;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Malformed or out-of-range input. Rejected before any write. */
export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Authentication required') {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Insufficient permissions') {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(entity: string, id: string) {
    super(`${entity} ${id} not found`, 404);
  }
}

/** Operation invalid for the current state of an entity. */
export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

const UNIQUE_VIOLATION_CODES = new Set(['23505', 'SQLITE_CONSTRAINT_UNIQUE', 'SQLITE_CONSTRAINT_PRIMARYKEY']);
const FOREIGN_KEY_VIOLATION_CODES = new Set(['23503', 'SQLITE_CONSTRAINT_FOREIGNKEY']);
// string_data_right_truncation, numeric_value_out_of_range
const OUT_OF_RANGE_CODES = new Set(['22001', '22003']);

export const VALUE_OUT_OF_RANGE = 'A value is too long or too large for its field';

const driverErrorCode = (error: unknown): string | undefined => {
  if (!(error instanceof QueryFailedError)) {
    return undefined;
  }
  const driverError: unknown = error.driverError;
  if (typeof driverError === 'object' && driverError !== null && 'code' in driverError) {
    const { code } = driverError;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
};

export const isUniqueViolation = (error: unknown): boolean => {
  const code = driverErrorCode(error);
  return code !== undefined && UNIQUE_VIOLATION_CODES.has(code);
};

export const isForeignKeyViolation = (error: unknown): boolean => {
  const code = driverErrorCode(error);
  return code !== undefined && FOREIGN_KEY_VIOLATION_CODES.has(code);
};

export const isValueOutOfRange = (error: unknown): boolean => {
  const code = driverErrorCode(error);
  return code !== undefined && OUT_OF_RANGE_CODES.has(code);
};

/**
 * Maps a store failure raised inside a (rolled back) transaction onto the
 * caller-facing taxonomy. Errors that are already AppErrors pass through.
 */
export const translateStoreError = (error: unknown, conflictMessage: string): unknown => {
  if (error instanceof AppError) {
    return error;
  }
  if (isUniqueViolation(error)) {
    return new ConflictError(conflictMessage);
  }
  if (isForeignKeyViolation(error)) {
    return new ValidationError('Referenced record does not exist');
  }
  if (isValueOutOfRange(error)) {
    return new ValidationError(VALUE_OUT_OF_RANGE);
  }
  return error;
};
