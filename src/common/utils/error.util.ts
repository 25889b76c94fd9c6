import { HttpStatus } from '@nestjs/common';

export const PG_UNIQUE_VIOLATION = '23505';
export const PG_FOREIGN_KEY_VIOLATION = '23503';
export const PG_LOCK_NOT_AVAILABLE = '55P03';

export function getDatabaseErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isUniqueViolation(error: unknown): boolean {
  return getDatabaseErrorCode(error) === PG_UNIQUE_VIOLATION;
}

export function isForeignKeyViolation(error: unknown): boolean {
  return getDatabaseErrorCode(error) === PG_FOREIGN_KEY_VIOLATION;
}

export function isLockTimeout(error: unknown): boolean {
  return getDatabaseErrorCode(error) === PG_LOCK_NOT_AVAILABLE;
}

export function getConstraintName(error: unknown): string | undefined {
  if (
    error &&
    typeof error === 'object' &&
    'constraint' in error &&
    typeof error.constraint === 'string'
  ) {
    return error.constraint;
  }
  return undefined;
}

export function getHttpErrorName(status: number): string {
  const errorNames: Record<number, string> = {
    [HttpStatus.BAD_REQUEST]: 'Bad Request',
    [HttpStatus.UNAUTHORIZED]: 'Unauthorized',
    [HttpStatus.FORBIDDEN]: 'Forbidden',
    [HttpStatus.NOT_FOUND]: 'Not Found',
    [HttpStatus.CONFLICT]: 'Conflict',
    [HttpStatus.UNPROCESSABLE_ENTITY]: 'Unprocessable Entity',
    [HttpStatus.TOO_MANY_REQUESTS]: 'Too Many Requests',
  };

  return errorNames[status] || 'Internal Server Error';
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
