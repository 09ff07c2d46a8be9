export type ErrorKind = 'InvalidInput' | 'Unauthorized' | 'Forbidden' | 'NotFound' | 'Conflict';

export class ServiceError extends Error {
  readonly kind: ErrorKind;

  readonly code: string;

  readonly details?: unknown;

  constructor(kind: ErrorKind, code: string, message: string, details?: unknown) {
    super(message);
    this.name = 'ServiceError';
    this.kind = kind;
    this.code = code;
    this.details = details;
  }
}

/** Wire status for each error kind. Only the HTTP layer reads this. */
export const STATUS_BY_KIND: Readonly<Record<ErrorKind, number>> = {
  InvalidInput: 400,
  Unauthorized: 401,
  Forbidden: 403,
  NotFound: 404,
  Conflict: 409,
};

export function invalidInput(code: string, message: string, details?: unknown) {
  return new ServiceError('InvalidInput', code, message, details);
}

export function unauthorized(code: string, message: string) {
  return new ServiceError('Unauthorized', code, message);
}

export function forbidden(code: string, message: string) {
  return new ServiceError('Forbidden', code, message);
}

export function notFound(code: string, message: string) {
  return new ServiceError('NotFound', code, message);
}

export function conflict(code: string, message: string, details?: unknown) {
  return new ServiceError('Conflict', code, message, details);
}
