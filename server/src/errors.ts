/**
 * Tagged errors raised by the core. The HTTP boundary (`middleware/error-handler.ts`)
 * turns the kind into a status code; the message is what the caller sees.
 */

export type ErrorKind = 'Conflict' | 'NotFound' | 'Unauthorized' | 'BadRequest' | 'Configuration';

export type ErrorStatus = 400 | 401 | 404 | 409 | 500;

const STATUS_MAP: Record<ErrorKind, ErrorStatus> = {
  BadRequest: 400,
  Unauthorized: 401,
  NotFound: 404,
  Conflict: 409,
  Configuration: 500,
};

export class ApiError extends Error {
  readonly kind: ErrorKind;

  constructor(kind: ErrorKind, message: string) {
    super(message);
    this.name = 'ApiError';
    this.kind = kind;
  }

  get status(): ErrorStatus {
    return STATUS_MAP[this.kind];
  }
}

export const conflict = (message: string) => new ApiError('Conflict', message);
export const notFound = (message: string) => new ApiError('NotFound', message);
export const badRequest = (message: string) => new ApiError('BadRequest', message);

// Failed verification and denied authorization must look the same to the caller.
export const unauthorized = () => new ApiError('Unauthorized', 'Unauthorized');
