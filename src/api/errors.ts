export const AUTH_FAILED_CODE = 5;
export const TOO_MANY_REQUESTS_CODE = 6;
export const PAYLOAD_TOO_LARGE_CODE = 13;

/** Error returned by the API itself, with the numeric error code it reported. */
export class ApiError extends Error {
  readonly code: number;
  readonly method: string;

  constructor(method: string, code: number, message: string) {
    super(`${method} failed with API error ${code}: ${message}`);
    this.name = "ApiError";
    this.method = method;
    this.code = code;
  }
}

export class AuthError extends ApiError {
  constructor(method: string, code: number, message: string) {
    super(method, code, message);
    this.name = "AuthError";
  }
}

/** HTTP-level failure or a response that is not an API envelope. */
export class TransportError extends Error {
  readonly method: string;
  readonly statusCode?: number;

  constructor(method: string, message: string, statusCode?: number) {
    super(`${method}: ${message}`);
    this.name = "TransportError";
    this.method = method;
    this.statusCode = statusCode;
  }
}

export function isPayloadTooLarge(error: unknown): error is ApiError {
  return error instanceof ApiError && error.code === PAYLOAD_TOO_LARGE_CODE;
}

export function isRateLimited(error: unknown): error is ApiError {
  return error instanceof ApiError && error.code === TOO_MANY_REQUESTS_CODE;
}
