/** Code used when no HTTP status is associated with a failure. */
export const NO_STATUS = -1;

export type RpkiErrorKind = "input" | "network" | "upstream" | "decode" | "io";

/**
 * TypedError is the caller-visible shape of every failure.
 */
export interface TypedError {
  code: number;
  message: string;
}

export abstract class RpkiError extends Error {
  abstract readonly kind: RpkiErrorKind;
  readonly code: number;

  constructor(message: string, code: number = NO_STATUS, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
  }

  toTypedError(): TypedError {
    return { code: this.code, message: this.message };
  }
}

/**
 * Invalid or missing startup configuration. Fatal; never returned from a tool call.
 */
export class InputError extends RpkiError {
  readonly kind = "input";

  constructor(message: string, options?: ErrorOptions) {
    super(message, NO_STATUS, options);
    this.name = "InputError";
  }
}

export class NetworkError extends RpkiError {
  readonly kind = "network";

  constructor(message: string, options?: ErrorOptions) {
    super(message, NO_STATUS, options);
    this.name = "NetworkError";
  }
}

/**
 * The upstream answered with a non-2xx status; the message is its response body.
 */
export class UpstreamError extends RpkiError {
  readonly kind = "upstream";

  constructor(status: number, body: string) {
    super(body, status);
    this.name = "UpstreamError";
  }
}

export class DecodeError extends RpkiError {
  readonly kind = "decode";

  constructor(message: string, code: number = NO_STATUS, options?: ErrorOptions) {
    super(message, code, options);
    this.name = "DecodeError";
  }
}

export class IoError extends RpkiError {
  readonly kind = "io";

  constructor(
    public readonly path: string,
    cause: unknown,
  ) {
    super(`Failed to read ${path}: ${describeError(cause)}`, NO_STATUS, { cause });
    this.name = "IoError";
  }
}

export interface OperationSuccess<T> {
  ok: true;
  value: T;
}

export interface OperationFailure {
  ok: false;
  error: RpkiError;
}

/**
 * OperationResult is a discriminated union returned by every gateway and decoder operation.
 */
export type OperationResult<T> = OperationSuccess<T> | OperationFailure;

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message && cause.message !== error.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}
