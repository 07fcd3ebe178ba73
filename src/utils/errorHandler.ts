import type { ApiFailure } from '../types/dexscreener';

export type ErrorKind =
  | 'transport'
  | 'api'
  | 'decode'
  | 'too_many_inputs'
  | 'invalid_argument';

export type DecodeFailureReason =
  | 'MalformedNumber'
  | 'MalformedTimestamp'
  | 'SchemaMismatch'
  | 'InvalidJson';

/**
 * Root of every error the client produces. Callers branch on `kind`
 * (or `instanceof` a subclass) to decide whether to retry or fall back.
 */
export abstract class DexScreenerError extends Error {
  public abstract readonly kind: ErrorKind;
  public readonly code: string;
  public readonly timestamp: Date;

  protected constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
    this.code = code;
    this.timestamp = new Date();

    Error.captureStackTrace(this, new.target);
  }

  /** Builds a caller-side misuse error with a custom message. */
  static custom(message: string): InvalidArgumentError {
    return new InvalidArgumentError(message);
  }
}

/** The host could not be reached or the connection failed mid-request. */
export class TransportError extends DexScreenerError {
  public readonly kind = 'transport' as const;

  constructor(message: string, code: string = 'TRANSPORT_ERROR', cause?: unknown) {
    super(`HTTP request error: ${message}`, code, cause);
  }
}

export class ApiError extends DexScreenerError {
  public readonly kind = 'api' as const;
  public readonly status: number;
  public readonly failure: ApiFailure;

  constructor(status: number, failure: ApiFailure) {
    super(formatApiFailure(failure), failure.code ?? 'API_ERROR');
    this.status = status;
    this.failure = failure;
  }
}

export interface DecodeErrorDetails {
  reason: DecodeFailureReason;
  /** Dotted location inside the body, empty for the root. */
  path?: string;
  /** Offending wire text, when one value is to blame. */
  raw?: string;
  /** HTTP status of the response that failed to decode. */
  status?: number;
  cause?: unknown;
}

export class DecodeError extends DexScreenerError {
  public readonly kind = 'decode' as const;
  public readonly reason: DecodeFailureReason;
  public readonly path: string;
  public readonly raw: string | undefined;
  public readonly status: number | undefined;

  constructor(message: string, details: DecodeErrorDetails) {
    super(`JSON parsing error: ${message}`, details.reason, details.cause);
    this.reason = details.reason;
    this.path = details.path ?? '';
    this.raw = details.raw;
    this.status = details.status;
  }
}

export class TooManyInputsError extends DexScreenerError {
  public readonly kind = 'too_many_inputs' as const;
  public readonly count: number;
  public readonly limit: number;

  constructor(count: number, limit: number) {
    super(`Too many token addresses (${count}). Maximum allowed is ${limit}.`, 'TOO_MANY_INPUTS');
    this.count = count;
    this.limit = limit;
  }
}

export class InvalidArgumentError extends DexScreenerError {
  public readonly kind = 'invalid_argument' as const;

  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
  }
}

export function formatApiFailure(failure: ApiFailure): string {
  return `DexScreener API error: ${failure.message} (code: ${failure.code ?? 'unknown'})`;
}

export function isDexScreenerError(value: unknown): value is DexScreenerError {
  return value instanceof DexScreenerError;
}
