import { AxiosInstance } from 'axios';
import { InvalidArgumentError } from './utils/errorHandler';
import { Logger } from './utils/logger';

/** API version segment used by the `/latest/dex/...` endpoints. */
export const API_VERSION = 'latest';

export const API_BASE_URL = 'https://api.dexscreener.com';

/** Upper bound on addresses accepted by the multi-token endpoint. */
export const MAX_TOKEN_ADDRESSES = 30;

/**
 * Documented request ceilings, in requests per minute. Advisory only: the
 * client neither tracks nor throttles request rates.
 */
export const RATE_LIMITS = {
  pairs: 300,
  tokenPairs: 300,
  tokens: 300,
  search: 300
} as const;

export interface ClientOptions {
  /** Defaults to {@link API_BASE_URL}. */
  baseUrl?: string;
  /** Transport handle. A fresh axios instance is created when omitted. */
  http?: AxiosInstance;
  /** Per-request timeout in milliseconds. No deadline when omitted. */
  timeoutMs?: number;
  logger?: Logger;
}

export interface ResolvedClientOptions {
  baseUrl: string;
  http: AxiosInstance | undefined;
  timeoutMs: number | undefined;
  logger: Logger | undefined;
}

export function resolveClientOptions(options: ClientOptions = {}): ResolvedClientOptions {
  const baseUrl = (options.baseUrl ?? API_BASE_URL).trim().replace(/\/+$/, '');
  if (!baseUrl) {
    throw new InvalidArgumentError('Base URL must not be empty');
  }

  if (options.timeoutMs !== undefined && (!Number.isFinite(options.timeoutMs) || options.timeoutMs < 0)) {
    throw new InvalidArgumentError(`Invalid timeout: ${options.timeoutMs}`);
  }

  return {
    baseUrl,
    http: options.http,
    timeoutMs: options.timeoutMs,
    logger: options.logger
  };
}
