import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { API_VERSION, ClientOptions, MAX_TOKEN_ADDRESSES, resolveClientOptions } from '../config';
import { apiFailureSchema, pairArraySchema, pairEnvelopeSchema } from '../decoding/schemas';
import { PairCollection, RequestOptions } from '../types/dexscreener';
import {
  DecodeError,
  DecodeFailureReason,
  ApiError,
  InvalidArgumentError,
  TooManyInputsError,
  TransportError
} from '../utils/errorHandler';
import { createChildLogger, Logger } from '../utils/logger';

type PairSchema = z.ZodType<PairCollection, z.ZodTypeDef, unknown>;

/**
 * Read-only client for the DexScreener pairs API.
 *
 * Each call is an independent GET: there is no cache, no retry and no rate
 * tracking, so instances can be shared freely or created per call. Every
 * failure rejects with a {@link DexScreenerError} subclass.
 *
 * @example
 * const client = new DexScreenerClient();
 * const { pairs } = await client.getPairsByChainAndAddress(
 *   'ethereum',
 *   '0x88e6a0c2ddd26feeb64f039a2c41296fcb3f5640'
 * );
 */
export class DexScreenerClient {
  private readonly client: AxiosInstance;
  private readonly log: Logger;
  private readonly timeoutMs: number | undefined;
  public readonly baseUrl: string;

  constructor(options: ClientOptions = {}) {
    const resolved = resolveClientOptions(options);

    this.baseUrl = resolved.baseUrl;
    this.timeoutMs = resolved.timeoutMs;
    this.log = createChildLogger('dexscreener-client', resolved.logger);
    this.client = resolved.http ?? axios.create({
      headers: {
        'Accept': 'application/json',
        'User-Agent': 'dexscreener-pairs-client/1.0.0'
      }
    });
  }

  /** Pairs matching a pair contract address on one chain. */
  async getPairsByChainAndAddress(
    chainId: string,
    pairAddress: string,
    options: RequestOptions = {}
  ): Promise<PairCollection> {
    return this.fetchPairs(`/${API_VERSION}/dex/pairs/${chainId}/${pairAddress}`, pairEnvelopeSchema, options);
  }

  /** All pools that include the given token. */
  async getPairsByTokenAddress(
    chainId: string,
    tokenAddress: string,
    options: RequestOptions = {}
  ): Promise<PairCollection> {
    return this.fetchPairs(`/token-pairs/v1/${chainId}/${tokenAddress}`, pairArraySchema, options);
  }

  /**
   * Pairs for up to {@link MAX_TOKEN_ADDRESSES} tokens in one request. The
   * limit is checked before anything is sent.
   */
  async getPairsByTokenAddresses(
    chainId: string,
    tokenAddresses: readonly string[],
    options: RequestOptions = {}
  ): Promise<PairCollection> {
    if (tokenAddresses.length > MAX_TOKEN_ADDRESSES) {
      throw new TooManyInputsError(tokenAddresses.length, MAX_TOKEN_ADDRESSES);
    }
    if (tokenAddresses.length === 0) {
      throw new InvalidArgumentError('At least one token address is required');
    }

    const addressParam = tokenAddresses.join(',');
    return this.fetchPairs(`/tokens/v1/${chainId}/${addressParam}`, pairArraySchema, options);
  }

  /**
   * Free-text search by token name, symbol or address. The query goes into
   * the URL as given; percent-encoding is left to the transport.
   */
  async searchPairs(query: string, options: RequestOptions = {}): Promise<PairCollection> {
    return this.fetchPairs(`/${API_VERSION}/dex/search?q=${query}`, pairEnvelopeSchema, options);
  }

  private async fetchPairs(path: string, schema: PairSchema, options: RequestOptions): Promise<PairCollection> {
    this.log.debug({ path }, 'GET request');

    const response = await this.get(path, options);
    const body = parseBody(response);

    if (response.status < 200 || response.status >= 300) {
      const failure = apiFailureSchema.safeParse(body);
      if (!failure.success) {
        throw toDecodeError(failure.error, response.status);
      }
      throw new ApiError(response.status, failure.data);
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      throw toDecodeError(result.error, response.status);
    }

    this.log.debug({ path, count: result.data.pairs.length }, 'Decoded pairs');
    return result.data;
  }

  private async get(path: string, options: RequestOptions): Promise<AxiosResponse<unknown>> {
    try {
      return await this.client.get<unknown>(path, {
        baseURL: this.baseUrl,
        timeout: this.timeoutMs,
        signal: options.signal,
        // Raw text in, so that both success and failure bodies go through our decoders
        responseType: 'text',
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true
      });
    } catch (error) {
      throw toTransportError(error);
    }
  }
}

function parseBody(response: AxiosResponse<unknown>): unknown {
  if (typeof response.data !== 'string') {
    return response.data;
  }

  try {
    return JSON.parse(response.data);
  } catch (error) {
    throw new DecodeError(error instanceof Error ? error.message : String(error), {
      reason: 'InvalidJson',
      raw: response.data,
      status: response.status,
      cause: error
    });
  }
}

function toTransportError(error: unknown): TransportError {
  if (axios.isAxiosError(error)) {
    return new TransportError(error.message, error.code ?? 'TRANSPORT_ERROR', error);
  }
  if (error instanceof Error) {
    return new TransportError(error.message, 'TRANSPORT_ERROR', error);
  }
  return new TransportError(String(error));
}

function malformedReason(params: Record<string, unknown> | undefined): DecodeFailureReason | null {
  const reason = params?.reason;
  return reason === 'MalformedNumber' || reason === 'MalformedTimestamp' ? reason : null;
}

function toDecodeError(error: z.ZodError, status: number): DecodeError {
  const issue = error.issues[0];
  if (!issue) {
    return new DecodeError(error.message, { reason: 'SchemaMismatch', status, cause: error });
  }

  const path = issue.path.join('.');
  const location = path || '<root>';

  if (issue.code === z.ZodIssueCode.custom) {
    const reason = malformedReason(issue.params);
    const raw = issue.params?.raw;
    if (reason) {
      return new DecodeError(`${issue.message} at ${location}`, {
        reason,
        path,
        raw: typeof raw === 'string' ? raw : undefined,
        status,
        cause: error
      });
    }
  }

  return new DecodeError(`${issue.message} at ${location}`, {
    reason: 'SchemaMismatch',
    path,
    status,
    cause: error
  });
}
