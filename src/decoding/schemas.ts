import { z } from 'zod';
import { DecodeResult, decodeNumber, decodeOptionalNumber } from './numeric';
import { decodeTimestamp } from './timestamp';
import type { PairCollection, TradingPair } from '../types/dexscreener';

function resolve<T>(result: DecodeResult<T>, ctx: z.RefinementCtx): T {
  if (result.ok) return result.value;

  const { reason, raw } = result.failure;
  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: `${reason === 'MalformedNumber' ? 'Invalid number' : 'Failed to parse datetime'}: "${raw}"`,
    params: { reason, raw }
  });
  return z.NEVER;
}

const numberOrString = z.union([z.number(), z.string()]);

export const tolerantNumber = numberOrString.transform((value, ctx) => resolve(decodeNumber(value), ctx));

export const optionalTolerantNumber = numberOrString
  .nullish()
  .transform((value, ctx) => resolve(decodeOptionalNumber(value), ctx));

export const optionalTimestamp = z
  .union([z.number(), z.string()])
  .nullish()
  .transform((value, ctx) => resolve(decodeTimestamp(value), ctx));

const tokenSchema = z.object({
  address: z.string(),
  name: z.string(),
  symbol: z.string()
});

const activityCountsSchema = z.object({
  buys: z.number().int().nonnegative(),
  sells: z.number().int().nonnegative()
});

const activityByWindowSchema = z.object({
  m5: activityCountsSchema,
  h1: activityCountsSchema,
  h6: activityCountsSchema,
  h24: activityCountsSchema
});

// A window missing from the payload reads as 0.
const windowMetric = tolerantNumber.default(0);

const metricByWindowSchema = z.object({
  m5: windowMetric,
  h1: windowMetric,
  h6: windowMetric,
  h24: windowMetric
});

const liquiditySchema = z.object({
  usd: optionalTolerantNumber,
  base: tolerantNumber,
  quote: tolerantNumber
});

const optionalText = z
  .string()
  .nullish()
  .catch(null)
  .transform((value) => value ?? null);

const websiteSchema = z.object({
  label: optionalText,
  url: optionalText
});

// Socials arrive as either { platform, handle } or { type, url }
const socialSchema = z
  .object({
    platform: optionalText,
    type: optionalText,
    handle: optionalText,
    url: optionalText
  })
  .transform((social) => ({
    platform: social.platform ?? social.type,
    handle: social.handle,
    url: social.url
  }));

const infoSchema = z.object({
  imageUrl: optionalText,
  websites: z
    .array(websiteSchema)
    .nullish()
    .transform((value) => value ?? []),
  socials: z
    .array(socialSchema)
    .nullish()
    .transform((value) => value ?? [])
});

/** One pair as the API sends it, mapped onto {@link TradingPair}. */
export const tradingPairSchema = z
  .object({
    chainId: z.string(),
    dexId: z.string(),
    url: z.string(),
    pairAddress: z.string(),
    labels: z.array(z.string()).nullish(),
    baseToken: tokenSchema,
    quoteToken: tokenSchema,
    priceNative: tolerantNumber,
    priceUsd: optionalTolerantNumber,
    txns: activityByWindowSchema,
    volume: metricByWindowSchema,
    priceChange: metricByWindowSchema,
    liquidity: liquiditySchema.nullish(),
    fdv: optionalTolerantNumber,
    marketCap: optionalTolerantNumber,
    pairCreatedAt: optionalTimestamp,
    // Display-only block: an unreadable one is dropped instead of failing the pair
    info: infoSchema.nullish().catch(null)
  })
  .transform(
    (wire): TradingPair => ({
      chainId: wire.chainId,
      dexId: wire.dexId,
      url: wire.url,
      pairAddress: wire.pairAddress,
      labels: wire.labels ?? null,
      baseToken: wire.baseToken,
      quoteToken: wire.quoteToken,
      priceNative: wire.priceNative,
      priceUsd: wire.priceUsd,
      transactions: wire.txns,
      volume: wire.volume,
      priceChange: wire.priceChange,
      liquidity: wire.liquidity ?? null,
      fdv: wire.fdv,
      marketCap: wire.marketCap,
      pairCreatedAt: wire.pairCreatedAt,
      info: wire.info ?? null
    })
  );

export type TradingPairWire = z.input<typeof tradingPairSchema>;

/** `{ "pairs": [...] }` envelope used by the pair and search endpoints. */
export const pairEnvelopeSchema = z
  .object({ pairs: z.array(tradingPairSchema) })
  .transform((envelope): PairCollection => ({ pairs: envelope.pairs }));

/** Bare array returned by the token endpoints. */
export const pairArraySchema = z.array(tradingPairSchema).transform((pairs): PairCollection => ({ pairs }));

export const apiFailureSchema = z.object({
  code: z.string().nullish().transform((value) => value ?? null),
  message: z.string()
});
