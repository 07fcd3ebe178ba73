export const TIME_WINDOWS = ['m5', 'h1', 'h6', 'h24'] as const;

/** Lookback interval label: 5 minutes, 1 hour, 6 hours, 24 hours. */
export type TimeWindow = (typeof TIME_WINDOWS)[number];

export interface Token {
  readonly address: string;
  readonly name: string;
  readonly symbol: string;
}

export interface ActivityCounts {
  readonly buys: number;
  readonly sells: number;
}

export type ActivityByWindow = { readonly [W in TimeWindow]: ActivityCounts };

/** Used for both USD volume and price-change percentage. */
export type MetricByWindow = { readonly [W in TimeWindow]: number };

export interface LiquiditySnapshot {
  readonly usd: number | null;
  readonly base: number;
  readonly quote: number;
}

export interface PairWebsite {
  readonly label: string | null;
  readonly url: string | null;
}

export interface PairSocial {
  readonly platform: string | null;
  readonly handle: string | null;
  readonly url: string | null;
}

export interface PairInfo {
  readonly imageUrl: string | null;
  readonly websites: readonly PairWebsite[];
  readonly socials: readonly PairSocial[];
}

export interface TradingPair {
  readonly chainId: string;
  readonly dexId: string;
  readonly url: string;
  readonly pairAddress: string;
  readonly labels: readonly string[] | null;
  readonly baseToken: Token;
  readonly quoteToken: Token;
  /** Base token priced in quote token units. */
  readonly priceNative: number;
  readonly priceUsd: number | null;
  readonly transactions: ActivityByWindow;
  readonly volume: MetricByWindow;
  readonly priceChange: MetricByWindow;
  readonly liquidity: LiquiditySnapshot | null;
  readonly fdv: number | null;
  readonly marketCap: number | null;
  readonly pairCreatedAt: Date | null;
  readonly info: PairInfo | null;
}

/** Pairs in the order the API returned them. */
export interface PairCollection {
  readonly pairs: readonly TradingPair[];
}

export interface ApiFailure {
  readonly code: string | null;
  readonly message: string;
}

export interface RequestOptions {
  /** Aborts the underlying HTTP request. */
  signal?: AbortSignal;
}
