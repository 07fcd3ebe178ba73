export { DexScreenerClient } from './services/dexscreener';
export {
  API_BASE_URL,
  API_VERSION,
  MAX_TOKEN_ADDRESSES,
  RATE_LIMITS,
  ClientOptions
} from './config';
export {
  DexScreenerError,
  TransportError,
  ApiError,
  DecodeError,
  TooManyInputsError,
  InvalidArgumentError,
  isDexScreenerError,
  ErrorKind,
  DecodeFailureReason
} from './utils/errorHandler';
export {
  NumberOrString,
  DecodeResult,
  MalformedValue,
  parseDecimal,
  decodeNumber,
  decodeOptionalNumber
} from './decoding/numeric';
export { decodeTimestamp, parseRfc3339 } from './decoding/timestamp';
export { tradingPairSchema, TradingPairWire } from './decoding/schemas';
export * from './types/dexscreener';
