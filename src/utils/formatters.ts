import { TradingPair } from '../types/dexscreener';

export class Formatters {
  static formatPrice(price: number, decimals: number = 6): string {
    if (price >= 1) {
      return price.toFixed(4);
    }
    return price.toFixed(decimals);
  }

  static formatUsd(value: number | null): string {
    if (value === null) return 'n/a';
    return `$${this.formatCompact(value)}`;
  }

  static formatCompact(value: number): string {
    const abs = Math.abs(value);
    if (abs >= 1_000_000_000) {
      return `${(value / 1_000_000_000).toFixed(1)}B`;
    }
    if (abs >= 1_000_000) {
      return `${(value / 1_000_000).toFixed(1)}M`;
    }
    if (abs >= 1_000) {
      return `${(value / 1_000).toFixed(1)}K`;
    }
    return value.toFixed(0);
  }

  static formatPriceChange(change: number): string {
    const sign = change >= 0 ? '+' : '';
    return `${sign}${change.toFixed(1)}%`;
  }

  static formatAge(createdAt: Date | null, now: Date = new Date()): string {
    if (!createdAt) return 'unknown';

    const milliseconds = Math.max(0, now.getTime() - createdAt.getTime());
    const minutes = Math.floor(milliseconds / 60_000);
    const hours = Math.floor(minutes / 60);
    const days = Math.floor(hours / 24);

    if (days > 0) return `${days}d ${hours % 24}h`;
    if (hours > 0) return `${hours}h ${minutes % 60}m`;
    return `${minutes}m`;
  }

  /** One line per pair, as printed by the example scripts. */
  static formatPairSummary(pair: TradingPair, now: Date = new Date()): string {
    const name = `${pair.baseToken.symbol}/${pair.quoteToken.symbol}`;
    const price = pair.priceUsd === null ? 'n/a' : `$${this.formatPrice(pair.priceUsd)}`;
    const txns = pair.transactions.h24.buys + pair.transactions.h24.sells;

    return [
      `${name} on ${pair.dexId} (${pair.chainId})`,
      `price ${price}`,
      `24h ${this.formatPriceChange(pair.priceChange.h24)}`,
      `vol ${this.formatUsd(pair.volume.h24)}`,
      `liq ${this.formatUsd(pair.liquidity?.usd ?? null)}`,
      `txns ${txns}`,
      `age ${this.formatAge(pair.pairCreatedAt, now)}`
    ].join(' | ');
  }
}
