/**
 * Shared setup for the example scripts: loads .env, builds a client and
 * prints decoded pairs.
 */

import dotenv from 'dotenv';
import { DexScreenerClient } from '../services/dexscreener';
import { PairCollection } from '../types/dexscreener';
import { isDexScreenerError } from '../utils/errorHandler';
import { Formatters } from '../utils/formatters';
import { createLogger } from '../utils/logger';

dotenv.config();

export function createClient(): DexScreenerClient {
  return new DexScreenerClient({
    baseUrl: process.env.DEXSCREENER_BASE_URL || undefined,
    timeoutMs: 15000,
    logger: createLogger(process.env.LOG_LEVEL || 'info')
  });
}

export function printPairs(title: string, collection: PairCollection, limit: number = 10): void {
  console.log(`${title}: ${collection.pairs.length} pair(s)`);
  for (const pair of collection.pairs.slice(0, limit)) {
    console.log(`  ${Formatters.formatPairSummary(pair)}`);
  }
}

export function run(main: () => Promise<void>): void {
  main().catch((error: unknown) => {
    if (isDexScreenerError(error)) {
      console.error(`${error.name} [${error.kind}/${error.code}]: ${error.message}`);
    } else {
      console.error('Unexpected error:', error);
    }
    process.exitCode = 1;
  });
}
