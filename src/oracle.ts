/**
 * Collateral Engine - Price Oracle Adapter
 *
 * Wraps a Chainlink-style price feed and refuses to hand out stale or
 * non-positive answers. Stale answers are terminal for the calling
 * operation; callers retry with fresh data.
 */

import { InvalidPriceError, StalePriceError } from "./errors";
import type { PriceFeed } from "./types";
import { ORACLE_TIMEOUT_SECONDS } from "./config";

export interface PriceOracleOptions {
  timeoutSeconds: number;
  /** Unix seconds */
  now: () => number;
}

export const DEFAULT_ORACLE_OPTIONS: PriceOracleOptions = {
  timeoutSeconds: ORACLE_TIMEOUT_SECONDS,
  now: () => Math.floor(Date.now() / 1000),
};

/**
 * True when an answer last updated at `updatedAt` is older than the timeout.
 * An answer exactly `timeoutSeconds` old is still fresh.
 */
export function isStale(updatedAt: number, now: number, timeoutSeconds: number): boolean {
  return now - updatedAt > timeoutSeconds;
}

export class PriceOracleAdapter {
  private readonly options: PriceOracleOptions;

  constructor(private readonly feed: PriceFeed, options: Partial<PriceOracleOptions> = {}) {
    this.options = { ...DEFAULT_ORACLE_OPTIONS, ...options };
  }

  get timeoutSeconds(): number {
    return this.options.timeoutSeconds;
  }

  /** Latest 8-decimal USD price from `priceFeed` */
  latestPrice(priceFeed: string): bigint {
    const { answer, updatedAt } = this.feed.latestRoundData(priceFeed);
    const now = this.options.now();
    if (isStale(updatedAt, now, this.options.timeoutSeconds)) {
      throw new StalePriceError(priceFeed, updatedAt, now - updatedAt);
    }
    if (answer <= 0n) {
      throw new InvalidPriceError(priceFeed, answer);
    }
    return answer;
  }
}
