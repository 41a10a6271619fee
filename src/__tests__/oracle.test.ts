/**
 * Price Oracle Adapter Tests
 * Staleness boundary and answer validation
 */

import { ORACLE_TIMEOUT_SECONDS } from "../config";
import { isEngineError } from "../errors";
import { isStale, PriceOracleAdapter } from "../oracle";
import { catchError, ETH_USD_FEED, ETH_USD_PRICE, FakeClock, MockV3Aggregator } from "./helpers/mocks";

describe("isStale", () => {
  it("should treat an answer exactly at the timeout as fresh", () => {
    expect(isStale(1000, 1000 + 10800, 10800)).toBe(false);
  });

  it("should treat an answer one second past the timeout as stale", () => {
    expect(isStale(1000, 1000 + 10801, 10800)).toBe(true);
  });
});

describe("PriceOracleAdapter", () => {
  let clock: FakeClock;
  let feed: MockV3Aggregator;
  let oracle: PriceOracleAdapter;

  beforeEach(() => {
    clock = new FakeClock();
    feed = new MockV3Aggregator(clock);
    feed.updateAnswer(ETH_USD_FEED, ETH_USD_PRICE);
    oracle = new PriceOracleAdapter(feed, { now: clock.now });
  });

  it("should default to a three hour timeout", () => {
    expect(oracle.timeoutSeconds).toBe(ORACLE_TIMEOUT_SECONDS);
    expect(ORACLE_TIMEOUT_SECONDS).toBe(10800);
  });

  it("should return a fresh answer", () => {
    expect(oracle.latestPrice(ETH_USD_FEED)).toBe(ETH_USD_PRICE);
  });

  it("should still accept the answer at exactly the timeout", () => {
    clock.advance(10800);
    expect(oracle.latestPrice(ETH_USD_FEED)).toBe(ETH_USD_PRICE);
  });

  it("should reject an answer older than the timeout", () => {
    const updatedAt = clock.now();
    clock.advance(10801);

    const err = catchError(() => oracle.latestPrice(ETH_USD_FEED));

    expect(isEngineError(err, "StalePrice")).toBe(true);
    if (isEngineError(err, "StalePrice")) {
      expect(err.priceFeed).toBe(ETH_USD_FEED);
      expect(err.updatedAt).toBe(updatedAt);
      expect(err.secondsSinceUpdate).toBe(10801);
    }
  });

  it("should honour a custom timeout", () => {
    const strict = new PriceOracleAdapter(feed, { now: clock.now, timeoutSeconds: 60 });
    clock.advance(61);
    expect(isEngineError(catchError(() => strict.latestPrice(ETH_USD_FEED)), "StalePrice")).toBe(true);
  });

  it("should reject non-positive answers", () => {
    feed.updateAnswer(ETH_USD_FEED, 0n);
    const err = catchError(() => oracle.latestPrice(ETH_USD_FEED));
    expect(isEngineError(err, "InvalidPrice")).toBe(true);

    feed.updateAnswer(ETH_USD_FEED, -1n);
    expect(isEngineError(catchError(() => oracle.latestPrice(ETH_USD_FEED)), "InvalidPrice")).toBe(true);
  });

  it("should report staleness before an invalid answer", () => {
    feed.updateAnswer(ETH_USD_FEED, 0n);
    clock.advance(10801);
    expect(isEngineError(catchError(() => oracle.latestPrice(ETH_USD_FEED)), "StalePrice")).toBe(true);
  });
});
