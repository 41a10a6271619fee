/**
 * Collateral Registry Tests
 */

import { isEngineError } from "../errors";
import { CollateralRegistry } from "../registry";
import { BTC_USD_FEED, catchError, ETH_USD_FEED, WBTC, WETH } from "./helpers/mocks";

describe("CollateralRegistry", () => {
  it("should keep assets in construction order", () => {
    const registry = new CollateralRegistry([WETH, WBTC], [ETH_USD_FEED, BTC_USD_FEED]);
    expect(registry.assets).toEqual([WETH, WBTC]);
    expect(registry.pairs).toEqual([
      { asset: WETH, priceFeed: ETH_USD_FEED },
      { asset: WBTC, priceFeed: BTC_USD_FEED },
    ]);
  });

  it("should reject mismatched list lengths", () => {
    const err = catchError(() => new CollateralRegistry([WETH, WBTC], [ETH_USD_FEED]));
    expect(isEngineError(err, "ConfigurationMismatch")).toBe(true);
    if (isEngineError(err, "ConfigurationMismatch")) {
      expect(err.assetCount).toBe(2);
      expect(err.priceFeedCount).toBe(1);
    }
  });

  it("should reject a duplicate asset", () => {
    const err = catchError(() => new CollateralRegistry([WETH, WETH.toLowerCase()], [ETH_USD_FEED, BTC_USD_FEED]));
    expect(isEngineError(err, "InvalidConfig")).toBe(true);
  });

  it("should reject an unparseable address", () => {
    const err = catchError(() => new CollateralRegistry(["0x1234"], [ETH_USD_FEED]));
    expect(isEngineError(err, "InvalidAddress")).toBe(true);
    if (isEngineError(err, "InvalidAddress")) {
      expect(err.field).toBe("collateralTokens[0]");
    }
  });

  it("should resolve lowercase addresses to checksum form", () => {
    const registry = new CollateralRegistry([WETH], [ETH_USD_FEED]);
    expect(registry.isAllowed(WETH.toLowerCase())).toBe(true);
    expect(registry.requireAllowed(WETH.toLowerCase())).toBe(WETH);
    expect(registry.priceFeedOf(WETH.toLowerCase())).toBe(ETH_USD_FEED);
  });

  it("should reject assets off the allow-list", () => {
    const registry = new CollateralRegistry([WETH], [ETH_USD_FEED]);
    expect(registry.isAllowed(WBTC)).toBe(false);
    expect(registry.isAllowed("not-an-address")).toBe(false);

    const err = catchError(() => registry.requireAllowed(WBTC));
    expect(isEngineError(err, "AssetNotAllowed")).toBe(true);
    expect(isEngineError(catchError(() => registry.priceFeedOf(WBTC)), "AssetNotAllowed")).toBe(true);
  });
});
