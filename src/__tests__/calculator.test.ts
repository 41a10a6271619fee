/**
 * Calculator Tests
 * Fixed-point valuation, health factor and liquidation sizing
 */

import { ethers } from "ethers";
import {
  ADDITIONAL_FEED_PRECISION,
  calculateHealthFactor,
  calculateLiquidationBonus,
  formatHealthFactor,
  getCollateralAdjustedForThreshold,
  getTokenAmountFromUsd,
  getUsdValue,
  isHealthy,
  MAX_HEALTH_FACTOR,
  PRECISION,
} from "../calculator";

const ETH_PRICE = 2000n * 10n ** 8n;

describe("Calculator", () => {
  describe("constants", () => {
    it("should scale 8-decimal feeds up by 1e10", () => {
      expect(ADDITIONAL_FEED_PRECISION).toBe(10n ** 10n);
      expect(PRECISION).toBe(10n ** 18n);
    });
  });

  describe("getUsdValue", () => {
    it("should value 15 ETH at $2000 as $30,000", () => {
      expect(getUsdValue(ETH_PRICE, ethers.parseEther("15"))).toBe(ethers.parseEther("30000"));
    });

    it("should return zero for a zero amount", () => {
      expect(getUsdValue(ETH_PRICE, 0n)).toBe(0n);
    });
  });

  describe("getTokenAmountFromUsd", () => {
    it("should convert $100 to 0.05 ETH at $2000", () => {
      expect(getTokenAmountFromUsd(ETH_PRICE, ethers.parseEther("100"))).toBe(50000000000000000n);
    });

    it("should round down", () => {
      // $100 at $18 = 5.5555... ETH
      expect(getTokenAmountFromUsd(1800000000n, ethers.parseEther("100"))).toBe(5555555555555555555n);
    });
  });

  describe("calculateHealthFactor", () => {
    it("should return MAX when there is no debt", () => {
      expect(calculateHealthFactor(0n, 0n)).toBe(MAX_HEALTH_FACTOR);
      expect(calculateHealthFactor(0n, ethers.parseEther("1000"))).toBe(MAX_HEALTH_FACTOR);
    });

    it("should be exactly 1.0 at 200% collateralization", () => {
      expect(calculateHealthFactor(ethers.parseEther("10000"), ethers.parseEther("20000"))).toBe(PRECISION);
    });

    it("should truncate below 1.0", () => {
      expect(calculateHealthFactor(ethers.parseEther("15000"), ethers.parseEther("20000"))).toBe(
        666666666666666666n
      );
    });

    it("should be zero with debt and no collateral", () => {
      expect(calculateHealthFactor(ethers.parseEther("1"), 0n)).toBe(0n);
    });
  });

  describe("thresholds and bonus", () => {
    it("should count half of collateral value", () => {
      expect(getCollateralAdjustedForThreshold(ethers.parseEther("20000"))).toBe(ethers.parseEther("10000"));
    });

    it("should pay a 10% bonus rounded down", () => {
      expect(calculateLiquidationBonus(5555555555555555555n)).toBe(555555555555555555n);
    });

    it("should treat 1.0 as healthy and anything below as unhealthy", () => {
      expect(isHealthy(PRECISION)).toBe(true);
      expect(isHealthy(PRECISION - 1n)).toBe(false);
    });
  });

  describe("formatHealthFactor", () => {
    it("should render MAX as infinity", () => {
      expect(formatHealthFactor(MAX_HEALTH_FACTOR)).toBe("∞");
    });

    it("should render other values as decimals", () => {
      expect(formatHealthFactor(ethers.parseEther("1.25"))).toBe("1.25");
    });
  });
});
