/**
 * Collateral Engine - Solvency Calculator
 *
 * Read-only valuation of positions. Never mutates ledgers and never takes
 * the reentrancy guard.
 */

import {
  calculateHealthFactor,
  getCollateralAdjustedForThreshold,
  getTokenAmountFromUsd,
  getUsdValue,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
} from "./calculator";
import { BelowMinimumHealthFactorError } from "./errors";
import type { CollateralLedger, DebtLedger } from "./ledger";
import type { PriceOracleAdapter } from "./oracle";
import type { CollateralRegistry } from "./registry";
import type { AccountInformation } from "./types";

export class SolvencyCalculator {
  constructor(
    private readonly registry: CollateralRegistry,
    private readonly collateral: CollateralLedger,
    private readonly debt: DebtLedger,
    private readonly oracle: PriceOracleAdapter
  ) {}

  /** Latest 8-decimal USD price of a registered asset */
  priceOf(asset: string): bigint {
    return this.oracle.latestPrice(this.registry.priceFeedOf(asset));
  }

  usdValue(asset: string, amount: bigint): bigint {
    return getUsdValue(this.priceOf(asset), amount);
  }

  usdToAssetAmount(asset: string, usdAmount: bigint): bigint {
    return getTokenAmountFromUsd(this.priceOf(asset), usdAmount);
  }

  /** Sum of every registered asset's balance valued in USD */
  totalCollateralUsd(user: string): bigint {
    let total = 0n;
    for (const { asset } of this.registry.pairs) {
      total += this.usdValue(asset, this.collateral.balanceOf(user, asset));
    }
    return total;
  }

  accountInformation(user: string): AccountInformation {
    return {
      totalDebtMinted: this.debt.balanceOf(user),
      collateralValueInUsd: this.totalCollateralUsd(user),
    };
  }

  /** A position without debt is never unhealthy, so no prices are read for it */
  healthFactor(user: string): bigint {
    const debt = this.debt.balanceOf(user);
    if (debt === 0n) return MAX_HEALTH_FACTOR;
    return calculateHealthFactor(debt, this.totalCollateralUsd(user));
  }

  assertHealthy(user: string): void {
    const healthFactor = this.healthFactor(user);
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new BelowMinimumHealthFactorError(user, healthFactor);
    }
  }

  maxMintableUsd(user: string): bigint {
    return getCollateralAdjustedForThreshold(this.totalCollateralUsd(user));
  }
}
