/**
 * Collateral Engine - Calculator Utilities
 *
 * Pure fixed-point math for valuation, health factor and liquidation sizing.
 * Ledger amounts carry 18 decimals, price feeds carry 8. Every price that
 * crosses that boundary goes through getUsdValue / getTokenAmountFromUsd.
 */

import { ethers } from "ethers";

/** Ledger precision (1.0 == 1e18) */
export const PRECISION = 10n ** 18n;

export const LEDGER_DECIMALS = 18;
export const FEED_DECIMALS = 8;

/** Scales an 8-decimal feed answer up to ledger precision */
export const ADDITIONAL_FEED_PRECISION = 10n ** BigInt(LEDGER_DECIMALS - FEED_DECIMALS);

/** Percentage of collateral value counted toward solvency (200% overcollateralized) */
export const LIQUIDATION_THRESHOLD = 50n;

/** Extra collateral paid to a liquidator, in percent of the debt-equivalent amount */
export const LIQUIDATION_BONUS = 10n;

export const LIQUIDATION_PRECISION = 100n;

export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor reported for an account with no debt */
export const MAX_HEALTH_FACTOR = ethers.MaxUint256;

/**
 * USD value (18 decimals) of `amount` units of an asset.
 * @param price  8-decimal feed answer
 * @param amount Asset amount (18 decimals)
 */
export function getUsdValue(price: bigint, amount: bigint): bigint {
  return (price * ADDITIONAL_FEED_PRECISION * amount) / PRECISION;
}

/**
 * Inverse of getUsdValue: asset units worth `usdAmount`, rounded down.
 * @param price     8-decimal feed answer
 * @param usdAmount USD amount (18 decimals)
 */
export function getTokenAmountFromUsd(price: bigint, usdAmount: bigint): bigint {
  return (usdAmount * PRECISION) / (price * ADDITIONAL_FEED_PRECISION);
}

/** Collateral value that may be minted against while keeping health factor >= 1.0 */
export function getCollateralAdjustedForThreshold(collateralValueInUsd: bigint): bigint {
  return (collateralValueInUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
}

/**
 * Calculate health factor for a position.
 * @returns Health factor scaled by 1e18 (1e18 = 1.0), MAX_HEALTH_FACTOR when debt is zero
 */
export function calculateHealthFactor(totalDebtMinted: bigint, collateralValueInUsd: bigint): bigint {
  if (totalDebtMinted === 0n) return MAX_HEALTH_FACTOR;
  return (getCollateralAdjustedForThreshold(collateralValueInUsd) * PRECISION) / totalDebtMinted;
}

export function calculateLiquidationBonus(tokenAmountFromDebtCovered: bigint): bigint {
  return (tokenAmountFromDebtCovered * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
}

export function isHealthy(healthFactor: bigint): boolean {
  return healthFactor >= MIN_HEALTH_FACTOR;
}

/** Human-readable health factor for logs */
export function formatHealthFactor(healthFactor: bigint): string {
  return healthFactor === MAX_HEALTH_FACTOR ? "∞" : ethers.formatEther(healthFactor);
}
