/**
 * Collateral Engine - Liquidation Engine
 *
 * Seizes collateral from a position whose health factor is below 1.0 and
 * burns the equivalent debt, paying the liquidator a 10% bonus in the
 * seized asset.
 *
 * Flow (one call, nothing persisted between calls):
 *   1. Target must be unhealthy
 *   2. Size: debt -> asset units, plus 10% bonus
 *   3. Redeem payout from target to liquidator
 *   4. Burn liquidator's debt tokens on the target's behalf
 *   5. Target's health factor must have improved
 *   6. Liquidator must still be healthy
 *
 * The bonus assumes the position is at least 100% collateralized in the
 * chosen asset. Below that the target cannot cover payout in that asset and
 * step 3 fails with InsufficientBalance; there is no fallback to other assets.
 */

import { calculateLiquidationBonus, isHealthy } from "./calculator";
import { HealthFactorNotImprovedError, NotLiquidatableError } from "./errors";
import type { PositionManager } from "./position-manager";
import type { CollateralRegistry } from "./registry";
import type { SolvencyCalculator } from "./solvency";
import type { LiquidationPreview, LiquidationResult } from "./types";
import type { Transactor } from "./unit-of-work";
import { requirePositive } from "./utils";

export interface LiquidationEngineDeps {
  registry: CollateralRegistry;
  solvency: SolvencyCalculator;
  positions: PositionManager;
  transactor: Transactor;
}

export class LiquidationEngine {
  constructor(private readonly deps: LiquidationEngineDeps) {}

  /** Read-only sizing of a liquidation at current prices */
  preview(user: string, asset: string, debtToCover: bigint): LiquidationPreview {
    const { registry, solvency } = this.deps;
    requirePositive(debtToCover, "debtToCover");
    const token = registry.requireAllowed(asset);

    const startingHealthFactor = solvency.healthFactor(user);
    const tokenAmountFromDebtCovered = solvency.usdToAssetAmount(token, debtToCover);
    const bonusCollateral = calculateLiquidationBonus(tokenAmountFromDebtCovered);
    return {
      startingHealthFactor,
      liquidatable: !isHealthy(startingHealthFactor),
      tokenAmountFromDebtCovered,
      bonusCollateral,
      totalCollateralToRedeem: tokenAmountFromDebtCovered + bonusCollateral,
    };
  }

  liquidate(liquidator: string, user: string, asset: string, debtToCover: bigint): LiquidationResult {
    const { registry, solvency, positions, transactor } = this.deps;
    return transactor.run((unit) => {
      requirePositive(debtToCover, "debtToCover");
      const token = registry.requireAllowed(asset);

      const startingHealthFactor = solvency.healthFactor(user);
      if (isHealthy(startingHealthFactor)) {
        throw new NotLiquidatableError(user, startingHealthFactor);
      }

      const tokenAmountFromDebtCovered = solvency.usdToAssetAmount(token, debtToCover);
      const bonusCollateral = calculateLiquidationBonus(tokenAmountFromDebtCovered);
      const totalCollateralToRedeem = tokenAmountFromDebtCovered + bonusCollateral;

      positions.redeem(user, liquidator, token, totalCollateralToRedeem);
      positions.burn(liquidator, user, debtToCover);

      const endingHealthFactor = solvency.healthFactor(user);
      if (endingHealthFactor <= startingHealthFactor) {
        throw new HealthFactorNotImprovedError(user, startingHealthFactor, endingHealthFactor);
      }
      solvency.assertHealthy(liquidator);

      const result: LiquidationResult = {
        user,
        liquidator,
        asset: token,
        debtCovered: debtToCover,
        collateralSeized: totalCollateralToRedeem,
        bonusCollateral,
        startingHealthFactor,
        endingHealthFactor,
      };
      unit.publish({ type: "Liquidated", ...result });
      return result;
    });
  }
}
