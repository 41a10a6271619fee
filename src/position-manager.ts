/**
 * Collateral Engine - Position Manager
 *
 * Deposit, mint, redeem and burn for a single user, plus the redeem and burn
 * primitives the liquidation engine reuses with distinct from/to parties.
 *
 * Every method runs inside a unit of work: ledger mutations and solvency
 * checks happen first, custody and token calls are queued and run at commit.
 */

import {
  MintFailedError,
  TransferFailedError,
  InsufficientBalanceError,
} from "./errors";
import type { CollateralLedger, DebtLedger } from "./ledger";
import type { CollateralRegistry } from "./registry";
import type { SolvencyCalculator } from "./solvency";
import type { CollateralCustody, DebtToken } from "./types";
import type { Transactor } from "./unit-of-work";
import { requirePositive } from "./utils";

export interface PositionManagerDeps {
  registry: CollateralRegistry;
  collateral: CollateralLedger;
  debt: DebtLedger;
  solvency: SolvencyCalculator;
  custody: CollateralCustody;
  debtToken: DebtToken;
  transactor: Transactor;
  /** Address the engine holds debt tokens under before burning them */
  engineAddress: string;
}

export class PositionManager {
  constructor(private readonly deps: PositionManagerDeps) {}

  depositCollateral(user: string, asset: string, amount: bigint): void {
    const { registry, collateral, custody, transactor } = this.deps;
    transactor.run((unit) => {
      requirePositive(amount, "amountCollateral");
      const token = registry.requireAllowed(asset);

      collateral.credit(user, token, amount);
      unit.publish({ type: "CollateralDeposited", user, asset: token, amount });
      unit.enqueue({
        label: `transferIn ${token} from ${user}`,
        apply: () => custody.transferIn(token, user, amount),
        compensate: () => custody.transferOut(token, user, amount),
        failure: () => new TransferFailedError("transferIn", token, amount),
      });
    });
  }

  mintDebt(user: string, amount: bigint): void {
    const { debt, solvency, debtToken, transactor } = this.deps;
    transactor.run((unit) => {
      requirePositive(amount, "amountToMint");

      debt.creditDebt(user, amount);
      solvency.assertHealthy(user);
      unit.publish({ type: "DebtMinted", user, amount });
      unit.enqueue({
        label: `mint ${amount} to ${user}`,
        irreversible: true,
        apply: () => debtToken.mint(user, amount),
        failure: () => new MintFailedError(user, amount),
      });
    });
  }

  depositCollateralAndMint(user: string, asset: string, amountCollateral: bigint, amountToMint: bigint): void {
    this.deps.transactor.run(() => {
      this.depositCollateral(user, asset, amountCollateral);
      this.mintDebt(user, amountToMint);
    });
  }

  redeemCollateral(user: string, asset: string, amount: bigint): void {
    const { registry, solvency, transactor } = this.deps;
    transactor.run(() => {
      requirePositive(amount, "amountCollateral");
      const token = registry.requireAllowed(asset);

      this.redeem(user, user, token, amount);
      solvency.assertHealthy(user);
    });
  }

  burnDebt(user: string, amount: bigint): void {
    this.deps.transactor.run(() => {
      requirePositive(amount, "amountToBurn");
      this.burn(user, user, amount);
    });
  }

  /** Debt shrinks before collateral does, so the final check sees the smaller debt */
  redeemAndBurn(user: string, asset: string, amountCollateral: bigint, amountToBurn: bigint): void {
    this.deps.transactor.run(() => {
      this.burnDebt(user, amountToBurn);
      this.redeemCollateral(user, asset, amountCollateral);
    });
  }

  // ============================================================
  //                     PRIMITIVES
  // ============================================================

  /**
   * Move `amount` of `asset` out of `redeemFrom`'s position to `redeemTo`.
   * When the parties differ (liquidation) the units are recorded against
   * `redeemTo` rather than vanishing from the ledger. No health check here.
   */
  redeem(redeemFrom: string, redeemTo: string, asset: string, amount: bigint): void {
    const { collateral, custody, transactor } = this.deps;
    transactor.run((unit) => {
      collateral.debit(redeemFrom, asset, amount);
      if (redeemFrom !== redeemTo) {
        collateral.credit(redeemTo, asset, amount);
      }
      unit.publish({ type: "CollateralRedeemed", redeemedFrom: redeemFrom, redeemedTo: redeemTo, asset, amount });
      unit.enqueue({
        label: `transferOut ${asset} to ${redeemTo}`,
        apply: () => custody.transferOut(asset, redeemTo, amount),
        compensate: () => custody.transferIn(asset, redeemTo, amount),
        failure: () => new TransferFailedError("transferOut", asset, amount),
      });
    });
  }

  /**
   * Pay down `onBehalfOf`'s debt with debt tokens pulled from `burnFrom`.
   * When the parties differ, `burnFrom`'s own debt record is consumed too.
   */
  burn(burnFrom: string, onBehalfOf: string, amount: bigint): void {
    const { debt, debtToken, transactor, engineAddress } = this.deps;
    transactor.run((unit) => {
      const outstanding = debt.balanceOf(onBehalfOf);
      if (outstanding < amount) {
        throw new InsufficientBalanceError("debt", onBehalfOf, amount, outstanding);
      }

      debt.debitDebt(onBehalfOf, amount);
      if (burnFrom !== onBehalfOf) {
        debt.debitDebt(burnFrom, amount);
      }
      unit.publish({ type: "DebtBurned", burnFrom, onBehalfOf, amount });
      unit.enqueue({
        label: `transferFrom ${burnFrom} ${amount} debt`,
        apply: () => debtToken.transferFrom(burnFrom, engineAddress, amount),
        compensate: () => debtToken.transferFrom(engineAddress, burnFrom, amount),
        failure: () => new TransferFailedError("transferFrom", "debt token", amount),
      });
      unit.enqueue({
        label: `burn ${amount} debt`,
        irreversible: true,
        apply: () => {
          debtToken.burn(amount);
          return true;
        },
        failure: () => new TransferFailedError("burn", "debt token", amount),
      });
    });
  }
}
