/**
 * Collateral Engine - Collateral & Debt Ledgers
 *
 * Per-user bookkeeping of deposited collateral and minted debt. Only the
 * PositionManager and LiquidationEngine mutate these. Balances are bigints
 * that never go negative: every debit is checked against the stored balance.
 */

import { InsufficientBalanceError } from "./errors";
import type { LedgerJournal } from "./unit-of-work";
import { requirePositive } from "./utils";

export class CollateralLedger {
  private readonly balances = new Map<string, Map<string, bigint>>();

  constructor(private readonly journal: LedgerJournal) {}

  balanceOf(user: string, asset: string): bigint {
    return this.balances.get(user)?.get(asset) ?? 0n;
  }

  credit(user: string, asset: string, amount: bigint): void {
    requirePositive(amount, "amount");
    const previous = this.balanceOf(user, asset);
    this.set(user, asset, previous + amount);
    this.journal.record(() => this.set(user, asset, previous), {
      type: "LedgerChanged",
      ledger: "collateral",
      user,
      asset,
      amount,
      direction: "credit",
    });
  }

  debit(user: string, asset: string, amount: bigint): void {
    requirePositive(amount, "amount");
    const previous = this.balanceOf(user, asset);
    if (amount > previous) {
      throw new InsufficientBalanceError("collateral", user, amount, previous);
    }
    this.set(user, asset, previous - amount);
    this.journal.record(() => this.set(user, asset, previous), {
      type: "LedgerChanged",
      ledger: "collateral",
      user,
      asset,
      amount,
      direction: "debit",
    });
  }

  private set(user: string, asset: string, amount: bigint): void {
    let assets = this.balances.get(user);
    if (!assets) {
      assets = new Map();
      this.balances.set(user, assets);
    }
    assets.set(asset, amount);
  }
}

export class DebtLedger {
  private readonly minted = new Map<string, bigint>();

  constructor(private readonly journal: LedgerJournal) {}

  balanceOf(user: string): bigint {
    return this.minted.get(user) ?? 0n;
  }

  creditDebt(user: string, amount: bigint): void {
    requirePositive(amount, "amount");
    const previous = this.balanceOf(user);
    this.minted.set(user, previous + amount);
    this.journal.record(() => this.minted.set(user, previous), {
      type: "LedgerChanged",
      ledger: "debt",
      user,
      amount,
      direction: "credit",
    });
  }

  debitDebt(user: string, amount: bigint): void {
    requirePositive(amount, "amount");
    const previous = this.balanceOf(user);
    if (amount > previous) {
      throw new InsufficientBalanceError("debt", user, amount, previous);
    }
    this.minted.set(user, previous - amount);
    this.journal.record(() => this.minted.set(user, previous), {
      type: "LedgerChanged",
      ledger: "debt",
      user,
      amount,
      direction: "debit",
    });
  }
}
