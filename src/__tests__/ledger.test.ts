/**
 * Ledger Tests
 * Collateral and debt bookkeeping, journaling and rollback
 */

import { isEngineError } from "../errors";
import { CollateralLedger, DebtLedger } from "../ledger";
import type { LedgerChangedEvent } from "../types";
import type { LedgerJournal } from "../unit-of-work";
import { address, catchError } from "./helpers/mocks";

class RecordingJournal implements LedgerJournal {
  readonly undos: Array<() => void> = [];
  readonly events: LedgerChangedEvent[] = [];

  record(undo: () => void, event: LedgerChangedEvent): void {
    this.undos.push(undo);
    this.events.push(event);
  }

  rollback(): void {
    for (let i = this.undos.length - 1; i >= 0; i--) {
      this.undos[i]();
    }
  }
}

const ALICE = address(0x1);
const BOB = address(0x2);
const TOKEN = address(0xa1);

describe("CollateralLedger", () => {
  let journal: RecordingJournal;
  let ledger: CollateralLedger;

  beforeEach(() => {
    journal = new RecordingJournal();
    ledger = new CollateralLedger(journal);
  });

  it("should start every balance at zero", () => {
    expect(ledger.balanceOf(ALICE, TOKEN)).toBe(0n);
  });

  it("should credit and debit per user and asset", () => {
    ledger.credit(ALICE, TOKEN, 100n);
    ledger.credit(BOB, TOKEN, 7n);
    ledger.debit(ALICE, TOKEN, 40n);

    expect(ledger.balanceOf(ALICE, TOKEN)).toBe(60n);
    expect(ledger.balanceOf(BOB, TOKEN)).toBe(7n);
  });

  it("should reject a debit larger than the balance", () => {
    ledger.credit(ALICE, TOKEN, 10n);

    const err = catchError(() => ledger.debit(ALICE, TOKEN, 11n));

    expect(isEngineError(err, "InsufficientBalance")).toBe(true);
    if (isEngineError(err, "InsufficientBalance")) {
      expect(err.ledger).toBe("collateral");
      expect(err.requested).toBe(11n);
      expect(err.available).toBe(10n);
    }
    expect(ledger.balanceOf(ALICE, TOKEN)).toBe(10n);
  });

  it("should reject zero amounts", () => {
    const err = catchError(() => ledger.credit(ALICE, TOKEN, 0n));
    expect(isEngineError(err, "InvalidAmount")).toBe(true);
    expect(journal.events).toHaveLength(0);
  });

  it("should journal each mutation", () => {
    ledger.credit(ALICE, TOKEN, 5n);
    ledger.debit(ALICE, TOKEN, 2n);

    expect(journal.events).toEqual([
      { type: "LedgerChanged", ledger: "collateral", user: ALICE, asset: TOKEN, amount: 5n, direction: "credit" },
      { type: "LedgerChanged", ledger: "collateral", user: ALICE, asset: TOKEN, amount: 2n, direction: "debit" },
    ]);
  });

  it("should restore previous balances when undone in reverse", () => {
    ledger.credit(ALICE, TOKEN, 5n);
    ledger.debit(ALICE, TOKEN, 2n);
    ledger.credit(BOB, TOKEN, 9n);

    journal.rollback();

    expect(ledger.balanceOf(ALICE, TOKEN)).toBe(0n);
    expect(ledger.balanceOf(BOB, TOKEN)).toBe(0n);
  });
});

describe("DebtLedger", () => {
  let journal: RecordingJournal;
  let ledger: DebtLedger;

  beforeEach(() => {
    journal = new RecordingJournal();
    ledger = new DebtLedger(journal);
  });

  it("should track minted debt per user", () => {
    ledger.creditDebt(ALICE, 100n);
    ledger.debitDebt(ALICE, 30n);

    expect(ledger.balanceOf(ALICE)).toBe(70n);
    expect(ledger.balanceOf(BOB)).toBe(0n);
  });

  it("should reject burning more than was minted", () => {
    ledger.creditDebt(ALICE, 1n);

    const err = catchError(() => ledger.debitDebt(ALICE, 2n));

    expect(isEngineError(err, "InsufficientBalance")).toBe(true);
    if (isEngineError(err, "InsufficientBalance")) {
      expect(err.ledger).toBe("debt");
      expect(err.user).toBe(ALICE);
    }
  });

  it("should journal debt entries without an asset", () => {
    ledger.creditDebt(ALICE, 3n);
    expect(journal.events[0]).toEqual({
      type: "LedgerChanged",
      ledger: "debt",
      user: ALICE,
      amount: 3n,
      direction: "credit",
    });
  });

  it("should roll back to the previous value", () => {
    ledger.creditDebt(ALICE, 3n);
    ledger.creditDebt(ALICE, 4n);
    journal.rollback();
    expect(ledger.balanceOf(ALICE)).toBe(0n);
  });
});
