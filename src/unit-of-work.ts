/**
 * Collateral Engine - Unit of Work
 *
 * Each mutating engine call is all-or-nothing:
 *   1. Ledger mutations are applied immediately and journaled with an undo step
 *   2. External effects (custody transfers, token mint/transferFrom/burn) are
 *      queued and run in order once every ledger mutation and solvency check
 *      has passed; effects that cannot be compensated run after all others
 *   3. If anything throws or an effect reports failure, effects already run
 *      are compensated in reverse order and the ledger journal is rolled back
 *   4. Events are emitted only after the unit has committed
 */

import type { EngineError } from "./errors";
import type { EngineEventBus } from "./events";
import type { Logger } from "./logger";
import type { EngineEvent, LedgerChangedEvent } from "./types";

export interface ExternalEffect {
  label: string;
  /** Returns false when the collaborator reports failure */
  apply(): boolean;
  /** Reverses a successfully applied effect; returns false if that failed too */
  compensate?: () => boolean;
  /** Error to raise when apply() returns false */
  failure(): EngineError;
  /** Cannot be compensated (e.g. a burn); runs after every reversible effect */
  irreversible?: boolean;
}

/** Where ledgers record their mutations */
export interface LedgerJournal {
  record(undo: () => void, event: LedgerChangedEvent): void;
}

export class UnitOfWork {
  private readonly undoLog: Array<() => void> = [];
  private readonly effects: ExternalEffect[] = [];
  private readonly events: EngineEvent[] = [];

  recordUndo(undo: () => void): void {
    this.undoLog.push(undo);
  }

  enqueue(effect: ExternalEffect): void {
    this.effects.push(effect);
  }

  publish(event: EngineEvent): void {
    this.events.push(event);
  }

  get pendingEvents(): readonly EngineEvent[] {
    return this.events;
  }

  /**
   * Run queued effects in order, irreversible ones last; compensate and throw
   * on the first failure.
   */
  applyEffects(logger: Logger): void {
    const ordered = [
      ...this.effects.filter((effect) => !effect.irreversible),
      ...this.effects.filter((effect) => effect.irreversible),
    ];
    const applied: ExternalEffect[] = [];
    for (const effect of ordered) {
      let ok = false;
      try {
        ok = effect.apply();
      } catch (err) {
        this.compensate(applied, logger);
        throw err;
      }
      if (!ok) {
        this.compensate(applied, logger);
        throw effect.failure();
      }
      applied.push(effect);
    }
  }

  rollback(): void {
    for (let i = this.undoLog.length - 1; i >= 0; i--) {
      this.undoLog[i]();
    }
    this.undoLog.length = 0;
    this.events.length = 0;
  }

  private compensate(applied: ExternalEffect[], logger: Logger): void {
    for (let i = applied.length - 1; i >= 0; i--) {
      const effect = applied[i];
      if (!effect.compensate) continue;
      let ok = false;
      try {
        ok = effect.compensate();
      } catch (err) {
        logger.error(`Compensation for ${effect.label} threw: ${err instanceof Error ? err.message : String(err)}`);
        continue;
      }
      if (!ok) {
        logger.error(`Compensation for ${effect.label} reported failure; custody and ledger may diverge`);
      }
    }
  }
}

/**
 * Owns the active unit of work. Nested run() calls join the active unit so
 * composite operations commit or abort as one.
 */
export class Transactor implements LedgerJournal {
  private active: UnitOfWork | null = null;

  constructor(private readonly bus: EngineEventBus, private readonly logger: Logger) {}

  record(undo: () => void, event: LedgerChangedEvent): void {
    if (this.active) {
      this.active.recordUndo(undo);
      this.active.publish(event);
    } else {
      this.bus.emit(event);
    }
  }

  run<T>(fn: (unit: UnitOfWork) => T): T {
    if (this.active) {
      return fn(this.active);
    }
    const unit = new UnitOfWork();
    const result = this.execute(unit, fn);
    for (const event of unit.pendingEvents) {
      this.bus.emit(event);
    }
    return result;
  }

  private execute<T>(unit: UnitOfWork, fn: (unit: UnitOfWork) => T): T {
    this.active = unit;
    try {
      const result = fn(unit);
      unit.applyEffects(this.logger);
      return result;
    } catch (err) {
      unit.rollback();
      throw err;
    } finally {
      this.active = null;
    }
  }
}
