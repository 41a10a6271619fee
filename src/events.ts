/**
 * Collateral Engine - Event Bus
 *
 * Typed wrapper over EventEmitter. Events are only emitted once the unit of
 * work that produced them has committed, and the engine defers delivery
 * until its reentrancy guard is released. Listener failures are logged and
 * never surface to the operation that produced the event.
 */

import { EventEmitter } from "events";
import { ethers } from "ethers";
import { formatHealthFactor } from "./calculator";
import type { Logger } from "./logger";
import type { EngineEvent, EngineEventOf, EngineEventType } from "./types";

const ANY_EVENT = "*";

export class EngineEventBus {
  private readonly emitter = new EventEmitter();
  private readonly deferred: EngineEvent[] = [];
  private deferDepth = 0;

  constructor(private readonly logger: Logger) {}

  /** Subscribe to one event type. Returns an unsubscribe function. */
  on<T extends EngineEventType>(type: T, listener: (event: EngineEventOf<T>) => void): () => void {
    const isolated = this.isolate(type, listener);
    this.emitter.on(type, isolated);
    return () => {
      this.emitter.off(type, isolated);
    };
  }

  onAny(listener: (event: EngineEvent) => void): () => void {
    const isolated = this.isolate(ANY_EVENT, listener);
    this.emitter.on(ANY_EVENT, isolated);
    return () => {
      this.emitter.off(ANY_EVENT, isolated);
    };
  }

  emit(event: EngineEvent): void {
    if (this.deferDepth > 0) {
      this.deferred.push(event);
      return;
    }
    this.emitter.emit(event.type, event);
    this.emitter.emit(ANY_EVENT, event);
  }

  /**
   * Hold every event emitted while fn runs and deliver them once the
   * outermost call returns or throws.
   */
  deferWhile<T>(fn: () => T): T {
    this.deferDepth++;
    try {
      return fn();
    } finally {
      this.deferDepth--;
      if (this.deferDepth === 0) {
        this.flush();
      }
    }
  }

  private flush(): void {
    let event = this.deferred.shift();
    while (event) {
      this.emit(event);
      event = this.deferred.shift();
    }
  }

  /** A throwing listener is logged and skipped; it never reaches the emitter */
  private isolate<E extends EngineEvent>(channel: string, listener: (event: E) => void): (event: E) => void {
    return (event) => {
      try {
        listener(event);
      } catch (err) {
        this.logger.error(
          `Listener for ${channel} threw on ${event.type}: ${err instanceof Error ? err.message : String(err)}`
        );
      }
    };
  }
}

export function describeEvent(event: EngineEvent): string {
  switch (event.type) {
    case "LedgerChanged":
      return `${event.ledger} ${event.direction} ${ethers.formatEther(event.amount)}` +
        `${event.asset ? ` of ${event.asset}` : ""} for ${event.user}`;
    case "CollateralDeposited":
      return `Deposited ${ethers.formatEther(event.amount)} of ${event.asset} for ${event.user}`;
    case "CollateralRedeemed":
      return `Redeemed ${ethers.formatEther(event.amount)} of ${event.asset} from ${event.redeemedFrom} to ${event.redeemedTo}`;
    case "DebtMinted":
      return `Minted ${ethers.formatEther(event.amount)} debt for ${event.user}`;
    case "DebtBurned":
      return `Burned ${ethers.formatEther(event.amount)} debt from ${event.burnFrom} on behalf of ${event.onBehalfOf}`;
    case "Liquidated":
      return `Liquidated ${event.user} by ${event.liquidator}: covered ${ethers.formatEther(event.debtCovered)} debt, ` +
        `seized ${ethers.formatEther(event.collateralSeized)} of ${event.asset} ` +
        `(HF ${formatHealthFactor(event.startingHealthFactor)} -> ${formatHealthFactor(event.endingHealthFactor)})`;
  }
}
