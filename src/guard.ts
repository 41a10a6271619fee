/**
 * Collateral Engine - Reentrancy Guard
 *
 * One guard per engine. Every mutating entry point runs inside it; a nested
 * mutating call (e.g. from a custody or token callback) is rejected.
 * Read-only queries never touch the guard.
 */

import { ReentrantCallError } from "./errors";

export class NonReentrantGuard {
  private entered = false;

  get locked(): boolean {
    return this.entered;
  }

  run<T>(operation: string, fn: () => T): T {
    if (this.entered) {
      throw new ReentrantCallError(operation);
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
