/**
 * Collateral Engine - Error Taxonomy
 *
 * Every failure surfaced by the engine is an EngineError carrying a
 * string-literal `kind`, so liquidators and dashboards can branch on it
 * (retry on StalePrice, abandon on NotLiquidatable, ...).
 */

import { formatHealthFactor } from "./calculator";

export type EngineErrorKind =
  | "InvalidAmount"
  | "AssetNotAllowed"
  | "ConfigurationMismatch"
  | "TransferFailed"
  | "InsufficientBalance"
  | "MintFailed"
  | "BelowMinimumHealthFactor"
  | "NotLiquidatable"
  | "HealthFactorNotImproved"
  | "StalePrice"
  | "InvalidPrice"
  | "ReentrantCall"
  | "InvalidAddress"
  | "InvalidConfig";

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidAmountError extends EngineError {
  readonly kind = "InvalidAmount" as const;

  constructor(public readonly field: string, public readonly amount: bigint) {
    super(`${field} must be greater than zero (got ${amount})`);
  }
}

export class AssetNotAllowedError extends EngineError {
  readonly kind = "AssetNotAllowed" as const;

  constructor(public readonly asset: string) {
    super(`Collateral asset ${asset} is not allowed`);
  }
}

export class ConfigurationMismatchError extends EngineError {
  readonly kind = "ConfigurationMismatch" as const;

  constructor(public readonly assetCount: number, public readonly priceFeedCount: number) {
    super(`Collateral tokens (${assetCount}) and price feeds (${priceFeedCount}) must be the same length`);
  }
}

export class TransferFailedError extends EngineError {
  readonly kind = "TransferFailed" as const;

  constructor(
    public readonly transfer: string,
    public readonly token: string,
    public readonly amount: bigint
  ) {
    super(`${transfer} of ${amount} ${token} failed`);
  }
}

export class InsufficientBalanceError extends EngineError {
  readonly kind = "InsufficientBalance" as const;

  constructor(
    public readonly ledger: "collateral" | "debt",
    public readonly user: string,
    public readonly requested: bigint,
    public readonly available: bigint
  ) {
    super(`Insufficient ${ledger} balance for ${user}: requested ${requested}, available ${available}`);
  }
}

export class MintFailedError extends EngineError {
  readonly kind = "MintFailed" as const;

  constructor(public readonly to: string, public readonly amount: bigint) {
    super(`Minting ${amount} debt tokens to ${to} failed`);
  }
}

export class BelowMinimumHealthFactorError extends EngineError {
  readonly kind = "BelowMinimumHealthFactor" as const;

  constructor(public readonly user: string, public readonly healthFactor: bigint) {
    super(`Health factor of ${user} is ${formatHealthFactor(healthFactor)}, below the minimum of 1.0`);
  }
}

export class NotLiquidatableError extends EngineError {
  readonly kind = "NotLiquidatable" as const;

  constructor(public readonly user: string, public readonly healthFactor: bigint) {
    super(`Position of ${user} is healthy (health factor ${formatHealthFactor(healthFactor)})`);
  }
}

export class HealthFactorNotImprovedError extends EngineError {
  readonly kind = "HealthFactorNotImproved" as const;

  constructor(
    public readonly user: string,
    public readonly startingHealthFactor: bigint,
    public readonly endingHealthFactor: bigint
  ) {
    super(
      `Liquidation did not improve health factor of ${user} ` +
      `(${formatHealthFactor(startingHealthFactor)} -> ${formatHealthFactor(endingHealthFactor)})`
    );
  }
}

export class StalePriceError extends EngineError {
  readonly kind = "StalePrice" as const;

  constructor(
    public readonly priceFeed: string,
    public readonly updatedAt: number,
    public readonly secondsSinceUpdate: number
  ) {
    super(`Price feed ${priceFeed} is stale: last updated ${secondsSinceUpdate}s ago`);
  }
}

export class InvalidPriceError extends EngineError {
  readonly kind = "InvalidPrice" as const;

  constructor(public readonly priceFeed: string, public readonly answer: bigint) {
    super(`Price feed ${priceFeed} returned a non-positive answer (${answer})`);
  }
}

export class ReentrantCallError extends EngineError {
  readonly kind = "ReentrantCall" as const;

  constructor(public readonly operation: string) {
    super(`Reentrant call to ${operation} while another operation is in progress`);
  }
}

export class InvalidAddressError extends EngineError {
  readonly kind = "InvalidAddress" as const;

  constructor(public readonly field: string, public readonly value: string) {
    super(`${field} is not a valid address: ${value}`);
  }
}

export class InvalidConfigError extends EngineError {
  readonly kind = "InvalidConfig" as const;

  constructor(public readonly reason: string) {
    super(`Invalid engine configuration: ${reason}`);
  }
}

export interface EngineErrorByKind {
  InvalidAmount: InvalidAmountError;
  AssetNotAllowed: AssetNotAllowedError;
  ConfigurationMismatch: ConfigurationMismatchError;
  TransferFailed: TransferFailedError;
  InsufficientBalance: InsufficientBalanceError;
  MintFailed: MintFailedError;
  BelowMinimumHealthFactor: BelowMinimumHealthFactorError;
  NotLiquidatable: NotLiquidatableError;
  HealthFactorNotImproved: HealthFactorNotImprovedError;
  StalePrice: StalePriceError;
  InvalidPrice: InvalidPriceError;
  ReentrantCall: ReentrantCallError;
  InvalidAddress: InvalidAddressError;
  InvalidConfig: InvalidConfigError;
}

export function isEngineError(err: unknown): err is EngineError;
export function isEngineError<K extends EngineErrorKind>(err: unknown, kind: K): err is EngineErrorByKind[K];
export function isEngineError(err: unknown, kind?: EngineErrorKind): boolean {
  return err instanceof EngineError && (kind === undefined || err.kind === kind);
}
