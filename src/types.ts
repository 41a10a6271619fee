/**
 * Collateral Engine - External Capabilities & Engine Types
 *
 * The engine never implements token or oracle logic itself; it consumes
 * these capabilities. Amounts are 18-decimal bigints, prices 8-decimal.
 */

// ============================================================
//                     CAPABILITIES
// ============================================================

/** Chainlink-style aggregator round (only the fields the engine reads) */
export interface RoundData {
  /** 8-decimal USD price */
  answer: bigint;
  /** Unix seconds */
  updatedAt: number;
}

export interface PriceFeed {
  latestRoundData(priceFeed: string): RoundData;
}

/** Custody of collateral assets held by the engine */
export interface CollateralCustody {
  transferIn(asset: string, from: string, amount: bigint): boolean;
  transferOut(asset: string, to: string, amount: bigint): boolean;
}

/** The synthetic debt token */
export interface DebtToken {
  mint(to: string, amount: bigint): boolean;
  /** Burns from the engine's own balance */
  burn(amount: bigint): void;
  transferFrom(from: string, to: string, amount: bigint): boolean;
}

export interface EngineCapabilities {
  priceFeed: PriceFeed;
  custody: CollateralCustody;
  debtToken: DebtToken;
  /** Unix seconds; defaults to the wall clock */
  now?: () => number;
}

// ============================================================
//                     ENGINE TYPES
// ============================================================

export interface CollateralPair {
  asset: string;
  priceFeed: string;
}

export interface AccountInformation {
  totalDebtMinted: bigint;
  collateralValueInUsd: bigint;
}

export interface LiquidationPreview {
  startingHealthFactor: bigint;
  liquidatable: boolean;
  tokenAmountFromDebtCovered: bigint;
  bonusCollateral: bigint;
  totalCollateralToRedeem: bigint;
}

export interface LiquidationResult {
  user: string;
  liquidator: string;
  asset: string;
  debtCovered: bigint;
  collateralSeized: bigint;
  bonusCollateral: bigint;
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

export type EngineOperation =
  | "depositCollateral"
  | "mintDebt"
  | "depositCollateralAndMint"
  | "redeemCollateral"
  | "burnDebt"
  | "redeemAndBurn"
  | "liquidate";

// ============================================================
//                     EVENTS
// ============================================================

export interface LedgerChangedEvent {
  type: "LedgerChanged";
  ledger: "collateral" | "debt";
  user: string;
  /** Absent for debt ledger entries */
  asset?: string;
  amount: bigint;
  direction: "credit" | "debit";
}

export interface CollateralDepositedEvent {
  type: "CollateralDeposited";
  user: string;
  asset: string;
  amount: bigint;
}

export interface CollateralRedeemedEvent {
  type: "CollateralRedeemed";
  redeemedFrom: string;
  redeemedTo: string;
  asset: string;
  amount: bigint;
}

export interface DebtMintedEvent {
  type: "DebtMinted";
  user: string;
  amount: bigint;
}

export interface DebtBurnedEvent {
  type: "DebtBurned";
  burnFrom: string;
  onBehalfOf: string;
  amount: bigint;
}

export interface LiquidatedEvent extends LiquidationResult {
  type: "Liquidated";
}

export type EngineEvent =
  | LedgerChangedEvent
  | CollateralDepositedEvent
  | CollateralRedeemedEvent
  | DebtMintedEvent
  | DebtBurnedEvent
  | LiquidatedEvent;

export type EngineEventType = EngineEvent["type"];

export type EngineEventOf<T extends EngineEventType> = Extract<EngineEvent, { type: T }>;
