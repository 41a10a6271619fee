export { CollateralEngine } from "./engine";
export type { EngineSession } from "./engine";
export * from "./calculator";
export * from "./config";
export * from "./errors";
export { EngineEventBus, describeEvent } from "./events";
export { NonReentrantGuard } from "./guard";
export { CollateralLedger, DebtLedger } from "./ledger";
export { LiquidationEngine } from "./liquidation-engine";
export { createComponentLogger } from "./logger";
export * as metrics from "./metrics";
export { PriceOracleAdapter, isStale } from "./oracle";
export { PositionManager } from "./position-manager";
export { CollateralRegistry } from "./registry";
export { SolvencyCalculator } from "./solvency";
export * from "./types";
export { Transactor, UnitOfWork } from "./unit-of-work";
export type { ExternalEffect, LedgerJournal } from "./unit-of-work";
