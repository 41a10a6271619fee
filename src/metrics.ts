/**
 * Collateral Engine - Prometheus Metrics
 *
 * Metrics naming convention:  collateral_engine_<metric>_<unit>
 */

import { Registry, Counter, Histogram } from "prom-client";

// ============================================================
//  REGISTRY
// ============================================================

/** Registry shared by every engine instance in this process. */
export const register: Registry = new Registry();

// ============================================================
//  COUNTERS
// ============================================================

/** Mutating engine calls by outcome. */
export const operationsTotal = new Counter({
  name: "collateral_engine_operations_total",
  help: "Total mutating engine operations",
  labelNames: ["operation", "status"] as const, // status: success | failure
  registers: [register],
});

/** Failures by error kind (StalePrice, NotLiquidatable, ...). */
export const errorsTotal = new Counter({
  name: "collateral_engine_errors_total",
  help: "Total engine failures by error kind",
  labelNames: ["kind"] as const,
  registers: [register],
});

export const liquidationsTotal = new Counter({
  name: "collateral_engine_liquidations_total",
  help: "Total successful liquidations",
  registers: [register],
});

/** Collateral units (whole tokens) paid out to liquidators, bonus included. */
export const collateralSeizedTotal = new Counter({
  name: "collateral_engine_collateral_seized_total",
  help: "Total collateral seized by liquidators, in whole token units",
  labelNames: ["asset"] as const,
  registers: [register],
});

// ============================================================
//  HISTOGRAMS
// ============================================================

export const operationDuration = new Histogram({
  name: "collateral_engine_operation_duration_seconds",
  help: "Duration of mutating engine operations",
  labelNames: ["operation"] as const,
  buckets: [0.0005, 0.001, 0.005, 0.01, 0.05, 0.1],
  registers: [register],
});
