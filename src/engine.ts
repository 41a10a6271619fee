/**
 * Collateral Engine
 *
 * Overcollateralized stablecoin issuance: users lock allow-listed collateral
 * and mint a dollar-pegged debt token against it; positions whose health
 * factor drops below 1.0 can be liquidated by third parties for a bonus.
 *
 * Usage:
 *   const engine = new CollateralEngine(config, { priceFeed, custody, debtToken });
 *   engine.connect(alice).depositCollateralAndMint(weth, 10n ** 19n, 5_000n * 10n ** 18n);
 *   engine.connect(bob).liquidate(alice, weth, 1_000n * 10n ** 18n);
 */

import { ethers } from "ethers";
import {
  ADDITIONAL_FEED_PRECISION,
  calculateHealthFactor,
  LIQUIDATION_BONUS,
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "./calculator";
import { EngineConfig, validateConfig } from "./config";
import { isEngineError } from "./errors";
import { describeEvent, EngineEventBus } from "./events";
import { NonReentrantGuard } from "./guard";
import { CollateralLedger, DebtLedger } from "./ledger";
import { LiquidationEngine } from "./liquidation-engine";
import { createComponentLogger, Logger } from "./logger";
import {
  collateralSeizedTotal,
  errorsTotal,
  liquidationsTotal,
  operationDuration,
  operationsTotal,
} from "./metrics";
import { PriceOracleAdapter } from "./oracle";
import { PositionManager } from "./position-manager";
import { CollateralRegistry } from "./registry";
import { SolvencyCalculator } from "./solvency";
import type {
  AccountInformation,
  EngineCapabilities,
  EngineEvent,
  EngineEventOf,
  EngineEventType,
  EngineOperation,
  LiquidationPreview,
  LiquidationResult,
} from "./types";
import { Transactor } from "./unit-of-work";
import { normalizeAddress } from "./utils";

/** Mutating operations, bound to the account passed to connect() */
export interface EngineSession {
  readonly account: string;
  depositCollateral(asset: string, amountCollateral: bigint): void;
  mintDebt(amountToMint: bigint): void;
  depositCollateralAndMint(asset: string, amountCollateral: bigint, amountToMint: bigint): void;
  redeemCollateral(asset: string, amountCollateral: bigint): void;
  burnDebt(amountToBurn: bigint): void;
  redeemAndBurn(asset: string, amountCollateral: bigint, amountToBurn: bigint): void;
  liquidate(user: string, asset: string, debtToCover: bigint): LiquidationResult;
}

export class CollateralEngine {
  readonly engineAddress: string;
  readonly debtTokenAddress: string;

  private readonly logger: Logger;
  private readonly bus: EngineEventBus;
  private readonly guard = new NonReentrantGuard();
  private readonly registry: CollateralRegistry;
  private readonly collateral: CollateralLedger;
  private readonly debt: DebtLedger;
  private readonly solvency: SolvencyCalculator;
  private readonly positions: PositionManager;
  private readonly liquidations: LiquidationEngine;

  constructor(config: EngineConfig, capabilities: EngineCapabilities) {
    validateConfig(config);
    this.logger = createComponentLogger("ENGINE", config.logLevel);
    this.bus = new EngineEventBus(this.logger);
    this.registry = new CollateralRegistry(config.collateralTokens, config.priceFeeds);
    this.engineAddress = ethers.getAddress(config.engineAddress);
    this.debtTokenAddress = ethers.getAddress(config.debtToken);

    const transactor = new Transactor(this.bus, this.logger);
    const oracle = new PriceOracleAdapter(capabilities.priceFeed, {
      timeoutSeconds: config.oracleTimeoutSeconds,
      ...(capabilities.now ? { now: capabilities.now } : {}),
    });
    this.collateral = new CollateralLedger(transactor);
    this.debt = new DebtLedger(transactor);
    this.solvency = new SolvencyCalculator(this.registry, this.collateral, this.debt, oracle);
    this.positions = new PositionManager({
      registry: this.registry,
      collateral: this.collateral,
      debt: this.debt,
      solvency: this.solvency,
      custody: capabilities.custody,
      debtToken: capabilities.debtToken,
      transactor,
      engineAddress: this.engineAddress,
    });
    this.liquidations = new LiquidationEngine({
      registry: this.registry,
      solvency: this.solvency,
      positions: this.positions,
      transactor,
    });

    this.bus.onAny((event) => {
      if (event.type === "LedgerChanged") {
        this.logger.debug(describeEvent(event));
      } else {
        this.logger.info(describeEvent(event));
      }
    });
    this.logger.info(
      `Initialised with ${this.registry.pairs.length} collateral token(s), ` +
      `oracle timeout ${config.oracleTimeoutSeconds}s`
    );
  }

  // ============================================================
  //                     MUTATING OPERATIONS
  // ============================================================

  connect(account: string): EngineSession {
    const caller = normalizeAddress(account, "account");
    return {
      account: caller,
      depositCollateral: (asset, amountCollateral) =>
        this.execute("depositCollateral", () =>
          this.positions.depositCollateral(caller, asset, amountCollateral)),
      mintDebt: (amountToMint) =>
        this.execute("mintDebt", () => this.positions.mintDebt(caller, amountToMint)),
      depositCollateralAndMint: (asset, amountCollateral, amountToMint) =>
        this.execute("depositCollateralAndMint", () =>
          this.positions.depositCollateralAndMint(caller, asset, amountCollateral, amountToMint)),
      redeemCollateral: (asset, amountCollateral) =>
        this.execute("redeemCollateral", () =>
          this.positions.redeemCollateral(caller, asset, amountCollateral)),
      burnDebt: (amountToBurn) =>
        this.execute("burnDebt", () => this.positions.burnDebt(caller, amountToBurn)),
      redeemAndBurn: (asset, amountCollateral, amountToBurn) =>
        this.execute("redeemAndBurn", () =>
          this.positions.redeemAndBurn(caller, asset, amountCollateral, amountToBurn)),
      liquidate: (user, asset, debtToCover) =>
        this.execute("liquidate", () => {
          const result = this.liquidations.liquidate(caller, normalizeAddress(user, "user"), asset, debtToCover);
          liquidationsTotal.inc();
          collateralSeizedTotal.inc({ asset: result.asset }, Number(ethers.formatEther(result.collateralSeized)));
          return result;
        }),
    };
  }

  on<T extends EngineEventType>(type: T, listener: (event: EngineEventOf<T>) => void): () => void {
    return this.bus.on(type, listener);
  }

  onAny(listener: (event: EngineEvent) => void): () => void {
    return this.bus.onAny(listener);
  }

  /** Events committed by fn reach listeners only after the guard is released */
  private execute<T>(operation: EngineOperation, fn: () => T): T {
    const endTimer = operationDuration.startTimer({ operation });
    try {
      const result = this.bus.deferWhile(() => this.guard.run(operation, fn));
      operationsTotal.inc({ operation, status: "success" });
      return result;
    } catch (err) {
      operationsTotal.inc({ operation, status: "failure" });
      if (isEngineError(err)) {
        errorsTotal.inc({ kind: err.kind });
        this.logger.warn(`${operation} failed: ${err.message}`);
      } else {
        this.logger.error(`${operation} failed unexpectedly: ${err instanceof Error ? err.message : String(err)}`);
      }
      throw err;
    } finally {
      endTimer();
    }
  }

  // ============================================================
  //                     READ-ONLY QUERIES
  // ============================================================

  getAccountInformation(user: string): AccountInformation {
    return this.solvency.accountInformation(normalizeAddress(user, "user"));
  }

  getAccountCollateralValue(user: string): bigint {
    return this.solvency.totalCollateralUsd(normalizeAddress(user, "user"));
  }

  getHealthFactor(user: string): bigint {
    return this.solvency.healthFactor(normalizeAddress(user, "user"));
  }

  getMaxMintable(user: string): bigint {
    return this.solvency.maxMintableUsd(normalizeAddress(user, "user"));
  }

  getCollateralBalanceOfUser(user: string, asset: string): bigint {
    return this.collateral.balanceOf(normalizeAddress(user, "user"), this.registry.requireAllowed(asset));
  }

  getDebtBalanceOfUser(user: string): bigint {
    return this.debt.balanceOf(normalizeAddress(user, "user"));
  }

  getUsdValue(asset: string, amount: bigint): bigint {
    return this.solvency.usdValue(this.registry.requireAllowed(asset), amount);
  }

  getTokenAmountFromUsd(asset: string, usdAmount: bigint): bigint {
    return this.solvency.usdToAssetAmount(this.registry.requireAllowed(asset), usdAmount);
  }

  calculateHealthFactor(totalDebtMinted: bigint, collateralValueInUsd: bigint): bigint {
    return calculateHealthFactor(totalDebtMinted, collateralValueInUsd);
  }

  previewLiquidation(user: string, asset: string, debtToCover: bigint): LiquidationPreview {
    return this.liquidations.preview(normalizeAddress(user, "user"), asset, debtToCover);
  }

  getCollateralTokens(): string[] {
    return this.registry.assets;
  }

  getCollateralTokenPriceFeed(asset: string): string {
    return this.registry.priceFeedOf(asset);
  }

  getDebtToken(): string {
    return this.debtTokenAddress;
  }

  getPrecision(): bigint {
    return PRECISION;
  }

  getAdditionalFeedPrecision(): bigint {
    return ADDITIONAL_FEED_PRECISION;
  }

  getLiquidationThreshold(): bigint {
    return LIQUIDATION_THRESHOLD;
  }

  getLiquidationBonus(): bigint {
    return LIQUIDATION_BONUS;
  }

  getLiquidationPrecision(): bigint {
    return LIQUIDATION_PRECISION;
  }

  getMinHealthFactor(): bigint {
    return MIN_HEALTH_FACTOR;
  }
}
