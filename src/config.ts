/**
 * Collateral Engine - Configuration
 *
 * Construction-time configuration for the engine. Reads from environment
 * variables (or a dotenv file) with sensible defaults.
 */

import * as fs from "fs";
import * as dotenv from "dotenv";
import { ethers } from "ethers";
import {
  ConfigurationMismatchError,
  InvalidAddressError,
  InvalidConfigError,
} from "./errors";

/** Oracle answers older than this are rejected (3 hours) */
export const ORACLE_TIMEOUT_SECONDS = 3 * 60 * 60;

export interface EngineConfig {
  /** Allow-listed collateral assets, index-aligned with priceFeeds */
  collateralTokens: string[];
  /** USD price feed for each collateral asset */
  priceFeeds: string[];
  /** Address of the debt token the engine mints and burns */
  debtToken: string;
  /** Address the engine holds custody under */
  engineAddress: string;
  /** Max seconds before a price answer is considered stale */
  oracleTimeoutSeconds: number;
  /** winston log level */
  logLevel: string;
  /** Environment: production | staging | development | test */
  environment: string;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  collateralTokens: [],
  priceFeeds: [],
  debtToken: "",
  engineAddress: "",
  oracleTimeoutSeconds: ORACLE_TIMEOUT_SECONDS,
  logLevel: process.env.LOG_LEVEL || "info",
  environment: process.env.NODE_ENV || "development",
};

/** Split a comma-separated address list, dropping blanks */
export function parseAddressList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/**
 * Build an EngineConfig from environment variables:
 *   COLLATERAL_TOKENS, PRICE_FEEDS, DEBT_TOKEN_ADDRESS, ENGINE_ADDRESS,
 *   ORACLE_TIMEOUT_SECONDS, LOG_LEVEL, NODE_ENV
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const config: EngineConfig = {
    collateralTokens: parseAddressList(env.COLLATERAL_TOKENS),
    priceFeeds: parseAddressList(env.PRICE_FEEDS),
    debtToken: env.DEBT_TOKEN_ADDRESS || DEFAULT_ENGINE_CONFIG.debtToken,
    engineAddress: env.ENGINE_ADDRESS || DEFAULT_ENGINE_CONFIG.engineAddress,
    oracleTimeoutSeconds: env.ORACLE_TIMEOUT_SECONDS
      ? parseInt(env.ORACLE_TIMEOUT_SECONDS, 10)
      : ORACLE_TIMEOUT_SECONDS,
    logLevel: env.LOG_LEVEL || "info",
    environment: env.NODE_ENV || "development",
  };
  validateConfig(config);
  return config;
}

/**
 * Load configuration from a dotenv file without touching process.env.
 */
export function loadConfigFromFile(envFile: string): EngineConfig {
  const parsed = dotenv.parse(fs.readFileSync(envFile, "utf-8"));
  return loadConfigFromEnv(parsed);
}

/**
 * Validate that required configuration is present and consistent.
 * Throws an EngineError describing the first problem found.
 */
export function validateConfig(config: EngineConfig): void {
  if (config.collateralTokens.length !== config.priceFeeds.length) {
    throw new ConfigurationMismatchError(config.collateralTokens.length, config.priceFeeds.length);
  }
  if (config.collateralTokens.length === 0) {
    throw new InvalidConfigError("at least one collateral token is required");
  }
  config.collateralTokens.forEach((token, i) => {
    if (!ethers.isAddress(token)) throw new InvalidAddressError(`collateralTokens[${i}]`, token);
  });
  config.priceFeeds.forEach((feed, i) => {
    if (!ethers.isAddress(feed)) throw new InvalidAddressError(`priceFeeds[${i}]`, feed);
  });
  if (!ethers.isAddress(config.debtToken)) {
    throw new InvalidAddressError("debtToken", config.debtToken);
  }
  if (!ethers.isAddress(config.engineAddress)) {
    throw new InvalidAddressError("engineAddress", config.engineAddress);
  }
  if (!Number.isInteger(config.oracleTimeoutSeconds) || config.oracleTimeoutSeconds <= 0) {
    throw new InvalidConfigError("ORACLE_TIMEOUT_SECONDS must be a positive integer");
  }
}
