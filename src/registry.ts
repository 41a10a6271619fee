/**
 * Collateral Engine - Asset Registry
 *
 * Immutable, index-stable allow-list of collateral assets and their price
 * feeds. Built once at construction; valuation iterates it in order.
 */

import { ethers } from "ethers";
import {
  AssetNotAllowedError,
  ConfigurationMismatchError,
  InvalidConfigError,
} from "./errors";
import type { CollateralPair } from "./types";
import { normalizeAddress } from "./utils";

export class CollateralRegistry {
  readonly pairs: readonly CollateralPair[];
  private readonly feedByAsset: ReadonlyMap<string, string>;

  constructor(collateralTokens: readonly string[], priceFeeds: readonly string[]) {
    if (collateralTokens.length !== priceFeeds.length) {
      throw new ConfigurationMismatchError(collateralTokens.length, priceFeeds.length);
    }

    const pairs: CollateralPair[] = [];
    const feedByAsset = new Map<string, string>();
    collateralTokens.forEach((token, i) => {
      const asset = normalizeAddress(token, `collateralTokens[${i}]`);
      const priceFeed = normalizeAddress(priceFeeds[i], `priceFeeds[${i}]`);
      if (feedByAsset.has(asset)) {
        throw new InvalidConfigError(`collateral token ${asset} is listed twice`);
      }
      feedByAsset.set(asset, priceFeed);
      pairs.push({ asset, priceFeed });
    });

    this.pairs = Object.freeze(pairs);
    this.feedByAsset = feedByAsset;
  }

  get assets(): string[] {
    return this.pairs.map((pair) => pair.asset);
  }

  isAllowed(asset: string): boolean {
    return ethers.isAddress(asset) && this.feedByAsset.has(ethers.getAddress(asset));
  }

  /**
   * Resolve an asset to its registered checksum form.
   * Throws AssetNotAllowedError for anything not on the allow-list.
   */
  requireAllowed(asset: string): string {
    if (!this.isAllowed(asset)) {
      throw new AssetNotAllowedError(asset);
    }
    return ethers.getAddress(asset);
  }

  priceFeedOf(asset: string): string {
    const feed = ethers.isAddress(asset) ? this.feedByAsset.get(ethers.getAddress(asset)) : undefined;
    if (feed === undefined) {
      throw new AssetNotAllowedError(asset);
    }
    return feed;
  }
}
