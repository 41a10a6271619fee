/**
 * Shared input guards for engine entry points.
 */

import { ethers } from "ethers";
import { InvalidAddressError, InvalidAmountError } from "./errors";

/**
 * Normalise an address to its checksum form.
 * Throws InvalidAddressError for anything ethers cannot parse.
 */
export function normalizeAddress(value: string, field: string): string {
  if (!ethers.isAddress(value)) {
    throw new InvalidAddressError(field, value);
  }
  return ethers.getAddress(value);
}

export function requirePositive(amount: bigint, field: string): void {
  if (amount <= 0n) {
    throw new InvalidAmountError(field, amount);
  }
}
