/**
 * Ethereum address validation
 */

import type { Address } from "viem";

import { InvalidAddressError } from "../../utils/errors";

/** 0x prefix followed by 40 lower-case hex characters */
const ADDRESS_PATTERN = /^0x[0-9a-f]{40}$/;

/**
 * Validate and canonicalize a wallet address.
 *
 * Surrounding whitespace is trimmed and the result is lower-cased, so any
 * checksum casing is accepted.
 *
 * @throws InvalidAddressError when the input is not a string or not 0x + 40 hex
 */
export function validateAddress(input: unknown): Address {
  if (typeof input !== "string") {
    throw new InvalidAddressError(input);
  }

  const address = input.trim().toLowerCase();
  if (!ADDRESS_PATTERN.test(address)) {
    throw new InvalidAddressError(input);
  }

  return `0x${address.slice(2)}`;
}

/**
 * Non-throwing variant of validateAddress
 */
export function isValidAddress(input: unknown): boolean {
  try {
    validateAddress(input);
    return true;
  } catch {
    return false;
  }
}

/**
 * Shorten an address for display (0x1234...abcd)
 */
export function truncateAddress(address: string): string {
  if (address.length <= 12) {
    return address;
  }
  return `${address.slice(0, 6)}...${address.slice(-4)}`;
}
