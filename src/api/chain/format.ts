/**
 * Unit formatting for wei and token base units
 */

import { formatUnits } from "viem";

/** Decimals of the native unit */
export const ETHER_DECIMALS = 18;

/** Fraction digits kept for display */
const DISPLAY_PRECISION = 6;

/**
 * Round a base-unit amount to DISPLAY_PRECISION places, half away from zero,
 * returning it scaled to 10^DISPLAY_PRECISION
 */
function roundToDisplayUnits(amount: bigint, decimals: number): bigint {
  if (decimals <= DISPLAY_PRECISION) {
    return amount * 10n ** BigInt(DISPLAY_PRECISION - decimals);
  }
  const divisor = 10n ** BigInt(decimals - DISPLAY_PRECISION);
  const magnitude = amount < 0n ? -amount : amount;
  const rounded = (magnitude + divisor / 2n) / divisor;
  return amount < 0n ? -rounded : rounded;
}

/**
 * Convert a raw integer amount to a display string.
 *
 * "1000000" with 6 decimals becomes "1"; anything that is not an integer
 * string becomes "0". Large amounts stay in positional notation.
 */
export function formatTokenBalance(raw: string, decimals: number): string {
  let amount: bigint;
  try {
    amount = BigInt(raw.trim());
  } catch {
    return "0";
  }
  if (raw.trim() === "" || !Number.isInteger(decimals) || decimals < 0) {
    return "0";
  }

  // formatUnits already drops trailing fraction zeros
  return formatUnits(roundToDisplayUnits(amount, decimals), DISPLAY_PRECISION);
}

/**
 * Convert wei to ETH for display
 */
export function formatEther(wei: string): string {
  return formatTokenBalance(wei, ETHER_DECIMALS);
}
