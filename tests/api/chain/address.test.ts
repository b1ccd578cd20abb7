/**
 * Tests for address validation
 */
import { describe, it, expect } from "vitest";

import { validateAddress, isValidAddress, truncateAddress } from "../../../src/api/chain/address";
import { InvalidAddressError } from "../../../src/utils/errors";

const LOWER = "0x742d35cc6634c0532925a3b844bc9e7595f8b123";
const CHECKSUMMED = "0x742d35Cc6634C0532925a3b844Bc9e7595f8B123";

describe("validateAddress", () => {
  it("should accept a lower-case address unchanged", () => {
    expect(validateAddress(LOWER)).toBe(LOWER);
  });

  it("should lower-case mixed-case input", () => {
    expect(validateAddress(CHECKSUMMED)).toBe(LOWER);
    expect(validateAddress(LOWER.toUpperCase().replace("0X", "0x"))).toBe(LOWER);
  });

  it("should accept an upper-case 0X prefix", () => {
    expect(validateAddress(`0X${LOWER.slice(2)}`)).toBe(LOWER);
  });

  it("should trim surrounding whitespace", () => {
    expect(validateAddress(`  ${LOWER}\n`)).toBe(LOWER);
  });

  it("should reject wrong length", () => {
    expect(() => validateAddress(LOWER.slice(0, 41))).toThrow(InvalidAddressError);
    expect(() => validateAddress(`${LOWER}0`)).toThrow(InvalidAddressError);
  });

  it("should reject a missing prefix", () => {
    expect(() => validateAddress(LOWER.slice(2))).toThrow(InvalidAddressError);
  });

  it("should reject non-hex characters", () => {
    expect(() => validateAddress(`0x${"g".repeat(40)}`)).toThrow(InvalidAddressError);
  });

  it("should reject non-string input and carry the input", () => {
    for (const input of [null, undefined, 42, { address: LOWER }]) {
      try {
        validateAddress(input);
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(InvalidAddressError);
        if (error instanceof InvalidAddressError) {
          expect(error.input).toBe(input);
          expect(error.code).toBe("INVALID_ADDRESS");
        }
      }
    }
  });

  it("should describe the rejected input in the message", () => {
    expect(() => validateAddress("0x123")).toThrow(
      "Invalid wallet address format: 0x123. Must be a valid 42-character Ethereum address (0x...)"
    );
  });
});

describe("isValidAddress", () => {
  it("should mirror validateAddress without throwing", () => {
    expect(isValidAddress(LOWER)).toBe(true);
    expect(isValidAddress("nope")).toBe(false);
    expect(isValidAddress(7)).toBe(false);
  });
});

describe("truncateAddress", () => {
  it("should keep the prefix and last four characters", () => {
    expect(truncateAddress(LOWER)).toBe("0x742d...b123");
  });
});
