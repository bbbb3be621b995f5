import { ethers } from "ethers";

/**
 * Returns the checksummed form of a non-zero EVM address, or undefined when
 * the input is not one.
 */
export function normalizeAddress(value: string | undefined | null): string | undefined {
  if (!value || !ethers.isAddress(value)) {
    return undefined;
  }
  const checksummed = ethers.getAddress(value);
  return checksummed === ethers.ZeroAddress ? undefined : checksummed;
}

export function sameAddress(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
