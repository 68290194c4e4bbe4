import { hexToBytes } from "@noble/hashes/utils";

export const ADDRESS_BYTES = 32;

const ADDRESS_PATTERN = /^0x[0-9a-fA-F]{64}$/;

export type Address = string;

export function isAddress(value: unknown): value is Address {
  return typeof value === "string" && ADDRESS_PATTERN.test(value);
}

export function normalizeAddress(value: string): Address {
  return value.toLowerCase();
}

export function addressToBytes(address: Address): Uint8Array {
  if (!isAddress(address)) {
    throw new Error(`Expected 0x-prefixed ${ADDRESS_BYTES}-byte address, got '${address}'`);
  }
  return hexToBytes(address.slice(2));
}
