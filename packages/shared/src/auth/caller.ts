import { type Address, isAddress, normalizeAddress } from "../address.js";

export const CALLER_ADDRESS_HEADER = "x-caller-address";

export function parseCallerAddressHeader(value: unknown): Address | null {
  const raw = Array.isArray(value) ? value.find((item) => typeof item === "string") : value;
  if (typeof raw !== "string") return null;
  const trimmed = raw.trim();
  return isAddress(trimmed) ? normalizeAddress(trimmed) : null;
}
