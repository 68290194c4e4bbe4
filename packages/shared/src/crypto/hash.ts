import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex, utf8ToBytes } from "@noble/hashes/utils";

export function sha256Hex(input: string): string {
  const bytes = utf8ToBytes(input);
  return bytesToHex(sha256(bytes));
}

export function sha256Bytes(...parts: Uint8Array[]): Uint8Array {
  const hash = sha256.create();
  for (const part of parts) hash.update(part);
  return hash.digest();
}

export function isHex(value: unknown, byteLength?: number): value is string {
  if (typeof value !== "string") return false;
  if (value.length === 0 || value.length % 2 !== 0) return false;
  if (!/^[0-9a-fA-F]+$/.test(value)) return false;
  return byteLength === undefined || value.length === byteLength * 2;
}
