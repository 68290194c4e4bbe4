/**
 * Thrown by the beacon, chip and lifecycle checks.
 *
 * Every failed check aborts the whole operation; nothing is written.
 * `code` is the machine-readable classification the service maps to HTTP.
 */

export type ProtocolErrorCode =
  | "INVALID_SIGNATURE"
  | "SIGNATURE_EXPIRED"
  | "INVALID_ROUND"
  | "ARTIFACT_DOES_NOT_EXIST"
  | "UNKNOWN_ARTIFACT"
  | "ARTIFACT_ALREADY_MINTED"
  | "TRANSFER_NOT_ALLOWED"
  | "DUPLICATE_ENTRY"
  | "MISSING_ENTRY"
  | "ENTRY_TYPE_MISMATCH"
  | "TOKEN_NOT_FOUND"
  | "NOT_TOKEN_OWNER"
  | "ATTRIBUTE_LENGTH_MISMATCH"
  | "UNAUTHORIZED";

export class ProtocolError extends Error {
  public readonly code: ProtocolErrorCode;

  constructor(code: ProtocolErrorCode, message: string) {
    super(message);
    this.name = "ProtocolError";
    this.code = code;
  }
}

export function isProtocolError(value: unknown): value is ProtocolError {
  return value instanceof ProtocolError;
}
