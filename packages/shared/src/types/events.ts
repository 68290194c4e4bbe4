export type TokenEventType =
  | "ARCHIVE_ENTRY_ADDED"
  | "MINTED"
  | "TRANSFERRED"
  | "REBOUND";

export interface TokenEventBase {
  type: TokenEventType;
  occurredAt: string;   // ISO date
  round?: number;       // beacon round the operation was signed against
}

export interface ArchiveEntryAddedEvent extends TokenEventBase {
  type: "ARCHIVE_ENTRY_ADDED";
  chipPublicKey: string;
}

export interface MintedEvent extends TokenEventBase {
  type: "MINTED";
  tokenId: string;
  owner: string;
  chipPublicKey: string;
}

export interface TransferredEvent extends TokenEventBase {
  type: "TRANSFERRED";
  tokenId: string;
  from: string;
  to: string;
}

export interface ReboundEvent extends TokenEventBase {
  type: "REBOUND";
  tokenId: string;
  previousChipPublicKey: string;
  chipPublicKey: string;
}

export type TokenEvent = ArchiveEntryAddedEvent | MintedEvent | TransferredEvent | ReboundEvent;
export type TokenScopedEvent = MintedEvent | TransferredEvent | ReboundEvent;
