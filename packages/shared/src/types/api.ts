import type { ArchiveEntry, AttestedToken, TokenMetadata } from "./token.js";
import type { TokenScopedEvent } from "./events.js";

/** Hex-encoded signature bundle as it travels over HTTP. */
export interface SignatureBundleJson {
  chipSignature: string;
  beaconSignature: string;
  previousBeaconSignature: string;
  round: number;
}

export interface AddArchiveEntriesRequest {
  chipPublicKeys: string[];
}

export interface AddArchiveEntriesResponse {
  entries: ArchiveEntry[];
}

export interface ListArchiveResponse {
  entries: ArchiveEntry[];
}

export interface GetArchiveEntryResponse {
  entry: ArchiveEntry;
}

export interface MintTokenRequest extends SignatureBundleJson {
  chipPublicKey: string;
  metadata: TokenMetadata;
}

export interface TransferTokenRequest extends SignatureBundleJson {
  receiver: string;
}

export interface RebindTokenRequest extends SignatureBundleJson {
  newChipPublicKey: string;
}

export interface TokenResponse {
  token: AttestedToken;
}

export interface ListTokensResponse {
  tokens: AttestedToken[];
}

export interface GetTimelineResponse {
  tokenId: string;
  events: TokenScopedEvent[];
}

export interface VerifyTokenRequest {
  tokenId?: string;
  token?: AttestedToken;
}

export interface VerifyTokenResponse {
  tokenId: string;
  valid: boolean;
  hashMatches: boolean;
  signatureValid: boolean;
  attestorMatches: boolean;
  current: boolean;
}

export interface BeaconRoundResponse {
  round: number;
  roundTimeMs: number;
  ttlMs: number;
}
