import type { Address } from "../address.js";

export type MintStatus = "NOT_MINTED" | "MINTED";

export interface ArchiveEntry {
  chipPublicKey: string;    // hex, lowercase
  status: MintStatus;
}

export interface TokenMetadata {
  name: string;
  description: string;
  url: string;
  animationUrl: string;
  externalUrl: string;
  attributeKeys: string[];
  attributeValues: string[]; // positional pairing with attributeKeys
}

export interface ChipToken extends TokenMetadata {
  tokenId: string;
  owner: Address;
  chipPublicKey: string;    // hex of the currently bound chip key
  mintedAt: string;         // ISO date
  updatedAt: string;        // ISO date
}

/** Chip signature over a beacon round; transfer uses the key already bound to the token. */
export interface BeaconProof {
  chipSignature: Uint8Array;
  beaconSignature: Uint8Array;
  previousBeaconSignature: Uint8Array;
  round: number;
}

/** Single-use proof bundle presented with mint and rebind. Never persisted. */
export interface SignatureBundle extends BeaconProof {
  chipPublicKey: Uint8Array;
}

export interface AttestedToken {
  payload: ChipToken;
  payloadHash: string;      // sha256Hex(canonicalJson(payload))
  signature: string;        // Ed25519 signature over payloadHash (hex)
  attestor: string;         // Ed25519 public key (hex)
}
