import { randomUUID } from "node:crypto";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import {
  type Address,
  type BeaconProof,
  type BeaconSchedule,
  type ChipToken,
  DRAND_MAINNET_PUBLIC_KEY,
  DRAND_MAINNET_SCHEDULE,
  ProtocolError,
  type SignatureBundle,
  TTL_MS,
  type TokenMetadata,
  addressToBytes,
  normalizeAddress,
  isWithinTtl,
  verifyBeaconSignature,
  verifyChipSignature,
} from "@chipmint/shared";
import type { RegistryStore } from "./storage/registry-store.js";

const issuedTo = new WeakMap<AdminCapability, TokenLifecycle>();

/**
 * Possession-based admin authority. Only the instance returned by
 * `TokenLifecycle.create` is honoured, and only by that lifecycle. An
 * instance built or copied any other way carries no authority.
 */
export class AdminCapability {
  readonly label = "archive-admin";
}

export interface TokenLifecycleOptions {
  beaconPublicKey?: Uint8Array;
  ttlMs?: number;
  schedule?: BeaconSchedule;
}

export interface TokenLifecycleHandle {
  lifecycle: TokenLifecycle;
  adminCapability: AdminCapability;
}

function tokenIdAt(nowMs: number): string {
  return `CHIP-${new Date(nowMs).toISOString()}-${randomUUID().split("-")[0]}`;
}

function copyMetadata(metadata: TokenMetadata): TokenMetadata {
  return {
    name: metadata.name,
    description: metadata.description,
    url: metadata.url,
    animationUrl: metadata.animationUrl,
    externalUrl: metadata.externalUrl,
    attributeKeys: [...metadata.attributeKeys],
    attributeValues: [...metadata.attributeValues],
  };
}

/**
 * Mint, transfer and rebind of chip-bound tokens.
 *
 * Signed operations check, in order: the operation's own preconditions,
 * beacon freshness, the beacon signature, then the chip signature over
 * `caller || beacon_signature`. Each runs in one store transaction, so a
 * thrown ProtocolError leaves archive, tokens and events untouched.
 */
export class TokenLifecycle {
  private readonly beaconPublicKey: Uint8Array;
  private readonly ttlMs: number;
  private readonly schedule: BeaconSchedule;

  private constructor(
    private readonly store: RegistryStore,
    options: TokenLifecycleOptions,
  ) {
    this.beaconPublicKey = options.beaconPublicKey ?? DRAND_MAINNET_PUBLIC_KEY;
    this.ttlMs = options.ttlMs ?? TTL_MS;
    this.schedule = options.schedule ?? DRAND_MAINNET_SCHEDULE;
  }

  /** The admin capability is handed out here and nowhere else. */
  static create(store: RegistryStore, options: TokenLifecycleOptions = {}): TokenLifecycleHandle {
    const lifecycle = new TokenLifecycle(store, options);
    const adminCapability = Object.freeze(new AdminCapability());
    issuedTo.set(adminCapability, lifecycle);
    return { lifecycle, adminCapability };
  }

  adminAddToArchive(capability: AdminCapability, chipPublicKey: Uint8Array, nowMs: number): void {
    if (issuedTo.get(capability) !== this) {
      throw new ProtocolError("UNAUTHORIZED", "Admin capability was not issued for this registry");
    }
    this.store.transaction(() => {
      this.store.archive.addEntry(chipPublicKey);
      this.store.events.append({
        type: "ARCHIVE_ENTRY_ADDED",
        occurredAt: new Date(nowMs).toISOString(),
        chipPublicKey: bytesToHex(chipPublicKey),
      });
    });
  }

  mint(callerAddress: Address, bundle: SignatureBundle, metadata: TokenMetadata, nowMs: number): ChipToken {
    const caller = normalizeAddress(callerAddress);
    if (metadata.attributeKeys.length !== metadata.attributeValues.length) {
      throw new ProtocolError(
        "ATTRIBUTE_LENGTH_MISMATCH",
        `Got ${metadata.attributeKeys.length} attribute keys and ${metadata.attributeValues.length} values`,
      );
    }

    return this.store.transaction(() => {
      const { archive } = this.store;
      const chipHex = bytesToHex(bundle.chipPublicKey);
      if (!archive.exists(bundle.chipPublicKey)) {
        throw new ProtocolError("ARTIFACT_DOES_NOT_EXIST", `Chip ${chipHex} is not in the archive`);
      }
      if (archive.getStatus(bundle.chipPublicKey) !== "NOT_MINTED") {
        throw new ProtocolError("ARTIFACT_ALREADY_MINTED", `Chip ${chipHex} already backs a token`);
      }

      this.verifyProof(bundle, bundle.chipPublicKey, caller, nowMs);

      const nowIso = new Date(nowMs).toISOString();
      const token: ChipToken = {
        tokenId: tokenIdAt(nowMs),
        owner: caller,
        chipPublicKey: chipHex,
        ...copyMetadata(metadata),
        mintedAt: nowIso,
        updatedAt: nowIso,
      };
      this.store.tokens.insert(token);
      archive.setStatus(bundle.chipPublicKey, "MINTED");
      this.store.events.append({
        type: "MINTED",
        occurredAt: nowIso,
        round: bundle.round,
        tokenId: token.tokenId,
        owner: caller,
        chipPublicKey: chipHex,
      });
      return token;
    });
  }

  transfer(
    callerAddress: Address,
    tokenId: string,
    proof: BeaconProof,
    receiverAddress: Address,
    nowMs: number,
  ): ChipToken {
    const caller = normalizeAddress(callerAddress);
    const receiver = normalizeAddress(receiverAddress);
    if (caller === receiver) {
      throw new ProtocolError("TRANSFER_NOT_ALLOWED", "Sender and receiver are the same address");
    }

    return this.store.transaction(() => {
      const current = this.ownedToken(caller, tokenId);

      this.verifyProof(proof, hexToBytes(current.chipPublicKey), caller, nowMs);

      const nowIso = new Date(nowMs).toISOString();
      const token: ChipToken = { ...current, owner: receiver, updatedAt: nowIso };
      this.store.tokens.update(token);
      this.store.events.append({
        type: "TRANSFERRED",
        occurredAt: nowIso,
        round: proof.round,
        tokenId,
        from: caller,
        to: receiver,
      });
      return token;
    });
  }

  /**
   * Moves the token onto another archived chip. A chip that already backs a
   * token is refused, so one chip never ends up bound to two tokens.
   */
  rebind(callerAddress: Address, tokenId: string, bundle: SignatureBundle, nowMs: number): ChipToken {
    const caller = normalizeAddress(callerAddress);
    return this.store.transaction(() => {
      const { archive } = this.store;
      const newChipHex = bytesToHex(bundle.chipPublicKey);
      if (!archive.exists(bundle.chipPublicKey)) {
        throw new ProtocolError("UNKNOWN_ARTIFACT", `Chip ${newChipHex} is not in the archive`);
      }
      const current = this.ownedToken(caller, tokenId);
      if (archive.getStatus(bundle.chipPublicKey) === "MINTED") {
        throw new ProtocolError("ARTIFACT_ALREADY_MINTED", `Chip ${newChipHex} already backs a token`);
      }

      this.verifyProof(bundle, bundle.chipPublicKey, caller, nowMs);

      archive.removeEntry(hexToBytes(current.chipPublicKey));
      const nowIso = new Date(nowMs).toISOString();
      const token: ChipToken = { ...current, chipPublicKey: newChipHex, updatedAt: nowIso };
      this.store.tokens.update(token);
      archive.setStatus(bundle.chipPublicKey, "MINTED");
      this.store.events.append({
        type: "REBOUND",
        occurredAt: nowIso,
        round: bundle.round,
        tokenId,
        previousChipPublicKey: current.chipPublicKey,
        chipPublicKey: newChipHex,
      });
      return token;
    });
  }

  private ownedToken(caller: Address, tokenId: string): ChipToken {
    const token = this.store.tokens.get(tokenId);
    if (!token) {
      throw new ProtocolError("TOKEN_NOT_FOUND", `Token '${tokenId}' does not exist`);
    }
    if (token.owner !== caller) {
      throw new ProtocolError("NOT_TOKEN_OWNER", `Token '${tokenId}' is not owned by ${caller}`);
    }
    return token;
  }

  private verifyProof(proof: BeaconProof, chipPublicKey: Uint8Array, caller: Address, nowMs: number): void {
    if (!isWithinTtl(proof.round, nowMs, this.ttlMs, this.schedule)) {
      throw new ProtocolError("SIGNATURE_EXPIRED", `Beacon round ${proof.round} is older than ${this.ttlMs}ms`);
    }
    if (
      !verifyBeaconSignature(
        proof.beaconSignature,
        proof.previousBeaconSignature,
        proof.round,
        this.beaconPublicKey,
      )
    ) {
      throw new ProtocolError("INVALID_SIGNATURE", `Beacon signature for round ${proof.round} does not verify`);
    }
    if (
      !verifyChipSignature(
        proof.chipSignature,
        chipPublicKey,
        proof.beaconSignature,
        addressToBytes(caller),
      )
    ) {
      throw new ProtocolError("INVALID_SIGNATURE", "Chip signature does not cover this sender and beacon round");
    }
  }
}

