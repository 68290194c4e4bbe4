import Fastify, { type FastifyReply, type FastifyRequest } from "fastify";
import { hexToBytes } from "@noble/hashes/utils";
import {
  ADMIN_TOKEN_HEADER,
  type AddArchiveEntriesRequest,
  type AddArchiveEntriesResponse,
  type AttestedToken,
  type BeaconProof,
  type BeaconRoundResponse,
  CALLER_ADDRESS_HEADER,
  type ChipToken,
  DRAND_MAINNET_PUBLIC_KEY_HEX,
  type GetArchiveEntryResponse,
  type GetTimelineResponse,
  type ListArchiveResponse,
  type ListTokensResponse,
  type MintTokenRequest,
  type ProtocolErrorCode,
  type RebindTokenRequest,
  type SignatureBundleJson,
  TTL_MS,
  type TokenMetadata,
  type TokenResponse,
  type TransferTokenRequest,
  type VerifyTokenRequest,
  type VerifyTokenResponse,
  canonicalHashHex,
  currentRound,
  isAddress,
  isAdminAuthorized,
  isHex,
  isProtocolError,
  normalizeAddress,
  parseCallerAddressHeader,
  publicKeyFromPrivateKeyHex,
  roundTimeMs,
  signHex,
  verifyHex,
} from "@chipmint/shared";
import { TokenLifecycle } from "./lifecycle.js";
import { buildOpenApiSpec } from "./openapi.js";
import { type RegistryStore, SqliteRegistryStore } from "./storage/registry-store.js";

const DEFAULT_DB_PATH = "data/token-service.db";
const MAX_ARCHIVE_BATCH = 500;

const STATUS_BY_CODE: Record<ProtocolErrorCode, number> = {
  INVALID_SIGNATURE: 422,
  SIGNATURE_EXPIRED: 422,
  INVALID_ROUND: 400,
  ARTIFACT_DOES_NOT_EXIST: 404,
  UNKNOWN_ARTIFACT: 404,
  ARTIFACT_ALREADY_MINTED: 409,
  TRANSFER_NOT_ALLOWED: 400,
  DUPLICATE_ENTRY: 409,
  MISSING_ENTRY: 404,
  ENTRY_TYPE_MISMATCH: 500,
  TOKEN_NOT_FOUND: 404,
  NOT_TOKEN_OWNER: 403,
  ATTRIBUTE_LENGTH_MISMATCH: 400,
  UNAUTHORIZED: 401,
};

function isObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === "object" && !Array.isArray(value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim().length > 0;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === "string");
}

function isChipPublicKeyHex(value: unknown): value is string {
  return isHex(value, 33) || isHex(value, 65);
}

function parseMetadata(value: unknown): TokenMetadata | null {
  if (!isObject(value)) return null;
  if (!isNonEmptyString(value.name)) return null;
  if (typeof value.description !== "string") return null;
  if (typeof value.url !== "string") return null;
  if (typeof value.animationUrl !== "string") return null;
  if (typeof value.externalUrl !== "string") return null;
  if (!isStringArray(value.attributeKeys)) return null;
  if (!isStringArray(value.attributeValues)) return null;
  return {
    name: value.name,
    description: value.description,
    url: value.url,
    animationUrl: value.animationUrl,
    externalUrl: value.externalUrl,
    attributeKeys: value.attributeKeys,
    attributeValues: value.attributeValues,
  };
}

function parseBundleFields(body: Record<string, unknown>): SignatureBundleJson | null {
  if (!isHex(body.chipSignature)) return null;
  if (!isHex(body.beaconSignature)) return null;
  if (!isHex(body.previousBeaconSignature)) return null;
  if (typeof body.round !== "number") return null;
  return {
    chipSignature: body.chipSignature,
    beaconSignature: body.beaconSignature,
    previousBeaconSignature: body.previousBeaconSignature,
    round: body.round,
  };
}

function parseMintRequest(body: unknown): MintTokenRequest | null {
  if (!isObject(body)) return null;
  const bundle = parseBundleFields(body);
  if (!bundle) return null;
  if (!isChipPublicKeyHex(body.chipPublicKey)) return null;
  const metadata = parseMetadata(body.metadata);
  if (!metadata) return null;
  return { ...bundle, chipPublicKey: body.chipPublicKey, metadata };
}

function parseTransferRequest(body: unknown): TransferTokenRequest | null {
  if (!isObject(body)) return null;
  const bundle = parseBundleFields(body);
  if (!bundle) return null;
  if (!isAddress(body.receiver)) return null;
  return { ...bundle, receiver: normalizeAddress(body.receiver) };
}

function parseRebindRequest(body: unknown): RebindTokenRequest | null {
  if (!isObject(body)) return null;
  const bundle = parseBundleFields(body);
  if (!bundle) return null;
  if (!isChipPublicKeyHex(body.newChipPublicKey)) return null;
  return { ...bundle, newChipPublicKey: body.newChipPublicKey };
}

function parseArchiveRequest(body: unknown): AddArchiveEntriesRequest | null {
  if (!isObject(body)) return null;
  if (!Array.isArray(body.chipPublicKeys)) return null;
  if (body.chipPublicKeys.length === 0 || body.chipPublicKeys.length > MAX_ARCHIVE_BATCH) return null;
  if (!body.chipPublicKeys.every(isChipPublicKeyHex)) return null;
  return { chipPublicKeys: body.chipPublicKeys.map((key: string) => key.toLowerCase()) };
}

function parseChipToken(value: unknown): ChipToken | null {
  if (!isObject(value)) return null;
  const metadata = parseMetadata(value);
  if (!metadata) return null;
  if (!isNonEmptyString(value.tokenId)) return null;
  if (!isAddress(value.owner)) return null;
  if (!isChipPublicKeyHex(value.chipPublicKey)) return null;
  if (!isNonEmptyString(value.mintedAt)) return null;
  if (!isNonEmptyString(value.updatedAt)) return null;
  return {
    tokenId: value.tokenId,
    owner: value.owner,
    chipPublicKey: value.chipPublicKey,
    ...metadata,
    mintedAt: value.mintedAt,
    updatedAt: value.updatedAt,
  };
}

function parseAttestedToken(value: unknown): AttestedToken | null {
  if (!isObject(value)) return null;
  const payload = parseChipToken(value.payload);
  if (!payload) return null;
  if (!isHex(value.payloadHash, 32)) return null;
  if (!isHex(value.signature, 64)) return null;
  if (!isHex(value.attestor, 32)) return null;
  return {
    payload,
    payloadHash: value.payloadHash,
    signature: value.signature,
    attestor: value.attestor,
  };
}

function parseVerifyRequest(body: unknown): VerifyTokenRequest | null {
  if (!isObject(body)) return null;
  if (body.tokenId !== undefined && !isNonEmptyString(body.tokenId)) return null;
  let token: AttestedToken | undefined;
  if (body.token !== undefined) {
    const parsed = parseAttestedToken(body.token);
    if (!parsed) return null;
    token = parsed;
  }
  return { tokenId: body.tokenId, token };
}

function toBeaconProof(request: SignatureBundleJson): BeaconProof {
  return {
    chipSignature: hexToBytes(request.chipSignature),
    beaconSignature: hexToBytes(request.beaconSignature),
    previousBeaconSignature: hexToBytes(request.previousBeaconSignature),
    round: request.round,
  };
}

export interface BuildServerOptions {
  registryStore?: RegistryStore;
  dbPath?: string;
  attestorPrivateKeyHex?: string;
  adminToken?: string;
  beaconPublicKeyHex?: string;
  ttlMs?: number;
  clock?: () => number;
  logger?: boolean;
  serviceBaseUrl?: string;
}

export async function buildServer(options: BuildServerOptions = {}) {
  const configuredAttestorKey =
    options.attestorPrivateKeyHex ||
    process.env.ATTESTOR_PRIVATE_KEY_HEX;
  if (!configuredAttestorKey) {
    throw new Error(
      "ATTESTOR_PRIVATE_KEY_HEX is required (or pass attestorPrivateKeyHex in buildServer options)",
    );
  }
  const attestorPrivateKeyHex: string = configuredAttestorKey;
  const attestorPublicKeyHex = await publicKeyFromPrivateKeyHex(attestorPrivateKeyHex);
  const adminToken = options.adminToken ?? process.env.ADMIN_TOKEN;
  const beaconPublicKeyHex =
    options.beaconPublicKeyHex ||
    process.env.BEACON_PUBLIC_KEY_HEX ||
    DRAND_MAINNET_PUBLIC_KEY_HEX;
  if (!isHex(beaconPublicKeyHex, 48)) {
    throw new Error("BEACON_PUBLIC_KEY_HEX must be a 48-byte hex string");
  }
  const ttlMs = options.ttlMs ?? (process.env.TOKEN_TTL_MS ? Number(process.env.TOKEN_TTL_MS) : TTL_MS);
  if (!Number.isSafeInteger(ttlMs) || ttlMs < 0) {
    throw new Error("TOKEN_TTL_MS must be a non-negative integer number of milliseconds");
  }
  const clock = options.clock ?? Date.now;
  const serviceBaseUrl =
    options.serviceBaseUrl ||
    process.env.SERVICE_BASE_URL ||
    `http://127.0.0.1:${process.env.PORT || 4201}`;

  const app = Fastify({ logger: options.logger ?? true });
  const store =
    options.registryStore ||
    new SqliteRegistryStore(options.dbPath || process.env.TOKEN_DB_PATH || DEFAULT_DB_PATH);
  const ownStore = !options.registryStore;
  const { lifecycle, adminCapability } = TokenLifecycle.create(store, {
    beaconPublicKey: hexToBytes(beaconPublicKeyHex),
    ttlMs,
  });

  async function attest(payload: ChipToken): Promise<AttestedToken> {
    const payloadHash = canonicalHashHex(payload);
    const signature = await signHex(payloadHash, attestorPrivateKeyHex);
    return { payload, payloadHash, signature, attestor: attestorPublicKeyHex };
  }

  function rejectProtocolError(error: unknown, req: FastifyRequest, reply: FastifyReply) {
    if (!isProtocolError(error)) throw error;
    const statusCode = STATUS_BY_CODE[error.code];
    if (statusCode >= 500) {
      req.log.error({ code: error.code }, error.message);
    } else {
      req.log.warn({ code: error.code }, error.message);
    }
    return reply.code(statusCode).send({
      error: error.code.toLowerCase(),
      message: error.message,
    });
  }

  function requireCaller(req: FastifyRequest, reply: FastifyReply): string | null {
    const caller = parseCallerAddressHeader(req.headers[CALLER_ADDRESS_HEADER]);
    if (caller) return caller;
    reply.code(401).send({
      error: "missing_caller",
      message: `Missing or invalid '${CALLER_ADDRESS_HEADER}' header`,
    });
    return null;
  }

  function requireAdmin(req: FastifyRequest, reply: FastifyReply): boolean {
    if (isAdminAuthorized(req.headers[ADMIN_TOKEN_HEADER], adminToken)) {
      return true;
    }
    reply.code(401).send({
      error: "unauthorized_admin",
      message: `Missing or invalid '${ADMIN_TOKEN_HEADER}' header`,
    });
    return false;
  }

  app.get("/health", async () => ({ ok: true, service: "token-service" }));
  app.get("/openapi.json", async () => buildOpenApiSpec(serviceBaseUrl));

  app.get("/beacon/round", async (req, reply) => {
    const query = req.query as { at?: string };
    const at = query.at === undefined ? clock() : Number(query.at || Number.NaN);
    if (!Number.isSafeInteger(at) || at < 0) {
      return reply.code(400).send({ error: "invalid_time", message: "Expected 'at' in unix milliseconds" });
    }
    const round = Math.max(1, currentRound(at));
    const response: BeaconRoundResponse = {
      round,
      roundTimeMs: Number(roundTimeMs(round)),
      ttlMs,
    };
    return response;
  });

  app.post("/archive/entries", async (req, reply) => {
    if (!requireAdmin(req, reply)) {
      return;
    }
    const parsed = parseArchiveRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: `Expected chipPublicKeys: 1-${MAX_ARCHIVE_BATCH} compressed or uncompressed secp256k1 keys (hex)`,
      });
    }

    try {
      const nowMs = clock();
      store.transaction(() => {
        for (const key of parsed.chipPublicKeys) {
          lifecycle.adminAddToArchive(adminCapability, hexToBytes(key), nowMs);
        }
      });
    } catch (error) {
      return rejectProtocolError(error, req, reply);
    }

    const response: AddArchiveEntriesResponse = {
      entries: parsed.chipPublicKeys.map((chipPublicKey) => ({ chipPublicKey, status: "NOT_MINTED" })),
    };
    return reply.code(201).send(response);
  });

  app.get("/archive", async (req, reply) => {
    if (!requireAdmin(req, reply)) {
      return;
    }
    try {
      const response: ListArchiveResponse = { entries: store.archive.list() };
      return response;
    } catch (error) {
      return rejectProtocolError(error, req, reply);
    }
  });

  app.get("/archive/:chipPublicKey", async (req, reply) => {
    const params = req.params as { chipPublicKey?: string };
    if (!isChipPublicKeyHex(params.chipPublicKey)) {
      return reply.code(400).send({ error: "invalid_chip_public_key" });
    }
    try {
      const chipPublicKey = params.chipPublicKey.toLowerCase();
      const response: GetArchiveEntryResponse = {
        entry: { chipPublicKey, status: store.archive.getStatus(hexToBytes(chipPublicKey)) },
      };
      return response;
    } catch (error) {
      return rejectProtocolError(error, req, reply);
    }
  });

  app.post("/tokens/mint", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }
    const parsed = parseMintRequest(req.body);
    if (!parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected chipPublicKey, chipSignature, beaconSignature, previousBeaconSignature, round and metadata",
      });
    }

    try {
      const token = lifecycle.mint(
        caller,
        { ...toBeaconProof(parsed), chipPublicKey: hexToBytes(parsed.chipPublicKey) },
        parsed.metadata,
        clock(),
      );
      req.log.info({ tokenId: token.tokenId, round: parsed.round }, "token minted");
      const response: TokenResponse = { token: await attest(token) };
      return reply.code(201).send(response);
    } catch (error) {
      return rejectProtocolError(error, req, reply);
    }
  });

  app.post("/tokens/:tokenId/transfer", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }
    const params = req.params as { tokenId?: string };
    const parsed = parseTransferRequest(req.body);
    if (!isNonEmptyString(params.tokenId) || !parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected receiver, chipSignature, beaconSignature, previousBeaconSignature and round",
      });
    }

    try {
      const token = lifecycle.transfer(caller, params.tokenId, toBeaconProof(parsed), parsed.receiver, clock());
      req.log.info({ tokenId: token.tokenId, round: parsed.round }, "token transferred");
      const response: TokenResponse = { token: await attest(token) };
      return response;
    } catch (error) {
      return rejectProtocolError(error, req, reply);
    }
  });

  app.post("/tokens/:tokenId/rebind", async (req, reply) => {
    const caller = requireCaller(req, reply);
    if (!caller) {
      return;
    }
    const params = req.params as { tokenId?: string };
    const parsed = parseRebindRequest(req.body);
    if (!isNonEmptyString(params.tokenId) || !parsed) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Expected newChipPublicKey, chipSignature, beaconSignature, previousBeaconSignature and round",
      });
    }

    try {
      const token = lifecycle.rebind(
        caller,
        params.tokenId,
        { ...toBeaconProof(parsed), chipPublicKey: hexToBytes(parsed.newChipPublicKey) },
        clock(),
      );
      req.log.info({ tokenId: token.tokenId, round: parsed.round }, "token rebound");
      const response: TokenResponse = { token: await attest(token) };
      return response;
    } catch (error) {
      return rejectProtocolError(error, req, reply);
    }
  });

  app.get("/tokens", async (req, reply) => {
    const query = req.query as { owner?: string };
    if (!isAddress(query.owner)) {
      return reply.code(400).send({ error: "invalid_owner", message: "Expected ?owner=0x<64 hex>" });
    }
    const tokens = store.tokens.listByOwner(normalizeAddress(query.owner));
    const response: ListTokensResponse = { tokens: await Promise.all(tokens.map(attest)) };
    return response;
  });

  app.get("/tokens/:tokenId", async (req, reply) => {
    const params = req.params as { tokenId?: string };
    if (!isNonEmptyString(params.tokenId)) {
      return reply.code(400).send({ error: "invalid_token_id" });
    }
    const token = store.tokens.get(params.tokenId);
    if (!token) {
      return reply.code(404).send({ error: "token_not_found" });
    }
    const response: TokenResponse = { token: await attest(token) };
    return response;
  });

  app.get("/tokens/:tokenId/timeline", async (req, reply) => {
    const params = req.params as { tokenId?: string };
    if (!isNonEmptyString(params.tokenId)) {
      return reply.code(400).send({ error: "invalid_token_id" });
    }
    if (!store.tokens.get(params.tokenId)) {
      return reply.code(404).send({ error: "token_not_found" });
    }
    const response: GetTimelineResponse = {
      tokenId: params.tokenId,
      events: store.events.listForToken(params.tokenId),
    };
    return response;
  });

  app.post("/tokens/verify", async (req, reply) => {
    const parsed = parseVerifyRequest(req.body);
    if (!parsed || (!parsed.tokenId && !parsed.token)) {
      return reply.code(400).send({
        error: "invalid_request",
        message: "Provide tokenId or an attested token",
      });
    }

    let attested = parsed.token;
    if (!attested) {
      const found = store.tokens.get(parsed.tokenId || "");
      if (!found) {
        return reply.code(404).send({ error: "token_not_found" });
      }
      attested = await attest(found);
    }

    const recalculatedHash = canonicalHashHex(attested.payload);
    const hashMatches = recalculatedHash === attested.payloadHash;
    const signatureValid = hashMatches
      ? await verifyHex(attested.payloadHash, attested.signature, attested.attestor)
      : false;
    const attestorMatches = attested.attestor === attestorPublicKeyHex;
    const stored = store.tokens.get(attested.payload.tokenId);
    const current = !!stored && canonicalHashHex(stored) === recalculatedHash;

    const response: VerifyTokenResponse = {
      tokenId: attested.payload.tokenId,
      valid: hashMatches && signatureValid && attestorMatches,
      hashMatches,
      signatureValid,
      attestorMatches,
      current,
    };
    return reply.send(response);
  });

  app.addHook("onClose", async () => {
    if (ownStore) {
      store.close();
    }
  });

  return app;
}
