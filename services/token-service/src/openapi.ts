const tokenIdParam = {
  in: "path",
  name: "tokenId",
  required: true,
  schema: { type: "string" },
};

const callerHeader = {
  in: "header",
  name: "x-caller-address",
  required: true,
  schema: { type: "string", pattern: "^0x[0-9a-fA-F]{64}$" },
};

const adminHeader = {
  in: "header",
  name: "x-admin-token",
  required: true,
  schema: { type: "string" },
};

const signedResponses = {
  "400": { description: "Invalid request, round or self-transfer" },
  "401": { description: "Missing caller address" },
  "404": { description: "Token or chip not found" },
  "409": { description: "Chip already backs a token" },
  "422": { description: "Expired beacon round or invalid signature" },
};

export function buildOpenApiSpec(serviceBaseUrl: string) {
  return {
    openapi: "3.0.3",
    info: {
      title: "ChipMint Token Service API",
      version: "0.1.0",
      description: "Archive provisioning plus beacon-fresh, chip-signed mint, transfer and rebind of chip-bound tokens.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths: {
      "/health": {
        get: {
          summary: "Health check",
          responses: {
            "200": { description: "Service healthy" },
          },
        },
      },
      "/beacon/round": {
        get: {
          summary: "Latest beacon round at a given time",
          parameters: [{ in: "query", name: "at", required: false, schema: { type: "integer" } }],
          responses: {
            "200": { description: "Round number and its nominal time" },
            "400": { description: "Invalid time" },
          },
        },
      },
      "/archive/entries": {
        post: {
          summary: "Add chip public keys to the archive (admin)",
          parameters: [adminHeader],
          responses: {
            "201": { description: "Entries added as NOT_MINTED" },
            "400": { description: "Invalid request" },
            "401": { description: "Missing or invalid admin token" },
            "409": { description: "Duplicate entry" },
          },
        },
      },
      "/archive": {
        get: {
          summary: "List archive entries (admin)",
          parameters: [adminHeader],
          responses: {
            "200": { description: "Entries with mint status" },
            "401": { description: "Missing or invalid admin token" },
          },
        },
      },
      "/archive/{chipPublicKey}": {
        get: {
          summary: "Mint status of one chip (public, no admin token)",
          description:
            "Anyone may check whether a known chip key is archived and minted. Enumerating the archive stays behind GET /archive.",
          parameters: [
            {
              in: "path",
              name: "chipPublicKey",
              required: true,
              schema: { type: "string" },
            },
          ],
          responses: {
            "200": { description: "Entry found" },
            "404": { description: "Chip not in archive" },
          },
        },
      },
      "/tokens/mint": {
        post: {
          summary: "Mint a token for an archived chip",
          parameters: [callerHeader],
          responses: {
            "201": { description: "Token minted" },
            ...signedResponses,
          },
        },
      },
      "/tokens/{tokenId}/transfer": {
        post: {
          summary: "Transfer a token to another address",
          parameters: [tokenIdParam, callerHeader],
          responses: {
            "200": { description: "Token transferred" },
            "403": { description: "Caller does not own the token" },
            ...signedResponses,
          },
        },
      },
      "/tokens/{tokenId}/rebind": {
        post: {
          summary: "Bind a token to a different archived chip",
          parameters: [tokenIdParam, callerHeader],
          responses: {
            "200": { description: "Token rebound" },
            "403": { description: "Caller does not own the token" },
            ...signedResponses,
          },
        },
      },
      "/tokens": {
        get: {
          summary: "List tokens held by an owner",
          parameters: [{ in: "query", name: "owner", required: true, schema: { type: "string" } }],
          responses: {
            "200": { description: "Attested tokens" },
            "400": { description: "Invalid owner" },
          },
        },
      },
      "/tokens/{tokenId}": {
        get: {
          summary: "Get an attested token",
          parameters: [tokenIdParam],
          responses: {
            "200": { description: "Token found" },
            "404": { description: "Token not found" },
          },
        },
      },
      "/tokens/{tokenId}/timeline": {
        get: {
          summary: "Mint, transfer and rebind events of a token",
          parameters: [tokenIdParam],
          responses: {
            "200": { description: "Timeline" },
            "404": { description: "Token not found" },
          },
        },
      },
      "/tokens/verify": {
        post: {
          summary: "Verify a token attestation",
          responses: {
            "200": { description: "Verification result" },
            "400": { description: "Invalid request" },
            "404": { description: "Token not found" },
          },
        },
      },
    },
  };
}
