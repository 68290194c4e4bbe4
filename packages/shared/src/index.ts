export * from "./errors.js";
export * from "./address.js";
export * from "./crypto/canonicalize.js";
export * from "./crypto/hash.js";
export * from "./crypto/ed25519.js";
export * from "./crypto/drand.js";
export * from "./crypto/chip.js";
export * from "./beacon/constants.js";
export * from "./beacon/freshness.js";
export * from "./auth/admin-auth.js";
export * from "./auth/caller.js";
export * from "./types/token.js";
export * from "./types/events.js";
export * from "./types/api.js";
