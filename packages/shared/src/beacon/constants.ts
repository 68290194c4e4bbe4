// drand mainnet, chained scheme (pedersen-bls-chained).
export const GENESIS_SECONDS = 1595431050;
export const PERIOD_SECONDS = 30;
export const TTL_MS = 60000;

export const DRAND_MAINNET_PUBLIC_KEY_HEX =
  "868f005eb8e6e4ca0a47c8a77ceaa5309a47978a7c71bc5cce96366b5d7a569937c529eeda66c7293784a9402801af31";

export const BEACON_PUBLIC_KEY_BYTES = 48;
export const BEACON_SIGNATURE_BYTES = 96;
