import { bls12_381 } from "@noble/curves/bls12-381";
import { secp256k1 } from "@noble/curves/secp256k1";
import { bytesToHex } from "@noble/hashes/utils";
import {
  type Address,
  type SignatureBundle,
  type TokenMetadata,
  addressToBytes,
  beaconDigest,
  chipMessage,
  roundTimeMs,
  sha256Bytes,
} from "@chipmint/shared";

export const ATTESTOR_PRIVATE_KEY_HEX =
  "1f1e1d1c1b1a19181716151413121110ffeeddbbccaa99887766554433221100";
export const ADMIN_TOKEN = "test-admin-token";

const BEACON_PRIVATE_KEY_HEX =
  "2a2b2c2d2e2f303132333435363738393a3b3c3d3e3f40414243444546474849";

export const beaconPublicKey = bls12_381.getPublicKey(BEACON_PRIVATE_KEY_HEX);
export const beaconPublicKeyHex = bytesToHex(beaconPublicKey);

export const CHIP_A_PRIVATE_KEY_HEX =
  "0101010101010101010101010101010101010101010101010101010101010101";
export const CHIP_B_PRIVATE_KEY_HEX =
  "0202020202020202020202020202020202020202020202020202020202020202";
export const CHIP_C_PRIVATE_KEY_HEX =
  "0303030303030303030303030303030303030303030303030303030303030303";

export function chipPublicKey(privateKeyHex: string): Uint8Array {
  return secp256k1.getPublicKey(privateKeyHex, true);
}

export const ALICE: Address = `0x${"a1".repeat(32)}`;
export const BOB: Address = `0x${"b2".repeat(32)}`;

export const ROUND = 1000;
/** Nominal time of ROUND: (1595431050 + 30 * 999) * 1000. */
export const ROUND_TIME_MS = Number(roundTimeMs(ROUND));
export const NOW_MS = ROUND_TIME_MS + 5000;

export const PREVIOUS_BEACON_SIGNATURE = new Uint8Array(96).fill(7);

export function signRound(round: number, previousSignature: Uint8Array = PREVIOUS_BEACON_SIGNATURE): Uint8Array {
  return bls12_381.sign(beaconDigest(previousSignature, round), BEACON_PRIVATE_KEY_HEX);
}

export function signAsChip(chipPrivateKeyHex: string, sender: Address, beaconSignature: Uint8Array): Uint8Array {
  const digest = sha256Bytes(chipMessage(addressToBytes(sender), beaconSignature));
  return secp256k1.sign(digest, chipPrivateKeyHex).toCompactRawBytes();
}

export function makeBundle(
  chipPrivateKeyHex: string,
  sender: Address,
  round: number = ROUND,
): SignatureBundle {
  const beaconSignature = signRound(round);
  return {
    chipSignature: signAsChip(chipPrivateKeyHex, sender, beaconSignature),
    chipPublicKey: chipPublicKey(chipPrivateKeyHex),
    beaconSignature,
    previousBeaconSignature: PREVIOUS_BEACON_SIGNATURE,
    round,
  };
}

export function bundleJson(bundle: SignatureBundle) {
  return {
    chipSignature: bytesToHex(bundle.chipSignature),
    beaconSignature: bytesToHex(bundle.beaconSignature),
    previousBeaconSignature: bytesToHex(bundle.previousBeaconSignature),
    round: bundle.round,
  };
}

export const METADATA: TokenMetadata = {
  name: "Field Jacket #12",
  description: "Waxed cotton, chip sewn into the collar",
  url: "https://example.test/media/12.png",
  animationUrl: "",
  externalUrl: "https://example.test/items/12",
  attributeKeys: ["size", "colour"],
  attributeValues: ["M", "olive"],
};
