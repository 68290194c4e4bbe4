import { secp256k1 } from "@noble/curves/secp256k1";
import { concatBytes } from "@noble/hashes/utils";
import { sha256Bytes } from "./hash.js";

/** What the chip signs: the sender's raw address bytes followed by the beacon signature. */
export function chipMessage(senderAddress: Uint8Array, beaconSignature: Uint8Array): Uint8Array {
  return concatBytes(senderAddress, beaconSignature);
}

export function verifyChipSignature(
  chipSignature: Uint8Array,
  chipPublicKey: Uint8Array,
  beaconSignature: Uint8Array,
  senderAddress: Uint8Array,
): boolean {
  const digest = sha256Bytes(chipMessage(senderAddress, beaconSignature));
  try {
    return secp256k1.verify(chipSignature, digest, chipPublicKey, { lowS: true });
  } catch {
    return false;
  }
}
