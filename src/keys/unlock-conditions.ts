/**
 * Unlock conditions
 *
 * The spending policy behind an address. Its unlock hash is the Merkle root
 * of [timelock, ...public keys, signatures required].
 */

import { bytesToHex } from "@noble/hashes/utils";
import type { SiaPublicKey, UnlockConditions } from "../types.js";
import { merkleRoot } from "../crypto.js";
import { Encoder, encodePublicKey } from "../txn/encoding.js";
import { InvalidInputError } from "../errors.js";
import { formatAddress } from "./address.js";

export function unlockHash(uc: UnlockConditions): Uint8Array {
  const leaves: Uint8Array[] = [new Encoder().u64(uc.timelock).finish()];
  for (const pk of uc.publicKeys) {
    leaves.push(encodePublicKey(new Encoder(), pk.algorithm, pk.key).finish());
  }
  leaves.push(new Encoder().u64(uc.signaturesRequired).finish());
  return merkleRoot(leaves);
}

/** Address string for a set of unlock conditions */
export function addressOf(uc: UnlockConditions): string {
  return formatAddress(unlockHash(uc));
}

/** Single ed25519 key, no timelock, one signature required */
export function standardUnlockConditions(publicKey: Uint8Array): UnlockConditions {
  return {
    timelock: 0,
    publicKeys: [{ algorithm: "ed25519", key: bytesToHex(publicKey) }],
    signaturesRequired: 1,
  };
}

export function standardAddress(publicKey: Uint8Array): string {
  return addressOf(standardUnlockConditions(publicKey));
}

/** "ed25519:<hex>" */
export function formatPublicKey(pk: SiaPublicKey): string {
  return `${pk.algorithm}:${pk.key}`;
}

export function parsePublicKey(input: string): SiaPublicKey {
  const match = /^ed25519:([0-9a-fA-F]{64})$/.exec(input);
  if (!match) {
    throw new InvalidInputError(`Invalid public key "${input}"`);
  }
  return { algorithm: "ed25519", key: match[1].toLowerCase() };
}
