/**
 * Address string encoding and validation
 *
 * An address is the 32-byte unlock hash followed by a 6-byte checksum
 * (the first 6 bytes of blake2b-256 of the hash), hex encoded: 76 chars.
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { blake2b256, HASH_SIZE } from "../crypto.js";
import { InvalidInputError } from "../errors.js";

const CHECKSUM_SIZE = 6;
export const ADDRESS_LENGTH = (HASH_SIZE + CHECKSUM_SIZE) * 2;

function checksum(hash: Uint8Array): Uint8Array {
  return blake2b256(hash).subarray(0, CHECKSUM_SIZE);
}

/** Canonical string form of an unlock hash */
export function formatAddress(hash: Uint8Array): string {
  if (hash.length !== HASH_SIZE) {
    throw new RangeError(`unlock hash must be ${HASH_SIZE} bytes`);
  }
  return bytesToHex(hash) + bytesToHex(checksum(hash));
}

/**
 * Validate an address string and return it in canonical (lowercase) form.
 *
 * @throws InvalidInputError on bad length, non-hex characters or checksum mismatch
 */
export function parseAddress(input: string): string {
  const s = input.trim().toLowerCase();
  if (s.length !== ADDRESS_LENGTH) {
    throw new InvalidInputError(`Invalid address "${input}": wrong length`);
  }
  if (!/^[0-9a-f]+$/.test(s)) {
    throw new InvalidInputError(`Invalid address "${input}": not hex`);
  }
  const hash = hexToBytes(s.slice(0, HASH_SIZE * 2));
  if (bytesToHex(checksum(hash)) !== s.slice(HASH_SIZE * 2)) {
    throw new InvalidInputError(`Invalid address "${input}": bad checksum`);
  }
  return s;
}

export function isValidAddress(input: string): boolean {
  try {
    parseAddress(input);
    return true;
  } catch {
    return false;
  }
}

/** The raw 32-byte unlock hash of a validated address */
export function addressHash(address: string): Uint8Array {
  return hexToBytes(parseAddress(address).slice(0, HASH_SIZE * 2));
}
