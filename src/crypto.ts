/**
 * Hashing primitives
 *
 * blake2b-256 and the ledger's Merkle tree convention
 * (leaf prefix 0x00, interior node prefix 0x01).
 */

import { blake2b } from "@noble/hashes/blake2b";

export const HASH_SIZE = 32;

const LEAF_PREFIX = new Uint8Array([0x00]);
const NODE_PREFIX = new Uint8Array([0x01]);

export function blake2b256(...parts: Uint8Array[]): Uint8Array {
  const h = blake2b.create({ dkLen: HASH_SIZE });
  for (const p of parts) h.update(p);
  return h.digest();
}

export function leafHash(data: Uint8Array): Uint8Array {
  return blake2b256(LEAF_PREFIX, data);
}

export function nodeHash(left: Uint8Array, right: Uint8Array): Uint8Array {
  return blake2b256(NODE_PREFIX, left, right);
}

/**
 * Merkle root over already-encoded leaves. The left subtree always holds the
 * largest power of two strictly smaller than the leaf count.
 */
export function merkleRoot(leaves: Uint8Array[]): Uint8Array {
  if (leaves.length === 0) {
    return new Uint8Array(HASH_SIZE);
  }
  const hashes = leaves.map(leafHash);
  return rootOf(hashes);
}

function rootOf(hashes: Uint8Array[]): Uint8Array {
  if (hashes.length === 1) return hashes[0];
  let split = 1;
  while (split * 2 < hashes.length) split *= 2;
  return nodeHash(rootOf(hashes.slice(0, split)), rootOf(hashes.slice(split)));
}
