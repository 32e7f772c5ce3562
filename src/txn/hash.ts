/**
 * Transaction identifiers and signature hashes
 */

import { bytesToHex } from "@noble/hashes/utils";
import type { NetworkConfig, Transaction } from "../types.js";
import { blake2b256 } from "../crypto.js";
import { Encoder, encodeTransactionNoSignatures } from "./encoding.js";

/** Canonical transaction id: hash of everything except signatures */
export function transactionId(txn: Transaction): string {
  return bytesToHex(blake2b256(encodeTransactionNoSignatures(new Encoder(), txn).finish()));
}

/**
 * Replay-protection prefix of the protocol version active at `height`.
 * Signatures made under one version are invalid under another.
 */
export function replayPrefix(height: number, network: NetworkConfig): Uint8Array {
  if (height >= network.foundationHardforkHeight) return new Uint8Array([2]);
  if (height >= network.asicHardforkHeight) return new Uint8Array([1]);
  return new Uint8Array(0);
}

/**
 * Digest signed for `transactionSignatures[sigIndex]`. Only whole-transaction
 * signatures are produced by this wallet.
 */
export function sigHash(
  txn: Transaction,
  sigIndex: number,
  height: number,
  network: NetworkConfig,
): Uint8Array {
  const sig = txn.transactionSignatures[sigIndex];
  if (!sig) {
    throw new RangeError(`no signature at index ${sigIndex}`);
  }
  if (!sig.wholeTransaction) {
    throw new RangeError("only whole-transaction signatures are supported");
  }
  const e = encodeTransactionNoSignatures(new Encoder(), txn);
  e.id(sig.parentId).u64(sig.publicKeyIndex).u64(sig.timelock);
  e.raw(replayPrefix(height, network));
  return blake2b256(e.finish());
}
