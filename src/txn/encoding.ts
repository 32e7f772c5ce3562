/**
 * Binary encoding
 *
 * The ledger's canonical serialization: u64 little-endian integers and
 * lengths, currencies as length-prefixed big-endian magnitudes, fixed-size
 * ids written raw. Object kinds this wallet never creates (file contracts,
 * revisions, storage proofs, siafund inputs/outputs, arbitrary data) are
 * written as empty lists.
 */

import { hexToBytes } from "@noble/hashes/utils";
import type { Currency, Transaction, TransactionSignature, UnlockConditions } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { addressHash } from "../keys/address.js";

const SPECIFIER_SIZE = 16;

/** Number of slice fields in CoveredFields after the wholeTransaction flag */
const COVERED_FIELD_LISTS = 10;

export class Encoder {
  private chunks: Uint8Array[] = [];
  private size = 0;

  get length(): number {
    return this.size;
  }

  raw(bytes: Uint8Array): this {
    this.chunks.push(bytes);
    this.size += bytes.length;
    return this;
  }

  u64(n: number | bigint): this {
    const buf = new Uint8Array(8);
    new DataView(buf.buffer).setBigUint64(0, BigInt(n), true);
    return this.raw(buf);
  }

  bool(b: boolean): this {
    return this.raw(new Uint8Array([b ? 1 : 0]));
  }

  prefixedBytes(bytes: Uint8Array): this {
    return this.u64(bytes.length).raw(bytes);
  }

  specifier(name: string): this {
    const buf = new Uint8Array(SPECIFIER_SIZE);
    buf.set(new TextEncoder().encode(name).subarray(0, SPECIFIER_SIZE));
    return this.raw(buf);
  }

  currency(c: Currency): this {
    return this.prefixedBytes(currencyBytes(c));
  }

  /** 32-byte id given as hex */
  id(hex: string): this {
    return this.raw(idBytes(hex));
  }

  finish(): Uint8Array {
    const out = new Uint8Array(this.size);
    let offset = 0;
    for (const c of this.chunks) {
      out.set(c, offset);
      offset += c.length;
    }
    return out;
  }
}

/** Big-endian magnitude with no leading zero bytes; zero is empty */
export function currencyBytes(c: Currency): Uint8Array {
  if (c < 0n) {
    throw new RangeError("currency cannot be negative");
  }
  if (c === 0n) return new Uint8Array(0);
  let hex = c.toString(16);
  if (hex.length % 2 === 1) hex = "0" + hex;
  return hexToBytes(hex);
}

export function idBytes(hex: string): Uint8Array {
  if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
    throw new InvalidInputError(`Invalid 32-byte id "${hex}"`);
  }
  return hexToBytes(hex.toLowerCase());
}

export function encodePublicKey(e: Encoder, algorithm: string, keyHex: string): Encoder {
  return e.specifier(algorithm).prefixedBytes(hexToBytes(keyHex));
}

export function encodeUnlockConditions(e: Encoder, uc: UnlockConditions): Encoder {
  e.u64(uc.timelock).u64(uc.publicKeys.length);
  for (const pk of uc.publicKeys) {
    encodePublicKey(e, pk.algorithm, pk.key);
  }
  return e.u64(uc.signaturesRequired);
}

export function encodeSignature(e: Encoder, sig: TransactionSignature): Encoder {
  e.id(sig.parentId).u64(sig.publicKeyIndex).u64(sig.timelock).bool(sig.wholeTransaction);
  for (let i = 0; i < COVERED_FIELD_LISTS; i++) e.u64(0);
  return e.prefixedBytes(Buffer.from(sig.signature, "base64"));
}

/** Everything except the signatures; the basis of the id and sighash */
export function encodeTransactionNoSignatures(e: Encoder, txn: Transaction): Encoder {
  e.u64(txn.siacoinInputs.length);
  for (const input of txn.siacoinInputs) {
    e.id(input.parentId);
    encodeUnlockConditions(e, input.unlockConditions);
  }
  e.u64(txn.siacoinOutputs.length);
  for (const output of txn.siacoinOutputs) {
    e.currency(output.value).raw(addressHash(output.address));
  }
  // file contracts, revisions, storage proofs, siafund inputs, siafund outputs
  for (let i = 0; i < 5; i++) e.u64(0);
  e.u64(txn.minerFees.length);
  for (const fee of txn.minerFees) e.currency(fee);
  // arbitrary data
  return e.u64(0);
}

export function encodeTransaction(txn: Transaction): Uint8Array {
  const e = encodeTransactionNoSignatures(new Encoder(), txn);
  e.u64(txn.transactionSignatures.length);
  for (const sig of txn.transactionSignatures) encodeSignature(e, sig);
  return e.finish();
}
