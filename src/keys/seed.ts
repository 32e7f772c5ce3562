/**
 * Seed
 *
 * A 12-word BIP39 phrase encodes 128 bits of entropy. The ed25519 key at
 * index i has the 32-byte secret blake2b-256(entropy || u64le(i)).
 *
 * Security rules:
 *   - the phrase, entropy and derived secrets are NEVER logged
 *   - derived secrets are zeroed right after use
 *   - wipe() zeroes the entropy when the signing session ends
 */

import * as bip39 from "bip39";
import { getPublicKeyAsync, signAsync } from "@noble/ed25519";
import { hexToBytes } from "@noble/hashes/utils";
import { blake2b256 } from "../crypto.js";
import { InvalidInputError, SignerUnavailableError } from "../errors.js";
import { Encoder } from "../txn/encoding.js";

const SEED_WORDS = 12;

export class Seed {
  private readonly entropy: Uint8Array;
  private wiped = false;

  private constructor(entropy: Uint8Array) {
    this.entropy = entropy;
  }

  /** Generate a fresh seed; the phrase is returned once for the user to record */
  static generate(): { seed: Seed; phrase: string } {
    const phrase = bip39.generateMnemonic(128);
    return { seed: Seed.fromPhrase(phrase), phrase };
  }

  /**
   * @throws InvalidInputError if the phrase is not a valid 12-word BIP39 phrase
   */
  static fromPhrase(phrase: string): Seed {
    const normalized = phrase.trim().toLowerCase().split(/\s+/).join(" ");
    if (normalized.split(" ").length !== SEED_WORDS || !bip39.validateMnemonic(normalized)) {
      throw new InvalidInputError(`Invalid seed phrase: expected ${SEED_WORDS} valid BIP39 words`);
    }
    return new Seed(hexToBytes(bip39.mnemonicToEntropy(normalized)));
  }

  private secretKey(index: number): Uint8Array {
    if (this.wiped) {
      throw new SignerUnavailableError("Seed has been wiped");
    }
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new InvalidInputError(`Invalid key index ${index}`);
    }
    return blake2b256(this.entropy, new Encoder().u64(index).finish());
  }

  async publicKey(index: number): Promise<Uint8Array> {
    const sk = this.secretKey(index);
    try {
      return await getPublicKeyAsync(sk);
    } finally {
      sk.fill(0);
    }
  }

  async signHash(index: number, hash: Uint8Array): Promise<Uint8Array> {
    const sk = this.secretKey(index);
    try {
      return await signAsync(hash, sk);
    } finally {
      sk.fill(0);
    }
  }

  wipe(): void {
    this.entropy.fill(0);
    this.wiped = true;
  }
}
