import { describe, it } from "node:test";
import assert from "node:assert/strict";
import * as bip39 from "bip39";
import { getPublicKeyAsync, verifyAsync } from "@noble/ed25519";
import { hexToBytes } from "@noble/hashes/utils";

import { Seed } from "../src/keys/seed.js";
import { blake2b256 } from "../src/crypto.js";
import { Encoder } from "../src/txn/encoding.js";
import { InvalidInputError, SignerUnavailableError } from "../src/errors.js";

describe("Seed", () => {
  it("generates a 12-word phrase that loads back", async () => {
    const { seed, phrase } = Seed.generate();
    assert.equal(phrase.split(" ").length, 12);
    const again = Seed.fromPhrase(phrase);
    assert.deepEqual(await again.publicKey(3), await seed.publicKey(3));
  });

  it("derives the key at index i from blake2b(entropy || u64le(i))", async () => {
    const { phrase } = Seed.generate();
    const entropy = hexToBytes(bip39.mnemonicToEntropy(phrase));
    const secret = blake2b256(entropy, new Encoder().u64(7).finish());
    assert.deepEqual(await Seed.fromPhrase(phrase).publicKey(7), await getPublicKeyAsync(secret));
  });

  it("gives each index its own key", async () => {
    const { seed } = Seed.generate();
    assert.notDeepEqual(await seed.publicKey(0), await seed.publicKey(1));
  });

  it("signs hashes verifiably", async () => {
    const { seed } = Seed.generate();
    const hash = blake2b256(new TextEncoder().encode("payload"));
    const sig = await seed.signHash(2, hash);
    assert.equal(sig.length, 64);
    assert.equal(await verifyAsync(sig, hash, await seed.publicKey(2)), true);
    assert.equal(await verifyAsync(sig, hash, await seed.publicKey(1)), false);
  });

  it("normalizes case and whitespace", async () => {
    const { seed, phrase } = Seed.generate();
    const messy = `  ${phrase.toUpperCase().split(" ").join("   ")} `;
    assert.deepEqual(await Seed.fromPhrase(messy).publicKey(0), await seed.publicKey(0));
  });

  it("rejects phrases that are not 12 valid words", () => {
    assert.throws(() => Seed.fromPhrase("one two three"), InvalidInputError);
    assert.throws(() => Seed.fromPhrase(Array(12).fill("zzzz").join(" ")), InvalidInputError);
    assert.throws(() => Seed.fromPhrase(bip39.generateMnemonic(256)), InvalidInputError);
  });

  it("rejects negative key indexes", async () => {
    const { seed } = Seed.generate();
    await assert.rejects(seed.publicKey(-1), InvalidInputError);
  });

  it("is unusable after wipe", async () => {
    const { seed } = Seed.generate();
    seed.wipe();
    await assert.rejects(seed.publicKey(0), SignerUnavailableError);
    await assert.rejects(seed.signHash(0, new Uint8Array(32)), SignerUnavailableError);
  });
});
