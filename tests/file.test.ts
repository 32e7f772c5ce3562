import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

import type { Transaction } from "../src/types.js";
import { readTransaction, signedPath, writeTransaction } from "../src/txn/file.js";
import { transactionToJSON } from "../src/txn/json.js";
import { standardSignature } from "../src/txn/sign.js";
import { siacoins } from "../src/currency.js";
import { InvalidInputError } from "../src/errors.js";
import { testAddress, testConditions, testId } from "./helpers.js";

function sample(): Transaction {
  return {
    siacoinInputs: [{ parentId: testId(1), unlockConditions: testConditions(1) }],
    siacoinOutputs: [
      { address: testAddress(2), value: siacoins(5) },
      { address: testAddress(3), value: 123n },
    ],
    minerFees: [siacoins(1)],
    transactionSignatures: [{ ...standardSignature(testId(1)), signature: "c2lnbmF0dXJl" }],
  };
}

describe("transaction files", () => {
  let dir: string;

  before(async () => {
    dir = await mkdtemp(join(tmpdir(), "siawatch-test-"));
  });

  after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("writes indented JSON and reads it back", async () => {
    const path = join(dir, "txn.json");
    await writeTransaction(path, sample());
    const text = await readFile(path, "utf-8");
    assert.equal(text, `${JSON.stringify(transactionToJSON(sample()), null, "  ")}\n`);
    assert.deepEqual(await readTransaction(path), sample());
  });

  it("creates owner-only files and leaves no temp files behind", async () => {
    const sub = join(dir, "nested", "deeper");
    const path = join(sub, "out.json");
    await writeTransaction(path, sample());
    assert.equal((await stat(path)).mode & 0o777, 0o600);
    assert.deepEqual(await readdir(sub), ["out.json"]);
  });

  it("accepts null lists", async () => {
    const path = join(dir, "nulls.json");
    const json = {
      siacoininputs: null,
      siacoinoutputs: null,
      minerfees: null,
      transactionsignatures: null,
      filecontracts: null,
    };
    await writeFile(path, JSON.stringify(json));
    assert.deepEqual(await readTransaction(path), {
      siacoinInputs: [],
      siacoinOutputs: [],
      minerFees: [],
      transactionSignatures: [],
    });
  });

  it("reports a missing file", async () => {
    await assert.rejects(readTransaction(join(dir, "absent.json")), (err: unknown) => {
      assert.ok(err instanceof InvalidInputError);
      assert.match(err.message, /^Could not read transaction file: /);
      return true;
    });
  });

  it("reports malformed JSON", async () => {
    const path = join(dir, "bad.json");
    await writeFile(path, "{ not json");
    await assert.rejects(readTransaction(path), (err: unknown) => {
      assert.ok(err instanceof InvalidInputError);
      assert.ok(err.message.startsWith(`Transaction file ${path} is not valid JSON: `));
      return true;
    });
  });

  it("rejects documents that are not transactions", async () => {
    const path = join(dir, "wrong.json");
    const json = { ...transactionToJSON(sample()), minerfees: [-1] };
    await writeFile(path, JSON.stringify(json));
    await assert.rejects(readTransaction(path), (err: unknown) => {
      assert.ok(err instanceof InvalidInputError);
      assert.match(err.message, /^Invalid transaction \(\/minerfees/);
      return true;
    });
  });

  it("rejects transactions using features this wallet never creates", async () => {
    const path = join(dir, "contracts.json");
    const json = { ...transactionToJSON(sample()), filecontracts: [{}] };
    await writeFile(path, JSON.stringify(json));
    await assert.rejects(readTransaction(path), InvalidInputError);
  });
});

describe("signedPath", () => {
  it("inserts -signed before the extension", () => {
    assert.equal(signedPath("txn.json"), "txn-signed.json");
    assert.equal(signedPath("/tmp/a.b/txn"), "/tmp/a.b/txn-signed");
    assert.equal(signedPath("out/pay.txn.json"), "out/pay.txn-signed.json");
  });
});
