import { describe, it, before, after, beforeEach } from "node:test";
import assert from "node:assert/strict";
import { access, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { verifyAsync } from "@noble/ed25519";

import type { Transaction } from "../src/types.js";
import type { CommandContext } from "../src/commands/context.js";
import { broadcastCommand, signCommand, splitCommand, txnCommand } from "../src/commands/txn.js";
import { addrCommand, balanceCommand, historyCommand, parseKeyIndex, seedCommand } from "../src/commands/wallet.js";
import { parseWalletConfig } from "../src/config.js";
import { Seed } from "../src/keys/seed.js";
import { standardAddress, standardUnlockConditions } from "../src/keys/unlock-conditions.js";
import { readTransaction, signedPath, writeTransaction } from "../src/txn/file.js";
import { sigHash, transactionId } from "../src/txn/hash.js";
import { NOTHING_TO_SIGN } from "../src/txn/sign.js";
import { siacoins } from "../src/currency.js";
import { InvalidInputError, UserCancelledError } from "../src/errors.js";
import { FakeLedgerService, FakePrompter, recorder, testAddress, testConditions, testId } from "./helpers.js";

const config = parseWalletConfig({ signer: { mode: "hot" } });
const payee = testAddress(50);

/** A hot wallet with one 100 SC output at key index 0 */
interface Wallet {
  seed: Seed;
  service: FakeLedgerService;
  prompter: FakePrompter;
  lines: string[];
  ctx: CommandContext;
}

async function wallet(answers: boolean[] = []): Promise<Wallet> {
  const { seed, phrase } = Seed.generate();
  const service = new FakeLedgerService();
  service.track(
    { unlockConditions: standardUnlockConditions(await seed.publicKey(0)), keyIndex: 0 },
    { id: testId(1), value: siacoins(100) },
  );
  const prompter = new FakePrompter(answers);
  const { out, lines } = recorder();
  const ctx: CommandContext = {
    config,
    service,
    prompter,
    out,
    log: () => {},
    env: { SIAWATCH_SEED: phrase },
    fetch: async () => {
      throw new Error("no network in tests");
    },
  };
  return { seed, service, prompter, lines, ctx };
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function verifies(txn: Transaction, sigIndex: number, publicKey: Uint8Array): Promise<boolean> {
  const sig = Buffer.from(txn.transactionSignatures[sigIndex].signature, "base64");
  return verifyAsync(sig, sigHash(txn, sigIndex, 300_000, config.network), publicKey);
}

let dir: string;
let n = 0;
const nextFile = () => join(dir, `txn-${++n}.json`);

before(async () => {
  dir = await mkdtemp(join(tmpdir(), "siawatch-cmd-"));
});

after(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("txn", () => {
  it("pays, sends change to a new address and signs", async () => {
    const w = await wallet();
    const file = nextFile();
    const txn = await txnCommand(w.ctx, `${payee}:10`, file, { sign: true });

    const change = standardAddress(await w.seed.publicKey(1));
    // one input, payee + change: 104 + 313 + 2 * 56 bytes at 1 H/byte
    assert.deepEqual(txn.minerFees, [529n]);
    assert.deepEqual(txn.siacoinOutputs, [
      { address: payee, value: siacoins(10) },
      { address: change, value: siacoins(90) - 529n },
    ]);
    assert.deepEqual(w.service.watched.map((i) => i.keyIndex), [1]);
    assert.deepEqual(w.prompter.asked, ["Add this address to your wallet?", "Sign this transaction?"]);

    const written = await readTransaction(file);
    assert.deepEqual(written, txn);
    assert.equal(await verifies(written, 0, await w.seed.publicKey(0)), true);
    assert.equal(w.lines[w.lines.length - 1], `Wrote signed transaction to ${file}`);
    assert.ok(w.lines.includes("This transaction requires a 'change output' that will send excess coins back to your wallet."));
  });

  it("checks its arguments before calling anything", async () => {
    const w = await wallet();
    await assert.rejects(txnCommand(w.ctx, `${payee}:10`, undefined, {}), InvalidInputError);
    await assert.rejects(txnCommand(w.ctx, `${payee}:ten`, nextFile(), {}), InvalidInputError);
    await assert.rejects(txnCommand(w.ctx, `${payee}:10`, nextFile(), { change: "nope" }), InvalidInputError);
    assert.deepEqual(w.service.calls, []);
  });

  it("uses a supplied change address without opening the signer", async () => {
    const w = await wallet();
    const file = nextFile();
    const change = testAddress(60);
    const txn = await txnCommand(w.ctx, `${payee}:10`, file, { change });

    assert.deepEqual(txn.siacoinOutputs[1], { address: change, value: siacoins(90) - 529n });
    assert.deepEqual(w.service.watched, []);
    assert.equal(w.lines.includes("Using SIAWATCH_SEED environment variable"), false);
    assert.ok(w.lines.includes("Transaction has not been signed. You can sign it with the 'sign' command."));
    assert.equal(w.lines[w.lines.length - 1], `Wrote unsigned transaction to ${file}`);
  });

  it("broadcasts instead of writing", async () => {
    const w = await wallet();
    const txn = await txnCommand(w.ctx, `${payee}:10`, undefined, { sign: true, broadcast: true });
    assert.deepEqual(w.service.broadcasts, [[txn]]);
    assert.deepEqual(w.lines.slice(-2), ["Transaction broadcast successfully.", `Transaction ID: ${transactionId(txn)}`]);
  });

  it("writes nothing when signing is declined", async () => {
    const w = await wallet([true, false]);
    const file = nextFile();
    await assert.rejects(txnCommand(w.ctx, `${payee}:10`, file, { sign: true }), UserCancelledError);
    assert.equal(await exists(file), false);
  });

  it("reports a shortfall before deriving any address", async () => {
    const w = await wallet();
    await assert.rejects(txnCommand(w.ctx, `${payee}:100`, nextFile(), {}), {
      name: "InsufficientFundsError",
    });
    assert.deepEqual(w.service.watched, []);
  });
});

describe("split", () => {
  it("creates n equal outputs plus change at a fresh address", async () => {
    const w = await wallet();
    const txn = await splitCommand(w.ctx, "3", "10", nextFile(), {});
    const dest = standardAddress(await w.seed.publicKey(1));
    // one input, three outputs + change: 104 + 313 + 4 * 56
    assert.deepEqual(txn.minerFees, [641n]);
    assert.deepEqual(txn.siacoinOutputs, [
      { address: dest, value: siacoins(10) },
      { address: dest, value: siacoins(10) },
      { address: dest, value: siacoins(10) },
      { address: dest, value: siacoins(70) - 641n },
    ]);
  });

  it("rejects bad counts and amounts", async () => {
    const w = await wallet();
    for (const [count, amount] of [["0", "1"], ["x", "1"], ["2", "0"]]) {
      await assert.rejects(splitCommand(w.ctx, count, amount, nextFile(), {}), InvalidInputError);
    }
    assert.deepEqual(w.service.calls, []);
  });
});

describe("sign and broadcast", () => {
  let w: Wallet;
  let file: string;

  beforeEach(async () => {
    w = await wallet();
    file = nextFile();
    await txnCommand(w.ctx, `${payee}:10`, file, { change: testAddress(60) });
  });

  it("writes a signed copy beside the original", async () => {
    const outcome = await signCommand(w.ctx, file, {});
    assert.equal(outcome.status, "signed");
    const signed = await readTransaction(signedPath(file));
    assert.equal(await verifies(signed, 0, await w.seed.publicKey(0)), true);
    assert.deepEqual(w.lines.slice(-2), [
      `Wrote signed transaction to ${signedPath(file)}.`,
      "You can now use the 'broadcast' command to broadcast this transaction.",
    ]);
  });

  it("relays a signed file", async () => {
    await signCommand(w.ctx, file, {});
    const signed = await readTransaction(signedPath(file));
    const txid = await broadcastCommand(w.ctx, signedPath(file));
    assert.equal(txid, transactionId(signed));
    assert.deepEqual(w.service.broadcasts, [[signed]]);
  });

  async function foreignFile(): Promise<{ path: string; txn: Transaction }> {
    const txn: Transaction = {
      siacoinInputs: [{ parentId: testId(2), unlockConditions: testConditions(9) }],
      siacoinOutputs: [{ address: payee, value: 1n }],
      minerFees: [1n],
      transactionSignatures: [],
    };
    const path = nextFile();
    await writeTransaction(path, txn);
    return { path, txn };
  }

  it("passes a transaction it cannot sign through unchanged", async () => {
    const { path, txn } = await foreignFile();
    const outcome = await signCommand(w.ctx, path, {});
    assert.equal(outcome.status, "nothing-to-sign");
    assert.deepEqual(await readTransaction(signedPath(path)), txn);
    assert.ok(w.lines.includes(NOTHING_TO_SIGN));
    assert.equal(w.lines.includes("Using SIAWATCH_SEED environment variable"), false);
  });

  it("still broadcasts when there is nothing to sign", async () => {
    const { path, txn } = await foreignFile();
    const outcome = await signCommand(w.ctx, path, { broadcast: true });
    assert.equal(outcome.status, "nothing-to-sign");
    assert.deepEqual(w.service.broadcasts, [[txn]]);
    assert.equal(await exists(signedPath(path)), false);
  });
});

describe("wallet commands", () => {
  it("prints the balance including unconfirmed funds", async () => {
    const w = await wallet();
    w.service.balanceValue = siacoins(100);
    await balanceCommand(w.ctx);
    assert.deepEqual(w.lines, ["100 SC"]);
    assert.deepEqual(w.service.calls, ["balance(true)"]);
  });

  it("prints an empty history", async () => {
    const w = await wallet();
    await historyCommand(w.ctx, undefined);
    assert.deepEqual(w.lines, ["No transactions found."]);
    assert.deepEqual(w.service.calls, ["transactions(,100)"]);
  });

  it("prints a fresh 12-word seed", () => {
    const { out, lines } = recorder();
    seedCommand({ out });
    assert.equal(lines.length, 1);
    assert.equal(lines[0].split(" ").length, 12);
  });

  it("warns before reusing an index", async () => {
    const w = await wallet();
    const address = await addrCommand(w.ctx, "0");
    assert.equal(address, standardAddress(await w.seed.publicKey(0)));
    assert.ok(w.lines.includes("WARNING: You have already generated an address with index 0."));
    assert.equal(w.lines[w.lines.length - 1], "Address added successfully.");
  });

  it("picks the lowest unused index", async () => {
    const w = await wallet();
    await addrCommand(w.ctx, undefined);
    assert.equal(w.lines[0], "No index specified; using lowest available index (1)");
    assert.deepEqual(w.service.watched.map((i) => i.keyIndex), [1]);
  });

  it("parses key indexes", () => {
    assert.equal(parseKeyIndex("4294967295"), 0xffff_ffff);
    assert.throws(() => parseKeyIndex("4294967296"), InvalidInputError);
    assert.throws(() => parseKeyIndex("-1"), InvalidInputError);
  });
});
