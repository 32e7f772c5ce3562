/**
 * In-process stand-ins shared by the tests.
 */

import type {
  ConsensusInfo,
  Currency,
  LedgerService,
  OutputFn,
  Prompter,
  SeedAddressInfo,
  Transaction,
  UnlockConditions,
  UTXO,
  ValuedInput,
} from "../src/types.js";
import { RemoteError } from "../src/errors.js";
import { formatAddress } from "../src/keys/address.js";
import { addressOf, standardUnlockConditions } from "../src/keys/unlock-conditions.js";
import type { TransactionSigner } from "../src/keys/signer.js";

/** 32-byte id whose hex form ends in `n` */
export function testId(n: number): string {
  return n.toString(16).padStart(64, "0");
}

/** A valid address with every hash byte set to `n` */
export function testAddress(n: number): string {
  return formatAddress(new Uint8Array(32).fill(n));
}

/** Unlock conditions for a made-up public key with every byte set to `n` */
export function testConditions(n: number): UnlockConditions {
  return standardUnlockConditions(new Uint8Array(32).fill(n));
}

export function valued(n: number, value: Currency): ValuedInput {
  return { parentId: testId(n), unlockConditions: testConditions(n), value };
}

export function emptyTransaction(): Transaction {
  return { siacoinInputs: [], siacoinOutputs: [], minerFees: [], transactionSignatures: [] };
}

export function recorder(): { out: OutputFn; lines: string[] } {
  const lines: string[] = [];
  return { out: (line) => lines.push(line), lines };
}

export class FakePrompter implements Prompter {
  readonly asked: string[] = [];
  private readonly answers: boolean[];
  private readonly secrets: string[];

  /** Unscripted confirmations answer yes. */
  constructor(answers: boolean[] = [], secrets: string[] = []) {
    this.answers = [...answers];
    this.secrets = [...secrets];
  }

  async confirm(message: string): Promise<boolean> {
    this.asked.push(message);
    return this.answers.shift() ?? true;
  }

  async secret(message: string): Promise<string> {
    this.asked.push(message);
    return this.secrets.shift() ?? "";
  }
}

export class FakeLedgerService implements LedgerService {
  readonly name = "fake";
  readonly infos = new Map<string, SeedAddressInfo>();
  readonly watched: SeedAddressInfo[] = [];
  readonly broadcasts: Transaction[][] = [];
  readonly calls: string[] = [];
  utxos: UTXO[] = [];
  fee: Currency = 1n;
  consensusInfo: ConsensusInfo = { height: 300_000, ccid: testId(99) };
  seedIndex = 0;
  balanceValue: Currency = 0n;
  history: string[] = [];
  broadcastError: Error | null = null;

  /** Track an address and optionally give it one unspent output */
  track(info: SeedAddressInfo, utxo?: { id: string; value: Currency }): string {
    const address = addressOf(info.unlockConditions);
    this.infos.set(address, info);
    if (utxo) {
      this.utxos.push({ ...utxo, unlockConditions: info.unlockConditions, address, keyIndex: info.keyIndex });
    }
    return address;
  }

  async balance(limbo: boolean): Promise<Currency> {
    this.calls.push(`balance(${limbo})`);
    return this.balanceValue;
  }

  async addresses(): Promise<string[]> {
    this.calls.push("addresses");
    return [...this.infos.keys()];
  }

  async addressInfo(address: string): Promise<SeedAddressInfo> {
    this.calls.push("addressInfo");
    const info = this.infos.get(address);
    if (!info) throw new RemoteError(this.name, "address not found", 404);
    return info;
  }

  async watchAddress(info: SeedAddressInfo): Promise<void> {
    this.calls.push("watchAddress");
    this.watched.push(info);
    this.track(info);
  }

  async unspentOutputs(limbo: boolean): Promise<UTXO[]> {
    this.calls.push(`unspentOutputs(${limbo})`);
    return this.utxos;
  }

  async recommendedFee(): Promise<Currency> {
    this.calls.push("recommendedFee");
    return this.fee;
  }

  async consensus(): Promise<ConsensusInfo> {
    this.calls.push("consensus");
    return this.consensusInfo;
  }

  async transactions(address: string | undefined, max: number): Promise<string[]> {
    this.calls.push(`transactions(${address ?? ""},${max})`);
    return this.history;
  }

  async nextSeedIndex(): Promise<number> {
    this.calls.push("nextSeedIndex");
    return this.seedIndex;
  }

  async broadcast(txnSet: Transaction[]): Promise<void> {
    this.calls.push("broadcast");
    if (this.broadcastError) throw this.broadcastError;
    this.broadcasts.push(txnSet);
  }
}

/**
 * Signer whose keys are made-up bytes; `sign` decides each signature, and may
 * throw to simulate a rejection.
 */
export class ScriptedSigner implements TransactionSigner {
  readonly kind: "device" | "hot";
  readonly requests: Array<{ sigIndex: number; keyIndex: number }> = [];
  closed = false;
  private readonly sign: (call: number) => Uint8Array;

  constructor(kind: "device" | "hot", sign: (call: number) => Uint8Array = () => new Uint8Array(64).fill(7)) {
    this.kind = kind;
    this.sign = sign;
  }

  async publicKey(index: number): Promise<Uint8Array> {
    return new Uint8Array(32).fill(index + 1);
  }

  async signInput(_txn: Transaction, sigIndex: number, keyIndex: number): Promise<Uint8Array> {
    this.requests.push({ sigIndex, keyIndex });
    return this.sign(this.requests.length);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
