/**
 * Key session
 *
 * At most one signer per command, opened on first use and released when the
 * command ends: the device connection is closed, the seed is wiped.
 */

import type { LogFn, OutputFn, Prompter, WalletConfig } from "../types.js";
import { SignerUnavailableError } from "../errors.js";
import { HttpApduTransport, type ApduTransport } from "../device/transport.js";
import { LedgerDevice } from "../device/ledger.js";
import { Seed } from "./seed.js";
import { SeedSigner, type TransactionSigner } from "./signer.js";

export interface KeySessionOptions {
  config: WalletConfig;
  prompter: Prompter;
  env?: NodeJS.ProcessEnv;
  out?: OutputFn;
  log?: LogFn;
  /** Device transport factory (default: HTTP bridge from config) */
  openTransport?: () => ApduTransport;
}

export class KeySession {
  private readonly opts: KeySessionOptions;
  private opening: Promise<TransactionSigner> | null = null;

  constructor(opts: KeySessionOptions) {
    this.opts = opts;
  }

  /** The session's signer, opened on the first call */
  signer(): Promise<TransactionSigner> {
    if (!this.opening) {
      this.opening = this.open();
    }
    return this.opening;
  }

  get opened(): boolean {
    return this.opening !== null;
  }

  private async open(): Promise<TransactionSigner> {
    const { config, log } = this.opts;
    if (config.signer.mode === "device") {
      const transport =
        this.opts.openTransport?.() ??
        new HttpApduTransport({ bridgeUrl: config.device.bridgeUrl, timeoutMs: config.device.timeoutMs });
      return LedgerDevice.open(transport, log);
    }

    const env = this.opts.env ?? process.env;
    let phrase = env[config.signer.seedEnv];
    if (phrase) {
      this.opts.out?.(`Using ${config.signer.seedEnv} environment variable`);
    } else {
      phrase = await this.opts.prompter.secret("Seed:");
    }
    if (!phrase || phrase.trim() === "") {
      throw new SignerUnavailableError("No seed supplied");
    }
    return new SeedSigner(Seed.fromPhrase(phrase), config.network);
  }

  /** Close the signer if one was opened. Safe to call more than once. */
  async release(): Promise<void> {
    const opening = this.opening;
    this.opening = null;
    if (!opening) return;
    let signer: TransactionSigner;
    try {
      signer = await opening;
    } catch (err: unknown) {
      // open() failed; it already cleaned up after itself
      this.opts.log?.("info", `siawatch: signer was never opened: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }
    await signer.close();
  }
}

/** Run `fn` with a fresh session, always releasing it afterwards */
export async function withKeySession<T>(
  opts: KeySessionOptions,
  fn: (session: KeySession) => Promise<T>,
): Promise<T> {
  const session = new KeySession(opts);
  try {
    return await fn(session);
  } finally {
    await session.release();
  }
}
