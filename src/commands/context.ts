/**
 * Command context
 *
 * Everything a command touches from the outside world, injected so the
 * flows can run against in-memory stand-ins.
 */

import type { LedgerService, LogFn, OutputFn, Prompter, WalletConfig } from "../types.js";
import type { ApduTransport } from "../device/transport.js";
import type { SignProgress } from "../txn/sign.js";
import { KeySession, withKeySession } from "../keys/session.js";
import type { AddressDeps } from "../keys/change.js";

export interface CommandContext {
  config: WalletConfig;
  service: LedgerService;
  prompter: Prompter;
  out: OutputFn;
  log: LogFn;
  /** Used for donation discovery (default: global fetch) */
  fetch?: typeof fetch;
  env?: NodeJS.ProcessEnv;
  openTransport?: () => ApduTransport;
  progress?: SignProgress;
}

export function plural(n: number): string {
  return n === 1 ? "" : "s";
}

export function withSession<T>(ctx: CommandContext, fn: (session: KeySession) => Promise<T>): Promise<T> {
  return withKeySession(
    {
      config: ctx.config,
      prompter: ctx.prompter,
      env: ctx.env,
      out: ctx.out,
      log: ctx.log,
      openTransport: ctx.openTransport,
    },
    fn,
  );
}

export function addressDeps(ctx: CommandContext, session: KeySession): AddressDeps {
  return {
    service: ctx.service,
    signer: () => session.signer(),
    prompter: ctx.prompter,
    indexSource: ctx.config.wallet.indexSource,
    out: ctx.out,
    log: ctx.log,
  };
}
