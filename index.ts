#!/usr/bin/env node
/**
 * siawatch: command-line wallet for a watch-only ledger service
 *
 * The service tracks the wallet's addresses and outputs; keys stay on a
 * hardware device (default) or in a seed phrase supplied at signing time
 * (--hot). This entry point wires configuration, logging, prompts and the
 * service client into the command flows under src/commands/.
 */

import { Command } from "commander";
import chalk from "chalk";
import ora, { type Ora } from "ora";

import { resolveConfig } from "./src/config.js";
import { isWalletError, UserCancelledError } from "./src/errors.js";
import { WatchClient } from "./src/api/watch-client.js";
import { createLogger } from "./src/cli/logger.js";
import { TerminalPrompter } from "./src/cli/prompt.js";
import type { CommandContext } from "./src/commands/context.js";
import { addrCommand, addressesCommand, balanceCommand, historyCommand, seedCommand } from "./src/commands/wallet.js";
import { broadcastCommand, signCommand, splitCommand, txnCommand, type TxnFlags, type BuildFlags } from "./src/commands/txn.js";
import type { SignProgress } from "./src/txn/sign.js";

const VERSION = "0.1.0";

interface GlobalOptions {
  api?: string;
  hot?: boolean;
  config?: string;
  verbose?: boolean;
  yes?: boolean;
}

const EXIT_FAILURE = 1;
const EXIT_CANCELLED = 130;

// ============================================================================
// Wiring
// ============================================================================

function spinnerProgress(): SignProgress {
  let spinner: Ora | null = null;
  return {
    start(text) {
      spinner = ora({ text, stream: process.stderr }).start();
    },
    succeed(text) {
      spinner?.succeed(text);
      spinner = null;
    },
    fail(text) {
      spinner?.fail(text);
      spinner = null;
    },
  };
}

async function buildContext(opts: GlobalOptions): Promise<CommandContext> {
  const config = await resolveConfig({ file: opts.config, flags: { api: opts.api, hot: opts.hot } });
  const log = createLogger({ verbose: opts.verbose ?? false });
  return {
    config,
    service: new WatchClient(config.api.address, { log }),
    prompter: new TerminalPrompter({ assumeYes: opts.yes }),
    out: (line) => console.log(line),
    log,
    progress: config.signer.mode === "device" ? spinnerProgress() : undefined,
  };
}

function reportError(context: string, err: unknown): number {
  if (err instanceof UserCancelledError) {
    console.error(chalk.yellow("Cancelled."));
    return EXIT_CANCELLED;
  }
  const msg = err instanceof Error ? err.message : String(err);
  console.error(chalk.red(`${context}: ${msg}`));
  if (!isWalletError(err) && err instanceof Error && err.stack) {
    console.error(chalk.dim(err.stack));
  }
  return EXIT_FAILURE;
}

const program = new Command();

async function run(context: string, fn: (ctx: CommandContext) => Promise<unknown>): Promise<void> {
  try {
    const ctx = await buildContext(program.opts<GlobalOptions>());
    await fn(ctx);
  } catch (err: unknown) {
    process.exitCode = reportError(context, err);
  }
}

function printVersion(): void {
  console.log(`siawatch v${VERSION}`);
  console.log(`Node version: ${process.version} ${process.platform}/${process.arch}`);
}

// ============================================================================
// Commands
// ============================================================================

program
  .name("siawatch")
  .description("Watch-only wallet client with hardware and seed signing")
  .option("-a, --api <address>", "host:port or URL of the wallet service")
  .option("--hot", "use a seed phrase instead of a hardware device")
  .option("-c, --config <file>", "JSON config file")
  .option("-y, --yes", "answer yes to confirmation prompts")
  .option("-v, --verbose", "print diagnostic logs to stderr")
  .action(() => printVersion());

program.command("version").description("print version information").action(() => printVersion());

program
  .command("seed")
  .description("generate a random seed phrase")
  .action(() => seedCommand({ out: (line) => console.log(line) }));

program
  .command("balance")
  .description("view current balance")
  .action(() => run("Could not get balance", balanceCommand));

program
  .command("addresses")
  .description("list addresses known to the wallet")
  .action(() => run("Could not get address list", addressesCommand));

program
  .command("addr")
  .description("generate an address and add it to the wallet (default: lowest unused index)")
  .argument("[index]", "key index")
  .action((index: string | undefined) => run("Could not generate address", (ctx) => addrCommand(ctx, index)));

program
  .command("history")
  .description("list transaction ids, optionally for one address")
  .argument("[address]")
  .action((address: string | undefined) => run("Could not get history", (ctx) => historyCommand(ctx, address)));

program
  .command("txn")
  .description("create a transaction paying address:amount pairs (amounts in SC)")
  .argument("<outputs>", "comma-separated address:amount pairs")
  .argument("[file]", "where to write the transaction (omit with --broadcast)")
  .option("--sign", "sign the transaction")
  .option("--broadcast", "broadcast the transaction")
  .option("--change <address>", "use this change address instead of generating one")
  .action((outputs: string, file: string | undefined, flags: TxnFlags) =>
    run("Could not create transaction", (ctx) => txnCommand(ctx, outputs, file, flags)),
  );

program
  .command("split")
  .description("create a transaction with n outputs of equal value to a fresh wallet address")
  .argument("<n>", "number of outputs")
  .argument("<amount>", "value of each output in SC")
  .argument("[file]", "where to write the transaction (omit with --broadcast)")
  .option("--sign", "sign the transaction")
  .option("--broadcast", "broadcast the transaction")
  .action((n: string, amount: string, file: string | undefined, flags: BuildFlags) =>
    run("Could not create transaction", (ctx) => splitCommand(ctx, n, amount, file, flags)),
  );

program
  .command("sign")
  .description("sign the inputs of a transaction that the wallet controls")
  .argument("<file>")
  .option("--broadcast", "broadcast instead of writing the signed file")
  .action((file: string, flags: { broadcast?: boolean }) =>
    run("Could not sign transaction", (ctx) => signCommand(ctx, file, flags)),
  );

program
  .command("broadcast")
  .description("broadcast a signed transaction")
  .argument("<file>")
  .action((file: string) => run("Could not broadcast transaction", (ctx) => broadcastCommand(ctx, file)));

process.on("SIGINT", () => {
  console.error(chalk.yellow("\nCancelled."));
  process.exit(EXIT_CANCELLED);
});

await program.parseAsync();
