/**
 * Read-only and address commands
 */

import { InvalidInputError } from "../errors.js";
import { formatCurrency } from "../currency.js";
import { parseAddress } from "../keys/address.js";
import { Seed } from "../keys/seed.js";
import { nextUnusedIndex, registerAddress } from "../keys/change.js";
import { addressDeps, withSession, type CommandContext } from "./context.js";

const HISTORY_MAX = 100;

export async function balanceCommand(ctx: CommandContext): Promise<void> {
  const bal = await ctx.service.balance(true);
  ctx.out(formatCurrency(bal));
}

export async function addressesCommand(ctx: CommandContext): Promise<void> {
  for (const addr of await ctx.service.addresses()) {
    ctx.out(addr);
  }
}

/** Print a fresh seed phrase. The seed is wiped before returning. */
export function seedCommand(ctx: Pick<CommandContext, "out">): void {
  const { seed, phrase } = Seed.generate();
  seed.wipe();
  ctx.out(phrase);
}

export async function historyCommand(ctx: CommandContext, address: string | undefined): Promise<void> {
  const addr = address === undefined ? undefined : parseAddress(address);
  const ids = await ctx.service.transactions(addr, HISTORY_MAX);
  if (ids.length === 0) {
    ctx.out("No transactions found.");
    return;
  }
  ids.forEach((id) => ctx.out(id));
}

export function parseKeyIndex(arg: string): number {
  if (!/^\d+$/.test(arg)) {
    throw new InvalidInputError(`Invalid index "${arg}"`);
  }
  const index = Number(arg);
  if (index > 0xffff_ffff) {
    throw new InvalidInputError(`Index ${arg} is out of range`);
  }
  return index;
}

/**
 * Generate an address at `indexArg`, or at the lowest unused index, and add
 * it to the wallet.
 */
export async function addrCommand(ctx: CommandContext, indexArg: string | undefined): Promise<string> {
  let index: number;
  if (indexArg === undefined) {
    index = await nextUnusedIndex(ctx.service, ctx.config.wallet.indexSource);
    ctx.out(`No index specified; using lowest available index (${index})`);
  } else {
    index = parseKeyIndex(indexArg);
    for (const addr of await ctx.service.addresses()) {
      const info = await ctx.service.addressInfo(addr);
      if (info.keyIndex === index) {
        ctx.out(`WARNING: You have already generated an address with index ${index}.`);
      }
    }
  }

  return withSession(ctx, async (session) => {
    const address = await registerAddress(index, addressDeps(ctx, session));
    ctx.out("Address added successfully.");
    return address;
  });
}
