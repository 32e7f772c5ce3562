/**
 * Transaction commands
 *
 * txn:       build a payment (optionally sign and broadcast)
 * split:     build n equal outputs to a fresh wallet address
 * sign:      sign a transaction file
 * broadcast: relay a signed transaction file
 *
 * All argument checks happen before the first network or device call.
 * Nothing is written or broadcast after a cancellation or failed signature.
 */

import type { Currency, FundingResult, Transaction } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { formatCurrency, parseCurrency, sumCurrency } from "../currency.js";
import { parseAddress } from "../keys/address.js";
import { allocateChangeAddress } from "../keys/change.js";
import type { KeySession } from "../keys/session.js";
import { discoverDonationAddress } from "../api/donation.js";
import { toValuedInputs } from "../utxo/selection.js";
import { splitInputs } from "../utxo/split.js";
import {
  assemblePayment,
  assembleSplit,
  parseOutputs,
  planPayment,
  summarizeTransaction,
  type PaymentPlan,
} from "../txn/builder.js";
import { nothingToSign, resolveOwnedKeys, signTransaction, type SignOutcome } from "../txn/sign.js";
import { broadcastTransaction } from "../txn/broadcaster.js";
import { readTransaction, signedPath, writeTransaction } from "../txn/file.js";
import { addressDeps, plural, withSession, type CommandContext } from "./context.js";

export interface BuildFlags {
  sign?: boolean;
  broadcast?: boolean;
}

export interface TxnFlags extends BuildFlags {
  /** Change address to use instead of generating one */
  change?: string;
}

function requireDestination(file: string | undefined, flags: BuildFlags): void {
  if (!file && !flags.broadcast) {
    throw new InvalidInputError("A transaction file is required unless --broadcast is given");
  }
}

async function fundingSources(ctx: CommandContext) {
  const utxos = await ctx.service.unspentOutputs(false);
  const feePerByte = await ctx.service.recommendedFee();
  return { available: toValuedInputs(utxos), feePerByte };
}

function inputTotal(funding: FundingResult): Currency {
  return sumCurrency(funding.used.map((u) => u.value));
}

function printPaymentSummary(
  ctx: CommandContext,
  plan: PaymentPlan,
  payment: Currency,
  numRecipients: number,
  feePerByte: Currency,
): void {
  const n = plan.used.length;
  ctx.out("Transaction summary:");
  ctx.out(`- ${n} input${plural(n)}, totalling ${formatCurrency(inputTotal(plan))}`);
  ctx.out(`- ${numRecipients} output${plural(numRecipients)}, totalling ${formatCurrency(payment)}`);
  if (plan.donation > 0n) {
    ctx.out(`  (plus a donation of ${formatCurrency(plan.donation)} to the wallet service)`);
  }
  if (plan.change > 0n) {
    ctx.out(`  (plus a change output, sending ${formatCurrency(plan.change)} back to your wallet)`);
  }
  ctx.out(`- A miner fee of ${formatCurrency(plan.fee)}, which is ${formatCurrency(feePerByte)}/byte`);
  ctx.out("");
}

/** Sign `txn` with the session's signer. */
export async function signWithSession(
  ctx: CommandContext,
  session: KeySession,
  txn: Transaction,
): Promise<SignOutcome> {
  const owned = await resolveOwnedKeys(ctx.service, txn);
  if (owned.size === 0) {
    return nothingToSign(txn, ctx.out);
  }
  const { height } = await ctx.service.consensus();
  const signer = await session.signer();
  return signTransaction(txn, owned, signer, {
    height,
    prompter: ctx.prompter,
    out: ctx.out,
    log: ctx.log,
    progress: ctx.progress,
  });
}

async function broadcastFlow(ctx: CommandContext, txn: Transaction): Promise<string> {
  const { txid } = await broadcastTransaction(txn, ctx.service, { log: ctx.log });
  ctx.out("Transaction broadcast successfully.");
  ctx.out(`Transaction ID: ${txid}`);
  return txid;
}

/** Sign if asked, then broadcast or write the result */
async function finish(
  ctx: CommandContext,
  session: KeySession,
  txn: Transaction,
  file: string | undefined,
  flags: BuildFlags,
): Promise<Transaction> {
  let result = txn;
  let signed = false;
  if (flags.sign) {
    const outcome = await signWithSession(ctx, session, txn);
    result = outcome.txn;
    signed = outcome.status === "signed";
  } else {
    ctx.out("Transaction has not been signed. You can sign it with the 'sign' command.");
  }

  if (flags.broadcast) {
    await broadcastFlow(ctx, result);
    return result;
  }
  if (file) {
    await writeTransaction(file, result);
    ctx.out(`Wrote ${signed ? "signed" : "unsigned"} transaction to ${file}`);
  }
  return result;
}

export async function txnCommand(
  ctx: CommandContext,
  outputsArg: string,
  file: string | undefined,
  flags: TxnFlags,
): Promise<Transaction> {
  const recipients = parseOutputs(outputsArg);
  requireDestination(file, flags);
  const changeOverride = flags.change === undefined ? undefined : parseAddress(flags.change);

  const donationAddress = ctx.config.donations.enabled
    ? await discoverDonationAddress(ctx.config.api.address, ctx.fetch, ctx.log)
    : undefined;
  const { available, feePerByte } = await fundingSources(ctx);
  const plan = planPayment({ recipients, feePerByte, available, donationAddress });

  return withSession(ctx, async (session) => {
    let changeAddress: string | undefined;
    if (plan.change > 0n) {
      if (changeOverride === undefined) {
        ctx.out("This transaction requires a 'change output' that will send excess coins back to your wallet.");
        ctx.out("(You may use the --change flag to specify a change address in advance.)");
      }
      changeAddress = await allocateChangeAddress(changeOverride, addressDeps(ctx, session));
      ctx.out("");
    }
    const txn = assemblePayment(plan, recipients, changeAddress);
    const payment = sumCurrency(recipients.map((r) => r.value));
    printPaymentSummary(ctx, plan, payment, recipients.length, feePerByte);
    return finish(ctx, session, txn, file, flags);
  });
}

export async function splitCommand(
  ctx: CommandContext,
  nArg: string,
  amountArg: string,
  file: string | undefined,
  flags: BuildFlags,
): Promise<Transaction> {
  if (!/^\d+$/.test(nArg) || Number(nArg) < 1 || !Number.isSafeInteger(Number(nArg))) {
    throw new InvalidInputError(`Invalid number of outputs "${nArg}"`);
  }
  const n = Number(nArg);
  const perOutput = parseCurrency(amountArg);
  if (perOutput === 0n) {
    throw new InvalidInputError("Output amount must be positive");
  }
  requireDestination(file, flags);

  const { available, feePerByte } = await fundingSources(ctx);
  const funding = splitInputs(n, perOutput, feePerByte, available);

  return withSession(ctx, async (session) => {
    const destination = await allocateChangeAddress(undefined, addressDeps(ctx, session));
    ctx.out("");
    const txn = assembleSplit(funding, n, perOutput, destination);
    const inputs = funding.used.length;
    ctx.out("Transaction summary:");
    ctx.out(`- ${inputs} input${plural(inputs)}, totalling ${formatCurrency(inputTotal(funding))}`);
    ctx.out(`- ${n} output${plural(n)} of ${formatCurrency(perOutput)} each`);
    if (funding.change > 0n) {
      ctx.out(`  (plus a change output of ${formatCurrency(funding.change)})`);
    }
    ctx.out(`- A miner fee of ${formatCurrency(funding.fee)}, which is ${formatCurrency(feePerByte)}/byte`);
    ctx.out("");
    return finish(ctx, session, txn, file, flags);
  });
}

export async function signCommand(ctx: CommandContext, file: string, flags: { broadcast?: boolean }): Promise<SignOutcome> {
  const txn = await readTransaction(file);
  const outcome = await withSession(ctx, (session) => signWithSession(ctx, session, txn));

  if (flags.broadcast) {
    await broadcastFlow(ctx, outcome.txn);
  } else {
    const dest = signedPath(file);
    await writeTransaction(dest, outcome.txn);
    ctx.out(`Wrote signed transaction to ${dest}.`);
    ctx.out("You can now use the 'broadcast' command to broadcast this transaction.");
  }
  return outcome;
}

export async function broadcastCommand(ctx: CommandContext, file: string): Promise<string> {
  const txn = await readTransaction(file);
  summarizeTransaction(txn).forEach((line) => ctx.out(line));
  return broadcastFlow(ctx, txn);
}
