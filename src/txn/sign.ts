/**
 * Signing
 *
 * Finds the inputs this wallet controls, adds one whole-transaction
 * signature slot per owned input, and asks the active signer for each
 * signature in input order. Signatures are installed only once every slot
 * has been signed; any failure leaves the caller's draft untouched.
 */

import type { LedgerService, LogFn, OutputFn, Prompter, Transaction, TransactionSignature } from "../types.js";
import { UserCancelledError } from "../errors.js";
import { formatSC } from "../currency.js";
import { addressOf } from "../keys/unlock-conditions.js";
import type { TransactionSigner } from "../keys/signer.js";

// ============================================================================
// Types
// ============================================================================

export type SignOutcome =
  | { status: "signed"; txn: Transaction; signed: number }
  | { status: "nothing-to-sign"; txn: Transaction };

/** One pending signature: which input, which entry in transactionSignatures, which key */
export interface SignatureSlot {
  inputIndex: number;
  sigIndex: number;
  keyIndex: number;
}

/** Progress hooks around each device round trip */
export interface SignProgress {
  start(text: string): void;
  succeed(text: string): void;
  fail(text: string): void;
}

export interface SignOptions {
  /** Current consensus height; selects the protocol version for hot signing */
  height: number;
  prompter: Prompter;
  out?: OutputFn;
  log?: LogFn;
  progress?: SignProgress;
}

// ============================================================================
// Helpers
// ============================================================================

export function standardSignature(parentId: string): TransactionSignature {
  return {
    parentId,
    publicKeyIndex: 0,
    timelock: 0,
    wholeTransaction: true,
    signature: "",
  };
}

function cloneTransaction(txn: Transaction): Transaction {
  return {
    siacoinInputs: txn.siacoinInputs.map((i) => ({ ...i })),
    siacoinOutputs: txn.siacoinOutputs.map((o) => ({ ...o })),
    minerFees: [...txn.minerFees],
    transactionSignatures: txn.transactionSignatures.map((s) => ({ ...s })),
  };
}

/**
 * Map each wallet address spent by `txn` to its key index. Inputs whose
 * address the service does not track are left out.
 */
export async function resolveOwnedKeys(
  service: LedgerService,
  txn: Transaction,
): Promise<Map<string, number>> {
  const tracked = new Set(await service.addresses());
  const owned = new Map<string, number>();
  for (const input of txn.siacoinInputs) {
    const addr = addressOf(input.unlockConditions);
    if (tracked.has(addr) && !owned.has(addr)) {
      const info = await service.addressInfo(addr);
      owned.set(addr, info.keyIndex);
    }
  }
  return owned;
}

/** Lines describing what the signer is about to approve */
export function describeTransaction(txn: Transaction): string[] {
  const lines = txn.siacoinOutputs.map((o) => `    ${o.address} receiving ${formatSC(o.value)} SC`);
  for (const fee of txn.minerFees) {
    lines.push(`    A miner fee of ${formatSC(fee)} SC`);
  }
  return lines;
}

// ============================================================================
// Orchestrator
// ============================================================================

export const NOTHING_TO_SIGN = "Nothing to sign: transaction does not spend any outputs recognized by this wallet";

/** Tell the user nothing was signed; the transaction goes on unchanged */
export function nothingToSign(txn: Transaction, out: OutputFn): SignOutcome {
  out(NOTHING_TO_SIGN);
  return { status: "nothing-to-sign", txn };
}

/**
 * Sign every input of `txn` whose address appears in `owned`.
 *
 * @param owned - address → key index for wallet-owned addresses
 * @returns "nothing-to-sign" (with the original draft) when no input is owned
 * @throws UserCancelledError if the user declines; SignerUnavailableError on device failure
 */
export async function signTransaction(
  txn: Transaction,
  owned: ReadonlyMap<string, number>,
  signer: TransactionSigner,
  opts: SignOptions,
): Promise<SignOutcome> {
  const out = opts.out ?? (() => {});
  const log = opts.log ?? (() => {});

  const draft = cloneTransaction(txn);
  const slots: SignatureSlot[] = [];
  txn.siacoinInputs.forEach((input, inputIndex) => {
    const keyIndex = owned.get(addressOf(input.unlockConditions));
    if (keyIndex === undefined) return;
    draft.transactionSignatures.push(standardSignature(input.parentId));
    slots.push({ inputIndex, sigIndex: draft.transactionSignatures.length - 1, keyIndex });
  });

  if (slots.length === 0) {
    return nothingToSign(txn, out);
  }
  log("info", `siawatch: ${slots.length} input(s) to sign with ${signer.kind} signer`);

  if (signer.kind === "hot") {
    out("Please verify the transaction details:");
    describeTransaction(draft).forEach((line) => out(line));
    if (!(await opts.prompter.confirm("Sign this transaction?"))) {
      throw new UserCancelledError();
    }
  } else {
    out("Please verify the transaction details on your device. You should see:");
    describeTransaction(draft).forEach((line) => out(line));
    if (slots.length > 1) {
      out(`Each signature must be completed separately, so you will be prompted ${slots.length} times.`);
    }
  }

  // Strictly sequential: the device accepts one request at a time.
  const signatures: Uint8Array[] = [];
  for (const slot of slots) {
    const label = `input ${slot.inputIndex}, key ${slot.keyIndex}`;
    opts.progress?.start(`Waiting for signature for ${label}...`);
    try {
      signatures.push(await signer.signInput(draft, slot.sigIndex, slot.keyIndex, opts.height));
    } catch (err) {
      opts.progress?.fail(`Signature for ${label} failed`);
      throw err;
    }
    opts.progress?.succeed(`Signed ${label}`);
  }

  slots.forEach((slot, i) => {
    draft.transactionSignatures[slot.sigIndex].signature = Buffer.from(signatures[i]).toString("base64");
  });
  return { status: "signed", txn: draft, signed: slots.length };
}
