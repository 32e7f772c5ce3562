/**
 * Coin Selection
 *
 * Largest-first greedy selection with the fee priced per encoded byte.
 * The fee depends on how many inputs are chosen, so it is recomputed after
 * every addition; once enough value is gathered, a second pass re-prices
 * the transaction with a change output if one turned out to be needed.
 *
 * All amounts in hastings.
 */

import type { FundingResult, SizeFn, UTXO, ValuedInput } from "../types.js";
import { InsufficientFundsError } from "../errors.js";
import { estimateTxnSize } from "../txn/size.js";

export interface SelectionOptions {
  /** Outputs the transaction has before any change output */
  numOutputs: number;
  /** Size estimator (default: estimateTxnSize) */
  sizeOf?: SizeFn;
}

/** Stage UTXOs from the ledger service as candidate inputs */
export function toValuedInputs(utxos: UTXO[]): ValuedInput[] {
  return utxos.map((u) => ({
    parentId: u.id,
    unlockConditions: u.unlockConditions,
    value: u.value,
  }));
}

/**
 * Selection order: value descending, then parent id ascending so that equal
 * values always come out the same way.
 */
export function sortForSelection(inputs: readonly ValuedInput[]): ValuedInput[] {
  return [...inputs].sort((a, b) => {
    if (a.value !== b.value) return a.value > b.value ? -1 : 1;
    if (a.parentId === b.parentId) return 0;
    return a.parentId < b.parentId ? -1 : 1;
  });
}

function feeFor(feePerByte: bigint, sizeOf: SizeFn, numInputs: number, numOutputs: number): bigint {
  return feePerByte * BigInt(sizeOf(numInputs, numOutputs));
}

/**
 * Select inputs covering `target` plus the fee for the resulting transaction.
 *
 * The returned values always satisfy `sum(used) == target + fee + change`.
 * A change amount too small to pay for its own output is folded into the fee.
 *
 * @throws InsufficientFundsError if all inputs together cannot cover target + fee
 */
export function selectInputs(
  target: bigint,
  feePerByte: bigint,
  available: readonly ValuedInput[],
  opts: SelectionOptions,
): FundingResult {
  const sizeOf = opts.sizeOf ?? estimateTxnSize;
  const { numOutputs } = opts;

  const used: ValuedInput[] = [];
  let accumulated = 0n;
  let fee = feeFor(feePerByte, sizeOf, 1, numOutputs);

  for (const input of sortForSelection(available)) {
    used.push(input);
    accumulated += input.value;
    fee = feeFor(feePerByte, sizeOf, used.length, numOutputs);
    if (accumulated >= target + fee) {
      return reconcileChange(used, accumulated, target, fee, feePerByte, sizeOf, numOutputs);
    }
  }

  throw new InsufficientFundsError(target + fee, accumulated);
}

/** Second pass: the change output, if any, adds to the size exactly once. */
function reconcileChange(
  used: ValuedInput[],
  accumulated: bigint,
  target: bigint,
  fee: bigint,
  feePerByte: bigint,
  sizeOf: SizeFn,
  numOutputs: number,
): FundingResult {
  const change = accumulated - target - fee;
  if (change === 0n) {
    return { used, fee, change };
  }
  const feeWithChange = feeFor(feePerByte, sizeOf, used.length, numOutputs + 1);
  if (accumulated >= target + feeWithChange) {
    return { used, fee: feeWithChange, change: accumulated - target - feeWithChange };
  }
  return { used, fee: accumulated - target, change: 0n };
}
