/**
 * Output splitting
 *
 * Funds `n` equal outputs plus change, used to pre-split a wallet's UTXO
 * set into uniformly sized pieces.
 */

import type { FundingResult, SizeFn, ValuedInput } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { selectInputs } from "./selection.js";

export function splitInputs(
  n: number,
  perOutputValue: bigint,
  feePerByte: bigint,
  available: readonly ValuedInput[],
  opts: { sizeOf?: SizeFn } = {},
): FundingResult {
  if (!Number.isSafeInteger(n) || n < 1) {
    throw new InvalidInputError(`Number of outputs must be a positive integer, got ${n}`);
  }
  if (perOutputValue <= 0n) {
    throw new InvalidInputError("Output value must be positive");
  }
  return selectInputs(BigInt(n) * perOutputValue, feePerByte, available, {
    numOutputs: n,
    sizeOf: opts.sizeOf,
  });
}
