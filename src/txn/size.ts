/**
 * Transaction size estimation
 *
 * Upper bound on the encoded size of a standard transaction: every input is
 * spent by a single ed25519 key and carries one whole-transaction signature;
 * there is one miner fee; currencies are priced at 16 bytes.
 */

import type { SizeFn } from "../types.js";

/** parent id + unlock conditions (one key) */
const INPUT_BYTES = 32 + (8 + 8 + (16 + 8 + 32) + 8);

/** parent id + key index + timelock + covered fields + signature */
const SIGNATURE_BYTES = 32 + 8 + 8 + (1 + 10 * 8) + (8 + 64);

/** value + unlock hash */
const OUTPUT_BYTES = 8 + 16 + 32;

/** list lengths + one miner fee */
const BASE_BYTES = 8 + 8 + 5 * 8 + (8 + 8 + 16) + 8 + 8;

export const PER_INPUT_BYTES = INPUT_BYTES + SIGNATURE_BYTES;
export const PER_OUTPUT_BYTES = OUTPUT_BYTES;
export const BASE_TXN_BYTES = BASE_BYTES;

export const estimateTxnSize: SizeFn = (numInputs, numOutputs) =>
  BASE_BYTES + numInputs * PER_INPUT_BYTES + numOutputs * PER_OUTPUT_BYTES;
