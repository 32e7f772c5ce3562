/**
 * Transaction builder
 *
 * Turns recipients and the wallet's spendable outputs into an unsigned
 * transaction: parse the recipient list, plan funding (with the service
 * donation when one is advertised), then lay out inputs, outputs and fee.
 */

import type { Currency, FundingResult, SiacoinOutput, SizeFn, Transaction, ValuedInput } from "../types.js";
import { InsufficientFundsError, InvalidInputError } from "../errors.js";
import { formatSC, parseCurrency, sumCurrency } from "../currency.js";
import { parseAddress } from "../keys/address.js";
import { computeDonation } from "../utxo/donation.js";
import { selectInputs } from "../utxo/selection.js";

// ============================================================================
// Types
// ============================================================================

export interface PaymentPlan extends FundingResult {
  /** Amount sent to the donation address; 0 when none */
  donation: Currency;
  donationAddress?: string;
}

export interface PlanPaymentOptions {
  recipients: SiacoinOutput[];
  feePerByte: Currency;
  available: readonly ValuedInput[];
  donationAddress?: string;
  sizeOf?: SizeFn;
}

// ============================================================================
// Recipients
// ============================================================================

/**
 * Parse "addr1:amount1,addr2:amount2" (amounts in SC).
 *
 * @throws InvalidInputError on an empty list, malformed pair, bad address or amount
 */
export function parseOutputs(list: string): SiacoinOutput[] {
  const pairs = list.split(",").map((p) => p.trim());
  if (pairs.length === 0 || pairs.some((p) => p === "")) {
    throw new InvalidInputError("Outputs must be a comma-separated list of address:amount pairs");
  }
  return pairs.map((pair) => {
    const parts = pair.split(":");
    if (parts.length !== 2) {
      throw new InvalidInputError(`Invalid output "${pair}": expected address:amount`);
    }
    const value = parseCurrency(parts[1]);
    if (value === 0n) {
      throw new InvalidInputError(`Invalid output "${pair}": amount must be positive`);
    }
    return { address: parseAddress(parts[0]), value };
  });
}

// ============================================================================
// Funding
// ============================================================================

/**
 * Fund a payment. With a donation address, the donation is added as an
 * extra output; if that cannot be afforded, the payment is funded alone and
 * whatever would have been change goes to the donation address instead.
 *
 * @throws InsufficientFundsError if the payment alone cannot be funded
 */
export function planPayment(opts: PlanPaymentOptions): PaymentPlan {
  const payment = sumCurrency(opts.recipients.map((o) => o.value));
  const donation = computeDonation(payment, opts.donationAddress);
  const numRecipients = opts.recipients.length;

  if (donation === 0n || !opts.donationAddress) {
    const funded = selectInputs(payment, opts.feePerByte, opts.available, {
      numOutputs: numRecipients,
      sizeOf: opts.sizeOf,
    });
    return { ...funded, donation: 0n };
  }

  try {
    const funded = selectInputs(payment + donation, opts.feePerByte, opts.available, {
      numOutputs: numRecipients + 1,
      sizeOf: opts.sizeOf,
    });
    return { ...funded, donation, donationAddress: opts.donationAddress };
  } catch (err) {
    if (!(err instanceof InsufficientFundsError)) throw err;
  }

  const fallback = selectInputs(payment, opts.feePerByte, opts.available, {
    numOutputs: numRecipients,
    sizeOf: opts.sizeOf,
  });
  if (fallback.change === 0n) {
    return { ...fallback, donation: 0n };
  }
  return {
    used: fallback.used,
    fee: fallback.fee,
    change: 0n,
    donation: fallback.change,
    donationAddress: opts.donationAddress,
  };
}

// ============================================================================
// Assembly
// ============================================================================

function baseTransaction(used: ValuedInput[], outputs: SiacoinOutput[], fee: Currency): Transaction {
  return {
    siacoinInputs: used.map((u) => ({ parentId: u.parentId, unlockConditions: u.unlockConditions })),
    siacoinOutputs: outputs,
    minerFees: [fee],
    transactionSignatures: [],
  };
}

/**
 * Lay out a payment: recipients, then the donation, then change.
 *
 * @throws InvalidInputError if the plan has change but no change address was given
 */
export function assemblePayment(
  plan: PaymentPlan,
  recipients: SiacoinOutput[],
  changeAddress: string | undefined,
): Transaction {
  const outputs = recipients.map((o) => ({ ...o }));
  if (plan.donation > 0n && plan.donationAddress) {
    outputs.push({ address: plan.donationAddress, value: plan.donation });
  }
  if (plan.change > 0n) {
    if (!changeAddress) {
      throw new InvalidInputError("A change address is required");
    }
    outputs.push({ address: changeAddress, value: plan.change });
  }
  return baseTransaction(plan.used, outputs, plan.fee);
}

/** `n` outputs of `perOutputValue` to `destination`, with change to the same address */
export function assembleSplit(
  funding: FundingResult,
  n: number,
  perOutputValue: Currency,
  destination: string,
): Transaction {
  const outputs: SiacoinOutput[] = Array.from({ length: n }, () => ({
    address: destination,
    value: perOutputValue,
  }));
  if (funding.change > 0n) {
    outputs.push({ address: destination, value: funding.change });
  }
  return baseTransaction(funding.used, outputs, funding.fee);
}

/** Short summary for the terminal */
export function summarizeTransaction(txn: Transaction): string[] {
  const spent = txn.siacoinInputs.length;
  const fee = sumCurrency(txn.minerFees);
  const sent = sumCurrency(txn.siacoinOutputs.map((o) => o.value));
  return [
    `Inputs:  ${spent}`,
    `Outputs: ${txn.siacoinOutputs.length} totalling ${formatSC(sent)} SC`,
    `Fee:     ${formatSC(fee)} SC`,
  ];
}
