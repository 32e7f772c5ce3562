/**
 * Service donation
 *
 * When the ledger service advertises a donation address, each payment adds
 * max(1% of the payment, 10 SC) on top.
 */

import type { Currency } from "../types.js";
import { maxCurrency, mulRat, siacoins } from "../currency.js";

export const DONATION_FLOOR: Currency = siacoins(10);

export function computeDonation(paymentTotal: Currency, donationAddress: string | undefined): Currency {
  if (!donationAddress) return 0n;
  return maxCurrency(mulRat(paymentTotal, 1n, 100n), DONATION_FLOOR);
}
