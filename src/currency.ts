/**
 * Currency arithmetic, parsing and formatting
 *
 * All amounts are bigint hastings (1 SC = 10^24 H).
 */

import { HASTINGS_PER_SC, type Currency } from "./types.js";
import { InvalidInputError } from "./errors.js";

const SC_DECIMALS = 24;

const UNITS = ["aS", "fS", "pS", "nS", "uS", "mS", "SC", "KS", "MS", "GS", "TS"] as const;

/** 1 aS in hastings; anything smaller prints as raw hastings */
const ATTO_SC = 10n ** 6n;

/**
 * Parse a decimal SC amount ("1.5", "10", "0.000001") into hastings.
 * Parsing is exact; amounts below one hasting are rejected.
 */
export function parseCurrency(input: string): Currency {
  const s = input.trim();
  const match = /^(\d*)(?:\.(\d*))?$/.exec(s);
  if (!match || s === "" || s === ".") {
    throw new InvalidInputError(`Invalid amount "${input}"`);
  }
  const whole = match[1] === "" ? "0" : match[1];
  let frac = match[2] ?? "";
  if (frac.length > SC_DECIMALS) {
    if (/[1-9]/.test(frac.slice(SC_DECIMALS))) {
      throw new InvalidInputError(`Amount "${input}" is more precise than 1 H`);
    }
    frac = frac.slice(0, SC_DECIMALS);
  }
  return BigInt(whole) * HASTINGS_PER_SC + BigInt(frac.padEnd(SC_DECIMALS, "0"));
}

/** Whole SC → hastings */
export function siacoins(n: number | bigint): Currency {
  return BigInt(n) * HASTINGS_PER_SC;
}

/** c * num / den, rounded down */
export function mulRat(c: Currency, num: bigint, den: bigint): Currency {
  if (den <= 0n || num < 0n) {
    throw new RangeError("mulRat: ratio must be non-negative with a positive denominator");
  }
  return (c * num) / den;
}

/** a - b; a negative result is an error */
export function subCurrency(a: Currency, b: Currency): Currency {
  if (b > a) {
    throw new RangeError(`negative currency: ${a} - ${b}`);
  }
  return a - b;
}

export function sumCurrency(values: Iterable<Currency>): Currency {
  let total = 0n;
  for (const v of values) total += v;
  return total;
}

export function maxCurrency(a: Currency, b: Currency): Currency {
  return a > b ? a : b;
}

/**
 * Human-readable amount with a metric SC unit and 4 significant digits,
 * e.g. "1.5 SC", "250 mS", "999 H".
 */
export function formatCurrency(c: Currency): string {
  if (c < ATTO_SC) {
    return `${c} H`;
  }
  let mag = ATTO_SC;
  let unit: string = UNITS[0];
  for (const u of UNITS) {
    unit = u;
    if (c < mag * 1000n) {
      break;
    } else if (u !== "TS") {
      mag *= 1000n;
    }
  }
  // Scale to 6 fractional digits before leaving bigint territory
  const scaled = Number((c * 1_000_000n) / mag) / 1_000_000;
  return `${Number(scaled.toPrecision(4))} ${unit}`;
}

/** Fixed 5-decimal SC string, e.g. "1.50000" */
export function formatSC(c: Currency): string {
  const whole = c / HASTINGS_PER_SC;
  const rem = c % HASTINGS_PER_SC;
  // round half up at the 5th decimal
  const unit = HASTINGS_PER_SC / 100_000n;
  let frac = (rem + unit / 2n) / unit;
  let w = whole;
  if (frac >= 100_000n) {
    w += 1n;
    frac -= 100_000n;
  }
  return `${w}.${frac.toString().padStart(5, "0")}`;
}

/** Parse a currency from its JSON form (decimal string of hastings) */
export function currencyFromJSON(value: string): Currency {
  if (!/^\d+$/.test(value)) {
    throw new InvalidInputError(`Invalid currency value "${value}"`);
  }
  return BigInt(value);
}
