/**
 * Transaction JSON
 *
 * The ledger's JSON form of a transaction, used both on the wire to the
 * ledger service and for transaction files on disk. Lists this wallet never
 * creates must be empty (or null) when read back.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type { Transaction, UnlockConditions } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { currencyFromJSON } from "../currency.js";
import { parseAddress } from "../keys/address.js";
import { formatPublicKey, parsePublicKey } from "../keys/unlock-conditions.js";

const Hex32 = Type.String({ pattern: "^[0-9a-fA-F]{64}$" });
const CurrencyJSON = Type.String({ pattern: "^[0-9]+$" });
const EmptyList = Type.Union([Type.Array(Type.Unknown(), { maxItems: 0 }), Type.Null()]);

function listOf<T extends TSchema>(item: T) {
  return Type.Union([Type.Array(item), Type.Null()]);
}

export const UnlockConditionsSchema = Type.Object({
  timelock: Type.Integer({ minimum: 0 }),
  publickeys: listOf(Type.String()),
  signaturesrequired: Type.Integer({ minimum: 0 }),
});

export const TransactionSchema = Type.Object({
  siacoininputs: listOf(
    Type.Object({
      parentid: Hex32,
      unlockconditions: UnlockConditionsSchema,
    }),
  ),
  siacoinoutputs: listOf(
    Type.Object({
      value: CurrencyJSON,
      unlockhash: Type.String(),
    }),
  ),
  filecontracts: Type.Optional(EmptyList),
  filecontractrevisions: Type.Optional(EmptyList),
  storageproofs: Type.Optional(EmptyList),
  siafundinputs: Type.Optional(EmptyList),
  siafundoutputs: Type.Optional(EmptyList),
  minerfees: listOf(CurrencyJSON),
  arbitrarydata: Type.Optional(EmptyList),
  transactionsignatures: listOf(
    Type.Object({
      parentid: Hex32,
      publickeyindex: Type.Integer({ minimum: 0 }),
      timelock: Type.Integer({ minimum: 0 }),
      coveredfields: Type.Object({ wholetransaction: Type.Boolean() }),
      signature: Type.Union([Type.String(), Type.Null()]),
    }),
  ),
});

export type UnlockConditionsJSON = Static<typeof UnlockConditionsSchema>;
export type TransactionJSON = Static<typeof TransactionSchema>;

export function unlockConditionsToJSON(uc: UnlockConditions): UnlockConditionsJSON {
  return {
    timelock: uc.timelock,
    publickeys: uc.publicKeys.map(formatPublicKey),
    signaturesrequired: uc.signaturesRequired,
  };
}

export function unlockConditionsFromJSON(json: UnlockConditionsJSON): UnlockConditions {
  return {
    timelock: json.timelock,
    publicKeys: (json.publickeys ?? []).map(parsePublicKey),
    signaturesRequired: json.signaturesrequired,
  };
}

export function transactionToJSON(txn: Transaction): TransactionJSON {
  return {
    siacoininputs: txn.siacoinInputs.map((i) => ({
      parentid: i.parentId,
      unlockconditions: unlockConditionsToJSON(i.unlockConditions),
    })),
    siacoinoutputs: txn.siacoinOutputs.map((o) => ({
      value: o.value.toString(),
      unlockhash: o.address,
    })),
    filecontracts: null,
    filecontractrevisions: null,
    storageproofs: null,
    siafundinputs: null,
    siafundoutputs: null,
    minerfees: txn.minerFees.map((f) => f.toString()),
    arbitrarydata: null,
    transactionsignatures: txn.transactionSignatures.map((s) => ({
      parentid: s.parentId,
      publickeyindex: s.publicKeyIndex,
      timelock: s.timelock,
      coveredfields: { wholetransaction: s.wholeTransaction },
      signature: s.signature,
    })),
  };
}

/**
 * Validate and convert a parsed JSON document into a Transaction.
 *
 * @throws InvalidInputError describing the first schema violation
 */
export function transactionFromJSON(raw: unknown): Transaction {
  if (!Value.Check(TransactionSchema, raw)) {
    const first = Value.Errors(TransactionSchema, raw).First();
    const where = first ? `${first.path || "/"}: ${first.message}` : "unknown error";
    throw new InvalidInputError(`Invalid transaction (${where})`);
  }
  return {
    siacoinInputs: (raw.siacoininputs ?? []).map((i) => ({
      parentId: i.parentid.toLowerCase(),
      unlockConditions: unlockConditionsFromJSON(i.unlockconditions),
    })),
    siacoinOutputs: (raw.siacoinoutputs ?? []).map((o) => ({
      value: currencyFromJSON(o.value),
      address: parseAddress(o.unlockhash),
    })),
    minerFees: (raw.minerfees ?? []).map(currencyFromJSON),
    transactionSignatures: (raw.transactionsignatures ?? []).map((s) => ({
      parentId: s.parentid.toLowerCase(),
      publicKeyIndex: s.publickeyindex,
      timelock: s.timelock,
      wholeTransaction: s.coveredfields.wholetransaction,
      signature: s.signature ?? "",
    })),
  };
}
