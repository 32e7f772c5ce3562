/**
 * Transaction Broadcaster
 *
 * Hands a signed transaction to the ledger service for relay. There is no
 * retry: the service's rejection reason is reported as-is, and resubmitting
 * is the user's call.
 */

import type { LedgerService, LogFn, Transaction } from "../types.js";
import { transactionId } from "./hash.js";

// ============================================================================
// Types
// ============================================================================

export interface BroadcastResult {
  /** Transaction ID */
  txid: string;
  /** Service that accepted the transaction */
  service: string;
}

export interface BroadcastOptions {
  log?: LogFn;
}

// ============================================================================
// Broadcaster
// ============================================================================

/**
 * Broadcast `txn` as a one-transaction set.
 *
 * @throws RemoteError carrying the service's rejection message
 */
export async function broadcastTransaction(
  txn: Transaction,
  service: LedgerService,
  options: BroadcastOptions = {},
): Promise<BroadcastResult> {
  const log = options.log ?? (() => {});
  const txid = transactionId(txn);

  const unsigned = txn.transactionSignatures.filter((s) => s.signature === "").length;
  if (unsigned > 0) {
    log("warn", `siawatch: broadcasting ${txid} with ${unsigned} empty signature(s)`);
  }

  await service.broadcast([txn]);
  log("info", `siawatch: broadcast ${txid} via ${service.name}`);
  return { txid, service: service.name };
}
