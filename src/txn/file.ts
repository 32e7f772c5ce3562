/**
 * Transaction files
 *
 * Unsigned and signed transactions are kept on disk as indented JSON in the
 * ledger's format, so other tools can inspect or sign them.
 */

import { readFile } from "node:fs/promises";
import { extname } from "node:path";
import type { Transaction } from "../types.js";
import { InvalidInputError } from "../errors.js";
import { secureWriteFile } from "../secure-fs.js";
import { transactionFromJSON, transactionToJSON } from "./json.js";

export async function writeTransaction(path: string, txn: Transaction): Promise<void> {
  await secureWriteFile(path, `${JSON.stringify(transactionToJSON(txn), null, "  ")}\n`);
}

/**
 * @throws InvalidInputError if the file is unreadable or not a transaction
 */
export async function readTransaction(path: string): Promise<Transaction> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Could not read transaction file: ${msg}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new InvalidInputError(`Transaction file ${path} is not valid JSON: ${msg}`);
  }
  return transactionFromJSON(raw);
}

/** "txn.json" → "txn-signed.json"; "txn" → "txn-signed" */
export function signedPath(path: string): string {
  const ext = extname(path);
  return `${path.slice(0, path.length - ext.length)}-signed${ext}`;
}
