/**
 * Signer boundary
 *
 * A signer derives public keys by index and produces one signature per
 * transaction signature slot. Two kinds exist: a hardware device that asks
 * the user to approve every request, and a hot seed held in memory.
 */

import type { NetworkConfig, Transaction } from "../types.js";
import { sigHash } from "../txn/hash.js";
import type { Seed } from "./seed.js";

export interface TransactionSigner {
  readonly kind: "device" | "hot";
  /** Public key at `index`; a device shows the address for confirmation. */
  publicKey(index: number): Promise<Uint8Array>;
  /**
   * Sign `txn.transactionSignatures[sigIndex]` with the key at `keyIndex`.
   * `height` selects the protocol version for hot signing.
   */
  signInput(txn: Transaction, sigIndex: number, keyIndex: number, height: number): Promise<Uint8Array>;
  /** Release the underlying resource (close the device, wipe the seed). */
  close(): Promise<void>;
}

export class SeedSigner implements TransactionSigner {
  readonly kind = "hot";
  private readonly seed: Seed;
  private readonly network: NetworkConfig;

  constructor(seed: Seed, network: NetworkConfig) {
    this.seed = seed;
    this.network = network;
  }

  publicKey(index: number): Promise<Uint8Array> {
    return this.seed.publicKey(index);
  }

  signInput(txn: Transaction, sigIndex: number, keyIndex: number, height: number): Promise<Uint8Array> {
    return this.seed.signHash(keyIndex, sigHash(txn, sigIndex, height, this.network));
  }

  async close(): Promise<void> {
    this.seed.wipe();
  }
}
