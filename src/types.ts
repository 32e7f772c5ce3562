/**
 * Type Definitions
 *
 * Shared interfaces for the wallet client: ledger service, transactions,
 * configuration, and the signer boundary.
 */

// ============================================================================
// Currency
// ============================================================================

/** Amount in hastings, the smallest indivisible unit. Never negative. */
export type Currency = bigint;

/** 1 SC = 10^24 hastings */
export const HASTINGS_PER_SC: Currency = 10n ** 24n;

// ============================================================================
// Addresses & Keys
// ============================================================================

export interface SiaPublicKey {
  algorithm: "ed25519";
  /** 32-byte key, hex */
  key: string;
}

/** Spending policy; hashes to an address. */
export interface UnlockConditions {
  timelock: number;
  publicKeys: SiaPublicKey[];
  signaturesRequired: number;
}

/** What the ledger service stores for each tracked address. */
export interface SeedAddressInfo {
  unlockConditions: UnlockConditions;
  keyIndex: number;
}

// ============================================================================
// Ledger Service Types
// ============================================================================

/** Unspent output owned by a tracked address */
export interface UTXO {
  id: string;
  value: Currency;
  unlockConditions: UnlockConditions;
  address: string;
  keyIndex: number;
}

/** A UTXO staged as a candidate spend for one funding attempt */
export interface ValuedInput {
  parentId: string;
  unlockConditions: UnlockConditions;
  value: Currency;
}

export interface ConsensusInfo {
  height: number;
  /** Current consensus change id */
  ccid: string;
}

/** Watch-only ledger service; see src/api/watch-client.ts */
export interface LedgerService {
  readonly name: string;
  balance(limbo: boolean): Promise<Currency>;
  addresses(): Promise<string[]>;
  addressInfo(address: string): Promise<SeedAddressInfo>;
  watchAddress(info: SeedAddressInfo): Promise<void>;
  unspentOutputs(limbo: boolean): Promise<UTXO[]>;
  recommendedFee(): Promise<Currency>;
  consensus(): Promise<ConsensusInfo>;
  transactions(address: string | undefined, max: number): Promise<string[]>;
  nextSeedIndex(): Promise<number>;
  broadcast(txnSet: Transaction[]): Promise<void>;
}

// ============================================================================
// Transactions
// ============================================================================

export interface SiacoinInput {
  parentId: string;
  unlockConditions: UnlockConditions;
}

export interface SiacoinOutput {
  value: Currency;
  address: string;
}

export interface TransactionSignature {
  /** Parent id of the input this signature authorizes */
  parentId: string;
  publicKeyIndex: number;
  timelock: number;
  wholeTransaction: boolean;
  /** Raw signature bytes, base64; empty until the signer responds */
  signature: string;
}

export interface Transaction {
  siacoinInputs: SiacoinInput[];
  siacoinOutputs: SiacoinOutput[];
  minerFees: Currency[];
  transactionSignatures: TransactionSignature[];
}

/** Result of input selection */
export interface FundingResult {
  used: ValuedInput[];
  fee: Currency;
  change: Currency;
}

/** Transaction size estimator: (inputs, outputs) → bytes */
export type SizeFn = (numInputs: number, numOutputs: number) => number;

// ============================================================================
// Config Types
// ============================================================================

export type SignerMode = "device" | "hot";

export interface ApiConfig {
  /** host:port or URL of the ledger service */
  address: string;
}

export interface SignerConfig {
  mode: SignerMode;
  /** Environment variable holding a hot seed phrase */
  seedEnv: string;
}

export interface DeviceConfig {
  bridgeUrl: string;
  timeoutMs: number;
}

export interface NetworkConfig {
  asicHardforkHeight: number;
  foundationHardforkHeight: number;
}

export interface WalletOptionsConfig {
  /** "scan": max registered key index + 1; "service": ask the service */
  indexSource: "scan" | "service";
}

export interface DonationsConfig {
  enabled: boolean;
}

export interface WalletConfig {
  api: ApiConfig;
  signer: SignerConfig;
  device: DeviceConfig;
  network: NetworkConfig;
  wallet: WalletOptionsConfig;
  donations: DonationsConfig;
}

// ============================================================================
// Ambient
// ============================================================================

export type LogLevel = "info" | "warn" | "error";
export type LogFn = (level: LogLevel, msg: string) => void;

/** Sink for user-facing text (summaries, instructions) */
export type OutputFn = (line: string) => void;

/** Interactive confirmation points */
export interface Prompter {
  /** Resolves true to continue, false if the user declined. */
  confirm(message: string): Promise<boolean>;
  /** Reads a secret (seed phrase) without echoing it. */
  secret(message: string): Promise<string>;
}
