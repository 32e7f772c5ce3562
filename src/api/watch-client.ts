/**
 * Ledger Service Client
 *
 * HTTP client for the watch-only ledger service that tracks the wallet's
 * addresses, serves its unspent outputs and fee estimates, and relays
 * transactions. Base URL: http://localhost:9380 by default.
 *
 * Non-2xx responses carry a plain-text error which is surfaced verbatim.
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import type {
  ConsensusInfo,
  Currency,
  LedgerService,
  LogFn,
  SeedAddressInfo,
  Transaction,
  UTXO,
} from "../types.js";
import { InvalidInputError, RemoteError } from "../errors.js";
import { currencyFromJSON } from "../currency.js";
import { parseAddress } from "../keys/address.js";
import {
  UnlockConditionsSchema,
  transactionToJSON,
  unlockConditionsFromJSON,
  unlockConditionsToJSON,
} from "../txn/json.js";

// ============================================================================
// Response Schemas
// ============================================================================

const CurrencyResponse = Type.String({ pattern: "^[0-9]+$" });

const StringList = Type.Union([Type.Array(Type.String()), Type.Null()]);

const AddressInfoResponse = Type.Object({
  unlockConditions: UnlockConditionsSchema,
  keyIndex: Type.Integer({ minimum: 0 }),
});

const UtxoListResponse = Type.Union([
  Type.Array(
    Type.Object({
      ID: Type.String({ pattern: "^[0-9a-fA-F]{64}$" }),
      value: CurrencyResponse,
      unlockConditions: UnlockConditionsSchema,
      unlockHash: Type.String(),
      keyIndex: Type.Integer({ minimum: 0 }),
    }),
  ),
  Type.Null(),
]);

const ConsensusResponse = Type.Object({
  height: Type.Integer({ minimum: 0 }),
  ccid: Type.String(),
});

const SeedIndexResponse = Type.Integer({ minimum: 0 });

/** Normalize "host:port" or a URL into a base URL without a trailing slash */
export function normalizeApiAddress(address: string): string {
  const trimmed = address.trim().replace(/\/+$/, "");
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) ? trimmed : `http://${trimmed}`;
}

export interface WatchClientOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  log?: LogFn;
}

export class WatchClient implements LedgerService {
  readonly name = "watch";
  private readonly baseUrl: string;
  private readonly fetchFn: typeof fetch;
  private readonly log: LogFn;

  constructor(address: string, opts: WatchClientOptions = {}) {
    this.baseUrl = normalizeApiAddress(address);
    this.fetchFn = opts.fetch ?? fetch;
    this.log = opts.log ?? (() => {});
  }

  /** Make a request; returns the decoded JSON body, or undefined if empty */
  private async request(method: string, path: string, body?: unknown): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    this.log("info", `siawatch: ${method} ${url}`);
    let res: Response;
    try {
      res = await this.fetchFn(url, {
        method,
        headers: body === undefined ? undefined : { "Content-Type": "application/json" },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new RemoteError(this.name, `could not reach ${this.baseUrl}: ${msg}`);
    }

    const text = await res.text();
    if (!res.ok) {
      throw new RemoteError(this.name, text.trim() || `HTTP ${res.status}`, res.status);
    }
    if (text.trim() === "") return undefined;
    try {
      const parsed: unknown = JSON.parse(text);
      return parsed;
    } catch {
      throw new RemoteError(this.name, `invalid JSON in response to ${method} ${path}`, res.status);
    }
  }

  private async get<S extends TSchema>(path: string, schema: S): Promise<Static<S>> {
    const data = await this.request("GET", path);
    if (!Value.Check(schema, data)) {
      const first = Value.Errors(schema, data).First();
      throw new RemoteError(
        this.name,
        `unexpected response to GET ${path}${first ? ` (${first.path || "/"}: ${first.message})` : ""}`,
      );
    }
    return data;
  }

  /** Convert validated data; bad addresses or keys from the service are remote faults */
  private decode<T>(path: string, convert: () => T): T {
    try {
      return convert();
    } catch (err: unknown) {
      if (err instanceof InvalidInputError) {
        throw new RemoteError(this.name, `unexpected response to GET ${path}: ${err.message}`);
      }
      throw err;
    }
  }

  async balance(limbo: boolean): Promise<Currency> {
    return currencyFromJSON(await this.get(`/balance?limbo=${limbo}`, CurrencyResponse));
  }

  async addresses(): Promise<string[]> {
    const list = await this.get("/addresses", StringList);
    return this.decode("/addresses", () => (list ?? []).map((a) => parseAddress(a)));
  }

  async addressInfo(address: string): Promise<SeedAddressInfo> {
    const path = `/addresses/${parseAddress(address)}`;
    const info = await this.get(path, AddressInfoResponse);
    return this.decode(path, () => ({
      unlockConditions: unlockConditionsFromJSON(info.unlockConditions),
      keyIndex: info.keyIndex,
    }));
  }

  async watchAddress(info: SeedAddressInfo): Promise<void> {
    await this.request("POST", "/addresses", {
      unlockConditions: unlockConditionsToJSON(info.unlockConditions),
      keyIndex: info.keyIndex,
    });
  }

  async unspentOutputs(limbo: boolean): Promise<UTXO[]> {
    const path = `/utxos?limbo=${limbo}`;
    const list = await this.get(path, UtxoListResponse);
    return this.decode(path, () =>
      (list ?? []).map((u) => ({
        id: u.ID.toLowerCase(),
        value: currencyFromJSON(u.value),
        unlockConditions: unlockConditionsFromJSON(u.unlockConditions),
        address: parseAddress(u.unlockHash),
        keyIndex: u.keyIndex,
      })),
    );
  }

  async recommendedFee(): Promise<Currency> {
    return currencyFromJSON(await this.get("/fee", CurrencyResponse));
  }

  async consensus(): Promise<ConsensusInfo> {
    return this.get("/consensus", ConsensusResponse);
  }

  async transactions(address: string | undefined, max: number): Promise<string[]> {
    const params = new URLSearchParams({ max: String(max) });
    if (address) params.set("addr", parseAddress(address));
    const ids = await this.get(`/transactions?${params.toString()}`, StringList);
    return ids ?? [];
  }

  async nextSeedIndex(): Promise<number> {
    return this.get("/seedindex", SeedIndexResponse);
  }

  async broadcast(txnSet: Transaction[]): Promise<void> {
    await this.request("POST", "/broadcast", txnSet.map(transactionToJSON));
  }
}
