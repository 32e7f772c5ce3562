/**
 * APDU transport
 *
 * The device is reached through an APDU exchange boundary. USB/HID framing
 * lives outside this program; HttpApduTransport talks to a bridge that
 * relays raw APDUs: POST <bridge>/apdu {"data": "<hex>"} → {"data": "<hex>"}.
 * The response data ends with the 2-byte status word.
 */

import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { SignerUnavailableError } from "../errors.js";

export interface ApduTransport {
  exchange(apdu: Uint8Array): Promise<Uint8Array>;
  close(): Promise<void>;
}

export interface HttpApduTransportOptions {
  bridgeUrl: string;
  timeoutMs: number;
  fetch?: typeof fetch;
}

export class HttpApduTransport implements ApduTransport {
  private readonly endpoint: string;
  private readonly timeoutMs: number;
  private readonly fetchFn: typeof fetch;
  private closed = false;

  constructor(opts: HttpApduTransportOptions) {
    this.endpoint = `${opts.bridgeUrl.replace(/\/+$/, "")}/apdu`;
    this.timeoutMs = opts.timeoutMs;
    this.fetchFn = opts.fetch ?? fetch;
  }

  async exchange(apdu: Uint8Array): Promise<Uint8Array> {
    if (this.closed) {
      throw new SignerUnavailableError("Device connection is closed");
    }
    let res: Response;
    try {
      res = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ data: bytesToHex(apdu) }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new SignerUnavailableError(`Could not reach device bridge: ${msg}`);
    }
    if (!res.ok) {
      const body = await res.text().catch(() => "");
      throw new SignerUnavailableError(`Device bridge error (HTTP ${res.status}): ${body.slice(0, 200)}`);
    }
    let json: unknown;
    try {
      json = await res.json();
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err);
      throw new SignerUnavailableError(`Device bridge returned an unreadable response: ${msg}`);
    }
    if (
      typeof json !== "object" ||
      json === null ||
      !("data" in json) ||
      typeof json.data !== "string" ||
      !/^([0-9a-fA-F]{2})+$/.test(json.data)
    ) {
      throw new SignerUnavailableError("Device bridge returned a malformed response");
    }
    return hexToBytes(json.data.toLowerCase());
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
