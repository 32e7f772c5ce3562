/**
 * Hardware signer
 *
 * Speaks the Sia app's APDU protocol over an ApduTransport. The device is an
 * exclusively-owned resource: every command runs under a mutex, so at most
 * one request is in flight, and multi-packet commands are never interleaved.
 */

import { Mutex } from "async-mutex";
import type { LogFn, Transaction } from "../types.js";
import { SignerUnavailableError, UserCancelledError } from "../errors.js";
import { encodeTransaction } from "../txn/encoding.js";
import type { TransactionSigner } from "../keys/signer.js";
import type { ApduTransport } from "./transport.js";

const CLA = 0xe0;
const INS_GET_VERSION = 0x01;
const INS_GET_PUBLIC_KEY = 0x02;
const INS_GET_TXN_HASH = 0x08;

const P1_FIRST = 0x00;
const P1_MORE = 0x80;
const P2_DISPLAY_ADDRESS = 0x00;
const P2_SIGN_HASH = 0x01;

const SW_OK = 0x9000;
const SW_USER_REJECTED = 0x6985;
const SW_INS_NOT_SUPPORTED = 0x6d00;
const SW_CLA_NOT_SUPPORTED = 0x6e00;

const MAX_PAYLOAD = 255;
const PUBKEY_SIZE = 32;
const SIGNATURE_SIZE = 64;

export function buildApdu(ins: number, p1: number, p2: number, data: Uint8Array): Uint8Array {
  if (data.length > MAX_PAYLOAD) {
    throw new RangeError(`APDU payload too large: ${data.length}`);
  }
  const apdu = new Uint8Array(5 + data.length);
  apdu.set([CLA, ins, p1, p2, data.length]);
  apdu.set(data, 5);
  return apdu;
}

function u32le(n: number): Uint8Array {
  const buf = new Uint8Array(4);
  new DataView(buf.buffer).setUint32(0, n, true);
  return buf;
}

function u16le(n: number): Uint8Array {
  const buf = new Uint8Array(2);
  new DataView(buf.buffer).setUint16(0, n, true);
  return buf;
}

export class LedgerDevice implements TransactionSigner {
  readonly kind = "device";
  private readonly transport: ApduTransport;
  private readonly lock = new Mutex();
  private readonly log: LogFn;
  private version: string | null = null;

  private constructor(transport: ApduTransport, log: LogFn) {
    this.transport = transport;
    this.log = log;
  }

  /**
   * Connect and check that the app is running.
   *
   * @throws SignerUnavailableError if the device is absent or the app is not open
   */
  static async open(transport: ApduTransport, log: LogFn = () => {}): Promise<LedgerDevice> {
    const device = new LedgerDevice(transport, log);
    try {
      const resp = await device.send(INS_GET_VERSION, 0, 0, new Uint8Array(0));
      device.version = Array.from(resp.subarray(0, 3)).join(".");
      log("info", `siawatch: connected to device app v${device.version}`);
      return device;
    } catch (err) {
      await transport.close();
      if (err instanceof UserCancelledError) {
        throw new SignerUnavailableError("Device refused the connection");
      }
      throw err;
    }
  }

  getVersion(): string | null {
    return this.version;
  }

  /** Exchange one APDU and check the status word */
  private async send(ins: number, p1: number, p2: number, data: Uint8Array): Promise<Uint8Array> {
    const resp = await this.transport.exchange(buildApdu(ins, p1, p2, data));
    if (resp.length < 2) {
      throw new SignerUnavailableError("Device returned a truncated response");
    }
    const sw = (resp[resp.length - 2] << 8) | resp[resp.length - 1];
    switch (sw) {
      case SW_OK:
        return resp.subarray(0, resp.length - 2);
      case SW_USER_REJECTED:
        throw new UserCancelledError("Request rejected on device");
      case SW_CLA_NOT_SUPPORTED:
      case SW_INS_NOT_SUPPORTED:
        throw new SignerUnavailableError("Device app is not open");
      default:
        throw new SignerUnavailableError(`Device error 0x${sw.toString(16).padStart(4, "0")}`);
    }
  }

  async publicKey(index: number): Promise<Uint8Array> {
    return this.lock.runExclusive(async () => {
      const resp = await this.send(INS_GET_PUBLIC_KEY, 0, P2_DISPLAY_ADDRESS, u32le(index));
      if (resp.length < PUBKEY_SIZE) {
        throw new SignerUnavailableError("Device returned a malformed public key");
      }
      return resp.slice(0, PUBKEY_SIZE);
    });
  }

  /**
   * Ask the device to sign one slot. The whole transaction is streamed in
   * 255-byte packets; the signature arrives with the last one.
   */
  async signInput(txn: Transaction, sigIndex: number, keyIndex: number): Promise<Uint8Array> {
    const payload = new Uint8Array([...u32le(keyIndex), ...u16le(sigIndex), ...encodeTransaction(txn)]);
    return this.lock.runExclusive(async () => {
      this.log("info", `siawatch: device signing slot ${sigIndex} with key ${keyIndex}`);
      let resp: Uint8Array = new Uint8Array(0);
      for (let offset = 0; offset < payload.length; offset += MAX_PAYLOAD) {
        const chunk = payload.subarray(offset, offset + MAX_PAYLOAD);
        resp = await this.send(INS_GET_TXN_HASH, offset === 0 ? P1_FIRST : P1_MORE, P2_SIGN_HASH, chunk);
      }
      if (resp.length !== SIGNATURE_SIZE) {
        throw new SignerUnavailableError(`Device returned a ${resp.length}-byte signature`);
      }
      return resp.slice();
    });
  }

  async close(): Promise<void> {
    await this.lock.runExclusive(() => this.transport.close());
  }
}
