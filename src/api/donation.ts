/**
 * Donation address discovery
 *
 * A hosted ledger service serving a wallet at `<base>/wallet/<id>` may
 * advertise a donation address at `<base>/donations`. Any failure along the
 * way means "no donation configured".
 */

import type { LogFn } from "../types.js";
import { isValidAddress } from "../keys/address.js";
import { normalizeApiAddress } from "./watch-client.js";

/** The sibling donations endpoint, or undefined if the address has no /wallet/<id> suffix */
export function donationEndpoint(apiAddress: string): string | undefined {
  let url: URL;
  try {
    url = new URL(normalizeApiAddress(apiAddress));
  } catch {
    return undefined;
  }
  const path = url.pathname.split("/");
  if (path.length < 2 || path[path.length - 2] !== "wallet") {
    return undefined;
  }
  url.pathname = [...path.slice(0, -2), "donations"].join("/");
  return url.toString();
}

export async function discoverDonationAddress(
  apiAddress: string,
  fetchFn: typeof fetch = fetch,
  log: LogFn = () => {},
): Promise<string | undefined> {
  const endpoint = donationEndpoint(apiAddress);
  if (!endpoint) return undefined;
  try {
    const res = await fetchFn(endpoint);
    if (!res.ok) {
      log("info", `siawatch: no donation address (HTTP ${res.status})`);
      return undefined;
    }
    const body: unknown = await res.json();
    if (typeof body === "string" && isValidAddress(body)) {
      return body.toLowerCase();
    }
    log("info", "siawatch: donation endpoint returned an invalid address");
    return undefined;
  } catch (err: unknown) {
    log("info", `siawatch: donation lookup failed: ${err instanceof Error ? err.message : String(err)}`);
    return undefined;
  }
}
