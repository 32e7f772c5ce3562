/**
 * Change addresses
 *
 * A payment with change needs an address the wallet controls. Unless one was
 * supplied, the next unused key index is derived from the active signer, the
 * user confirms the address, and it is registered with the ledger service
 * before the transaction is built.
 */

import type { LedgerService, LogFn, OutputFn, Prompter, WalletOptionsConfig } from "../types.js";
import { InvalidInputError, UserCancelledError } from "../errors.js";
import { parseAddress } from "./address.js";
import { standardAddress, standardUnlockConditions } from "./unlock-conditions.js";
import type { TransactionSigner } from "./signer.js";

export interface AddressDeps {
  service: LedgerService;
  /** Opens the signer on first use */
  signer: () => Promise<TransactionSigner>;
  prompter: Prompter;
  indexSource: WalletOptionsConfig["indexSource"];
  out?: OutputFn;
  log?: LogFn;
}

/**
 * The lowest index above every index the service has recorded, or the
 * service's own counter when `indexSource` is "service".
 */
export async function nextUnusedIndex(
  service: LedgerService,
  indexSource: WalletOptionsConfig["indexSource"],
): Promise<number> {
  if (indexSource === "service") {
    return service.nextSeedIndex();
  }
  let next = 0;
  for (const addr of await service.addresses()) {
    const info = await service.addressInfo(addr);
    next = Math.max(next, info.keyIndex + 1);
  }
  return next;
}

/**
 * Derive the address at `index`, have the user confirm it, and add it to the
 * service. Returns the new address.
 *
 * @throws UserCancelledError if the user declines
 */
export async function registerAddress(index: number, deps: AddressDeps): Promise<string> {
  const out = deps.out ?? (() => {});
  const signer = await deps.signer();

  if (signer.kind === "device") {
    out(`Please verify and accept the prompt on your device to generate address #${index}.`);
  }
  const publicKey = await signer.publicKey(index);
  const address = standardAddress(publicKey);
  out(`Derived address #${index}: ${address}`);
  if (signer.kind === "device") {
    out("Compare this address to the one shown on your device.");
  }
  if (!(await deps.prompter.confirm("Add this address to your wallet?"))) {
    throw new UserCancelledError();
  }

  await deps.service.watchAddress({
    unlockConditions: standardUnlockConditions(publicKey),
    keyIndex: index,
  });
  deps.log?.("info", `siawatch: registered address #${index}`);
  return address;
}

/**
 * Use `preconfigured` if given, otherwise derive and register a fresh address.
 *
 * @throws InvalidInputError if `preconfigured` is not a valid address
 */
export async function allocateChangeAddress(
  preconfigured: string | undefined,
  deps: AddressDeps,
): Promise<string> {
  if (preconfigured !== undefined) {
    if (preconfigured.trim() === "") {
      throw new InvalidInputError("Change address must not be empty");
    }
    return parseAddress(preconfigured);
  }
  const index = await nextUnusedIndex(deps.service, deps.indexSource);
  const address = await registerAddress(index, deps);
  deps.out?.("Change address added successfully.");
  return address;
}
