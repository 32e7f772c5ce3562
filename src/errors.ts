/**
 * Custom Error Types
 */

/** Base class of every wallet error */
export class WalletError extends Error {
  public readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = "WalletError";
    this.code = code;
  }
}

/** Selection cannot cover the target even after exhausting every input */
export class InsufficientFundsError extends WalletError {
  public readonly required?: bigint;
  public readonly available?: bigint;

  constructor(message: string);
  constructor(required: bigint, available: bigint);
  constructor(messageOrRequired: string | bigint, available?: bigint) {
    if (typeof messageOrRequired === "string") {
      super("INSUFFICIENT_FUNDS", messageOrRequired);
      this.name = "InsufficientFundsError";
    } else {
      super(
        "INSUFFICIENT_FUNDS",
        `Insufficient funds: need ${messageOrRequired} H but only have ${available} H`,
      );
      this.name = "InsufficientFundsError";
      this.required = messageOrRequired;
      this.available = available;
    }
  }
}

/** Malformed address, amount, index, flag combination or transaction file */
export class InvalidInputError extends WalletError {
  constructor(message: string) {
    super("INVALID_INPUT", message);
    this.name = "InvalidInputError";
  }
}

/** The ledger service call failed; the service's message is kept verbatim */
export class RemoteError extends WalletError {
  public readonly service: string;
  public readonly statusCode?: number;

  constructor(service: string, message: string, statusCode?: number) {
    super("REMOTE_ERROR", message);
    this.name = "RemoteError";
    this.service = service;
    this.statusCode = statusCode;
  }
}

/** Device not connected, app not open, or no usable seed */
export class SignerUnavailableError extends WalletError {
  constructor(message: string) {
    super("SIGNER_UNAVAILABLE", message);
    this.name = "SignerUnavailableError";
  }
}

/** The user declined a prompt or rejected a request on the device */
export class UserCancelledError extends WalletError {
  constructor(message = "Operation cancelled by user") {
    super("USER_CANCELLED", message);
    this.name = "UserCancelledError";
  }
}

export function isWalletError(err: unknown): err is WalletError {
  return err instanceof WalletError;
}
