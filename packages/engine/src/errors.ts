// ============================================
// Engine Errors
// ============================================

export type EngineErrorCode =
  // configuration
  | "CONFIG_LENGTH_MISMATCH"
  | "DUPLICATE_ASSET"
  // validation
  | "NEEDS_MORE_THAN_ZERO"
  | "TOKEN_NOT_ALLOWED"
  | "INVALID_ADDRESS"
  | "NEGATIVE_AMOUNT"
  | "REDEEM_EXCEEDS_COLLATERAL"
  | "BURN_EXCEEDS_DEBT"
  // solvency
  | "BREAKS_HEALTH_FACTOR"
  // liquidation
  | "HEALTH_FACTOR_OK"
  | "HEALTH_FACTOR_NOT_IMPROVED"
  | "INSUFFICIENT_COLLATERAL_FOR_LIQUIDATION"
  // external dependencies
  | "TRANSFER_FAILED"
  | "MINT_FAILED"
  | "BURN_FAILED"
  | "STALE_PRICE"
  | "INVALID_PRICE"
  | "ORACLE_UNAVAILABLE"
  // internal
  | "LEDGER_UNDERFLOW"
  | "REENTRANT_CALL";

export type EngineErrorDetails = Record<string, string | number | bigint | boolean | undefined>;

export class EngineError extends Error {
  /** Failures raised while undoing settled movements after this error. */
  compensationErrors: Error[] = [];

  constructor(
    readonly code: EngineErrorCode,
    message: string,
    readonly details: EngineErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EngineError";
  }
}

export function isEngineError(err: unknown, code?: EngineErrorCode): err is EngineError {
  return err instanceof EngineError && (code === undefined || err.code === code);
}

export const needsMoreThanZero = (field: string) =>
  new EngineError("NEEDS_MORE_THAN_ZERO", `${field} must be greater than zero`, { field });

export const tokenNotAllowed = (asset: string) =>
  new EngineError("TOKEN_NOT_ALLOWED", `Collateral asset ${asset} is not registered`, { asset });

export const redeemExceedsCollateral = (account: string, asset: string, balance: bigint, amount: bigint) =>
  new EngineError(
    "REDEEM_EXCEEDS_COLLATERAL",
    `Cannot redeem ${amount} ${asset} from ${account}: deposited balance is ${balance}`,
    { account, asset, balance, amount }
  );

export const burnExceedsDebt = (account: string, debt: bigint, amount: bigint) =>
  new EngineError("BURN_EXCEEDS_DEBT", `Cannot burn ${amount} against ${account}: debt is ${debt}`, {
    account,
    debt,
    amount,
  });

export const breaksHealthFactor = (account: string, healthFactor: bigint) =>
  new EngineError(
    "BREAKS_HEALTH_FACTOR",
    `Health factor of ${account} would fall to ${healthFactor}`,
    { account, healthFactor }
  );

export const transferFailed = (
  asset: string,
  from: string,
  to: string,
  amount: bigint,
  cause?: unknown
) =>
  new EngineError(
    "TRANSFER_FAILED",
    `Transfer of ${amount} ${asset} from ${from} to ${to} failed`,
    { asset, from, to, amount },
    { cause }
  );

export const ledgerUnderflow = (account: string, field: string, balance: bigint, amount: bigint) =>
  new EngineError(
    "LEDGER_UNDERFLOW",
    `Cannot decrease ${field} of ${account} by ${amount}: balance is ${balance}`,
    { account, field, balance, amount }
  );
