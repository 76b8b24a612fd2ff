// ============================================
// Engine Package Entry
// ============================================

export * from "./constants.js";
export * from "./errors.js";
export { toAddress } from "./address.js";
export type { RoundData, PriceFeed, CollateralToken, PeggedToken } from "./interfaces.js";
export type { LedgerView, AccountRecord } from "./ledger/LedgerState.js";
export { AccountLedger } from "./ledger/AccountLedger.js";
export { LedgerTransaction } from "./ledger/LedgerTransaction.js";
export { OracleAdapter, systemClock, type Clock, type PriceReading } from "./oracle/OracleAdapter.js";
export { ValuationService, toUsdValue, toTokenAmount } from "./valuation/ValuationService.js";
export { calculateHealthFactor, isLiquidatable } from "./health/healthFactor.js";
export { OperationGuard } from "./runtime/OperationGuard.js";
export { Settlement, type Movement } from "./runtime/Settlement.js";
export {
  InMemoryEventLog,
  type EngineEvent,
  type EngineEventOf,
  type EventSink,
} from "./events/EventSink.js";
export {
  StablecoinEngine,
  type EngineOptions,
  type AccountInformation,
  type DepositCollateralParams,
  type MintDebtParams,
  type RedeemCollateralParams,
  type BurnDebtParams,
  type CollateralAndDebtParams,
  type LiquidateParams,
  type LiquidationResult,
} from "./StablecoinEngine.js";
