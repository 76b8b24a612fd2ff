// ============================================
// Engine Parameters (18-decimal fixed point)
// ============================================

import { maxUint256 } from "viem";

/** 1.0 in the engine's fixed-point unit. */
export const PRECISION = 10n ** 18n;

/** Price feeds report USD with 8 decimals. */
export const FEED_PRECISION = 10n ** 8n;

/** Lifts an 8-decimal feed answer to 18 decimals. */
export const ADDITIONAL_FEED_PRECISION = PRECISION / FEED_PRECISION;

/** Collateral counts at 50% of its value, i.e. 200% collateralisation. */
export const LIQUIDATION_THRESHOLD = 50n;

/** Liquidators receive 10% on top of the debt-equivalent collateral. */
export const LIQUIDATION_BONUS = 10n;

export const LIQUIDATION_PRECISION = 100n;

export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor of an account without debt. */
export const MAX_HEALTH_FACTOR = maxUint256;

export interface EngineParameters {
  precision: bigint;
  feedPrecision: bigint;
  additionalFeedPrecision: bigint;
  liquidationThreshold: bigint;
  liquidationBonus: bigint;
  liquidationPrecision: bigint;
  minHealthFactor: bigint;
  oracleTimeoutSeconds: number;
}
