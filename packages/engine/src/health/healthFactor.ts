// ============================================
// Health Factor
// ============================================

import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "../constants.js";

/**
 * Threshold-adjusted collateral over debt, 18 decimals. 1e18 is the solvency
 * line; an account without debt gets {@link MAX_HEALTH_FACTOR}.
 */
export function calculateHealthFactor(debt: bigint, collateralValueUsd: bigint): bigint {
  if (debt === 0n) return MAX_HEALTH_FACTOR;
  const adjusted = (collateralValueUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjusted * PRECISION) / debt;
}

export function isLiquidatable(healthFactor: bigint): boolean {
  return healthFactor < MIN_HEALTH_FACTOR;
}
