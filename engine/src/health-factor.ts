/**
 * DSC Engine - Health Factor Calculator
 *
 * Pure math over a position's total debt and collateral USD value.
 * No external dependencies.
 */

import {
  LIQUIDATION_PRECISION,
  LIQUIDATION_THRESHOLD,
  MAX_HEALTH_FACTOR,
  MIN_HEALTH_FACTOR,
  PRECISION,
} from "./constants";

/**
 * Calculate health factor for a position.
 * @param totalDebt      DSC minted (18 decimals)
 * @param collateralUsd  Total collateral value in USD (18 decimals)
 * @returns Health factor, 18 decimals (1e18 = 1.0); MAX_HEALTH_FACTOR when debt is zero
 */
export function calculateHealthFactor(totalDebt: bigint, collateralUsd: bigint): bigint {
  if (totalDebt === 0n) return MAX_HEALTH_FACTOR;
  const adjustedCollateral = (collateralUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return (adjustedCollateral * PRECISION) / totalDebt;
}

export function isLiquidatable(healthFactor: bigint): boolean {
  return healthFactor < MIN_HEALTH_FACTOR;
}

/**
 * Largest additional mint that keeps the position at or above the minimum
 * health factor. Zero if the position is already at or past the limit.
 */
export function maxMintable(collateralUsd: bigint, totalDebt: bigint): bigint {
  const borrowingPower = (collateralUsd * LIQUIDATION_THRESHOLD) / LIQUIDATION_PRECISION;
  return borrowingPower > totalDebt ? borrowingPower - totalDebt : 0n;
}
