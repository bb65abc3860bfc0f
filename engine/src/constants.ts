/**
 * DSC Engine - Protocol Constants
 *
 * Fixed at deployment. All ratios are 18-decimal fixed point unless noted.
 */

import { ethers } from "ethers";

/** 1.0 in 18-decimal fixed point */
export const PRECISION = 10n ** 18n;

/** Scales an 8-decimal feed answer up to 18 decimals */
export const ADDITIONAL_FEED_PRECISION = 10n ** 10n;

/** Decimals every collateral price feed must report */
export const FEED_DECIMALS = 8;

/** Percentage of collateral USD value that counts toward borrowing power */
export const LIQUIDATION_THRESHOLD = 50n;

/** Denominator for LIQUIDATION_THRESHOLD and LIQUIDATION_BONUS */
export const LIQUIDATION_PRECISION = 100n;

/** Extra collateral (percent) a liquidator receives on top of the debt covered */
export const LIQUIDATION_BONUS = 10n;

export const MIN_HEALTH_FACTOR = PRECISION;

/** Health factor of a position with no debt */
export const MAX_HEALTH_FACTOR = ethers.MaxUint256;

/** Default price feed heartbeat tolerance: 3 hours */
export const DEFAULT_FEED_TIMEOUT_SECONDS = 3 * 60 * 60;

export interface EngineConstants {
  precision: bigint;
  additionalFeedPrecision: bigint;
  feedDecimals: number;
  liquidationThreshold: bigint;
  liquidationPrecision: bigint;
  liquidationBonus: bigint;
  minHealthFactor: bigint;
  maxHealthFactor: bigint;
}

export const ENGINE_CONSTANTS: Readonly<EngineConstants> = Object.freeze({
  precision: PRECISION,
  additionalFeedPrecision: ADDITIONAL_FEED_PRECISION,
  feedDecimals: FEED_DECIMALS,
  liquidationThreshold: LIQUIDATION_THRESHOLD,
  liquidationPrecision: LIQUIDATION_PRECISION,
  liquidationBonus: LIQUIDATION_BONUS,
  minHealthFactor: MIN_HEALTH_FACTOR,
  maxHealthFactor: MAX_HEALTH_FACTOR,
});
