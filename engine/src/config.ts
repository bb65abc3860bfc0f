/**
 * DSC Engine - Configuration
 *
 * Reads from environment variables with sensible defaults.
 */

import { DEFAULT_FEED_TIMEOUT_SECONDS } from "./constants";

export const LOG_LEVELS = ["error", "warn", "info", "http", "verbose", "debug", "silly"] as const;

export interface EngineConfig {
  /** Max age of a price feed round before it is rejected as stale */
  priceFeedTimeoutSeconds: number;
  /** winston log level */
  logLevel: string;
  /** JSON-RPC endpoint for ChainlinkPriceFeed.fromRpc (optional) */
  rpcUrl: string;
  /** Environment: production | staging | development | test */
  environment: string;
}

export const DEFAULT_CONFIG: EngineConfig = {
  priceFeedTimeoutSeconds: Number(process.env.PRICE_FEED_TIMEOUT_SECONDS) || DEFAULT_FEED_TIMEOUT_SECONDS,
  logLevel: process.env.LOG_LEVEL || "info",
  rpcUrl: process.env.RPC_URL || "",
  environment: process.env.NODE_ENV || "development",
};

/**
 * Validate configuration values.
 * Throws on the first problem found.
 */
export function validateConfig(config: EngineConfig): void {
  if (!Number.isInteger(config.priceFeedTimeoutSeconds) || config.priceFeedTimeoutSeconds < 60) {
    throw new Error("PRICE_FEED_TIMEOUT_SECONDS must be an integer >= 60");
  }
  if (!LOG_LEVELS.some((level) => level === config.logLevel)) {
    throw new Error(`LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }
  if (config.rpcUrl && config.environment === "production" && !config.rpcUrl.startsWith("https://")) {
    throw new Error("RPC_URL must use HTTPS in production");
  }
}

/** DEFAULT_CONFIG with overrides applied, validated. */
export function loadConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  const config = { ...DEFAULT_CONFIG, ...overrides };
  validateConfig(config);
  return config;
}
