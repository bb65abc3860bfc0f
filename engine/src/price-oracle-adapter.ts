/**
 * DSC Engine - Price Oracle Adapter
 *
 * One adapter per collateral asset. Converts between asset quantity and USD
 * value (both 18 decimals) using the asset's 8-decimal feed:
 *
 *   usdValue    = price * 1e10 * quantity / 1e18
 *   quantityFor = usd * 1e18 / (price * 1e10)
 *
 * Both truncate toward zero, so a round trip can lose the remainder.
 * The feed is read on every call; nothing is cached.
 */

import { ADDITIONAL_FEED_PRECISION, DEFAULT_FEED_TIMEOUT_SECONDS, FEED_DECIMALS, PRECISION } from "./constants";
import { EngineError } from "./errors";
import { staleCheckLatestRoundData, type PriceFeed } from "./price-feed";
import { systemClock, type Clock } from "./utils";

export interface PriceOracleAdapterOptions {
  clock?: Clock;
  timeoutSeconds?: number;
}

export class PriceOracleAdapter {
  private readonly clock: Clock;
  private readonly timeoutSeconds: number;

  constructor(
    readonly feed: PriceFeed,
    options: PriceOracleAdapterOptions = {}
  ) {
    if (feed.decimals !== FEED_DECIMALS) {
      throw new EngineError("InvalidFeed", `feed ${feed.address} reports ${feed.decimals} decimals, expected ${FEED_DECIMALS}`);
    }
    const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_FEED_TIMEOUT_SECONDS;
    if (!Number.isSafeInteger(timeoutSeconds) || timeoutSeconds <= 0) {
      throw new EngineError("InvalidConfig", `feed timeout must be a positive whole number of seconds, got ${timeoutSeconds}`);
    }
    this.clock = options.clock ?? systemClock;
    this.timeoutSeconds = timeoutSeconds;
  }

  /** Latest USD price, 8 decimals. */
  price(): bigint {
    const { answer } = staleCheckLatestRoundData(this.feed, this.clock(), this.timeoutSeconds);
    if (answer <= 0n) {
      throw new EngineError("InvalidPrice", `feed ${this.feed.address} answered ${answer}`);
    }
    return answer;
  }

  usdValue(quantity: bigint): bigint {
    return (this.price() * ADDITIONAL_FEED_PRECISION * quantity) / PRECISION;
  }

  quantityFor(usdValue: bigint): bigint {
    return (usdValue * PRECISION) / (this.price() * ADDITIONAL_FEED_PRECISION);
  }
}
