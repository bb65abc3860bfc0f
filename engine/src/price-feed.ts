/**
 * DSC Engine - Price Feeds
 *
 * Collateral prices come from Chainlink-style AggregatorV3 feeds reporting
 * USD with 8 decimals. The engine reads them synchronously; on-chain feeds
 * are pulled into memory by `ChainlinkPriceFeed.refresh()`.
 *
 * Staleness rules:
 *   - updatedAt == 0            → round never completed
 *   - answeredInRound < roundId → answer carried over from an older round
 *   - now - updatedAt > timeout → feed missed its heartbeat
 */

import { ethers, type ContractRunner } from "ethers";
import type { Checkpointable, Restore, StateJournal } from "./atomic";
import { DEFAULT_CONFIG } from "./config";
import { FEED_DECIMALS } from "./constants";
import { EngineError } from "./errors";
import { logger } from "./logger";
import { systemClock, toAddress, type Clock } from "./utils";

// ============================================================
//                     TYPES
// ============================================================

export interface RoundData {
  roundId: bigint;
  answer: bigint;
  startedAt: bigint;
  updatedAt: bigint;
  answeredInRound: bigint;
}

export interface PriceFeed {
  readonly address: string;
  readonly decimals: number;
  latestRoundData(): RoundData;
}

export const AGGREGATOR_V3_ABI = [
  "function decimals() external view returns (uint8)",
  "function latestRoundData() external view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
];

// ============================================================
//                     STALENESS CHECK
// ============================================================

export function staleCheckLatestRoundData(
  feed: PriceFeed,
  now: bigint,
  timeoutSeconds: number
): RoundData {
  if (!Number.isSafeInteger(timeoutSeconds) || timeoutSeconds <= 0) {
    throw new EngineError("InvalidConfig", `feed timeout must be a positive whole number of seconds, got ${timeoutSeconds}`);
  }
  const round = feed.latestRoundData();

  if (round.updatedAt === 0n || round.answeredInRound < round.roundId) {
    throw new EngineError("StalePrice", `feed ${feed.address} round ${round.roundId} is incomplete`);
  }
  const secondsSince = now - round.updatedAt;
  if (secondsSince > BigInt(timeoutSeconds)) {
    throw new EngineError(
      "StalePrice",
      `feed ${feed.address} last updated ${secondsSince}s ago (timeout ${timeoutSeconds}s)`
    );
  }
  return round;
}

// ============================================================
//                     MOCK AGGREGATOR
// ============================================================

/**
 * Settable aggregator for local systems and tests. Every update opens a new
 * round stamped with the clock.
 */
export class MockPriceFeed implements PriceFeed, Checkpointable {
  readonly address: string;
  private round: RoundData;

  constructor(
    address: string,
    initialAnswer: bigint,
    private readonly clock: Clock = systemClock,
    readonly decimals: number = FEED_DECIMALS,
    journal?: StateJournal
  ) {
    this.address = toAddress(address, "feed address");
    this.round = { roundId: 0n, answer: 0n, startedAt: 0n, updatedAt: 0n, answeredInRound: 0n };
    this.updateAnswer(initialAnswer);
    journal?.register(this);
  }

  checkpoint(): Restore {
    const round = this.round;
    return () => {
      this.round = round;
    };
  }

  updateAnswer(answer: bigint): void {
    const now = this.clock();
    const roundId = this.round.roundId + 1n;
    this.round = { roundId, answer, startedAt: now, updatedAt: now, answeredInRound: roundId };
  }

  /** Overwrite the whole round, e.g. to simulate an incomplete one. */
  updateRoundData(round: RoundData): void {
    this.round = { ...round };
  }

  latestRoundData(): RoundData {
    return { ...this.round };
  }
}

// ============================================================
//                     ON-CHAIN AGGREGATOR
// ============================================================

/** The two aggregator reads the feed needs; an ethers Contract provides both. */
export interface AggregatorV3Source {
  decimals(): Promise<unknown>;
  latestRoundData(): Promise<unknown>;
}

export class ChainlinkPriceFeed implements PriceFeed {
  private round: RoundData | null = null;

  constructor(
    readonly address: string,
    readonly decimals: number,
    private readonly source: AggregatorV3Source
  ) {}

  /** Bind to a deployed aggregator and fetch its first round. */
  static async connect(address: string, runner: ContractRunner): Promise<ChainlinkPriceFeed> {
    const checksummed = toAddress(address, "feed address");
    const contract = new ethers.Contract(checksummed, AGGREGATOR_V3_ABI, runner);
    return ChainlinkPriceFeed.fromSource(checksummed, {
      decimals: () => contract.getFunction("decimals")(),
      latestRoundData: () => contract.getFunction("latestRoundData")(),
    });
  }

  /** Connect through a JSON-RPC provider at `rpcUrl` (RPC_URL by default). */
  static async fromRpc(address: string, rpcUrl: string = DEFAULT_CONFIG.rpcUrl): Promise<ChainlinkPriceFeed> {
    if (!rpcUrl) {
      throw new EngineError("InvalidConfig", "RPC_URL is not set");
    }
    return ChainlinkPriceFeed.connect(address, new ethers.JsonRpcProvider(rpcUrl));
  }

  static async fromSource(address: string, source: AggregatorV3Source): Promise<ChainlinkPriceFeed> {
    const decimals = Number(asBigInt(await source.decimals(), "decimals"));
    const feed = new ChainlinkPriceFeed(toAddress(address, "feed address"), decimals, source);
    await feed.refresh();
    return feed;
  }

  async refresh(): Promise<RoundData> {
    const raw = await this.source.latestRoundData();
    const round = parseRoundData(raw);
    this.round = round;
    logger.debug(`[PriceFeed] ${this.address} round ${round.roundId} answer ${round.answer}`);
    return round;
  }

  latestRoundData(): RoundData {
    if (!this.round) {
      throw new EngineError("StalePrice", `feed ${this.address} has not been read yet`);
    }
    return { ...this.round };
  }
}

/** Decode the 5-tuple returned by latestRoundData() */
export function parseRoundData(raw: unknown): RoundData {
  if (!Array.isArray(raw) || raw.length < 5) {
    throw new EngineError("InvalidPrice", "latestRoundData returned an unexpected shape");
  }
  return {
    roundId: asBigInt(raw[0], "roundId"),
    answer: asBigInt(raw[1], "answer"),
    startedAt: asBigInt(raw[2], "startedAt"),
    updatedAt: asBigInt(raw[3], "updatedAt"),
    answeredInRound: asBigInt(raw[4], "answeredInRound"),
  };
}

function asBigInt(value: unknown, field: string): bigint {
  if (typeof value === "bigint") return value;
  if (typeof value === "number" && Number.isInteger(value)) return BigInt(value);
  throw new EngineError("InvalidPrice", `${field} is not an integer: ${String(value)}`);
}
