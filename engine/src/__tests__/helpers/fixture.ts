/**
 * Shared deployment fixture: WETH/WBTC collateral with $2000 / $1000 feeds,
 * a DSC token owned by the engine, and a funded user and liquidator.
 */

import { ethers } from "ethers";
import { StateJournal } from "../../atomic";
import { DscEngine } from "../../engine";
import type { EngineEvent } from "../../events";
import { MockPriceFeed } from "../../price-feed";
import { DecentralizedStableCoin, InMemoryToken } from "../../tokens";
import type { Clock } from "../../utils";

// Digit-only addresses are already in checksum form.
export const DEPLOYER = "0x" + "10".repeat(20);
export const USER = "0x" + "11".repeat(20);
export const LIQUIDATOR = "0x" + "22".repeat(20);
export const OTHER = "0x" + "33".repeat(20);
export const ENGINE = "0x" + "99".repeat(20);

export const WETH_ADDRESS = "0x" + "01".repeat(20);
export const WBTC_ADDRESS = "0x" + "02".repeat(20);
export const ETH_FEED_ADDRESS = "0x" + "03".repeat(20);
export const BTC_FEED_ADDRESS = "0x" + "04".repeat(20);
export const DSC_ADDRESS = "0x" + "05".repeat(20);

export const ETH_USD_PRICE = 2000n * 10n ** 8n;
export const BTC_USD_PRICE = 1000n * 10n ** 8n;

export const NOW = 1_700_000_000n;
export const fixedClock: Clock = () => NOW;

export const parseEther = ethers.parseEther;

/** Collateral token with an open faucet, like ERC20Mock. */
export class TestToken extends InMemoryToken {
  mint(to: string, amount: bigint): void {
    this.credit(to, amount);
  }
}

export interface Fixture {
  journal: StateJournal;
  engine: DscEngine;
  dsc: DecentralizedStableCoin;
  weth: TestToken;
  wbtc: TestToken;
  ethFeed: MockPriceFeed;
  btcFeed: MockPriceFeed;
  events: EngineEvent[];
}

export function deployFixture(): Fixture {
  const journal = new StateJournal();
  const weth = new TestToken(WETH_ADDRESS, "WETH", journal);
  const wbtc = new TestToken(WBTC_ADDRESS, "WBTC", journal);
  const ethFeed = new MockPriceFeed(ETH_FEED_ADDRESS, ETH_USD_PRICE, fixedClock, 8, journal);
  const btcFeed = new MockPriceFeed(BTC_FEED_ADDRESS, BTC_USD_PRICE, fixedClock, 8, journal);
  const dsc = new DecentralizedStableCoin(DSC_ADDRESS, DEPLOYER, journal);

  const engine = new DscEngine([weth, wbtc], [ethFeed, btcFeed], dsc, {
    address: ENGINE,
    journal,
    clock: fixedClock,
  });
  dsc.transferOwnership(DEPLOYER, ENGINE);

  weth.mint(USER, parseEther("10"));
  weth.mint(LIQUIDATOR, parseEther("20"));

  const events: EngineEvent[] = [];
  engine.subscribe((event) => events.push(event));

  return { journal, engine, dsc, weth, wbtc, ethFeed, btcFeed, events };
}

/** Approve and deposit `collateral` WETH, then mint `debt` DSC. */
export function depositAndMint(f: Fixture, account: string, collateral: bigint, debt: bigint): void {
  f.weth.approve(account, ENGINE, collateral);
  f.engine.depositCollateralAndMintDsc(account, WETH_ADDRESS, collateral, debt);
}

/** Run `fn` and return what it threw. */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected the call to throw");
}
