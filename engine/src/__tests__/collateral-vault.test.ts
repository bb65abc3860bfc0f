/**
 * CollateralVault ledger, custody transfers and re-entrancy ordering
 */

import { CollateralVault } from "../collateral-vault";
import { DscEngine } from "../engine";
import type { EngineEvent } from "../events";
import { MockPriceFeed } from "../price-feed";
import { DecentralizedStableCoin, type FungibleToken } from "../tokens";
import { StateJournal } from "../atomic";
import {
  DEPLOYER,
  DSC_ADDRESS,
  ENGINE,
  ETH_FEED_ADDRESS,
  ETH_USD_PRICE,
  OTHER,
  TestToken,
  USER,
  WBTC_ADDRESS,
  WETH_ADDRESS,
  fixedClock,
  parseEther,
} from "./helpers/fixture";

describe("CollateralVault", () => {
  let weth: TestToken;
  let vault: CollateralVault;
  let events: EngineEvent[];

  beforeEach(() => {
    weth = new TestToken(WETH_ADDRESS, "WETH");
    weth.mint(USER, parseEther("10"));
    events = [];
    vault = new CollateralVault(ENGINE, new Map<string, FungibleToken>([[WETH_ADDRESS, weth]]), (e) => events.push(e));
  });

  it("credits the user and takes custody on deposit", () => {
    weth.approve(USER, ENGINE, parseEther("4"));
    vault.deposit(USER, WETH_ADDRESS, parseEther("4"));

    expect(vault.balanceOf(USER, WETH_ADDRESS)).toBe(parseEther("4"));
    expect(weth.balanceOf(ENGINE)).toBe(parseEther("4"));
    expect(weth.balanceOf(USER)).toBe(parseEther("6"));
    expect(events).toEqual([{ type: "CollateralDeposited", user: USER, asset: WETH_ADDRESS, amount: parseEther("4") }]);
  });

  it("returns to the pre-deposit balance after a full redeem", () => {
    weth.approve(USER, ENGINE, parseEther("3"));
    vault.deposit(USER, WETH_ADDRESS, parseEther("3"));
    vault.redeem(USER, WETH_ADDRESS, parseEther("3"), USER);

    expect(vault.balanceOf(USER, WETH_ADDRESS)).toBe(0n);
    expect(weth.balanceOf(USER)).toBe(parseEther("10"));
    expect(vault.positionOf(USER)).toEqual([]);
  });

  it("redeems to a different recipient", () => {
    weth.approve(USER, ENGINE, parseEther("2"));
    vault.deposit(USER, WETH_ADDRESS, parseEther("2"));
    vault.redeem(USER, WETH_ADDRESS, parseEther("0.5"), OTHER);

    expect(weth.balanceOf(OTHER)).toBe(parseEther("0.5"));
    expect(events[1]).toEqual({
      type: "CollateralRedeemed",
      redeemedFrom: USER,
      redeemedTo: OTHER,
      asset: WETH_ADDRESS,
      amount: parseEther("0.5"),
    });
  });

  it("rejects zero amounts before checking the asset", () => {
    expect(() => vault.deposit(USER, WBTC_ADDRESS, 0n)).toThrow(/^InvalidAmount:/);
    expect(() => vault.redeem(USER, WETH_ADDRESS, 0n, USER)).toThrow(/^InvalidAmount:/);
  });

  it("rejects assets that are not listed", () => {
    expect(() => vault.deposit(USER, WBTC_ADDRESS, 1n)).toThrow(/^UnsupportedAsset:/);
    expect(vault.isSupported(WBTC_ADDRESS)).toBe(false);
  });

  it("rejects redeeming more than the balance", () => {
    weth.approve(USER, ENGINE, 5n);
    vault.deposit(USER, WETH_ADDRESS, 5n);
    expect(() => vault.redeem(USER, WETH_ADDRESS, 6n, USER)).toThrow(/^InsufficientCollateral:/);
    expect(vault.balanceOf(USER, WETH_ADDRESS)).toBe(5n);
  });
});

// ============================================================
//  Re-entrancy: ledger first, token call second
// ============================================================

/** Collateral token that calls back into the engine before moving funds. */
class HookedToken extends TestToken {
  onTransferFrom: (() => void) | null = null;

  override transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const hook = this.onTransferFrom;
    this.onTransferFrom = null;
    hook?.();
    return super.transferFrom(spender, from, to, amount);
  }
}

class RefusingToken extends TestToken {
  override transferFrom(): boolean {
    return false;
  }
}

function deployWith(token: TestToken) {
  const journal = new StateJournal();
  journal.register(token);
  const feed = new MockPriceFeed(ETH_FEED_ADDRESS, ETH_USD_PRICE, fixedClock, 8, journal);
  const dsc = new DecentralizedStableCoin(DSC_ADDRESS, DEPLOYER, journal);
  const engine = new DscEngine([token], [feed], dsc, { address: ENGINE, journal, clock: fixedClock });
  dsc.transferOwnership(DEPLOYER, ENGINE);
  token.mint(USER, parseEther("10"));
  token.approve(USER, ENGINE, parseEther("10"));
  const events: EngineEvent[] = [];
  engine.subscribe((e) => events.push(e));
  return { engine, events };
}

describe("CollateralVault re-entrancy", () => {
  it("shows a re-entrant caller the already-credited balance", () => {
    const token = new HookedToken(WETH_ADDRESS, "WETH");
    const { engine } = deployWith(token);
    let observed = -1n;
    token.onTransferFrom = () => {
      observed = engine.getCollateralBalanceOfUser(USER, WETH_ADDRESS);
    };

    engine.depositCollateral(USER, WETH_ADDRESS, parseEther("5"));

    expect(observed).toBe(parseEther("5"));
    expect(engine.getCollateralBalanceOfUser(USER, WETH_ADDRESS)).toBe(parseEther("5"));
  });

  it("rolls back the whole deposit when a re-entrant redeem fails", () => {
    const token = new HookedToken(WETH_ADDRESS, "WETH");
    const { engine, events } = deployWith(token);
    token.onTransferFrom = () => {
      // the engine does not hold the tokens yet, so paying out fails
      engine.redeemCollateral(USER, WETH_ADDRESS, parseEther("5"));
    };

    expect(() => engine.depositCollateral(USER, WETH_ADDRESS, parseEther("5"))).toThrow(/^InsufficientBalance:/);

    expect(engine.getCollateralBalanceOfUser(USER, WETH_ADDRESS)).toBe(0n);
    expect(token.balanceOf(USER)).toBe(parseEther("10"));
    expect(token.allowance(USER, ENGINE)).toBe(parseEther("10"));
    expect(events).toEqual([]);
  });

  it("undoes only the re-entrant call when the token swallows its failure", () => {
    const token = new HookedToken(WETH_ADDRESS, "WETH");
    const { engine, events } = deployWith(token);
    let innerError: unknown = null;
    token.onTransferFrom = () => {
      try {
        engine.redeemCollateral(USER, WETH_ADDRESS, parseEther("5"));
      } catch (err) {
        innerError = err;
      }
    };

    engine.depositCollateral(USER, WETH_ADDRESS, parseEther("5"));

    expect(innerError).toMatchObject({ code: "InsufficientBalance" });
    expect(engine.getCollateralBalanceOfUser(USER, WETH_ADDRESS)).toBe(parseEther("5"));
    expect(token.balanceOf(ENGINE)).toBe(parseEther("5"));
    expect(events.map((e) => e.type)).toEqual(["CollateralDeposited"]);
  });

  it("fails with TransferFailed when the token returns false", () => {
    const token = new RefusingToken(WETH_ADDRESS, "WETH");
    const { engine, events } = deployWith(token);

    expect(() => engine.depositCollateral(USER, WETH_ADDRESS, parseEther("1"))).toThrow(/^TransferFailed:/);
    expect(engine.getCollateralBalanceOfUser(USER, WETH_ADDRESS)).toBe(0n);
    expect(events).toEqual([]);
  });
});
