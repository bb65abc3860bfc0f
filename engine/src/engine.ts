/**
 * DSC Engine
 *
 * Public surface of the collateral-backed synthetic dollar: users pledge
 * allow-listed collateral, mint DSC against it at zero interest, and anyone
 * may liquidate a position whose health factor drops below 1.0.
 *
 * Every operation is one atomic step on the engine's StateJournal. The
 * engine registers its collateral tokens and the DSC token on that journal,
 * so a rejected step undoes their transfers too. Mock feeds roll back only
 * when registered on the same journal by the caller.
 *
 * Usage:
 *   const engine = new DscEngine([weth, wbtc], [ethFeed, btcFeed], dsc, { address });
 *   dsc.transferOwnership(deployer, engine.address);
 *   engine.depositCollateralAndMintDsc(user, weth.address, parseEther("10"), parseEther("5000"));
 */

import type { Logger } from "winston";
import { StateJournal } from "./atomic";
import { CollateralVault } from "./collateral-vault";
import { DEFAULT_CONFIG } from "./config";
import { ENGINE_CONSTANTS, type EngineConstants, MIN_HEALTH_FACTOR } from "./constants";
import { DebtLedger } from "./debt-ledger";
import { EngineError, HealthFactorBrokenError, errorCode, errorMessage } from "./errors";
import type { EngineEvent } from "./events";
import { calculateHealthFactor, maxMintable } from "./health-factor";
import { LiquidationEngine, type LiquidationResult, type SeizeBreakdown } from "./liquidation-engine";
import { logger as defaultLogger } from "./logger";
import { engineOperationsTotal, liquidationsTotal } from "./metrics";
import { MintBurnGateway } from "./mint-burn-gateway";
import type { PriceFeed } from "./price-feed";
import { PriceOracleAdapter } from "./price-oracle-adapter";
import type { FungibleToken, MintableBurnableToken } from "./tokens";
import { fmt, toAddress, type Clock } from "./utils";

// ============================================================
//                     TYPES
// ============================================================

export interface DscEngineOptions {
  /** Account that holds custody of collateral and owns the DSC token */
  address: string;
  /** Shared with tokens/feeds that should roll back with engine steps */
  journal?: StateJournal;
  clock?: Clock;
  priceFeedTimeoutSeconds?: number;
  logger?: Logger;
}

export interface AccountInformation {
  totalDscMinted: bigint;
  collateralValueInUsd: bigint;
}

type Operation =
  | "depositCollateral"
  | "redeemCollateral"
  | "mintDsc"
  | "burnDsc"
  | "depositCollateralAndMintDsc"
  | "redeemCollateralForDsc"
  | "liquidate";

// ============================================================
//                     ENGINE
// ============================================================

export class DscEngine {
  readonly address: string;
  readonly journal: StateJournal;

  private readonly tokens = new Map<string, FungibleToken>();
  private readonly oracles = new Map<string, PriceOracleAdapter>();
  private readonly debts = new DebtLedger();
  private readonly vault: CollateralVault;
  private readonly gateway: MintBurnGateway;
  private readonly liquidations: LiquidationEngine;
  private readonly listeners = new Set<(event: EngineEvent) => void>();
  private readonly log: Logger;

  constructor(
    assets: readonly FungibleToken[],
    feeds: readonly PriceFeed[],
    private readonly dsc: MintableBurnableToken,
    options: DscEngineOptions
  ) {
    if (assets.length !== feeds.length) {
      throw new EngineError("LengthMismatch", `${assets.length} collateral assets but ${feeds.length} price feeds`);
    }
    this.address = toAddress(options.address, "engine address");
    this.journal = options.journal ?? new StateJournal();
    this.log = options.logger ?? defaultLogger;

    const timeoutSeconds = options.priceFeedTimeoutSeconds ?? DEFAULT_CONFIG.priceFeedTimeoutSeconds;
    assets.forEach((token, i) => {
      const asset = toAddress(token.address, "collateral asset");
      if (this.tokens.has(asset)) {
        throw new EngineError("DuplicateAsset", `${asset} is listed more than once`);
      }
      this.tokens.set(asset, token);
      this.oracles.set(asset, new PriceOracleAdapter(feeds[i], { clock: options.clock, timeoutSeconds }));
    });

    const emit = (event: EngineEvent) => this.journal.afterCommit(() => this.publish(event));
    this.vault = new CollateralVault(this.address, this.tokens, emit);
    this.gateway = new MintBurnGateway(this.address, dsc, this.debts, (user) => this.getAccountCollateralValue(user));
    this.liquidations = new LiquidationEngine({
      vault: this.vault,
      gateway: this.gateway,
      oracles: this.oracles,
      healthFactorOf: (user) => this.getHealthFactor(user),
      emit,
    });

    this.journal.register(this.vault);
    this.journal.register(this.debts);
    for (const token of this.tokens.values()) this.journal.register(token);
    this.journal.register(dsc);

    this.log.info(
      `[DscEngine] ${this.address} listing ${[...this.tokens.values()].map((t) => t.symbol).join(", ") || "no collateral"}`
    );
  }

  // ============================================================
  //                     OPERATIONS
  // ============================================================

  depositCollateral(sender: string, asset: string, amount: bigint): void {
    this.execute("depositCollateral", () => {
      const user = toAddress(sender, "sender");
      this.vault.deposit(user, toAddress(asset, "asset"), amount);
      this.log.debug(`[DscEngine] ${user} deposited ${fmt(amount)} of ${asset}`);
    });
  }

  /** Withdraw collateral; the remaining position must stay healthy. */
  redeemCollateral(sender: string, asset: string, amount: bigint): void {
    this.execute("redeemCollateral", () => {
      const user = toAddress(sender, "sender");
      this.vault.redeem(user, toAddress(asset, "asset"), amount, user);
      this.revertIfHealthFactorIsBroken(user);
      this.log.debug(`[DscEngine] ${user} redeemed ${fmt(amount)} of ${asset}`);
    });
  }

  mintDsc(sender: string, amount: bigint): void {
    this.execute("mintDsc", () => {
      const user = toAddress(sender, "sender");
      this.gateway.mint(user, amount);
      this.log.debug(`[DscEngine] ${user} minted ${fmt(amount)} DSC`);
    });
  }

  /** Repay own debt. The sender must have approved the engine for `amount` DSC. */
  burnDsc(sender: string, amount: bigint): void {
    this.execute("burnDsc", () => {
      const user = toAddress(sender, "sender");
      this.gateway.burn(user, user, amount);
      this.log.debug(`[DscEngine] ${user} burned ${fmt(amount)} DSC`);
    });
  }

  depositCollateralAndMintDsc(sender: string, asset: string, collateralAmount: bigint, dscAmount: bigint): void {
    this.execute("depositCollateralAndMintDsc", () => {
      const user = toAddress(sender, "sender");
      this.vault.deposit(user, toAddress(asset, "asset"), collateralAmount);
      this.gateway.mint(user, dscAmount);
      this.log.debug(`[DscEngine] ${user} deposited ${fmt(collateralAmount)} of ${asset} and minted ${fmt(dscAmount)} DSC`);
    });
  }

  /** Burn DSC, then withdraw collateral, in one step. */
  redeemCollateralForDsc(sender: string, asset: string, collateralAmount: bigint, dscAmount: bigint): void {
    this.execute("redeemCollateralForDsc", () => {
      const user = toAddress(sender, "sender");
      this.gateway.burn(user, user, dscAmount);
      this.vault.redeem(user, toAddress(asset, "asset"), collateralAmount, user);
      this.revertIfHealthFactorIsBroken(user);
      this.log.debug(`[DscEngine] ${user} burned ${fmt(dscAmount)} DSC and redeemed ${fmt(collateralAmount)} of ${asset}`);
    });
  }

  /**
   * Cover `debtToCover` of `user`'s debt and take the equivalent `asset`
   * collateral plus the liquidation bonus. The liquidator must have approved
   * the engine for `debtToCover` DSC.
   */
  liquidate(liquidatorAddress: string, userAddress: string, asset: string, debtToCover: bigint): LiquidationResult {
    const { user, collateral, result } = this.execute("liquidate", () => {
      const liquidator = toAddress(liquidatorAddress, "liquidator");
      const user = toAddress(userAddress, "user");
      const collateral = toAddress(asset, "asset");
      return { user, collateral, result: this.liquidations.liquidate(liquidator, user, collateral, debtToCover) };
    });

    liquidationsTotal.inc({ asset: collateral });
    this.log.info(
      `[DscEngine] Liquidated ${user}: covered ${fmt(debtToCover)} DSC, seized ${fmt(result.totalSeized)} of ${collateral}` +
        ` (health factor ${fmt(result.startingHealthFactor)} -> ${fmt(result.endingHealthFactor)})`
    );
    return result;
  }

  // ============================================================
  //                     QUERIES
  // ============================================================

  getAccountInformation(user: string): AccountInformation {
    const account = toAddress(user, "user");
    return {
      totalDscMinted: this.debts.debtOf(account),
      collateralValueInUsd: this.getAccountCollateralValue(account),
    };
  }

  /** Sum of the USD value of every collateral balance the user holds. */
  getAccountCollateralValue(user: string): bigint {
    let total = 0n;
    for (const [asset, amount] of this.vault.positionOf(toAddress(user, "user"))) {
      total += this.oracleFor(asset).usdValue(amount);
    }
    return total;
  }

  getCollateralBalanceOfUser(user: string, asset: string): bigint {
    return this.vault.balanceOf(toAddress(user, "user"), toAddress(asset, "asset"));
  }

  getHealthFactor(user: string): bigint {
    const { totalDscMinted, collateralValueInUsd } = this.getAccountInformation(user);
    return calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  /** Health factor of a hypothetical position. */
  calculateHealthFactor(totalDscMinted: bigint, collateralValueInUsd: bigint): bigint {
    return calculateHealthFactor(totalDscMinted, collateralValueInUsd);
  }

  /** Additional DSC `user` could mint right now without breaking the minimum. */
  getMaxMintable(user: string): bigint {
    const { totalDscMinted, collateralValueInUsd } = this.getAccountInformation(user);
    return maxMintable(collateralValueInUsd, totalDscMinted);
  }

  getUsdValue(asset: string, amount: bigint): bigint {
    return this.oracleFor(toAddress(asset, "asset")).usdValue(amount);
  }

  getTokenAmountFromUsd(asset: string, usdAmount: bigint): bigint {
    return this.oracleFor(toAddress(asset, "asset")).quantityFor(usdAmount);
  }

  previewLiquidation(asset: string, debtToCover: bigint): SeizeBreakdown {
    return this.liquidations.previewSeize(toAddress(asset, "asset"), debtToCover);
  }

  getCollateralTokens(): string[] {
    return [...this.tokens.keys()];
  }

  getCollateralTokenPriceFeed(asset: string): string | undefined {
    return this.oracles.get(toAddress(asset, "asset"))?.feed.address;
  }

  getDsc(): string {
    return this.dsc.address;
  }

  getConstants(): Readonly<EngineConstants> {
    return ENGINE_CONSTANTS;
  }

  /** Listen for committed events. Returns an unsubscribe function. */
  subscribe(listener: (event: EngineEvent) => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ============================================================
  //                     INTERNALS
  // ============================================================

  private execute<T>(operation: Operation, step: () => T): T {
    try {
      const result = this.journal.atomic(step);
      engineOperationsTotal.inc({ operation, status: "ok" });
      return result;
    } catch (err) {
      engineOperationsTotal.inc({ operation, status: errorCode(err) });
      this.log.warn(`[DscEngine] ${operation} rejected: ${errorMessage(err)}`);
      throw err;
    }
  }

  private revertIfHealthFactorIsBroken(user: string): void {
    const healthFactor = this.getHealthFactor(user);
    if (healthFactor < MIN_HEALTH_FACTOR) {
      throw new HealthFactorBrokenError(user, healthFactor, "borrower");
    }
  }

  private oracleFor(asset: string): PriceOracleAdapter {
    const oracle = this.oracles.get(asset);
    if (!oracle) throw new EngineError("UnsupportedAsset", `${asset} is not an allowed collateral`);
    return oracle;
  }

  private publish(event: EngineEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        this.log.error(`[DscEngine] ${event.type} listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
