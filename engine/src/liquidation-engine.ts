/**
 * DSC Engine - Liquidation Engine
 *
 * Lets a third party repay part of an undercollateralized position's debt in
 * exchange for the equivalent collateral plus a 10% bonus.
 *
 * Flow:
 *   1. Reject if the position is healthy (HealthFactorOk)
 *   2. Convert the debt covered into collateral quantity, add the bonus
 *   3. Move the collateral from the position to the liquidator
 *   4. Burn the covered debt using the liquidator's DSC
 *   5. Reject unless the position's health factor strictly improved
 *   6. Reject if the liquidator's own position is now unhealthy
 *
 * The seize amount is never clamped to what the position holds: an
 * oversized request fails with InsufficientCollateral.
 */

import { LIQUIDATION_BONUS, LIQUIDATION_PRECISION, MIN_HEALTH_FACTOR } from "./constants";
import type { CollateralVault } from "./collateral-vault";
import { EngineError, HealthFactorBrokenError } from "./errors";
import type { EventSink } from "./events";
import type { MintBurnGateway } from "./mint-burn-gateway";
import type { PriceOracleAdapter } from "./price-oracle-adapter";

export interface SeizeBreakdown {
  /** Collateral worth exactly the debt covered */
  collateralFromDebt: bigint;
  bonusCollateral: bigint;
  totalSeized: bigint;
}

export interface LiquidationResult extends SeizeBreakdown {
  startingHealthFactor: bigint;
  endingHealthFactor: bigint;
}

export interface LiquidationDeps {
  vault: CollateralVault;
  gateway: MintBurnGateway;
  oracles: ReadonlyMap<string, PriceOracleAdapter>;
  healthFactorOf: (user: string) => bigint;
  emit: EventSink;
}

export class LiquidationEngine {
  constructor(private readonly deps: LiquidationDeps) {}

  previewSeize(asset: string, debtToCover: bigint): SeizeBreakdown {
    const collateralFromDebt = this.oracleFor(asset).quantityFor(debtToCover);
    const bonusCollateral = (collateralFromDebt * LIQUIDATION_BONUS) / LIQUIDATION_PRECISION;
    return { collateralFromDebt, bonusCollateral, totalSeized: collateralFromDebt + bonusCollateral };
  }

  liquidate(liquidator: string, user: string, asset: string, debtToCover: bigint): LiquidationResult {
    const { vault, gateway, healthFactorOf, emit } = this.deps;
    if (debtToCover <= 0n) throw new EngineError("InvalidAmount", "debt to cover must be more than zero");
    this.oracleFor(asset);

    const startingHealthFactor = healthFactorOf(user);
    if (startingHealthFactor >= MIN_HEALTH_FACTOR) {
      throw new EngineError("HealthFactorOk", `${user} health factor ${startingHealthFactor} is not liquidatable`);
    }

    const seize = this.previewSeize(asset, debtToCover);
    vault.redeem(user, asset, seize.totalSeized, liquidator);
    gateway.burn(user, liquidator, debtToCover);

    const endingHealthFactor = healthFactorOf(user);
    if (endingHealthFactor <= startingHealthFactor) {
      throw new EngineError(
        "HealthFactorNotImproved",
        `${user} health factor went from ${startingHealthFactor} to ${endingHealthFactor}`
      );
    }

    const liquidatorHealthFactor = healthFactorOf(liquidator);
    if (liquidatorHealthFactor < MIN_HEALTH_FACTOR) {
      throw new HealthFactorBrokenError(liquidator, liquidatorHealthFactor, "liquidator");
    }

    emit({
      type: "Liquidated",
      liquidator,
      user,
      asset,
      debtCovered: debtToCover,
      collateralSeized: seize.totalSeized,
    });
    return { ...seize, startingHealthFactor, endingHealthFactor };
  }

  private oracleFor(asset: string): PriceOracleAdapter {
    const oracle = this.deps.oracles.get(asset);
    if (!oracle) throw new EngineError("UnsupportedAsset", `${asset} is not an allowed collateral`);
    return oracle;
  }
}
