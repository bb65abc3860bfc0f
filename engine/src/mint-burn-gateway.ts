/**
 * DSC Engine - Mint/Burn Gateway
 *
 * The only caller of the DSC token's owner-gated mint and burn. Turns debt
 * ledger changes into token supply changes.
 *
 * mint(): project the health factor with the new debt, reject if it would
 * fall below the minimum, then commit. This is the solvency gate.
 */

import { MIN_HEALTH_FACTOR } from "./constants";
import type { DebtLedger } from "./debt-ledger";
import { EngineError, HealthFactorBrokenError } from "./errors";
import { calculateHealthFactor } from "./health-factor";
import type { MintableBurnableToken } from "./tokens";

export class MintBurnGateway {
  constructor(
    private readonly engine: string,
    private readonly dsc: MintableBurnableToken,
    private readonly debts: DebtLedger,
    private readonly collateralValueOf: (user: string) => bigint
  ) {}

  projectedHealthFactor(user: string, additionalDebt: bigint): bigint {
    return calculateHealthFactor(this.debts.debtOf(user) + additionalDebt, this.collateralValueOf(user));
  }

  mint(user: string, amount: bigint): void {
    if (amount <= 0n) throw new EngineError("InvalidAmount", "mint amount must be more than zero");

    const projected = this.projectedHealthFactor(user, amount);
    if (projected < MIN_HEALTH_FACTOR) {
      throw new HealthFactorBrokenError(user, projected, "borrower");
    }

    this.debts.increaseDebt(user, amount);
    if (!this.dsc.mint(this.engine, user, amount)) {
      throw new EngineError("MintFailed", `DSC mint of ${amount} to ${user} returned false`);
    }
  }

  /**
   * Repay `amount` of `onBehalfOf`'s debt with DSC pulled from `dscFrom`.
   * `dscFrom` must have approved the engine.
   */
  burn(onBehalfOf: string, dscFrom: string, amount: bigint): void {
    if (amount <= 0n) throw new EngineError("InvalidAmount", "burn amount must be more than zero");

    this.debts.decreaseDebt(onBehalfOf, amount);
    if (!this.dsc.transferFrom(this.engine, dscFrom, this.engine, amount)) {
      throw new EngineError("TransferFailed", `DSC transferFrom ${dscFrom} returned false`);
    }
    this.dsc.burn(this.engine, amount);
  }
}
