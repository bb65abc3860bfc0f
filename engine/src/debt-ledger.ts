/**
 * DSC Engine - Debt Ledger
 *
 * Outstanding DSC minted per user. Pure arithmetic: token supply changes
 * happen in MintBurnGateway.
 */

import type { Checkpointable, Restore } from "./atomic";
import { EngineError } from "./errors";

export class DebtLedger implements Checkpointable {
  private debts = new Map<string, bigint>();

  checkpoint(): Restore {
    const debts = new Map(this.debts);
    return () => {
      this.debts = debts;
    };
  }

  debtOf(user: string): bigint {
    return this.debts.get(user) ?? 0n;
  }

  increaseDebt(user: string, amount: bigint): void {
    if (amount <= 0n) throw new EngineError("InvalidAmount", "debt increase must be more than zero");
    this.debts.set(user, this.debtOf(user) + amount);
  }

  decreaseDebt(user: string, amount: bigint): void {
    if (amount <= 0n) throw new EngineError("InvalidAmount", "debt decrease must be more than zero");
    const debt = this.debtOf(user);
    if (amount > debt) {
      throw new EngineError("InsufficientDebt", `${user} owes ${debt}, cannot repay ${amount}`);
    }
    this.debts.set(user, debt - amount);
  }
}
