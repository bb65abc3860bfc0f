/**
 * DSC Engine - Collateral Vault
 *
 * Per-user, per-asset ledger of pledged collateral. The vault account
 * (`custodian`) holds the tokens.
 *
 * Ordering contract: the ledger is written before the external token call.
 * A token that re-enters the engine from inside transfer/transferFrom sees
 * the post-mutation balances.
 *
 * redeem() does not check health: the engine checks the owner afterwards,
 * and liquidation redeems on behalf of a third party.
 */

import type { Checkpointable, Restore } from "./atomic";
import { EngineError } from "./errors";
import type { EventSink } from "./events";
import type { FungibleToken } from "./tokens";

export class CollateralVault implements Checkpointable {
  private balances = new Map<string, Map<string, bigint>>();

  constructor(
    private readonly custodian: string,
    private readonly assets: ReadonlyMap<string, FungibleToken>,
    private readonly emit: EventSink
  ) {}

  checkpoint(): Restore {
    const balances = new Map(
      [...this.balances].map(([user, perAsset]) => [user, new Map(perAsset)] as const)
    );
    return () => {
      this.balances = balances;
    };
  }

  isSupported(asset: string): boolean {
    return this.assets.has(asset);
  }

  balanceOf(user: string, asset: string): bigint {
    return this.balances.get(user)?.get(asset) ?? 0n;
  }

  /** Non-zero balances of `user`, in listing order. */
  positionOf(user: string): Array<[string, bigint]> {
    const held: Array<[string, bigint]> = [];
    for (const asset of this.assets.keys()) {
      const amount = this.balanceOf(user, asset);
      if (amount > 0n) held.push([asset, amount]);
    }
    return held;
  }

  deposit(user: string, asset: string, amount: bigint): void {
    const token = this.tokenFor(asset, amount);

    this.setBalance(user, asset, this.balanceOf(user, asset) + amount);
    this.emit({ type: "CollateralDeposited", user, asset, amount });

    if (!token.transferFrom(this.custodian, user, this.custodian, amount)) {
      throw new EngineError("TransferFailed", `${token.symbol} transferFrom ${user} returned false`);
    }
  }

  redeem(from: string, asset: string, amount: bigint, to: string): void {
    const token = this.tokenFor(asset, amount);

    const balance = this.balanceOf(from, asset);
    if (amount > balance) {
      throw new EngineError(
        "InsufficientCollateral",
        `${from} holds ${balance} ${token.symbol}, cannot redeem ${amount}`
      );
    }
    this.setBalance(from, asset, balance - amount);
    this.emit({ type: "CollateralRedeemed", redeemedFrom: from, redeemedTo: to, asset, amount });

    if (!token.transfer(this.custodian, to, amount)) {
      throw new EngineError("TransferFailed", `${token.symbol} transfer to ${to} returned false`);
    }
  }

  private tokenFor(asset: string, amount: bigint): FungibleToken {
    if (amount <= 0n) throw new EngineError("InvalidAmount", "collateral amount must be more than zero");
    const token = this.assets.get(asset);
    if (!token) throw new EngineError("UnsupportedAsset", `${asset} is not an allowed collateral`);
    return token;
  }

  private setBalance(user: string, asset: string, amount: bigint): void {
    let perAsset = this.balances.get(user);
    if (!perAsset) {
      perAsset = new Map();
      this.balances.set(user, perAsset);
    }
    perAsset.set(asset, amount);
  }
}
