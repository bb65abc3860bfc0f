/**
 * DSC Engine - Token Collaborators
 *
 * The engine talks to collateral assets and to the DSC token only through the
 * interfaces below. `InMemoryToken` gives them ERC20 bookkeeping so a whole
 * system can run (and roll back) inside one process.
 *
 * Callers are passed explicitly: there is no ambient msg.sender.
 *
 * Every token can checkpoint its state. The engine registers the tokens it is
 * given on its journal, so a rejected step also undoes their transfers.
 */

import type { Checkpointable, Restore, StateJournal } from "./atomic";
import { TokenError } from "./errors";
import { isZeroAddress, toAddress } from "./utils";

// ============================================================
//                     INTERFACES
// ============================================================

export interface FungibleToken extends Checkpointable {
  readonly address: string;
  readonly symbol: string;
  totalSupply(): bigint;
  balanceOf(account: string): bigint;
  allowance(owner: string, spender: string): bigint;
  approve(owner: string, spender: string, amount: bigint): boolean;
  transfer(from: string, to: string, amount: bigint): boolean;
  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean;
}

/** The pegged token. Mint and burn are restricted to `owner`. */
export interface MintableBurnableToken extends FungibleToken {
  readonly owner: string;
  mint(caller: string, to: string, amount: bigint): boolean;
  /** Burns from the caller's own balance. */
  burn(caller: string, amount: bigint): void;
}

// ============================================================
//                     ERC20 BOOKKEEPING
// ============================================================

export class InMemoryToken implements FungibleToken {
  readonly address: string;
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;

  constructor(
    address: string,
    readonly symbol: string,
    journal?: StateJournal
  ) {
    this.address = toAddress(address, `${symbol} address`);
    journal?.register(this);
  }

  checkpoint(): Restore {
    const balances = new Map(this.balances);
    const allowances = new Map(this.allowances);
    const supply = this.supply;
    return () => {
      this.balances = balances;
      this.allowances = allowances;
      this.supply = supply;
    };
  }

  totalSupply(): bigint {
    return this.supply;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(toAddress(account, "account")) ?? 0n;
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(toAddress(owner, "owner"), toAddress(spender, "spender"))) ?? 0n;
  }

  approve(owner: string, spender: string, amount: bigint): boolean {
    const from = toAddress(owner, "owner");
    const to = toAddress(spender, "spender");
    if (isZeroAddress(to)) {
      throw new TokenError(this.address, "ZeroAddress", `${this.symbol}: approve to the zero address`);
    }
    this.allowances.set(allowanceKey(from, to), amount);
    return true;
  }

  transfer(from: string, to: string, amount: bigint): boolean {
    this.move(toAddress(from, "from"), toAddress(to, "to"), amount);
    return true;
  }

  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const owner = toAddress(from, "from");
    const key = allowanceKey(owner, toAddress(spender, "spender"));
    const allowed = this.allowances.get(key) ?? 0n;
    if (allowed < amount) {
      throw new TokenError(
        this.address,
        "InsufficientAllowance",
        `${this.symbol}: allowance ${allowed} < ${amount}`
      );
    }
    this.allowances.set(key, allowed - amount);
    this.move(owner, toAddress(to, "to"), amount);
    return true;
  }

  protected credit(account: string, amount: bigint): void {
    const to = toAddress(account, "account");
    if (isZeroAddress(to)) {
      throw new TokenError(this.address, "ZeroAddress", `${this.symbol}: mint to the zero address`);
    }
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
    this.supply += amount;
  }

  protected debit(account: string, amount: bigint): void {
    const from = toAddress(account, "account");
    const balance = this.balances.get(from) ?? 0n;
    if (balance < amount) {
      throw new TokenError(this.address, "InsufficientBalance", `${this.symbol}: balance ${balance} < ${amount}`);
    }
    this.balances.set(from, balance - amount);
    this.supply -= amount;
  }

  private move(from: string, to: string, amount: bigint): void {
    if (isZeroAddress(to)) {
      throw new TokenError(this.address, "ZeroAddress", `${this.symbol}: transfer to the zero address`);
    }
    const balance = this.balances.get(from) ?? 0n;
    if (balance < amount) {
      throw new TokenError(this.address, "InsufficientBalance", `${this.symbol}: balance ${balance} < ${amount}`);
    }
    this.balances.set(from, balance - amount);
    this.balances.set(to, (this.balances.get(to) ?? 0n) + amount);
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}:${spender}`;
}

// ============================================================
//                     PEGGED TOKEN
// ============================================================

/**
 * The DSC token. Ownership is handed to the engine after deployment, which
 * makes the engine the only account able to change supply.
 */
export class DecentralizedStableCoin extends InMemoryToken implements MintableBurnableToken {
  private _owner: string;

  constructor(address: string, owner: string, journal?: StateJournal) {
    super(address, "DSC", journal);
    this._owner = toAddress(owner, "owner");
  }

  get owner(): string {
    return this._owner;
  }

  override checkpoint(): Restore {
    const restoreBalances = super.checkpoint();
    const owner = this._owner;
    return () => {
      restoreBalances();
      this._owner = owner;
    };
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.onlyOwner(caller);
    const next = toAddress(newOwner, "newOwner");
    if (isZeroAddress(next)) {
      throw new TokenError(this.address, "ZeroAddress", "DSC: new owner is the zero address");
    }
    this._owner = next;
  }

  mint(caller: string, to: string, amount: bigint): boolean {
    this.onlyOwner(caller);
    if (isZeroAddress(toAddress(to, "to"))) {
      throw new TokenError(this.address, "ZeroAddress", "DSC: cannot mint to the zero address");
    }
    if (amount <= 0n) {
      throw new TokenError(this.address, "InvalidAmount", "DSC: amount must be more than zero");
    }
    this.credit(to, amount);
    return true;
  }

  burn(caller: string, amount: bigint): void {
    this.onlyOwner(caller);
    if (amount <= 0n) {
      throw new TokenError(this.address, "InvalidAmount", "DSC: amount must be more than zero");
    }
    const balance = this.balanceOf(caller);
    if (balance < amount) {
      throw new TokenError(this.address, "BurnAmountExceedsBalance", `DSC: burn ${amount} exceeds balance ${balance}`);
    }
    this.debit(caller, amount);
  }

  private onlyOwner(caller: string): void {
    if (toAddress(caller, "caller") !== this._owner) {
      throw new TokenError(this.address, "NotOwner", `DSC: caller ${caller} is not the owner`);
    }
  }
}
