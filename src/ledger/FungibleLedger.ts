import { InsufficientLedgerBalance, InvalidAmountError } from "../lib/Errors";

export interface LedgerSnapshot {
  balances: Map<string, bigint>;
  totalSupply: bigint;
}

/** Read-only face of a ledger, safe to hand out to callers. */
export interface LedgerView {
  readonly name: string;
  readonly symbol: string;
  readonly totalSupply: bigint;
  balanceOf(account: string): bigint;
  holders(): string[];
}

/**
 * In-memory fungible unit ledger. totalSupply is always the sum of all balances.
 */
export class FungibleLedger {
  public readonly name: string;
  public readonly symbol: string;
  public readonly view: LedgerView;

  private balances: Map<string, bigint>;
  private _totalSupply: bigint;

  constructor(name: string, symbol: string, balances?: Map<string, bigint>) {
    this.name = name;
    this.symbol = symbol;
    this.balances = new Map();
    this._totalSupply = 0n;
    this.view = this.createView();
    for (const [account, amount] of balances ?? []) {
      if (amount > 0n) this.mint(account, amount);
    }
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  holders(): string[] {
    return [...this.balances.keys()];
  }

  mint(to: string, amount: bigint): void {
    if (amount < 0n) throw new InvalidAmountError("mint amount", amount);
    if (amount === 0n) return;
    this.balances.set(to, this.balanceOf(to) + amount);
    this._totalSupply += amount;
  }

  burn(from: string, amount: bigint): void {
    if (amount < 0n) throw new InvalidAmountError("burn amount", amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientLedgerBalance(this.symbol, from, balance, amount);
    }
    this.setBalance(from, balance - amount);
    this._totalSupply -= amount;
  }

  transfer(from: string, to: string, amount: bigint): void {
    if (amount < 0n) throw new InvalidAmountError("transfer amount", amount);
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientLedgerBalance(this.symbol, from, balance, amount);
    }
    this.setBalance(from, balance - amount);
    this.setBalance(to, this.balanceOf(to) + amount);
  }

  // ---------- snapshot/restore ----------
  snapshot(): LedgerSnapshot {
    return { balances: new Map(this.balances), totalSupply: this._totalSupply };
  }

  restore(s: LedgerSnapshot): void {
    this.balances = new Map(s.balances);
    this._totalSupply = s.totalSupply;
  }

  private createView(): LedgerView {
    const totalSupply = (): bigint => this._totalSupply;
    return Object.freeze({
      name: this.name,
      symbol: this.symbol,
      get totalSupply(): bigint {
        return totalSupply();
      },
      balanceOf: (account: string): bigint => this.balanceOf(account),
      holders: (): string[] => this.holders(),
    });
  }

  private setBalance(account: string, amount: bigint): void {
    if (amount === 0n) this.balances.delete(account);
    else this.balances.set(account, amount);
  }
}
