import { InsufficientNativeFunds, InvalidAmountError } from "../lib/Errors";

/**
 * Called when native value arrives at an account. Throwing rejects the transfer.
 */
export type ReceiveHook = (amount: bigint) => void;

/**
 * Moves native value between callers and the engine.
 * pull escrows the value attached to a call, release hands escrowed value back
 * to its sender when the call is rolled back, push pays a refund out.
 */
export interface NativeTransport {
  pull(from: string, amount: bigint): void;
  release(to: string, amount: bigint): void;
  push(to: string, amount: bigint): void;
}

/**
 * In-memory native balances with optional per-account receive hooks.
 * A hook may reject (throw) or call back into the engine before push returns.
 */
export class InMemoryNativeTransport implements NativeTransport {
  private balances = new Map<string, bigint>();
  private hooks = new Map<string, ReceiveHook>();

  fund(account: string, amount: bigint): void {
    if (amount < 0n) throw new InvalidAmountError("fund amount", amount);
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  onReceive(account: string, hook: ReceiveHook | undefined): void {
    if (hook) this.hooks.set(account, hook);
    else this.hooks.delete(account);
  }

  pull(from: string, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) {
      throw new InsufficientNativeFunds(from, balance, amount);
    }
    this.balances.set(from, balance - amount);
  }

  release(to: string, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  push(to: string, amount: bigint): void {
    this.balances.set(to, this.balanceOf(to) + amount);
    const hook = this.hooks.get(to);
    if (!hook) return;
    try {
      hook(amount);
    } catch (err) {
      this.balances.set(to, this.balanceOf(to) - amount);
      throw err;
    }
  }
}
