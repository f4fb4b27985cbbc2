import type { Logger } from "winston";
import Constants from "../lib/Constants";
import FixedPointMath, { type Wad } from "../lib/FixedPointMath";
import { validateFeeRate } from "../lib/Config";
import { logger as defaultLogger } from "../lib/Logger";
import {
  BufferPoolNotInitialized,
  DeficitError,
  DepositTooSmall,
  InsufficientBootstrapCollateral,
  InsufficientBufferBalance,
  InvalidAmountError,
  NoSurplusToWithdraw,
  ReentrancyError,
  RefundTransferError,
} from "../lib/Errors";
import { FungibleLedger, type LedgerSnapshot, type LedgerView } from "../ledger/FungibleLedger";
import type { NativeTransport } from "../ledger/NativeTransport";
import type { PriceFeed } from "../oracle/PriceFeed";
import CollateralAccountant from "./CollateralAccountant";
import FeePolicy from "./FeePolicy";

/** Who is calling, and how much native value rides along with the call. */
export interface CallContext {
  from: string;
  value?: bigint;
}

export type BufferPool =
  | { kind: "uninitialized" }
  | { kind: "active"; ledger: LedgerView };

type BufferPoolState =
  | { kind: "uninitialized" }
  | { kind: "active"; ledger: FungibleLedger };

export type EngineEvent =
  | { name: "StableMinted"; args: { account: string; nativeIn: bigint; fee: bigint; amount: bigint } }
  | { name: "StableBurned"; args: { account: string; amount: bigint; fee: bigint; refund: bigint } }
  | { name: "BufferPoolSeeded"; args: { account: string; amount: bigint; created: boolean } }
  | { name: "BufferUnitMinted"; args: { account: string; amount: bigint; priceWad: Wad } }
  | { name: "BufferUnitBurned"; args: { account: string; amount: bigint; refund: bigint } };

export type EngineListener = (event: EngineEvent) => void;

export interface TokenMetadata {
  name: string;
  symbol: string;
}

/** Starting state, e.g. mirrored from a deployed contract. */
export interface StabilitySeed {
  collateral: bigint;
  stableBalances: Map<string, bigint>;
  /** null when the buffer pool has never been created */
  bufferBalances: Map<string, bigint> | null;
}

export interface StabilityEngineParams {
  feeRatePercentage: number;
  priceFeed: PriceFeed;
  transport: NativeTransport;
  stableToken?: TokenMetadata;
  bufferToken?: TokenMetadata;
  seed?: StabilitySeed;
  logger?: Logger;
}

interface EngineSnapshot {
  collateral: bigint;
  stable: LedgerSnapshot;
  buffer: LedgerSnapshot | null;
  eventCount: number;
}

export const DEFAULT_STABLE_TOKEN: TokenMetadata = { name: "Stable Unit", symbol: "STBL" };
export const DEFAULT_BUFFER_TOKEN: TokenMetadata = { name: "Buffer Unit", symbol: "BUF" };

/**
 * Dual-token stability engine: stable units minted against native collateral,
 * buffer units holding claims on the collateral surplus.
 *
 * Every operation is atomic. State is snapshotted on entry and restored if
 * anything throws, and escrowed value goes back to the caller. Outbound refunds
 * are always the last step and run behind a reentrancy guard.
 */
export default class StabilityEngine {
  public readonly feeRatePercentage: number;
  public readonly priceFeed: PriceFeed;

  private readonly _stable: FungibleLedger;
  private readonly transport: NativeTransport;
  private readonly bufferToken: TokenMetadata;
  private readonly logger: Logger;
  private readonly listeners = new Set<EngineListener>();

  private _collateral: bigint;
  private _bufferPool: BufferPoolState;
  private _events: EngineEvent[] = [];
  private entered = false;
  private escrowed = 0n;

  constructor(params: StabilityEngineParams) {
    validateFeeRate(params.feeRatePercentage);
    this.feeRatePercentage = params.feeRatePercentage;
    this.priceFeed = params.priceFeed;
    this.transport = params.transport;
    this.logger = params.logger ?? defaultLogger;

    const stableToken = params.stableToken ?? DEFAULT_STABLE_TOKEN;
    this.bufferToken = params.bufferToken ?? DEFAULT_BUFFER_TOKEN;
    this._stable = new FungibleLedger(stableToken.name, stableToken.symbol, params.seed?.stableBalances);
    this._collateral = params.seed?.collateral ?? 0n;
    const bufferBalances = params.seed?.bufferBalances;
    this._bufferPool = bufferBalances
      ? { kind: "active", ledger: this.newBufferLedger(bufferBalances) }
      : { kind: "uninitialized" };
  }

  // ---------- queries ----------
  get collateral(): bigint {
    return this._collateral;
  }

  get bufferPool(): BufferPool {
    const pool = this._bufferPool;
    return pool.kind === "active" ? { kind: "active", ledger: pool.ledger.view } : pool;
  }

  get hasBufferPool(): boolean {
    return this._bufferPool.kind === "active";
  }

  get stable(): LedgerView {
    return this._stable.view;
  }

  get buffer(): LedgerView | null {
    return this._bufferPool.kind === "active" ? this._bufferPool.ledger.view : null;
  }

  get stableTotalSupply(): bigint {
    return this._stable.totalSupply;
  }

  get bufferTotalSupply(): bigint {
    return this.buffer?.totalSupply ?? 0n;
  }

  get events(): readonly EngineEvent[] {
    return this._events;
  }

  stableBalanceOf(account: string): bigint {
    return this._stable.balanceOf(account);
  }

  bufferBalanceOf(account: string): bigint {
    return this.buffer?.balanceOf(account) ?? 0n;
  }

  deficitOrSurplus(): bigint {
    return CollateralAccountant.deficitOrSurplus(this._collateral, this._stable.totalSupply, this.priceFeed.currentPrice());
  }

  /**
   * Buffer units per stable unit of surplus, or null while there is no funded pool or no surplus.
   */
  bufferUnitPrice(): Wad | null {
    const ledger = this.buffer;
    const surplus = this.deficitOrSurplus();
    if (!ledger || ledger.totalSupply === 0n || surplus <= 0n) return null;
    return FixedPointMath.fromRatio(ledger.totalSupply, surplus);
  }

  fee(nativeAmount: bigint): bigint {
    return FeePolicy.fee(nativeAmount, this.hasBufferPool, this.bufferTotalSupply, this.feeRatePercentage);
  }

  subscribe(listener: EngineListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // ---------- operations ----------

  /**
   * Mints stable units worth the attached native value, less the fee.
   * @returns stable units minted
   */
  mintStable(call: CallContext): bigint {
    const value = requirePositive("nativeValue", call.value);
    return this.execute("mintStable", call, () => {
      const price = this.priceFeed.currentPrice();
      const fee = this.fee(value);
      const amount = (value - fee) * price;

      this.escrow(call.from, value);
      this._stable.mint(call.from, amount);
      this.emit({ name: "StableMinted", args: { account: call.from, nativeIn: value, fee, amount } });
      return amount;
    });
  }

  /**
   * Burns stable units and refunds their native value, less the fee.
   * Blocked while the engine is in deficit.
   * @returns native value refunded
   */
  burnStable(call: CallContext, amount: bigint): bigint {
    requirePositive("burnAmount", amount);
    return this.execute("burnStable", call, () => {
      const price = this.priceFeed.currentPrice();
      const deficitOrSurplus = CollateralAccountant.deficitOrSurplus(this._collateral, this._stable.totalSupply, price);
      if (deficitOrSurplus < 0n) throw new DeficitError(deficitOrSurplus);

      this._stable.burn(call.from, amount);
      const refund = amount / price;
      const fee = this.fee(refund);
      const netRefund = refund - fee;
      this._collateral -= netRefund;
      this.emit({ name: "StableBurned", args: { account: call.from, amount, fee, refund: netRefund } });

      this.payOut(call.from, netRefund);
      return netRefund;
    });
  }

  /**
   * Deposits native value into the collateral buffer in exchange for buffer units.
   * While there is no funded pool or no surplus, the deposit must clear the deficit
   * plus the initial collateral ratio and seeds the pool 1:1 with the new surplus.
   * @returns buffer units minted
   */
  depositBuffer(call: CallContext): bigint {
    const value = requirePositive("nativeValue", call.value);
    return this.execute("depositBuffer", call, () => {
      const price = this.priceFeed.currentPrice();
      const deficitOrSurplus = CollateralAccountant.deficitOrSurplus(this._collateral, this._stable.totalSupply, price);
      const pool = this._bufferPool;

      if (deficitOrSurplus <= 0n || pool.kind === "uninitialized" || pool.ledger.totalSupply === 0n) {
        return this.seedBufferPool(call.from, value, deficitOrSurplus, price);
      }

      const priceWad = FixedPointMath.fromRatio(pool.ledger.totalSupply, deficitOrSurplus);
      const amount = FixedPointMath.mulFrac(value * price, priceWad);
      if (amount === 0n) throw new DepositTooSmall(value);

      this.escrow(call.from, value);
      pool.ledger.mint(call.from, amount);
      this.emit({ name: "BufferUnitMinted", args: { account: call.from, amount, priceWad } });
      return amount;
    });
  }

  /**
   * Burns buffer units and refunds their share of the surplus in native value.
   * @returns native value refunded
   */
  withdrawBuffer(call: CallContext, amount: bigint): bigint {
    requirePositive("burnBufferAmount", amount);
    return this.execute("withdrawBuffer", call, () => {
      const pool = this._bufferPool;
      if (pool.kind === "uninitialized") throw new BufferPoolNotInitialized();

      const balance = pool.ledger.balanceOf(call.from);
      if (balance < amount) throw new InsufficientBufferBalance(call.from, balance, amount);

      const price = this.priceFeed.currentPrice();
      const supplyBeforeBurn = pool.ledger.totalSupply;
      pool.ledger.burn(call.from, amount);

      const deficitOrSurplus = CollateralAccountant.deficitOrSurplus(this._collateral, this._stable.totalSupply, price);
      if (deficitOrSurplus <= 0n) throw new NoSurplusToWithdraw(deficitOrSurplus);

      // surplus per buffer unit, the inverse of the deposit-side price
      const surplusPerUnit = FixedPointMath.fromRatio(deficitOrSurplus, supplyBeforeBurn);
      const refundInStable = FixedPointMath.mulFrac(amount, surplusPerUnit);
      const refund = refundInStable / price;
      this._collateral -= refund;
      this.emit({ name: "BufferUnitBurned", args: { account: call.from, amount, refund } });

      this.payOut(call.from, refund);
      return refund;
    });
  }

  // ---------- snapshot/restore ----------
  private snapshot(): EngineSnapshot {
    return {
      collateral: this._collateral,
      stable: this._stable.snapshot(),
      buffer: this._bufferPool.kind === "active" ? this._bufferPool.ledger.snapshot() : null,
      eventCount: this._events.length,
    };
  }

  private restore(s: EngineSnapshot): void {
    this._collateral = s.collateral;
    this._stable.restore(s.stable);
    if (s.buffer === null) {
      this._bufferPool = { kind: "uninitialized" };
    } else if (this._bufferPool.kind === "active") {
      this._bufferPool.ledger.restore(s.buffer);
    } else {
      const ledger = this.newBufferLedger();
      ledger.restore(s.buffer);
      this._bufferPool = { kind: "active", ledger };
    }
    this._events = this._events.slice(0, s.eventCount);
  }

  // ---------- internals ----------
  private seedBufferPool(account: string, value: bigint, deficitOrSurplus: bigint, price: bigint): bigint {
    const deficitInNative = (deficitOrSurplus < 0n ? -deficitOrSurplus : 0n) / price;
    const requiredInitialSurplusInStable =
      (Constants.INITIAL_COLLATERAL_RATIO_PERCENTAGE * this._stable.totalSupply) / Constants.PERCENTAGE_DENOMINATOR;
    const requiredInitialSurplusInNative = requiredInitialSurplusInStable / price;
    const minimumDeposit = deficitInNative + requiredInitialSurplusInNative;
    if (value < minimumDeposit) {
      throw new InsufficientBootstrapCollateral(value, minimumDeposit);
    }

    const amount = (value - deficitInNative) * price;
    if (amount === 0n) throw new DepositTooSmall(value);
    let ledger: FungibleLedger;
    let created = false;
    if (this._bufferPool.kind === "active") {
      ledger = this._bufferPool.ledger;
    } else {
      ledger = this.newBufferLedger();
      this._bufferPool = { kind: "active", ledger };
      created = true;
    }

    this.escrow(account, value);
    ledger.mint(account, amount);
    this.emit({ name: "BufferPoolSeeded", args: { account, amount, created } });
    return amount;
  }

  private newBufferLedger(balances?: Map<string, bigint>): FungibleLedger {
    return new FungibleLedger(this.bufferToken.name, this.bufferToken.symbol, balances);
  }

  private execute<T>(operation: string, call: CallContext, body: () => T): T {
    if (this.entered) throw new ReentrancyError(operation);
    this.entered = true;
    const snap = this.snapshot();
    try {
      const result = body();
      this.logger.debug(`${operation} by ${call.from} committed: ${String(result)}`);
      return result;
    } catch (err) {
      this.restore(snap);
      if (this.escrowed > 0n) this.transport.release(call.from, this.escrowed);
      this.logger.warn(`${operation} by ${call.from} rolled back: ${err instanceof Error ? err.message : String(err)}`);
      throw err;
    } finally {
      this.escrowed = 0n;
      this.entered = false;
    }
  }

  private escrow(from: string, value: bigint): void {
    this.transport.pull(from, value);
    this.escrowed += value;
    this._collateral += value;
  }

  private payOut(to: string, amount: bigint): void {
    try {
      this.transport.push(to, amount);
    } catch (err) {
      throw new RefundTransferError(to, amount, err);
    }
  }

  private emit(event: EngineEvent): void {
    this._events.push(event);
    for (const listener of this.listeners) listener(event);
  }
}

function requirePositive(field: string, amount: bigint | undefined): bigint {
  if (amount === undefined || amount <= 0n) throw new InvalidAmountError(field, amount ?? 0n);
  return amount;
}
