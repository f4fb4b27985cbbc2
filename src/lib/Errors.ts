/**
 * Error taxonomy for the stability engine.
 *
 * Every failure is thrown synchronously from the operation that hit it. An
 * operation that throws has had all of its state changes rolled back.
 */

export enum StabilityErrorCode {
  // Input errors (1xxx)
  INVALID_AMOUNT = "STB_1001",
  INVALID_CONFIG = "STB_1002",

  // Collateral errors (2xxx)
  DEFICIT = "STB_2001",
  INSUFFICIENT_BOOTSTRAP_COLLATERAL = "STB_2002",
  NO_SURPLUS_TO_WITHDRAW = "STB_2003",
  BUFFER_POOL_NOT_INITIALIZED = "STB_2004",
  DEPOSIT_TOO_SMALL = "STB_2005",

  // Balance errors (3xxx)
  INSUFFICIENT_BUFFER_BALANCE = "STB_3001",
  INSUFFICIENT_LEDGER_BALANCE = "STB_3002",
  INSUFFICIENT_NATIVE_FUNDS = "STB_3003",

  // Execution errors (4xxx)
  REFUND_TRANSFER_FAILED = "STB_4001",
  REENTRANT_CALL = "STB_4002",

  // Oracle errors (5xxx)
  INVALID_PRICE = "STB_5001",
}

export interface StabilityErrorOptions {
  details?: Record<string, unknown>;
  suggestion?: string;
  cause?: unknown;
}

export class StabilityError extends Error {
  readonly code: StabilityErrorCode;
  readonly details?: Record<string, unknown>;
  readonly suggestion?: string;

  constructor(code: StabilityErrorCode, message: string, options?: StabilityErrorOptions) {
    super(`[${code}] ${message}`, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "StabilityError";
    this.code = code;
    this.details = options?.details;
    this.suggestion = options?.suggestion;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Plain form for JSON.stringify; bigints become decimal strings.
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details === undefined ? undefined : toJsonSafe(this.details),
      suggestion: this.suggestion,
    };
  }
}

function toJsonSafe(value: unknown): unknown {
  if (typeof value === "bigint") return value.toString();
  if (Array.isArray(value)) return value.map(toJsonSafe);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(Object.entries(value).map(([key, v]) => [key, toJsonSafe(v)]));
  }
  return value;
}

export class InvalidAmountError extends StabilityError {
  constructor(field: string, amount: bigint) {
    super(StabilityErrorCode.INVALID_AMOUNT, `${field} must be greater than zero, got ${amount}`, {
      details: { field, amount },
    });
    this.name = "InvalidAmountError";
  }
}

export class InvalidConfigError extends StabilityError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(StabilityErrorCode.INVALID_CONFIG, message, { details });
    this.name = "InvalidConfigError";
  }
}

export class DeficitError extends StabilityError {
  readonly deficitOrSurplus: bigint;

  constructor(deficitOrSurplus: bigint) {
    super(StabilityErrorCode.DEFICIT, `Cannot burn while in deficit (${deficitOrSurplus})`, {
      details: { deficitOrSurplus },
      suggestion: "Wait for collateral buffer deposits to cover the deficit",
    });
    this.name = "DeficitError";
    this.deficitOrSurplus = deficitOrSurplus;
  }
}

export class InsufficientBootstrapCollateral extends StabilityError {
  readonly deposited: bigint;
  readonly minimumDeposit: bigint;

  constructor(deposited: bigint, minimumDeposit: bigint) {
    super(
      StabilityErrorCode.INSUFFICIENT_BOOTSTRAP_COLLATERAL,
      `Initial collateral ratio not met: deposited ${deposited}, minimum ${minimumDeposit}`,
      {
        details: { deposited, minimumDeposit },
        suggestion: `Deposit at least ${minimumDeposit} native units`,
      }
    );
    this.name = "InsufficientBootstrapCollateral";
    this.deposited = deposited;
    this.minimumDeposit = minimumDeposit;
  }
}

export class NoSurplusToWithdraw extends StabilityError {
  constructor(deficitOrSurplus: bigint) {
    super(StabilityErrorCode.NO_SURPLUS_TO_WITHDRAW, "No surplus to withdraw", {
      details: { deficitOrSurplus },
      suggestion: "Wait until collateral value exceeds the stable supply",
    });
    this.name = "NoSurplusToWithdraw";
  }
}

export class BufferPoolNotInitialized extends StabilityError {
  constructor() {
    super(StabilityErrorCode.BUFFER_POOL_NOT_INITIALIZED, "Buffer pool has not been created yet", {
      suggestion: "Bootstrap the pool with depositBuffer first",
    });
    this.name = "BufferPoolNotInitialized";
  }
}

export class DepositTooSmall extends StabilityError {
  constructor(deposited: bigint) {
    super(StabilityErrorCode.DEPOSIT_TOO_SMALL, `Deposit of ${deposited} would mint no buffer units`, {
      details: { deposited },
      suggestion: "Deposit a larger amount",
    });
    this.name = "DepositTooSmall";
  }
}

export class InsufficientBufferBalance extends StabilityError {
  constructor(account: string, balance: bigint, requested: bigint) {
    super(
      StabilityErrorCode.INSUFFICIENT_BUFFER_BALANCE,
      `${account} holds ${balance} buffer units, requested ${requested}`,
      { details: { account, balance, requested } }
    );
    this.name = "InsufficientBufferBalance";
  }
}

export class InsufficientLedgerBalance extends StabilityError {
  constructor(symbol: string, account: string, balance: bigint, requested: bigint) {
    super(
      StabilityErrorCode.INSUFFICIENT_LEDGER_BALANCE,
      `${account} holds ${balance} ${symbol}, requested ${requested}`,
      { details: { symbol, account, balance, requested } }
    );
    this.name = "InsufficientLedgerBalance";
  }
}

export class InsufficientNativeFunds extends StabilityError {
  constructor(account: string, balance: bigint, requested: bigint) {
    super(
      StabilityErrorCode.INSUFFICIENT_NATIVE_FUNDS,
      `${account} holds ${balance} native units, requested ${requested}`,
      { details: { account, balance, requested } }
    );
    this.name = "InsufficientNativeFunds";
  }
}

export class RefundTransferError extends StabilityError {
  constructor(recipient: string, amount: bigint, cause: unknown) {
    super(StabilityErrorCode.REFUND_TRANSFER_FAILED, `Refund of ${amount} to ${recipient} was rejected`, {
      details: { recipient, amount },
      cause,
    });
    this.name = "RefundTransferError";
  }
}

export class ReentrancyError extends StabilityError {
  constructor(operation: string) {
    super(StabilityErrorCode.REENTRANT_CALL, `Reentrant call to ${operation}`);
    this.name = "ReentrancyError";
  }
}

export class PriceFeedError extends StabilityError {
  constructor(price: bigint) {
    super(StabilityErrorCode.INVALID_PRICE, `Price must be positive, got ${price}`, {
      details: { price },
    });
    this.name = "PriceFeedError";
  }
}

/**
 * Type guard for engine errors
 */
export function isStabilityError(error: unknown): error is StabilityError {
  return error instanceof StabilityError;
}
