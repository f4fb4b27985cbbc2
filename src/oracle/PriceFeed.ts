import { PriceFeedError } from "../lib/Errors";

/**
 * Source of the native asset price, in whole stable units per whole native unit.
 */
export interface PriceFeed {
  currentPrice(): bigint;
}

/**
 * Price feed holding a single settable price, the local stand-in for an oracle contract.
 */
export class StaticPriceFeed implements PriceFeed {
  private price: bigint;

  constructor(price: bigint) {
    this.price = StaticPriceFeed.checked(price);
  }

  currentPrice(): bigint {
    return this.price;
  }

  setPrice(price: bigint): void {
    this.price = StaticPriceFeed.checked(price);
  }

  private static checked(price: bigint): bigint {
    if (price <= 0n) throw new PriceFeedError(price);
    return price;
  }
}
