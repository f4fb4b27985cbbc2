/**
 * Valuation of the native collateral against the outstanding stable supply.
 * Callers pass the collateral held before any value attached to the current call.
 */
export default class CollateralAccountant {
  static collateralValue(collateralNativeAmount: bigint, price: bigint): bigint {
    return collateralNativeAmount * price;
  }

  /**
   * Positive: surplus backing buffer units. Zero or negative: deficit.
   */
  static deficitOrSurplus(collateralNativeAmount: bigint, stableTotalSupply: bigint, price: bigint): bigint {
    return CollateralAccountant.collateralValue(collateralNativeAmount, price) - stableTotalSupply;
  }
}
