import Constants from "../lib/Constants";

export default class FeePolicy {
  /**
   * Fee on a native amount. Nothing is charged until the buffer pool holds supply;
   * otherwise feeRatePercentage of the amount, rounded down.
   */
  static fee(nativeAmount: bigint, bufferPoolExists: boolean, bufferSupply: bigint, feeRatePercentage: number): bigint {
    if (!bufferPoolExists || bufferSupply === 0n) return 0n;
    return (BigInt(feeRatePercentage) * nativeAmount) / Constants.PERCENTAGE_DENOMINATOR;
  }
}
