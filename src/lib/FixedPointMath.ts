import Constants from "./Constants";

/** A 1e18-scaled fixed point value. */
export type Wad = bigint;

export default class FixedPointMath {
  /**
   * Builds the Wad for numerator / denominator.
   */
  static fromRatio(numerator: bigint, denominator: bigint): Wad {
    if (denominator === 0n) {
      throw new Error("FixedPointMath: division by zero");
    }
    return (numerator * Constants.PRECISION) / denominator;
  }

  // a * wad, truncated
  static mulFrac(a: bigint, wad: Wad): bigint {
    return (a * wad) / Constants.PRECISION;
  }
}
