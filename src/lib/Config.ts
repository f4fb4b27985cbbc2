/**
 * Runtime configuration, read from the environment (.env is loaded by the entry point).
 */

import { isAddress } from "ethers";
import Constants from "./Constants";
import { InvalidConfigError } from "./Errors";

export interface StabilityConfig {
  /** Chain the engine contract is deployed on; its RPC comes from RPC_<chainId> */
  chainId: number;
  /** Address of a deployed engine contract (optional; without it the CLI simulates locally) */
  engineAddress?: string;
  /** Fee rate used for local simulations */
  feeRatePercentage: number;
  logLevel: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): StabilityConfig {
  return {
    chainId: env.CHAIN_ID ? Number(env.CHAIN_ID) : 1,
    engineAddress: env.STABILITY_ENGINE_ADDRESS || undefined,
    feeRatePercentage: env.FEE_RATE_PERCENTAGE === undefined ? 3 : Number(env.FEE_RATE_PERCENTAGE),
    logLevel: env.LOG_LEVEL || "info",
  };
}

/**
 * Throws InvalidConfigError on the first bad setting.
 */
export function validateConfig(config: StabilityConfig): void {
  if (!Number.isInteger(config.chainId) || config.chainId <= 0) {
    throw new InvalidConfigError("CHAIN_ID must be a positive integer", { chainId: config.chainId });
  }
  validateFeeRate(config.feeRatePercentage);
  if (config.engineAddress !== undefined && !isAddress(config.engineAddress)) {
    throw new InvalidConfigError("STABILITY_ENGINE_ADDRESS is not a valid address", {
      engineAddress: config.engineAddress,
    });
  }
}

export function validateFeeRate(feeRatePercentage: number): void {
  if (
    !Number.isInteger(feeRatePercentage) ||
    feeRatePercentage < 0 ||
    feeRatePercentage > Constants.MAX_FEE_RATE_PERCENTAGE
  ) {
    throw new InvalidConfigError("Fee rate must be an integer percentage between 0 and 100", {
      feeRatePercentage,
    });
  }
}

export function getRPCUrl(chainId: number, env: NodeJS.ProcessEnv = process.env): string {
  const rpc = env["RPC_" + chainId];
  if (!rpc) {
    throw new InvalidConfigError(`RPC not set in env. Add one as RPC_${chainId}=<url>`, { chainId });
  }
  return rpc;
}
