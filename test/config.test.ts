import { expect } from "chai";
import { getRPCUrl, loadConfig, validateConfig, validateFeeRate } from "../src/lib/Config";
import {
  InsufficientBootstrapCollateral,
  InvalidConfigError,
  RefundTransferError,
  StabilityError,
  StabilityErrorCode,
  isStabilityError,
} from "../src/lib/Errors";

describe("Config", () => {
  it("should fall back to defaults", () => {
    expect(loadConfig({})).to.deep.equal({
      chainId: 1,
      engineAddress: undefined,
      feeRatePercentage: 3,
      logLevel: "info",
    });
  });

  it("should read values from the environment", () => {
    const config = loadConfig({
      CHAIN_ID: "11155111",
      STABILITY_ENGINE_ADDRESS: "0x000000000000000000000000000000000000dEaD",
      FEE_RATE_PERCENTAGE: "0",
      LOG_LEVEL: "debug",
    });
    expect(config.chainId).to.equal(11155111);
    expect(config.feeRatePercentage).to.equal(0);
    expect(config.logLevel).to.equal("debug");
    expect(() => validateConfig(config)).to.not.throw();
  });

  it("should reject invalid settings", () => {
    expect(() => validateConfig(loadConfig({ STABILITY_ENGINE_ADDRESS: "not-an-address" }))).to.throw(InvalidConfigError);
    expect(() => validateConfig(loadConfig({ FEE_RATE_PERCENTAGE: "150" }))).to.throw(InvalidConfigError);
    expect(() => validateConfig(loadConfig({ CHAIN_ID: "mainnet" }))).to.throw(InvalidConfigError);
    expect(() => validateConfig(loadConfig({ CHAIN_ID: "-5" }))).to.throw(InvalidConfigError);
    expect(() => validateFeeRate(-1)).to.throw(InvalidConfigError);
    expect(() => validateFeeRate(100)).to.not.throw();
  });

  it("should resolve the RPC url for a chain", () => {
    expect(getRPCUrl(5, { RPC_5: "http://localhost:8545" })).to.equal("http://localhost:8545");
    expect(() => getRPCUrl(5, {})).to.throw("RPC not set in env. Add one as RPC_5=<url>");
  });
});

describe("Errors", () => {
  it("should prefix messages with the error code", () => {
    const err = new InsufficientBootstrapCollateral(5n, 10n);
    expect(err.message).to.equal("[STB_2002] Initial collateral ratio not met: deposited 5, minimum 10");
    expect(err.code).to.equal(StabilityErrorCode.INSUFFICIENT_BOOTSTRAP_COLLATERAL);
    expect(err.suggestion).to.equal("Deposit at least 10 native units");
    expect(err.name).to.equal("InsufficientBootstrapCollateral");
  });

  it("should keep the cause of a rejected refund", () => {
    const cause = new Error("receiver rejected");
    const err = new RefundTransferError("bob", 3n, cause);
    expect(err.cause).to.equal(cause);
    expect(err).to.be.instanceOf(StabilityError);
    expect(JSON.parse(JSON.stringify(err))).to.deep.equal({
      name: "RefundTransferError",
      code: "STB_4001",
      message: "[STB_4001] Refund of 3 to bob was rejected",
      details: { recipient: "bob", amount: "3" },
    });
  });

  it("should serialise bigint details as decimal strings", () => {
    const err = new InsufficientBootstrapCollateral(5n, 10n);
    expect(JSON.parse(JSON.stringify(err)).details).to.deep.equal({ deposited: "5", minimumDeposit: "10" });
  });

  it("should recognise engine errors", () => {
    expect(isStabilityError(new InvalidConfigError("bad"))).to.equal(true);
    expect(isStabilityError(new Error("bad"))).to.equal(false);
  });
});
