import { expect } from "chai";
import { ethers } from "ethers";
import { StabilityState } from "../src/StabilityState";
import { UNTRACKED_HOLDER, toBalanceMap, type StabilityParams, type StabilityParamsSource } from "../src/readers/StabilityReader";

const ALICE = "0x00000000000000000000000000000000000000a1";
const BOB = "0x00000000000000000000000000000000000000b0";

class FakeSource implements StabilityParamsSource {
  public calls = 0;
  public requested: string[] = [];

  constructor(private readonly params: StabilityParams) {}

  async getParams(accounts: string[] = []): Promise<StabilityParams> {
    this.calls++;
    this.requested = accounts;
    return this.params;
  }
}

describe("toBalanceMap", () => {
  it("should assign the untracked remainder to a placeholder holder", () => {
    const map = toBalanceMap([ALICE, BOB], [30n, 0n], 100n);
    expect([...map.entries()]).to.deep.equal([
      [ALICE, 30n],
      [UNTRACKED_HOLDER, 70n],
    ]);
  });

  it("should leave out the placeholder when every unit is tracked", () => {
    expect(toBalanceMap([ALICE], [100n], 100n).has(UNTRACKED_HOLDER)).to.equal(false);
  });
});

describe("StabilityState", () => {
  const params: StabilityParams = {
    feeRatePercentage: 3,
    price: 4000n,
    collateral: ethers.parseEther("1.5"),
    stableTotalSupply: ethers.parseEther("4000"),
    stableBalances: new Map([[ALICE, ethers.parseEther("4000")]]),
    bufferAddress: "0x00000000000000000000000000000000000000c0",
    bufferTotalSupply: ethers.parseEther("2000"),
    bufferBalances: new Map([[BOB, ethers.parseEther("2000")]]),
  };

  it("should mirror fetched state into a local engine", async () => {
    const source = new FakeSource(params);
    const state = new StabilityState(source, [ALICE, BOB]);
    const engine = await state.sync();

    expect(source.requested).to.deep.equal([ALICE, BOB]);
    expect(state.lastFetchedData).to.equal(params);
    expect(engine.feeRatePercentage).to.equal(3);
    expect(engine.collateral).to.equal(ethers.parseEther("1.5"));
    expect(engine.stableBalanceOf(ALICE)).to.equal(ethers.parseEther("4000"));
    expect(engine.bufferTotalSupply).to.equal(ethers.parseEther("2000"));
    expect(engine.deficitOrSurplus()).to.equal(ethers.parseEther("2000"));
    expect(engine.bufferUnitPrice()).to.equal(ethers.parseEther("1"));
  });

  it("should simulate calls against the mirrored state", async () => {
    const state = new StabilityState(new FakeSource(params), [ALICE, BOB]);
    const engine = await state.getEngine();

    expect(engine.withdrawBuffer({ from: BOB }, ethers.parseEther("400"))).to.equal(ethers.parseEther("0.1"));
    expect(state.transport?.balanceOf(BOB)).to.equal(ethers.parseEther("0.1"));
  });

  it("should only fetch once until synced again", async () => {
    const source = new FakeSource(params);
    const state = new StabilityState(source);
    expect(state.engine).to.equal(null);

    const first = await state.getEngine();
    const second = await state.getEngine();
    expect(second).to.equal(first);
    expect(source.calls).to.equal(1);

    const third = await state.sync();
    expect(third).to.not.equal(first);
    expect(source.calls).to.equal(2);
  });

  it("should mirror a contract whose buffer token was never deployed", async () => {
    const state = new StabilityState(
      new FakeSource({ ...params, bufferAddress: null, bufferTotalSupply: null, bufferBalances: null })
    );
    const engine = await state.sync();
    expect(engine.hasBufferPool).to.equal(false);
    expect(engine.fee(ethers.parseEther("1"))).to.equal(0n);
  });
});
