import "dotenv/config";
import { formatEther, parseEther } from "ethers";
import { StabilityState } from "./StabilityState";
import StabilityEngine from "./logic/StabilityEngine";
import { InMemoryNativeTransport } from "./ledger/NativeTransport";
import { StaticPriceFeed } from "./oracle/PriceFeed";
import { loadConfig, validateConfig } from "./lib/Config";
import { isStabilityError } from "./lib/Errors";
import { buildLogger } from "./lib/Logger";

const config = loadConfig();
const logger = buildLogger(config.logLevel);

function summarize(engine: StabilityEngine): string {
    const bufferPrice = engine.bufferUnitPrice();
    return [
        `collateral=${formatEther(engine.collateral)}`,
        `stableSupply=${formatEther(engine.stableTotalSupply)}`,
        `bufferSupply=${engine.hasBufferPool ? formatEther(engine.bufferTotalSupply) : "none"}`,
        `deficitOrSurplus=${formatEther(engine.deficitOrSurplus())}`,
        `bufferUnitPrice=${bufferPrice === null ? "undefined" : formatEther(bufferPrice)}`,
    ].join(" ");
}

async function fromChain(engineAddress: string): Promise<void> {
    const state = StabilityState.fromChainId(engineAddress, config.chainId);
    const engine = await state.sync();
    logger.info(`Synced ${engineAddress} on chain ${config.chainId}: ${summarize(engine)}`);
}

function simulate(): void {
    const alice = "0x00000000000000000000000000000000000000a1";
    const bob = "0x00000000000000000000000000000000000000b0";

    const priceFeed = new StaticPriceFeed(4000n);
    const transport = new InMemoryNativeTransport();
    transport.fund(alice, parseEther("10"));
    transport.fund(bob, parseEther("10"));
    const engine = new StabilityEngine({
        feeRatePercentage: config.feeRatePercentage,
        priceFeed,
        transport,
        logger,
    });

    engine.mintStable({ from: alice, value: parseEther("1") });
    logger.info(`after mint: ${summarize(engine)}`);

    try {
        engine.depositBuffer({ from: bob, value: parseEther("0.05") });
    } catch (err) {
        if (!isStabilityError(err)) throw err;
        logger.info(`undersized bootstrap rejected: ${err.message}`);
    }

    engine.depositBuffer({ from: bob, value: parseEther("0.5") });
    logger.info(`after bootstrap: ${summarize(engine)}`);

    priceFeed.setPrice(3000n);
    logger.info(`after price drop: ${summarize(engine)}`);

    engine.withdrawBuffer({ from: bob }, engine.bufferBalanceOf(bob) / 5n);
    logger.info(`after buffer withdrawal: ${summarize(engine)}`);

    engine.burnStable({ from: alice }, parseEther("1000"));
    logger.info(`after burn: ${summarize(engine)}`);
}

(async () => {
    validateConfig(config);
    if (config.engineAddress) {
        await fromChain(config.engineAddress);
    } else {
        simulate();
    }
})().catch((err: unknown) => {
    logger.error(`Fatal: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
});
