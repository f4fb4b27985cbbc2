import { JsonRpcProvider, type Provider } from "ethers";
import { StabilityReader, type StabilityParams, type StabilityParamsSource } from "./readers/StabilityReader";
import StabilityEngine from "./logic/StabilityEngine";
import { InMemoryNativeTransport } from "./ledger/NativeTransport";
import { StaticPriceFeed } from "./oracle/PriceFeed";
import { getRPCUrl } from "./lib/Config";

/**
 * StabilityState fetches the state of a deployed engine and mirrors it into
 * a local StabilityEngine simulation.
 */
export class StabilityState {
    public readonly source: StabilityParamsSource;
    public readonly accounts: string[];
    private _engine: StabilityEngine | null = null;
    private _transport: InMemoryNativeTransport | null = null;
    private _lastFetchedData: StabilityParams | null = null;

    constructor(source: StabilityParamsSource, accounts: string[] = []) {
        this.source = source;
        this.accounts = accounts;
    }

    static fromProvider(engineAddress: string, provider: Provider, accounts: string[] = []): StabilityState {
        return new StabilityState(new StabilityReader(engineAddress, provider), accounts);
    }

    static fromRpcUrl(engineAddress: string, rpcUrl: string, accounts: string[] = []): StabilityState {
        return StabilityState.fromProvider(engineAddress, new JsonRpcProvider(rpcUrl), accounts);
    }

    static fromChainId(engineAddress: string, chainId: number, accounts: string[] = []): StabilityState {
        return StabilityState.fromRpcUrl(engineAddress, getRPCUrl(chainId), accounts);
    }

    /**
     * Fetch the latest state and create a fresh StabilityEngine instance
     */
    async sync(): Promise<StabilityEngine> {
        const data = await this.source.getParams(this.accounts);
        this._lastFetchedData = data;

        this._transport = new InMemoryNativeTransport();
        this._engine = new StabilityEngine({
            feeRatePercentage: data.feeRatePercentage,
            priceFeed: new StaticPriceFeed(data.price),
            transport: this._transport,
            seed: {
                collateral: data.collateral,
                stableBalances: data.stableBalances,
                bufferBalances: data.bufferBalances,
            },
        });

        return this._engine;
    }

    /**
     * Get the current engine (fetches if not yet synced)
     */
    async getEngine(): Promise<StabilityEngine> {
        if (!this._engine) {
            return this.sync();
        }
        return this._engine;
    }

    get lastFetchedData(): StabilityParams | null {
        return this._lastFetchedData;
    }

    get engine(): StabilityEngine | null {
        return this._engine;
    }

    /**
     * Native balances of simulated callers; fund accounts here before simulating calls
     */
    get transport(): InMemoryNativeTransport | null {
        return this._transport;
    }
}
