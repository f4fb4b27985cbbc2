import { Contract, JsonRpcProvider, ZeroAddress, type Provider } from "ethers";

const ENGINE_ABI = [
    "function feeRatePercentage() view returns (uint256)",
    "function totalSupply() view returns (uint256)",
    "function balanceOf(address account) view returns (uint256)",
    "function depositorCoin() view returns (address)",
    "function oracle() view returns (address)",
];

const ORACLE_ABI = [
    "function getPrice() view returns (uint256)",
];

const ERC20_ABI = [
    "function totalSupply() view returns (uint256)",
    "function balanceOf(address account) view returns (uint256)",
];

/** Holder that absorbs the part of a supply not held by the tracked accounts. */
export const UNTRACKED_HOLDER = ZeroAddress;

export interface StabilityParams {
    feeRatePercentage: number;
    price: bigint;
    collateral: bigint;
    stableTotalSupply: bigint;
    stableBalances: Map<string, bigint>;
    /** null while the buffer token has not been deployed */
    bufferAddress: string | null;
    bufferTotalSupply: bigint | null;
    bufferBalances: Map<string, bigint> | null;
}

export interface StabilityParamsSource {
    getParams(accounts?: string[]): Promise<StabilityParams>;
}

/**
 * Reader for a deployed stability engine contract, its oracle and its buffer token.
 */
export class StabilityReader implements StabilityParamsSource {
    private engine: Contract;
    public readonly provider: Provider;
    public readonly address: string;

    constructor(engineAddress: string, provider: Provider) {
        this.address = engineAddress;
        this.provider = provider;
        this.engine = new Contract(engineAddress, ENGINE_ABI, provider);
    }

    static fromRpcUrl(engineAddress: string, rpcUrl: string): StabilityReader {
        const provider = new JsonRpcProvider(rpcUrl);
        return new StabilityReader(engineAddress, provider);
    }

    async getFeeRatePercentage(): Promise<number> {
        return Number(await this.engine.feeRatePercentage());
    }

    async getPrice(): Promise<bigint> {
        const oracleAddress: string = await this.engine.oracle();
        const oracle = new Contract(oracleAddress, ORACLE_ABI, this.provider);
        return await oracle.getPrice();
    }

    /**
     * Native balance held by the engine contract
     */
    async getCollateral(): Promise<bigint> {
        return await this.provider.getBalance(this.address);
    }

    async getStableTotalSupply(): Promise<bigint> {
        return await this.engine.totalSupply();
    }

    /**
     * Address of the buffer token, or null before the first buffer deposit
     */
    async getBufferAddress(): Promise<string | null> {
        const address: string = await this.engine.depositorCoin();
        return address === ZeroAddress ? null : address;
    }

    async getBufferTotalSupply(bufferAddress: string): Promise<bigint> {
        const buffer = new Contract(bufferAddress, ERC20_ABI, this.provider);
        return await buffer.totalSupply();
    }

    async getParams(accounts: string[] = []): Promise<StabilityParams> {
        const [feeRatePercentage, price, collateral, stableTotalSupply, bufferAddress] = await Promise.all([
            this.getFeeRatePercentage(),
            this.getPrice(),
            this.getCollateral(),
            this.getStableTotalSupply(),
            this.getBufferAddress(),
        ]);

        const stableBalances = await this.readBalances(this.engine, accounts, stableTotalSupply);

        let bufferTotalSupply: bigint | null = null;
        let bufferBalances: Map<string, bigint> | null = null;
        if (bufferAddress) {
            const buffer = new Contract(bufferAddress, ERC20_ABI, this.provider);
            bufferTotalSupply = await this.getBufferTotalSupply(bufferAddress);
            bufferBalances = await this.readBalances(buffer, accounts, bufferTotalSupply);
        }

        return {
            feeRatePercentage,
            price,
            collateral,
            stableTotalSupply,
            stableBalances,
            bufferAddress,
            bufferTotalSupply,
            bufferBalances,
        };
    }

    private async readBalances(token: Contract, accounts: string[], totalSupply: bigint): Promise<Map<string, bigint>> {
        const balances = await Promise.all(accounts.map(async (a): Promise<bigint> => await token.balanceOf(a)));
        return toBalanceMap(accounts, balances, totalSupply);
    }
}

/**
 * Pairs accounts with balances; whatever the accounts do not hold goes to UNTRACKED_HOLDER.
 */
export function toBalanceMap(accounts: string[], balances: bigint[], totalSupply: bigint): Map<string, bigint> {
    const map = new Map<string, bigint>();
    let tracked = 0n;
    accounts.forEach((account, i) => {
        const balance = balances[i] ?? 0n;
        if (balance > 0n) {
            map.set(account, (map.get(account) ?? 0n) + balance);
            tracked += balance;
        }
    });
    if (totalSupply > tracked) {
        map.set(UNTRACKED_HOLDER, totalSupply - tracked);
    }
    return map;
}
