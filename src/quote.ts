import { getAddress } from "ethers";
import type { TokenLedger } from "./ledger.js";
import { DEFAULT_DECIMALS, type TokenMetadataCache } from "./metadata.js";
import { discountFor, grossValue, payableAmount, protocolCut } from "./pricing.js";
import type { Address, SweeperConfigSnapshot, TrustedPrices } from "./types.js";

export type LegQuote = {
    maker: Address;
    token: Address;
    tokenAmount: bigint;
    gross: bigint;
    payable: bigint;
};

export type BatchQuote = {
    legs: LegQuote[];
    makers: Address[];
    tokens: Address[];
    unpriced: Address[];
    // quotable legs left out because the batch reached `maxBatchSize`
    overflow: number;
    totalGross: bigint;
    totalPayable: bigint;
    protocolCut: bigint;
    requiredValue: bigint;
    gasCost: bigint;
    profit: bigint;
};

// Read-only: unlike the cache, an uncached token's probe result is not stored.
function decimalsFor(ledger: TokenLedger, metadata: TokenMetadataCache, token: Address): number {
    const cached = metadata.get(token);
    if (cached?.initialized) return cached.decimals;
    try {
        const reported = ledger.decimals(token);
        return Number.isInteger(reported) && reported >= 0 && reported <= 255 ? reported : DEFAULT_DECIMALS;
    } catch {
        return DEFAULT_DECIMALS;
    }
}

/**
 * Works out what a taker must attach to settle the given legs and whether the
 * batch pays for its gas. Legs with nothing sweepable or no price are left out
 * of `makers`/`tokens`, and at most `maxBatchSize` legs are kept, so those
 * arrays can be submitted as they are.
 */
export function quoteBatch(
    ledger: TokenLedger,
    metadata: TokenMetadataCache,
    config: SweeperConfigSnapshot,
    makers: Address[],
    tokens: Address[],
    prices: TrustedPrices,
    gasCost = 0n
): BatchQuote {
    const legs: LegQuote[] = [];
    const unpriced = new Set<Address>();
    // what earlier legs already moved, per maker:token
    const taken = new Map<string, bigint>();
    let overflow = 0;
    let totalGross = 0n;
    let totalPayable = 0n;

    const count = Math.min(makers.length, tokens.length);
    for (let i = 0; i < count; i++) {
        const maker = getAddress(makers[i]);
        const token = getAddress(tokens[i]);

        const key = `${maker}:${token}`;
        const used = taken.get(key) ?? 0n;
        const allowance = ledger.allowance(token, maker, config.engineAddress) - used;
        const balance = ledger.balanceOf(token, maker) - used;
        const tokenAmount = allowance < balance ? allowance : balance;
        if (tokenAmount <= 0n) continue;

        const price = prices.get(token);
        if (price === undefined) {
            unpriced.add(token);
            continue;
        }

        const gross = grossValue(tokenAmount, price, decimalsFor(ledger, metadata, token));
        if (gross === 0n) continue;
        if (legs.length >= config.maxBatchSize) {
            overflow++;
            continue;
        }
        taken.set(key, used + tokenAmount);
        const payable = payableAmount(gross, discountFor(config.tierDiscounts, metadata.tierOf(token)));

        legs.push({ maker, token, tokenAmount, gross, payable });
        totalGross += gross;
        totalPayable += payable;
    }

    const cut = protocolCut(totalGross, config.protocolFeeBps);
    const requiredValue = totalPayable + cut;
    return {
        legs,
        makers: legs.map((l) => l.maker),
        tokens: legs.map((l) => l.token),
        unpriced: [...unpriced],
        overflow,
        totalGross,
        totalPayable,
        protocolCut: cut,
        requiredValue,
        gasCost,
        profit: totalGross - requiredValue - gasCost,
    };
}
