export const BPS_DENOMINATOR = 10_000n;

export const MAX_DISCOUNT_BPS = 10_000;
export const MAX_PROTOCOL_FEE_BPS = 5_000;
export const MAX_PAYOUT_SPLIT_BPS = 10_000;

// All divisions truncate, so rounding never pays a maker more than the price implies.

export function grossValue(tokenAmount: bigint, price: bigint, decimals: number): bigint {
    return (tokenAmount * price) / 10n ** BigInt(decimals);
}

export function payableAmount(gross: bigint, discountBps: number): bigint {
    return (gross * (BPS_DENOMINATOR - BigInt(discountBps))) / BPS_DENOMINATOR;
}

// Taken once over the batch total rather than per leg.
export function protocolCut(totalGross: bigint, protocolFeeBps: number): bigint {
    return (totalGross * BigInt(protocolFeeBps)) / BPS_DENOMINATOR;
}

export function splitPayout(total: bigint, splitBps: number): { primary: bigint; secondary: bigint } {
    const primary = (total * BigInt(splitBps)) / BPS_DENOMINATOR;
    return { primary, secondary: total - primary };
}

export function discountFor(tierDiscounts: ReadonlyMap<number, number>, tier: number): number {
    return tierDiscounts.get(tier) ?? 0;
}
