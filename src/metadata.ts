import type { Address, MetadataResolution, TokenMetadata } from "./types.js";

export const DEFAULT_DECIMALS = 18;

export type DecimalsProbe = (token: Address) => number;

function isValidDecimals(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= 255;
}

export class TokenMetadataCache {
    private entries = new Map<Address, TokenMetadata>();

    /**
     * Resolves a token's metadata on first sight. A probe failure is final:
     * the token is stored with 18 decimals and never probed again.
     */
    ensureInitialized(token: Address, probe: DecimalsProbe): MetadataResolution {
        const existing = this.entries.get(token);
        if (existing?.initialized) return { outcome: "cached", metadata: { ...existing } };

        let decimals = DEFAULT_DECIMALS;
        let outcome: MetadataResolution["outcome"] = "defaulted";
        try {
            const reported = probe(token);
            if (isValidDecimals(reported)) {
                decimals = reported;
                outcome = "resolved";
            }
        } catch {
            outcome = "defaulted";
        }

        const metadata: TokenMetadata = {
            initialized: true,
            decimals,
            discountTier: existing?.discountTier ?? 0,
        };
        this.entries.set(token, metadata);
        return { outcome, metadata: { ...metadata } };
    }

    get(token: Address): TokenMetadata | undefined {
        const entry = this.entries.get(token);
        return entry ? { ...entry } : undefined;
    }

    decimalsOf(token: Address): number {
        return this.entries.get(token)?.decimals ?? DEFAULT_DECIMALS;
    }

    tierOf(token: Address): number {
        return this.entries.get(token)?.discountTier ?? 0;
    }

    overrideDecimals(token: Address, decimals: number): void {
        const entry = this.entries.get(token);
        this.entries.set(token, {
            initialized: true,
            decimals,
            discountTier: entry?.discountTier ?? 0,
        });
    }

    assignTier(token: Address, tier: number): void {
        const entry = this.entries.get(token);
        this.entries.set(token, {
            initialized: entry?.initialized ?? false,
            decimals: entry?.decimals ?? DEFAULT_DECIMALS,
            discountTier: tier,
        });
    }

    snapshot(): Map<Address, TokenMetadata> {
        return new Map([...this.entries].map(([k, v]) => [k, { ...v }]));
    }

    restore(entries: Map<Address, TokenMetadata>): void {
        this.entries = new Map([...entries].map(([k, v]) => [k, { ...v }]));
    }
}
