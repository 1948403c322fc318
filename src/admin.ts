import { ZeroAddress, getAddress, isAddress, isHexString } from "ethers";
import { ConfigurationError, ZeroAddressError } from "./errors.js";
import type { TokenMetadataCache } from "./metadata.js";
import { MAX_DISCOUNT_BPS, MAX_PAYOUT_SPLIT_BPS, MAX_PROTOCOL_FEE_BPS } from "./pricing.js";
import type { Address, SweeperConfigSnapshot } from "./types.js";

export type AdminSettings = {
    engineAddress: Address;
    priceRequestType: string;
    protocolFeeBps: number;
    payoutSplitBps: number;
    protocolWallet: Address;
    partnerWallet: Address;
    tierDiscounts: Array<[number, number]>;
    trustedSigners: Address[];
    whitelistEnabled: boolean;
    whitelist: Address[];
    maxBatchSize: number;
    overageDustThreshold: bigint;
};

function checkBps(field: string, value: number, max: number): void {
    if (!Number.isInteger(value) || value < 0 || value > max) {
        throw new ConfigurationError(field, `expected an integer between 0 and ${max}, got ${value}`);
    }
}

function checkTier(tier: number): void {
    if (!Number.isInteger(tier) || tier < 0 || tier > 255) {
        throw new ConfigurationError("tier", `expected an integer between 0 and 255, got ${tier}`);
    }
}

function address(field: string, value: string): Address {
    if (!isAddress(value)) throw new ConfigurationError(field, `not an address: ${value}`);
    return getAddress(value);
}

function nonZeroAddress(field: string, value: string): Address {
    const a = address(field, value);
    if (a === ZeroAddress) throw new ZeroAddressError(field);
    return a;
}

/**
 * Owner-side configuration. Every setter validates eagerly and rejects
 * out-of-range input; settlement only ever sees `snapshot()`.
 */
export class SweeperAdmin {
    private engineAddress: Address;
    private priceRequestType: string;
    private protocolFeeBps = 0;
    private payoutSplitBps = 0;
    private protocolWallet: Address = ZeroAddress;
    private partnerWallet: Address = ZeroAddress;
    private tierDiscounts = new Map<number, number>([[0, 0]]);
    private trustedSigners = new Set<Address>();
    private whitelistEnabled = false;
    private whitelist = new Set<Address>();
    private maxBatchSize: number;
    private overageDustThreshold: bigint;

    constructor(private readonly metadata: TokenMetadataCache, settings: AdminSettings) {
        this.engineAddress = nonZeroAddress("engineAddress", settings.engineAddress);
        if (!isHexString(settings.priceRequestType, 32)) {
            throw new ConfigurationError("priceRequestType", "expected a 32-byte hex string");
        }
        this.priceRequestType = settings.priceRequestType.toLowerCase();
        if (!Number.isInteger(settings.maxBatchSize) || settings.maxBatchSize <= 0) {
            throw new ConfigurationError("maxBatchSize", `expected a positive integer, got ${settings.maxBatchSize}`);
        }
        this.maxBatchSize = settings.maxBatchSize;
        if (settings.overageDustThreshold < 0n) {
            throw new ConfigurationError("overageDustThreshold", "must not be negative");
        }
        this.overageDustThreshold = settings.overageDustThreshold;

        this.setProtocolFee(settings.protocolFeeBps);
        this.setPayoutSplit(settings.payoutSplitBps);
        this.setProtocolWallet(settings.protocolWallet);
        this.setPartnerWallet(settings.partnerWallet);
        for (const [tier, bps] of settings.tierDiscounts) this.setTierDiscount(tier, bps);
        for (const signer of settings.trustedSigners) this.setTrustedSigner(signer, true);
        for (const caller of settings.whitelist) this.setWhitelisted(caller, true);
        this.setWhitelistEnabled(settings.whitelistEnabled);
    }

    setProtocolFee(bps: number): void {
        checkBps("protocolFeeBps", bps, MAX_PROTOCOL_FEE_BPS);
        this.protocolFeeBps = bps;
    }

    setPayoutSplit(bps: number): void {
        checkBps("payoutSplitBps", bps, MAX_PAYOUT_SPLIT_BPS);
        this.payoutSplitBps = bps;
    }

    setTierDiscount(tier: number, bps: number): void {
        checkTier(tier);
        checkBps("discountBps", bps, MAX_DISCOUNT_BPS);
        this.tierDiscounts.set(tier, bps);
    }

    setProtocolWallet(wallet: Address): void {
        this.protocolWallet = nonZeroAddress("protocolWallet", wallet);
    }

    setPartnerWallet(wallet: Address): void {
        this.partnerWallet = nonZeroAddress("partnerWallet", wallet);
    }

    setTrustedSigner(signer: Address, trusted: boolean): void {
        const a = nonZeroAddress("signer", signer);
        if (trusted) this.trustedSigners.add(a);
        else this.trustedSigners.delete(a);
    }

    setWhitelisted(caller: Address, allowed: boolean): void {
        const a = nonZeroAddress("caller", caller);
        if (allowed) this.whitelist.add(a);
        else this.whitelist.delete(a);
    }

    setWhitelistEnabled(enabled: boolean): void {
        this.whitelistEnabled = enabled;
    }

    overrideDecimals(token: Address, decimals: number): void {
        if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
            throw new ConfigurationError("decimals", `expected an integer between 0 and 255, got ${decimals}`);
        }
        this.metadata.overrideDecimals(nonZeroAddress("token", token), decimals);
    }

    // Tier 0 is always assignable; any other tier needs a nonzero discount.
    assignTier(token: Address, tier: number): void {
        checkTier(tier);
        if (tier !== 0 && !this.tierDiscounts.get(tier)) {
            throw new ConfigurationError("tier", `tier ${tier} has no configured discount`);
        }
        this.metadata.assignTier(nonZeroAddress("token", token), tier);
    }

    snapshot(): SweeperConfigSnapshot {
        return Object.freeze({
            engineAddress: this.engineAddress,
            priceRequestType: this.priceRequestType,
            protocolFeeBps: this.protocolFeeBps,
            payoutSplitBps: this.payoutSplitBps,
            protocolWallet: this.protocolWallet,
            partnerWallet: this.partnerWallet,
            tierDiscounts: new Map(this.tierDiscounts),
            trustedSigners: new Set(this.trustedSigners),
            whitelistEnabled: this.whitelistEnabled,
            whitelist: new Set(this.whitelist),
            maxBatchSize: this.maxBatchSize,
            overageDustThreshold: this.overageDustThreshold,
        });
    }
}
