import { ZeroAddress, getAddress, isAddress } from "ethers";
import {
    BadPacketError,
    InsufficientNativeError,
    NoBalanceError,
    NoSweepableOrdersError,
    NoTokenPriceError,
    ReentrancyError,
    ZeroAddressError,
} from "./errors.js";
import type { TokenLedger } from "./ledger.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import type { TokenMetadataCache } from "./metadata.js";
import { verifyPricePacket } from "./packet.js";
import { discountFor, grossValue, payableAmount, protocolCut, splitPayout } from "./pricing.js";
import type {
    Address,
    BatchSettlement,
    CallContext,
    MetadataOutcome,
    PricePacket,
    ProtocolPayout,
    SettlementRecord,
    SkippedLeg,
    SweeperConfigSnapshot,
} from "./types.js";

type ResolvedToken = { decimals: number; tier: number; price: bigint };

function checkedAddress(field: string, value: string): Address {
    if (!isAddress(value)) throw new NoSweepableOrdersError(`invalid ${field} address ${value}`);
    return getAddress(value);
}

export class SettlementEngine {
    private destinations = new Map<Address, Address>();
    // digest -> deadline; entries go once the packet could no longer verify anyway
    private consumedPackets = new Map<string, bigint>();
    private entered = false;

    constructor(
        private readonly ledger: TokenLedger,
        readonly metadata: TokenMetadataCache,
        private readonly log: Logger = defaultLogger
    ) { }

    destinationOf(maker: Address): Address {
        const m = getAddress(maker);
        return this.destinations.get(m) ?? m;
    }

    // Only the maker calls this for themself; `maker` is the caller.
    setDestination(maker: Address, destination: Address): void {
        const d = getAddress(destination);
        if (d === ZeroAddress) throw new ZeroAddressError("destination");
        this.destinations.set(getAddress(maker), d);
    }

    isPacketConsumed(digest: string): boolean {
        return this.consumedPackets.has(digest);
    }

    private pruneConsumedPackets(now: bigint): void {
        for (const [digest, deadline] of this.consumedPackets) {
            if (now > deadline) this.consumedPackets.delete(digest);
        }
    }

    settleBatch(
        ctx: CallContext,
        makers: Address[],
        tokens: Address[],
        packet: PricePacket,
        config: SweeperConfigSnapshot
    ): BatchSettlement {
        return this.atomic("settleBatch", () => this.runBatch(ctx, makers, tokens, packet, config));
    }

    payoutProtocolFees(config: SweeperConfigSnapshot): ProtocolPayout {
        return this.atomic("payoutProtocolFees", () => {
            const total = this.ledger.nativeBalanceOf(config.engineAddress);
            if (total === 0n) throw new NoBalanceError();

            const { primary, secondary } = splitPayout(total, config.payoutSplitBps);
            this.ledger.transferNative(config.engineAddress, config.protocolWallet, primary);
            this.ledger.transferNative(config.engineAddress, config.partnerWallet, secondary);

            this.log.info(
                { total: total.toString(), protocolAmount: primary.toString(), partnerAmount: secondary.toString() },
                "protocol.payout"
            );
            return {
                total,
                protocolWallet: config.protocolWallet,
                protocolAmount: primary,
                partnerWallet: config.partnerWallet,
                partnerAmount: secondary,
            };
        });
    }

    // One call at a time; everything the call changed is undone if it throws.
    private atomic<T>(entry: string, fn: () => T): T {
        if (this.entered) throw new ReentrancyError(entry);
        this.entered = true;

        const checkpoint = this.ledger.checkpoint();
        const metadata = this.metadata.snapshot();
        const destinations = new Map(this.destinations);
        const consumed = new Map(this.consumedPackets);
        try {
            const result = fn();
            this.ledger.release(checkpoint);
            return result;
        } catch (err) {
            this.ledger.rollback(checkpoint);
            this.metadata.restore(metadata);
            this.destinations = destinations;
            this.consumedPackets = consumed;
            throw err;
        } finally {
            this.entered = false;
        }
    }

    private runBatch(
        ctx: CallContext,
        makers: Address[],
        tokens: Address[],
        packet: PricePacket,
        config: SweeperConfigSnapshot
    ): BatchSettlement {
        const engine = config.engineAddress;
        const caller = checkedAddress("caller", ctx.caller);

        this.pruneConsumedPackets(ctx.timestamp);
        const verified = verifyPricePacket(packet, {
            expectedRequest: config.priceRequestType,
            trustedSigners: config.trustedSigners,
            now: ctx.timestamp,
        });
        if (this.consumedPackets.has(verified.digest)) throw new BadPacketError("replayed");

        if (makers.length === 0 || makers.length !== tokens.length) {
            throw new NoSweepableOrdersError(`makers (${makers.length}) and tokens (${tokens.length}) must be equal and nonzero`);
        }
        if (makers.length > config.maxBatchSize) {
            throw new NoSweepableOrdersError(`batch of ${makers.length} exceeds ${config.maxBatchSize}`);
        }
        if (config.whitelistEnabled && !config.whitelist.has(caller)) {
            throw new NoSweepableOrdersError(`caller ${caller} is not whitelisted`);
        }

        // Init
        if (ctx.value > 0n) {
            const funds = this.ledger.nativeBalanceOf(caller);
            if (funds < ctx.value) throw new InsufficientNativeError(ctx.value, funds);
            this.ledger.transferNative(caller, engine, ctx.value);
        }

        let remaining = ctx.value;
        let accumulatedGross = 0n;
        let totalPaid = 0n;
        const records: SettlementRecord[] = [];
        const skipped: SkippedLeg[] = [];
        const resolved = new Map<Address, ResolvedToken>();
        const outcomes = new Map<Address, MetadataOutcome>();

        // Per-leg processing
        for (let i = 0; i < makers.length; i++) {
            const maker = checkedAddress("maker", makers[i]);
            const token = checkedAddress("token", tokens[i]);

            const allowance = this.ledger.allowance(token, maker, engine);
            const balance = this.ledger.balanceOf(token, maker);
            const tokenAmount = allowance < balance ? allowance : balance;
            if (tokenAmount === 0n) {
                const reason = allowance === 0n ? "zero-allowance" : "zero-balance";
                skipped.push({ maker, token, reason });
                this.log.debug({ maker, token, reason }, "leg.skipped");
                continue;
            }

            let info = resolved.get(token);
            if (!info) {
                const res = this.metadata.ensureInitialized(token, (t) => this.ledger.decimals(t));
                outcomes.set(token, res.outcome);
                if (res.outcome === "defaulted") {
                    this.log.warn({ token, decimals: res.metadata.decimals }, "metadata.defaulted");
                }
                const price = verified.prices.get(token);
                if (price === undefined) throw new NoTokenPriceError(token);
                info = { decimals: res.metadata.decimals, tier: res.metadata.discountTier, price };
                resolved.set(token, info);
            }

            this.ledger.transferFrom(token, engine, maker, caller, tokenAmount);

            const gross = grossValue(tokenAmount, info.price, info.decimals);
            const payable = payableAmount(gross, discountFor(config.tierDiscounts, info.tier));
            if (payable > remaining) throw new InsufficientNativeError(payable, remaining);

            remaining -= payable;
            accumulatedGross += gross;
            totalPaid += payable;

            const destination = this.destinations.get(maker) ?? maker;
            this.ledger.transferNative(engine, destination, payable);

            records.push({
                maker,
                token,
                tokenAmount,
                grossNativeValue: gross,
                payableAmount: payable,
                destination,
                discountTier: info.tier,
            });
            this.log.info(
                { maker, token, tokenAmount: tokenAmount.toString(), payable: payable.toString(), destination },
                "leg.settled"
            );
        }

        // Protocol settle
        const cut = protocolCut(accumulatedGross, config.protocolFeeBps);
        if (cut > remaining) throw new InsufficientNativeError(cut, remaining);
        remaining -= cut;

        // Overage refund
        let refunded = 0n;
        if (remaining > config.overageDustThreshold) {
            this.ledger.transferNative(engine, caller, remaining);
            refunded = remaining;
            remaining = 0n;
        }

        this.consumedPackets.set(verified.digest, packet.deadline);

        this.log.info(
            {
                caller,
                legs: records.length,
                skipped: skipped.length,
                totalGross: accumulatedGross.toString(),
                protocolCut: cut.toString(),
                refunded: refunded.toString(),
                retained: remaining.toString(),
            },
            "batch.settled"
        );

        return {
            records,
            skipped,
            totalGross: accumulatedGross,
            totalPaid,
            protocolCut: cut,
            refunded,
            retained: remaining,
            metadata: outcomes,
            packetDigest: verified.digest,
        };
    }
}
