import { Wallet, getAddress, id, type HDNodeWallet } from "ethers";
import pino from "pino";
import { SweeperAdmin, type AdminSettings } from "../src/admin.js";
import { IntentRegistry } from "../src/intents.js";
import { MockLedger } from "../src/ledger.js";
import { TokenMetadataCache } from "../src/metadata.js";
import { signPricePacket } from "../src/packet.js";
import type { SweeperRuntime } from "../src/runtime.js";
import { SettlementEngine } from "../src/settlement.js";
import type { PricePacket } from "../src/types.js";

export const ENGINE = getAddress("0x00000000000000000000000000000000000000e1");
export const TAKER = getAddress("0x00000000000000000000000000000000000000c1");
export const MAKER_A = getAddress("0x0000000000000000000000000000000000000b01");
export const MAKER_B = getAddress("0x0000000000000000000000000000000000000b02");
export const DEST = getAddress("0x0000000000000000000000000000000000000a11");
export const TOKEN_A = getAddress("0x0000000000000000000000000000000000000d01"); // 6 decimals
export const TOKEN_B = getAddress("0x0000000000000000000000000000000000000d02"); // 18 decimals
export const TOKEN_C = getAddress("0x0000000000000000000000000000000000000d03"); // decimals() reverts
export const PROTOCOL_WALLET = getAddress("0x00000000000000000000000000000000000000f1");
export const PARTNER_WALLET = getAddress("0x00000000000000000000000000000000000000f2");

export const REQUEST = id("test-price-request");
export const NOW = 1_700_000_000n;
export const TAKER_FUNDS = 10n ** 18n;

export const silentLogger = pino({ level: "silent" });

export function settings(signer: string, overrides: Partial<AdminSettings> = {}): AdminSettings {
    return {
        engineAddress: ENGINE,
        priceRequestType: REQUEST,
        protocolFeeBps: 200,
        payoutSplitBps: 8000,
        protocolWallet: PROTOCOL_WALLET,
        partnerWallet: PARTNER_WALLET,
        tierDiscounts: [[1, 500]],
        trustedSigners: [signer],
        whitelistEnabled: false,
        whitelist: [],
        maxBatchSize: 5,
        overageDustThreshold: 10n,
        ...overrides,
    };
}

export type Harness = {
    signer: HDNodeWallet;
    ledger: MockLedger;
    metadata: TokenMetadataCache;
    admin: SweeperAdmin;
    engine: SettlementEngine;
    packet(prices: Array<{ token: string; price: bigint }>, deadline?: bigint): Promise<PricePacket>;
};

export function harness(overrides: Partial<AdminSettings> = {}): Harness {
    const signer = Wallet.createRandom();
    const ledger = new MockLedger();
    ledger.registerToken(TOKEN_A, { decimals: 6 });
    ledger.registerToken(TOKEN_B, { decimals: 18 });
    ledger.registerToken(TOKEN_C, { decimals: "revert" });
    ledger.fund(TAKER, TAKER_FUNDS);

    const metadata = new TokenMetadataCache();
    const admin = new SweeperAdmin(metadata, settings(signer.address, overrides));
    const engine = new SettlementEngine(ledger, metadata, silentLogger);

    return {
        signer,
        ledger,
        metadata,
        admin,
        engine,
        packet: (prices, deadline = NOW + 600n) => signPricePacket(signer, REQUEST, deadline, prices),
    };
}

export function runtimeOf(h: Harness): SweeperRuntime {
    return {
        ledger: h.ledger,
        metadata: h.metadata,
        admin: h.admin,
        engine: h.engine,
        intents: new IntentRegistry(),
        adminToken: "test-secret",
    };
}

// Maker holds and has approved exactly `amount` of `token`.
export function giveDust(ledger: MockLedger, maker: string, token: string, amount: bigint) {
    ledger.mint(token, maker, amount);
    ledger.approve(token, maker, ENGINE, amount);
}

export function caught(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    throw new Error("expected the call to throw");
}
