import "dotenv/config";
import { id } from "ethers";
import { z } from "zod";
import type { AdminSettings } from "./admin.js";

export const DEFAULT_PRICE_REQUEST_TYPE = id("dust-sweeper.trusted-prices.v1");

const list = z
    .string()
    .default("")
    .transform((v) => v.split(",").map((s) => s.trim()).filter(Boolean));

const flag = z
    .enum(["true", "false", "1", "0"])
    .default("false")
    .transform((v) => v === "true" || v === "1");

// "1:500,2:1000" -> [[1, 500], [2, 1000]]
const tiers = z
    .string()
    .default("")
    .transform((v, ctx) => {
        const out: Array<[number, number]> = [];
        for (const part of v.split(",").map((s) => s.trim()).filter(Boolean)) {
            const m = /^(\d+):(\d+)$/.exec(part);
            if (!m) {
                ctx.addIssue({ code: z.ZodIssueCode.custom, message: `bad tier entry "${part}"` });
                return z.NEVER;
            }
            out.push([Number(m[1]), Number(m[2])]);
        }
        return out;
    });

const envSchema = z.object({
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().min(1),
    REDIS_URL: z.string().min(1),
    ADMIN_TOKEN: z.string().min(1),
    LEDGER_SEED_PATH: z.string().optional(),

    ENGINE_ADDRESS: z.string().min(1),
    PRICE_REQUEST_TYPE: z.string().default(DEFAULT_PRICE_REQUEST_TYPE),
    TRUSTED_SIGNERS: list,
    PROTOCOL_FEE_BPS: z.coerce.number().int().default(0),
    PAYOUT_SPLIT_BPS: z.coerce.number().int().default(10_000),
    PROTOCOL_WALLET: z.string().min(1),
    PARTNER_WALLET: z.string().min(1),
    TIER_DISCOUNTS: tiers,
    WHITELIST_ENABLED: flag,
    WHITELIST: list,
    MAX_BATCH_SIZE: z.coerce.number().int().positive().default(100),
    OVERAGE_DUST_THRESHOLD_WEI: z.string().regex(/^\d+$/).default("10000000000000").transform((v) => BigInt(v)),
});

export type ServiceConfig = {
    port: number;
    databaseUrl: string;
    redisUrl: string;
    adminToken: string;
    ledgerSeedPath?: string;
    settings: AdminSettings;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw new Error(`invalid environment: ${JSON.stringify(parsed.error.flatten().fieldErrors)}`);
    }
    const e = parsed.data;
    return {
        port: e.PORT,
        databaseUrl: e.DATABASE_URL,
        redisUrl: e.REDIS_URL,
        adminToken: e.ADMIN_TOKEN,
        ledgerSeedPath: e.LEDGER_SEED_PATH,
        settings: {
            engineAddress: e.ENGINE_ADDRESS,
            priceRequestType: e.PRICE_REQUEST_TYPE,
            protocolFeeBps: e.PROTOCOL_FEE_BPS,
            payoutSplitBps: e.PAYOUT_SPLIT_BPS,
            protocolWallet: e.PROTOCOL_WALLET,
            partnerWallet: e.PARTNER_WALLET,
            tierDiscounts: e.TIER_DISCOUNTS,
            trustedSigners: e.TRUSTED_SIGNERS,
            whitelistEnabled: e.WHITELIST_ENABLED,
            whitelist: e.WHITELIST,
            maxBatchSize: e.MAX_BATCH_SIZE,
            overageDustThreshold: e.OVERAGE_DUST_THRESHOLD_WEI,
        },
    };
}
