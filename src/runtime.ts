import { SweeperAdmin } from "./admin.js";
import type { ServiceConfig } from "./config.js";
import { IntentRegistry } from "./intents.js";
import { MockLedger, loadLedgerSeed } from "./ledger.js";
import { TokenMetadataCache } from "./metadata.js";
import { SettlementEngine } from "./settlement.js";

export type SweeperRuntime = {
    ledger: MockLedger;
    metadata: TokenMetadataCache;
    admin: SweeperAdmin;
    engine: SettlementEngine;
    intents: IntentRegistry;
    adminToken: string;
};

export function createRuntime(config: ServiceConfig, ledger?: MockLedger): SweeperRuntime {
    const host = ledger ?? (config.ledgerSeedPath ? loadLedgerSeed(config.ledgerSeedPath) : new MockLedger());
    const metadata = new TokenMetadataCache();
    const admin = new SweeperAdmin(metadata, config.settings);
    const engine = new SettlementEngine(host, metadata);
    return { ledger: host, metadata, admin, engine, intents: new IntentRegistry(), adminToken: config.adminToken };
}
