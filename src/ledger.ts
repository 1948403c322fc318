import fs from "node:fs";
import { getAddress } from "ethers";
import { z } from "zod";
import type { Address } from "./types.js";

// The host the engine settles against: token balances, allowances and
// native value, with checkpoints giving all-or-nothing calls.
export interface TokenLedger {
    balanceOf(token: Address, owner: Address): bigint;
    allowance(token: Address, owner: Address, spender: Address): bigint;
    decimals(token: Address): number;
    transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): void;
    nativeBalanceOf(owner: Address): bigint;
    transferNative(from: Address, to: Address, amount: bigint): void;
    checkpoint(): number;
    rollback(id: number): void;
    release(id: number): void;
}

export type ApprovalEvent = {
    token: Address;
    owner: Address;
    spender: Address;
    value: bigint;
    blockNumber: number;
    logIndex: number;
};

export type TransferEvent =
    | { kind: "token"; token: Address; from: Address; to: Address; amount: bigint }
    | { kind: "native"; from: Address; to: Address; amount: bigint };

export type TransferHook = (event: TransferEvent) => void;

type TokenInfo = { decimals: number | "revert" };

type LedgerState = {
    tokens: Map<Address, TokenInfo>;
    balances: Map<string, bigint>;
    allowances: Map<string, bigint>;
    native: Map<Address, bigint>;
    approvals: ApprovalEvent[];
    blockNumber: number;
};

function cloneState(s: LedgerState): LedgerState {
    return {
        tokens: new Map(s.tokens),
        balances: new Map(s.balances),
        allowances: new Map(s.allowances),
        native: new Map(s.native),
        approvals: [...s.approvals],
        blockNumber: s.blockNumber,
    };
}

const balanceKey = (token: Address, owner: Address) => `${token}:${owner}`;
const allowanceKey = (token: Address, owner: Address, spender: Address) => `${token}:${owner}:${spender}`;

export class MockLedger implements TokenLedger {
    private state: LedgerState = {
        tokens: new Map(),
        balances: new Map(),
        allowances: new Map(),
        native: new Map(),
        approvals: [],
        blockNumber: 0,
    };
    private checkpoints: LedgerState[] = [];
    private hooks: TransferHook[] = [];

    registerToken(token: Address, info: TokenInfo): void {
        this.state.tokens.set(getAddress(token), info);
    }

    setDecimals(token: Address, decimals: number | "revert"): void {
        this.registerToken(token, { decimals });
    }

    mint(token: Address, owner: Address, amount: bigint): void {
        const key = balanceKey(getAddress(token), getAddress(owner));
        this.state.balances.set(key, (this.state.balances.get(key) ?? 0n) + amount);
    }

    approve(token: Address, owner: Address, spender: Address, value: bigint): ApprovalEvent {
        const t = getAddress(token);
        const o = getAddress(owner);
        const s = getAddress(spender);
        this.state.allowances.set(allowanceKey(t, o, s), value);
        this.state.blockNumber += 1;
        const evt: ApprovalEvent = { token: t, owner: o, spender: s, value, blockNumber: this.state.blockNumber, logIndex: 0 };
        this.state.approvals.push(evt);
        return evt;
    }

    fund(owner: Address, amount: bigint): void {
        const o = getAddress(owner);
        this.state.native.set(o, (this.state.native.get(o) ?? 0n) + amount);
    }

    onTransfer(hook: TransferHook): () => void {
        this.hooks.push(hook);
        return () => {
            this.hooks = this.hooks.filter((h) => h !== hook);
        };
    }

    approvals(): ApprovalEvent[] {
        return [...this.state.approvals];
    }

    balanceOf(token: Address, owner: Address): bigint {
        return this.state.balances.get(balanceKey(getAddress(token), getAddress(owner))) ?? 0n;
    }

    allowance(token: Address, owner: Address, spender: Address): bigint {
        return this.state.allowances.get(allowanceKey(getAddress(token), getAddress(owner), getAddress(spender))) ?? 0n;
    }

    decimals(token: Address): number {
        const info = this.state.tokens.get(getAddress(token));
        if (!info) throw new Error(`call to non-contract ${token}`);
        if (info.decimals === "revert") throw new Error(`decimals() reverted for ${token}`);
        return info.decimals;
    }

    transferFrom(token: Address, spender: Address, from: Address, to: Address, amount: bigint): void {
        const t = getAddress(token);
        const f = getAddress(from);
        const dest = getAddress(to);
        const aKey = allowanceKey(t, f, getAddress(spender));
        const allowed = this.state.allowances.get(aKey) ?? 0n;
        const fromKey = balanceKey(t, f);
        const balance = this.state.balances.get(fromKey) ?? 0n;
        if (allowed < amount) throw new Error("transfer amount exceeds allowance");
        if (balance < amount) throw new Error("transfer amount exceeds balance");

        this.state.allowances.set(aKey, allowed - amount);
        this.state.balances.set(fromKey, balance - amount);
        const toKey = balanceKey(t, dest);
        this.state.balances.set(toKey, (this.state.balances.get(toKey) ?? 0n) + amount);
        this.emit({ kind: "token", token: t, from: f, to: dest, amount });
    }

    nativeBalanceOf(owner: Address): bigint {
        return this.state.native.get(getAddress(owner)) ?? 0n;
    }

    transferNative(from: Address, to: Address, amount: bigint): void {
        const f = getAddress(from);
        const dest = getAddress(to);
        const balance = this.state.native.get(f) ?? 0n;
        if (amount < 0n) throw new Error("negative native transfer");
        if (balance < amount) throw new Error("native transfer exceeds balance");
        this.state.native.set(f, balance - amount);
        this.state.native.set(dest, (this.state.native.get(dest) ?? 0n) + amount);
        this.emit({ kind: "native", from: f, to: dest, amount });
    }

    checkpoint(): number {
        this.checkpoints.push(cloneState(this.state));
        return this.checkpoints.length - 1;
    }

    rollback(id: number): void {
        const saved = this.checkpoints[id];
        if (!saved) throw new Error(`unknown checkpoint ${id}`);
        this.state = saved;
        this.checkpoints.length = id;
    }

    release(id: number): void {
        if (id >= this.checkpoints.length) throw new Error(`unknown checkpoint ${id}`);
        this.checkpoints.length = id;
    }

    private emit(event: TransferEvent): void {
        for (const hook of this.hooks) hook(event);
    }
}

const bigintString = z.string().regex(/^\d+$/).transform((v) => BigInt(v));

const seedSchema = z.object({
    tokens: z.array(z.object({
        address: z.string(),
        decimals: z.union([z.number().int().min(0).max(255), z.literal("revert")]),
    })).default([]),
    balances: z.array(z.object({
        token: z.string(),
        owner: z.string(),
        amount: bigintString,
    })).default([]),
    approvals: z.array(z.object({
        token: z.string(),
        owner: z.string(),
        spender: z.string(),
        value: bigintString,
    })).default([]),
    native: z.array(z.object({
        owner: z.string(),
        amount: bigintString,
    })).default([]),
});

export type LedgerSeed = z.infer<typeof seedSchema>;

export function ledgerFromSeed(raw: unknown): MockLedger {
    const seed = seedSchema.parse(raw);
    const ledger = new MockLedger();
    for (const t of seed.tokens) ledger.registerToken(t.address, { decimals: t.decimals });
    for (const b of seed.balances) ledger.mint(b.token, b.owner, b.amount);
    for (const a of seed.approvals) ledger.approve(a.token, a.owner, a.spender, a.value);
    for (const n of seed.native) ledger.fund(n.owner, n.amount);
    return ledger;
}

export function loadLedgerSeed(path: string): MockLedger {
    return ledgerFromSeed(JSON.parse(fs.readFileSync(path, "utf8")));
}
