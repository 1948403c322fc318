import { Wallet, type HDNodeWallet } from "ethers";
import { beforeEach, describe, expect, it, vi } from "vitest";

// ---- Mocks (must be declared before importing app) ----
const mockCreateBatch = vi.fn();
const mockGetBatch = vi.fn();
const mockListBatchEvents = vi.fn();
const mockAddEvent = vi.fn();

vi.mock("../src/db.js", () => ({
    createBatch: (...args: unknown[]) => mockCreateBatch(...args),
    getBatch: (...args: unknown[]) => mockGetBatch(...args),
    listBatchEvents: (...args: unknown[]) => mockListBatchEvents(...args),
    addEvent: (...args: unknown[]) => mockAddEvent(...args),
}));

const mockQueueAdd = vi.fn();
vi.mock("../src/queue.js", () => ({
    batchQueue: { add: (...args: unknown[]) => mockQueueAdd(...args) },
}));

const mockPublishStatus = vi.fn();
vi.mock("../src/redis.js", () => ({
    publishStatus: (...args: unknown[]) => mockPublishStatus(...args),
    statusChannel: (batchId: string) => `batch:status:${batchId}`,
}));

// Mock ioredis constructor used in WS handler
vi.mock("ioredis", () => {
    class FakeRedis {
        subscribe = vi.fn(async (_chan: string) => { });
        on = vi.fn((_evt: string, _cb: unknown) => { });
        unsubscribe = vi.fn(async (_chan: string) => { });
        quit = vi.fn(async () => { });
        disconnect = vi.fn();
    }
    return { default: FakeRedis };
});

// Now import app builder + ws handler
import { buildApp, handleBatchWs } from "../src/app.js";
import { destinationMessage, settleMessage } from "../src/intents.js";
import type { SweeperRuntime } from "../src/runtime.js";
import {
    DEST,
    ENGINE,
    MAKER_A,
    PARTNER_WALLET,
    PROTOCOL_WALLET,
    TAKER,
    TOKEN_A,
    giveDust,
    harness,
    runtimeOf,
} from "./helpers.js";

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const VALUE = 2_040_000_000_000_000n;

function runtime(): SweeperRuntime {
    return runtimeOf(harness());
}

async function settleBody(caller: string, signer: HDNodeWallet) {
    const h = harness();
    const packet = await h.packet([{ token: TOKEN_A, price: 10n ** 15n }]);
    const signature = await signer.signMessage(settleMessage(caller, VALUE, [MAKER_A], [TOKEN_A], packet));
    return {
        caller,
        value: VALUE.toString(),
        makers: [MAKER_A],
        tokens: [TOKEN_A],
        packet: { ...packet, deadline: packet.deadline.toString() },
        signature,
    };
}

type App = Awaited<ReturnType<typeof buildApp>>;

async function postDestination(app: App, maker: HDNodeWallet, destination: string, nonce: bigint) {
    const signature = await maker.signMessage(destinationMessage(maker.address, destination, nonce));
    return app.inject({
        method: "POST",
        url: "/api/destinations",
        payload: { maker: maker.address, destination, nonce: nonce.toString(), signature },
    });
}

describe("Dust sweeper API", () => {
    beforeEach(() => {
        vi.clearAllMocks();
        process.env.REDIS_URL = "redis://localhost:6379";
    });

    // ---- SETTLE SUBMISSION ----
    it("POST /api/batches/settle returns 400 on invalid body", async () => {
        const app = await buildApp(runtime());
        await app.ready();

        const res = await app.inject({
            method: "POST",
            url: "/api/batches/settle",
            payload: { hello: "world" },
        });

        expect(res.statusCode).toBe(400);
        await app.close();
    });

    it("POST /api/batches/settle returns 400 on a non-numeric value", async () => {
        const app = await buildApp(runtime());
        await app.ready();
        const taker = Wallet.createRandom();

        const res = await app.inject({
            method: "POST",
            url: "/api/batches/settle",
            payload: { ...(await settleBody(taker.address, taker)), value: "-1" },
        });

        expect(res.statusCode).toBe(400);
        await app.close();
    });

    it("POST /api/batches/settle enqueues the batch and writes pending state", async () => {
        const app = await buildApp(runtime());
        await app.ready();
        const taker = Wallet.createRandom();
        const body = await settleBody(taker.address, taker);

        const res = await app.inject({ method: "POST", url: "/api/batches/settle", payload: body });

        expect(res.statusCode).toBe(200);
        const { batchId } = res.json();
        expect(batchId).toMatch(UUID);
        expect(mockCreateBatch).toHaveBeenCalledWith({
            id: batchId,
            caller: taker.address,
            value: VALUE,
            legCount: 1,
            status: "pending",
        });
        expect(mockQueueAdd).toHaveBeenCalledWith("settle", {
            batchId,
            caller: taker.address,
            value: body.value,
            makers: body.makers,
            tokens: body.tokens,
            packet: body.packet,
        });
        expect(mockPublishStatus).toHaveBeenCalledWith(batchId, "pending");
        expect(mockAddEvent).toHaveBeenCalledWith(batchId, "pending");

        await app.close();
    });

    it("POST /api/batches/settle refuses a caller that did not sign", async () => {
        const app = await buildApp(runtime());
        await app.ready();

        const forged = await app.inject({
            method: "POST",
            url: "/api/batches/settle",
            payload: await settleBody(TAKER, Wallet.createRandom()),
        });
        expect(forged.statusCode).toBe(403);

        const taker = Wallet.createRandom();
        const altered = await app.inject({
            method: "POST",
            url: "/api/batches/settle",
            payload: { ...(await settleBody(taker.address, taker)), value: "1" },
        });
        expect(altered.statusCode).toBe(403);
        expect(mockQueueAdd).not.toHaveBeenCalled();
        expect(mockCreateBatch).not.toHaveBeenCalled();

        await app.close();
    });

    it("POST /api/batches/settle accepts a signed request once", async () => {
        const app = await buildApp(runtime());
        await app.ready();
        const taker = Wallet.createRandom();
        const body = await settleBody(taker.address, taker);

        const first = await app.inject({ method: "POST", url: "/api/batches/settle", payload: body });
        const again = await app.inject({ method: "POST", url: "/api/batches/settle", payload: body });

        expect(first.statusCode).toBe(200);
        expect(again.statusCode).toBe(409);
        expect(mockQueueAdd).toHaveBeenCalledTimes(1);

        await app.close();
    });

    it("GET /api/batches/:id returns 404 when not found", async () => {
        mockGetBatch.mockResolvedValueOnce(null);
        const app = await buildApp(runtime());
        await app.ready();

        const res = await app.inject({ method: "GET", url: "/api/batches/does-not-exist" });
        expect(res.statusCode).toBe(404);

        await app.close();
    });

    it("GET /api/batches/:id returns the batch row", async () => {
        mockGetBatch.mockResolvedValueOnce({ id: "x", status: "settled" });
        const app = await buildApp(runtime());
        await app.ready();

        const res = await app.inject({ method: "GET", url: "/api/batches/x" });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ id: "x", status: "settled" });

        await app.close();
    });

    // ---- QUOTE / APPROVALS ----
    it("POST /api/batches/quote returns the required value", async () => {
        const rt = runtime();
        giveDust(rt.ledger, MAKER_A, TOKEN_A, 2_000_000n);
        const app = await buildApp(rt);
        await app.ready();

        const res = await app.inject({
            method: "POST",
            url: "/api/batches/quote",
            payload: {
                makers: [MAKER_A],
                tokens: [TOKEN_A.toLowerCase()],
                prices: [{ token: TOKEN_A.toLowerCase(), price: "1000000000000000" }],
            },
        });

        expect(res.statusCode).toBe(200);
        const quote = res.json();
        expect(quote.requiredValue).toBe("2040000000000000");
        expect(quote.makers).toEqual([MAKER_A]);
        expect(quote.unpriced).toEqual([]);
        expect(quote.overflow).toBe(0);

        await app.close();
    });

    it("GET /api/approvals lists live approvals to the engine", async () => {
        const rt = runtime();
        rt.ledger.approve(TOKEN_A, MAKER_A, ENGINE, 5n);
        const app = await buildApp(rt);
        await app.ready();

        const res = await app.inject({ method: "GET", url: "/api/approvals" });
        expect(res.json()).toEqual({ makers: [MAKER_A], tokens: [TOKEN_A] });

        await app.close();
    });

    // ---- DESTINATIONS ----
    it("POST /api/destinations requires the maker's signature", async () => {
        const rt = runtime();
        const maker = Wallet.createRandom();
        const app = await buildApp(rt);
        await app.ready();

        const forged = await Wallet.createRandom().signMessage(destinationMessage(maker.address, DEST, 0n));
        const denied = await app.inject({
            method: "POST",
            url: "/api/destinations",
            payload: { maker: maker.address, destination: DEST, nonce: "0", signature: forged },
        });
        expect(denied.statusCode).toBe(403);

        const res = await postDestination(app, maker, DEST, 0n);
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({ maker: maker.address, destination: DEST });
        expect(rt.engine.destinationOf(maker.address)).toBe(DEST);

        const current = await app.inject({ method: "GET", url: `/api/destinations/${maker.address}` });
        expect(current.json()).toEqual({ maker: maker.address, destination: DEST, nonce: "1" });

        await app.close();
    });

    it("POST /api/destinations rejects an earlier signature sent again", async () => {
        const rt = runtime();
        const maker = Wallet.createRandom();
        const app = await buildApp(rt);
        await app.ready();

        const first = await postDestination(app, maker, DEST, 0n);
        expect(first.statusCode).toBe(200);
        expect((await postDestination(app, maker, PARTNER_WALLET, 1n)).statusCode).toBe(200);

        const replayed = await app.inject({
            method: "POST",
            url: "/api/destinations",
            payload: {
                maker: maker.address,
                destination: DEST,
                nonce: "0",
                signature: await maker.signMessage(destinationMessage(maker.address, DEST, 0n)),
            },
        });

        expect(replayed.statusCode).toBe(409);
        expect(replayed.json()).toEqual({ error: "stale nonce", nonce: "2" });
        expect(rt.engine.destinationOf(maker.address)).toBe(PARTNER_WALLET);

        await app.close();
    });

    // ---- ADMIN PAYOUT ----
    it("POST /api/admin/payout rejects a missing token", async () => {
        const app = await buildApp(runtime());
        await app.ready();

        const res = await app.inject({ method: "POST", url: "/api/admin/payout" });
        expect(res.statusCode).toBe(401);

        await app.close();
    });

    it("POST /api/admin/payout maps an empty balance to 422", async () => {
        const app = await buildApp(runtime());
        await app.ready();

        const res = await app.inject({
            method: "POST",
            url: "/api/admin/payout",
            headers: { authorization: "Bearer test-secret" },
        });
        expect(res.statusCode).toBe(422);
        expect(res.json()).toEqual({ error: "NO_BALANCE", message: "no retained balance to pay out" });

        await app.close();
    });

    it("POST /api/admin/payout splits the retained balance", async () => {
        const rt = runtime();
        rt.ledger.fund(ENGINE, 1001n);
        const app = await buildApp(rt);
        await app.ready();

        const res = await app.inject({
            method: "POST",
            url: "/api/admin/payout",
            headers: { authorization: "Bearer test-secret" },
        });
        expect(res.statusCode).toBe(200);
        expect(res.json()).toEqual({
            total: "1001",
            protocolWallet: PROTOCOL_WALLET,
            protocolAmount: "800",
            partnerWallet: PARTNER_WALLET,
            partnerAmount: "201",
        });

        await app.close();
    });

    // ---- WEBSOCKET LIFECYCLE (via handler unit test) ----
    it("WS handler: missing batchId sends error + closes", async () => {
        const socket = { send: vi.fn(), close: vi.fn(), on: vi.fn() };
        const req = { url: "/api/batches/settle", headers: { host: "localhost:3000" } };

        await handleBatchWs(socket, req);

        expect(socket.send).toHaveBeenCalledWith(JSON.stringify({ error: "batchId query param required" }));
        expect(socket.close).toHaveBeenCalled();
    });

    it("WS handler: replays event history before subscribing", async () => {
        mockListBatchEvents.mockResolvedValueOnce([
            { status: "pending", created_at: new Date("2026-01-01T00:00:00Z").toISOString(), payload: {} },
            { status: "settled", created_at: new Date("2026-01-01T00:00:01Z").toISOString(), payload: { legs: 2 } },
        ]);

        const socket = { send: vi.fn(), close: vi.fn(), on: vi.fn() };
        const req = {
            url: "/api/batches/settle?batchId=abc",
            headers: { host: "localhost:3000" },
        };

        await handleBatchWs(socket, req);

        // Should send 2 replay messages
        expect(socket.send).toHaveBeenCalledTimes(2);

        const first = JSON.parse(socket.send.mock.calls[0][0]);
        expect(first.batchId).toBe("abc");
        expect(first.data.replay).toBe(true);
        expect(first.status).toBe("pending");

        const second = JSON.parse(socket.send.mock.calls[1][0]);
        expect(second.status).toBe("settled");
        expect(second.data.replay).toBe(true);
        expect(second.data.legs).toBe(2);
        expect(socket.on).toHaveBeenCalledWith("close", expect.any(Function));
    });

});
