import Fastify, { type FastifyReply } from "fastify";
import websocket from "@fastify/websocket";
import { getAddress, isAddress, isHexString } from "ethers";
import { z } from "zod";
import { v4 as uuidv4 } from "uuid";

import { scanApprovals } from "./approvals.js";
import { addEvent, createBatch, getBatch, listBatchEvents } from "./db.js";
import { SweeperError } from "./errors.js";
import { destinationMessage, settleMessage, signedBy } from "./intents.js";
import { logger } from "./logger.js";
import { batchQueue } from "./queue.js";
import { quoteBatch } from "./quote.js";
import { publishStatus, statusChannel } from "./redis.js";
import { createRedis } from "./redisClient.js";
import type { SweeperRuntime } from "./runtime.js";
import { toJsonSafe } from "./utils.js";

const address = z.string().refine((v) => isAddress(v), "invalid address");
const uint = z.string().regex(/^\d+$/, "expected a decimal integer string");

const packetSchema = z.object({
    request: z.string().refine((v) => isHexString(v, 32), "expected bytes32"),
    deadline: uint,
    payload: z.string().refine((v) => isHexString(v), "expected hex bytes"),
    signature: z.string().refine((v) => isHexString(v), "expected hex signature"),
});

const signature = z.string().refine((v) => isHexString(v), "expected hex signature");

const settleSchema = z.object({
    caller: address,
    value: uint,
    makers: z.array(address).min(1),
    tokens: z.array(address).min(1),
    packet: packetSchema,
    signature,
});

const quoteSchema = z.object({
    makers: z.array(address),
    tokens: z.array(address),
    prices: z.array(z.object({ token: address, price: uint })),
    gasCost: uint.optional(),
});

const destinationSchema = z.object({
    maker: address,
    destination: address,
    nonce: uint,
    signature,
});

type WsSocket = {
    send(data: string): void;
    close(): void;
    on(event: "close", listener: () => void): unknown;
};

type WsRequest = {
    url?: string;
    headers: { host?: string };
};

function sendSweeperError(reply: FastifyReply, err: unknown) {
    if (err instanceof SweeperError) {
        return reply.code(422).send({ error: err.code, message: err.message });
    }
    throw err;
}

export async function handleBatchWs(socket: WsSocket, req: WsRequest) {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const batchId = url.searchParams.get("batchId");

    if (!batchId) {
        socket.send(JSON.stringify({ error: "batchId query param required" }));
        socket.close();
        return;
    }

    // 1) Replay full history first
    const events = await listBatchEvents(batchId);
    for (const e of events) {
        socket.send(
            JSON.stringify({
                batchId,
                status: e.status,
                at: new Date(e.created_at).toISOString(),
                data: { replay: true, ...(e.payload ?? {}) },
            })
        );
    }

    // 2) Then subscribe to live updates
    const sub = createRedis();
    const chan = statusChannel(batchId);

    await sub.subscribe(chan);
    sub.on("message", (_channel: string, payload: string) => socket.send(payload));

    socket.on("close", () => {
        sub.unsubscribe(chan)
            .then(() => sub.quit())
            .catch((err: unknown) => {
                sub.disconnect();
                logger.warn({ batchId, error: err instanceof Error ? err.message : String(err) }, "ws.unsubscribe.failed");
            });
    });
}

async function enqueueBatch(
    batchId: string,
    caller: string,
    value: string,
    makers: string[],
    tokens: string[],
    packet: z.infer<typeof packetSchema>
) {
    await createBatch({
        id: batchId,
        caller,
        value: BigInt(value),
        legCount: makers.length,
        status: "pending",
    });

    await batchQueue.add("settle", { batchId, caller, value, makers, tokens, packet });
    await publishStatus(batchId, "pending");
    await addEvent(batchId, "pending");
}

export async function buildApp(runtime: SweeperRuntime) {
    const app = Fastify({ logger: true });
    await app.register(websocket);

    app.post("/api/batches/settle", async (req, reply) => {
        const parsed = settleSchema.safeParse(req.body);
        if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

        const { caller, value, makers, tokens, packet, signature: sig } = parsed.data;

        // The caller's funds are spent and its whitelist entry checked, so the caller must sign.
        const message = settleMessage(caller, BigInt(value), makers, tokens, { ...packet, deadline: BigInt(packet.deadline) });
        if (!signedBy(message, sig, caller)) {
            return reply.code(403).send({ error: "settlement must be signed by the caller" });
        }
        if (!runtime.intents.claimSettlement(message)) {
            return reply.code(409).send({ error: "settlement already submitted" });
        }

        const batchId = uuidv4();
        try {
            await enqueueBatch(batchId, caller, value, makers, tokens, packet);
        } catch (err) {
            runtime.intents.releaseSettlement(message);
            throw err;
        }

        return reply.send({ batchId });
    });

    // WebSocket MUST be GET
    app.get("/api/batches/settle", { websocket: true }, (socket, req) => handleBatchWs(socket, req));

    app.get("/health", async () => ({ ok: true }));

    app.get<{ Params: { id: string } }>("/api/batches/:id", async (req, reply) => {
        const batch = await getBatch(req.params.id);
        if (!batch) return reply.code(404).send({ error: "Batch not found" });
        return reply.send(batch);
    });

    app.get<{ Params: { id: string } }>("/api/batches/:id/events", async (req, reply) => {
        const events = await listBatchEvents(req.params.id);
        return reply.send({ batchId: req.params.id, events });
    });

    app.post("/api/batches/quote", async (req, reply) => {
        const parsed = quoteSchema.safeParse(req.body);
        if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

        const { makers, tokens, prices, gasCost } = parsed.data;
        const quote = quoteBatch(
            runtime.ledger,
            runtime.metadata,
            runtime.admin.snapshot(),
            makers,
            tokens,
            new Map(prices.map((p): [string, bigint] => [getAddress(p.token), BigInt(p.price)])),
            gasCost ? BigInt(gasCost) : 0n
        );
        return reply.send(toJsonSafe(quote));
    });

    app.get("/api/approvals", async (_req, reply) => {
        const pending = scanApprovals(runtime.ledger.approvals(), runtime.admin.snapshot().engineAddress);
        return reply.send({ makers: pending.makers, tokens: pending.tokens });
    });

    app.post("/api/destinations", async (req, reply) => {
        const parsed = destinationSchema.safeParse(req.body);
        if (!parsed.success) return reply.code(400).send({ error: parsed.error.flatten() });

        const { maker, destination, nonce, signature: sig } = parsed.data;
        if (!signedBy(destinationMessage(maker, destination, BigInt(nonce)), sig, maker)) {
            return reply.code(403).send({ error: "destination must be signed by the maker" });
        }
        const expected = runtime.intents.destinationNonce(maker);
        if (BigInt(nonce) !== expected) {
            return reply.code(409).send({ error: "stale nonce", nonce: expected.toString() });
        }
        try {
            runtime.engine.setDestination(maker, destination);
        } catch (err) {
            return sendSweeperError(reply, err);
        }
        runtime.intents.bumpDestinationNonce(maker);
        return reply.send({ maker: getAddress(maker), destination: runtime.engine.destinationOf(maker) });
    });

    app.get<{ Params: { maker: string } }>("/api/destinations/:maker", async (req, reply) => {
        if (!isAddress(req.params.maker)) return reply.code(400).send({ error: "invalid address" });
        const maker = getAddress(req.params.maker);
        return reply.send({
            maker,
            destination: runtime.engine.destinationOf(maker),
            nonce: runtime.intents.destinationNonce(maker).toString(),
        });
    });

    app.post("/api/admin/payout", async (req, reply) => {
        if (req.headers.authorization !== `Bearer ${runtime.adminToken}`) {
            return reply.code(401).send({ error: "unauthorized" });
        }
        try {
            return reply.send(toJsonSafe(runtime.engine.payoutProtocolFees(runtime.admin.snapshot())));
        } catch (err) {
            return sendSweeperError(reply, err);
        }
    });

    return app;
}
