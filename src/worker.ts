import { UnrecoverableError, Worker, type Job } from "bullmq";
import { bullConnection } from "./redisClient.js";
import { addEvent, addSettlements, updateBatch } from "./db.js";
import { SweeperError } from "./errors.js";
import { logger as log } from "./logger.js";
import { BATCH_QUEUE, type BatchJobData } from "./queue.js";
import { publishStatus } from "./redis.js";
import type { SweeperRuntime } from "./runtime.js";
import type { BatchSettlement } from "./types.js";
import { toJsonSafe, unixNow } from "./utils.js";

export type BatchJobResult = { ok: true; legs: number; refunded: string };

function summary(result: BatchSettlement): Record<string, unknown> {
    return {
        legs: result.records.length,
        skipped: result.skipped.length,
        totalGross: result.totalGross.toString(),
        totalPaid: result.totalPaid.toString(),
        protocolCut: result.protocolCut.toString(),
        refunded: result.refunded.toString(),
        retained: result.retained.toString(),
    };
}

type JobView = Pick<Job<BatchJobData>, "data" | "id" | "attemptsMade" | "opts">;

// Settled in memory but not yet persisted; a retry must not settle twice.
export type SettledBatches = Map<string, BatchSettlement>;

export function createBatchProcessor(
    runtime: SweeperRuntime,
    clock: () => bigint = unixNow,
    settled: SettledBatches = new Map()
) {
    return async function processBatch(job: JobView): Promise<BatchJobResult> {
        const t0 = Date.now();
        const { batchId } = job.data;
        const attempt = job.attemptsMade + 1;

        log.info({ batchId, jobId: job.id, attempt, legs: job.data.makers.length }, "job.start");

        let result = settled.get(batchId);
        if (!result) {
            await publishStatus(batchId, "settling");
            await updateBatch(batchId, { status: "settling" });
            await addEvent(batchId, "settling");

            const { caller, makers, tokens, packet } = job.data;
            try {
                result = runtime.engine.settleBatch(
                    { caller, value: BigInt(job.data.value), timestamp: clock() },
                    makers,
                    tokens,
                    { ...packet, deadline: BigInt(packet.deadline) },
                    runtime.admin.snapshot()
                );
            } catch (err) {
                if (err instanceof SweeperError) {
                    log.warn({ batchId, code: err.code, error: err.message }, "batch.aborted");
                    throw new UnrecoverableError(`${err.code}: ${err.message}`);
                }
                throw err;
            }
            settled.set(batchId, result);
        } else {
            log.info({ batchId }, "job.resume.persist");
        }

        await addSettlements(batchId, result.records);
        await updateBatch(batchId, {
            status: "settled",
            total_gross: result.totalGross.toString(),
            protocol_cut: result.protocolCut.toString(),
            refunded: result.refunded.toString(),
            retained: result.retained.toString(),
        });
        await addEvent(batchId, "settled", {
            ...summary(result),
            records: toJsonSafe(result.records),
        });
        await publishStatus(batchId, "settled", summary(result));
        settled.delete(batchId);

        log.info({ batchId, ms: Date.now() - t0, ...summary(result) }, "job.success");
        return { ok: true, legs: result.records.length, refunded: result.refunded.toString() };
    };
}

export async function handleFailed(job: JobView | undefined, err: Error, settled?: SettledBatches) {
    if (!job) return;

    const { batchId } = job.data;
    const total = job.opts.attempts ?? 1;
    const made = job.attemptsMade; // already incremented by BullMQ

    const isFinal = err instanceof UnrecoverableError || made >= total;

    if (!isFinal) {
        log.warn(
            { batchId, jobId: job.id, attempt: made, total, error: err.message },
            "job.retrying"
        );

        await addEvent(batchId, "retrying", { error: err.message, attempt: made, total });
        await publishStatus(batchId, "retrying", { error: err.message, attempt: made, total });
        return;
    }

    log.error(
        { batchId, jobId: job.id, attempt: made, total, error: err.message },
        "batch.failed.final"
    );

    // Settled on the ledger but never persisted: leave the figures in the log for reconciliation.
    const unpersisted = settled?.get(batchId);
    if (unpersisted) {
        log.error({ batchId, ...summary(unpersisted) }, "batch.persist.lost");
        settled?.delete(batchId);
    }

    await publishStatus(batchId, "failed", { error: err.message });
    await updateBatch(batchId, { status: "failed", error: err.message });
    await addEvent(batchId, "failed", { error: err.message });
}

// One batch at a time: the queue is the serialization point for settlement.
export function startWorker(runtime: SweeperRuntime) {
    const settled: SettledBatches = new Map();
    const worker = new Worker<BatchJobData, BatchJobResult>(
        BATCH_QUEUE,
        createBatchProcessor(runtime, unixNow, settled),
        {
            connection: bullConnection(),
            concurrency: 1,
        }
    );

    worker.on("failed", (job, err) => {
        handleFailed(job, err, settled).catch((e: unknown) => {
            log.error({ error: e instanceof Error ? e.message : String(e) }, "job.failed.persist_error");
        });
    });

    return worker;
}
