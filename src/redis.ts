import { createRedis } from "./redisClient.js";
import type { BatchStatus } from "./types.js";

export const redis = createRedis();

export const statusChannel = (batchId: string) => `batch:status:${batchId}`;

export type StatusEvent = {
    batchId: string;
    status: BatchStatus | "retrying";
    at: string;
    data?: Record<string, unknown>;
};

export async function publishStatus(batchId: string, status: StatusEvent["status"], data?: Record<string, unknown>) {
    const evt: StatusEvent = { batchId, status, at: new Date().toISOString(), data };
    await redis.publish(statusChannel(batchId), JSON.stringify(evt));
    await redis.hset(`batch:${batchId}`, { status, updatedAt: evt.at }); // in-flight batch cache
}
