import { Queue } from "bullmq";
import { bullConnection } from "./redisClient.js";

export const BATCH_QUEUE = "batches";

export type BatchJobData = {
    batchId: string;
    caller: string;
    value: string;
    makers: string[];
    tokens: string[];
    packet: {
        request: string;
        deadline: string;
        payload: string;
        signature: string;
    };
};

export const batchQueue = new Queue<BatchJobData>(BATCH_QUEUE, {
    connection: bullConnection(),
    defaultJobOptions: {
        attempts: 3,
        backoff: { type: "exponential", delay: 500 },
    },
});
