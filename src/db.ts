import { Pool } from "pg";
import type { BatchStatus, SettlementRecord } from "./types.js";

export const pool = new Pool({ connectionString: process.env.DATABASE_URL });

export type BatchRow = {
    id: string;
    caller: string;
    value: string;
    leg_count: number;
    status: BatchStatus;
    total_gross: string | null;
    protocol_cut: string | null;
    refunded: string | null;
    retained: string | null;
    error: string | null;
    created_at: Date;
    updated_at: Date;
};

export type BatchEventRow = {
    status: string;
    payload: Record<string, unknown> | null;
    created_at: Date;
};

export type BatchPatch = Partial<Pick<BatchRow,
    "status" | "total_gross" | "protocol_cut" | "refunded" | "retained" | "error">>;

export async function createBatch(params: {
    id: string;
    caller: string;
    value: bigint;
    legCount: number;
    status: BatchStatus;
}) {
    await pool.query(
        `INSERT INTO batches(id,caller,value,leg_count,status)
     VALUES($1,$2,$3,$4,$5)`,
        [params.id, params.caller, params.value.toString(), params.legCount, params.status]
    );
}

export async function updateBatch(batchId: string, patch: BatchPatch) {
    const entries = Object.entries(patch).filter(([, v]) => v !== undefined);
    if (entries.length === 0) return;

    const sets = entries.map(([k], i) => `${k}=$${i + 2}`).join(", ");
    const values = entries.map(([, v]) => v);

    await pool.query(
        `UPDATE batches SET ${sets}, updated_at=now() WHERE id=$1`,
        [batchId, ...values]
    );
}

export async function addEvent(batchId: string, status: BatchStatus | string, payload: Record<string, unknown> = {}) {
    await pool.query(
        `INSERT INTO batch_events(batch_id,status,payload) VALUES($1,$2,$3::jsonb)`,
        [batchId, status, JSON.stringify(payload)]
    );
}

export async function addSettlements(batchId: string, records: SettlementRecord[]) {
    for (const r of records) {
        await pool.query(
            `INSERT INTO settlements(batch_id,maker,token,token_amount,gross,payable,destination,discount_tier)
       VALUES($1,$2,$3,$4,$5,$6,$7,$8)`,
            [
                batchId,
                r.maker,
                r.token,
                r.tokenAmount.toString(),
                r.grossNativeValue.toString(),
                r.payableAmount.toString(),
                r.destination,
                r.discountTier,
            ]
        );
    }
}

export async function getBatch(batchId: string): Promise<BatchRow | null> {
    const r = await pool.query<BatchRow>(`SELECT * FROM batches WHERE id=$1`, [batchId]);
    return r.rows[0] ?? null;
}

export async function listBatchEvents(batchId: string): Promise<BatchEventRow[]> {
    const r = await pool.query<BatchEventRow>(
        `SELECT status, payload, created_at
       FROM batch_events
       WHERE batch_id=$1
       ORDER BY id ASC`,
        [batchId]
    );
    return r.rows;
}
