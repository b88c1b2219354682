/**
 * PostgreSQL Checkpointer implementation.
 * Requires pg as a peer dependency.
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { PostgresCheckpointer } from 'report-flow';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const checkpointer = new PostgresCheckpointer(pool, { tableName: 'report_checkpoints' });
 *
 * // Create table (run once)
 * await checkpointer.createTable();
 * ```
 */

import type { Checkpoint, Checkpointer } from './checkpointer';
import { decodeCheckpoint, encodeCheckpoint, parseCheckpoint, SessionLock, toCheckpointError } from './checkpointer';
import { isRecord } from '../lib/utils';

/** Postgres client interface (compatible with pg Pool) */
export interface PostgresClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

/** Postgres checkpointer configuration */
export interface PostgresCheckpointerConfig {
    /** Table name (default: 'report_flow_checkpoints') */
    tableName?: string;
    /** Schema name (default: 'public') */
    schema?: string;
}

/**
 * PostgreSQL-based checkpointer.
 * One row per session, replaced with an upsert.
 */
export class PostgresCheckpointer implements Checkpointer {
    private readonly client: PostgresClient;
    private readonly tableName: string;
    private readonly schema: string;
    private readonly lock = new SessionLock();

    constructor(client: PostgresClient, config: PostgresCheckpointerConfig = {}) {
        this.client = client;
        this.tableName = config.tableName ?? 'report_flow_checkpoints';
        this.schema = config.schema ?? 'public';
    }

    private get table(): string {
        return `"${this.schema}"."${this.tableName}"`;
    }

    /**
     * Create the checkpoints table if it doesn't exist.
     * Run this during application setup.
     */
    async createTable(): Promise<void> {
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                session_id TEXT PRIMARY KEY,
                status TEXT NOT NULL,
                iteration_count INTEGER NOT NULL,
                checkpoint JSONB NOT NULL,
                saved_at BIGINT NOT NULL
            )
        `);

        await this.client.query(`
            CREATE INDEX IF NOT EXISTS idx_${this.tableName}_status
            ON ${this.table} (status)
        `);
    }

    async save(sessionId: string, checkpoint: Checkpoint): Promise<void> {
        await this.lock.run(sessionId, async () => {
            try {
                await this.client.query(
                    `INSERT INTO ${this.table} (session_id, status, iteration_count, checkpoint, saved_at)
                     VALUES ($1, $2, $3, $4, $5)
                     ON CONFLICT (session_id) DO UPDATE SET
                        status = EXCLUDED.status,
                        iteration_count = EXCLUDED.iteration_count,
                        checkpoint = EXCLUDED.checkpoint,
                        saved_at = EXCLUDED.saved_at`,
                    [sessionId, checkpoint.status, checkpoint.iterationCount, encodeCheckpoint(checkpoint), checkpoint.savedAt]
                );
            } catch (error) {
                throw toCheckpointError(error, sessionId, 'save');
            }
        });
    }

    async load(sessionId: string): Promise<Checkpoint | null> {
        let rows: unknown[];
        try {
            const result = await this.client.query(
                `SELECT checkpoint FROM ${this.table} WHERE session_id = $1`,
                [sessionId]
            );
            rows = result.rows;
        } catch (error) {
            throw toCheckpointError(error, sessionId, 'load');
        }

        const row = rows[0];
        if (row === undefined) {
            return null;
        }
        // pg parses JSONB columns; a text column arrives as a string
        const value = isRecord(row) ? row.checkpoint : undefined;
        return typeof value === 'string' ? decodeCheckpoint(value, sessionId) : parseCheckpoint(value, sessionId);
    }

    async delete(sessionId: string): Promise<boolean> {
        return this.lock.run(sessionId, async () => {
            try {
                const result = await this.client.query(
                    `DELETE FROM ${this.table} WHERE session_id = $1`,
                    [sessionId]
                );
                return result.rowCount === 1;
            } catch (error) {
                throw toCheckpointError(error, sessionId, 'delete');
            }
        });
    }
}
