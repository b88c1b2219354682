/**
 * Checkpointer - State persistence for Graph execution.
 *
 * One snapshot per session id; every save overwrites the previous one.
 */

import { z } from 'zod';
import { CheckpointError, describeError } from '../lib/errors';
import { isRecord } from '../lib/utils';

export const CHECKPOINT_STATUSES = ['running', 'done'] as const;

/**
 * Checkpoint status.
 * `running` snapshots resume from `pending`; `done` snapshots are returned as-is.
 */
export type CheckpointStatus = typeof CHECKPOINT_STATUSES[number];

export const checkpointSchema = z.object({
    sessionId: z.string().min(1),
    /** Session state after the last merged wave */
    state: z.unknown().refine((value): boolean => isRecord(value), { message: 'state must be an object' }),
    /** Number of merged waves */
    iterationCount: z.number().int().nonnegative(),
    completedLog: z.array(z.string()),
    /** Nodes ready for the next wave */
    pending: z.array(z.string()),
    /** Fan-in progress: join node -> predecessors completed so far */
    joins: z.record(z.array(z.string())),
    endReached: z.boolean(),
    ceilingReached: z.boolean(),
    status: z.enum(CHECKPOINT_STATUSES),
    savedAt: z.number(),
});

/**
 * Stored checkpoint data.
 */
export type Checkpoint = z.infer<typeof checkpointSchema>;

/**
 * Checkpointer interface.
 */
export interface Checkpointer {
    /**
     * Save the session's snapshot, replacing any previous one.
     */
    save(sessionId: string, checkpoint: Checkpoint): Promise<void>;

    /**
     * Load the latest snapshot for a session.
     */
    load(sessionId: string): Promise<Checkpoint | null>;

    /**
     * Delete a session's snapshot.
     */
    delete(sessionId: string): Promise<boolean>;
}

/**
 * Validate raw checkpoint data.
 * @throws CheckpointError of kind `corrupt`
 */
export function parseCheckpoint(raw: unknown, sessionId: string): Checkpoint {
    const result = checkpointSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new CheckpointError(
            `Corrupt checkpoint for session "${sessionId}": ${issues.join('; ')}`,
            'corrupt',
            sessionId,
            result.error,
        );
    }
    if (result.data.sessionId !== sessionId) {
        throw new CheckpointError(
            `Checkpoint belongs to session "${result.data.sessionId}", expected "${sessionId}"`,
            'corrupt',
            sessionId,
        );
    }
    return result.data;
}

/**
 * Decode a JSON-encoded checkpoint.
 * @throws CheckpointError of kind `corrupt`
 */
export function decodeCheckpoint(text: string, sessionId: string): Checkpoint {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (error) {
        throw new CheckpointError(
            `Checkpoint for session "${sessionId}" is not valid JSON: ${describeError(error)}`,
            'corrupt',
            sessionId,
            error,
        );
    }
    return parseCheckpoint(raw, sessionId);
}

export function encodeCheckpoint(checkpoint: Checkpoint): string {
    return JSON.stringify(checkpoint);
}

/**
 * Wrap a backend failure as an `io` CheckpointError, leaving
 * CheckpointErrors untouched.
 */
export function toCheckpointError(error: unknown, sessionId: string, action: string): CheckpointError {
    if (error instanceof CheckpointError) {
        return error;
    }
    return new CheckpointError(
        `Failed to ${action} checkpoint for session "${sessionId}": ${describeError(error)}`,
        'io',
        sessionId,
        error,
    );
}

/**
 * Serializes async work per session id: two writes for the same session
 * never overlap, writes for different sessions run freely.
 */
export class SessionLock {
    private readonly tails = new Map<string, Promise<void>>();

    async run<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(sessionId) ?? Promise.resolve();

        let release: () => void = () => { };
        const current = new Promise<void>(resolve => {
            release = resolve;
        });
        const tail = previous.then(() => current);
        this.tails.set(sessionId, tail);

        await previous;
        try {
            return await fn();
        } finally {
            release();
            if (this.tails.get(sessionId) === tail) {
                this.tails.delete(sessionId);
            }
        }
    }
}

/**
 * In-memory checkpointer implementation.
 * Suitable for testing and short-lived sessions.
 */
export class MemoryCheckpointer implements Checkpointer {
    private readonly checkpoints = new Map<string, Checkpoint>();
    private readonly lock = new SessionLock();
    private readonly maxItems: number;

    constructor(options?: { maxItems?: number }) {
        this.maxItems = options?.maxItems ?? 100;
    }

    async save(sessionId: string, checkpoint: Checkpoint): Promise<void> {
        await this.lock.run(sessionId, async () => {
            // Re-insert so Map order tracks recency
            this.checkpoints.delete(sessionId);
            this.checkpoints.set(sessionId, structuredClone(checkpoint));
            this.cleanup();
        });
    }

    async load(sessionId: string): Promise<Checkpoint | null> {
        const checkpoint = this.checkpoints.get(sessionId);
        return checkpoint ? structuredClone(checkpoint) : null;
    }

    async delete(sessionId: string): Promise<boolean> {
        return this.lock.run(sessionId, async () => this.checkpoints.delete(sessionId));
    }

    /** Session ids with a stored snapshot, oldest first */
    sessions(): string[] {
        return [...this.checkpoints.keys()];
    }

    /**
     * Drop the least recently saved sessions to stay under maxItems.
     */
    private cleanup(): void {
        while (this.checkpoints.size > this.maxItems) {
            const oldest = this.checkpoints.keys().next();
            if (oldest.done) {
                return;
            }
            this.checkpoints.delete(oldest.value);
        }
    }
}
