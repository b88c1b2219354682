/**
 * Redis Checkpointer implementation.
 * Requires ioredis as a peer dependency.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { RedisCheckpointer } from 'report-flow';
 *
 * const redis = new Redis('redis://localhost:6379');
 * const checkpointer = new RedisCheckpointer(redis, { prefix: 'reports:' });
 * ```
 */

import type { Checkpoint, Checkpointer } from './checkpointer';
import { decodeCheckpoint, encodeCheckpoint, SessionLock, toCheckpointError } from './checkpointer';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string): Promise<unknown>;
    set(key: string, value: string, exMode: 'EX', time: number): Promise<unknown>;
    get(key: string): Promise<string | null>;
    del(...keys: string[]): Promise<number>;
}

/** Redis checkpointer configuration */
export interface RedisCheckpointerConfig {
    /** Key prefix (default: 'report-flow:checkpoint:') */
    prefix?: string;
    /** TTL in seconds (default: no expiry) */
    ttlSeconds?: number;
}

/**
 * Redis-based checkpointer.
 * Each session is a single string key; SET replaces it atomically.
 */
export class RedisCheckpointer implements Checkpointer {
    private readonly redis: RedisClient;
    private readonly prefix: string;
    private readonly ttlSeconds?: number;
    private readonly lock = new SessionLock();

    constructor(client: RedisClient, config: RedisCheckpointerConfig = {}) {
        this.redis = client;
        this.prefix = config.prefix ?? 'report-flow:checkpoint:';
        this.ttlSeconds = config.ttlSeconds;
    }

    private sessionKey(sessionId: string): string {
        return `${this.prefix}session:${sessionId}`;
    }

    async save(sessionId: string, checkpoint: Checkpoint): Promise<void> {
        await this.lock.run(sessionId, async () => {
            const key = this.sessionKey(sessionId);
            const data = encodeCheckpoint(checkpoint);
            try {
                if (this.ttlSeconds) {
                    await this.redis.set(key, data, 'EX', this.ttlSeconds);
                } else {
                    await this.redis.set(key, data);
                }
            } catch (error) {
                throw toCheckpointError(error, sessionId, 'save');
            }
        });
    }

    async load(sessionId: string): Promise<Checkpoint | null> {
        let data: string | null;
        try {
            data = await this.redis.get(this.sessionKey(sessionId));
        } catch (error) {
            throw toCheckpointError(error, sessionId, 'load');
        }
        return data === null ? null : decodeCheckpoint(data, sessionId);
    }

    async delete(sessionId: string): Promise<boolean> {
        return this.lock.run(sessionId, async () => {
            try {
                return (await this.redis.del(this.sessionKey(sessionId))) > 0;
            } catch (error) {
                throw toCheckpointError(error, sessionId, 'delete');
            }
        });
    }
}
