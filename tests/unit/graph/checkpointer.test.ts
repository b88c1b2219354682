import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {
    MemoryCheckpointer,
    SessionLock,
    decodeCheckpoint,
    encodeCheckpoint,
    parseCheckpoint,
    toCheckpointError,
    type Checkpoint,
    type Checkpointer,
} from '../../../src/graph/checkpointer';
import { FileCheckpointer } from '../../../src/graph/file-checkpointer';
import { RedisCheckpointer } from '../../../src/graph/redis-checkpointer';
import { PostgresCheckpointer } from '../../../src/graph/postgres-checkpointer';
import { CheckpointError } from '../../../src/lib/errors';
import { FakeRedis } from '../../mocks/fake-redis';
import { FakePostgres } from '../../mocks/fake-postgres';
import { delay } from '../../mocks/observability';

function createCheckpoint(sessionId: string, iterationCount = 1): Checkpoint {
    return {
        sessionId,
        state: { iteration: iterationCount, log: ['plan'] },
        iterationCount,
        completedLog: ['plan'],
        pending: ['left', 'right'],
        joins: { join: ['left'] },
        endReached: false,
        ceilingReached: false,
        status: 'running',
        savedAt: 1700000000000,
    };
}

/** Behaviour every backend shares */
function describeBackend(name: string, create: () => Checkpointer) {
    describe(name, () => {
        let checkpointer: Checkpointer;

        beforeEach(() => {
            checkpointer = create();
        });

        it('should return null for an unknown session', async () => {
            expect(await checkpointer.load('missing')).toBeNull();
        });

        it('should round-trip a snapshot', async () => {
            const checkpoint = createCheckpoint('s-1');
            await checkpointer.save('s-1', checkpoint);

            expect(await checkpointer.load('s-1')).toEqual(checkpoint);
        });

        it('should keep only the latest snapshot per session', async () => {
            await checkpointer.save('s-1', createCheckpoint('s-1', 1));
            await checkpointer.save('s-1', createCheckpoint('s-1', 2));

            const loaded = await checkpointer.load('s-1');
            expect(loaded?.iterationCount).toBe(2);
        });

        it('should isolate sessions', async () => {
            await checkpointer.save('s-1', createCheckpoint('s-1', 1));
            await checkpointer.save('s-2', createCheckpoint('s-2', 5));

            expect((await checkpointer.load('s-1'))?.iterationCount).toBe(1);
            expect((await checkpointer.load('s-2'))?.iterationCount).toBe(5);
        });

        it('should delete a snapshot', async () => {
            await checkpointer.save('s-1', createCheckpoint('s-1'));

            expect(await checkpointer.delete('s-1')).toBe(true);
            expect(await checkpointer.delete('s-1')).toBe(false);
            expect(await checkpointer.load('s-1')).toBeNull();
        });
    });
}

describe('Checkpointers', () => {
    describeBackend('MemoryCheckpointer', () => new MemoryCheckpointer());
    describeBackend('RedisCheckpointer', () => new RedisCheckpointer(new FakeRedis()));
    describeBackend('PostgresCheckpointer', () => new PostgresCheckpointer(new FakePostgres()));

    describe('MemoryCheckpointer', () => {
        it('should store a copy of the snapshot', async () => {
            const checkpointer = new MemoryCheckpointer();
            const checkpoint = createCheckpoint('s-1');
            await checkpointer.save('s-1', checkpoint);
            checkpoint.pending.push('mutated');

            expect((await checkpointer.load('s-1'))?.pending).toEqual(['left', 'right']);
        });

        it('should evict the least recently saved sessions beyond maxItems', async () => {
            const checkpointer = new MemoryCheckpointer({ maxItems: 2 });
            await checkpointer.save('a', createCheckpoint('a'));
            await checkpointer.save('b', createCheckpoint('b'));
            await checkpointer.save('a', createCheckpoint('a', 2));
            await checkpointer.save('c', createCheckpoint('c'));

            expect(checkpointer.sessions()).toEqual(['a', 'c']);
            expect(await checkpointer.load('b')).toBeNull();
        });
    });

    describe('FileCheckpointer', () => {
        let directory: string;

        beforeEach(async () => {
            directory = await mkdtemp(path.join(os.tmpdir(), 'report-flow-ckpt-'));
        });

        afterEach(async () => {
            await rm(directory, { recursive: true, force: true });
        });

        describeBackend('shared behaviour', () => new FileCheckpointer({ directory }));

        it('should write one JSON file per session and no temp files', async () => {
            const checkpointer = new FileCheckpointer({ directory });
            await checkpointer.save('q1/sales', createCheckpoint('q1/sales'));

            expect(await readdir(directory)).toEqual(['q1%2Fsales.json']);
            const text = await readFile(checkpointer.filePath('q1/sales'), 'utf8');
            expect(JSON.parse(text)).toEqual(createCheckpoint('q1/sales'));
        });

        it('should create the directory on first save', async () => {
            const nested = path.join(directory, 'deep', 'er');
            const checkpointer = new FileCheckpointer({ directory: nested });
            await checkpointer.save('s-1', createCheckpoint('s-1'));

            expect(await readdir(nested)).toEqual(['s-1.json']);
        });

        it('should report a truncated file as corrupt', async () => {
            const checkpointer = new FileCheckpointer({ directory });
            await writeFile(checkpointer.filePath('s-1'), '{"sessionId":"s-1"', 'utf8');

            const error = await checkpointer.load('s-1').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(CheckpointError);
            if (error instanceof CheckpointError) {
                expect(error.kind).toBe('corrupt');
                expect(error.message).toMatch(/^Checkpoint for session "s-1" is not valid JSON: /);
            }
        });

        it('should keep the last snapshot intact under concurrent saves', async () => {
            const checkpointer = new FileCheckpointer({ directory });
            await Promise.all([1, 2, 3, 4].map(n => checkpointer.save('s-1', createCheckpoint('s-1', n))));

            expect((await checkpointer.load('s-1'))?.iterationCount).toBe(4);
            expect(await readdir(directory)).toEqual(['s-1.json']);
        });
    });

    describe('RedisCheckpointer', () => {
        it('should store under the prefixed session key', async () => {
            const redis = new FakeRedis();
            const checkpointer = new RedisCheckpointer(redis, { prefix: 'reports:' });
            await checkpointer.save('s-1', createCheckpoint('s-1'));

            expect([...redis.store.keys()]).toEqual(['reports:session:s-1']);
        });

        it('should set a TTL when configured', async () => {
            const redis = new FakeRedis();
            const checkpointer = new RedisCheckpointer(redis, { ttlSeconds: 60 });
            await checkpointer.save('s-1', createCheckpoint('s-1'));

            expect(redis.ttls.get('report-flow:checkpoint:session:s-1')).toBe(60);
        });

        it('should wrap client failures as io errors', async () => {
            const redis = new FakeRedis();
            redis.failWith = new Error('connection refused');
            const checkpointer = new RedisCheckpointer(redis);

            const error = await checkpointer.save('s-1', createCheckpoint('s-1')).catch((e: unknown) => e);

            expect(error).toBeInstanceOf(CheckpointError);
            if (error instanceof CheckpointError) {
                expect(error.kind).toBe('io');
                expect(error.message).toBe('Failed to save checkpoint for session "s-1": connection refused');
            }
        });

        it('should report malformed stored data as corrupt', async () => {
            const redis = new FakeRedis();
            redis.store.set('report-flow:checkpoint:session:s-1', 'not json');
            const checkpointer = new RedisCheckpointer(redis);

            await expect(checkpointer.load('s-1')).rejects.toMatchObject({ kind: 'corrupt' });
        });
    });

    describe('PostgresCheckpointer', () => {
        it('should create the table and index in the configured schema', async () => {
            const pg = new FakePostgres();
            const checkpointer = new PostgresCheckpointer(pg, { schema: 'reports', tableName: 'ckpt' });
            await checkpointer.createTable();

            expect(pg.queries).toHaveLength(2);
            expect(pg.queries[0].text).toContain('CREATE TABLE IF NOT EXISTS "reports"."ckpt"');
            expect(pg.queries[1].text).toContain('CREATE INDEX IF NOT EXISTS idx_ckpt_status');
        });

        it('should upsert with the session columns', async () => {
            const pg = new FakePostgres();
            const checkpointer = new PostgresCheckpointer(pg);
            const checkpoint = createCheckpoint('s-1', 3);
            await checkpointer.save('s-1', checkpoint);

            expect(pg.queries[0].text).toContain('ON CONFLICT (session_id) DO UPDATE');
            expect(pg.queries[0].values).toEqual(['s-1', 'running', 3, encodeCheckpoint(checkpoint), 1700000000000]);
        });

        it('should accept a checkpoint column returned as text', async () => {
            const checkpoint = createCheckpoint('s-1');
            const client = {
                query: async () => ({ rows: [{ checkpoint: encodeCheckpoint(checkpoint) }] }),
            };

            expect(await new PostgresCheckpointer(client).load('s-1')).toEqual(checkpoint);
        });

        it('should wrap query failures as io errors', async () => {
            const pg = new FakePostgres();
            pg.failWith = new Error('relation does not exist');
            const checkpointer = new PostgresCheckpointer(pg);

            await expect(checkpointer.load('s-1')).rejects.toThrow(
                'Failed to load checkpoint for session "s-1": relation does not exist'
            );
        });
    });

    describe('validation', () => {
        it('should reject a snapshot missing fields', () => {
            const { pending: _pending, ...partial } = createCheckpoint('s-1');

            expect(() => parseCheckpoint(partial, 's-1')).toThrow(
                'Corrupt checkpoint for session "s-1": pending: Required'
            );
        });

        it('should reject a snapshot stored for another session', () => {
            expect(() => parseCheckpoint(createCheckpoint('other'), 's-1')).toThrow(
                'Checkpoint belongs to session "other", expected "s-1"'
            );
        });

        it('should reject an unknown status', () => {
            const raw = { ...createCheckpoint('s-1'), status: 'paused' };

            expect(() => parseCheckpoint(raw, 's-1')).toThrow(CheckpointError);
        });

        it('should decode what it encodes', () => {
            const checkpoint = createCheckpoint('s-1');

            expect(decodeCheckpoint(encodeCheckpoint(checkpoint), 's-1')).toEqual(checkpoint);
        });

        it('should leave checkpoint errors untouched when wrapping', () => {
            const original = new CheckpointError('bad', 'corrupt', 's-1');

            expect(toCheckpointError(original, 's-1', 'load')).toBe(original);
            expect(toCheckpointError('disk full', 's-1', 'save').message).toBe(
                'Failed to save checkpoint for session "s-1": disk full'
            );
        });
    });

    describe('SessionLock', () => {
        it('should serialize work for the same session', async () => {
            const lock = new SessionLock();
            const order: string[] = [];

            await Promise.all([
                lock.run('s', async () => {
                    order.push('first:start');
                    await delay(15);
                    order.push('first:end');
                }),
                lock.run('s', async () => {
                    order.push('second:start');
                    order.push('second:end');
                }),
            ]);

            expect(order).toEqual(['first:start', 'first:end', 'second:start', 'second:end']);
        });

        it('should let different sessions overlap', async () => {
            const lock = new SessionLock();
            const order: string[] = [];

            await Promise.all([
                lock.run('a', async () => {
                    order.push('a:start');
                    await delay(15);
                    order.push('a:end');
                }),
                lock.run('b', async () => {
                    order.push('b:start');
                    order.push('b:end');
                }),
            ]);

            expect(order).toEqual(['a:start', 'b:start', 'b:end', 'a:end']);
        });

        it('should release the lock when work fails', async () => {
            const lock = new SessionLock();

            await expect(lock.run('s', async () => {
                throw new Error('boom');
            })).rejects.toThrow('boom');
            await expect(lock.run('s', async () => 'next')).resolves.toBe('next');
        });
    });
});
