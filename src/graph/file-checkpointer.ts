/**
 * File Checkpointer - one JSON document per session on local disk.
 *
 * Writes go to a temporary file that is renamed over the target, so a
 * reader never observes a half-written snapshot.
 *
 * @example
 * ```typescript
 * import { FileCheckpointer } from 'report-flow/node';
 *
 * const checkpointer = new FileCheckpointer({ directory: '.report-flow/checkpoints' });
 * await graph.invoke(initialState, { sessionId: 'q1-sales', checkpointer });
 * ```
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { Checkpoint, Checkpointer } from './checkpointer';
import { decodeCheckpoint, encodeCheckpoint, SessionLock, toCheckpointError } from './checkpointer';

/** File checkpointer configuration */
export interface FileCheckpointerConfig {
    /** Directory holding `<session>.json` files */
    directory: string;
}

export class FileCheckpointer implements Checkpointer {
    private readonly directory: string;
    private readonly lock = new SessionLock();
    private tempCounter = 0;

    constructor(config: FileCheckpointerConfig) {
        this.directory = path.resolve(config.directory);
    }

    /** Path of a session's snapshot file */
    filePath(sessionId: string): string {
        return path.join(this.directory, `${encodeURIComponent(sessionId)}.json`);
    }

    async save(sessionId: string, checkpoint: Checkpoint): Promise<void> {
        await this.lock.run(sessionId, async () => {
            const target = this.filePath(sessionId);
            const temp = `${target}.${process.pid}.${++this.tempCounter}.tmp`;
            try {
                await mkdir(this.directory, { recursive: true });
                await writeFile(temp, encodeCheckpoint(checkpoint), 'utf8');
                await rename(temp, target);
            } catch (error) {
                await rm(temp, { force: true });
                throw toCheckpointError(error, sessionId, 'save');
            }
        });
    }

    async load(sessionId: string): Promise<Checkpoint | null> {
        let text: string;
        try {
            text = await readFile(this.filePath(sessionId), 'utf8');
        } catch (error) {
            if (isNotFound(error)) {
                return null;
            }
            throw toCheckpointError(error, sessionId, 'load');
        }
        return decodeCheckpoint(text, sessionId);
    }

    async delete(sessionId: string): Promise<boolean> {
        return this.lock.run(sessionId, async () => {
            try {
                await rm(this.filePath(sessionId));
                return true;
            } catch (error) {
                if (isNotFound(error)) {
                    return false;
                }
                throw toCheckpointError(error, sessionId, 'delete');
            }
        });
    }
}

function isNotFound(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
