/**
 * Parallel wave execution.
 *
 * Runs every node of a wave concurrently against its own copy of the
 * pre-wave state, with a concurrency limit, per-node timeout, per-node
 * retry and fail-fast signalling. Outcomes are returned in declaration
 * order regardless of completion order.
 */

import type { Logger } from '../lib/logger';
import type { Span, Tracer } from '../lib/tracer';
import { NodeFailureError, NodeTimeoutError, StateUpdateError, describeError } from '../lib/errors';
import { withRetry } from '../lib/retry';
import { toError } from '../lib/tracer';
import { isRecord } from '../lib/utils';
import type { StateUpdate } from './channels';
import type { GraphNode, NodeContext } from './types';

export interface WaveConfig {
    sessionId: string;
    wave: number;
    /** Maximum concurrent executions (default: unlimited) */
    maxConcurrency?: number;
    /** Default per-node timeout */
    nodeTimeoutMs?: number;
    /** Caller cancellation */
    signal?: AbortSignal;
    logger: Logger;
    tracer: Tracer;
}

export type NodeOutcome<S> =
    | { node: string; ok: true; update: StateUpdate<S> | undefined; attempts: number }
    | { node: string; ok: false; error: NodeFailureError };

/**
 * Execute the nodes of one wave.
 * Never rejects for node failures; each failure is reported in its outcome.
 */
export async function executeWave<S>(
    state: S,
    nodes: ReadonlyArray<GraphNode<S>>,
    config: WaveConfig
): Promise<Array<NodeOutcome<S>>> {
    const sorted = [...nodes].sort((a, b) => a.index - b.index);
    if (sorted.length === 0) {
        return [];
    }

    // Shared abort controller for fail-fast
    const groupAbort = new AbortController();
    const onCallerAbort = () => groupAbort.abort();
    if (config.signal?.aborted) {
        groupAbort.abort();
    } else {
        config.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    const semaphore = config.maxConcurrency ? createSemaphore(config.maxConcurrency) : null;

    const outcomes: Array<NodeOutcome<S>> = [];

    const promises = sorted.map(async (node, position) => {
        if (semaphore) await semaphore.acquire();

        try {
            const result = await runNode(state, node, config, groupAbort.signal);
            outcomes[position] = { node: node.name, ok: true, update: result.update, attempts: result.attempts };
        } catch (error) {
            const failure = error instanceof NodeFailureError ? error : new NodeFailureError(node.name, error);
            outcomes[position] = { node: node.name, ok: false, error: failure };
            groupAbort.abort(); // Trigger fail-fast
        } finally {
            if (semaphore) semaphore.release();
        }
    });

    try {
        await Promise.all(promises);
    } finally {
        config.signal?.removeEventListener('abort', onCallerAbort);
    }

    return outcomes;
}

/**
 * Run one node under its retry policy.
 * @throws NodeFailureError once attempts are exhausted
 */
async function runNode<S>(
    state: S,
    node: GraphNode<S>,
    config: WaveConfig,
    groupSignal: AbortSignal
): Promise<{ update: StateUpdate<S> | undefined; attempts: number }> {
    const timeoutMs = node.timeoutMs ?? config.nodeTimeoutMs;
    const policy = node.retry;
    let attempts = 0;

    try {
        const update = await withRetry(async (attempt) => {
            attempts = attempt;
            const span = config.tracer.startSpan('graph.node', {
                node: node.name,
                wave: config.wave,
                attempt,
                sessionId: config.sessionId,
            });
            try {
                return await runAttempt(state, node, config, groupSignal, attempt, timeoutMs);
            } catch (error) {
                span.recordException(toError(error));
                throw error;
            } finally {
                span.end();
            }
        }, {
            attempts: policy?.maxAttempts ?? 1,
            delayMs: policy?.backoffMs ?? 500,
            factor: policy?.factor ?? 2,
            shouldRetry: (error) => !groupSignal.aborted && (policy?.retryOn ? policy.retryOn(error) : true),
            onRetry: (error, attempt, delayMs) => {
                config.logger.warn('Node failed, retrying', {
                    node: node.name,
                    attempt,
                    delayMs,
                    error: describeError(error),
                });
            },
            signal: groupSignal,
        });
        return { update, attempts };
    } catch (error) {
        throw new NodeFailureError(node.name, error, attempts);
    }
}

async function runAttempt<S>(
    state: S,
    node: GraphNode<S>,
    config: WaveConfig,
    groupSignal: AbortSignal,
    attempt: number,
    timeoutMs: number | undefined
): Promise<StateUpdate<S> | undefined> {
    // Per-attempt controller so a timeout aborts only this attempt
    const attemptAbort = new AbortController();
    const onGroupAbort = () => attemptAbort.abort();
    if (groupSignal.aborted) {
        attemptAbort.abort();
    } else {
        groupSignal.addEventListener('abort', onGroupAbort, { once: true });
    }

    const context: NodeContext = {
        sessionId: config.sessionId,
        node: node.name,
        attempt,
        wave: config.wave,
        signal: attemptAbort.signal,
        logger: config.logger,
    };

    try {
        const execution = Promise.resolve().then(() => node.fn(cloneStateForNode(state), context));
        const result = timeoutMs === undefined
            ? await execution
            : await withTimeout(execution, timeoutMs, (ms) => {
                attemptAbort.abort();
                return new NodeTimeoutError(node.name, ms);
            });

        if (result === undefined) {
            return undefined;
        }
        if (!isRecord(result)) {
            throw new StateUpdateError('(update)', `Node "${node.name}" returned a non-object update`);
        }
        return result;
    } finally {
        groupSignal.removeEventListener('abort', onGroupAbort);
    }
}

/**
 * Reject with `onTimeout(ms)` unless `promise` settles first.
 * The underlying work is not cancelled.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    ms: number,
    onTimeout: (ms: number) => Error
): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(onTimeout(ms)), ms);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Private copy of the pre-wave state for one node.
 * Mutations by the node never reach the shared state.
 */
export function cloneStateForNode<S>(state: S): S {
    return structuredClone(state);
}

/**
 * Record the outcome of a wave on its span.
 */
export function annotateWaveSpan<S>(span: Span, outcomes: ReadonlyArray<NodeOutcome<S>>): void {
    span.setAttributes({
        nodes: outcomes.map(o => o.node).join(','),
        failed: outcomes.filter(o => !o.ok).map(o => o.node).join(','),
    });
}

// ============================================================================
// Semaphore (for maxConcurrency)
// ============================================================================

interface Semaphore {
    acquire(): Promise<void>;
    release(): void;
}

function createSemaphore(max: number): Semaphore {
    let current = 0;
    const queue: Array<() => void> = [];

    return {
        async acquire() {
            if (current < max) {
                current++;
                return;
            }
            await new Promise<void>(resolve => queue.push(resolve));
            current++;
        },
        release() {
            current--;
            const next = queue.shift();
            if (next) next();
        },
    };
}
