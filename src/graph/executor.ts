/**
 * Executor - runs a compiled graph wave by wave for one session.
 *
 * Each wave: run ready nodes concurrently, merge their updates in
 * declaration order, evaluate decision routers on the merged state,
 * compute the next ready set, then checkpoint. Cancellation is honoured
 * between waves; a wave in flight is awaited and its results dropped.
 */

import type { Logger } from '../lib/logger';
import { childLogger, noopLogger } from '../lib/logger';
import type { Span, Tracer } from '../lib/tracer';
import { NoopTracer, redactContent, toError } from '../lib/tracer';
import { CheckpointError, MaxWavesExceededError, NodeFailureError, RunError, describeError } from '../lib/errors';
import { isRecord } from '../lib/utils';
import { applyUpdate, isState } from './channels';
import type { Checkpoint, Checkpointer } from './checkpointer';
import { toCheckpointError } from './checkpointer';
import { annotateWaveSpan, executeWave } from './parallel';
import type {
    ConditionalEdge,
    ExecutionResult,
    GraphDefinition,
    GraphNode,
    InvokeOptions,
    RunStatus,
    Target,
    WaveEvent,
} from './types';
import { END, MAX_TIMEOUT_MS } from './types';

/** Engine limits settable at compile time and per invocation */
export interface EngineOptions {
    maxWaves?: number;
    maxConcurrency?: number;
    nodeTimeoutMs?: number;
}

/**
 * Describe the first invalid engine limit, if any.
 */
export function checkEngineOptions(options: EngineOptions): string | undefined {
    const { maxWaves, maxConcurrency, nodeTimeoutMs } = options;
    if (maxWaves !== undefined && (!Number.isInteger(maxWaves) || maxWaves < 1)) {
        return `maxWaves must be a positive integer, got ${maxWaves}`;
    }
    if (maxConcurrency !== undefined && (!Number.isInteger(maxConcurrency) || maxConcurrency < 1)) {
        return `maxConcurrency must be a positive integer, got ${maxConcurrency}`;
    }
    if (nodeTimeoutMs !== undefined) {
        return checkTimeout('nodeTimeoutMs', nodeTimeoutMs);
    }
    return undefined;
}

/**
 * Describe why a timeout is unusable, if it is.
 */
export function checkTimeout(label: string, ms: number): string | undefined {
    if (!(ms > 0)) {
        return `${label} must be positive, got ${ms}`;
    }
    if (ms > MAX_TIMEOUT_MS) {
        return `${label} must not exceed ${MAX_TIMEOUT_MS}, got ${ms}`;
    }
    return undefined;
}

export function generateSessionId(): string {
    return `session_${Date.now()}_${Math.random().toString(36).slice(2, 8)}`;
}

/** Mutable bookkeeping of one session between waves */
interface Progress<S> {
    state: S;
    /** Ready set for the next wave, in declaration order */
    pending: string[];
    /** Join node -> predecessors arrived since it last ran */
    joins: Map<string, Set<string>>;
    completed: string[];
    iterationCount: number;
    endReached: boolean;
    ceilingReached: boolean;
}

type StartPoint<S> =
    | { kind: 'run'; progress: Progress<S>; resumed: boolean }
    | { kind: 'done'; progress: Progress<S> };

interface RunContext {
    sessionId: string;
    logger: Logger;
    tracer: Tracer;
    warnings: CheckpointError[];
    checkpointer?: Checkpointer;
}

/**
 * Executable graph returned by `StateGraph.compile()`.
 * Stateless between invocations; sessions never share state.
 */
export class CompiledGraph<S extends object> {
    constructor(readonly definition: GraphDefinition<S>) { }

    /**
     * Run a session to completion.
     * @throws RunError when a node fails, the run stalls, or its checkpoint is corrupt
     */
    async invoke(initialState: S, options: InvokeOptions = {}): Promise<ExecutionResult<S>> {
        const iterator = this.stream(initialState, options);
        let step = await iterator.next();
        while (!step.done) {
            step = await iterator.next();
        }
        return step.value;
    }

    /**
     * Run a session, yielding after every merged wave.
     * The generator's return value is the final result.
     */
    async *stream(
        initialState: S,
        options: InvokeOptions = {}
    ): AsyncGenerator<WaveEvent<S>, ExecutionResult<S>, undefined> {
        const def = this.definition;
        const sessionId = options.sessionId ?? generateSessionId();

        const invalid = checkEngineOptions(options);
        if (invalid) {
            throw new RunError(invalid, sessionId);
        }
        const maxWaves = options.maxWaves ?? def.maxWaves;
        const maxConcurrency = options.maxConcurrency ?? def.maxConcurrency;
        const nodeTimeoutMs = options.nodeTimeoutMs ?? def.nodeTimeoutMs;

        const ctx: RunContext = {
            sessionId,
            logger: childLogger(options.logger ?? noopLogger, { sessionId }),
            tracer: options.tracer ?? new NoopTracer(),
            warnings: [],
            checkpointer: options.checkpointer,
        };
        const { logger, tracer } = ctx;

        const runSpan = tracer.startSpan('graph.invoke', { sessionId, entryPoint: def.entryPoint });
        try {
            const start = await this.start(initialState, options.resume ?? true, ctx);
            let progress = start.progress;

            if (start.kind === 'done') {
                logger.info('Session already complete, returning stored result', {
                    iterationCount: progress.iterationCount,
                });
                runSpan.setAttribute('restored', true);
                return this.result(progress, 'done', ctx, true);
            }

            logger.info(start.resumed ? 'Run resumed' : 'Run started', {
                wave: progress.iterationCount + 1,
                pending: progress.pending.join(','),
            });

            while (progress.pending.length > 0) {
                if (options.signal?.aborted) {
                    return this.cancel(progress, ctx, runSpan);
                }
                if (progress.iterationCount >= maxWaves) {
                    throw new MaxWavesExceededError(maxWaves, sessionId);
                }

                const wave = progress.iterationCount + 1;
                const nodes = this.resolveNodes(progress.pending, sessionId);
                const waveSpan = tracer.startSpan('graph.wave', { sessionId, wave });
                let next: Progress<S>;
                try {
                    logger.debug('Wave started', { wave, nodes: progress.pending.join(',') });
                    const outcomes = await executeWave(progress.state, nodes, {
                        sessionId,
                        wave,
                        maxConcurrency,
                        nodeTimeoutMs,
                        signal: options.signal,
                        logger,
                        tracer,
                    });
                    annotateWaveSpan(waveSpan, outcomes);

                    if (options.signal?.aborted) {
                        waveSpan.addEvent('discarded');
                        return this.cancel(progress, ctx, runSpan);
                    }

                    let state = progress.state;
                    for (const outcome of outcomes) {
                        if (!outcome.ok) {
                            logger.error('Node failed', { node: outcome.node, wave, error: outcome.error.message });
                            throw new RunError(outcome.error.message, sessionId, outcome.node, outcome.error);
                        }
                    }
                    for (const outcome of outcomes) {
                        if (!outcome.ok) {
                            continue;
                        }
                        try {
                            state = applyUpdate(def.schema, state, outcome.update);
                        } catch (error) {
                            throw new RunError(
                                `Node "${outcome.node}" returned an invalid update: ${describeError(error)}`,
                                sessionId,
                                outcome.node,
                                error,
                            );
                        }
                        logger.info('Node complete', { node: outcome.node, wave, attempts: outcome.attempts });
                    }

                    next = await this.advance(progress, nodes, state, ctx);

                    if (tracer.getConfig().recordState) {
                        waveSpan.setAttribute('state', redactContent(JSON.stringify(state), tracer.getConfig()));
                    }
                    waveSpan.setAttribute('next', next.pending.join(','));
                } catch (error) {
                    waveSpan.recordException(toError(error));
                    throw error;
                } finally {
                    waveSpan.end();
                }

                progress = next;
                await this.save(progress, ctx);

                yield {
                    sessionId,
                    wave: progress.iterationCount,
                    nodes: nodes.map(node => node.name),
                    state: progress.state,
                    next: [...progress.pending],
                };
            }

            if (!progress.endReached) {
                throw new RunError(describeStall(progress), sessionId);
            }

            logger.info('Run finished', {
                iterationCount: progress.iterationCount,
                ceilingReached: progress.ceilingReached,
            });
            runSpan.setAttributes({ status: 'done', waves: progress.iterationCount });
            return this.result(progress, 'done', ctx, false);
        } catch (error) {
            runSpan.recordException(toError(error));
            throw error;
        } finally {
            runSpan.end();
        }
    }

    /**
     * Route every node of a merged wave and compute the next ready set.
     */
    private async advance(
        progress: Progress<S>,
        nodes: ReadonlyArray<GraphNode<S>>,
        state: S,
        ctx: RunContext
    ): Promise<Progress<S>> {
        const def = this.definition;
        const ready = new Set<string>();
        const joins = new Map<string, Set<string>>();
        for (const [join, arrived] of progress.joins) {
            joins.set(join, new Set(arrived));
        }
        let endReached = progress.endReached;
        let ceilingReached = progress.ceilingReached;
        const overCeiling = this.ceilingExceeded(state);

        for (const node of nodes) {
            const conditional = def.conditionalEdges.get(node.name);
            if (conditional) {
                let target = await this.route(conditional, state, ctx.sessionId);
                if (overCeiling && target !== END) {
                    ctx.logger.info('Iteration ceiling exceeded, routing to END', {
                        node: node.name,
                        requested: target,
                    });
                    target = END;
                    ceilingReached = true;
                }
                if (target === END) {
                    endReached = true;
                } else {
                    ready.add(target);
                }
                continue;
            }

            const outgoing = def.successors.get(node.name) ?? [];
            if (outgoing.length === 0) {
                endReached = true;
            }
            for (const to of outgoing) {
                if (to === END) {
                    endReached = true;
                    continue;
                }
                const required = def.predecessors.get(to) ?? [];
                if (required.length < 2) {
                    ready.add(to);
                    continue;
                }
                const arrived = joins.get(to) ?? new Set<string>();
                arrived.add(node.name);
                if (required.every(name => arrived.has(name))) {
                    joins.delete(to);
                    ready.add(to);
                } else {
                    joins.set(to, arrived);
                }
            }
        }

        return {
            state,
            pending: this.inDeclarationOrder(ready),
            joins,
            completed: [...progress.completed, ...nodes.map(node => node.name)],
            iterationCount: progress.iterationCount + 1,
            endReached,
            ceilingReached,
        };
    }

    private async route(edge: ConditionalEdge<S>, state: S, sessionId: string): Promise<Target> {
        let label: string;
        try {
            label = await edge.router(state);
        } catch (error) {
            const failure = new NodeFailureError(edge.from, error);
            throw new RunError(failure.message, sessionId, edge.from, failure);
        }

        const target = edge.routes.get(label);
        if (target === undefined) {
            const failure = new NodeFailureError(
                edge.from,
                new Error(`Route label "${label}" is not in the route table [${[...edge.routes.keys()].join(', ')}]`),
            );
            throw new RunError(failure.message, sessionId, edge.from, failure);
        }
        return target;
    }

    private ceilingExceeded(state: S): boolean {
        const ceiling = this.definition.ceiling;
        if (!ceiling) {
            return false;
        }
        const value = isRecord(state) ? state[ceiling.field] : undefined;
        return typeof value === 'number' && value > ceiling.maxIterations;
    }

    /**
     * Fresh progress, or the session's checkpoint when resuming.
     */
    private async start(initialState: S, resume: boolean, ctx: RunContext): Promise<StartPoint<S>> {
        const def = this.definition;
        const { sessionId } = ctx;

        if (!isState(def.schema, initialState)) {
            throw new RunError('Initial state does not match the state schema', sessionId);
        }
        const fresh: StartPoint<S> = {
            kind: 'run',
            resumed: false,
            progress: {
                state: { ...initialState },
                pending: [def.entryPoint],
                joins: new Map(),
                completed: [],
                iterationCount: 0,
                endReached: false,
                ceilingReached: false,
            },
        };

        if (!ctx.checkpointer || !resume) {
            return fresh;
        }

        let checkpoint: Checkpoint | null;
        try {
            checkpoint = await ctx.checkpointer.load(sessionId);
        } catch (error) {
            const failure = toCheckpointError(error, sessionId, 'load');
            if (failure.kind === 'corrupt') {
                throw new RunError(failure.message, sessionId, undefined, failure);
            }
            ctx.warnings.push(failure);
            ctx.logger.warn('Checkpoint load failed, starting fresh', { error: failure.message });
            return fresh;
        }

        if (!checkpoint) {
            return fresh;
        }

        const progress = this.fromCheckpoint(checkpoint, sessionId);
        ctx.logger.debug('Checkpoint loaded', { status: checkpoint.status, iterationCount: checkpoint.iterationCount });
        return checkpoint.status === 'done'
            ? { kind: 'done', progress }
            : { kind: 'run', resumed: true, progress };
    }

    private fromCheckpoint(checkpoint: Checkpoint, sessionId: string): Progress<S> {
        const def = this.definition;
        const unknown = new Set<string>();
        const named = [
            ...checkpoint.pending,
            ...checkpoint.completedLog,
            ...Object.keys(checkpoint.joins),
            ...Object.values(checkpoint.joins).flat(),
        ];
        for (const name of named) {
            if (!def.nodes.has(name)) {
                unknown.add(name);
            }
        }
        if (unknown.size > 0) {
            throw new RunError(
                `Checkpoint for session "${sessionId}" names unknown nodes: ${[...unknown].join(', ')}`,
                sessionId,
            );
        }

        const { state } = checkpoint;
        if (!isState(def.schema, state)) {
            throw new RunError(`Checkpoint for session "${sessionId}" holds a state that does not match the schema`, sessionId);
        }

        const joins = new Map<string, Set<string>>();
        for (const [join, arrived] of Object.entries(checkpoint.joins)) {
            joins.set(join, new Set(arrived));
        }

        return {
            state,
            pending: this.inDeclarationOrder(checkpoint.pending),
            joins,
            completed: [...checkpoint.completedLog],
            iterationCount: checkpoint.iterationCount,
            endReached: checkpoint.endReached,
            ceilingReached: checkpoint.ceilingReached,
        };
    }

    /**
     * Persist progress. Failures become warnings; the run continues in memory.
     */
    private async save(progress: Progress<S>, ctx: RunContext): Promise<void> {
        if (!ctx.checkpointer) {
            return;
        }

        const joins: Record<string, string[]> = {};
        for (const [join, arrived] of progress.joins) {
            joins[join] = [...arrived];
        }
        const checkpoint: Checkpoint = {
            sessionId: ctx.sessionId,
            state: progress.state,
            iterationCount: progress.iterationCount,
            completedLog: [...progress.completed],
            pending: [...progress.pending],
            joins,
            endReached: progress.endReached,
            ceilingReached: progress.ceilingReached,
            status: progress.pending.length === 0 && progress.endReached ? 'done' : 'running',
            savedAt: Date.now(),
        };

        try {
            await ctx.checkpointer.save(ctx.sessionId, checkpoint);
        } catch (error) {
            const failure = toCheckpointError(error, ctx.sessionId, 'save');
            ctx.warnings.push(failure);
            ctx.logger.warn('Checkpoint save failed, continuing without it', {
                wave: progress.iterationCount,
                error: failure.message,
            });
        }
    }

    private cancel(progress: Progress<S>, ctx: RunContext, span: Span): ExecutionResult<S> {
        ctx.logger.info('Run cancelled', { iterationCount: progress.iterationCount });
        span.setAttributes({ status: 'cancelled', waves: progress.iterationCount });
        return this.result(progress, 'cancelled', ctx, false);
    }

    private result(progress: Progress<S>, status: RunStatus, ctx: RunContext, restored: boolean): ExecutionResult<S> {
        return {
            sessionId: ctx.sessionId,
            state: progress.state,
            completed: [...progress.completed],
            status,
            iterationCount: progress.iterationCount,
            ceilingReached: progress.ceilingReached,
            warnings: [...ctx.warnings],
            restored,
        };
    }

    private resolveNodes(names: ReadonlyArray<string>, sessionId: string): Array<GraphNode<S>> {
        return names.map(name => {
            const node = this.definition.nodes.get(name);
            if (!node) {
                throw new RunError(`Node not found: ${name}`, sessionId, name);
            }
            return node;
        });
    }

    private inDeclarationOrder(names: Iterable<string>): string[] {
        const index = (name: string) => this.definition.nodes.get(name)?.index ?? Number.MAX_SAFE_INTEGER;
        return [...new Set(names)].sort((a, b) => index(a) - index(b));
    }
}

function describeStall<S>(progress: Progress<S>): string {
    const waiting = [...progress.joins].map(([join, arrived]) => `${join} [${[...arrived].join(', ')}]`);
    return waiting.length > 0
        ? `Run stalled: no node is ready and END was not reached (waiting joins: ${waiting.join('; ')})`
        : 'Run stalled: no node is ready and END was not reached';
}

/** Anything that compiles into a runnable graph, such as a `StateGraph` */
export interface Compilable<S extends object> {
    compile(): CompiledGraph<S>;
}

/**
 * Run a graph for one session.
 * A `StateGraph` is compiled first, so build errors surface here as `BuildError`.
 */
export async function execute<S extends object>(
    graph: CompiledGraph<S> | Compilable<S>,
    initialState: S,
    sessionId: string,
    checkpointer?: Checkpointer,
    options: Omit<InvokeOptions, 'sessionId' | 'checkpointer'> = {}
): Promise<ExecutionResult<S>> {
    const compiled = graph instanceof CompiledGraph ? graph : graph.compile();
    return compiled.invoke(initialState, { ...options, sessionId, checkpointer });
}
