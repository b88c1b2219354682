/**
 * Graph Runtime types.
 */

import type { Logger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { CheckpointError } from '../lib/errors';
import type { StateSchema, StateUpdate } from './channels';
import type { Checkpointer } from './checkpointer';

/** Special end symbol */
export const END = Symbol('END');

/** Largest delay `setTimeout` honours; longer ones fire immediately */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/** Edge destination: a node name or the terminal marker */
export type Target = string | typeof END;

/** Per-invocation context handed to every node */
export interface NodeContext {
    sessionId: string;
    /** Name of the running node */
    node: string;
    /** 1-based attempt number under the node's retry policy */
    attempt: number;
    /** 1-based wave number within the session */
    wave: number;
    /** Aborted on caller cancellation, node timeout, or a sibling failure */
    signal: AbortSignal;
    logger: Logger;
}

/**
 * Graph node function signature.
 * Receives a private copy of the pre-wave state; only the returned
 * update reaches the shared state.
 */
export type NodeFunction<S> = (
    state: Readonly<S>,
    context: NodeContext,
) => Promise<StateUpdate<S> | undefined> | StateUpdate<S> | undefined;

/** Route label resolver of a decision node, evaluated on the merged state */
export type Router<S, L extends string = string> = (state: Readonly<S>) => L | Promise<L>;

/** Per-node retry policy */
export interface RetryPolicy {
    /** Total attempts including the first */
    maxAttempts: number;
    /** Delay before the second attempt (default: 500) */
    backoffMs?: number;
    /** Delay multiplier per attempt (default: 2) */
    factor?: number;
    /** Return false for errors that must not be retried */
    retryOn?: (error: unknown) => boolean;
}

export interface NodeOptions {
    retry?: RetryPolicy;
    /** Overrides the graph-wide node timeout */
    timeoutMs?: number;
}

/** Graph node definition */
export interface GraphNode<S> {
    name: string;
    fn: NodeFunction<S>;
    /** Declaration order; fixes merge order within a wave */
    index: number;
    retry?: RetryPolicy;
    timeoutMs?: number;
}

/** Unconditional edge */
export interface GraphEdge {
    from: string;
    to: Target;
}

/** Conditional edge: one router plus its label table */
export interface ConditionalEdge<S> {
    from: string;
    router: Router<S>;
    routes: ReadonlyMap<string, Target>;
}

/** Names of numeric state fields, usable as a loop counter */
export type NumericField<S> = {
    [K in keyof S]-?: NonNullable<S[K]> extends number ? K : never;
}[keyof S] & string;

/**
 * Bounded-cycle ceiling. When `field` exceeds `maxIterations` after a
 * wave, every conditional route taken in that wave is forced to END.
 */
export interface CeilingConfig<S> {
    field: NumericField<S>;
    maxIterations: number;
}

/** Graph builder config */
export interface StateGraphConfig {
    /** Entry point node */
    entryPoint?: string;
}

/** Options fixed at compile time */
export interface CompileOptions<S> {
    ceiling?: CeilingConfig<S>;
    /** Maximum waves per session (default: 100) */
    maxWaves?: number;
    /** Maximum nodes running at once within a wave (default: unlimited) */
    maxConcurrency?: number;
    /** Default per-node timeout in ms (default: none) */
    nodeTimeoutMs?: number;
}

/**
 * Validated, frozen graph produced by `StateGraph.compile()`.
 * Shared by every session run against it.
 */
export interface GraphDefinition<S> {
    readonly schema: StateSchema<S>;
    readonly entryPoint: string;
    /** Nodes keyed by name, in declaration order */
    readonly nodes: ReadonlyMap<string, GraphNode<S>>;
    /** Unconditional successors per node */
    readonly successors: ReadonlyMap<string, ReadonlyArray<Target>>;
    /** Unconditional predecessors per node; two or more make the node a join */
    readonly predecessors: ReadonlyMap<string, ReadonlyArray<string>>;
    readonly conditionalEdges: ReadonlyMap<string, ConditionalEdge<S>>;
    readonly ceiling?: CeilingConfig<S>;
    readonly maxWaves: number;
    readonly maxConcurrency?: number;
    readonly nodeTimeoutMs?: number;
}

/** Invoke options */
export interface InvokeOptions {
    /** Session ID for checkpointing (default: generated) */
    sessionId?: string;
    /** Checkpointer for save/resume */
    checkpointer?: Checkpointer;
    /** Resume from the session's checkpoint when one exists (default: true) */
    resume?: boolean;
    /** Caller cancellation, honoured at wave boundaries */
    signal?: AbortSignal;
    logger?: Logger;
    tracer?: Tracer;
    /** Overrides the compiled maximum */
    maxWaves?: number;
    /** Overrides the compiled concurrency limit */
    maxConcurrency?: number;
    /** Overrides the compiled default timeout */
    nodeTimeoutMs?: number;
}

export type RunStatus = 'done' | 'cancelled';

/** Final outcome of a session run */
export interface ExecutionResult<S> {
    sessionId: string;
    state: S;
    /** Completed node names in execution order */
    completed: string[];
    status: RunStatus;
    /** Number of merged waves */
    iterationCount: number;
    /** True when the executor forced a conditional route to END */
    ceilingReached: boolean;
    /** Non-fatal checkpoint failures */
    warnings: CheckpointError[];
    /** True when the result came from a checkpoint without running any wave */
    restored: boolean;
}

/** Emitted by `stream()` after each merged wave */
export interface WaveEvent<S> {
    sessionId: string;
    wave: number;
    /** Nodes executed in this wave, in merge order */
    nodes: string[];
    state: S;
    /** Nodes scheduled for the next wave */
    next: string[];
}
