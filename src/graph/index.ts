/**
 * Graph engine public exports.
 */

export { StateGraph, RESERVED_NODE_NAMES } from './state-graph';
export { CompiledGraph, execute, checkEngineOptions, checkTimeout, generateSessionId } from './executor';
export type { Compilable, EngineOptions } from './executor';
export { END, MAX_TIMEOUT_MS } from './types';
export type {
    Target,
    NodeContext,
    NodeFunction,
    Router,
    RetryPolicy,
    NodeOptions,
    GraphNode,
    GraphEdge,
    ConditionalEdge,
    NumericField,
    CeilingConfig,
    StateGraphConfig,
    CompileOptions,
    GraphDefinition,
    InvokeOptions,
    RunStatus,
    ExecutionResult,
    WaveEvent,
} from './types';

// State store
export {
    overwrite,
    append,
    merge,
    applyUpdate,
    mergeUpdates,
    schemaKeys,
    describeSchema,
    isState,
} from './channels';
export type { MergeStrategy, Channel, StateSchema, StateUpdate } from './channels';

// Wave execution
export { executeWave, withTimeout } from './parallel';
export type { WaveConfig, NodeOutcome } from './parallel';

// Checkpointers
export {
    MemoryCheckpointer,
    SessionLock,
    CHECKPOINT_STATUSES,
    checkpointSchema,
    parseCheckpoint,
    decodeCheckpoint,
    encodeCheckpoint,
    toCheckpointError,
} from './checkpointer';
export type { Checkpointer, Checkpoint, CheckpointStatus } from './checkpointer';

// Redis Checkpointer (optional - requires ioredis)
export { RedisCheckpointer } from './redis-checkpointer';
export type { RedisClient, RedisCheckpointerConfig } from './redis-checkpointer';

// Postgres Checkpointer (optional - requires pg)
export { PostgresCheckpointer } from './postgres-checkpointer';
export type { PostgresClient, PostgresCheckpointerConfig } from './postgres-checkpointer';
