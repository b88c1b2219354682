// Graph engine
export * from './graph';

// Errors
export {
    FlowError,
    BuildError,
    StateUpdateError,
    NodeTimeoutError,
    NodeFailureError,
    RunError,
    MaxWavesExceededError,
    CheckpointError,
    ConfigError,
    ReportError,
    describeError,
} from './lib/errors';
export type { CheckpointErrorKind } from './lib/errors';

// Logging
export {
    noopLogger,
    consoleLogger,
    createFilteredLogger,
    childLogger,
    LOG_LEVELS,
} from './lib/logger';
export type { Logger, LogLevel } from './lib/logger';

// Tracing
export {
    NoopTracer,
    LoggerTracer,
    DEFAULT_TRACER_CONFIG,
    redactContent,
    redactAttributes,
} from './lib/tracer';
export type { Tracer, Span, TracerConfig, AttributeValue } from './lib/tracer';
export { OTelTracer } from './lib/otel-tracer';
export type { IOTelTracerProvider, OTelTracerOptions } from './lib/otel-tracer';

// HTTP
export { APIError, defaultFetchAdapter, postJson } from './lib/request';
export type { FetchAdapter, RequestContext, RequestOptions } from './lib/request';

// Retry
export { withRetry, backoffDelay, sleep } from './lib/retry';
export type { RetryOptions } from './lib/retry';

// Configuration
export { loadConfig, modelsByNode } from './config';
export type { ReportFlowConfig, ModelConfig } from './config';
