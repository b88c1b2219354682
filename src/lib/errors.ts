export class FlowError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'FlowError';
    }
}

/**
 * Malformed graph definition. Raised by `StateGraph.compile()`,
 * never during a run.
 */
export class BuildError extends FlowError {
    constructor(message: string) {
        super(message);
        this.name = 'BuildError';
    }
}

/**
 * A node update that does not fit the state schema.
 */
export class StateUpdateError extends FlowError {
    field: string;

    constructor(field: string, message: string) {
        super(message);
        this.name = 'StateUpdateError';
        this.field = field;
    }
}

export class NodeTimeoutError extends FlowError {
    nodeName: string;
    timeoutMs: number;

    constructor(nodeName: string, timeoutMs: number) {
        super(`Node "${nodeName}" timed out after ${timeoutMs}ms`);
        this.name = 'NodeTimeoutError';
        this.nodeName = nodeName;
        this.timeoutMs = timeoutMs;
    }
}

/**
 * A work or decision node that raised, timed out, or routed to a label
 * outside its table, after its retry policy was exhausted.
 */
export class NodeFailureError extends FlowError {
    constructor(
        public readonly nodeName: string,
        public override readonly cause: unknown,
        public readonly attempts: number = 1,
    ) {
        super(`Node "${nodeName}" failed after ${attempts} attempt(s): ${describeError(cause)}`);
        this.name = 'NodeFailureError';
    }
}

/**
 * Run-level failure surfaced to the caller of `invoke()`.
 * `nodeName` is set when a node caused it.
 */
export class RunError extends FlowError {
    constructor(
        message: string,
        public readonly sessionId: string,
        public readonly nodeName?: string,
        public override readonly cause?: unknown,
    ) {
        super(message);
        this.name = 'RunError';
    }
}

export class MaxWavesExceededError extends RunError {
    constructor(public readonly maxWaves: number, sessionId: string) {
        super(`Graph execution exceeded maximum waves: ${maxWaves}`, sessionId);
        this.name = 'MaxWavesExceededError';
    }
}

export type CheckpointErrorKind = 'io' | 'corrupt';

/**
 * Checkpoint persistence failure.
 * `io` failures degrade to warnings; `corrupt` snapshots abort the run.
 */
export class CheckpointError extends FlowError {
    constructor(
        message: string,
        public readonly kind: CheckpointErrorKind,
        public readonly sessionId: string,
        public override readonly cause?: unknown,
    ) {
        super(message);
        this.name = 'CheckpointError';
    }
}

export class ConfigError extends FlowError {
    issues: string[];

    constructor(message: string, issues: string[]) {
        super(message);
        this.name = 'ConfigError';
        this.issues = issues;
    }
}

/**
 * Report session failure outside the graph: missing input data or a
 * document that could not be assembled.
 */
export class ReportError extends FlowError {
    constructor(message: string, public override readonly cause?: unknown) {
        super(message);
        this.name = 'ReportError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
