/**
 * Span tracing for graph runs.
 * The executor opens `graph.invoke`, `graph.wave` and `graph.node` spans;
 * tracers are passed in per run and attributes are redacted before export.
 */

import type { Logger } from './logger';

export type AttributeValue = string | number | boolean;

/** One timed operation: a run, a wave or a node attempt */
export interface Span {
    setAttribute(key: string, value: AttributeValue): void;
    setAttributes(attributes: Record<string, AttributeValue>): void;
    recordException(error: Error): void;
    addEvent(name: string, attributes?: Record<string, AttributeValue>): void;
    end(): void;
}

export interface TracerConfig {
    /** Record state snapshots on wave spans (default: false) */
    recordState?: boolean;
    /** Maximum content length before truncation (default: 1000) */
    maxContentLength?: number;
    /** Sensitive keys to mask (default: ['password', 'apiKey', 'token', 'secret', 'authorization']) */
    sensitiveKeys?: string[];
}

export interface Tracer {
    startSpan(name: string, attributes?: Record<string, AttributeValue>): Span;
    getConfig(): TracerConfig;
}

export const DEFAULT_TRACER_CONFIG: Required<TracerConfig> = {
    recordState: false,
    maxContentLength: 1000,
    sensitiveKeys: ['password', 'apiKey', 'token', 'secret', 'authorization'],
};

/**
 * Redact sensitive information from content.
 * Strategy: truncate first, then regex mask.
 */
export function redactContent(
    content: string,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): string {
    const maxLen = config.maxContentLength ?? DEFAULT_TRACER_CONFIG.maxContentLength;
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;

    let result = content;
    if (result.length > maxLen) {
        result = result.substring(0, maxLen) + `... [truncated ${content.length - maxLen} chars]`;
    }

    for (const key of sensitiveKeys) {
        const regex = new RegExp(`("${key}"\\s*:\\s*)"[^"]*"`, 'gi');
        result = result.replace(regex, '$1"[REDACTED]"');
    }

    return result;
}

/**
 * Redact attributes based on config.
 */
export function redactAttributes(
    attributes: Record<string, unknown>,
    config: TracerConfig = DEFAULT_TRACER_CONFIG
): Record<string, AttributeValue> {
    const sensitiveKeys = config.sensitiveKeys ?? DEFAULT_TRACER_CONFIG.sensitiveKeys;
    const result: Record<string, AttributeValue> = {};

    for (const [key, value] of Object.entries(attributes)) {
        const lowerKey = key.toLowerCase();
        const isSensitive = sensitiveKeys.some(sk => lowerKey.includes(sk.toLowerCase()));

        if (isSensitive) {
            result[key] = '[REDACTED]';
        } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
            result[key] = value;
        } else if (typeof value === 'object') {
            result[key] = JSON.stringify(value).substring(0, 100);
        } else {
            result[key] = String(value);
        }
    }

    return result;
}

const NOOP_SPAN: Span = Object.freeze({
    setAttribute: () => undefined,
    setAttributes: () => undefined,
    recordException: () => undefined,
    addEvent: () => undefined,
    end: () => undefined,
});

/** Default tracer of a run; keeps the config for state redaction */
export class NoopTracer implements Tracer {
    private readonly config: TracerConfig;

    constructor(config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(_name: string, _attributes?: Record<string, AttributeValue>): Span {
        return NOOP_SPAN;
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

/**
 * Tracer that writes spans to a logger.
 *
 * A span logs `span start <name>` at debug level and, when it ends,
 * `span end <name>` with every attribute set on it and `durationMs`.
 * A span that recorded an exception ends with a `span failed <name>` warning.
 */
export class LoggerTracer implements Tracer {
    private readonly config: Required<TracerConfig>;

    constructor(private readonly logger: Logger, config: TracerConfig = {}) {
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes: Record<string, AttributeValue> = {}): Span {
        const startedAt = Date.now();
        const fields = redactAttributes(attributes, this.config);
        const errors: string[] = [];
        this.logger.debug(`span start ${name}`, { ...fields });

        return {
            setAttribute: (key, value) => {
                Object.assign(fields, redactAttributes({ [key]: value }, this.config));
            },
            setAttributes: (attrs) => {
                Object.assign(fields, redactAttributes(attrs, this.config));
            },
            recordException: (error) => {
                errors.push(error.message);
            },
            addEvent: (eventName, eventAttrs = {}) => {
                this.logger.debug(`span event ${name}.${eventName}`, {
                    ...fields,
                    ...redactAttributes(eventAttrs, this.config),
                });
            },
            end: () => {
                const meta = { ...fields, durationMs: Date.now() - startedAt };
                if (errors.length === 0) {
                    this.logger.debug(`span end ${name}`, meta);
                } else {
                    this.logger.warn(`span failed ${name}`, { ...meta, error: errors.join('; ') });
                }
            },
        };
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
