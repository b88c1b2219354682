/**
 * OpenTelemetry adapter for run tracing.
 * The provider is typed structurally, so @opentelemetry/api stays an
 * optional peer: pass `trace.getTracerProvider()` or any SDK provider.
 */

import type { AttributeValue, Span, Tracer, TracerConfig } from './tracer';
import { DEFAULT_TRACER_CONFIG, redactAttributes } from './tracer';

/** `SpanStatusCode.ERROR` */
const STATUS_ERROR = 2;

interface OTelSpanLike {
    setAttributes(attributes: Record<string, AttributeValue>): unknown;
    addEvent(name: string, attributes?: Record<string, AttributeValue>): unknown;
    recordException(exception: Error): void;
    setStatus(status: { code: number; message?: string }): unknown;
    end(): void;
}

interface OTelTracerLike {
    startSpan(name: string, options?: { attributes?: Record<string, AttributeValue> }): OTelSpanLike;
}

export interface IOTelTracerProvider {
    getTracer(name: string, version?: string): OTelTracerLike;
}

export interface OTelTracerOptions extends TracerConfig {
    /** Instrumentation scope name (default: 'report-flow') */
    name?: string;
    /** Instrumentation scope version (default: '0.1.0') */
    version?: string;
}

/**
 * Tracer exporting graph spans through OpenTelemetry.
 * Every attribute passes through redaction, and a recorded exception
 * also marks the span status as an error.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 * import { OTelTracer } from 'report-flow';
 *
 * const tracer = new OTelTracer(trace.getTracerProvider());
 * await graph.invoke(initialState, { sessionId: 'q1-sales', tracer });
 * ```
 */
export class OTelTracer implements Tracer {
    private readonly tracer: OTelTracerLike;
    private readonly config: Required<TracerConfig>;

    constructor(provider: IOTelTracerProvider, options: OTelTracerOptions = {}) {
        const { name = 'report-flow', version = '0.1.0', ...config } = options;
        this.tracer = provider.getTracer(name, version);
        this.config = { ...DEFAULT_TRACER_CONFIG, ...config };
    }

    startSpan(name: string, attributes: Record<string, AttributeValue> = {}): Span {
        const redact = (attrs: Record<string, AttributeValue>) => redactAttributes(attrs, this.config);
        const span = this.tracer.startSpan(name, { attributes: redact(attributes) });

        return {
            setAttribute: (key, value) => {
                span.setAttributes(redact({ [key]: value }));
            },
            setAttributes: (attrs) => {
                span.setAttributes(redact(attrs));
            },
            recordException: (error) => {
                span.recordException(error);
                span.setStatus({ code: STATUS_ERROR, message: error.message });
            },
            addEvent: (eventName, eventAttrs) => {
                span.addEvent(eventName, eventAttrs ? redact(eventAttrs) : undefined);
            },
            end: () => span.end(),
        };
    }

    getConfig(): TracerConfig {
        return this.config;
    }
}
