/**
 * Environment configuration.
 */

import { z } from 'zod';
import { ConfigError } from './lib/errors';
import type { LogLevel } from './lib/logger';
import { MAX_TIMEOUT_MS } from './graph/types';

const positiveInt = z.coerce.number().int().positive();

const envSchema = z.object({
    DATA_SOURCE: z.string().default('data.csv'),
    OLLAMA_URL: z.string().url().default('http://localhost:11434'),
    REPORT_MODEL: z.string().default('gemma3'),
    PLANNER_MODEL: z.string().optional(),
    WRITER_MODEL: z.string().optional(),
    REPORTER_MODEL: z.string().optional(),
    VIZ_MODEL: z.string().optional(),
    REPORT_MAX_ITERATIONS: z.coerce.number().int().nonnegative().default(2),
    REPORT_MAX_CONCURRENCY: positiveInt.default(3),
    REPORT_NODE_TIMEOUT_MS: positiveInt.max(MAX_TIMEOUT_MS).default(90_000),
    REPORT_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    REPORT_CHECKPOINT_DIR: z.string().optional(),
    REPORT_OUTPUT_DIR: z.string().default('output'),
});

export interface ModelConfig {
    /** Model for nodes without an override */
    default: string;
    planner: string;
    writer: string;
    /** KPI and statistics sections */
    reporter: string;
    /** Chart scripts */
    viz: string;
}

export interface ReportFlowConfig {
    dataSource: string;
    ollamaUrl: string;
    models: ModelConfig;
    maxIterations: number;
    maxConcurrency: number;
    nodeTimeoutMs: number;
    logLevel: LogLevel;
    /** Directory for file checkpoints; unset keeps no checkpoints */
    checkpointDir?: string;
    outputDir: string;
}

/**
 * Read configuration from environment variables.
 * Empty variables count as unset.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): ReportFlowConfig {
    const present: Record<string, string> = {};
    for (const [key, value] of Object.entries(env)) {
        if (value !== undefined && value.trim() !== '') {
            present[key] = value.trim();
        }
    }

    const result = envSchema.safeParse(present);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
    }

    const e = result.data;
    return {
        dataSource: e.DATA_SOURCE,
        ollamaUrl: e.OLLAMA_URL,
        models: {
            default: e.REPORT_MODEL,
            planner: e.PLANNER_MODEL ?? e.REPORT_MODEL,
            writer: e.WRITER_MODEL ?? e.REPORT_MODEL,
            reporter: e.REPORTER_MODEL ?? e.REPORT_MODEL,
            viz: e.VIZ_MODEL ?? e.REPORT_MODEL,
        },
        maxIterations: e.REPORT_MAX_ITERATIONS,
        maxConcurrency: e.REPORT_MAX_CONCURRENCY,
        nodeTimeoutMs: e.REPORT_NODE_TIMEOUT_MS,
        logLevel: e.REPORT_LOG_LEVEL,
        checkpointDir: e.REPORT_CHECKPOINT_DIR,
        outputDir: e.REPORT_OUTPUT_DIR,
    };
}

/**
 * Node name -> model name for the report graph.
 */
export function modelsByNode(models: ModelConfig): Record<string, string> {
    return {
        planner: models.planner,
        kpi: models.reporter,
        stats: models.reporter,
        writer: models.writer,
        charts: models.viz,
    };
}
