/**
 * Report session runner: executes the report graph, recovers missing
 * outputs explicitly, and assembles the final document.
 */

import { access } from 'fs/promises';
import type { Checkpointer } from '../graph/checkpointer';
import type { RunStatus } from '../graph/types';
import type { Logger } from '../lib/logger';
import { childLogger, noopLogger } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { CheckpointError } from '../lib/errors';
import { ReportError, describeError } from '../lib/errors';
import type { ChartRunner, DataProfiler, DocumentAssembler, LanguageModel } from './collaborators';
import type { ReportGraphOptions } from './graph';
import { buildReportGraph } from './graph';
import { writeNarrative } from './nodes';
import type { ReportState } from './state';
import { createInitialReportState } from './state';

/** Default chart goal when the plan has none */
export const FALLBACK_CHART_GOAL = 'Data distribution plot';

export const DEFAULT_REPORT_TITLE = 'Data Analysis Report';

export interface ReportSessionOptions extends ReportGraphOptions {
    csvPath: string;
    sessionId?: string;
    title?: string;
    model: LanguageModel;
    profiler: DataProfiler;
    charts: ChartRunner;
    assembler: DocumentAssembler;
    checkpointer?: Checkpointer;
    logger?: Logger;
    tracer?: Tracer;
    signal?: AbortSignal;
}

export type RecoveryStep = 'charts' | 'narrative';

export interface ReportSessionResult {
    sessionId: string;
    status: RunStatus;
    /** Assembled document; null when the run was cancelled */
    documentPath: string | null;
    /** Graph state after recovery */
    state: ReportState;
    completed: string[];
    /** Outputs produced outside the graph because the graph left them empty */
    recovered: RecoveryStep[];
    ceilingReached: boolean;
    warnings: CheckpointError[];
}

/**
 * Run one report session end to end.
 * @throws ReportError when the data file is missing or assembly fails
 * @throws RunError when the graph run fails
 */
export async function runReportSession(options: ReportSessionOptions): Promise<ReportSessionResult> {
    const baseLogger = options.logger ?? noopLogger;

    try {
        await access(options.csvPath);
    } catch (error) {
        throw new ReportError(`Source file not found: ${options.csvPath}`, error);
    }

    const graph = buildReportGraph(
        { model: options.model, profiler: options.profiler, charts: options.charts },
        options,
    );
    const result = await graph.invoke(createInitialReportState(options.csvPath), {
        sessionId: options.sessionId,
        checkpointer: options.checkpointer,
        logger: baseLogger,
        tracer: options.tracer,
        signal: options.signal,
    });
    const logger = childLogger(baseLogger, { sessionId: result.sessionId });

    const base = {
        sessionId: result.sessionId,
        status: result.status,
        completed: result.completed,
        ceilingReached: result.ceilingReached,
        warnings: result.warnings,
    };

    if (result.status === 'cancelled') {
        logger.info('Report session cancelled before completion');
        return { ...base, documentPath: null, state: result.state, recovered: [] };
    }

    const state: ReportState = {
        ...result.state,
        artifacts: [...result.state.artifacts],
        reportSections: { ...result.state.reportSections },
    };
    const recovered: RecoveryStep[] = [];

    if (state.artifacts.length === 0) {
        logger.warn('Graph produced no charts, running chart recovery');
        const charts = await options.charts.run({
            goal: state.plan.vizGoal ?? FALLBACK_CHART_GOAL,
            dataPath: options.csvPath,
            signal: options.signal,
        });
        state.artifacts.push(...charts);
        recovered.push('charts');
    }

    if (!state.reportSections.narrative) {
        logger.warn('Graph produced no narrative, running narrative recovery');
        const narrative = await writeNarrative(options.model, state.reportSections, {
            node: 'writer',
            signal: options.signal,
        });
        if (narrative) {
            state.reportSections.narrative = narrative;
        }
        recovered.push('narrative');
    }

    let documentPath: string;
    try {
        documentPath = await options.assembler.assemble({
            title: options.title ?? DEFAULT_REPORT_TITLE,
            sections: state.reportSections,
            artifacts: state.artifacts,
        });
    } catch (error) {
        logger.error('Document assembly failed', { error: describeError(error) });
        throw error instanceof ReportError
            ? error
            : new ReportError(`Document assembly failed: ${describeError(error)}`, error);
    }

    logger.info('Report ready', { path: documentPath, recovered: recovered.join(',') });
    return { ...base, documentPath, state, recovered };
}
