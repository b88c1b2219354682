/**
 * Report workflow:
 *
 *   planner -> { kpi, stats, charts } -> writer -> supervisor
 *   supervisor --approve--> END
 *   supervisor --retry----> planner   (bounded by the iteration ceiling)
 */

import type { CompiledGraph } from '../graph/executor';
import { StateGraph } from '../graph/state-graph';
import type { RetryPolicy } from '../graph/types';
import { END } from '../graph/types';
import type { ReportNodeDeps } from './nodes';
import {
    createChartsNode,
    createPlannerNode,
    createSectionNode,
    createSupervisorNode,
    createWriterNode,
    routeSupervisor,
} from './nodes';
import type { ReportState } from './state';
import { reportStateSchema } from './state';

export interface ReportGraphOptions {
    /** Supervisor retry budget (default: 2) */
    maxIterations?: number;
    maxConcurrency?: number;
    nodeTimeoutMs?: number;
    /** Retry policy for the chart node, whose script may fail transiently */
    chartRetry?: RetryPolicy;
}

export function buildReportGraph(deps: ReportNodeDeps, options: ReportGraphOptions = {}): CompiledGraph<ReportState> {
    const maxIterations = options.maxIterations ?? 2;

    return new StateGraph<ReportState>(reportStateSchema)
        .addNode('planner', createPlannerNode(deps))
        .addNode('kpi', createSectionNode('kpi', deps))
        .addNode('stats', createSectionNode('stats', deps))
        .addNode('charts', createChartsNode(deps), { retry: options.chartRetry })
        .addNode('writer', createWriterNode(deps))
        .addNode('supervisor', createSupervisorNode(maxIterations))
        .setEntryPoint('planner')
        .addEdge('planner', 'kpi')
        .addEdge('planner', 'stats')
        .addEdge('planner', 'charts')
        .addEdge('kpi', 'writer')
        .addEdge('stats', 'writer')
        .addEdge('charts', 'writer')
        .addEdge('writer', 'supervisor')
        .addConditionalEdges('supervisor', routeSupervisor, {
            approve: END,
            retry: 'planner',
        })
        .compile({
            ceiling: { field: 'iteration', maxIterations },
            maxConcurrency: options.maxConcurrency,
            nodeTimeoutMs: options.nodeTimeoutMs,
        });
}
