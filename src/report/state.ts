/**
 * Shared state of a report session.
 */

import type { StateSchema } from '../graph/channels';
import { append, merge, overwrite } from '../graph/channels';

/** Analysis goals produced by the planner; any goal may be missing */
export interface AnalysisPlan {
    kpiGoal?: string;
    statsGoal?: string;
    vizGoal?: string;
}

export type SupervisorReview = 'approve' | 'retry';

export interface ReportState {
    csvPath: string;
    dataSummary: string;
    plan: AnalysisPlan;
    /** Chart files, in branch declaration order */
    artifacts: string[];
    /** Section name -> section body */
    reportSections: Record<string, string>;
    supervisorReview?: SupervisorReview;
    /** Supervisor retry counter; bounded by the graph ceiling */
    iteration: number;
}

/** Sections the supervisor requires before approving */
export const REQUIRED_SECTIONS = ['kpis', 'stats', 'narrative'] as const;

export type RequiredSection = typeof REQUIRED_SECTIONS[number];

export const reportStateSchema: StateSchema<ReportState> = {
    csvPath: overwrite<string>(),
    dataSummary: overwrite<string>(),
    plan: overwrite<AnalysisPlan>(),
    artifacts: append<string>(),
    reportSections: merge<string>(),
    supervisorReview: overwrite<SupervisorReview | undefined>(),
    iteration: overwrite<number>(),
};

export function createInitialReportState(csvPath: string): ReportState {
    return {
        csvPath,
        dataSummary: '',
        plan: {},
        artifacts: [],
        reportSections: {},
        iteration: 0,
    };
}

/**
 * Required sections absent from the state.
 */
export function missingSections(state: Pick<ReportState, 'reportSections'>): RequiredSection[] {
    return REQUIRED_SECTIONS.filter(section => !(section in state.reportSections));
}
