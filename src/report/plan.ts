import { z } from 'zod';
import type { AnalysisPlan } from './state';

/** Goals used when the planner's output cannot be read */
export const DEFAULT_PLAN: Readonly<Required<AnalysisPlan>> = Object.freeze({
    kpiGoal: 'General KPIs',
    statsGoal: 'Basic statistics',
    vizGoal: 'Data distribution',
});

const planResponseSchema = z.object({
    kpi_goal: z.string().optional(),
    stats_goal: z.string().optional(),
    viz_goal: z.string().optional(),
});

export interface ParsedPlan {
    plan: AnalysisPlan;
    /** True when the default goals were used */
    usedFallback: boolean;
}

/**
 * Read the planner's JSON answer. Missing goals stay missing; text that
 * is not a JSON object of string goals yields the default plan.
 */
export function parsePlan(text: string): ParsedPlan {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch {
        return { plan: { ...DEFAULT_PLAN }, usedFallback: true };
    }

    const result = planResponseSchema.safeParse(raw);
    if (!result.success) {
        return { plan: { ...DEFAULT_PLAN }, usedFallback: true };
    }

    const plan: AnalysisPlan = {};
    if (result.data.kpi_goal !== undefined) plan.kpiGoal = result.data.kpi_goal;
    if (result.data.stats_goal !== undefined) plan.statsGoal = result.data.stats_goal;
    if (result.data.viz_goal !== undefined) plan.vizGoal = result.data.viz_goal;
    return { plan, usedFallback: false };
}
