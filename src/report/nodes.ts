/**
 * Report pipeline nodes.
 */

import type { NodeFunction, Router } from '../graph/types';
import { describeError } from '../lib/errors';
import type { ChartRunner, DataProfiler, LanguageModel } from './collaborators';
import { DEFAULT_PLAN, parsePlan } from './plan';
import type { ReportState, SupervisorReview } from './state';
import { missingSections } from './state';
import { escapeLatex, repairItemize } from './text';

export interface ReportNodeDeps {
    model: LanguageModel;
    profiler: DataProfiler;
    charts: ChartRunner;
}

export type SectionKind = 'kpi' | 'stats';

/** State key each section node writes */
const SECTION_KEYS: Record<SectionKind, string> = {
    kpi: 'kpis',
    stats: 'stats',
};

/**
 * Profile the data and ask the model for analysis goals.
 */
export function createPlannerNode(deps: ReportNodeDeps): NodeFunction<ReportState> {
    return async (state, ctx) => {
        let dataSummary: string;
        try {
            dataSummary = await deps.profiler.summarize(state.csvPath);
        } catch (error) {
            ctx.logger.warn('Data profiling failed', { path: state.csvPath, error: describeError(error) });
            dataSummary = `Error loading CSV headers: ${describeError(error)}`;
        }

        const text = await deps.model.generate({
            node: ctx.node,
            prompt: buildPlannerPrompt(dataSummary),
            json: true,
            signal: ctx.signal,
        });
        const { plan, usedFallback } = parsePlan(text);
        if (usedFallback) {
            ctx.logger.warn('Planner output unreadable, using default goals');
        }

        return { plan, dataSummary };
    };
}

/**
 * Write one analysis section from the data summary and the plan's goal.
 * An empty answer leaves the section missing for the supervisor to catch.
 */
export function createSectionNode(kind: SectionKind, deps: Pick<ReportNodeDeps, 'model'>): NodeFunction<ReportState> {
    return async (state, ctx) => {
        const goal = kind === 'kpi'
            ? state.plan.kpiGoal ?? DEFAULT_PLAN.kpiGoal
            : state.plan.statsGoal ?? DEFAULT_PLAN.statsGoal;

        const text = await deps.model.generate({
            node: ctx.node,
            prompt: buildSectionPrompt(kind, escapeLatex(state.dataSummary), goal),
            json: false,
            signal: ctx.signal,
        });
        if (!text.trim()) {
            ctx.logger.warn('Section generation returned nothing', { section: kind });
            return undefined;
        }

        const repaired = repairItemize(text.trim());
        if (repaired.added > 0) {
            ctx.logger.info('Closed unbalanced itemize blocks', { section: kind, added: repaired.added });
        }
        return { reportSections: { [SECTION_KEYS[kind]]: repaired.text } };
    };
}

/**
 * Run the chart collaborator with the plan's visualization goal.
 */
export function createChartsNode(deps: Pick<ReportNodeDeps, 'charts'>): NodeFunction<ReportState> {
    return async (state, ctx) => {
        const artifacts = await deps.charts.run({
            goal: state.plan.vizGoal ?? DEFAULT_PLAN.vizGoal,
            dataPath: state.csvPath,
            signal: ctx.signal,
        });
        if (artifacts.length === 0) {
            ctx.logger.warn('No charts produced');
        }
        return { artifacts };
    };
}

/**
 * Compose the narrative document from the KPI and statistics sections.
 */
export async function writeNarrative(
    model: LanguageModel,
    sections: Record<string, string>,
    ctx: { node: string; signal?: AbortSignal }
): Promise<string> {
    const text = await model.generate({
        node: ctx.node,
        prompt: buildWriterPrompt(sections.kpis ?? '', sections.stats ?? ''),
        json: false,
        signal: ctx.signal,
    });
    return text.trim();
}

export function createWriterNode(deps: Pick<ReportNodeDeps, 'model'>): NodeFunction<ReportState> {
    return async (state, ctx) => {
        const narrative = await writeNarrative(deps.model, state.reportSections, ctx);
        if (!narrative) {
            ctx.logger.warn('Writer returned nothing');
            return undefined;
        }
        return { reportSections: { narrative } };
    };
}

/**
 * Quality check: approve once every required section exists or the
 * retry budget is spent, otherwise ask for another pass.
 */
export function createSupervisorNode(maxIterations: number): NodeFunction<ReportState> {
    return (state, ctx) => {
        const missing = missingSections(state);
        if (missing.length === 0 || state.iteration >= maxIterations) {
            ctx.logger.info('Review passed', { iteration: state.iteration, missing: missing.join(',') });
            return { supervisorReview: 'approve' };
        }

        ctx.logger.warn('Review failed, retrying', { iteration: state.iteration + 1, missing: missing.join(',') });
        return { supervisorReview: 'retry', iteration: state.iteration + 1 };
    };
}

export const routeSupervisor: Router<ReportState, SupervisorReview> = state => state.supervisorReview ?? 'retry';

function buildPlannerPrompt(dataSummary: string): string {
    return `Based on the data schema
${dataSummary}
define an analysis and visualization strategy.

Your strategy must include:
1. A 'viz_goal' that requests a comparison bar chart between the main categories.
2. Instructions for secondary plots such as time-series trends or value distributions.

Return the plan in JSON format:
{
  "kpi_goal": "...",
  "stats_goal": "...",
  "viz_goal": "..."
}`;
}

function buildSectionPrompt(kind: SectionKind, summary: string, goal: string): string {
    const persona = kind === 'stats' ? 'Lead Statistical Analyst' : 'Senior Business Consultant';
    return `ROLE: ${persona} (LaTeX Specialist)
DATA: ${summary}
GOAL: ${goal}

INSTRUCTIONS:
Generate a professional report section using raw LaTeX code.
DO NOT include a preamble or \\begin{document}.

STRUCTURE:
\\subsection*{${kind.toUpperCase()} Analysis}
\\textbf{Key Finding:} [One sentence]
\\begin{itemize}
  \\item \\textbf{Trend:} ...
  \\item \\textbf{Metrics:} ...
  \\item \\textbf{Strategic "So What?":}
    \\begin{itemize}
      \\item ...
    \\end{itemize}
\\end{itemize}

STRICT RULES:
- Output ONLY the LaTeX code.
- Ensure every \\begin{itemize} has a matching \\end{itemize}.`;
}

function buildWriterPrompt(kpis: string, stats: string): string {
    return `ROLE: LaTeX Document Architect

GOAL: Generate a complete, valid LaTeX document based on the provided KPI and STATS blocks.

INPUT DATA:
KPI Block: ${kpis}
STATS Block: ${stats}

STRICT LATEX TEMPLATE RULES:
1. DOCUMENT CLASS: Use \\documentclass[11pt]{article}
2. PACKAGES: Include \\usepackage{graphicx}, \\usepackage{geometry}, \\usepackage{booktabs}
3. GEOMETRY: Use \\geometry{margin=1in, top=0.5in}
4. PREAMBLE: Define \\title, \\author and \\date{\\today}
5. BODY:
   - Start with \\begin{document} and call \\maketitle.
   - Insert a 2-3 sentence Executive Summary.
   - Insert the KPI Block.
   - Insert the STATS Block.
   - End with \\section*{Visual Analysis} and then \\end{document}.

STRICT FORMATTING:
- Escape all special characters: % as \\% and $ as \\$.
- NO Markdown code blocks.
- Output ONLY the LaTeX code starting from \\documentclass.`;
}
