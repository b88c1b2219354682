/**
 * Node.js specific exports.
 * Contains modules that require Node.js APIs (fs, path, child_process).
 */

// File checkpointer (requires fs)
export { FileCheckpointer } from '../graph/file-checkpointer';
export type { FileCheckpointerConfig } from '../graph/file-checkpointer';

// Report state and graph
export {
    REQUIRED_SECTIONS,
    reportStateSchema,
    createInitialReportState,
    missingSections,
} from '../report/state';
export type { ReportState, AnalysisPlan, SupervisorReview, RequiredSection } from '../report/state';
export { buildReportGraph } from '../report/graph';
export type { ReportGraphOptions } from '../report/graph';
export {
    createPlannerNode,
    createSectionNode,
    createChartsNode,
    createWriterNode,
    createSupervisorNode,
    routeSupervisor,
    writeNarrative,
} from '../report/nodes';
export type { ReportNodeDeps, SectionKind } from '../report/nodes';
export { DEFAULT_PLAN, parsePlan } from '../report/plan';
export type { ParsedPlan } from '../report/plan';

// Session runner
export {
    runReportSession,
    FALLBACK_CHART_GOAL,
    DEFAULT_REPORT_TITLE,
} from '../report/session';
export type { ReportSessionOptions, ReportSessionResult, RecoveryStep } from '../report/session';

// Collaborators
export type {
    LanguageModel,
    GenerateRequest,
    DataProfiler,
    ChartRunner,
    ChartRequest,
    DocumentAssembler,
    DocumentRequest,
    CommandRunner,
    CommandOptions,
    CommandResult,
} from '../report/collaborators';
export { createOllamaModel, withLanguageModelRetry, EmptyResponseError } from '../report/llm';
export type { OllamaModelOptions, LanguageModelRetryOptions } from '../report/llm';
export { createCsvProfiler, parseCsv, parseCsvLine, splitCsvRecords, readCsv, describeTable } from '../report/profiler';
export type { CsvTable } from '../report/profiler';
export { createScriptChartRunner, parseReportedPaths } from '../report/charts';
export type { ScriptChartRunnerOptions } from '../report/charts';
export { createLatexAssembler, renderDocument } from '../report/document';
export type { LatexAssemblerOptions } from '../report/document';
export { runCommand } from '../report/process';
export { createReportCollaborators } from '../report/defaults';
export type { ReportCollaborators, CollaboratorOverrides } from '../report/defaults';

// Text helpers
export { cleanContent, extractCode, escapeLatex, repairItemize, looksLikeLatex } from '../report/text';
