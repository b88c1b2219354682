/**
 * Default collaborators for a configured environment.
 */

import type { ReportFlowConfig } from '../config';
import { modelsByNode } from '../config';
import type { Checkpointer } from '../graph/checkpointer';
import { FileCheckpointer } from '../graph/file-checkpointer';
import type { Logger } from '../lib/logger';
import { consoleLogger, createFilteredLogger } from '../lib/logger';
import type { FetchAdapter } from '../lib/request';
import { createScriptChartRunner } from './charts';
import type { ChartRunner, DataProfiler, DocumentAssembler, LanguageModel } from './collaborators';
import { createLatexAssembler } from './document';
import { createOllamaModel, withLanguageModelRetry } from './llm';
import { createCsvProfiler } from './profiler';

export interface ReportCollaborators {
    model: LanguageModel;
    profiler: DataProfiler;
    charts: ChartRunner;
    assembler: DocumentAssembler;
    checkpointer?: Checkpointer;
    logger: Logger;
}

export interface CollaboratorOverrides {
    logger?: Logger;
    adapter?: FetchAdapter;
}

export function createReportCollaborators(
    config: ReportFlowConfig,
    overrides: CollaboratorOverrides = {}
): ReportCollaborators {
    const logger = overrides.logger ?? createFilteredLogger(consoleLogger, config.logLevel);

    const model = withLanguageModelRetry(
        createOllamaModel({
            baseUrl: config.ollamaUrl,
            model: config.models.default,
            models: modelsByNode(config.models),
            timeoutMs: config.nodeTimeoutMs,
            adapter: overrides.adapter,
            logger,
        }),
        { logger },
    );

    return {
        model,
        profiler: createCsvProfiler(),
        charts: createScriptChartRunner({ model, outputDir: config.outputDir, logger }),
        assembler: createLatexAssembler({ outputDir: config.outputDir, logger }),
        checkpointer: config.checkpointDir ? new FileCheckpointer({ directory: config.checkpointDir }) : undefined,
        logger,
    };
}
