/**
 * Chart runner that asks the language model for a plotting script and
 * executes it. Charts are reported by the script as `PATH:<file>` lines;
 * when none are printed, new PNG files in the output directory are used.
 * Any failure is logged and resolves with no charts.
 */

import { randomUUID } from 'crypto';
import { mkdir, readdir, rm, writeFile } from 'fs/promises';
import path from 'path';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import { describeError } from '../lib/errors';
import type { ChartRequest, ChartRunner, CommandRunner, LanguageModel } from './collaborators';
import { runCommand } from './process';
import { readCsv } from './profiler';
import { extractCode } from './text';

export interface ScriptChartRunnerOptions {
    model: LanguageModel;
    /** Directory charts are written to (default: 'output') */
    outputDir?: string;
    /** Interpreter for the generated script (default: 'python3') */
    interpreter?: string;
    /** Script time limit in ms (default: 120000) */
    timeoutMs?: number;
    runCommand?: CommandRunner;
    logger?: Logger;
}

export function createScriptChartRunner(options: ScriptChartRunnerOptions): ChartRunner {
    const outputDir = path.resolve(options.outputDir ?? 'output');
    const interpreter = options.interpreter ?? 'python3';
    const timeoutMs = options.timeoutMs ?? 120_000;
    const run = options.runCommand ?? runCommand;
    const logger = options.logger ?? noopLogger;

    async function generateCharts(request: ChartRequest): Promise<string[]> {
        await mkdir(outputDir, { recursive: true });

        let columns = 'Unknown';
        try {
            columns = `[${(await readCsv(request.dataPath)).columns.join(', ')}]`;
        } catch (error) {
            logger.debug('Could not read CSV header for chart prompt', { error: describeError(error) });
        }

        const prompt = buildChartPrompt(path.resolve(request.dataPath), columns, request.goal, outputDir);
        const code = extractCode(await options.model.generate({
            node: 'charts',
            prompt,
            json: false,
            signal: request.signal,
        }));
        if (!code.trim()) {
            logger.warn('Chart model returned no script');
            return [];
        }

        const before = await listPngFiles(outputDir);
        const script = path.join(outputDir, `chart_${randomUUID().slice(0, 8)}.py`);
        try {
            await writeFile(script, code, 'utf8');
            const result = await run(interpreter, [script], { cwd: outputDir, timeoutMs, signal: request.signal });
            if (result.code !== 0) {
                logger.error('Chart script failed', { code: result.code, stderr: result.stderr.slice(-2000) });
                return [];
            }

            const reported = parseReportedPaths(result.stdout);
            if (reported.length > 0) {
                return reported;
            }
            const after = await listPngFiles(outputDir);
            return after.filter(file => !before.includes(file));
        } finally {
            await rm(script, { force: true });
        }
    }

    return {
        async run(request: ChartRequest): Promise<string[]> {
            try {
                return await generateCharts(request);
            } catch (error) {
                logger.error('Chart generation failed', { error: describeError(error) });
                return [];
            }
        },
    };
}

/**
 * Paths printed as `PATH:<file>` lines.
 */
export function parseReportedPaths(stdout: string): string[] {
    return stdout
        .split(/\r?\n/)
        .filter(line => line.includes('PATH:'))
        .map(line => line.slice(line.lastIndexOf('PATH:') + 'PATH:'.length).trim())
        .filter(file => file !== '');
}

async function listPngFiles(directory: string): Promise<string[]> {
    const entries = await readdir(directory);
    return entries
        .filter(entry => entry.toLowerCase().endsWith('.png'))
        .map(entry => path.join(directory, entry))
        .sort();
}

function buildChartPrompt(dataPath: string, columns: string, goal: string, outputDir: string): string {
    return `You are a Senior Data Scientist. Write a Python script to visualize this CSV: '${dataPath}'.

DATA SCHEMA:
Columns: ${columns}

GOAL:
${goal}
- Automatically decide the best charts.

STRICT RULES:
1. TOP LINE: 'import matplotlib; matplotlib.use("Agg"); import matplotlib.pyplot as plt; import pandas as pd'
2. CLEANING: Use 'df.dropna()' before plotting.
3. DESIGN: Use plt.style.use('ggplot'), add titles, and clear labels.
4. OUTPUT: Save to '${outputDir}' with unique names.
5. LOGGING: For EVERY file saved, you MUST print: PATH:<full_path>

Provide ONLY the Python code block.`;
}
