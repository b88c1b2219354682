import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { DEFAULT_REPORT_TITLE, FALLBACK_CHART_GOAL, runReportSession } from '../../../src/report/session';
import { MemoryCheckpointer } from '../../../src/graph/checkpointer';
import { createScriptChartRunner } from '../../../src/report/charts';
import { ReportError } from '../../../src/lib/errors';
import { FakeAssembler, FakeCharts, FakeModel, FakeProfiler, defaultAnswers } from '../../mocks/report';
import { createRecordingLogger } from '../../mocks/observability';

describe('runReportSession', () => {
    let directory: string;
    let csvPath: string;

    beforeEach(async () => {
        directory = await mkdtemp(path.join(os.tmpdir(), 'report-flow-session-'));
        csvPath = path.join(directory, 'sales.csv');
        await writeFile(csvPath, 'region,units\nNorth,3\n', 'utf8');
    });

    afterEach(async () => {
        await rm(directory, { recursive: true, force: true });
    });

    it('should run the graph and assemble the document', async () => {
        const assembler = new FakeAssembler();

        const result = await runReportSession({
            csvPath,
            sessionId: 'sales-q1',
            model: new FakeModel(defaultAnswers()),
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler,
        });

        expect(result.sessionId).toBe('sales-q1');
        expect(result.status).toBe('done');
        expect(result.documentPath).toBe('/reports/report.pdf');
        expect(result.recovered).toEqual([]);
        expect(result.completed).toEqual(['planner', 'kpi', 'stats', 'charts', 'writer', 'supervisor']);
        expect(assembler.requests).toEqual([{
            title: DEFAULT_REPORT_TITLE,
            sections: {
                kpis: '\\subsection*{KPI Analysis} Revenue 1200',
                stats: '\\subsection*{STATS Analysis} Mean price 4.2',
                narrative: '\\documentclass[11pt]{article}\n\\begin{document}\nNarrative\n\\end{document}',
            },
            artifacts: ['chart_a.png'],
        }]);
    });

    it('should pass a custom title to the assembler', async () => {
        const assembler = new FakeAssembler();

        await runReportSession({
            csvPath,
            title: 'Quarterly Sales',
            model: new FakeModel(defaultAnswers()),
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler,
        });

        expect(assembler.requests[0].title).toBe('Quarterly Sales');
    });

    it('should reject a missing data file before running anything', async () => {
        const model = new FakeModel(defaultAnswers());
        const missing = path.join(directory, 'missing.csv');

        const error = await runReportSession({
            csvPath: missing,
            model,
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler: new FakeAssembler(),
        }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ReportError);
        if (error instanceof ReportError) {
            expect(error.message).toBe(`Source file not found: ${missing}`);
        }
        expect(model.requests).toEqual([]);
    });

    it('should recover charts the graph did not produce', async () => {
        const { logger, entries } = createRecordingLogger();
        const charts = new FakeCharts([[], ['late.png']]);
        const assembler = new FakeAssembler();

        const result = await runReportSession({
            csvPath,
            model: new FakeModel(defaultAnswers()),
            profiler: new FakeProfiler(),
            charts,
            assembler,
            logger,
        });

        expect(result.recovered).toEqual(['charts']);
        expect(result.state.artifacts).toEqual(['late.png']);
        expect(charts.requests).toHaveLength(2);
        expect(charts.requests[1].goal).toBe('Bar chart of units');
        expect(charts.requests[1].dataPath).toBe(csvPath);
        expect(assembler.requests[0].artifacts).toEqual(['late.png']);
        expect(entries.some(e => e.message === 'Graph produced no charts, running chart recovery')).toBe(true);
    });

    it('should recover charts after the chart script could not start', async () => {
        let runs = 0;
        const model = new FakeModel({ ...defaultAnswers(), charts: '```python\nprint("PATH:/charts/late.png")\n```' });
        const charts = createScriptChartRunner({
            model,
            outputDir: path.join(directory, 'charts'),
            runCommand: async () => {
                runs++;
                if (runs === 1) {
                    throw new Error('spawn python3 ENOENT');
                }
                return { code: 0, stdout: 'PATH:/charts/late.png\n', stderr: '' };
            },
        });
        const assembler = new FakeAssembler();

        const result = await runReportSession({
            csvPath,
            model,
            profiler: new FakeProfiler(),
            charts,
            assembler,
        });

        expect(result.status).toBe('done');
        expect(result.completed).toContain('charts');
        expect(result.recovered).toEqual(['charts']);
        expect(model.callsFor('charts')).toBe(2);
        expect(assembler.requests[0].artifacts).toEqual(['/charts/late.png']);
    });

    it('should use the fallback chart goal when the plan has none', async () => {
        const charts = new FakeCharts([[], ['late.png']]);

        await runReportSession({
            csvPath,
            model: new FakeModel({ ...defaultAnswers(), planner: '{}' }),
            profiler: new FakeProfiler(),
            charts,
            assembler: new FakeAssembler(),
        });

        expect(charts.requests[0].goal).toBe('Data distribution');
        expect(charts.requests[1].goal).toBe(FALLBACK_CHART_GOAL);
    });

    it('should recover a narrative the graph did not produce', async () => {
        const model = new FakeModel({
            ...defaultAnswers(),
            writer: (call) => (call <= 3 ? '' : 'Recovered narrative'),
        });
        const assembler = new FakeAssembler();

        const result = await runReportSession({
            csvPath,
            model,
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler,
            maxIterations: 2,
        });

        expect(model.callsFor('writer')).toBe(4);
        expect(result.recovered).toEqual(['narrative']);
        expect(result.state.reportSections.narrative).toBe('Recovered narrative');
        expect(assembler.requests[0].sections.narrative).toBe('Recovered narrative');
    });

    it('should still assemble when narrative recovery comes back empty', async () => {
        const assembler = new FakeAssembler();

        const result = await runReportSession({
            csvPath,
            model: new FakeModel({ ...defaultAnswers(), writer: '' }),
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler,
            maxIterations: 0,
        });

        expect(result.recovered).toEqual(['narrative']);
        expect(result.documentPath).toBe('/reports/report.pdf');
        expect(assembler.requests[0].sections.narrative).toBeUndefined();
    });

    it('should stop without a document when cancelled', async () => {
        const controller = new AbortController();
        controller.abort();
        const assembler = new FakeAssembler();

        const result = await runReportSession({
            csvPath,
            model: new FakeModel(defaultAnswers()),
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler,
            signal: controller.signal,
        });

        expect(result.status).toBe('cancelled');
        expect(result.documentPath).toBeNull();
        expect(result.recovered).toEqual([]);
        expect(assembler.requests).toEqual([]);
    });

    it('should wrap assembly failures', async () => {
        const error = await runReportSession({
            csvPath,
            model: new FakeModel(defaultAnswers()),
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler: new FakeAssembler(new Error('pdflatex not installed')),
        }).catch((e: unknown) => e);

        expect(error).toBeInstanceOf(ReportError);
        if (error instanceof ReportError) {
            expect(error.message).toBe('Document assembly failed: pdflatex not installed');
        }
    });

    it('should return a completed session from its checkpoint', async () => {
        const checkpointer = new MemoryCheckpointer();
        const options = {
            csvPath,
            sessionId: 'sales-q1',
            profiler: new FakeProfiler(),
            charts: new FakeCharts(),
            assembler: new FakeAssembler(),
            checkpointer,
        };
        await runReportSession({ ...options, model: new FakeModel(defaultAnswers()) });
        const model = new FakeModel(defaultAnswers());

        const again = await runReportSession({ ...options, model });

        expect(model.requests).toEqual([]);
        expect(again.documentPath).toBe('/reports/report.pdf');
        expect((await checkpointer.load('sales-q1'))?.status).toBe('done');
    });
});
