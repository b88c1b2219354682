import { LoggerTracer, loadConfig } from '../src';
import { createReportCollaborators, runReportSession } from '../src/node';

// Report Session Example
// Needs an Ollama server, python3 with matplotlib and pandas, and pdflatex.
// Run with: npx tsx examples/report-session.ts

async function main() {
    const config = loadConfig();
    const { model, profiler, charts, assembler, checkpointer, logger } = createReportCollaborators(config);

    const controller = new AbortController();
    process.once('SIGINT', () => controller.abort());

    const result = await runReportSession({
        csvPath: config.dataSource,
        sessionId: process.env.REPORT_SESSION_ID,
        title: 'Data Analysis Report',
        model,
        profiler,
        charts,
        assembler,
        checkpointer,
        logger,
        // spans show up at REPORT_LOG_LEVEL=debug
        tracer: new LoggerTracer(logger),
        maxIterations: config.maxIterations,
        maxConcurrency: config.maxConcurrency,
        nodeTimeoutMs: config.nodeTimeoutMs,
        signal: controller.signal,
    });

    if (result.status === 'cancelled') {
        console.log(`Session ${result.sessionId} cancelled; rerun with REPORT_SESSION_ID=${result.sessionId} to resume.`);
        return;
    }

    console.log('Report:', result.documentPath);
    console.log('Completed nodes:', result.completed.join(' -> '));
    if (result.recovered.length > 0) {
        console.log('Recovered outside the graph:', result.recovered.join(', '));
    }
    if (result.ceilingReached) {
        console.log('Stopped at the iteration ceiling.');
    }
    for (const warning of result.warnings) {
        console.warn('Checkpoint warning:', warning.message);
    }
}

main().catch((error: unknown) => {
    console.error('Report failed:', error);
    process.exitCode = 1;
});
