import { describe, it, expect } from 'vitest';
import { loadConfig, modelsByNode } from '../../src/config';
import { ConfigError } from '../../src/lib/errors';

describe('loadConfig', () => {
    it('should apply defaults to an empty environment', () => {
        expect(loadConfig({})).toEqual({
            dataSource: 'data.csv',
            ollamaUrl: 'http://localhost:11434',
            models: {
                default: 'gemma3',
                planner: 'gemma3',
                writer: 'gemma3',
                reporter: 'gemma3',
                viz: 'gemma3',
            },
            maxIterations: 2,
            maxConcurrency: 3,
            nodeTimeoutMs: 90000,
            logLevel: 'info',
            checkpointDir: undefined,
            outputDir: 'output',
        });
    });

    it('should read and coerce variables', () => {
        const config = loadConfig({
            DATA_SOURCE: ' data/sales.csv ',
            OLLAMA_URL: 'http://ollama:11434',
            REPORT_MODEL: 'llama3',
            VIZ_MODEL: 'codellama',
            REPORT_MAX_ITERATIONS: '0',
            REPORT_MAX_CONCURRENCY: '1',
            REPORT_NODE_TIMEOUT_MS: '5000',
            REPORT_LOG_LEVEL: 'debug',
            REPORT_CHECKPOINT_DIR: '.checkpoints',
            REPORT_OUTPUT_DIR: 'reports',
        });

        expect(config.dataSource).toBe('data/sales.csv');
        expect(config.ollamaUrl).toBe('http://ollama:11434');
        expect(config.models).toEqual({
            default: 'llama3',
            planner: 'llama3',
            writer: 'llama3',
            reporter: 'llama3',
            viz: 'codellama',
        });
        expect(config.maxIterations).toBe(0);
        expect(config.maxConcurrency).toBe(1);
        expect(config.nodeTimeoutMs).toBe(5000);
        expect(config.logLevel).toBe('debug');
        expect(config.checkpointDir).toBe('.checkpoints');
        expect(config.outputDir).toBe('reports');
    });

    it('should treat blank variables as unset', () => {
        expect(loadConfig({ REPORT_MODEL: '   ', REPORT_CHECKPOINT_DIR: '' }).models.default).toBe('gemma3');
        expect(loadConfig({ REPORT_CHECKPOINT_DIR: '' }).checkpointDir).toBeUndefined();
    });

    it('should list every invalid variable', () => {
        try {
            loadConfig({ REPORT_MAX_CONCURRENCY: '0', REPORT_LOG_LEVEL: 'loud' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                expect(error.issues).toHaveLength(2);
                expect(error.issues[0]).toMatch(/^REPORT_MAX_CONCURRENCY: /);
                expect(error.issues[1]).toMatch(/^REPORT_LOG_LEVEL: /);
                expect(error.message).toMatch(/^Invalid configuration: REPORT_MAX_CONCURRENCY: /);
            }
        }
    });

    it('should reject a node timeout beyond the timer limit', () => {
        expect(loadConfig({ REPORT_NODE_TIMEOUT_MS: '2147483647' }).nodeTimeoutMs).toBe(2147483647);
        expect(() => loadConfig({ REPORT_NODE_TIMEOUT_MS: '3000000000' }))
            .toThrow(/^Invalid configuration: REPORT_NODE_TIMEOUT_MS: /);
    });

    it('should reject a malformed server URL', () => {
        expect(() => loadConfig({ OLLAMA_URL: 'not a url' })).toThrow('Invalid configuration: OLLAMA_URL: Invalid url');
    });
});

describe('modelsByNode', () => {
    it('should map graph nodes to their models', () => {
        expect(modelsByNode({ default: 'd', planner: 'p', writer: 'w', reporter: 'r', viz: 'v' })).toEqual({
            planner: 'p',
            kpi: 'r',
            stats: 'r',
            writer: 'w',
            charts: 'v',
        });
    });
});
