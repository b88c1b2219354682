/**
 * Language model access: retry wrapper and an Ollama HTTP client.
 */

import { z } from 'zod';
import type { Logger } from '../lib/logger';
import { noopLogger } from '../lib/logger';
import { describeError } from '../lib/errors';
import type { FetchAdapter } from '../lib/request';
import { APIError, defaultFetchAdapter, postJson } from '../lib/request';
import { withRetry } from '../lib/retry';
import type { GenerateRequest, LanguageModel } from './collaborators';

export class EmptyResponseError extends Error {
    constructor(public readonly node: string) {
        super(`Language model returned an empty response for "${node}"`);
        this.name = 'EmptyResponseError';
    }
}

export interface LanguageModelRetryOptions {
    /** Total attempts (default: 3) */
    attempts?: number;
    /** Delay before the second attempt in ms (default: 2000) */
    delayMs?: number;
    /** Delay multiplier (default: 2) */
    factor?: number;
    logger?: Logger;
}

/**
 * Retry empty or failed generations with exponential backoff.
 * Once attempts are spent the wrapped model answers with an empty string.
 */
export function withLanguageModelRetry(
    model: LanguageModel,
    options: LanguageModelRetryOptions = {}
): LanguageModel {
    const { attempts = 3, delayMs = 2000, factor = 2, logger = noopLogger } = options;

    return {
        async generate(request: GenerateRequest): Promise<string> {
            try {
                return await withRetry(async () => {
                    const text = (await model.generate(request)).trim();
                    if (!text) {
                        throw new EmptyResponseError(request.node);
                    }
                    return text;
                }, {
                    attempts,
                    delayMs,
                    factor,
                    signal: request.signal,
                    onRetry: (error, attempt, delay) => {
                        logger.warn('Language model call failed, retrying', {
                            node: request.node,
                            attempt,
                            delayMs: delay,
                            error: describeError(error),
                        });
                    },
                });
            } catch (error) {
                logger.error('Language model call gave up', {
                    node: request.node,
                    attempts,
                    error: describeError(error),
                });
                return '';
            }
        },
    };
}

export interface OllamaModelOptions {
    /** Server URL (default: 'http://localhost:11434') */
    baseUrl?: string;
    /** Model used when `models` has no entry for the node (default: 'gemma3') */
    model?: string;
    /** Node name -> model name */
    models?: Record<string, string>;
    /** Sampling temperature (default: 0.1) */
    temperature?: number;
    /** Request timeout in ms (default: 90000) */
    timeoutMs?: number;
    adapter?: FetchAdapter;
    logger?: Logger;
}

const generateResponseSchema = z.object({
    response: z.string(),
});

/**
 * LanguageModel backed by Ollama's `/api/generate` endpoint.
 */
export function createOllamaModel(options: OllamaModelOptions = {}): LanguageModel {
    const baseUrl = (options.baseUrl ?? 'http://localhost:11434').replace(/\/+$/, '');
    const defaultModel = options.model ?? 'gemma3';
    const models = options.models ?? {};
    const temperature = options.temperature ?? 0.1;
    const logger = options.logger ?? noopLogger;
    const context = {
        logger,
        adapter: options.adapter ?? defaultFetchAdapter,
        defaultTimeout: options.timeoutMs ?? 90_000,
    };

    return {
        async generate(request: GenerateRequest): Promise<string> {
            const model = models[request.node] ?? defaultModel;
            const body: Record<string, unknown> = {
                model,
                prompt: request.prompt,
                stream: false,
                options: { temperature },
            };
            if (request.json) {
                body.format = 'json';
            }

            const data = await postJson(`${baseUrl}/api/generate`, body, context, { signal: request.signal });
            const parsed = generateResponseSchema.safeParse(data);
            if (!parsed.success) {
                throw new APIError(`Unexpected response from model "${model}"`, 502, 'INVALID_RESPONSE');
            }
            return parsed.data.response.trim();
        },
    };
}
