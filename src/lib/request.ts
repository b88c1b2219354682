import type { Logger } from './logger';
import { isRecord } from './utils';

/**
 * FetchAdapter interface for custom HTTP implementations.
 * Allows users to replace the default fetch with undici, got, etc.
 */
export interface FetchAdapter {
    fetch(url: string, init: RequestInit): Promise<Response>;
}

/**
 * Default adapter using native fetch
 */
export const defaultFetchAdapter: FetchAdapter = {
    fetch: (url, init) => fetch(url, init),
};

export interface RequestContext {
    logger: Logger;
    adapter: FetchAdapter;
    defaultTimeout: number;
}

export interface RequestOptions {
    timeout?: number;
    headers?: Record<string, string>;
    signal?: AbortSignal;
}

export class APIError extends Error {
    status: number;
    code?: string;

    constructor(message: string, status: number, code?: string) {
        super(message);
        this.name = 'APIError';
        this.status = status;
        this.code = code;
    }
}

/**
 * POST a JSON body and return the parsed JSON response.
 * The response is returned as `unknown`; callers validate its shape.
 */
export async function postJson(
    url: string,
    body: unknown,
    context: RequestContext,
    options: RequestOptions = {}
): Promise<unknown> {
    const { logger, adapter, defaultTimeout } = context;
    const timeout = options.timeout ?? defaultTimeout;

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);
    const onOuterAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onOuterAbort, { once: true });

    logger.debug('HTTP Request', { method: 'POST', url, timeout });
    const startTime = Date.now();

    try {
        const response = await adapter.fetch(url, {
            method: 'POST',
            headers: {
                'Content-Type': 'application/json',
                ...options.headers,
            },
            body: JSON.stringify(body),
            signal: controller.signal,
        });

        const duration = Date.now() - startTime;

        if (!response.ok) {
            let errorMessage = `Request failed with status ${response.status}`;
            try {
                const errorBody: unknown = await response.json();
                if (isRecord(errorBody) && typeof errorBody.error === 'string') {
                    errorMessage = errorBody.error;
                }
            } catch {
                // body is not JSON; keep the status message
            }

            logger.error('HTTP Error', { status: response.status, errorMessage, duration });
            throw new APIError(errorMessage, response.status);
        }

        const data: unknown = await response.json();
        logger.debug('HTTP Response', { status: response.status, duration });
        return data;
    } catch (error: unknown) {
        if (error instanceof APIError) {
            throw error;
        }

        const duration = Date.now() - startTime;
        if (error instanceof Error && error.name === 'AbortError') {
            logger.error('HTTP Timeout', { url, timeout, duration });
            throw new APIError('Request timed out', 408, 'TIMEOUT');
        }

        logger.error('HTTP Error (Network)', {
            url,
            error: error instanceof Error ? error.message : String(error),
            duration,
        });
        throw error;
    } finally {
        clearTimeout(timeoutId);
        options.signal?.removeEventListener('abort', onOuterAbort);
    }
}
