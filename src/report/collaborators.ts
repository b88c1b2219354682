/**
 * Contracts of the external services a report session depends on.
 * Implementations live beside this file; tests substitute fakes.
 */

export interface GenerateRequest {
    /** Name of the calling node, for logging and model selection */
    node: string;
    prompt: string;
    /** Ask the model for a JSON document */
    json: boolean;
    signal?: AbortSignal;
}

/**
 * Text generation. May throw or return an empty string; callers wrap
 * it with `withLanguageModelRetry`.
 */
export interface LanguageModel {
    generate(request: GenerateRequest): Promise<string>;
}

export interface DataProfiler {
    /** Short description of the data source for prompts */
    summarize(csvPath: string): Promise<string>;
}

export interface ChartRequest {
    goal: string;
    dataPath: string;
    signal?: AbortSignal;
}

export interface ChartRunner {
    /** Paths of the charts produced; empty when charting failed */
    run(request: ChartRequest): Promise<string[]>;
}

export interface DocumentRequest {
    title: string;
    sections: Record<string, string>;
    artifacts: string[];
}

export interface DocumentAssembler {
    /**
     * Path of the assembled document.
     * @throws when the document cannot be produced
     */
    assemble(request: DocumentRequest): Promise<string>;
}

/** Result of an external command */
export interface CommandResult {
    code: number | null;
    stdout: string;
    stderr: string;
}

export interface CommandOptions {
    cwd?: string;
    timeoutMs?: number;
    signal?: AbortSignal;
}

export type CommandRunner = (command: string, args: string[], options?: CommandOptions) => Promise<CommandResult>;
