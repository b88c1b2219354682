import { spawn } from 'child_process';
import type { CommandOptions, CommandResult } from './collaborators';

/**
 * Run a command to completion, collecting its output.
 * Resolves with the exit code; rejects only when the process cannot start.
 * A timeout or abort kills the process and resolves with a null code.
 */
export function runCommand(command: string, args: string[], options: CommandOptions = {}): Promise<CommandResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            cwd: options.cwd,
            stdio: ['ignore', 'pipe', 'pipe'],
            signal: options.signal,
        });

        let stdout = '';
        let stderr = '';
        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');
        child.stdout.on('data', (data: string) => {
            stdout += data;
        });
        child.stderr.on('data', (data: string) => {
            stderr += data;
        });

        const timer = options.timeoutMs
            ? setTimeout(() => child.kill('SIGKILL'), options.timeoutMs)
            : undefined;

        child.on('error', (error) => {
            clearTimeout(timer);
            if (error.name === 'AbortError') {
                resolve({ code: null, stdout, stderr });
                return;
            }
            reject(error);
        });

        child.on('close', (code) => {
            clearTimeout(timer);
            resolve({ code, stdout, stderr });
        });
    });
}
