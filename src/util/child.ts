import { spawn } from 'node:child_process';

export interface RunResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface RunOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
    onStdout?: (chunk: string) => void;
    onStderr?: (chunk: string) => void;
}

/**
 * Spawn a program without a local shell. Resolves with the exit code instead of
 * rejecting on non-zero exit; rejects only when the process cannot be started
 * or is aborted.
 */
export function run(command: string, args: string[] = [], options: RunOptions = {}): Promise<RunResult> {
    return new Promise((resolve, reject) => {
        const child = spawn(command, args, {
            signal: options.signal,
            timeout: options.timeoutMs,
            stdio: ['ignore', 'pipe', 'pipe'],
        });

        let stdout = '';
        let stderr = '';

        child.stdout.setEncoding('utf8');
        child.stderr.setEncoding('utf8');

        child.stdout.on('data', (chunk: string) => {
            stdout += chunk;
            options.onStdout?.(chunk);
        });
        child.stderr.on('data', (chunk: string) => {
            stderr += chunk;
            options.onStderr?.(chunk);
        });

        child.on('error', reject);
        child.on('close', (code) => {
            resolve({ stdout, stderr, exitCode: code ?? -1 });
        });
    });
}

export async function which(name: string): Promise<boolean> {
    const lookup = process.platform === 'win32' ? 'where' : 'which';
    try {
        const result = await run(lookup, [name]);
        return result.exitCode === 0;
    } catch {
        return false;
    }
}
