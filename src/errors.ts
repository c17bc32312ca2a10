/**
 * Error taxonomy
 *
 * Staging, invocation and retrieval errors abort a job. Enhancement stage
 * errors are caught per stage by the enhancement pipeline. Cleanup problems
 * are only ever logged as {@link CleanupWarning}.
 */

export type ErrorCode =
    | 'CONFIGURATION'
    | 'CONNECTIVITY'
    | 'MISSING_DEPENDENCY'
    | 'REMOTE_EXECUTION'
    | 'ENHANCEMENT_STAGE'
    | 'NOT_FOUND'
    | 'AUDIO_DECODE'
    | 'CANCELLED';

export class RescribeError extends Error {
    public readonly code: ErrorCode;

    constructor(message: string, code: ErrorCode, options?: { cause?: unknown }) {
        super(message, options);
        this.code = code;
        this.name = this.constructor.name;
    }
}

export class ConfigurationError extends RescribeError {
    constructor(message: string) {
        super(message, 'CONFIGURATION');
    }
}

export type JobStep = 'probe' | 'stagingIn' | 'invoking' | 'stagingOut' | 'cleaningUp';

export class ConnectivityError extends RescribeError {
    public readonly step: JobStep;
    public readonly host: string;

    constructor(step: JobStep, host: string, detail: string, options?: { cause?: unknown }) {
        super(`${step} failed for host ${host}: ${detail}`, 'CONNECTIVITY', options);
        this.step = step;
        this.host = host;
    }
}

export class MissingDependencyError extends RescribeError {
    public readonly tool: string;
    public readonly guidance: string;

    constructor(tool: string, guidance: string) {
        super(`Required tool '${tool}' was not found on PATH. ${guidance}`, 'MISSING_DEPENDENCY');
        this.tool = tool;
        this.guidance = guidance;
    }
}

export class RemoteExecutionError extends RescribeError {
    public readonly exitCode: number;
    public readonly stdout: string;
    public readonly stderr: string;

    constructor(host: string, exitCode: number, stdout: string, stderr: string) {
        const detail = stderr.trim() || stdout.trim() || 'no output';
        super(`Remote transcription on ${host} exited with code ${exitCode}: ${detail}`, 'REMOTE_EXECUTION');
        this.exitCode = exitCode;
        this.stdout = stdout;
        this.stderr = stderr;
    }
}

export class EnhancementStageError extends RescribeError {
    public readonly stage: string;

    constructor(stage: string, detail: string, options?: { cause?: unknown }) {
        super(`Enhancement stage '${stage}' failed: ${detail}`, 'ENHANCEMENT_STAGE', options);
        this.stage = stage;
    }
}

export class NotFoundError extends RescribeError {
    public readonly path: string;

    constructor(path: string, what: string = 'File') {
        super(`${what} not found: ${path}`, 'NOT_FOUND');
        this.path = path;
    }
}

export class AudioDecodeError extends RescribeError {
    public readonly file: string;

    constructor(file: string, cause: unknown) {
        super(`Failed to load audio file ${file}: ${describeError(cause)}`, 'AUDIO_DECODE', { cause });
        this.file = file;
    }
}

export class CancelledError extends RescribeError {
    constructor(message: string = 'Job cancelled') {
        super(message, 'CANCELLED');
    }
}

/**
 * Carried in log metadata when best-effort remote cleanup fails.
 */
export class CleanupWarning {
    constructor(
        public readonly host: string,
        public readonly paths: string[],
        public readonly detail: string,
    ) {}

    toString(): string {
        return `Failed to clean up remote files on ${this.host} (${this.paths.join(', ')}): ${this.detail}`;
    }
}

export const describeError = (error: unknown): string => {
    if (error instanceof Error) return error.message;
    return String(error);
};
