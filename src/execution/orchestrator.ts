/**
 * Remote Execution Orchestrator
 *
 * idle -> stagingIn -> invoking -> stagingOut -> cleaningUp -> done | failed
 *
 * Steps run strictly in order, each one fully succeeding or failing the job
 * on the spot. Cleanup of the staged remote files runs on every path,
 * including failure and cancellation, and never changes the verdict.
 */

import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import { z } from 'zod';
import { PROGRAM_NAME, TRANSCRIPT_EXTENSION } from '../constants';
import { CancelledError, CleanupWarning, describeError, RemoteExecutionError } from '../errors';
import * as Logging from '../logging';
import { RemoteChannel } from '../remote/types';
import { TranscriptionMetadata, TranscriptionRequest } from '../transcription/types';
import * as Storage from '../util/storage';
import { safeName } from '../util/shell';
import {
    ExecutionConfig,
    ExecutionInput,
    ExecutionResult,
    ExecutionState,
    RemoteJobContext,
    StateListener,
} from './types';

export interface OrchestratorInstance {
    execute(input: ExecutionInput): Promise<ExecutionResult>;
}

export interface OrchestratorOptions {
    onStateChange?: StateListener;
    jobId?: () => string;
}

const MetadataSchema = z.object({
    language: z.string(),
    duration: z.number(),
    model: z.string(),
});

export const buildContext = (
    host: string,
    audioPath: string,
    config: ExecutionConfig,
    outputDirectory: string | undefined,
    jobId: string,
): RemoteJobContext => {
    const parsed = path.parse(audioPath);
    const prefix = `${PROGRAM_NAME}-${jobId}`;
    const stagingDirectory = config.stagingDirectory;

    return {
        host,
        jobId,
        remote: {
            script: config.remoteScriptPath,
            stagingDirectory,
            audio: path.posix.join(stagingDirectory, `${prefix}-${safeName(parsed.base)}`),
            transcript: path.posix.join(stagingDirectory, `${prefix}-${safeName(parsed.name)}${TRANSCRIPT_EXTENSION}`),
        },
        local: {
            audio: audioPath,
            script: config.workerScript,
            transcript: path.join(outputDirectory ?? parsed.dir, `${parsed.name}${TRANSCRIPT_EXTENSION}`),
        },
    };
};

export const buildInvocation = (context: RemoteJobContext, request: TranscriptionRequest, config: ExecutionConfig): string[] => {
    const argv = [...config.remoteRunner, context.remote.script, '--model', request.model];
    if (request.language) {
        argv.push('--language', request.language);
    }
    if (request.verbose) {
        argv.push('--verbose');
    }
    if (request.prompt) {
        argv.push('--prompt', request.prompt);
    }
    argv.push('--metadata', '--output', context.remote.transcript, context.remote.audio);
    return argv;
};

// The worker prints its metadata as the last JSON line on stdout
export const parseMetadata = (stdout: string): TranscriptionMetadata | null => {
    const line = stdout.split('\n').map(l => l.trim()).reverse().find(l => l.startsWith('{'));
    if (!line) return null;
    try {
        const parsed = MetadataSchema.safeParse(JSON.parse(line));
        return parsed.success ? parsed.data : null;
    } catch {
        return null;
    }
};

// Re-splits streamed chunks into whole lines
export const relayLines = (emit: (line: string) => void): ((chunk: string) => void) => {
    let pending = '';
    return (chunk: string) => {
        const lines = (pending + chunk).split(/\r?\n|\r/);
        pending = lines.pop() ?? '';
        for (const line of lines) {
            if (line.trim()) emit(line.trim());
        }
    };
};

export const create = (channel: RemoteChannel, config: ExecutionConfig, options: OrchestratorOptions = {}): OrchestratorInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    const nextJobId = options.jobId ?? (() => randomUUID().slice(0, 8));

    const execute = async (input: ExecutionInput): Promise<ExecutionResult> => {
        const { asset, request, signal } = input;
        const context = buildContext(channel.host, asset.path, config, input.outputDirectory, nextJobId());

        let state: ExecutionState = 'idle';
        const transition = (next: ExecutionState) => {
            logger.debug('Remote job %s: %s -> %s', context.jobId, state, next);
            state = next;
            options.onStateChange?.(next, context);
        };

        const checkAborted = () => {
            if (signal?.aborted) {
                throw new CancelledError(`Job cancelled during ${state}`);
            }
        };

        const stageIn = async () => {
            logger.info('Copying transcription script and audio file to %s', channel.host);
            const directories = [path.posix.dirname(context.remote.script), context.remote.stagingDirectory];
            const mkdir = await channel.run(['mkdir', '-p', ...directories], { signal, step: 'stagingIn' });
            if (mkdir.exitCode !== 0) {
                throw new RemoteExecutionError(channel.host, mkdir.exitCode, mkdir.stdout, mkdir.stderr);
            }
            checkAborted();
            await channel.copyTo(context.local.script, context.remote.script, { signal, step: 'stagingIn' });
            checkAborted();
            await channel.copyTo(context.local.audio, context.remote.audio, { signal, step: 'stagingIn' });
        };

        const invoke = async (): Promise<TranscriptionMetadata | null> => {
            logger.info('Running transcription on %s with model %s (this may take a while)', channel.host, request.model);
            const result = await channel.run(buildInvocation(context, request, config), {
                signal,
                step: 'invoking',
                onStderr: request.verbose ? relayLines((line) => logger.info('[%s] %s', channel.host, line)) : undefined,
            });
            if (result.exitCode !== 0) {
                throw new RemoteExecutionError(channel.host, result.exitCode, result.stdout, result.stderr);
            }
            const metadata = parseMetadata(result.stdout);
            if (!metadata) {
                logger.debug('No transcription metadata in worker output');
            }
            return metadata;
        };

        const stageOut = async (): Promise<string> => {
            logger.info('Copying transcript back to %s', context.local.transcript);
            await storage.createDirectory(path.dirname(context.local.transcript));
            await channel.copyFrom(context.remote.transcript, context.local.transcript, { signal, step: 'stagingOut' });
            return storage.readFile(context.local.transcript, 'utf8');
        };

        // Runs without the job's abort signal
        const cleanUp = async () => {
            const paths = [context.remote.audio, context.remote.transcript];
            try {
                const result = await channel.run(['rm', '-f', ...paths], { step: 'cleaningUp' });
                if (result.exitCode !== 0) {
                    logger.warn('%s', new CleanupWarning(channel.host, paths, result.stderr.trim() || `exit code ${result.exitCode}`));
                    return;
                }
                logger.debug('Removed remote files: %s', paths.join(', '));
            } catch (error) {
                logger.warn('%s', new CleanupWarning(channel.host, paths, describeError(error)));
            }
        };

        let failure: unknown = null;
        let metadata: TranscriptionMetadata | null = null;
        let text = '';

        try {
            checkAborted();
            transition('stagingIn');
            await stageIn();
            checkAborted();
            transition('invoking');
            metadata = await invoke();
            checkAborted();
            transition('stagingOut');
            text = await stageOut();
        } catch (error) {
            failure = signal?.aborted && !(error instanceof CancelledError)
                ? new CancelledError(`Job cancelled during ${state}`)
                : error;
            logger.error('Remote transcription failed during %s: %s', state, describeError(failure));
        }

        transition('cleaningUp');
        await cleanUp();

        if (failure !== null) {
            transition('failed');
            throw failure;
        }

        transition('done');
        return {
            transcriptPath: context.local.transcript,
            text,
            metadata,
            context,
        };
    };

    return { execute };
};
