/**
 * Pipeline Controller
 *
 * probe -> remote execution -> enhancement. A failed remote transcription
 * ends the job before any enhancement runs; enhancement failures only ever
 * cost the artifacts of the stages that failed.
 */

import * as Audio from '../audio';
import * as Enhancement from '../enhancement';
import { CancelledError, ConfigurationError, ConnectivityError } from '../errors';
import * as Execution from '../execution';
import * as Logging from '../logging';
import * as Transcription from '../transcription';
import { ControllerConfig, JobReport, JobRequest } from './types';

export interface ControllerInstance {
    run(job: JobRequest): Promise<JobReport>;
}

export const create = (config: ControllerConfig): ControllerInstance => {
    const logger = Logging.getLogger();

    const ensureNotCancelled = (signal: AbortSignal | undefined, step: string) => {
        if (signal?.aborted) {
            throw new CancelledError(`Job cancelled after ${step}`);
        }
    };

    const run = async (job: JobRequest): Promise<JobReport> => {
        const request = Transcription.createRequest({
            model: job.model,
            language: job.language,
            prompt: job.prompt,
            verbose: job.verbose,
        });

        const host = job.host.trim();
        if (!host) {
            throw new ConfigurationError('A remote host is required');
        }

        const asset = await Audio.fromPath(job.audioFile);

        const reachable = await config.probe(host, config.probeTimeoutSeconds, { signal: job.signal });
        ensureNotCancelled(job.signal, 'probe');
        if (!reachable) {
            throw new ConnectivityError('probe', host, `host did not answer within ${config.probeTimeoutSeconds}s`);
        }

        const orchestrator = Execution.create(config.channel(host), config.execution, {
            onStateChange: config.onStateChange,
        });
        const execution = await orchestrator.execute({
            asset,
            request,
            outputDirectory: job.outputDirectory,
            signal: job.signal,
        });
        ensureNotCancelled(job.signal, 'remote transcription');

        const transcription: Transcription.TranscriptionResult = {
            text: execution.text.trim(),
            language: execution.metadata?.language ?? request.language ?? 'unknown',
            duration: execution.metadata?.duration ?? 0,
            model: execution.metadata?.model ?? request.model,
        };

        const raw: Enhancement.Artifact = { name: 'raw', path: execution.transcriptPath, content: execution.text };
        const input: Enhancement.EnhancementInput = { rawText: execution.text, rawPath: execution.transcriptPath };

        let enhancement: Enhancement.EnhancementResult = { outcomes: [], artifacts: [], finalText: execution.text };
        if (Enhancement.isEnabled(job.stages)) {
            const refiner = config.refiner();
            if (refiner) {
                enhancement = await Enhancement.create({ refiner, signal: job.signal }).run(input, job.stages);
            } else {
                logger.warn('No API key configured for transcript refinement. Skipping transcript processing.');
                enhancement = Enhancement.skipAll(input, job.stages, 'no refinement credentials');
            }
        }

        return {
            success: true,
            asset: execution.metadata ? { ...asset, duration: execution.metadata.duration } : asset,
            transcription,
            artifacts: [raw, ...enhancement.artifacts],
            stages: enhancement.outcomes,
        };
    };

    return { run };
};
