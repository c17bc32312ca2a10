import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import * as Arguments from './arguments';
import { PROGRAM_NAME, VERSION } from './constants';
import { describeError, RescribeError } from './errors';
import { getLogger, setLogLevel } from './logging';
import * as Pipeline from './pipeline';
import * as Refinement from './refinement';
import { Ssh } from './remote';

// Bundled next to main.js in dist/
export const defaultWorkerScript = (): string => fileURLToPath(new URL('./worker.js', import.meta.url));

export const toStageSettings = (config: Arguments.Config): Pipeline.JobRequest['stages'] => ({
    clean: config.clean,
    summarize: config.summary,
    channelFormat: config.slack,
    cleanInstruction: config.cleanPrompt,
    summaryInstruction: config.summaryPrompt,
    channelDirective: config.channelDirective,
});

export const createController = (
    config: Arguments.Config,
    secureConfig: Arguments.SecureConfig,
    onStateChange?: Pipeline.ControllerConfig['onStateChange'],
): Pipeline.ControllerInstance => {
    const refinementConfig: Refinement.RefinementConfig = {
        model: config.refineModel,
        maxTokens: config.refineMaxTokens,
        ...secureConfig,
    };

    return Pipeline.create({
        execution: {
            workerScript: path.resolve(config.workerScript ?? defaultWorkerScript()),
            remoteScriptPath: config.remoteScriptPath,
            remoteRunner: config.remoteRunner,
            stagingDirectory: config.remoteStagingDirectory,
        },
        probeTimeoutSeconds: config.probeTimeoutSeconds,
        channel: (host) => Ssh.create({ host, copyTimeoutSeconds: config.copyTimeoutSeconds }),
        probe: (host, timeoutSeconds, options) => Ssh.probe(host, timeoutSeconds, options),
        refiner: () => Refinement.hasCredentials(refinementConfig) ? Refinement.create(refinementConfig) : null,
        onStateChange,
    });
};

const printConfiguration = (config: Arguments.Config, job: Arguments.JobArgs, secureConfig: Arguments.SecureConfig) => {
    const rows: Array<[string, string]> = [
        ['Host', job.host ?? '(none)'],
        ['Audio file', job.audioFile ?? '(none)'],
        ['Output directory', job.outputDirectory ?? '(audio file directory)'],
        ['Model', config.model],
        ['Language', config.language ?? 'auto'],
        ['Clean', String(config.clean || config.summary)],
        ['Summary', String(config.summary)],
        ['Slack', String(config.slack)],
        ['Refine model', config.refineModel],
        ['Anthropic key', secureConfig.anthropicApiKey ? 'set' : 'not set'],
        ['OpenAI key', secureConfig.openaiApiKey ? 'set' : 'not set'],
        ['Config directory', config.configDirectory],
    ];
    const width = Math.max(...rows.map(([label]) => label.length));
    for (const [label, value] of rows) {
        // eslint-disable-next-line no-console
        console.info(`${label.padEnd(width)}  ${value}`);
    }
};

export async function main() {

    // eslint-disable-next-line no-console
    console.info(`Starting ${PROGRAM_NAME}: ${VERSION}`);

    const controller = new AbortController();
    const cancel = (signal: NodeJS.Signals) => {
        getLogger().warn('Received %s, cancelling job', signal);
        controller.abort();
    };
    process.once('SIGINT', cancel);
    process.once('SIGTERM', cancel);

    try {
        const { config, secureConfig, job, checkConfig } = await Arguments.configure();

        // Set log level based on verbose flag
        if (config.verbose === true) {
            setLogLevel('verbose');
        }
        if (config.debug === true) {
            setLogLevel('debug');
        }

        const logger = getLogger();

        if (checkConfig) {
            printConfiguration(config, job, secureConfig);
            return;
        }

        if (config.debug) {
            printConfiguration(config, job, secureConfig);
        }

        // configure() has already rejected a job without them
        if (!job.host || !job.audioFile) {
            return;
        }

        const pipeline = createController(config, secureConfig, (state, context) => {
            logger.verbose('Job %s on %s: %s', context.jobId, context.host, state);
        });

        const report = await pipeline.run({
            host: job.host,
            audioFile: job.audioFile,
            outputDirectory: job.outputDirectory,
            model: config.model,
            language: config.language,
            prompt: config.prompt,
            verbose: config.verbose || config.debug,
            stages: toStageSettings(config),
            signal: controller.signal,
        });

        // eslint-disable-next-line no-console
        console.info('\n' + '='.repeat(60));
        // eslint-disable-next-line no-console
        console.info('TRANSCRIPTION SUMMARY');
        // eslint-disable-next-line no-console
        console.info('='.repeat(60));
        // eslint-disable-next-line no-console
        console.info(`Language: ${report.transcription.language}  Duration: ${report.transcription.duration.toFixed(1)}s  Model: ${report.transcription.model}\n`);
        for (const artifact of report.artifacts) {
            // eslint-disable-next-line no-console
            console.info(`${artifact.name.padEnd(14)} ${artifact.path}`);
        }
        for (const outcome of report.stages) {
            if (outcome.kind === 'skipped') {
                logger.warn('Stage %s skipped: %s', outcome.stage, outcome.reason);
            }
        }
    } catch (error: unknown) {
        const logger = getLogger();
        if (error instanceof RescribeError) {
            logger.error('%s: %s', error.code, error.message);
        } else {
            logger.error('Exiting due to Error: %s', describeError(error));
            if (error instanceof Error && error.stack) {
                logger.debug('%s', error.stack);
            }
        }
        process.exitCode = 1;
    } finally {
        process.off('SIGINT', cancel);
        process.off('SIGTERM', cancel);
    }
}
