import { Command } from 'commander';
import * as yaml from 'js-yaml';
import * as path from 'node:path';
import { z } from 'zod';
import {
    DEFAULT_CONFIG_FILE_NAME,
    PROGRAM_NAME,
    RESCRIBE_DEFAULTS,
    VERSION,
} from './constants';
import { ConfigurationError } from './errors';
import { getLogger } from './logging';
import { assertSupportedModel } from './transcription/request';
import * as Storage from './util/storage';

export interface Args {
    verbose?: boolean;
    debug?: boolean;
    configDirectory?: string;
    model?: string;
    language?: string;
    prompt?: string;
    clean?: boolean;
    summary?: boolean;
    slack?: boolean;
    cleanPrompt?: string;
    summaryPrompt?: string;
    refineModel?: string;
    workerScript?: string;
    checkConfig?: boolean;
}

export const ConfigSchema = z.object({
    verbose: z.boolean(),
    debug: z.boolean(),
    configDirectory: z.string(),
    model: z.string(),
    language: z.string().optional(),
    prompt: z.string().optional(),
    clean: z.boolean(),
    summary: z.boolean(),
    slack: z.boolean(),
    cleanPrompt: z.string().optional(),
    summaryPrompt: z.string().optional(),
    channelDirective: z.string().optional(),
    refineModel: z.string().min(1),
    refineMaxTokens: z.number().int().positive(),
    workerScript: z.string().optional(),
    remoteRunner: z.array(z.string()).min(1),
    remoteScriptPath: z.string().min(1),
    remoteStagingDirectory: z.string().min(1),
    probeTimeoutSeconds: z.number().positive(),
    copyTimeoutSeconds: z.number().positive(),
});

export const FileConfigSchema = ConfigSchema.partial().strict();

export const SecureConfigSchema = z.object({
    anthropicApiKey: z.string().optional(),
    openaiApiKey: z.string().optional(),
});

export type Config = z.infer<typeof ConfigSchema>;
export type SecureConfig = z.infer<typeof SecureConfigSchema>;

export interface JobArgs {
    host?: string;
    audioFile?: string;
    outputDirectory?: string;
}

export interface Configuration {
    config: Config;
    secureConfig: SecureConfig;
    job: JobArgs;
    checkConfig: boolean;
}

/**
 * Paths pasted from Windows Explorer inside WSL (C:\Users\...) become /mnt/c/Users/...
 */
export const normalizeLocalPath = (filePath: string, platform: NodeJS.Platform = process.platform): string => {
    const trimmed = filePath.trim().replace(/^["']|["']$/g, '');
    const drive = /^([A-Za-z]):[\\/]/.exec(trimmed);
    if (platform !== 'linux' || !drive) return trimmed;
    return `/mnt/${drive[1].toLowerCase()}/${trimmed.slice(3).replace(/\\/g, '/')}`;
};

export const readConfigFile = async (configDirectory: string): Promise<Partial<Config>> => {
    const logger = getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    const configFile = path.join(configDirectory, DEFAULT_CONFIG_FILE_NAME);

    if (!await storage.exists(configFile)) {
        logger.debug('No configuration file at %s', configFile);
        return {};
    }

    const content = await storage.readFile(configFile, 'utf8');
    let parsed: unknown;
    try {
        parsed = yaml.load(content) ?? {};
    } catch (error) {
        throw new ConfigurationError(`Invalid YAML in ${configFile}: ${error instanceof Error ? error.message : String(error)}`);
    }

    const result = FileConfigSchema.safeParse(parsed);
    if (!result.success) {
        throw new ConfigurationError(`Invalid configuration in ${configFile}: ${result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    logger.debug('Loaded configuration from %s', configFile);
    return result.data;
};

export const createProgram = (): Command => {
    return new Command()
        .name(PROGRAM_NAME)
        .summary('Transcribe audio on a remote host with optional AI enhancement')
        .description('Copies an audio file to a remote host over ssh, runs Whisper there, brings the transcript back and optionally cleans, summarizes and formats it')
        .argument('[host]', 'remote host for transcription (ssh destination)')
        .argument('[audio]', 'path to the audio file')
        .argument('[outputDir]', 'output directory (defaults to the audio file directory)')
        .option('--model <model>', 'Whisper model to run on the remote host')
        .option('--language <language>', 'force a language code (e.g. en, es, fr)')
        .option('--prompt <prompt>', 'initial prompt to guide transcription')
        .option('--clean', 'clean transcript using the refinement model')
        .option('--summary', 'generate a structured summary (implies --clean)')
        .option('--slack', 'format the final output as a Slack message')
        .option('--clean-prompt <cleanPrompt>', 'custom instruction for the clean stage')
        .option('--summary-prompt <summaryPrompt>', 'custom instruction for the summary stage')
        .option('--refine-model <refineModel>', 'model used for clean, summary and Slack stages')
        .option('--worker-script <workerScript>', 'local worker script staged to the remote host')
        .option('--config-directory <configDirectory>', 'directory holding config.yaml')
        .option('--check-config', 'print the resolved configuration and exit')
        .option('--verbose', 'enable verbose logging')
        .option('--debug', 'enable debug logging')
        .version(VERSION);
};

export const configure = async (argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Promise<Configuration> => {
    const logger = getLogger();

    const program = createProgram();
    program.parse(argv);

    const cliArgs = program.opts<Args>();
    const [host, audio, outputDir]: Array<string | undefined> = program.args;
    logger.debug('Command Line Options: %s', JSON.stringify(cliArgs, null, 2));

    const configDirectory = cliArgs.configDirectory ?? RESCRIBE_DEFAULTS.configDirectory;
    const fileValues = await readConfigFile(configDirectory);

    // Only flags that were actually given override the file
    const cliValues: Partial<Config> = {};
    if (cliArgs.verbose !== undefined) cliValues.verbose = cliArgs.verbose;
    if (cliArgs.debug !== undefined) cliValues.debug = cliArgs.debug;
    if (cliArgs.model !== undefined) cliValues.model = cliArgs.model;
    if (cliArgs.language !== undefined) cliValues.language = cliArgs.language;
    if (cliArgs.prompt !== undefined) cliValues.prompt = cliArgs.prompt;
    if (cliArgs.clean !== undefined) cliValues.clean = cliArgs.clean;
    if (cliArgs.summary !== undefined) cliValues.summary = cliArgs.summary;
    if (cliArgs.slack !== undefined) cliValues.slack = cliArgs.slack;
    if (cliArgs.cleanPrompt !== undefined) cliValues.cleanPrompt = cliArgs.cleanPrompt;
    if (cliArgs.summaryPrompt !== undefined) cliValues.summaryPrompt = cliArgs.summaryPrompt;
    if (cliArgs.refineModel !== undefined) cliValues.refineModel = cliArgs.refineModel;
    if (cliArgs.workerScript !== undefined) cliValues.workerScript = cliArgs.workerScript;

    // Defaults -> File -> CLI (highest precedence)
    const merged = {
        ...RESCRIBE_DEFAULTS,
        ...fileValues,
        ...cliValues,
        configDirectory,
    };

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigurationError(`Invalid configuration: ${parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
    }
    const config = parsed.data;

    const secureConfig: SecureConfig = {
        ...(env.ANTHROPIC_API_KEY || env.ANTHROPIC_KEY ? { anthropicApiKey: env.ANTHROPIC_API_KEY || env.ANTHROPIC_KEY } : {}),
        ...(env.OPENAI_API_KEY ? { openaiApiKey: env.OPENAI_API_KEY } : {}),
    };

    const checkConfig = cliArgs.checkConfig === true;
    const job: JobArgs = {
        host: host?.trim() || undefined,
        audioFile: audio ? normalizeLocalPath(audio) : undefined,
        outputDirectory: outputDir ? normalizeLocalPath(outputDir) : undefined,
    };

    validateConfig(config);
    if (!checkConfig) {
        validateJob(job);
    }

    logger.debug('Final configuration: %s', JSON.stringify(config, null, 2));
    return { config, secureConfig, job, checkConfig };
};

export const validateConfig = (config: Config): void => {
    // Fails before anything reaches the remote host
    assertSupportedModel(config.model);
};

export const validateJob = (job: JobArgs): void => {
    if (!job.host) {
        throw new ConfigurationError('A transcript host is required: rescribe <host> <audio> [outputDir]');
    }
    if (!job.audioFile) {
        throw new ConfigurationError('An audio file is required: rescribe <host> <audio> [outputDir]');
    }
};
