/**
 * Remote Worker
 *
 * The script staged onto the transcription host. Transcribes one audio file
 * with whisper.cpp, writes the transcript to --output and, with --metadata,
 * prints a single JSON line on stdout. Everything else goes to stderr.
 */

import { Command } from 'commander';
import * as path from 'node:path';
import {
    DEFAULT_MODELS_DIRECTORY,
    DEFAULT_TRANSCRIPTION_MODEL,
    DEFAULT_WHISPER_BINARY,
    TRANSCRIPT_EXTENSION,
    VERSION,
    WORKER_NAME,
} from './constants';
import { describeError, RescribeError } from './errors';
import { configureLogging, getLogger } from './logging';
import * as Transcription from './transcription';
import * as Storage from './util/storage';

export interface WorkerArgs {
    model: string;
    language?: string;
    prompt?: string;
    verbose?: boolean;
    output?: string;
    metadata?: boolean;
    modelsDir: string;
    whisperBinary: string;
}

export interface WorkerIo {
    stdout: (line: string) => void;
    engine?: (args: WorkerArgs) => Transcription.Engine.EngineInstance;
}

export const createWorkerProgram = (): Command => {
    return new Command()
        .name(WORKER_NAME)
        .description('Transcribe one audio file with whisper.cpp')
        .argument('<audio>', 'audio file to transcribe')
        .option('--model <model>', 'Whisper model name', DEFAULT_TRANSCRIPTION_MODEL)
        .option('--language <language>', 'language code; detected when omitted')
        .option('--prompt <prompt>', 'initial prompt to guide transcription')
        .option('--verbose', 'report progress on stderr')
        .option('--output <output>', 'transcript file to write')
        .option('--metadata', 'print {"language","duration","model"} as JSON on stdout')
        .option('--models-dir <modelsDir>', 'directory holding ggml model files', DEFAULT_MODELS_DIRECTORY)
        .option('--whisper-binary <whisperBinary>', 'whisper.cpp command line binary', DEFAULT_WHISPER_BINARY)
        .version(VERSION);
};

const defaultEngine = (args: WorkerArgs): Transcription.Engine.EngineInstance => {
    return Transcription.Engine.create({
        speechToText: Transcription.WhisperCpp.create({ binaryPath: args.whisperBinary }),
        models: Transcription.Models.create(args.modelsDir),
    });
};

export const defaultOutputPath = (audioFile: string): string => {
    const parsed = path.parse(audioFile);
    return path.join(parsed.dir, `${parsed.name}${TRANSCRIPT_EXTENSION}`);
};

/**
 * Returns the process exit code.
 */
export const runWorker = async (argv: string[], io: WorkerIo): Promise<number> => {
    const program = createWorkerProgram();
    program.parse(argv);
    const args = program.opts<WorkerArgs>();
    const [audioFile] = program.args;

    configureLogging({ stderr: true }, args.verbose ? 'verbose' : 'info');
    const logger = getLogger();
    const storage = Storage.create({ log: (message, ...rest) => logger.debug(message, ...rest) });

    try {
        const request = Transcription.createRequest({
            model: args.model,
            language: args.language,
            prompt: args.prompt,
            verbose: args.verbose,
        });

        const engine = (io.engine ?? defaultEngine)(args);
        const result = await engine.transcribe(path.resolve(audioFile), request);

        const outputPath = args.output ?? defaultOutputPath(audioFile);
        await storage.createDirectory(path.dirname(outputPath));
        await storage.writeFile(outputPath, result.text);
        logger.info('Transcript written to %s', outputPath);

        if (args.metadata) {
            io.stdout(JSON.stringify({
                language: result.language,
                duration: result.duration,
                model: result.model,
            }));
        }
        return 0;
    } catch (error: unknown) {
        if (error instanceof RescribeError) {
            logger.error('%s: %s', error.code, error.message);
        } else {
            logger.error('Transcription failed: %s', describeError(error));
        }
        return 1;
    }
};
