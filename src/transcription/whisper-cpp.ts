/**
 * whisper.cpp speech-to-text
 *
 * Runs the whisper.cpp command line tool against a WAV file that exists only
 * for the duration of the call.
 */

import { cpus } from 'node:os';
import * as path from 'node:path';
import { DEFAULT_WHISPER_BINARY } from '../constants';
import * as Logging from '../logging';
import { run } from '../util/child';
import * as Storage from '../util/storage';
import { ModelHandle, SpeechToText, SpeechToTextOptions, SpeechToTextOutput } from './types';

export interface WhisperCppOptions {
    binaryPath?: string;
    threads?: number;
}

const PROGRESS_PATTERN = /progress\s*=\s*(\d+)%/g;
const LANGUAGE_PATTERN = /auto-detected language:\s*([a-z]{2,3})/;

export const buildArgs = (wavPath: string, outputBase: string, model: ModelHandle, options: SpeechToTextOptions, threads: number): string[] => {
    const args = [
        '-m', model.path,
        '-l', options.language ?? 'auto',
        '--output-txt',
        '--no-timestamps',
        '--print-progress',
        '-of', outputBase,
        '-t', String(threads),
    ];
    if (options.prompt) {
        args.push('--prompt', options.prompt);
    }
    // Half precision only ever applies to GPU backends
    if (!options.fp16) {
        args.push('--no-gpu');
    }
    args.push(wavPath);
    return args;
};

export const parseProgress = (chunk: string): number[] => {
    return Array.from(chunk.matchAll(PROGRESS_PATTERN), match => Number(match[1]) / 100);
};

export const parseLanguage = (stderr: string): string | undefined => {
    return LANGUAGE_PATTERN.exec(stderr)?.[1];
};

export const create = (options: WhisperCppOptions = {}): SpeechToText => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    const binary = options.binaryPath ?? DEFAULT_WHISPER_BINARY;
    const threads = options.threads ?? Math.min(cpus().length, 4);

    const transcribe = async (wav: Buffer, model: ModelHandle, sttOptions: SpeechToTextOptions): Promise<SpeechToTextOutput> => {
        return storage.withTemporaryFile(wav, '.wav', async (wavPath) => {
            const outputBase = path.join(path.dirname(wavPath), 'transcript');
            const args = buildArgs(wavPath, outputBase, model, sttOptions, threads);
            logger.debug('Running %s %s', binary, args.join(' '));

            const result = await run(binary, args, {
                onStderr: (chunk) => {
                    for (const fraction of parseProgress(chunk)) {
                        sttOptions.onProgress?.(fraction);
                    }
                },
            });
            if (result.exitCode !== 0) {
                throw new Error(`${binary} exited with code ${result.exitCode}: ${result.stderr.slice(-300)}`);
            }

            const txtPath = `${outputBase}.txt`;
            // No txt file means no speech was detected
            const text = await storage.exists(txtPath) ? await storage.readFile(txtPath, 'utf8') : '';

            return {
                text,
                language: sttOptions.language ?? parseLanguage(result.stderr),
            };
        });
    };

    return { transcribe };
};
