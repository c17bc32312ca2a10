/**
 * Transcription Engine
 *
 * Decodes a file, prepares it in memory, and hands it to the speech-to-text
 * capability. The loaded model handle is kept between calls and replaced only
 * when a different model name is requested.
 */

import * as Audio from '../audio';
import { AudioDecodeError, NotFoundError } from '../errors';
import * as Logging from '../logging';
import * as Media from '../util/media';
import * as Storage from '../util/storage';
import * as Dependency from './dependency';
import * as Models from './models';
import * as Progress from './progress';
import { assertSupportedModel } from './request';
import { ModelHandle, SpeechToText, TranscriptionRequest, TranscriptionResult } from './types';

export interface EngineOptions {
    speechToText: SpeechToText;
    models: Models.ModelStore;
    dependencies?: Dependency.DependencyCheck;
    media?: Media.Media;
    progress?: (line: string) => void;
}

export interface EngineInstance {
    transcribe(audioFile: string, request: TranscriptionRequest): Promise<TranscriptionResult>;
    loadedModel(): string | null;
}

export const create = (options: EngineOptions): EngineInstance => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    const media = options.media ?? Media.create(logger);
    const dependencies = options.dependencies ?? Dependency.processDependencyCheck();
    const emitProgress = options.progress ?? ((line: string) => logger.info(line));

    let handle: ModelHandle | null = null;

    const loadModel = async (request: TranscriptionRequest): Promise<ModelHandle> => {
        if (handle?.name === request.model) {
            return handle;
        }
        handle = await options.models.load(request.model);
        return handle;
    };

    const transcribe = async (audioFile: string, request: TranscriptionRequest): Promise<TranscriptionResult> => {
        assertSupportedModel(request.model);

        if (!await storage.isFile(audioFile)) {
            throw new NotFoundError(audioFile, 'Audio file');
        }

        await dependencies.ensure();
        const model = await loadModel(request);

        logger.info('Processing: %s', audioFile);

        let decoded: Audio.PcmAudio;
        try {
            decoded = await media.decode(audioFile);
        } catch (error) {
            throw new AudioDecodeError(audioFile, error);
        }

        const { audio } = Audio.preprocess(decoded);
        const duration = Audio.durationSeconds(audio);
        const wav = Audio.encodeWav(audio);

        logger.info('Starting transcription');
        const output = await options.speechToText.transcribe(wav, model, {
            language: request.language,
            prompt: request.prompt,
            fp16: false,
            onProgress: request.verbose ? Progress.create(duration, emitProgress) : undefined,
        });

        return Object.freeze({
            text: output.text.trim(),
            language: output.language ?? request.language ?? 'unknown',
            duration,
            model: model.name,
        });
    };

    return {
        transcribe,
        loadedModel: () => handle?.name ?? null,
    };
};
