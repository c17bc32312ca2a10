import * as path from 'node:path';
import { DEFAULT_MODELS_DIRECTORY } from '../constants';
import { NotFoundError } from '../errors';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { ModelHandle, TranscriptionModel } from './types';

// whisper.cpp ggml weights for each model name
export const MODEL_FILES: Record<TranscriptionModel, string> = {
    'tiny': 'ggml-tiny.bin',
    'tiny.en': 'ggml-tiny.en.bin',
    'base': 'ggml-base.bin',
    'base.en': 'ggml-base.en.bin',
    'small': 'ggml-small.bin',
    'small.en': 'ggml-small.en.bin',
    'medium': 'ggml-medium.bin',
    'medium.en': 'ggml-medium.en.bin',
    'large': 'ggml-large-v3.bin',
    'turbo': 'ggml-large-v3-turbo.bin',
};

export interface ModelStore {
    load(name: TranscriptionModel): Promise<ModelHandle>;
}

export const create = (directory: string = DEFAULT_MODELS_DIRECTORY): ModelStore => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const load = async (name: TranscriptionModel): Promise<ModelHandle> => {
        const modelPath = path.join(directory, MODEL_FILES[name]);
        if (!await storage.exists(modelPath)) {
            throw new NotFoundError(modelPath, `Model '${name}'`);
        }
        logger.info('Loading Whisper model: %s', name);
        return { name, path: modelPath };
    };

    return { load };
};
