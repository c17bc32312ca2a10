import { SUPPORTED_MODELS } from '../constants';
import { ConfigurationError } from '../errors';
import { TranscriptionModel, TranscriptionRequest } from './types';

export const isSupportedModel = (name: string): name is TranscriptionModel => {
    return (SUPPORTED_MODELS as readonly string[]).includes(name);
};

export const assertSupportedModel = (name: string): TranscriptionModel => {
    if (!isSupportedModel(name)) {
        throw new ConfigurationError(`Unsupported transcription model '${name}'. Model must be one of: ${SUPPORTED_MODELS.join(', ')}`);
    }
    return name;
};

export interface RequestInput {
    model: string;
    language?: string;
    prompt?: string;
    verbose?: boolean;
}

export const createRequest = (input: RequestInput): TranscriptionRequest => {
    const model = assertSupportedModel(input.model);
    const language = input.language?.trim() || undefined;
    const prompt = input.prompt?.trim() || undefined;

    return Object.freeze({
        model,
        ...(language && { language }),
        ...(prompt && { prompt }),
        verbose: input.verbose ?? false,
    });
};
