/**
 * Refinement Client
 *
 * Sends a transcript and an instruction to a chat model and returns the reply.
 * Claude models go through the Anthropic SDK, everything else through OpenAI.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { ConfigurationError } from '../errors';
import * as Logging from '../logging';
import { RefinementConfig, RefinementProvider, RefineOptions, Refiner } from './types';

export class RefinementError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'RefinementError';
    }
}

export const getProvider = (model: string): RefinementProvider => {
    return model.startsWith('claude') ? 'anthropic' : 'openai';
};

export const buildPrompt = (text: string, instruction: string): string => {
    return `${instruction}\n\nTranscript:\n${text}`;
};

export const hasCredentials = (config: RefinementConfig): boolean => {
    return getProvider(config.model) === 'anthropic'
        ? Boolean(config.anthropicApiKey)
        : Boolean(config.openaiApiKey);
};

export const create = (config: RefinementConfig): Refiner => {
    const logger = Logging.getLogger();
    const provider = getProvider(config.model);

    if (!hasCredentials(config)) {
        throw new ConfigurationError(provider === 'anthropic'
            ? 'ANTHROPIC_API_KEY environment variable is not set'
            : 'OPENAI_API_KEY environment variable is not set');
    }

    // Lazy-initialize clients (only when a stage actually runs)
    let anthropic: Anthropic | null = null;
    let openai: OpenAI | null = null;

    const refineWithAnthropic = async (prompt: string, signal?: AbortSignal): Promise<string> => {
        anthropic ??= new Anthropic({ apiKey: config.anthropicApiKey });
        const message = await anthropic.messages.create({
            model: config.model,
            max_tokens: config.maxTokens,
            messages: [{ role: 'user', content: prompt }],
        }, { signal });
        return message.content
            .map(block => block.type === 'text' ? block.text : '')
            .join('');
    };

    const refineWithOpenAI = async (prompt: string, signal?: AbortSignal): Promise<string> => {
        openai ??= new OpenAI({ apiKey: config.openaiApiKey });
        const completion = await openai.chat.completions.create({
            model: config.model,
            max_completion_tokens: config.maxTokens,
            messages: [{ role: 'user', content: prompt }],
        }, { signal });
        return completion.choices[0]?.message?.content ?? '';
    };

    const refine = async (text: string, instruction: string, options: RefineOptions = {}): Promise<string> => {
        const prompt = buildPrompt(text, instruction);
        logger.info('Sending request to %s (%s)... this may take a minute', config.model, provider);
        logger.debug('Refinement instruction: %s', instruction);

        const startTime = Date.now();
        try {
            const reply = provider === 'anthropic'
                ? await refineWithAnthropic(prompt, options.signal)
                : await refineWithOpenAI(prompt, options.signal);
            const duration = ((Date.now() - startTime) / 1000).toFixed(1);
            logger.info('%s responded in %ss', config.model, duration);
            return reply.trim();
        } catch (error: unknown) {
            const detail = error instanceof Error ? error.message : String(error);
            throw new RefinementError(`Failed to refine transcript: ${detail}`, { cause: error });
        }
    };

    return { refine };
};
