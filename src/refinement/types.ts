/**
 * Refinement Types
 *
 * `refine(text, instruction) -> text` is the only contract the enhancement
 * pipeline relies on; providers fail by throwing.
 */

export type RefinementProvider = 'anthropic' | 'openai';

export interface RefinementConfig {
    model: string;
    maxTokens: number;
    anthropicApiKey?: string;
    openaiApiKey?: string;
}

export interface RefineOptions {
    signal?: AbortSignal;
}

export interface Refiner {
    refine(text: string, instruction: string, options?: RefineOptions): Promise<string>;
}
