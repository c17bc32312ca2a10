/**
 * Transcription Types
 *
 * The speech-to-text capability itself is a black box behind
 * {@link SpeechToText}; everything here describes what goes in and out of it.
 */

import { SUPPORTED_MODELS } from '../constants';

export type TranscriptionModel = typeof SUPPORTED_MODELS[number];

export interface TranscriptionRequest {
    readonly model: TranscriptionModel;
    readonly language?: string;
    readonly prompt?: string;
    readonly verbose: boolean;
}

export interface TranscriptionResult {
    readonly text: string;
    readonly language: string;
    readonly duration: number;           // Seconds of source audio
    readonly model: string;
}

export interface ModelHandle {
    readonly name: TranscriptionModel;
    readonly path: string;
}

export interface SpeechToTextOptions {
    language?: string;
    prompt?: string;
    fp16: boolean;
    onProgress?: (fraction: number) => void;
}

export interface SpeechToTextOutput {
    text: string;
    language?: string;
}

export interface SpeechToText {
    transcribe(wav: Buffer, model: ModelHandle, options: SpeechToTextOptions): Promise<SpeechToTextOutput>;
}

export interface TranscriptionMetadata {
    language: string;
    duration: number;
    model: string;
}
