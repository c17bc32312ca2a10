/**
 * Audio Types
 *
 * Decoded audio is held as planar float samples in [-1, 1], one array per
 * channel, all of the same length.
 */

export interface PcmAudio {
    sampleRate: number;
    channels: Float32Array[];
}

export interface AudioAsset {
    path: string;              // Absolute path
    size: number;              // Bytes
    duration?: number;         // Seconds, known once transcribed
}

export interface PreprocessStep {
    name: 'downmix' | 'resample' | 'normalize';
    applied: boolean;
}
