/**
 * Audio Preprocessing
 *
 * Prepares decoded audio for the speech-to-text engine: mono, 16 kHz, peak
 * normalized. Every step returns its input untouched when the property
 * already holds, so running the whole chain twice changes nothing.
 */

import { NORMALIZE_HEADROOM_DB, OPTIMAL_SAMPLE_RATE } from '../constants';
import * as Logging from '../logging';
import { PcmAudio, PreprocessStep } from './types';

export const TARGET_PEAK = Math.pow(10, -NORMALIZE_HEADROOM_DB / 20);
const PEAK_TOLERANCE = 1e-4;

export const frameCount = (audio: PcmAudio): number => audio.channels[0]?.length ?? 0;

export const peak = (audio: PcmAudio): number => {
    let max = 0;
    for (const channel of audio.channels) {
        for (let i = 0; i < channel.length; i++) {
            const value = Math.abs(channel[i]);
            if (value > max) max = value;
        }
    }
    return max;
};

export const downmix = (audio: PcmAudio): PcmAudio => {
    if (audio.channels.length <= 1) return audio;

    const length = frameCount(audio);
    const mono = new Float32Array(length);
    for (const channel of audio.channels) {
        for (let i = 0; i < length; i++) {
            mono[i] += channel[i];
        }
    }
    const count = audio.channels.length;
    for (let i = 0; i < length; i++) {
        mono[i] /= count;
    }
    return { sampleRate: audio.sampleRate, channels: [mono] };
};

// Linear interpolation between neighbouring source frames
export const resample = (audio: PcmAudio, targetRate: number = OPTIMAL_SAMPLE_RATE): PcmAudio => {
    if (audio.sampleRate === targetRate) return audio;

    const sourceLength = frameCount(audio);
    const targetLength = Math.round(sourceLength * targetRate / audio.sampleRate);
    const ratio = audio.sampleRate / targetRate;

    const channels = audio.channels.map(source => {
        const out = new Float32Array(targetLength);
        for (let i = 0; i < targetLength; i++) {
            const position = i * ratio;
            const left = Math.min(Math.floor(position), sourceLength - 1);
            const right = Math.min(left + 1, sourceLength - 1);
            const fraction = position - left;
            out[i] = source[left] + (source[right] - source[left]) * fraction;
        }
        return out;
    });

    return { sampleRate: targetRate, channels };
};

export const normalize = (audio: PcmAudio, target: number = TARGET_PEAK): PcmAudio => {
    const current = peak(audio);
    // Silence has no level to normalize
    if (current === 0 || Math.abs(current - target) < PEAK_TOLERANCE) return audio;

    const gain = target / current;
    const channels = audio.channels.map(source => {
        const out = new Float32Array(source.length);
        for (let i = 0; i < source.length; i++) {
            out[i] = source[i] * gain;
        }
        return out;
    });
    return { sampleRate: audio.sampleRate, channels };
};

export const isPrepared = (audio: PcmAudio): boolean => {
    if (audio.channels.length !== 1 || audio.sampleRate !== OPTIMAL_SAMPLE_RATE) return false;
    const current = peak(audio);
    return current === 0 || Math.abs(current - TARGET_PEAK) < PEAK_TOLERANCE;
};

export const preprocess = (audio: PcmAudio): { audio: PcmAudio; steps: PreprocessStep[] } => {
    const logger = Logging.getLogger();
    const steps: PreprocessStep[] = [];

    let current = audio;

    if (current.channels.length > 1) {
        logger.debug('Converting %d channels to mono', current.channels.length);
    }
    const mono = downmix(current);
    steps.push({ name: 'downmix', applied: mono !== current });
    current = mono;

    if (current.sampleRate !== OPTIMAL_SAMPLE_RATE) {
        logger.debug('Resampling from %dHz to %dHz', current.sampleRate, OPTIMAL_SAMPLE_RATE);
    }
    const resampled = resample(current);
    steps.push({ name: 'resample', applied: resampled !== current });
    current = resampled;

    logger.debug('Normalizing audio levels');
    const normalized = normalize(current);
    steps.push({ name: 'normalize', applied: normalized !== current });
    current = normalized;

    return { audio: current, steps };
};
