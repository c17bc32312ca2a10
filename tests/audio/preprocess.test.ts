import { describe, expect, test } from 'vitest';
import {
    downmix,
    isPrepared,
    normalize,
    peak,
    preprocess,
    resample,
    TARGET_PEAK,
} from '../../src/audio/preprocess.js';
import { PcmAudio } from '../../src/audio/types.js';

const tone = (sampleRate: number, seconds: number, amplitude: number, channelCount: number): PcmAudio => {
    const frames = Math.round(sampleRate * seconds);
    const channels = Array.from({ length: channelCount }, (_, c) => {
        const data = new Float32Array(frames);
        for (let i = 0; i < frames; i++) {
            data[i] = amplitude * Math.sin(2 * Math.PI * (220 + c * 110) * i / sampleRate);
        }
        return data;
    });
    return { sampleRate, channels };
};

describe('preprocess', () => {
    test('downmix averages channels', () => {
        const stereo: PcmAudio = {
            sampleRate: 16000,
            channels: [new Float32Array([0.5, 1]), new Float32Array([0.5, 0])],
        };
        const mono = downmix(stereo);
        expect(mono.channels).toHaveLength(1);
        expect(Array.from(mono.channels[0])).toEqual([0.5, 0.5]);
    });

    test('downmix returns mono input unchanged', () => {
        const mono: PcmAudio = { sampleRate: 16000, channels: [new Float32Array([0.1])] };
        expect(downmix(mono)).toBe(mono);
    });

    test('resample halves the frame count from 32 kHz', () => {
        const audio: PcmAudio = { sampleRate: 32000, channels: [new Float32Array([0.1, 0.2, 0.3, 0.4])] };
        const out = resample(audio);
        expect(out.sampleRate).toBe(16000);
        expect(out.channels[0]).toHaveLength(2);
        expect(out.channels[0][0]).toBeCloseTo(0.1, 6);
        expect(out.channels[0][1]).toBeCloseTo(0.3, 6);
    });

    test('resample interpolates when upsampling', () => {
        const audio: PcmAudio = { sampleRate: 8000, channels: [new Float32Array([0, 1])] };
        const out = resample(audio);
        expect(Array.from(out.channels[0])).toEqual([0, 0.5, 1, 1]);
    });

    test('normalize scales the peak to the target', () => {
        const audio: PcmAudio = { sampleRate: 16000, channels: [new Float32Array([0.5, -0.25])] };
        const out = normalize(audio);
        expect(peak(out)).toBeCloseTo(TARGET_PEAK, 5);
        expect(out.channels[0][1]).toBeCloseTo(-TARGET_PEAK / 2, 5);
    });

    test('normalize leaves silence untouched', () => {
        const silence: PcmAudio = { sampleRate: 16000, channels: [new Float32Array(10)] };
        expect(normalize(silence)).toBe(silence);
    });

    test('produces mono 16 kHz normalized audio', () => {
        const { audio, steps } = preprocess(tone(48000, 0.1, 0.3, 2));

        expect(audio.channels).toHaveLength(1);
        expect(audio.sampleRate).toBe(16000);
        expect(audio.channels[0]).toHaveLength(1600);
        expect(peak(audio)).toBeCloseTo(TARGET_PEAK, 4);
        expect(isPrepared(audio)).toBe(true);
        expect(steps).toEqual([
            { name: 'downmix', applied: true },
            { name: 'resample', applied: true },
            { name: 'normalize', applied: true },
        ]);
    });

    test('is idempotent on prepared audio', () => {
        const first = preprocess(tone(44100, 0.05, 0.8, 1));
        const second = preprocess(first.audio);

        expect(second.audio).toBe(first.audio);
        expect(second.steps.every(step => !step.applied)).toBe(true);
    });

    test('isPrepared rejects stereo and other rates', () => {
        expect(isPrepared(tone(16000, 0.01, 0.5, 2))).toBe(false);
        expect(isPrepared(tone(44100, 0.01, TARGET_PEAK, 1))).toBe(false);
    });
});
