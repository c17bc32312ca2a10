import { describe, expect, test, vi } from 'vitest';
import * as Progress from '../../src/transcription/progress.js';

describe('progress', () => {
    test('formats seconds of audio done', () => {
        expect(Progress.formatProgress(0.5, 120)).toBe('Transcribing: 60.0/120.0s (50%)');
        expect(Progress.formatProgress(1.5, 10)).toBe('Transcribing: 10.0/10.0s (100%)');
        expect(Progress.formatProgress(-1, 10)).toBe('Transcribing: 0.0/10.0s (0%)');
    });

    test('throttles to the step size and reports completion once', () => {
        const emit = vi.fn();
        const report = Progress.create(10, emit);

        [0, 0.05, 0.25, 0.3, 1, 1].forEach(report);

        expect(emit.mock.calls.map(([line]) => line)).toEqual([
            'Transcribing: 0.0/10.0s (0%)',
            'Transcribing: 2.5/10.0s (25%)',
            'Transcribing: 10.0/10.0s (100%)',
        ]);
    });
});
