/**
 * Reports transcription progress in seconds of audio rather than as an
 * opaque unit, so long recordings show meaningful movement.
 */

export type ProgressReporter = (fraction: number) => void;

export const formatProgress = (fraction: number, totalSeconds: number): string => {
    const clamped = Math.max(0, Math.min(1, fraction));
    const done = (clamped * totalSeconds).toFixed(1);
    return `Transcribing: ${done}/${totalSeconds.toFixed(1)}s (${Math.round(clamped * 100)}%)`;
};

export const create = (totalSeconds: number, emit: (line: string) => void, step: number = 0.1): ProgressReporter => {
    let last = -1;
    return (fraction: number) => {
        const clamped = Math.max(0, Math.min(1, fraction));
        if (last >= 0 && clamped < 1 && clamped - last < step) return;
        if (clamped === last) return;
        last = clamped;
        emit(formatProgress(clamped, totalSeconds));
    };
};
