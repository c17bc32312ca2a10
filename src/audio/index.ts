/**
 * Audio Preprocessing Engine
 *
 * In-memory audio preparation: decoding lives in util/media, this module turns
 * whatever was decoded into mono 16 kHz normalized audio and back into bytes.
 */

export * from './types';
export { preprocess, downmix, resample, normalize, peak, isPrepared, TARGET_PEAK } from './preprocess';
export { encodeWav, durationSeconds } from './wav';
export { fromPath } from './asset';
