/**
 * Transcription System
 *
 * Runs on the remote host inside the worker script. The local side only uses
 * the request helpers to validate a job before anything leaves the machine.
 */

export * from './types';
export { createRequest, assertSupportedModel, isSupportedModel } from './request';
export type { RequestInput } from './request';
export * as Engine from './engine';
export * as Dependency from './dependency';
export * as Models from './models';
export * as WhisperCpp from './whisper-cpp';
export * as Progress from './progress';
