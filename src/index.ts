/**
 * Rescribe Public API
 *
 * Programmatic access to the remote transcription pipeline. The `rescribe`
 * binary wraps {@link Pipeline.create}; `rescribe-worker` is the script that
 * runs on the transcription host.
 */

export * as Audio from './audio';
export * as Enhancement from './enhancement';
export * as Execution from './execution';
export * as Pipeline from './pipeline';
export * as Refinement from './refinement';
export * as Remote from './remote';
export * as Transcription from './transcription';

export * from './errors';
export { configureLogging, getLogger, setLogLevel } from './logging';
export type { LogLevel } from './logging';
export { PROGRAM_NAME, SUPPORTED_MODELS, VERSION } from './constants';
