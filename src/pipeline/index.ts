/**
 * Pipeline Integration
 *
 * Main entry point for a transcription job. Use Pipeline.create() in rescribe.ts.
 */

import * as Controller from './controller';
import { ControllerConfig } from './types';

export type { ControllerInstance } from './controller';

export const create = (config: ControllerConfig): Controller.ControllerInstance => {
    return Controller.create(config);
};

// Re-export types
export * from './types';
