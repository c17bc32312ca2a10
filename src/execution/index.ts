/**
 * Remote Execution
 *
 * Stages a job on the remote host, runs the worker there, and brings the raw
 * transcript home.
 */

import { RemoteChannel } from '../remote/types';
import * as Orchestrator from './orchestrator';
import { ExecutionConfig } from './types';

export type { OrchestratorInstance, OrchestratorOptions } from './orchestrator';
export { buildContext, buildInvocation, parseMetadata } from './orchestrator';

export const create = (channel: RemoteChannel, config: ExecutionConfig, options?: Orchestrator.OrchestratorOptions): Orchestrator.OrchestratorInstance => {
    return Orchestrator.create(channel, config, options);
};

export * from './types';
