/**
 * Remote Execution Types
 */

import { AudioAsset } from '../audio/types';
import { TranscriptionMetadata, TranscriptionRequest } from '../transcription/types';

export type ExecutionState =
    | 'idle'
    | 'stagingIn'
    | 'invoking'
    | 'stagingOut'
    | 'cleaningUp'
    | 'done'
    | 'failed';

export interface RemoteJobContext {
    host: string;
    jobId: string;
    remote: {
        script: string;
        stagingDirectory: string;
        audio: string;
        transcript: string;
    };
    local: {
        audio: string;
        script: string;
        transcript: string;
    };
}

export interface ExecutionConfig {
    workerScript: string;            // Local path of the worker script to stage
    remoteScriptPath: string;        // Relative paths resolve against the remote home
    remoteRunner: string[];
    stagingDirectory: string;
}

export interface ExecutionInput {
    asset: AudioAsset;
    request: TranscriptionRequest;
    outputDirectory?: string;
    signal?: AbortSignal;
}

export interface ExecutionResult {
    transcriptPath: string;
    text: string;
    metadata: TranscriptionMetadata | null;
    context: RemoteJobContext;
}

export type StateListener = (state: ExecutionState, context: RemoteJobContext) => void;
