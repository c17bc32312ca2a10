/**
 * Pipeline Types
 *
 * One job: a host, an audio file, and which enhancement stages to run.
 */

import { AudioAsset } from '../audio/types';
import { Artifact, StageOutcome, StageSettings } from '../enhancement/types';
import { ExecutionConfig, StateListener } from '../execution/types';
import { Refiner } from '../refinement/types';
import { Probe, RemoteChannel } from '../remote/types';
import { TranscriptionResult } from '../transcription/types';

export interface JobRequest {
    host: string;
    audioFile: string;
    outputDirectory?: string;
    model: string;
    language?: string;
    prompt?: string;
    verbose?: boolean;
    stages: StageSettings;
    signal?: AbortSignal;
}

export interface JobReport {
    success: true;
    asset: AudioAsset;
    transcription: TranscriptionResult;
    artifacts: Artifact[];           // Raw transcript first, then in stage order
    stages: StageOutcome[];
}

export interface ControllerConfig {
    execution: ExecutionConfig;
    probeTimeoutSeconds: number;
    channel: (host: string) => RemoteChannel;
    probe: Probe;
    // Null when no refinement credentials are configured
    refiner: () => Refiner | null;
    onStateChange?: StateListener;
}
