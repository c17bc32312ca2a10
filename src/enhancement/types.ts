/**
 * Enhancement Types
 */

export type StageName = 'clean' | 'summarize' | 'channelFormat';

export type ArtifactName = 'raw' | 'cleaned' | 'summary' | 'cleaned_slack' | 'summary_slack';

export interface Artifact {
    name: ArtifactName;
    path: string;
    content: string;
}

export interface StageSettings {
    clean: boolean;
    summarize: boolean;
    channelFormat: boolean;
    cleanInstruction?: string;
    summaryInstruction?: string;
    channelDirective?: string;
}

export interface StagePlan {
    stage: StageName;
    instruction: string;
}

export type StageOutcome =
    | { kind: 'produced'; stage: StageName; text: string; artifact: Artifact }
    | { kind: 'skipped'; stage: StageName; priorText: string; reason: string };

export interface EnhancementInput {
    rawText: string;
    rawPath: string;
}

export interface EnhancementResult {
    outcomes: StageOutcome[];
    artifacts: Artifact[];
    finalText: string;
}
