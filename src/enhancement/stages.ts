import { DEFAULT_CHANNEL_DIRECTIVE, DEFAULT_CLEAN_INSTRUCTION, DEFAULT_SUMMARY_INSTRUCTION } from '../constants';
import { ArtifactName, StageName, StageOutcome, StagePlan, StageSettings } from './types';

export const STAGE_ORDER: readonly StageName[] = ['clean', 'summarize', 'channelFormat'];

// Summaries are always written from cleaned text, never raw
export const effectiveSettings = (settings: StageSettings): StageSettings => ({
    ...settings,
    clean: settings.clean || settings.summarize,
});

export const isEnabled = (settings: StageSettings): boolean => {
    return settings.clean || settings.summarize || settings.channelFormat;
};

export const instructionFor = (stage: StageName, settings: StageSettings): string => {
    const clean = settings.cleanInstruction?.trim() || DEFAULT_CLEAN_INSTRUCTION;
    switch (stage) {
        case 'clean':
            return clean;
        case 'summarize':
            return settings.summaryInstruction?.trim() || DEFAULT_SUMMARY_INSTRUCTION;
        case 'channelFormat':
            return clean + (settings.channelDirective ?? DEFAULT_CHANNEL_DIRECTIVE);
    }
};

export const plan = (settings: StageSettings): StagePlan[] => {
    const effective = effectiveSettings(settings);
    const enabled: Record<StageName, boolean> = {
        clean: effective.clean,
        summarize: effective.summarize,
        channelFormat: effective.channelFormat,
    };
    return STAGE_ORDER
        .filter(stage => enabled[stage])
        .map(stage => ({ stage, instruction: instructionFor(stage, effective) }));
};

const produced = (outcomes: readonly StageOutcome[], stage: StageName): boolean => {
    return outcomes.some(o => o.kind === 'produced' && o.stage === stage);
};

// Naming depends on what actually succeeded earlier in the chain
export const artifactNameFor = (stage: StageName, earlier: readonly StageOutcome[]): ArtifactName => {
    switch (stage) {
        case 'clean':
            return 'cleaned';
        case 'summarize':
            return 'summary';
        case 'channelFormat':
            return produced(earlier, 'summarize') ? 'summary_slack' : 'cleaned_slack';
    }
};

export const currentText = (rawText: string, outcomes: readonly StageOutcome[]): string => {
    for (let i = outcomes.length - 1; i >= 0; i--) {
        const outcome = outcomes[i];
        if (outcome.kind === 'produced') return outcome.text;
    }
    return rawText;
};
