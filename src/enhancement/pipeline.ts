/**
 * Enhancement Pipeline
 *
 * Clean -> Summarize -> ChannelFormat. Each stage refines the text produced by
 * the last stage that succeeded. A failed stage writes nothing and the chain
 * continues from the previous text.
 */

import { CancelledError, describeError, EnhancementStageError } from '../errors';
import * as Logging from '../logging';
import { Refiner } from '../refinement/types';
import * as Artifacts from './artifacts';
import * as Stages from './stages';
import { EnhancementInput, EnhancementResult, StageName, StageOutcome, StagePlan, StageSettings } from './types';

export interface PipelineInstance {
    run(input: EnhancementInput, settings: StageSettings): Promise<EnhancementResult>;
}

export interface PipelineOptions {
    refiner: Refiner;
    writer?: Artifacts.ArtifactWriter;
    // Aborting stops the chain with a CancelledError; nothing further is written
    signal?: AbortSignal;
}

export const skipAll = (input: EnhancementInput, settings: StageSettings, reason: string): EnhancementResult => ({
    outcomes: Stages.plan(settings).map(({ stage }): StageOutcome => ({ kind: 'skipped', stage, priorText: input.rawText, reason })),
    artifacts: [],
    finalText: input.rawText,
});

export const create = (options: PipelineOptions): PipelineInstance => {
    const logger = Logging.getLogger();
    const writer = options.writer ?? Artifacts.createWriter();
    const { signal } = options;

    const ensureNotCancelled = (stage: StageName) => {
        if (signal?.aborted) {
            throw new CancelledError(`Job cancelled during ${stage} stage`);
        }
    };

    const runStage = async (step: StagePlan, input: EnhancementInput, earlier: readonly StageOutcome[]): Promise<StageOutcome> => {
        const priorText = Stages.currentText(input.rawText, earlier);
        if (!priorText.trim()) {
            logger.warn('Skipping %s stage: transcript is empty', step.stage);
            return { kind: 'skipped', stage: step.stage, priorText, reason: 'empty transcript' };
        }

        logger.info('Running %s stage...', step.stage);
        try {
            const text = await options.refiner.refine(priorText, step.instruction, { signal });
            ensureNotCancelled(step.stage);
            if (!text.trim()) {
                throw new EnhancementStageError(step.stage, 'refinement returned no text');
            }
            const artifact = await writer.write(Stages.artifactNameFor(step.stage, earlier), input.rawPath, text);
            return { kind: 'produced', stage: step.stage, text, artifact };
        } catch (error) {
            if (error instanceof CancelledError) throw error;
            ensureNotCancelled(step.stage);
            const stageError = error instanceof EnhancementStageError
                ? error
                : new EnhancementStageError(step.stage, describeError(error), { cause: error });
            logger.warn('%s; continuing with the previous text', stageError.message);
            return { kind: 'skipped', stage: step.stage, priorText, reason: describeError(stageError) };
        }
    };

    const run = async (input: EnhancementInput, settings: StageSettings): Promise<EnhancementResult> => {
        const outcomes: StageOutcome[] = [];
        for (const step of Stages.plan(settings)) {
            ensureNotCancelled(step.stage);
            outcomes.push(await runStage(step, input, outcomes));
        }

        return {
            outcomes,
            artifacts: outcomes.flatMap(o => o.kind === 'produced' ? [o.artifact] : []),
            finalText: Stages.currentText(input.rawText, outcomes),
        };
    };

    return { run };
};
