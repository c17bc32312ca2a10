import { describe, expect, test } from 'vitest';
import { DEFAULT_CLEAN_INSTRUCTION, DEFAULT_SUMMARY_INSTRUCTION } from '../../src/constants.js';
import * as Stages from '../../src/enhancement/stages.js';
import { StageOutcome, StageSettings } from '../../src/enhancement/types.js';

const settings = (clean: boolean, summarize: boolean, channelFormat: boolean): StageSettings => ({ clean, summarize, channelFormat });

describe('enhancement stages', () => {
    test('summarize implies clean', () => {
        expect(Stages.plan(settings(false, true, false)).map(p => p.stage)).toEqual(['clean', 'summarize']);
        expect(Stages.plan(settings(false, false, true)).map(p => p.stage)).toEqual(['channelFormat']);
        expect(Stages.plan(settings(false, false, false))).toEqual([]);
    });

    test('stages always run in a fixed order', () => {
        expect(Stages.plan(settings(true, true, true)).map(p => p.stage)).toEqual(['clean', 'summarize', 'channelFormat']);
    });

    test('default instructions', () => {
        expect(Stages.instructionFor('clean', settings(true, false, false))).toBe(DEFAULT_CLEAN_INSTRUCTION);
        expect(Stages.instructionFor('summarize', settings(true, true, false))).toBe(DEFAULT_SUMMARY_INSTRUCTION);
        expect(Stages.instructionFor('channelFormat', settings(false, false, true)))
            .toBe(`${DEFAULT_CLEAN_INSTRUCTION} Format as a Slack message.`);
    });

    test('custom instructions replace the defaults', () => {
        const custom: StageSettings = {
            ...settings(true, true, true),
            cleanInstruction: 'Fix typos.',
            summaryInstruction: ' Bullet points. ',
        };
        expect(Stages.instructionFor('clean', custom)).toBe('Fix typos.');
        expect(Stages.instructionFor('summarize', custom)).toBe('Bullet points.');
        expect(Stages.instructionFor('channelFormat', custom)).toBe('Fix typos. Format as a Slack message.');
    });

    test('channel artifacts are named after what actually succeeded', () => {
        const summaryProduced: StageOutcome[] = [{
            kind: 'produced',
            stage: 'summarize',
            text: 's',
            artifact: { name: 'summary', path: '/out/a_summary.txt', content: 's' },
        }];
        const summarySkipped: StageOutcome[] = [{ kind: 'skipped', stage: 'summarize', priorText: 'c', reason: 'timeout' }];

        expect(Stages.artifactNameFor('channelFormat', summaryProduced)).toBe('summary_slack');
        expect(Stages.artifactNameFor('channelFormat', summarySkipped)).toBe('cleaned_slack');
        expect(Stages.artifactNameFor('channelFormat', [])).toBe('cleaned_slack');
        expect(Stages.artifactNameFor('clean', [])).toBe('cleaned');
    });

    test('currentText is the last produced text', () => {
        const outcomes: StageOutcome[] = [
            { kind: 'produced', stage: 'clean', text: 'cleaned', artifact: { name: 'cleaned', path: '/x', content: 'cleaned' } },
            { kind: 'skipped', stage: 'summarize', priorText: 'cleaned', reason: 'timeout' },
        ];
        expect(Stages.currentText('raw', outcomes)).toBe('cleaned');
        expect(Stages.currentText('raw', [])).toBe('raw');
    });

    test('isEnabled is true when any stage is on', () => {
        expect(Stages.isEnabled(settings(false, false, false))).toBe(false);
        expect(Stages.isEnabled(settings(false, false, true))).toBe(true);
    });
});
