import * as fs from 'node:fs/promises';
import { beforeEach, describe, expect, test, vi } from 'vitest';

const { mockRun } = vi.hoisted(() => ({ mockRun: vi.fn() }));

vi.mock('../../src/util/child', () => ({
    run: mockRun,
}));

import * as WhisperCpp from '../../src/transcription/whisper-cpp.js';
import { ModelHandle } from '../../src/transcription/types.js';

const model: ModelHandle = { name: 'base', path: '/models/ggml-base.bin' };

describe('whisper.cpp', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    describe('buildArgs', () => {
        test('auto-detects language and disables the GPU without fp16', () => {
            expect(WhisperCpp.buildArgs('/tmp/a.wav', '/tmp/out', model, { fp16: false }, 4)).toEqual([
                '-m', '/models/ggml-base.bin',
                '-l', 'auto',
                '--output-txt',
                '--no-timestamps',
                '--print-progress',
                '-of', '/tmp/out',
                '-t', '4',
                '--no-gpu',
                '/tmp/a.wav',
            ]);
        });

        test('passes language and prompt', () => {
            expect(WhisperCpp.buildArgs('/tmp/a.wav', '/tmp/out', model, { fp16: true, language: 'de', prompt: 'Names: Ana' }, 2)).toEqual([
                '-m', '/models/ggml-base.bin',
                '-l', 'de',
                '--output-txt',
                '--no-timestamps',
                '--print-progress',
                '-of', '/tmp/out',
                '-t', '2',
                '--prompt', 'Names: Ana',
                '/tmp/a.wav',
            ]);
        });
    });

    test('parseProgress reads every percentage in a chunk', () => {
        const chunk = 'whisper_print_progress_callback: progress =  10%\nwhisper_print_progress_callback: progress = 55%\n';
        expect(WhisperCpp.parseProgress(chunk)).toEqual([0.1, 0.55]);
        expect(WhisperCpp.parseProgress('loading model')).toEqual([]);
    });

    test('parseLanguage reads the detected language', () => {
        expect(WhisperCpp.parseLanguage('whisper_full_with_state: auto-detected language: de (p = 0.981)')).toBe('de');
        expect(WhisperCpp.parseLanguage('nothing here')).toBeUndefined();
    });

    test('transcribe runs the binary on a temporary WAV file', async () => {
        let wavPath = '';
        mockRun.mockImplementation(async (_binary: string, args: string[], options: { onStderr?: (chunk: string) => void }) => {
            wavPath = args[args.length - 1];
            expect(await fs.readFile(wavPath, 'utf8')).toBe('RIFF');
            const outputBase = args[args.indexOf('-of') + 1];
            await fs.writeFile(`${outputBase}.txt`, ' Bonjour tout le monde\n');
            options.onStderr?.('progress = 50%');
            return { stdout: '', stderr: 'auto-detected language: fr (p = 0.9)', exitCode: 0 };
        });
        const onProgress = vi.fn();

        const stt = WhisperCpp.create({ binaryPath: 'whisper-test', threads: 1 });
        const output = await stt.transcribe(Buffer.from('RIFF'), model, { fp16: false, onProgress });

        expect(output).toEqual({ text: ' Bonjour tout le monde\n', language: 'fr' });
        expect(onProgress).toHaveBeenCalledWith(0.5);
        expect(mockRun.mock.calls[0][0]).toBe('whisper-test');
        await expect(fs.stat(wavPath)).rejects.toThrow();
    });

    test('no transcript file means no speech', async () => {
        mockRun.mockResolvedValue({ stdout: '', stderr: '', exitCode: 0 });

        const stt = WhisperCpp.create({ threads: 1 });
        await expect(stt.transcribe(Buffer.from('RIFF'), model, { fp16: false, language: 'en' }))
            .resolves.toEqual({ text: '', language: 'en' });
    });

    test('a failing binary rejects', async () => {
        mockRun.mockResolvedValue({ stdout: '', stderr: 'failed to load model', exitCode: 1 });

        const stt = WhisperCpp.create({ binaryPath: 'whisper-test', threads: 1 });
        await expect(stt.transcribe(Buffer.from('RIFF'), model, { fp16: false }))
            .rejects.toThrow('whisper-test exited with code 1: failed to load model');
    });
});
