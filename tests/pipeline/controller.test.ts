import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { CancelledError, ConfigurationError, ConnectivityError, NotFoundError, RemoteExecutionError } from '../../src/errors.js';
import * as Pipeline from '../../src/pipeline/index.js';
import { RefineOptions, Refiner } from '../../src/refinement/types.js';
import { ChannelCallOptions, CommandResult, ProbeOptions, RemoteChannel } from '../../src/remote/types.js';

const ok = (stdout: string = ''): CommandResult => ({ stdout, stderr: '', exitCode: 0 });

const createChannel = (host: string, workerResult: CommandResult): RemoteChannel => ({
    host,
    copyTo: async () => {},
    copyFrom: async (_remotePath: string, localPath: string) => {
        await fs.writeFile(localPath, 'hello there');
    },
    run: async (argv: readonly string[], _options?: ChannelCallOptions) => argv[0] === 'node' ? workerResult : ok(),
});

describe('pipeline controller', () => {
    let dir: string;
    let audioFile: string;

    const probe = vi.fn(async (_host: string, _timeout: number, _options?: ProbeOptions) => true);
    const channel = vi.fn((host: string) => createChannel(host, ok('{"language":"en","duration":4.2,"model":"base"}')));
    const refine = vi.fn(async (text: string, instruction: string, _options?: RefineOptions) => `${instruction.length}:${text}`);
    const refiner = vi.fn((): Refiner | null => ({ refine }));

    const create = () => Pipeline.create({
        execution: {
            workerScript: '/opt/rescribe/worker.js',
            remoteScriptPath: '.rescribe/worker.js',
            remoteRunner: ['node'],
            stagingDirectory: '/tmp',
        },
        probeTimeoutSeconds: 5,
        channel,
        probe,
        refiner,
    });

    const job = (overrides: Partial<Pipeline.JobRequest> = {}): Pipeline.JobRequest => ({
        host: 'gpu-box',
        audioFile,
        outputDirectory: dir,
        model: 'base',
        language: 'en',
        stages: { clean: false, summarize: false, channelFormat: false },
        ...overrides,
    });

    beforeEach(async () => {
        vi.clearAllMocks();
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'controller-test-'));
        audioFile = path.join(dir, 'memo.m4a');
        await fs.writeFile(audioFile, 'audio bytes');
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('transcribes without enhancement', async () => {
        const report = await create().run(job());

        expect(report.success).toBe(true);
        expect(report.asset).toEqual({ path: audioFile, size: 11, duration: 4.2 });
        expect(report.transcription).toEqual({ text: 'hello there', language: 'en', duration: 4.2, model: 'base' });
        expect(report.artifacts).toEqual([{ name: 'raw', path: path.join(dir, 'memo.txt'), content: 'hello there' }]);
        expect(report.stages).toEqual([]);
        expect(probe).toHaveBeenCalledWith('gpu-box', 5, { signal: undefined });
        expect(refiner).not.toHaveBeenCalled();
        expect((await fs.readdir(dir)).sort()).toEqual(['memo.m4a', 'memo.txt']);
    });

    test('runs clean and summary after the raw transcript', async () => {
        const report = await create().run(job({ stages: { clean: true, summarize: true, channelFormat: false } }));

        expect(report.artifacts.map(a => a.name)).toEqual(['raw', 'cleaned', 'summary']);
        expect(report.artifacts[1].path).toBe(path.join(dir, 'memo_cleaned.txt'));
        expect(refine).toHaveBeenCalledTimes(2);
        expect(refine.mock.calls[0][0]).toBe('hello there');
    });

    test('a failed summary keeps the cleaned transcript and the job succeeds', async () => {
        refine
            .mockImplementationOnce(async (text: string) => `cleaned ${text}`)
            .mockRejectedValueOnce(new Error('rate limited'));

        const report = await create().run(job({ stages: { clean: false, summarize: true, channelFormat: false } }));

        expect(report.success).toBe(true);
        expect(report.artifacts.map(a => a.name)).toEqual(['raw', 'cleaned']);
        expect(report.stages.map(o => o.kind)).toEqual(['produced', 'skipped']);
        expect(await fs.readFile(path.join(dir, 'memo_cleaned.txt'), 'utf8')).toBe('cleaned hello there');
        await expect(fs.stat(path.join(dir, 'memo_summary.txt'))).rejects.toThrow();
    });

    test('an interrupt during enhancement stops the remaining stages', async () => {
        const controller = new AbortController();
        refine.mockImplementationOnce(async (text: string) => {
            controller.abort();
            return `cleaned ${text}`;
        });

        await expect(create().run(job({
            stages: { clean: true, summarize: true, channelFormat: true },
            signal: controller.signal,
        }))).rejects.toBeInstanceOf(CancelledError);
        expect(refine).toHaveBeenCalledTimes(1);
        expect(refine.mock.calls[0][2]).toEqual({ signal: controller.signal });
        expect((await fs.readdir(dir)).sort()).toEqual(['memo.m4a', 'memo.txt']);
    });

    test('an interrupt during the probe stops the job before staging', async () => {
        const controller = new AbortController();
        probe.mockImplementationOnce(async () => {
            controller.abort();
            return false;
        });

        await expect(create().run(job({ signal: controller.signal }))).rejects.toThrow('Job cancelled after probe');
        expect(channel).not.toHaveBeenCalled();
    });

    test('an unreachable host fails before anything is staged', async () => {
        probe.mockResolvedValueOnce(false);

        const pending = create().run(job());
        await expect(pending).rejects.toBeInstanceOf(ConnectivityError);
        await expect(pending).rejects.toThrow('probe failed for host gpu-box: host did not answer within 5s');
        expect(channel).not.toHaveBeenCalled();
    });

    test('configuration errors surface before the probe', async () => {
        await expect(create().run(job({ model: 'huge' }))).rejects.toBeInstanceOf(ConfigurationError);
        await expect(create().run(job({ host: '   ' }))).rejects.toThrow('A remote host is required');
        expect(probe).not.toHaveBeenCalled();
    });

    test('a missing audio file surfaces before the probe', async () => {
        await expect(create().run(job({ audioFile: path.join(dir, 'missing.m4a') }))).rejects.toBeInstanceOf(NotFoundError);
        expect(probe).not.toHaveBeenCalled();
    });

    test('a remote failure ends the job before enhancement', async () => {
        channel.mockImplementationOnce((host: string) => createChannel(host, { stdout: '', stderr: 'boom', exitCode: 2 }));

        await expect(create().run(job({ stages: { clean: true, summarize: false, channelFormat: false } })))
            .rejects.toBeInstanceOf(RemoteExecutionError);
        expect(refiner).not.toHaveBeenCalled();
    });

    test('missing credentials keep the raw transcript and skip every stage', async () => {
        refiner.mockReturnValueOnce(null);

        const report = await create().run(job({ stages: { clean: true, summarize: false, channelFormat: true } }));

        expect(report.artifacts.map(a => a.name)).toEqual(['raw']);
        expect(report.stages).toEqual([
            { kind: 'skipped', stage: 'clean', priorText: 'hello there', reason: 'no refinement credentials' },
            { kind: 'skipped', stage: 'channelFormat', priorText: 'hello there', reason: 'no refinement credentials' },
        ]);
    });

    test('missing metadata falls back to the request', async () => {
        channel.mockImplementationOnce((host: string) => createChannel(host, ok('no metadata')));

        const report = await create().run(job({ language: undefined }));

        expect(report.transcription).toEqual({ text: 'hello there', language: 'unknown', duration: 0, model: 'base' });
        expect(report.asset).toEqual({ path: audioFile, size: 11 });
    });
});
