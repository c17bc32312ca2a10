import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import * as Storage from '../../src/util/storage.js';

describe('Storage Utility', () => {
    const mockLog = vi.fn();
    let storage: Storage.Utility;
    let dir: string;

    beforeEach(async () => {
        vi.clearAllMocks();
        storage = Storage.create({ log: mockLog });
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'storage-test-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    test('exists and isFile distinguish files from directories', async () => {
        const file = path.join(dir, 'a.txt');
        await fs.writeFile(file, 'abc');

        expect(await storage.exists(file)).toBe(true);
        expect(await storage.isFile(file)).toBe(true);
        expect(await storage.exists(dir)).toBe(true);
        expect(await storage.isFile(dir)).toBe(false);
        expect(await storage.exists(path.join(dir, 'missing'))).toBe(false);
        expect(await storage.isFile(path.join(dir, 'missing'))).toBe(false);
    });

    test('writes, reads and sizes files', async () => {
        const file = path.join(dir, 'nested', 'b.txt');
        await storage.createDirectory(path.dirname(file));
        await storage.writeFile(file, 'hello');

        expect(await storage.readFile(file, 'utf8')).toBe('hello');
        expect(await storage.getFileSize(file)).toBe(5);
    });

    test('withTemporaryFile removes the file after the callback', async () => {
        let seen = '';
        const result = await storage.withTemporaryFile(Buffer.from('pcm'), '.wav', async (filePath) => {
            seen = filePath;
            expect(path.basename(filePath)).toBe('audio.wav');
            return fs.readFile(filePath, 'utf8');
        });

        expect(result).toBe('pcm');
        expect(await storage.exists(seen)).toBe(false);
        expect(await storage.exists(path.dirname(seen))).toBe(false);
    });

    test('withTemporaryFile removes the file when the callback throws', async () => {
        let seen = '';
        await expect(storage.withTemporaryFile(Buffer.from('pcm'), '.wav', async (filePath) => {
            seen = filePath;
            throw new Error('engine crashed');
        })).rejects.toThrow('engine crashed');

        expect(await storage.exists(seen)).toBe(false);
    });
});
