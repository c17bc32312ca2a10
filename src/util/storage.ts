import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

export interface Utility {
    exists: (filePath: string) => Promise<boolean>;
    isFile: (filePath: string) => Promise<boolean>;
    getFileSize: (filePath: string) => Promise<number>;
    readFile: (filePath: string, encoding: BufferEncoding) => Promise<string>;
    writeFile: (filePath: string, data: string | Buffer, encoding?: BufferEncoding) => Promise<void>;
    createDirectory: (dirPath: string) => Promise<void>;
    withTemporaryFile: <T>(data: Buffer, suffix: string, fn: (filePath: string) => Promise<T>) => Promise<T>;
}

export const create = (params: { log?: (message: string, ...args: unknown[]) => void }): Utility => {
    const log = params.log || (() => {});

    const exists = async (filePath: string): Promise<boolean> => {
        try {
            await fs.stat(filePath);
            return true;
        } catch {
            return false;
        }
    };

    const isFile = async (filePath: string): Promise<boolean> => {
        try {
            const stats = await fs.stat(filePath);
            return stats.isFile();
        } catch {
            return false;
        }
    };

    const getFileSize = async (filePath: string): Promise<number> => {
        const stats = await fs.stat(filePath);
        return stats.size;
    };

    const readFile = async (filePath: string, encoding: BufferEncoding): Promise<string> => {
        return fs.readFile(filePath, { encoding });
    };

    const writeFile = async (filePath: string, data: string | Buffer, encoding: BufferEncoding = 'utf8'): Promise<void> => {
        await fs.writeFile(filePath, data, { encoding });
    };

    const createDirectory = async (dirPath: string): Promise<void> => {
        await fs.mkdir(dirPath, { recursive: true });
    };

    // The directory, and the file inside it, are gone once fn settles
    const withTemporaryFile = async <T>(data: Buffer, suffix: string, fn: (filePath: string) => Promise<T>): Promise<T> => {
        const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'rescribe-'));
        const filePath = path.join(dir, `audio${suffix}`);
        try {
            await fs.writeFile(filePath, data);
            log('Wrote temporary file %s (%d bytes)', filePath, data.length);
            return await fn(filePath);
        } finally {
            await fs.rm(dir, { recursive: true, force: true });
            log('Removed temporary directory %s', dir);
        }
    };

    return {
        exists,
        isFile,
        getFileSize,
        readFile,
        writeFile,
        createDirectory,
        withTemporaryFile,
    };
};
