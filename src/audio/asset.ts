import * as path from 'node:path';
import { NotFoundError } from '../errors';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { AudioAsset } from './types';

export const fromPath = async (filePath: string): Promise<AudioAsset> => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });

    const absolute = path.resolve(filePath);
    if (!await storage.isFile(absolute)) {
        throw new NotFoundError(absolute, 'Audio file');
    }

    return Object.freeze({
        path: absolute,
        size: await storage.getFileSize(absolute),
    });
};
