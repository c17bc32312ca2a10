import * as path from 'node:path';
import * as Logging from '../logging';
import * as Storage from '../util/storage';
import { Artifact, ArtifactName } from './types';

/**
 * `<dir>/<name>.txt` for the raw transcript, `<dir>/<name>_<artifact>.txt` for the rest.
 */
export const artifactPath = (rawPath: string, name: ArtifactName): string => {
    if (name === 'raw') return rawPath;
    const parsed = path.parse(rawPath);
    return path.join(parsed.dir, `${parsed.name}_${name}${parsed.ext}`);
};

export interface ArtifactWriter {
    write(name: ArtifactName, rawPath: string, content: string): Promise<Artifact>;
}

// Artifacts are append-only: each name is written at most once per run
export const createWriter = (): ArtifactWriter => {
    const logger = Logging.getLogger();
    const storage = Storage.create({ log: (message, ...args) => logger.debug(message, ...args) });
    const names = new Set<ArtifactName>();

    const write = async (name: ArtifactName, rawPath: string, content: string): Promise<Artifact> => {
        if (names.has(name)) {
            throw new Error(`Artifact '${name}' was already written in this run`);
        }
        const filePath = artifactPath(rawPath, name);
        await storage.writeFile(filePath, content, 'utf8');
        names.add(name);
        logger.info('Saved %s transcript to: %s', name, filePath);
        return { name, path: filePath, content };
    };

    return { write };
};
