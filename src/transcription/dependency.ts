/**
 * Codec Tool Check
 *
 * Looks the codec tool up on PATH once per process. The boolean is cached
 * and never invalidated: a missing tool fails every later transcription
 * without another lookup, and installation guidance is printed only once.
 */

import { CODEC_TOOL } from '../constants';
import { MissingDependencyError } from '../errors';
import * as Logging from '../logging';
import { which } from '../util/child';

export interface DependencyCheck {
    ensure(): Promise<void>;
    cached(): boolean | undefined;
}

export interface DependencyCheckOptions {
    tool?: string;
    lookup?: (name: string) => Promise<boolean>;
    platform?: NodeJS.Platform;
}

export const installGuidance = (tool: string, platform: NodeJS.Platform): string => {
    switch (platform) {
        case 'darwin':
            return `Install it with Homebrew: brew install ${tool}`;
        case 'win32':
            return `Install it with winget: winget install ${tool} (or choco install ${tool}), then restart your terminal`;
        case 'linux':
            return `Install it with your package manager, e.g. sudo apt install ${tool} (Debian/Ubuntu) or sudo dnf install ${tool} (Fedora)`;
        default:
            return `Install ${tool} and make sure it is on your PATH`;
    }
};

export const create = (options: DependencyCheckOptions = {}): DependencyCheck => {
    const tool = options.tool ?? CODEC_TOOL;
    const lookup = options.lookup ?? which;
    const platform = options.platform ?? process.platform;

    let result: Promise<boolean> | null = null;
    let available: boolean | undefined;

    const check = async (): Promise<boolean> => {
        const logger = Logging.getLogger();
        available = await lookup(tool);
        if (available) {
            logger.debug('Found %s on PATH', tool);
        } else {
            logger.error('%s is required but was not found. %s', tool, installGuidance(tool, platform));
        }
        return available;
    };

    const ensure = async (): Promise<void> => {
        result ??= check();
        if (!await result) {
            throw new MissingDependencyError(tool, installGuidance(tool, platform));
        }
    };

    return {
        ensure,
        cached: () => available,
    };
};

let processCheck: DependencyCheck | null = null;

export const processDependencyCheck = (): DependencyCheck => {
    processCheck ??= create();
    return processCheck;
};
