/**
 * ssh/scp channel
 *
 * Programs are spawned without a local shell. The remote side always parses
 * through a shell, so every argument of a remote command is quoted here, once.
 */

import { ConnectivityError, describeError, JobStep } from '../errors';
import * as Logging from '../logging';
import { run as runProcess, RunResult } from '../util/child';
import { join, quote } from '../util/shell';
import { ChannelCallOptions, ChannelConfig, CommandResult, ProbeOptions, RemoteChannel } from './types';

// Never fall back to an interactive password or host-key prompt
const BATCH_OPTIONS = ['-o', 'BatchMode=yes'];

export const remoteSpec = (host: string, remotePath: string): string => `${host}:${quote(remotePath)}`;

export const probe = async (host: string, timeoutSeconds: number, options: ProbeOptions = {}): Promise<boolean> => {
    const logger = Logging.getLogger();
    logger.info('Testing SSH connection to %s...', host);
    try {
        const result = await runProcess(options.sshBinary ?? 'ssh', [
            ...BATCH_OPTIONS,
            '-o', `ConnectTimeout=${timeoutSeconds}`,
            host,
            'echo', 'ok',
        ], { timeoutMs: (timeoutSeconds + 5) * 1000, signal: options.signal });

        if (result.exitCode !== 0) {
            logger.warn('SSH connection failed to %s: %s', host, result.stderr.trim() || `exit code ${result.exitCode}`);
            return false;
        }
        logger.info('SSH connection successful to %s', host);
        return true;
    } catch (error) {
        logger.warn('SSH connection failed to %s: %s', host, describeError(error));
        return false;
    }
};

export const create = (config: ChannelConfig): RemoteChannel => {
    const logger = Logging.getLogger();
    const ssh = config.sshBinary ?? 'ssh';
    const scp = config.scpBinary ?? 'scp';
    const copyOptions = [...BATCH_OPTIONS, '-o', `ConnectTimeout=${config.copyTimeoutSeconds}`];

    const copy = async (args: string[], description: string, step: JobStep, options: ChannelCallOptions): Promise<void> => {
        logger.debug('Running: scp %s', args.join(' '));
        let result: RunResult;
        try {
            result = await runProcess(scp, [...copyOptions, ...args], { signal: options.signal });
        } catch (error) {
            throw new ConnectivityError(step, config.host, `${description}: ${describeError(error)}`, { cause: error });
        }
        if (result.exitCode !== 0) {
            throw new ConnectivityError(step, config.host, `${description}: ${result.stderr.trim() || `scp exited with code ${result.exitCode}`}`);
        }
    };

    const copyTo = async (localPath: string, remotePath: string, options: ChannelCallOptions = {}): Promise<void> => {
        await copy([localPath, remoteSpec(config.host, remotePath)], `copy ${localPath} to ${remotePath}`, options.step ?? 'stagingIn', options);
    };

    const copyFrom = async (remotePath: string, localPath: string, options: ChannelCallOptions = {}): Promise<void> => {
        await copy([remoteSpec(config.host, remotePath), localPath], `copy ${remotePath} to ${localPath}`, options.step ?? 'stagingOut', options);
    };

    const run = async (argv: readonly string[], options: ChannelCallOptions = {}): Promise<CommandResult> => {
        const line = join(argv);
        logger.debug('Running on %s: %s', config.host, line);
        try {
            return await runProcess(ssh, [...BATCH_OPTIONS, config.host, line], {
                signal: options.signal,
                onStderr: options.onStderr,
            });
        } catch (error) {
            throw new ConnectivityError(options.step ?? 'invoking', config.host, describeError(error), { cause: error });
        }
    };

    return {
        host: config.host,
        copyTo,
        copyFrom,
        run,
    };
};
