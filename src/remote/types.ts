/**
 * Remote Access Channel
 *
 * "Run a command on host H" and "copy a file between here and host H".
 * Callers await each operation before starting the next.
 */

import { JobStep } from '../errors';

export interface CommandResult {
    stdout: string;
    stderr: string;
    exitCode: number;
}

export interface ChannelCallOptions {
    signal?: AbortSignal;
    /** Job step named in a ConnectivityError raised by this call */
    step?: JobStep;
    /** Remote stderr as it arrives (run only) */
    onStderr?: (chunk: string) => void;
}

export interface RemoteChannel {
    readonly host: string;
    copyTo(localPath: string, remotePath: string, options?: ChannelCallOptions): Promise<void>;
    copyFrom(remotePath: string, localPath: string, options?: ChannelCallOptions): Promise<void>;
    /** Arguments are quoted by the channel; a non-zero exit resolves, it does not reject. */
    run(argv: readonly string[], options?: ChannelCallOptions): Promise<CommandResult>;
}

export interface ChannelConfig {
    host: string;
    copyTimeoutSeconds: number;
    sshBinary?: string;
    scpBinary?: string;
}

export interface ProbeOptions {
    signal?: AbortSignal;
    sshBinary?: string;
}

export type Probe = (host: string, timeoutSeconds: number, options?: ProbeOptions) => Promise<boolean>;
