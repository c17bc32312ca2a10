import os from 'node:os';

export const VERSION = '__VERSION__ (__GIT_BRANCH__/__GIT_COMMIT__ __GIT_TAGS__ __GIT_COMMIT_DATE__) __SYSTEM_INFO__';
export const PROGRAM_NAME = 'rescribe';
export const WORKER_NAME = 'rescribe-worker';

export const DEFAULT_VERBOSE = false;
export const DEFAULT_DEBUG = false;

export const DEFAULT_CONFIG_DIR = `./.${PROGRAM_NAME}`;
export const DEFAULT_CONFIG_FILE_NAME = 'config.yaml';

// Speech-to-text models the remote worker accepts
export const SUPPORTED_MODELS = [
    'tiny',
    'tiny.en',
    'base',
    'base.en',
    'small',
    'small.en',
    'medium',
    'medium.en',
    'large',
    'turbo',
] as const;

export const DEFAULT_TRANSCRIPTION_MODEL = 'turbo';
export const DEFAULT_LANGUAGE = 'en';

// Whisper models are trained on 16 kHz mono input
export const OPTIMAL_SAMPLE_RATE = 16000;
export const NORMALIZE_HEADROOM_DB = 0.1;

export const CODEC_TOOL = 'ffmpeg';
export const DEFAULT_WHISPER_BINARY = 'whisper-cli';
export const DEFAULT_MODELS_DIRECTORY = `${os.homedir()}/.${PROGRAM_NAME}/models`;

// Remote host layout
export const DEFAULT_REMOTE_RUNNER = ['node'];
export const DEFAULT_REMOTE_SCRIPT_PATH = `.${PROGRAM_NAME}/worker.js`;
export const DEFAULT_REMOTE_STAGING_DIRECTORY = '/tmp';
export const DEFAULT_PROBE_TIMEOUT_SECONDS = 5;
export const DEFAULT_COPY_TIMEOUT_SECONDS = 10;

// Refinement
export const DEFAULT_REFINE_MODEL = 'claude-sonnet-4-5-20250929';
export const DEFAULT_REFINE_MAX_TOKENS = 8192;

export const DEFAULT_CLEAN_INSTRUCTION = 'The following is an audio recording transcript. Process it to remove any clear transcription errors.';
export const DEFAULT_SUMMARY_INSTRUCTION = 'Process the following transcript and attempt to provide the full content, but in format that logically flows and has structure and headings.';
export const DEFAULT_CHANNEL_DIRECTIVE = ' Format as a Slack message.';

export const TRANSCRIPT_EXTENSION = '.txt';

export const RESCRIBE_DEFAULTS = {
    verbose: DEFAULT_VERBOSE,
    debug: DEFAULT_DEBUG,
    configDirectory: DEFAULT_CONFIG_DIR,
    model: DEFAULT_TRANSCRIPTION_MODEL,
    language: DEFAULT_LANGUAGE,
    clean: false,
    summary: false,
    slack: false,
    refineModel: DEFAULT_REFINE_MODEL,
    refineMaxTokens: DEFAULT_REFINE_MAX_TOKENS,
    remoteRunner: DEFAULT_REMOTE_RUNNER,
    remoteScriptPath: DEFAULT_REMOTE_SCRIPT_PATH,
    remoteStagingDirectory: DEFAULT_REMOTE_STAGING_DIRECTORY,
    probeTimeoutSeconds: DEFAULT_PROBE_TIMEOUT_SECONDS,
    copyTimeoutSeconds: DEFAULT_COPY_TIMEOUT_SECONDS,
};
