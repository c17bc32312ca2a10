import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug';

export interface LoggerOptions {
    // Worker processes keep stdout free for machine-readable output
    stderr?: boolean;
}

let loggerOptions: LoggerOptions = {};

const createLogger = (level: LogLevel = 'info'): winston.Logger => {

    let format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.json()
    );

    const line = winston.format.printf(({ timestamp, level, message, ...meta }) => {
        const { service: _service, ...rest } = meta;
        const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
        return `${timestamp} ${level}: ${message}${metaStr}`;
    });

    let transports = [
        new winston.transports.Console({
            stderrLevels: loggerOptions.stderr ? ['error', 'warn', 'info', 'verbose', 'debug'] : ['error'],
            // Worker stderr is relayed into another log, so no colour codes
            format: loggerOptions.stderr ? line : winston.format.combine(winston.format.colorize(), line),
        })
    ];

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
        );

        transports = [
            new winston.transports.Console({
                stderrLevels: loggerOptions.stderr ? ['error', 'warn', 'info'] : ['error'],
                format: winston.format.combine(
                    winston.format.printf(({ level, message }) => {
                        return level === 'warn' || level === 'error' ? `${level}: ${message}` : `${message}`;
                    })
                )
            })
        ];
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports,
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel) => {
    logger = createLogger(level);
};

export const configureLogging = (options: LoggerOptions, level: LogLevel = 'info') => {
    loggerOptions = options;
    logger = createLogger(level);
};

export const getLogger = () => logger;
