import winston from 'winston';
import { PROGRAM_NAME } from './constants';

export interface LogContext {
    [key: string]: unknown;
}

export type LogLevel = 'error' | 'warn' | 'info' | 'verbose' | 'debug' | 'silly';

const createLogger = (level: string = 'info') => {
    let format = winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.splat(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
            // service is always present in defaultMeta; keep it out of each line
            const { service: _service, ...rest } = meta;
            const metaStr = Object.keys(rest).length ? ` ${JSON.stringify(rest)}` : '';
            return `${timestamp} ${level}: ${message}${metaStr}`;
        })
    );

    if (level === 'info') {
        format = winston.format.combine(
            winston.format.errors({ stack: true }),
            winston.format.splat(),
            winston.format.printf(({ message }) => `${message}`)
        );
    }

    return winston.createLogger({
        level,
        format,
        defaultMeta: { service: PROGRAM_NAME },
        transports: [
            new winston.transports.Console(),
        ],
    });
};

let logger = createLogger();

export const setLogLevel = (level: LogLevel | string) => {
    logger = createLogger(level);
};

export const getLogger = () => logger;
