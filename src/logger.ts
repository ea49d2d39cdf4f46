import winston from 'winston';

const { combine, timestamp, printf, colorize } = winston.format;

const LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];

const logFormat = printf(({ level, message, timestamp: ts, module: mod, ...meta }) => {
    const moduleTag = mod ? `[${String(mod)}]` : '';
    const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
    return `${String(ts)} ${level} ${moduleTag} ${String(message)}${metaStr}`;
});

function resolveLevel(value: string | undefined): string {
    const normalized = value?.trim().toLowerCase();
    if (normalized && LEVELS.includes(normalized)) return normalized;
    return 'info';
}

const silent = process.env.LOG_LEVEL?.trim().toLowerCase() === 'silent';

// stdout carries the streamed answer, so every level goes to stderr
const transports: winston.transport[] = [
    new winston.transports.Console({
        stderrLevels: LEVELS,
        format: combine(colorize(), timestamp({ format: 'HH:mm:ss.SSS' }), logFormat),
    }),
];

const logFile = process.env.LOG_FILE?.trim();
if (logFile) {
    transports.push(
        new winston.transports.File({
            filename: logFile,
            maxsize: 10_000_000,
            maxFiles: 3,
        })
    );
}

export const logger = winston.createLogger({
    level: resolveLevel(process.env.LOG_LEVEL),
    silent,
    format: combine(
        timestamp({ format: 'HH:mm:ss.SSS' }),
        logFormat
    ),
    transports,
});

export function createModuleLogger(moduleName: string): winston.Logger {
    return logger.child({ module: moduleName });
}
