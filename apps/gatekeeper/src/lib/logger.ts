import { pino, type Logger as PinoLogger } from 'pino';

export type Logger = PinoLogger;

export interface LoggerOptions {
    level?: string;
    pretty?: boolean;
}

// Key material, tokens and voiceprint bytes must never reach a log line.
export const REDACT_PATHS = [
    'key',
    'voiceKey',
    'secret',
    'password',
    'token',
    'apiKey',
    'groqApiKey',
    'ciphertext',
    'authTag',
    'embedding',
    '*.key',
    '*.voiceKey',
    '*.secret',
    '*.password',
    '*.token',
    '*.apiKey',
    '*.groqApiKey',
    '*.ciphertext',
    '*.authTag',
    '*.embedding',
];

export function createLogger(options: LoggerOptions = {}): Logger {
    const level = options.level ?? process.env.LOG_LEVEL ?? 'info';

    if (options.pretty) {
        return pino({
            level,
            redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
            transport: {
                target: 'pino-pretty',
                options: { colorize: true },
            },
        });
    }

    return pino({
        level,
        redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    });
}

export function createSilentLogger(): Logger {
    return pino({ level: 'silent' });
}
