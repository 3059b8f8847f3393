/**
 * Trainer API Logger
 * 
 * Pino-based structured logging with request ID support
 * 
 * Copyright (c) 2026 Rejourney
 * 
 * Licensed under the Server Side Public License 1.0 (the "License");
 * you may not use this file except in compliance with the License.
 * See LICENSE-SSPL for full terms.
 */

import { pino, type Logger } from 'pino';
import { config } from './config.js';

export const logger = pino({
    level: config.LOG_LEVEL,
    transport: config.NODE_ENV === 'development'
        ? {
            target: 'pino-pretty',
            options: {
                colorize: true,
                translateTime: 'SYS:standard',
                ignore: 'pid,hostname',
            },
        }
        : undefined,
    formatters: {
        level: (label) => ({ level: label }),
    },
    base: {
        env: config.NODE_ENV,
    },
    redact: {
        paths: [
            'password',
            'authorization',
            'req.headers.authorization',
            'req.headers.cookie',
            '*.password',
        ],
        censor: '[REDACTED]',
    },
});

export type { Logger } from 'pino';

/** Logger tagged with the service or subsystem that emits the line */
export function createModuleLogger(module: string): Logger {
    return logger.child({ module });
}
