/**
 * Structured logger for the scheduling API.
 *
 * Usage:
 *   const log = createModuleLogger('appointments');
 *   log.info({ appointmentId }, 'Appointment completed');
 */

import pino from 'pino';
import { config } from '../config/env';

const isProduction = config.NODE_ENV === 'production';

export const logger = pino({
    level: config.LOG_LEVEL ?? (config.NODE_ENV === 'test' ? 'silent' : isProduction ? 'info' : 'debug'),
    redact: {
        paths: ['req.headers.authorization', 'req.headers.cookie', 'token', '*.token', 'client_secret'],
        censor: '[REDACTED]',
    },
    base: { service: 'scheduling-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = pino.Logger;

export const createModuleLogger = (module: string): Logger => logger.child({ module });
