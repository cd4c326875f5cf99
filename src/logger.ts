import { pino } from 'pino';
import type { PalmtreeLogger } from './palmtree/types.js';

const level = process.env.PALMTREE_LOG_LEVEL ?? 'warn';

export const logger = pino({ name: 'palmtree', level });

/** Adapts the package logger to the decoder's string-message hook. */
export const defaultLogger: Required<PalmtreeLogger> = {
    info: (msg) => logger.info(msg),
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
};
