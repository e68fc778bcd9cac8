/**
 * Logger utility (pino wrapper)
 *
 * Structured JSON logging shared by every package. Components prefix their
 * messages with a bracketed tag, e.g. `[rp-handshake]`.
 *
 * Secrets (MAC keys, DH private exponents, key-encryption keys) must never be
 * passed to the logger.
 */

import { pino } from 'pino';

export const logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  formatters: {
    level: (label: string) => {
      return { level: label };
    },
  },
  timestamp: pino.stdTimeFunctions.isoTime,
});

export type Logger = typeof logger;
