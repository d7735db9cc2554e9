/**
 * Process-wide structured logger.
 * Writes to stderr so stdout stays clean for command output (JSON, tables).
 */
import pino from 'pino';
import { resolveLogLevel } from './config.js';

export const log = pino(
  { name: 'ledger-route', level: resolveLogLevel() },
  pino.destination(2),
);
