/**
 * Logger Factory
 *
 * Pino, JSON to stderr. stdout belongs to the MCP stdio transport, so nothing
 * may be written there. Silenced under Vitest.
 */

import pino from 'pino';
import type { Logger } from 'pino';
import type { LogLevel } from '../config/types.js';

export type { Logger } from 'pino';

const REDACT_PATHS = ['apiKey', '*.apiKey', 'headers["x-api-key"]'];

export function makeLogger(level: LogLevel, bindings?: Record<string, unknown>): Logger {
  const isVitest = process.env['VITEST'] === 'true';

  return pino(
    {
      level,
      enabled: !isVitest,
      base: { ...bindings, service: 'linearb-readonly-mcp' },
      messageKey: 'msg',
      timestamp: pino.stdTimeFunctions.isoTime,
      redact: { paths: REDACT_PATHS, censor: '[REDACTED]' },
    },
    pino.destination({ dest: 2, sync: true })
  );
}

/** For tests: preserves the Logger type, emits nothing. */
export function makeNoopLogger(): Logger {
  return pino({ enabled: false });
}
