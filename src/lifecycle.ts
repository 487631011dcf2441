/**
 * Shutdown
 *
 * SIGINT, SIGTERM, transport close and fatal errors all end up here. The
 * HTTP client is released exactly once, whichever arrives first.
 */

import type { Logger } from './logging/logger.js';

export interface ShutdownDeps {
  closeClient: () => void;
  closeServer: () => Promise<void>;
  log: Logger;
  exit: (code: number) => void;
}

export type ShutdownHandler = (reason: string, exitCode?: number) => Promise<void>;

export function createShutdownHandler(deps: ShutdownDeps): ShutdownHandler {
  let started = false;

  return async (reason, exitCode = 0) => {
    if (started) return;
    started = true;

    deps.log.info({ reason }, 'Shutting down');
    deps.closeClient();
    try {
      await deps.closeServer();
    } catch (error) {
      deps.log.error({ err: error }, 'Error while closing the MCP server');
    }
    deps.exit(exitCode);
  };
}
