/**
 * Path Resolution
 *
 * Config directory, in order:
 * 1. LINEARB_MCP_HOME environment variable
 * 2. ~/.linearb-mcp/ (default)
 *
 * Package resources (openapi.json, docs/, data/) are resolved relative to the
 * package root so they are found from both src/ and dist/.
 */

import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const DEFAULT_DIR_NAME = '.linearb-mcp';

/**
 * Resolve the config directory path.
 * Nothing is created; the directory only holds an optional credentials file.
 */
export function resolveConfigDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env['LINEARB_MCP_HOME'];
  if (envDir) {
    return envDir;
  }
  return join(homedir(), DEFAULT_DIR_NAME);
}

/** Resolve path to credentials.json */
export function credentialsPath(env: NodeJS.ProcessEnv = process.env): string {
  return join(resolveConfigDir(env), 'credentials.json');
}

/** Package root: one level above src/ or dist/. */
export function packageRoot(): string {
  return fileURLToPath(new URL('../../', import.meta.url));
}

/** OpenAPI document, overridable with LINEARB_OPENAPI_PATH. */
export function openApiPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env['LINEARB_OPENAPI_PATH'];
  return envPath ? resolve(envPath) : join(packageRoot(), 'openapi.json');
}

/** Documentation directory, overridable with LINEARB_DOCS_DIR. */
export function docsDir(env: NodeJS.ProcessEnv = process.env): string {
  const envDir = env['LINEARB_DOCS_DIR'];
  return envDir ? resolve(envDir) : join(packageRoot(), 'docs');
}

/** Bundled data files (usage examples). */
export function dataPath(fileName: string): string {
  return join(packageRoot(), 'data', fileName);
}
