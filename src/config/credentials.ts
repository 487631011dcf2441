/**
 * Credentials Resolver
 *
 * Resolves the LinearB API key in order:
 * 1. LINEARB_API_KEY environment variable (a .env file is loaded at startup)
 * 2. ~/.linearb-mcp/credentials.json
 * 3. null: the caller substitutes a placeholder
 */

import { readFileSync, existsSync } from 'node:fs';
import { z } from 'zod';
import type { CredentialsConfig } from './types.js';
import { credentialsPath } from './paths.js';

// ─── Zod Schema ──────────────────────────────────────────────

const CredentialsSchema = z.object({
  apiKey: z.string().min(1).optional(),
});

const ENV_API_KEY = 'LINEARB_API_KEY';

// ─── Resolve ─────────────────────────────────────────────────

export interface ResolvedApiKey {
  apiKey: string;
  source: 'env' | 'file';
}

/**
 * Resolve the API key.
 * Checks env var first, then the credentials file.
 */
export function resolveApiKey(env: NodeJS.ProcessEnv = process.env): ResolvedApiKey | null {
  const envKey = env[ENV_API_KEY]?.trim();
  if (envKey) {
    return { apiKey: envKey, source: 'env' };
  }

  const fileConfig = readCredentialsFile(env);
  if (fileConfig?.apiKey) {
    return { apiKey: fileConfig.apiKey, source: 'file' };
  }

  return null;
}

/**
 * Read credentials from ~/.linearb-mcp/credentials.json.
 * Returns null if the file doesn't exist or doesn't match the schema.
 */
export function readCredentialsFile(env: NodeJS.ProcessEnv = process.env): CredentialsConfig | null {
  const filePath = credentialsPath(env);
  if (!existsSync(filePath)) {
    return null;
  }

  const raw = readFileSync(filePath, 'utf-8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = CredentialsSchema.safeParse(parsed);
  if (!result.success) {
    return null;
  }
  return result.data;
}
