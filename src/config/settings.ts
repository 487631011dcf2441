/**
 * Server Settings
 *
 * Reads process configuration once at startup. Nothing here throws: a missing
 * API key or a malformed value produces a warning and a default, so the
 * discovery and reference tools keep working.
 */

import { z } from 'zod';
import { resolveApiKey } from './credentials.js';
import { docsDir, openApiPath } from './paths.js';
import type { LogLevel, ServerSettings } from './types.js';

export const DEFAULT_BASE_URL = 'https://public-api.linearb.io';
export const DEFAULT_TIMEOUT_SECONDS = 30;
export const PLACEHOLDER_API_KEY = 'your-api-key-here';

const LogLevelSchema = z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']);

/** Level names accepted from other logging conventions. */
const LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
};

/** Longest delay a Node timer accepts, in whole seconds. */
export const MAX_TIMEOUT_SECONDS = 2_147_483;

const TimeoutSchema = z.coerce.number().finite().positive().max(MAX_TIMEOUT_SECONDS);

const BaseUrlSchema = z.string().url();

export interface SettingsResolution {
  settings: ServerSettings;
  /** Problems found while resolving; logged by the caller once a logger exists. */
  warnings: string[];
}

export function resolveSettings(env: NodeJS.ProcessEnv = process.env): SettingsResolution {
  const warnings: string[] = [];

  const key = resolveApiKey(env);
  if (!key) {
    warnings.push(
      'LINEARB_API_KEY environment variable not set. Remote API tools will fail until it is configured.'
    );
  }

  return {
    settings: {
      apiKey: key?.apiKey ?? PLACEHOLDER_API_KEY,
      apiKeySource: key?.source ?? 'placeholder',
      baseUrl: parseBaseUrl(env['LINEARB_BASE_URL'], warnings),
      timeoutMs: parseTimeoutSeconds(env['API_TIMEOUT'], warnings) * 1000,
      logLevel: parseLogLevel(env['LOG_LEVEL'], warnings),
      openApiPath: openApiPath(env),
      docsDir: docsDir(env),
    },
    warnings,
  };
}

export function parseLogLevel(raw: string | undefined, warnings: string[] = []): LogLevel {
  if (!raw) return 'info';
  const normalized = raw.trim().toLowerCase();
  const alias = LEVEL_ALIASES[normalized];
  if (alias) return alias;

  const result = LogLevelSchema.safeParse(normalized);
  if (!result.success) {
    warnings.push(`Unknown LOG_LEVEL "${raw}", using info`);
    return 'info';
  }
  return result.data;
}

export function parseTimeoutSeconds(raw: string | undefined, warnings: string[] = []): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_TIMEOUT_SECONDS;

  const result = TimeoutSchema.safeParse(raw);
  if (!result.success) {
    warnings.push(`Invalid API_TIMEOUT "${raw}", using ${DEFAULT_TIMEOUT_SECONDS}s`);
    return DEFAULT_TIMEOUT_SECONDS;
  }
  return result.data;
}

function parseBaseUrl(raw: string | undefined, warnings: string[]): string {
  if (!raw || raw.trim() === '') return DEFAULT_BASE_URL;

  const result = BaseUrlSchema.safeParse(raw.trim());
  if (!result.success) {
    warnings.push(`Invalid LINEARB_BASE_URL "${raw}", using ${DEFAULT_BASE_URL}`);
    return DEFAULT_BASE_URL;
  }
  return result.data.replace(/\/$/, '');
}

/** Settings safe to print or log. */
export function describeSettings(settings: ServerSettings): Record<string, string | number> {
  const key = settings.apiKey;
  const masked =
    settings.apiKeySource === 'placeholder'
      ? 'not configured'
      : key.length > 4
        ? `****${key.slice(-4)}`
        : '****';
  return {
    apiKey: masked,
    apiKeySource: settings.apiKeySource,
    baseUrl: settings.baseUrl,
    timeoutMs: settings.timeoutMs,
    logLevel: settings.logLevel,
    openApiPath: settings.openApiPath,
    docsDir: settings.docsDir,
  };
}
