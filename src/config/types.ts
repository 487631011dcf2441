/**
 * Configuration Types
 *
 * Shapes of the resolved server settings and the optional credentials file.
 * Zod schemas in settings.ts and credentials.ts validate against these.
 */

/** Pino level names accepted by LOG_LEVEL. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Stored in ~/.linearb-mcp/credentials.json */
export interface CredentialsConfig {
  apiKey?: string;
}

/** Where the API key came from. `placeholder` means remote calls will be rejected upstream. */
export type ApiKeySource = 'env' | 'file' | 'placeholder';

/** Settings resolved once at startup. */
export interface ServerSettings {
  apiKey: string;
  apiKeySource: ApiKeySource;
  baseUrl: string;
  timeoutMs: number;
  logLevel: LogLevel;
  openApiPath: string;
  docsDir: string;
}
