/**
 * Tool Errors
 *
 * Every failure of a tool invocation carries one of these codes. Lookups
 * return NotFound as a value (see notFound()); validation and upstream
 * failures are thrown and converted to results by the tool registry.
 */

import type { ZodError } from 'zod';

export type ToolErrorCode =
  | 'invalid_argument'
  | 'not_found'
  | 'upstream_failure'
  | 'configuration_degraded';

export class ToolError extends Error {
  constructor(
    message: string,
    public readonly code: ToolErrorCode,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'ToolError';
  }

  toPayload(): ErrorPayload {
    return { error: this.message, code: this.code, ...this.details };
  }
}

export class InvalidArgumentError extends ToolError {
  constructor(message: string) {
    super(message, 'invalid_argument');
    this.name = 'InvalidArgumentError';
  }
}

/**
 * Remote call failed. `statusCode` is null for transport failures
 * (connection refused, DNS, timeout).
 */
export class UpstreamError extends ToolError {
  constructor(
    message: string,
    public readonly statusCode: number | null,
    public readonly responseBody: string | null
  ) {
    super(message, 'upstream_failure', {
      status_code: statusCode,
      ...(responseBody !== null ? { response_body: responseBody } : {}),
    });
    this.name = 'UpstreamError';
  }
}

/** Wire shape of every failure: `error` is always present. */
export interface ErrorPayload {
  error: string;
  code: ToolErrorCode;
  [detail: string]: unknown;
}

export type NotFoundResult<Extra extends object = object> = {
  error: string;
  code: 'not_found';
} & Extra;

export function notFound<Extra extends object>(message: string, extra: Extra): NotFoundResult<Extra> {
  return { error: message, code: 'not_found', ...extra };
}

/** True for any payload carrying an `error` key (NotFound or degraded results). */
export function isErrorPayload(value: unknown): value is ErrorPayload {
  return typeof value === 'object' && value !== null && 'error' in value;
}

/** Flatten zod issues into one message: `field: message; field: message`. */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const field = issue.path.length > 0 ? issue.path.join('.') : 'arguments';
      return `${field}: ${issue.message}`;
    })
    .join('; ');
}
