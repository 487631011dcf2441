/**
 * Usage Examples
 *
 * Example tool invocations grouped by category, read from
 * data/usage-examples.json. Lookup by tool name takes precedence over
 * lookup by category.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import { dataPath } from '../config/paths.js';
import { formatZodError, notFound, type NotFoundResult } from '../errors.js';

const ExampleSchema = z.object({
  title: z.string(),
  arguments: z.record(z.unknown()),
});

const ToolExamplesSchema = z.object({
  description: z.string(),
  examples: z.array(ExampleSchema).min(1),
});

const UsageExamplesSchema = z.record(z.record(ToolExamplesSchema));

export type ToolExamples = z.infer<typeof ToolExamplesSchema>;

/** category → tool name → examples */
export type UsageExamples = z.infer<typeof UsageExamplesSchema>;

export interface UsageExamplesQuery {
  category?: string;
  tool_name?: string;
}

export type UsageExamplesResult =
  | { tool: string; category: string; examples: ToolExamples }
  | { category: string; tools: Record<string, ToolExamples> }
  | { all_categories: string[]; examples: UsageExamples }
  | NotFoundResult<{ available_tools: string[] }>
  | NotFoundResult<{ available_categories: string[] }>;

export const USAGE_EXAMPLES_FILE = 'usage-examples.json';

/** Throws when the bundled file is missing or malformed; it ships with the package. */
export function loadUsageExamples(filePath: string = dataPath(USAGE_EXAMPLES_FILE)): UsageExamples {
  const raw: unknown = JSON.parse(readFileSync(filePath, 'utf-8'));
  const result = UsageExamplesSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid usage examples in ${filePath}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

export function getUsageExamples(corpus: UsageExamples, query: UsageExamplesQuery = {}): UsageExamplesResult {
  const { category, tool_name: toolName } = query;

  if (toolName) {
    for (const [categoryName, tools] of Object.entries(corpus)) {
      const examples = ownEntry(tools, toolName);
      if (examples) {
        return { tool: toolName, category: categoryName, examples };
      }
    }
    return notFound(`No examples found for tool '${toolName}'`, {
      available_tools: Object.values(corpus).flatMap((tools) => Object.keys(tools)),
    });
  }

  if (category) {
    const tools = ownEntry(corpus, category);
    if (tools) {
      return { category, tools };
    }
    return notFound(`Category '${category}' not found`, {
      available_categories: Object.keys(corpus),
    });
  }

  return { all_categories: Object.keys(corpus), examples: corpus };
}

/** Keys inherited from Object.prototype (`constructor`, `toString`) are not entries. */
function ownEntry<T>(record: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(record, key) ? record[key] : undefined;
}
