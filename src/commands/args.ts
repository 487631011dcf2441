/**
 * Command-line argument parsing for the companion CLI.
 *
 *   linearb-readonly endpoint /api/v1/deployments --method GET
 *   → { command: 'endpoint', positionals: ['/api/v1/deployments'], flags: { method: 'GET' } }
 */

export interface ParsedArgs {
  command: string;
  positionals: string[];
  flags: Record<string, string>;
}

/** `argv` as in process.argv: the first two entries are skipped. */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const args = argv.slice(2);
  const command = args[0] ?? 'help';
  const positionals: string[] = [];
  const flags: Record<string, string> = {};

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;

    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next = args[i + 1];
      // Flags without a value (e.g. --json) are recorded as ''
      if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = '';
      }
    } else {
      positionals.push(arg);
    }
  }

  return { command, positionals, flags };
}
