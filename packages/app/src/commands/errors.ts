/**
 * Error formatting for CLI commands
 *
 * Catalog errors carry a code and resolution steps; both are shown so the
 * operator knows what failed and what to try next.
 */

import { isBarVaultError } from '@barvault/contracts';

/**
 * Error raised for command-line usage problems (missing or malformed arguments)
 */
export class CommandUsageError extends Error {
  readonly code = 'INVALID_ARGS';

  constructor(
    message: string,
    readonly usage: string
  ) {
    super(message);
    this.name = 'CommandUsageError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Create a friendly error message from any error
 */
export function formatCommandError(error: unknown, verbose: boolean = false): string {
  const lines: string[] = [];

  if (isBarVaultError(error)) {
    lines.push(`Error: ${error.message}`);
    lines.push(`Code: ${error.code}`);

    const context = Object.entries(error.data ?? {}).filter(([, value]) => value !== undefined);
    if (context.length > 0) {
      lines.push('Context:');
      for (const [key, value] of context) {
        lines.push(`  ${key}: ${JSON.stringify(value)}`);
      }
    }

    if (error.resolution.length > 0) {
      lines.push('Resolution:');
      error.resolution.forEach((step, index) => {
        lines.push(`  ${index + 1}. ${step}`);
      });
    }
  } else if (error instanceof CommandUsageError) {
    lines.push(`Error: ${error.message}`);
    lines.push(`Usage: ${error.usage}`);
  } else if (error instanceof Error) {
    lines.push(`Error: ${error.message}`);
  } else {
    return `Error: ${String(error)}`;
  }

  if (verbose && error instanceof Error) {
    if (error.cause instanceof Error) {
      lines.push('Caused by:');
      lines.push(`  ${error.cause.message}`);
    }
    if (error.stack) {
      lines.push('Stack trace:');
      lines.push(error.stack);
    }
  }

  return lines.join('\n');
}
