/**
 * Command types and interfaces
 */

/**
 * Base command interface
 */
export interface Command {
  name: string;
  description: string;
  aliases?: string[];
  execute(args: string[], options: CommandOptions): Promise<CommandResult>;
}

export type OutputFormat = 'json' | 'text' | 'table';

/**
 * Command execution options
 */
export interface CommandOptions {
  verbose?: boolean;
  format?: OutputFormat;
  timeframe?: string;
  symbol?: string;
  venue?: string;
  policy?: string;
}

/**
 * Command execution result
 */
export interface CommandResult {
  success: boolean;
  output: string | null;
  error?: Error;
  duration?: number;
  metadata?: Record<string, unknown>;
}
