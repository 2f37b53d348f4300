/**
 * data list - what the catalog holds, per instrument and timeframe
 */

import { nanosToIso } from '@barvault/contracts';
import type { Logger } from '@barvault/logger';
import type { DataServices } from '../services/data-services.js';
import { formatTable, toJson } from '../formatters/catalog-formatter.js';
import { toError } from './errors.js';
import type { Command, CommandOptions, CommandResult } from './types.js';

export interface DataListCommandConfig {
  services: Pick<DataServices, 'index' | 'store'>;
  logger: Logger;
}

interface ListedEntry {
  instrumentId: string;
  timeframeSpec: string;
  start: string;
  end: string;
  fileCount: number;
  estimatedRowCount: number;
  hasDescriptor: boolean;
}

export class DataListCommand implements Command {
  name = 'data-list';
  description = 'List cached ranges and descriptor presence';
  aliases = ['list', 'ls'];

  private services: Pick<DataServices, 'index' | 'store'>;
  private logger: Logger;

  constructor(config: DataListCommandConfig) {
    this.services = config.services;
    this.logger = config.logger;
  }

  /**
   * @param args - optional instrument id filter
   */
  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();
    const filter = args[0];

    try {
      this.logger.info('Executing data-list command', { filter: filter ?? null });

      const descriptors = await this.services.store.listDescriptors();
      const described = new Set(descriptors.map((descriptor) => descriptor.instrumentId));

      const entries: ListedEntry[] = this.services.index
        .entries()
        .filter((entry) => filter === undefined || entry.instrumentId === filter)
        .map((entry) => ({
          instrumentId: entry.instrumentId,
          timeframeSpec: entry.timeframeSpec,
          start: nanosToIso(entry.start),
          end: nanosToIso(entry.end),
          fileCount: entry.fileCount,
          estimatedRowCount: entry.estimatedRowCount,
          hasDescriptor: described.has(entry.instrumentId),
        }));

      const withBars = new Set(entries.map((entry) => entry.instrumentId));
      const descriptorsOnly = [...described]
        .filter((instrumentId) => !withBars.has(instrumentId))
        .filter((instrumentId) => filter === undefined || instrumentId === filter)
        .sort();

      return {
        success: true,
        output: this.formatOutput(entries, descriptorsOnly, options.format),
        duration: Date.now() - startTime,
        metadata: { keys: entries.length, descriptors: described.size },
      };
    } catch (error) {
      this.logger.error('data-list command failed', { error });

      return {
        success: false,
        output: null,
        error: toError(error),
        duration: Date.now() - startTime,
      };
    }
  }

  private formatOutput(entries: ListedEntry[], descriptorsOnly: string[], format?: string): string {
    switch (format) {
      case 'json':
        return toJson({ entries, descriptorsOnly });

      case 'table':
        return formatTable(
          ['Instrument', 'Timeframe', 'Start', 'End', 'Files', 'Rows', 'Descriptor'],
          entries.map((entry) => [
            entry.instrumentId,
            entry.timeframeSpec,
            entry.start,
            entry.end,
            String(entry.fileCount),
            String(entry.estimatedRowCount),
            entry.hasDescriptor ? 'yes' : 'no',
          ])
        );

      case 'text':
      default:
        return this.formatAsText(entries, descriptorsOnly);
    }
  }

  private formatAsText(entries: ListedEntry[], descriptorsOnly: string[]): string {
    if (entries.length === 0 && descriptorsOnly.length === 0) {
      return 'Catalog is empty';
    }

    const lines: string[] = [];
    for (const entry of entries) {
      lines.push(`${entry.instrumentId} ${entry.timeframeSpec}`);
      lines.push(`  Range: ${entry.start} -> ${entry.end}`);
      lines.push(`  Files: ${entry.fileCount}, rows: ~${entry.estimatedRowCount}`);
      lines.push(`  Descriptor: ${entry.hasDescriptor ? 'yes' : 'missing'}`);
    }
    if (descriptorsOnly.length > 0) {
      lines.push(`Descriptors without bars: ${descriptorsOnly.join(', ')}`);
    }
    return lines.join('\n');
  }
}
