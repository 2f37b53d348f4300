/**
 * data fetch - serve a range from the catalog, fetching it first if needed
 */

import type { FetchOrLoadResult } from '@barvault/bars-cache';
import type { Logger } from '@barvault/logger';
import type { DataServices } from '../services/data-services.js';
import { BAR_COLUMNS, barRecord, barRow, formatTable, toJson } from '../formatters/catalog-formatter.js';
import { CommandUsageError, toError } from './errors.js';
import type { Command, CommandOptions, CommandResult } from './types.js';

export interface DataFetchCommandConfig {
  services: Pick<DataServices, 'orchestrator'>;
  logger: Logger;

  /** Bars printed in text output before the rest is summarized */
  previewLimit?: number;
}

export const DATA_FETCH_USAGE = 'data fetch <SYMBOL.VENUE> <start> [end] [--timeframe <spec>]';

const DEFAULT_PREVIEW_LIMIT = 20;

export class DataFetchCommand implements Command {
  name = 'data-fetch';
  description = 'Load a range from the catalog or the remote provider';
  aliases = ['fetch'];

  private services: Pick<DataServices, 'orchestrator'>;
  private logger: Logger;
  private previewLimit: number;

  constructor(config: DataFetchCommandConfig) {
    this.services = config.services;
    this.logger = config.logger;
    this.previewLimit = config.previewLimit ?? DEFAULT_PREVIEW_LIMIT;
  }

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const [instrumentId, start, end = start] = args;
      if (!instrumentId || !start || !end) {
        throw new CommandUsageError('data fetch needs an instrument id and a start', DATA_FETCH_USAGE);
      }
      this.logger.info('Executing data-fetch command', { instrument_id: instrumentId, start, end });

      const result = await this.services.orchestrator.fetchOrLoad(instrumentId, start, end, options.timeframe);

      return {
        success: true,
        output: this.formatOutput(instrumentId, result, options.format),
        duration: Date.now() - startTime,
        metadata: {
          source: result.source,
          bars: result.bars.length,
          venue: result.venue,
          requestId: result.request?.requestId ?? null,
        },
      };
    } catch (error) {
      this.logger.error('data-fetch command failed', { error });

      return {
        success: false,
        output: null,
        error: toError(error),
        duration: Date.now() - startTime,
      };
    }
  }

  private formatOutput(instrumentId: string, result: FetchOrLoadResult, format?: string): string {
    switch (format) {
      case 'json':
        return toJson({
          instrumentId,
          timeframeSpec: result.timeframeSpec,
          source: result.source,
          venue: result.venue,
          venueSource: result.venueSource,
          descriptor: result.descriptor,
          bars: result.bars.map(barRecord),
        });

      case 'table':
        return [this.summary(instrumentId, result), formatTable(BAR_COLUMNS, result.bars.map(barRow))].join('\n');

      case 'text':
      default:
        return this.formatAsText(instrumentId, result);
    }
  }

  private summary(instrumentId: string, result: FetchOrLoadResult): string {
    return `${instrumentId} ${result.timeframeSpec}: ${result.bars.length} bars from ${result.source} (venue ${result.venue}, ${result.venueSource})`;
  }

  private formatAsText(instrumentId: string, result: FetchOrLoadResult): string {
    const lines = [this.summary(instrumentId, result)];

    for (const bar of result.bars.slice(0, this.previewLimit)) {
      lines.push(`  ${barRow(bar).join('  ')}`);
    }
    const hidden = result.bars.length - this.previewLimit;
    if (hidden > 0) {
      lines.push(`  ... ${hidden} more`);
    }
    if (result.descriptorBackfilled) {
      lines.push('Descriptor fetched from provider');
    }

    return lines.join('\n');
  }
}
