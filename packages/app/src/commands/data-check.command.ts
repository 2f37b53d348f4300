/**
 * data check - covered / partial / missing for a requested range
 */

import type { AvailabilityCheck } from '@barvault/bars-cache';
import type { Logger } from '@barvault/logger';
import type { DataServices } from '../services/data-services.js';
import { formatRange, toJson } from '../formatters/catalog-formatter.js';
import { CommandUsageError, toError } from './errors.js';
import type { Command, CommandOptions, CommandResult } from './types.js';

export interface DataCheckCommandConfig {
  services: Pick<DataServices, 'orchestrator'>;
  logger: Logger;
}

export const DATA_CHECK_USAGE = 'data check <SYMBOL.VENUE> <start> [end] [--timeframe <spec>]';

export class DataCheckCommand implements Command {
  name = 'data-check';
  description = 'Report whether a range is covered by the catalog';
  aliases = ['check'];

  private services: Pick<DataServices, 'orchestrator'>;
  private logger: Logger;

  constructor(config: DataCheckCommandConfig) {
    this.services = config.services;
    this.logger = config.logger;
  }

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const [instrumentId, start, end = start] = args;
      if (!instrumentId || !start || !end) {
        throw new CommandUsageError('data check needs an instrument id and a start', DATA_CHECK_USAGE);
      }
      this.logger.info('Executing data-check command', { instrument_id: instrumentId, start, end });

      const check = this.services.orchestrator.checkAvailability(instrumentId, start, end, options.timeframe);

      return {
        success: true,
        output: options.format === 'json' ? toJson(check) : this.formatAsText(check),
        duration: Date.now() - startTime,
        metadata: { status: check.status },
      };
    } catch (error) {
      this.logger.error('data-check command failed', { error });

      return {
        success: false,
        output: null,
        error: toError(error),
        duration: Date.now() - startTime,
      };
    }
  }

  private formatAsText(check: AvailabilityCheck): string {
    const lines: string[] = [];

    lines.push(`${check.instrumentId} ${check.timeframeSpec}: ${check.status.toUpperCase()}`);
    lines.push(`  Requested: ${formatRange(check.start, check.end)}`);

    if (check.availability) {
      lines.push(`  Cached: ${formatRange(check.availability.start, check.availability.end)}`);
      lines.push(`  Files: ${check.availability.fileCount}, rows: ~${check.availability.estimatedRowCount}`);
    } else {
      lines.push('  Cached: nothing');
    }

    return lines.join('\n');
  }
}
