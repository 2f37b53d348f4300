/**
 * data import - load bars for one instrument from a CSV file
 */

import { isConflictPolicy } from '@barvault/bulk-import';
import type { ConflictPolicy, ImportResult } from '@barvault/bulk-import';
import type { Logger } from '@barvault/logger';
import type { DataServices } from '../services/data-services.js';
import { formatRange, toJson } from '../formatters/catalog-formatter.js';
import { CommandUsageError, toError } from './errors.js';
import type { Command, CommandOptions, CommandResult } from './types.js';

export interface DataImportCommandConfig {
  services: Pick<DataServices, 'createImporter' | 'timeframeResolver'>;
  logger: Logger;
}

export const DATA_IMPORT_USAGE =
  'data import <file.csv> --symbol <SYMBOL> --venue <VENUE> [--timeframe <spec>] [--policy skip|overwrite|merge]';

/**
 * Succeeds only when every row was accepted; rejected rows are listed in
 * the output with their row numbers.
 */
export class DataImportCommand implements Command {
  name = 'data-import';
  description = 'Import bars from a CSV file';
  aliases = ['import'];

  private services: Pick<DataServices, 'createImporter' | 'timeframeResolver'>;
  private logger: Logger;

  constructor(config: DataImportCommandConfig) {
    this.services = config.services;
    this.logger = config.logger;
  }

  async execute(args: string[], options: CommandOptions): Promise<CommandResult> {
    const startTime = Date.now();

    try {
      const file = args[0];
      const { symbol, venue } = options;
      if (!file || !symbol || !venue) {
        throw new CommandUsageError('data import needs a file, --symbol and --venue', DATA_IMPORT_USAGE);
      }
      const policy = this.parsePolicy(options.policy);
      const timeframeSpec = options.timeframe ?? this.services.timeframeResolver.intradaySpec;
      this.logger.info('Executing data-import command', { file, symbol, venue, timeframe_spec: timeframeSpec });

      const importer = this.services.createImporter(policy);
      const result = await importer.importFile(file, { symbol, venue, timeframeSpec });

      return {
        success: result.validationErrors.length === 0,
        output: options.format === 'json' ? this.formatAsJson(result) : this.formatAsText(result, importer.conflictPolicy),
        duration: Date.now() - startTime,
        metadata: {
          barsWritten: result.barsWritten,
          conflictsSkipped: result.conflictsSkipped,
          rejectedRows: result.validationErrors.length,
        },
      };
    } catch (error) {
      this.logger.error('data-import command failed', { error });

      return {
        success: false,
        output: null,
        error: toError(error),
        duration: Date.now() - startTime,
      };
    }
  }

  private parsePolicy(policy: string | undefined): ConflictPolicy | undefined {
    if (policy === undefined) {
      return undefined;
    }
    if (!isConflictPolicy(policy)) {
      throw new CommandUsageError(`Unknown conflict policy "${policy}"`, DATA_IMPORT_USAGE);
    }
    return policy;
  }

  private formatAsJson(result: ImportResult): string {
    return toJson({
      ...result,
      validationErrors: result.validationErrors.map((error) => ({
        rowNumber: error.rowNumber,
        message: error.message,
      })),
    });
  }

  private formatAsText(result: ImportResult, policy: ConflictPolicy): string {
    const lines: string[] = [];

    lines.push(`Imported ${result.instrumentId} ${result.timeframeSpec} (policy ${policy})`);
    lines.push(`  Rows processed: ${result.rowsProcessed}`);
    lines.push(`  Bars written: ${result.barsWritten}`);
    lines.push(`  Conflicts skipped: ${result.conflictsSkipped}`);
    if (result.dateRange) {
      lines.push(`  Range: ${formatRange(result.dateRange.start, result.dateRange.end)}`);
    }

    if (result.validationErrors.length > 0) {
      lines.push(`Rejected rows (${result.validationErrors.length}):`);
      for (const error of result.validationErrors) {
        lines.push(`  row ${error.rowNumber}: ${error.message}`);
      }
    }

    return lines.join('\n');
  }
}
