/**
 * Command registry for the data commands
 */

import type { Logger } from '@barvault/logger';
import type { DataServices } from '../services/data-services.js';
import { DataCheckCommand } from './data-check.command.js';
import { DataFetchCommand } from './data-fetch.command.js';
import { DataImportCommand } from './data-import.command.js';
import { DataListCommand } from './data-list.command.js';
import type { Command } from './types.js';

export class CommandRegistry {
  private commands = new Map<string, Command>();
  private aliases = new Map<string, string>();

  register(command: Command): void {
    this.commands.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      this.aliases.set(alias, command.name);
    }
  }

  get(name: string): Command | undefined {
    return this.commands.get(name) ?? this.commands.get(this.aliases.get(name) ?? '');
  }

  list(): Command[] {
    return [...this.commands.values()];
  }
}

export function createDataCommands(services: DataServices, logger: Logger): CommandRegistry {
  const registry = new CommandRegistry();
  registry.register(new DataListCommand({ services, logger }));
  registry.register(new DataCheckCommand({ services, logger }));
  registry.register(new DataFetchCommand({ services, logger }));
  registry.register(new DataImportCommand({ services, logger }));
  return registry;
}

export { DataCheckCommand, DATA_CHECK_USAGE } from './data-check.command.js';
export { DataFetchCommand, DATA_FETCH_USAGE } from './data-fetch.command.js';
export { DataImportCommand, DATA_IMPORT_USAGE } from './data-import.command.js';
export { DataListCommand } from './data-list.command.js';
export { CommandUsageError, formatCommandError, toError } from './errors.js';
export type { Command, CommandOptions, CommandResult, OutputFormat } from './types.js';
