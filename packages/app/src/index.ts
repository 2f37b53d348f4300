/**
 * @barvault/app
 *
 * Configuration, service wiring, the fixture provider and the data CLI.
 */

export { loadConfig, getConfigSummary, configSchema, envMapping } from './config/index.js';
export type { Config } from './config/index.js';

export { createDataServices, createRemoteClient } from './services/data-services.js';
export type { DataServiceDependencies, DataServices } from './services/data-services.js';

export { FixtureRemoteClient, hashString, seededRandom } from './services/providers/fixture-remote-client.js';
export type { FixtureClientStats, FixtureRemoteClientConfig } from './services/providers/fixture-remote-client.js';

export * from './commands/index.js';

export { runCli } from './program.js';
export type { CliDependencies, CliOutput } from './program.js';
