import { mkdtemp, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { createSilentLogger } from '@barvault/logger';
import { loadConfig } from '../src/config/index.js';
import { createDataServices } from '../src/services/data-services.js';
import type { DataServices } from '../src/services/data-services.js';
import { FixtureRemoteClient } from '../src/services/providers/fixture-remote-client.js';
import type { CliOutput } from '../src/program.js';

/** 2024-01-02T14:30:00Z */
export const T0 = 1_704_205_800_000_000_000n;
export const MINUTE = 60_000_000_000n;
export const INGEST = 1_704_240_000_000_000_000n;

export const noSleep = async (_ms: number): Promise<void> => undefined;

export async function createTempDir(): Promise<{ dir: string; cleanup: () => Promise<void> }> {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'barvault-app-'));
  return { dir, cleanup: () => rm(dir, { recursive: true, force: true }) };
}

/**
 * Services over a real catalog directory with the fixture provider.
 */
export async function createTestServices(
  catalogPath: string,
  env: NodeJS.ProcessEnv = {}
): Promise<{ services: DataServices; client: FixtureRemoteClient }> {
  const config = loadConfig({ CATALOG_PATH: catalogPath, PROVIDER_TYPE: 'fixture', ...env });
  const client = new FixtureRemoteClient({ clock: () => INGEST });
  const services = createDataServices(config, { logger: createSilentLogger(), client, sleep: noSleep });
  await services.initialize();
  return { services, client };
}

export function captureOutput(): { stdout: string[]; stderr: string[]; output: CliOutput } {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    output: {
      stdout: (text) => {
        stdout.push(text);
      },
      stderr: (text) => {
        stderr.push(text);
      },
    },
  };
}
