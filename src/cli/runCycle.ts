#!/usr/bin/env node
import { getConfig } from '../config';
import { getIndexWriter } from '../lib/indexWriter';
import { FlightSyncService, type CycleOverrides } from '../services/flightSyncService';
import type { CycleResult } from '../sync/types';

const parseIntegerFlag = (name: string, value: string | undefined): number => {
  if (!value || !/^\d+$/.test(value)) {
    throw new Error(`${name} expects a non-negative integer`);
  }

  return Number.parseInt(value, 10);
};

export const parseArgs = (argv: string[]): CycleOverrides => {
  const overrides: CycleOverrides = {};

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];

    switch (arg) {
      case '--concurrency':
        overrides.maxConcurrency = parseIntegerFlag(arg, argv[index + 1]);
        index += 1;
        break;
      case '--retries':
        overrides.perItemMaxRetries = parseIntegerFlag(arg, argv[index + 1]);
        index += 1;
        break;
      case '--dedupe':
        overrides.dedupe = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return overrides;
};

export const formatSummary = (result: CycleResult): string => {
  const lines = [
    `Cycle finished in ${result.durationMs}ms: total=${result.total} succeeded=${result.succeeded} ` +
      `skipped=${result.skipped} unchanged=${result.conflicts} failed=${result.failed.length}`,
  ];

  if (result.timedOut) {
    lines.push('Cycle deadline reached before every flight finished');
  }

  for (const failure of result.failed) {
    lines.push(`  ${failure.flightId}: ${failure.errorKind} after ${failure.attempts} attempt(s) - ${failure.message}`);
  }

  return lines.join('\n');
};

export const run = async (argv: string[] = []): Promise<CycleResult> => {
  const overrides = parseArgs(argv);
  const config = getConfig();
  const syncService = new FlightSyncService({
    config,
    indexWriter: getIndexWriter(),
  });

  const result = await syncService.run('manual', overrides);
  console.log(formatSummary(result));

  return result;
};

if (require.main === module) {
  run(process.argv.slice(2)).catch((error: unknown) => {
    console.error('Flight sync cycle failed', error);
    process.exit(1);
  });
}
