#!/usr/bin/env node
/**
 * Command-line entry point.
 *
 * Usage: bead-qc <export.csv | folder> [--config config.yaml] [--out dir]
 *                [--strict] [--log-level level]
 */

import { parseArgs } from 'node:util';
import { loadConfig, resolveQcSettings } from './config/loader.js';
import type { QcConfig } from './config/types.js';
import { createLogger, type LogLevel } from './logging/logger.js';
import { describeRun, runQc } from './pipeline/runQc.js';

const USAGE = 'Usage: bead-qc <export.csv | folder> [--config config.yaml] [--out dir] [--strict] [--log-level debug|info|warn|error|silent]';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      config: { type: 'string', short: 'c' },
      out: { type: 'string', short: 'o' },
      strict: { type: 'boolean' },
      'log-level': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const input = positionals[0];
  if (!input || positionals.length > 1) {
    console.error(USAGE);
    return 1;
  }

  const levelArg = values['log-level'];
  if (levelArg !== undefined && !isLogLevel(levelArg)) {
    console.error(`Unknown log level: ${levelArg}\n${USAGE}`);
    return 1;
  }

  const bootstrapLogger = createLogger(levelArg ?? 'info', 'bead-qc', 'stderr');
  const config = await loadConfig({
    ...(values.config !== undefined ? { configPath: values.config } : {}),
    logger: bootstrapLogger,
  });
  const logger = createLogger(levelArg ?? config.server.logLevel, 'bead-qc', 'stderr');

  const overrides: Partial<QcConfig> = {
    ...(values.out !== undefined ? { outputDir: values.out } : {}),
    ...(values.strict !== undefined ? { strict: values.strict } : {}),
  };
  const settings = resolveQcSettings(config, overrides);

  const run = await runQc(input, settings, logger);
  for (const line of describeRun(run)) {
    console.log(line);
  }
  return 0;
}

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    console.error(`bead-qc: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  });
