#!/usr/bin/env node
/**
 * CLI entry point
 *
 * Usage:
 *   schemabridge mapping --config ./config.json
 *   schemabridge import --config ./config.json
 */

import { Logger, errorMessage } from '@schemabridge/core';
import { ApiClient } from '@schemabridge/connector-api';
import { USAGE, parseArgs } from './args.js';
import { runCommand } from './commands.js';
import { loadConfig } from './config.js';
import { createStorageEngine } from './targets.js';

async function main(): Promise<void> {
  let logger = new Logger();
  const args = parseArgs(process.argv.slice(2));

  if (!args) {
    console.error(USAGE);
    console.error('');
    console.error('Example config.json:');
    console.error(
      JSON.stringify(
        {
          source: { baseUrl: 'https://api.example.com', endpoint: 'products', recordsPath: 'data' },
          mapping: { options: { titleField: 'name', contentField: 'description' } },
          target: { type: 'mysql', uri: '${MYSQL_URI}', table: 'products' },
        },
        null,
        2
      )
    );
    process.exit(1);
  }

  try {
    const config = await loadConfig(args.configPath);
    logger = new Logger({
      level: config.logging?.level,
      format: config.logging?.format,
    });

    const fetcher = new ApiClient({
      baseUrl: config.source.baseUrl,
      headers: config.source.headers,
      timeoutMs: config.source.timeoutMs,
    });

    const result = await runCommand(args.command, config, {
      fetcher,
      logger,
      createEngine: () => {
        if (!config.target) {
          throw new Error('No target configured');
        }
        return createStorageEngine(config.target, logger);
      },
    });

    process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
  } catch (error) {
    logger.error('Command failed', { command: args.command, error: errorMessage(error) });
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
