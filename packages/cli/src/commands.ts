/**
 * CLI commands
 *
 * `mapping`, `schema` and `import` over one configured source. Commands
 * return plain JSON-ready results; printing is left to the entry point.
 */

import type { DataRecord, HttpFetcher, Logger, RowId, StorageEngine } from '@schemabridge/core';
import { ConnectorError, formatColumn } from '@schemabridge/core';
import type { FieldMapping } from '@schemabridge/mapping';
import { MappingGenerator, RecordTransformer, SchemaBuilder, splitFailures } from '@schemabridge/mapping';
import { recordsAt } from '@schemabridge/connector-api';
import { TableStore } from '@schemabridge/connector-db';
import type { ConfigFile } from './config.js';
import { ConfigError } from './config.js';

export const COMMANDS = ['mapping', 'schema', 'import'] as const;

export type CommandName = (typeof COMMANDS)[number];

export function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

export interface CommandDeps {
  fetcher: HttpFetcher;
  /** Called only by commands that write */
  createEngine: () => StorageEngine;
  logger: Logger;
}

export interface SchemaReport {
  table: string | null;
  columns: string[];
}

export interface FailureReport {
  /** Index of the source record */
  record: number;
  field: string;
  code: string;
  message: string;
}

export interface ImportReport {
  inserted: number;
  ids: RowId[];
  failures: FailureReport[];
}

export type CommandResult = FieldMapping | SchemaReport | ImportReport;

async function loadRecords(config: ConfigFile, deps: CommandDeps): Promise<DataRecord[]> {
  const { endpoint, method, query, recordsPath } = config.source;
  const payload = await deps.fetcher.fetch(endpoint, { method, query });
  const records = recordsAt(payload, recordsPath);
  deps.logger.debug('Fetched source records', { endpoint, count: records.length });
  return records;
}

function firstRecord(records: readonly DataRecord[], endpoint: string): DataRecord {
  const [first] = records;
  if (!first) {
    throw new ConnectorError({
      code: 'NOT_FOUND',
      message: `Source ${endpoint} returned no records`,
      suggestion: 'Check source.endpoint and source.recordsPath.',
    });
  }
  return first;
}

function resolveMapping(config: ConfigFile, records: readonly DataRecord[], deps: CommandDeps): FieldMapping {
  if (config.mapping.fields) return config.mapping.fields;
  const generator = new MappingGenerator({ logger: deps.logger });
  return generator.generate(firstRecord(records, config.source.endpoint), config.mapping.options ?? {});
}

function requireTarget(config: ConfigFile): NonNullable<ConfigFile['target']> {
  if (!config.target) {
    throw new ConfigError('The import command requires a target section');
  }
  return config.target;
}

async function mappingCommand(config: ConfigFile, deps: CommandDeps): Promise<FieldMapping> {
  const records = config.mapping.fields ? [] : await loadRecords(config, deps);
  return resolveMapping(config, records, deps);
}

async function schemaCommand(config: ConfigFile, deps: CommandDeps): Promise<SchemaReport> {
  const records = await loadRecords(config, deps);
  const first = firstRecord(records, config.source.endpoint);
  const mapping = resolveMapping(config, records, deps);
  const transformer = new RecordTransformer({ logger: deps.logger });
  const { values } = splitFailures(transformer.transform(first, mapping));

  const schema = new SchemaBuilder().build(values, config.target?.primaryKey, config.target?.primaryKeyType);
  return { table: config.target?.table ?? null, columns: schema.map(formatColumn) };
}

async function importCommand(config: ConfigFile, deps: CommandDeps): Promise<ImportReport> {
  const target = requireTarget(config);
  const records = await loadRecords(config, deps);
  if (records.length === 0) {
    deps.logger.warn('Source returned no records', { endpoint: config.source.endpoint });
    return { inserted: 0, ids: [], failures: [] };
  }

  const mapping = resolveMapping(config, records, deps);
  const transformer = new RecordTransformer({ logger: deps.logger });
  const rows: DataRecord[] = [];
  const failures: FailureReport[] = [];

  records.forEach((record, index) => {
    const split = splitFailures(transformer.transform(record, mapping));
    rows.push(split.values);
    for (const failure of split.failures) {
      failures.push({ record: index, field: failure.field, code: failure.code, message: failure.message });
    }
  });

  const engine = deps.createEngine();
  await engine.connect();
  try {
    const store = new TableStore(engine, {
      primaryKey: target.primaryKey,
      primaryKeyType: target.primaryKeyType,
      logger: deps.logger,
    });
    const { inserted, ids } = await store.batchInsert(target.table, rows);
    deps.logger.info('Import finished', { table: target.table, inserted, failures: failures.length });
    return { inserted, ids, failures };
  } finally {
    await engine.disconnect();
  }
}

/**
 * Run one command against a validated config
 */
export async function runCommand(
  command: CommandName,
  config: ConfigFile,
  deps: CommandDeps
): Promise<CommandResult> {
  switch (command) {
    case 'mapping':
      return mappingCommand(config, deps);
    case 'schema':
      return schemaCommand(config, deps);
    case 'import':
      return importCommand(config, deps);
  }
}
