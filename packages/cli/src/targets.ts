/**
 * Storage engines for configured targets
 */

import type { Logger, StorageEngine } from '@schemabridge/core';
import { MySQLClient, PostgresClient } from '@schemabridge/connector-db';
import type { TargetConfig } from './config.js';

export function createStorageEngine(target: TargetConfig, logger: Logger): StorageEngine {
  switch (target.type) {
    case 'mysql':
      return new MySQLClient(
        {
          uri: target.uri,
          host: target.host,
          port: target.port,
          database: target.database,
          user: target.user,
          password: target.password,
          ssl: target.ssl,
          connectTimeout: target.connectTimeoutMs,
        },
        logger
      );

    case 'postgresql':
      return new PostgresClient(
        {
          connectionString: target.connectionString,
          host: target.host,
          port: target.port,
          database: target.database,
          user: target.user,
          password: target.password,
          ssl: target.ssl,
          schema: target.schema,
          connectionTimeoutMillis: target.connectTimeoutMs,
        },
        logger
      );
  }
}
