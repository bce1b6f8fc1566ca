import type { ResolvedConfig } from '../config/loader.js';
import { connectionFailedError } from '../cli/errors.js';
import type { MigrationConnection } from './connection.js';
import { redactUrl } from './connection.js';
import { PostgresConnection } from './postgres-connection.js';
import { SqliteConnection } from './sqlite-connection.js';

/**
 * Open a connection for the configured driver
 * Failures become CONNECTION_FAILED errors naming a credential-free target
 */
export async function openConnection(database: ResolvedConfig['database']): Promise<MigrationConnection> {
  if (database.driver === 'sqlite') {
    try {
      return SqliteConnection.open(database.path);
    } catch (error) {
      throw connectionFailedError(database.path, error);
    }
  }

  try {
    return await PostgresConnection.connect(database.url, {
      connectTimeoutMs: database.connectTimeoutMs,
    });
  } catch (error) {
    throw connectionFailedError(redactUrl(database.url), error);
  }
}
