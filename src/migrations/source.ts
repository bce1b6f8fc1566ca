/**
 * Migration discovery
 * Reads migration units from a directory in byte-wise name order
 */

import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from '../cli/errors.js';
import { DiscoveryError } from './errors.js';
import { fingerprint } from './fingerprint.js';
import type { MigrationUnit, TransactionMode } from './types.js';

/** Marks a unit that must run outside a transaction */
export const NO_TX_SENTINEL = '-- strata:no_tx';

/** How many leading lines are searched for the sentinel */
export const SENTINEL_LINE_LIMIT = 5;

export interface DiscoverOptions {
  extension?: string;
}

/**
 * Byte-wise comparison of UTF-8 names; independent of locale
 */
export function compareNames(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf-8'), Buffer.from(b, 'utf-8'));
}

/**
 * Derive the transaction mode from the first lines of a script
 */
export function detectMode(content: string): TransactionMode {
  const head = content.split(/\r?\n/, SENTINEL_LINE_LIMIT);
  return head.some((line) => line.includes(NO_TX_SENTINEL)) ? 'non-transactional' : 'transactional';
}

/**
 * Build a unit from raw file bytes
 */
export function parseMigrationUnit(name: string, path: string, bytes: Buffer): MigrationUnit {
  const content = bytes.toString('utf-8');
  return {
    name,
    path,
    content,
    contentHash: fingerprint(bytes),
    mode: detectMode(content),
  };
}

/**
 * List the migration units in a directory, sorted by name
 *
 * Only regular files ending in the extension are units; hidden files are
 * ignored. Throws DiscoveryError if the directory or a unit can't be read.
 */
export function discoverMigrations(directory: string, options: DiscoverOptions = {}): MigrationUnit[] {
  const extension = options.extension ?? '.sql';

  let names: string[];
  try {
    if (!statSync(directory).isDirectory()) {
      throw new DiscoveryError(directory, `Migration path is not a directory: ${directory}`);
    }
    names = readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && !entry.name.startsWith('.') && entry.name.endsWith(extension))
      .map((entry) => entry.name);
  } catch (error) {
    if (error instanceof DiscoveryError) throw error;
    throw new DiscoveryError(
      directory,
      `Cannot read migration directory ${directory}: ${errorMessage(error)}`,
      error
    );
  }

  names.sort(compareNames);

  return names.map((name) => {
    const path = join(directory, name);
    let bytes: Buffer;
    try {
      bytes = readFileSync(path);
    } catch (error) {
      throw new DiscoveryError(directory, `Cannot read migration ${name}: ${errorMessage(error)}`, error);
    }
    return parseMigrationUnit(name, path, bytes);
  });
}
