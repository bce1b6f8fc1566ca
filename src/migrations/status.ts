/**
 * Read-only comparison of migration files with the ledger
 */

import type { ApplyLedger } from './ledger.js';
import { compareNames } from './source.js';
import type { LedgerEntry, MigrationUnit } from './types.js';

export type MigrationState = 'applied' | 'pending' | 'drift' | 'unverified' | 'orphaned';

export interface MigrationStatusRow {
  name: string;
  state: MigrationState;
  appliedAt: string | null;
  storedHash: string | null;
  currentHash: string | null;
}

export interface MigrationStatusSummary {
  rows: MigrationStatusRow[];
  counts: Record<MigrationState, number>;
  ledgerExists: boolean;
}

function classify(unit: MigrationUnit | undefined, entry: LedgerEntry | undefined): MigrationState {
  if (!entry) return 'pending';
  if (!unit) return 'orphaned';
  if (entry.contentHash === null) return 'unverified';
  return entry.contentHash === unit.contentHash ? 'applied' : 'drift';
}

/**
 * Classify each unit and ledger entry; never writes
 * Orphaned rows are ledger entries whose file is gone.
 */
export function classifyMigrations(units: MigrationUnit[], entries: LedgerEntry[]): MigrationStatusRow[] {
  const byUnit = new Map(units.map((unit) => [unit.name, unit]));
  const byEntry = new Map(entries.map((entry) => [entry.name, entry]));
  const names = [...new Set([...byUnit.keys(), ...byEntry.keys()])].sort(compareNames);

  return names.map((name) => {
    const unit = byUnit.get(name);
    const entry = byEntry.get(name);
    return {
      name,
      state: classify(unit, entry),
      appliedAt: entry?.appliedAt ?? null,
      storedHash: entry?.contentHash ?? null,
      currentHash: unit?.contentHash ?? null,
    };
  });
}

export async function getMigrationStatus(
  units: MigrationUnit[],
  ledger: ApplyLedger
): Promise<MigrationStatusSummary> {
  const ledgerExists = await ledger.exists();
  const entries = ledgerExists ? await ledger.list() : [];
  const rows = classifyMigrations(units, entries);

  const counts: Record<MigrationState, number> = {
    applied: 0,
    pending: 0,
    drift: 0,
    unverified: 0,
    orphaned: 0,
  };
  for (const row of rows) {
    counts[row.state]++;
  }

  return { rows, counts, ledgerExists };
}
