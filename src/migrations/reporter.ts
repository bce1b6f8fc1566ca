/**
 * Migration progress reporting
 */

import { tags } from '../cli/colors.js';
import type { Output } from '../cli/output.js';
import { errorMessage } from '../cli/errors.js';
import { hashPrefix } from './fingerprint.js';
import type { DriftWarning, MigrationUnit, RunResult } from './types.js';

export type MigrationEvent =
  | { type: 'discovered'; directory: string; count: number }
  | { type: 'empty'; directory: string }
  | { type: 'applying'; unit: MigrationUnit }
  | { type: 'applied'; name: string; durationMs: number }
  | { type: 'skipped'; name: string }
  | { type: 'drift'; warning: DriftWarning }
  | { type: 'unverified'; name: string }
  | { type: 'failed'; name: string; error: unknown }
  | { type: 'finished'; result: RunResult };

export type Reporter = (event: MigrationEvent) => void;

export type ReportLevel = 'verbose' | 'info' | 'warn' | 'error';

export interface ReportLine {
  level: ReportLevel;
  text: string;
}

export const silentReporter: Reporter = () => {};

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

/**
 * Render an event as tagged lines
 */
export function formatMigrationEvent(event: MigrationEvent): ReportLine[] {
  switch (event.type) {
    case 'discovered':
      return [{ level: 'verbose', text: tags.info(`Found ${plural(event.count, 'migration')} in ${event.directory}`) }];

    case 'empty':
      return [{ level: 'warn', text: tags.warn(`No migrations found in ${event.directory}`) }];

    case 'applying': {
      const suffix = event.unit.mode === 'non-transactional' ? ' (no transaction)' : '';
      return [{ level: 'verbose', text: tags.info(`Applying ${event.unit.name}${suffix}`) }];
    }

    case 'applied':
      return [{ level: 'info', text: tags.info(`Applied ${event.name} (${event.durationMs}ms)`) }];

    case 'skipped':
      return [{ level: 'info', text: tags.skip(`${event.name} (already applied)`) }];

    case 'drift': {
      const { name, storedHash, currentHash } = event.warning;
      return [
        { level: 'warn', text: tags.warn(`Drift detected in ${name}: content changed after it was applied`) },
        { level: 'warn', text: `  Stored:  ${hashPrefix(storedHash)}...` },
        { level: 'warn', text: `  Current: ${hashPrefix(currentHash)}...` },
      ];
    }

    case 'unverified':
      return [{ level: 'warn', text: tags.warn(`${event.name} has no stored hash; skipped without verification`) }];

    case 'failed':
      return [{ level: 'error', text: tags.error(`${event.name} failed: ${errorMessage(event.error)}`) }];

    case 'finished': {
      const { result } = event;
      const counts = `${result.applied.length} applied, ${result.skipped.length} skipped`;
      const lines: ReportLine[] =
        result.status === 'success'
          ? [{ level: 'info', text: `Migration complete: ${counts}` }]
          : [{ level: 'error', text: `Migration stopped at ${result.failed ?? 'unknown'}: ${counts}` }];
      if (result.drifted.length > 0) {
        lines.push({
          level: 'warn',
          text: tags.warn(`${plural(result.drifted.length, 'migration')} changed since being applied`),
        });
      }
      return lines;
    }
  }
}

/**
 * Reporter that writes through the CLI output helper
 * Quiet mode keeps warnings and errors; JSON mode prints nothing
 */
export function createConsoleReporter(out: Output): Reporter {
  return (event) => {
    for (const line of formatMigrationEvent(event)) {
      switch (line.level) {
        case 'verbose':
          out.verbose(line.text);
          break;
        case 'info':
          out.log(line.text);
          break;
        case 'warn':
          out.warn(line.text);
          break;
        case 'error':
          out.fail(line.text);
          break;
      }
    }
  };
}
