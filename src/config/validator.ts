/**
 * Configuration validation
 * Validates config against the JSON schema and provides helpful error messages
 */

import Ajv, { type ErrorObject } from 'ajv';
import type { StrataConfig } from './loader.js';
import { CONFIG_SCHEMA } from './schema.js';

export interface ValidationError {
  path: string;
  message: string;
  suggestion?: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const DURATION_KEYS = new Set(['lock.ttl', 'lock.heartbeat', 'database.connectTimeout']);

const ajv = new Ajv({ allErrors: true });

export const validateConfigShape = ajv.compile<StrataConfig>(CONFIG_SCHEMA);

/**
 * Convert an ajv instance path (/lock/id) to a dotted config path (lock.id)
 */
function toConfigPath(error: ErrorObject): string {
  const base = error.instancePath.replace(/^\//, '').replace(/\//g, '.');
  if (error.keyword === 'additionalProperties') {
    const extra = String(error.params.additionalProperty);
    return base ? `${base}.${extra}` : extra;
  }
  return base || '(root)';
}

function toValidationError(error: ErrorObject): ValidationError {
  const path = toConfigPath(error);

  switch (error.keyword) {
    case 'additionalProperties':
      return { path, message: `Unknown configuration key "${path}"` };
    case 'enum': {
      const allowed: unknown = error.params.allowedValues;
      return {
        path,
        message: 'Invalid value',
        suggestion: Array.isArray(allowed) ? `Valid options: ${allowed.join(', ')}` : undefined,
      };
    }
    case 'pattern':
      return DURATION_KEYS.has(path)
        ? { path, message: 'Invalid duration', suggestion: 'Use a duration such as 30s, 5m, 1h' }
        : { path, message: error.message ?? 'Invalid value' };
    default:
      return { path, message: error.message ?? 'Invalid value' };
  }
}

/**
 * Validate configuration against schema
 */
export function validateConfig(config: unknown): ValidationResult {
  if (validateConfigShape(config)) {
    return { valid: true, errors: [] };
  }

  return {
    valid: false,
    errors: (validateConfigShape.errors ?? []).map(toValidationError),
  };
}

/**
 * Format validation results for display
 */
export function formatValidationResult(result: ValidationResult): string {
  if (result.valid) {
    return 'Configuration is valid.';
  }

  const lines: string[] = ['ERRORS:'];
  for (const error of result.errors) {
    lines.push(`  ${error.path}: ${error.message}`);
    if (error.suggestion) {
      lines.push(`    → ${error.suggestion}`);
    }
  }

  return lines.join('\n');
}
