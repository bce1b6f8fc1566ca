/**
 * Tests for configuration validation
 */

import { describe, it, expect } from '@jest/globals';
import { validateConfig, formatValidationResult } from '../src/config/validator.js';

describe('validateConfig', () => {
  it('should accept a complete config', () => {
    const result = validateConfig({
      database: { driver: 'postgres', url: 'postgres://localhost/app', connectTimeout: '10s' },
      migrations: { directory: 'db/migrations', extension: '.sql', table: 'schema_migrations', schema: 'ops' },
      lock: { id: 42, strategy: 'advisory', ttl: '10m', heartbeat: '30s' },
    });
    expect(result).toEqual({ valid: true, errors: [] });
  });

  it('should accept an empty config', () => {
    expect(validateConfig({}).valid).toBe(true);
  });

  it('should report unknown keys with their full path', () => {
    const result = validateConfig({ lock: { id: 1, name: 'x' } });
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([{ path: 'lock.name', message: 'Unknown configuration key "lock.name"' }]);
  });

  it('should list the valid options for enums', () => {
    const result = validateConfig({ lock: { strategy: 'mutex' } });
    expect(result.errors).toEqual([
      { path: 'lock.strategy', message: 'Invalid value', suggestion: 'Valid options: advisory, lease' },
    ]);
  });

  it('should explain bad durations', () => {
    const result = validateConfig({ lock: { ttl: '10 minutes' } });
    expect(result.errors).toEqual([
      { path: 'lock.ttl', message: 'Invalid duration', suggestion: 'Use a duration such as 30s, 5m, 1h' },
    ]);
  });

  it('should reject table names that are not plain identifiers', () => {
    const result = validateConfig({ migrations: { table: 'drop table;' } });
    expect(result.valid).toBe(false);
    expect(result.errors[0].path).toBe('migrations.table');
  });

  it('should collect every error', () => {
    const result = validateConfig({ database: { driver: 'mysql' }, lock: { id: 'one' } });
    expect(result.errors.map((error) => error.path).sort()).toEqual(['database.driver', 'lock.id']);
  });
});

describe('formatValidationResult', () => {
  it('should format a valid result', () => {
    expect(formatValidationResult({ valid: true, errors: [] })).toBe('Configuration is valid.');
  });

  it('should format errors with suggestions', () => {
    const result = validateConfig({ lock: { strategy: 'mutex' } });
    expect(formatValidationResult(result)).toBe(
      'ERRORS:\n  lock.strategy: Invalid value\n    → Valid options: advisory, lease'
    );
  });
});
