/**
 * JSON schema for strata configuration files
 */

export const DATABASE_DRIVERS = ['postgres', 'sqlite'] as const;
export const LOCK_STRATEGIES = ['advisory', 'lease'] as const;

export type DatabaseDriver = (typeof DATABASE_DRIVERS)[number];
export type LockStrategy = (typeof LOCK_STRATEGIES)[number];

const IDENTIFIER_PATTERN = '^[A-Za-z_][A-Za-z0-9_]*$';
const DURATION_PATTERN = '^\\d+(ms|s|m|h)?$';

export const CONFIG_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  properties: {
    database: {
      type: 'object',
      additionalProperties: false,
      properties: {
        driver: { type: 'string', enum: [...DATABASE_DRIVERS] },
        url: { type: 'string', minLength: 1 },
        path: { type: 'string', minLength: 1 },
        connectTimeout: { type: 'string', pattern: DURATION_PATTERN },
      },
    },
    migrations: {
      type: 'object',
      additionalProperties: false,
      properties: {
        directory: { type: 'string', minLength: 1 },
        extension: { type: 'string', pattern: '^\\.[A-Za-z0-9_.-]+$' },
        table: { type: 'string', pattern: IDENTIFIER_PATTERN },
        schema: { type: 'string', pattern: IDENTIFIER_PATTERN },
      },
    },
    lock: {
      type: 'object',
      additionalProperties: false,
      properties: {
        id: { type: 'integer', minimum: -2147483648, maximum: 2147483647 },
        strategy: { type: 'string', enum: [...LOCK_STRATEGIES] },
        ttl: { type: 'string', pattern: DURATION_PATTERN },
        heartbeat: { type: 'string', pattern: DURATION_PATTERN },
      },
    },
  },
} as const;

export function isDatabaseDriver(value: string): value is DatabaseDriver {
  return DATABASE_DRIVERS.some((driver) => driver === value);
}
