/**
 * Tests for statement splitting of non-transactional scripts
 */

import { describe, it, expect } from '@jest/globals';
import { splitStatements } from '../src/migrations/statements.js';

describe('splitStatements', () => {
  it('should split on top-level semicolons', () => {
    expect(splitStatements('CREATE TABLE a (id int);\nCREATE INDEX CONCURRENTLY a_id ON a (id);\n')).toEqual([
      'CREATE TABLE a (id int)',
      'CREATE INDEX CONCURRENTLY a_id ON a (id)',
    ]);
  });

  it('should keep a final statement without a semicolon', () => {
    expect(splitStatements('SELECT 1;\nSELECT 2')).toEqual(['SELECT 1', 'SELECT 2']);
  });

  it('should drop empty and comment-only pieces', () => {
    expect(splitStatements(';;\n-- strata:no_tx\n  ;\n/* nothing */')).toEqual([]);
    expect(splitStatements('')).toEqual([]);
  });

  it('should keep leading comments with the statement they precede', () => {
    expect(splitStatements('-- strata:no_tx\n-- add index\nCREATE INDEX i ON t (c);')).toEqual([
      '-- strata:no_tx\n-- add index\nCREATE INDEX i ON t (c)',
    ]);
  });

  it('should ignore semicolons inside strings and quoted identifiers', () => {
    expect(splitStatements(`INSERT INTO "odd;name" VALUES ('a;b', 'it''s; fine');SELECT 1;`)).toEqual([
      `INSERT INTO "odd;name" VALUES ('a;b', 'it''s; fine')`,
      'SELECT 1',
    ]);
  });

  it('should honour backslash escapes in E strings only', () => {
    expect(splitStatements(`SELECT E'a\\';b';SELECT 'c\\';SELECT 2;`)).toEqual([
      `SELECT E'a\\';b'`,
      `SELECT 'c\\'`,
      'SELECT 2',
    ]);
  });

  it('should ignore semicolons inside comments', () => {
    expect(splitStatements('SELECT 1 -- trailing; comment\n;/* a; /* nested; */ b; */SELECT 2;')).toEqual([
      'SELECT 1 -- trailing; comment',
      '/* a; /* nested; */ b; */SELECT 2',
    ]);
  });

  it('should treat dollar-quoted bodies as opaque', () => {
    const fn = [
      'CREATE FUNCTION touch() RETURNS trigger AS $body$',
      'BEGIN NEW.updated_at = now(); RETURN NEW; END;',
      '$body$ LANGUAGE plpgsql;',
    ].join('\n');
    expect(splitStatements(`${fn}\nDO $$ BEGIN PERFORM 1; END $$;`)).toEqual([
      fn.slice(0, -1),
      'DO $$ BEGIN PERFORM 1; END $$',
    ]);
  });

  it('should not mistake positional parameters for dollar quotes', () => {
    expect(splitStatements('SELECT $1;SELECT $2;')).toEqual(['SELECT $1', 'SELECT $2']);
  });
});
