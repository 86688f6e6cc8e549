/**
 * Tests for table name resolution against the migration index.
 */
import { describe, it, expect } from 'vitest';
import { MigrationIndex } from '../../../../src/core/migration/migration-index.js';
import {
  MigrationResolver,
  parseTableIdentity,
  formatTarget,
} from '../../../../src/core/migration/resolver.js';
import { CurrentSessionState } from '../../../../src/core/session/state.js';

const index = new MigrationIndex([
  { srcSchema: 'old', srcTable: 'things', dstCatalog: 'brand', dstSchema: 'new', dstTable: 'stuff' },
  { srcSchema: 'old', srcTable: 'pending' },
]);

describe('parseTableIdentity', () => {
  it('should parse one, two and three part names', () => {
    expect(parseTableIdentity('things')).toEqual({ parts: 1, table: 'things' });
    expect(parseTableIdentity('old.things')).toEqual({ parts: 2, schema: 'old', table: 'things' });
    expect(parseTableIdentity('a.b.c')).toEqual({ parts: 3, catalog: 'a', schema: 'b', table: 'c' });
  });

  it('should reject empty segments and long names', () => {
    expect(parseTableIdentity('')).toBeNull();
    expect(parseTableIdentity('old.')).toBeNull();
    expect(parseTableIdentity('a.b.c.d')).toBeNull();
  });
});

describe('formatTarget', () => {
  it('should join catalog, schema and table', () => {
    expect(formatTarget({ catalog: 'brand', schema: 'new', table: 'stuff' })).toBe('brand.new.stuff');
  });
});

describe('MigrationResolver', () => {
  const resolver = new MigrationResolver(index, new CurrentSessionState());

  it('should resolve migrated two-part names', () => {
    expect(resolver.resolve('old.things')).toEqual({
      source: 'old.things',
      target: { catalog: 'brand', schema: 'new', table: 'stuff' },
      destination: 'brand.new.stuff',
    });
  });

  it('should keep the name as written in the source', () => {
    expect(resolver.resolve('OLD.Things')?.source).toBe('OLD.Things');
  });

  it('should not resolve unknown or unmigrated tables', () => {
    expect(resolver.resolve('some.things')).toBeNull();
    expect(resolver.resolve('old.pending')).toBeNull();
  });

  it('should not resolve bare or fully qualified names', () => {
    const withSession = new MigrationResolver(index, new CurrentSessionState('old'));
    expect(withSession.resolve('things')).toBeNull();
    expect(withSession.resolve('brand.new.stuff')).toBeNull();
    expect(withSession.resolve('hive_metastore.old.things')).toBeNull();
  });
});
