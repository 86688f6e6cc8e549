/**
 * Tests for the in-memory migration index.
 */
import { describe, it, expect } from 'vitest';
import { MigrationIndex } from '../../../../src/core/migration/migration-index.js';

describe('MigrationIndex', () => {
  it('should index only migrated tables', () => {
    const index = new MigrationIndex([
      { srcSchema: 'old', srcTable: 'things', dstCatalog: 'brand', dstSchema: 'new', dstTable: 'stuff' },
      { srcSchema: 'old', srcTable: 'half', dstCatalog: 'brand', dstSchema: null, dstTable: 'half' },
      { srcSchema: 'old', srcTable: 'none' },
    ]);

    expect(index.size).toBe(1);
    expect(index.lookup('old', 'half')).toBeNull();
    expect(index.lookup('old', 'none')).toBeNull();
  });

  it('should look up names ignoring case', () => {
    const index = new MigrationIndex([
      { srcSchema: 'Old', srcTable: 'Things', dstCatalog: 'brand', dstSchema: 'new', dstTable: 'stuff' },
    ]);

    expect(index.lookup('old', 'things')).toEqual({ catalog: 'brand', schema: 'new', table: 'stuff' });
    expect(index.lookup('OLD', 'THINGS')).toEqual({ catalog: 'brand', schema: 'new', table: 'stuff' });
  });

  it('should start empty', () => {
    const index = MigrationIndex.empty();
    expect(index.size).toBe(0);
    expect(index.lookup('old', 'things')).toBeNull();
  });
});
