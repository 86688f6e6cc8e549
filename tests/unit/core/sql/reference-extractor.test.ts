/**
 * Tests for FROM/JOIN table reference extraction.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import {
  extractTableReferences,
  replaceTableReferences,
} from '../../../../src/core/sql/reference-extractor.js';

function identities(sql: string): string[] {
  return extractTableReferences(sql).map((r) => r.identity);
}

describe('extractTableReferences', () => {
  it('should find FROM references with offsets', () => {
    expect(extractTableReferences('SELECT * FROM old.things')).toEqual([
      { identity: 'old.things', offset: 14, length: 10 },
    ]);
  });

  it('should match keywords case-insensitively', () => {
    expect(identities('SELECT * FROm dual')).toEqual(['dual']);
    expect(identities('select a from s.t join u.v on s.t.id = u.v.id')).toEqual(['s.t', 'u.v']);
  });

  it('should require whole-word keywords followed by whitespace', () => {
    expect(identities('SELECT fromage FROM cheese.board')).toEqual(['cheese.board']);
    expect(identities('SELECT x.from_date FROM a.b')).toEqual(['a.b']);
    expect(identities('SELECT * FROM(SELECT 1)')).toEqual([]);
  });

  it('should skip whitespace and newlines after the keyword', () => {
    expect(identities('SELECT *\nFROM\n   sales.orders\nWHERE 1 = 1')).toEqual(['sales.orders']);
  });

  it('should ignore quoted text and comments', () => {
    expect(identities("SELECT 'from a.b' AS x FROM c.d")).toEqual(['c.d']);
    expect(identities('SELECT `from x.y` FROM c.d')).toEqual(['c.d']);
    expect(identities("SELECT 'it''s from a.b' FROM c.d")).toEqual(['c.d']);
    expect(identities('SELECT 1 -- from a.b\nFROM c.d')).toEqual(['c.d']);
    expect(identities('SELECT /* join a.b */ 1 FROM c.d')).toEqual(['c.d']);
  });

  it('should reject names with empty segments', () => {
    expect(identities('SELECT * FROM a..b')).toEqual([]);
    expect(identities('SELECT * FROM .b')).toEqual([]);
  });

  it('should keep three-part names whole', () => {
    expect(identities('SELECT * FROM cat.sch.tbl')).toEqual(['cat.sch.tbl']);
  });

  it('should return nothing for SQL without references', () => {
    expect(identities('SELECT 1')).toEqual([]);
    expect(identities('')).toEqual([]);
  });

  it('should only report spans that hold the identity', () => {
    const segment = fc.stringMatching(/^[a-z_][a-z0-9_]{0,8}$/);
    const name = fc.array(segment, { minLength: 1, maxLength: 3 }).map((parts) => parts.join('.'));
    const filler = fc.constantFrom('SELECT *', 'SELECT a, b', 'WITH x AS (SELECT 1)', '');

    fc.assert(
      fc.property(filler, name, name, (prefix, first, second) => {
        const sql = `${prefix} FROM ${first} JOIN ${second} ON 1 = 1`;
        const refs = extractTableReferences(sql);
        expect(refs.map((r) => r.identity)).toEqual([first, second]);
        for (const ref of refs) {
          expect(sql.slice(ref.offset, ref.offset + ref.length)).toBe(ref.identity);
        }
      })
    );
  });
});

describe('replaceTableReferences', () => {
  it('should replace references and keep the rest of the text', () => {
    const sql = 'SELECT * FROM old.things JOIN old.more ON 1 = 1';
    const [first, second] = extractTableReferences(sql);
    expect(
      replaceTableReferences(sql, [
        { reference: second, replacement: 'c.s.more' },
        { reference: first, replacement: 'brand.new.stuff' },
      ])
    ).toBe('SELECT * FROM brand.new.stuff JOIN c.s.more ON 1 = 1');
  });

  it('should return the text unchanged without replacements', () => {
    expect(replaceTableReferences('SELECT * FROM a.b', [])).toBe('SELECT * FROM a.b');
  });
});
