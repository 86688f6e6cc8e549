/**
 * Tests for rewriting migrated table names.
 */
import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { SparkTableLinter } from '../../../../src/core/lint/spark-linter.js';
import { MigrationIndex } from '../../../../src/core/migration/migration-index.js';
import { PatternCatalog } from '../../../../src/core/patterns/catalog.js';
import { CurrentSessionState } from '../../../../src/core/session/state.js';
import { parsePython } from '../../../../src/python/python-tree.js';

const migrationIndex = new MigrationIndex([
  { srcSchema: 'old', srcTable: 'things', dstCatalog: 'brand', dstSchema: 'new', dstTable: 'stuff' },
  { srcSchema: 'old', srcTable: 'more', dstCatalog: 'brand', dstSchema: 'new', dstTable: 'more' },
]);

const linter = new SparkTableLinter(migrationIndex);

describe('SparkTableLinter.apply', () => {
  it('should rewrite table names inside sql text', () => {
    const source = [
      'spark.read.csv("s3://bucket/path")',
      'for i in range(10):',
      '    result = spark.sql("SELECT * FROM old.things").collect()',
      '    print(len(result))',
      '',
    ].join('\n');

    expect(linter.apply(source)).toBe(
      [
        'spark.read.csv("s3://bucket/path")',
        'for i in range(10):',
        "    result = spark.sql('SELECT * FROM brand.new.stuff').collect()",
        '    print(len(result))',
        '',
      ].join('\n')
    );
  });

  it('should leave source without fixes untouched', () => {
    const source = [
      "spark.read.csv('s3://bucket/path')",
      'for table in spark.catalog.listTables():',
      '    do_stuff_with_table(table)',
    ].join('\n');
    expect(linter.apply(source)).toBe(source);
  });

  it('should rewrite direct table arguments', () => {
    expect(linter.apply('df = spark.table("old.things")\n')).toBe("df = spark.table('brand.new.stuff')\n");
    expect(linter.apply('df.write.saveAsTable(name="old.more", mode="overwrite")\n')).toBe(
      "df.write.saveAsTable(name='brand.new.more', mode=\"overwrite\")\n"
    );
  });

  it('should rewrite every migrated reference in one query', () => {
    expect(linter.apply('spark.sql("SELECT * FROM old.things t JOIN old.more m ON t.id = m.id")')).toBe(
      "spark.sql('SELECT * FROM brand.new.stuff t JOIN brand.new.more m ON t.id = m.id')"
    );
  });

  it('should keep references that are not migrated', () => {
    expect(linter.apply('spark.sql("SELECT * FROM old.things JOIN other.t ON 1 = 1")')).toBe(
      "spark.sql('SELECT * FROM brand.new.stuff JOIN other.t ON 1 = 1')"
    );
  });

  it('should replace implicitly concatenated and parenthesized literals whole', () => {
    expect(linter.apply('spark.table("old." "things")')).toBe("spark.table('brand.new.stuff')");
    expect(linter.apply('spark.table(("old.things"))')).toBe("spark.table(('brand.new.stuff'))");
  });

  it('should not touch interpolated or variable arguments', () => {
    const source = 'spark.table(f"{schema}.things")\nspark.sql(query)\n';
    expect(linter.apply(source)).toBe(source);
  });

  it('should be idempotent', () => {
    const source = 'spark.table("old.things")\nspark.sql("SELECT * FROM old.more")\n';
    const once = linter.apply(source);
    expect(once).toBe("spark.table('brand.new.stuff')\nspark.sql('SELECT * FROM brand.new.more')\n");
    expect(linter.apply(once)).toBe(once);
  });

  it('should leave nothing to migrate after one pass', () => {
    const name = fc.constantFrom('old.things', 'OLD.more', 'other.t', 'brand.new.stuff', 'things');
    const statement = fc.tuple(
      fc.constantFrom(
        (n: string) => `spark.table("${n}")`,
        (n: string) => `spark.sql("SELECT * FROM ${n} JOIN old.more ON 1 = 1")`,
        (n: string) => `df.write.saveAsTable(name='${n}')`,
        (n: string) => `spark.read.csv("s3://bucket/${n}")`
      ),
      name
    ).map(([render, n]) => render(n));

    fc.assert(
      fc.property(fc.array(statement, { maxLength: 6 }), (statements) => {
        const source = statements.map((line) => `${line}\n`).join('');
        const once = linter.apply(source);
        expect(linter.apply(once)).toBe(once);
        expect([...linter.lint(once)].filter((a) => a.code === 'table-migrated-to-uc')).toEqual([]);
      })
    );
  });

  it('should rewrite files past the default parse buffer', () => {
    const padding = '# padding line for a long notebook export .................................\n'.repeat(600);
    const fixed = linter.apply(`${padding}spark.sql("SELECT * FROM old.things")\n`);

    expect(fixed.startsWith(padding)).toBe(true);
    expect(fixed.endsWith("spark.sql('SELECT * FROM brand.new.stuff')\n")).toBe(true);
  });

  it('should accept a parsed tree and return its regenerated text', () => {
    const tree = parsePython('spark.table("old.things")  # source table\n');
    expect(linter.apply(tree)).toBe("spark.table('brand.new.stuff')  # source table\n");
    expect(tree.mutationCount).toBe(1);
  });
});

describe('custom call matchers', () => {
  const catalog = new PatternCatalog([
    { kind: 'direct-table-name', name: 'call', requiredPrefix: null, slot: { position: 0, keyword: null } },
  ]);
  const custom = new SparkTableLinter(migrationIndex, {
    catalog,
    session: new CurrentSessionState('old'),
  });

  it('should leave names missing from the index unchanged', () => {
    expect(custom.apply("call('some.things')")).toBe("call('some.things')");
  });

  it('should rewrite names found in the index', () => {
    expect(custom.apply("call('old.things')")).toBe("call('brand.new.stuff')");
  });
});
