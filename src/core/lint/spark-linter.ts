/**
 * Linter and fixer for PySpark table and filesystem references.
 */
import { parsePython, type PythonTree } from '../../python/python-tree.js';
import { MigrationResolver } from '../migration/resolver.js';
import type { MigrationLookup } from '../migration/types.js';
import { PatternCatalog } from '../patterns/catalog.js';
import { CurrentSessionState } from '../session/state.js';
import { AdvisoryEngine } from './advisory-engine.js';
import { FixEngine } from './fix-engine.js';
import type { Advisory, Fixer, Linter, LintSource } from './types.js';

export interface SparkLinterOptions {
  /** Defaults to the bundled catalog */
  catalog?: PatternCatalog;
  session?: CurrentSessionState;
}

function toTree(source: LintSource): PythonTree {
  return typeof source === 'string' ? parsePython(source) : source;
}

export class SparkTableLinter implements Linter, Fixer {
  readonly name = 'spark-table';
  private readonly advisories: AdvisoryEngine;
  private readonly fixes: FixEngine;

  constructor(index: MigrationLookup, options: SparkLinterOptions = {}) {
    const catalog = options.catalog ?? PatternCatalog.default();
    const resolver = new MigrationResolver(index, options.session ?? new CurrentSessionState());
    this.advisories = new AdvisoryEngine(catalog, resolver);
    this.fixes = new FixEngine(catalog, resolver);
  }

  /**
   * Lints source text or a parsed tree. Text is parsed immediately, so a
   * parse failure throws here rather than on first iteration.
   */
  lint(source: LintSource): Generator<Advisory, void, undefined> {
    return this.advisories.lint(toTree(source));
  }

  /**
   * Applies fixes. A tree passed in is mutated and must not be reused.
   */
  apply(source: LintSource): string {
    return this.fixes.apply(toTree(source));
  }
}
