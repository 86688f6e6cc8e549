/**
 * Rewriting pass: migrates table names in matched literals and regenerates
 * the source text.
 */
import type { SlotValue } from '../../python/call-site.js';
import type { PythonTree } from '../../python/python-tree.js';
import type { MigrationResolver } from '../migration/resolver.js';
import type { PatternCatalog } from '../patterns/catalog.js';
import {
  extractTableReferences,
  replaceTableReferences,
  type TableReference,
} from '../sql/reference-extractor.js';
import { logger } from '../../utils/logger.js';
import { matchCalls } from './pipeline.js';

export class FixEngine {
  constructor(
    private readonly catalog: PatternCatalog,
    private readonly resolver: MigrationResolver
  ) {}

  /**
   * Mutates the literals of the tree in place and returns the regenerated
   * text. The caller hands over the tree; it must not be shared while this runs.
   * Filesystem matches have no fix and are left alone.
   */
  apply(tree: PythonTree): string {
    const log = logger.child('fix');
    for (const { callSite, match } of matchCalls(tree, this.catalog)) {
      const { matcher, values } = match;
      for (const value of values) {
        let rewritten = false;
        switch (matcher.kind) {
          case 'direct-table-name':
            rewritten = this.fixTableName(tree, value);
            break;
          case 'embedded-sql':
            rewritten = this.fixSql(tree, value);
            break;
          case 'filesystem-path':
            break;
        }
        if (rewritten) {
          log.debug(`Rewrote ${matcher.name}() argument at line ${callSite.span.startLine + 1}`, {
            from: value.value,
            to: tree.literalValue(value.node),
          });
        }
      }
    }
    return tree.unparse();
  }

  private fixTableName(tree: PythonTree, { node, value }: SlotValue): boolean {
    const resolved = this.resolver.resolve(value);
    if (!resolved) return false;
    tree.replaceLiteral(node, resolved.destination);
    return true;
  }

  /**
   * Replaces each migrated reference inside the SQL text; the rest of the
   * query is kept as written.
   */
  private fixSql(tree: PythonTree, { node, value }: SlotValue): boolean {
    const replacements: Array<{ reference: TableReference; replacement: string }> = [];
    for (const reference of extractTableReferences(value)) {
      const resolved = this.resolver.resolve(reference.identity);
      if (resolved) {
        replacements.push({ reference, replacement: resolved.destination });
      }
    }
    if (replacements.length === 0) return false;
    tree.replaceLiteral(node, replaceTableReferences(value, replacements));
    return true;
  }
}
