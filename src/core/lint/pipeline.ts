/**
 * The matching pipeline shared by lint and apply: every call in document
 * order, paired with the catalog match it produced.
 */
import { CallSite } from '../../python/call-site.js';
import type { PythonTree } from '../../python/python-tree.js';
import { walkTree } from '../../python/tree-sitter-utils.js';
import type { PatternCatalog } from '../patterns/catalog.js';
import type { CatalogMatch } from '../patterns/types.js';

export interface MatchedCall {
  callSite: CallSite;
  match: CatalogMatch;
}

export function* matchCalls(tree: PythonTree, catalog: PatternCatalog): Generator<MatchedCall> {
  for (const node of walkTree(tree.root)) {
    const callSite = CallSite.from(tree, node);
    if (!callSite) continue;

    const match = catalog.match(callSite);
    if (match) {
      yield { callSite, match };
    }
  }
}
