/**
 * Read-only pass producing advisories for one parsed tree.
 */
import type { CallSite, SlotValue } from '../../python/call-site.js';
import type { PythonTree } from '../../python/python-tree.js';
import type { MigrationResolver } from '../migration/resolver.js';
import type { PatternCatalog } from '../patterns/catalog.js';
import type { FilesystemPathMatcher } from '../patterns/types.js';
import { extractTableReferences } from '../sql/reference-extractor.js';
import { matchCalls } from './pipeline.js';
import { AdvisoryCodes, type Advisory, type AdvisoryCode } from './types.js';

const URI_SCHEME = /^([A-Za-z][A-Za-z0-9+.-]*):/;

/**
 * Classifies a path for a filesystem matcher.
 *
 * A path with one of the matcher's schemes is direct filesystem access. A
 * path with no scheme is implicit dbfs usage when the matcher defaults to
 * managed storage and the path is absolute. Everything else is fine.
 */
export function classifyFilesystemPath(
  path: string,
  matcher: FilesystemPathMatcher
): AdvisoryCode | null {
  const scheme = URI_SCHEME.exec(path);
  if (scheme) {
    return matcher.schemes.has(scheme[1].toLowerCase())
      ? AdvisoryCodes.DIRECT_FILESYSTEM_ACCESS
      : null;
  }
  if (matcher.defaultsToManagedStorage && path.startsWith('/')) {
    return AdvisoryCodes.IMPLICIT_DBFS_USAGE;
  }
  return null;
}

export function filesystemMessage(code: AdvisoryCode, path: string): string {
  return code === AdvisoryCodes.IMPLICIT_DBFS_USAGE
    ? `The use of default dbfs: references is deprecated: ${path}`
    : `The use of direct filesystem references is deprecated: ${path}`;
}

export function tableMigratedMessage(source: string, destination: string): string {
  return `Table ${source} is migrated to ${destination} in Unity Catalog`;
}

export class AdvisoryEngine {
  constructor(
    private readonly catalog: PatternCatalog,
    private readonly resolver: MigrationResolver
  ) {}

  /**
   * Advisories for every matched call, in document order.
   */
  *lint(tree: PythonTree): Generator<Advisory, void, undefined> {
    for (const { callSite, match } of matchCalls(tree, this.catalog)) {
      const { matcher, values } = match;
      switch (matcher.kind) {
        case 'filesystem-path':
          yield* this.lintFilesystem(callSite, matcher, values);
          break;
        case 'direct-table-name':
          yield* this.lintTableNames(callSite, values);
          break;
        case 'embedded-sql':
          yield* this.lintSql(callSite, values);
          break;
      }
    }
  }

  private *lintFilesystem(
    callSite: CallSite,
    matcher: FilesystemPathMatcher,
    values: SlotValue[]
  ): Generator<Advisory> {
    // Only the first deprecated path of a call is reported
    for (const { value } of values) {
      const code = classifyFilesystemPath(value, matcher);
      if (code) {
        yield { code, message: filesystemMessage(code, value), span: callSite.span };
        return;
      }
    }
  }

  private *lintTableNames(callSite: CallSite, values: SlotValue[]): Generator<Advisory> {
    for (const { value } of values) {
      const resolved = this.resolver.resolve(value);
      if (resolved) {
        yield {
          code: AdvisoryCodes.TABLE_MIGRATED_TO_UC,
          message: tableMigratedMessage(resolved.source, resolved.destination),
          span: callSite.span,
        };
      }
    }
  }

  private *lintSql(callSite: CallSite, values: SlotValue[]): Generator<Advisory> {
    for (const { value } of values) {
      for (const reference of extractTableReferences(value)) {
        const resolved = this.resolver.resolve(reference.identity);
        if (resolved) {
          // The literal's inner text has no position of its own: report the call
          yield {
            code: AdvisoryCodes.TABLE_MIGRATED_TO_UC,
            message: tableMigratedMessage(resolved.source, resolved.destination),
            span: callSite.span,
          };
        }
      }
    }
  }
}
