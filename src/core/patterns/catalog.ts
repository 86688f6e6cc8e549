/**
 * Pattern catalog: the static registry of call matchers and the generic
 * dispatcher that evaluates them against a call site.
 */
import { fileURLToPath } from 'node:url';
import type { ArgumentSlot, CallSite, SlotValue } from '../../python/call-site.js';
import type { CallMatcher, CatalogMatch } from './types.js';
import {
  PatternCatalogFileSchema,
  type ArgumentSlotEntry,
  type MatcherEntry,
  type PatternCatalogFile,
} from './schema.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import { loadYamlWithSchemaSync } from '../../utils/yaml.js';

/** Catalog bundled with the package. */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL('../../../data/spark-patterns.yaml', import.meta.url)
);

export class PatternCatalog {
  private static bundled: PatternCatalog | null = null;
  private readonly byName = new Map<string, CallMatcher>();

  constructor(matchers: readonly CallMatcher[]) {
    for (const matcher of matchers) {
      if (this.byName.has(matcher.name)) {
        throw new ConfigError(
          ErrorCodes.INVALID_CATALOG,
          `Duplicate matcher for '${matcher.name}' in pattern catalog`,
          { name: matcher.name }
        );
      }
      this.byName.set(matcher.name, matcher);
    }
  }

  /**
   * The catalog shipped in data/spark-patterns.yaml, loaded once per process.
   */
  static default(): PatternCatalog {
    if (!PatternCatalog.bundled) {
      PatternCatalog.bundled = loadPatternCatalog(DEFAULT_CATALOG_PATH);
    }
    return PatternCatalog.bundled;
  }

  get matchers(): CallMatcher[] {
    return [...this.byName.values()];
  }

  get(name: string): CallMatcher | undefined {
    return this.byName.get(name);
  }

  /**
   * Finds the matcher for a call and extracts its string-constant slots.
   *
   * Returns null when no matcher has the call's name, when a required
   * receiver prefix is missing, or when no slot holds a string constant.
   */
  match(callSite: CallSite): CatalogMatch | null {
    if (callSite.methodName === null) return null;

    const matcher = this.byName.get(callSite.methodName);
    if (!matcher) return null;

    if (matcher.requiredPrefix && !callSite.endsWith([...matcher.requiredPrefix, matcher.name])) {
      return null;
    }

    const slots = matcher.kind === 'filesystem-path' ? matcher.slots : [matcher.slot];
    const values: SlotValue[] = [];
    for (const slot of slots) {
      const value = callSite.literalArgument(slot);
      if (value) values.push(value);
    }

    return values.length > 0 ? { matcher, values } : null;
  }
}

/**
 * Loads and validates a pattern catalog file.
 */
export function loadPatternCatalog(filePath: string): PatternCatalog {
  const result = loadYamlWithSchemaSync(filePath, PatternCatalogFileSchema);
  if (!result.success) {
    throw new ConfigError(
      ErrorCodes.INVALID_CATALOG,
      `Invalid pattern catalog ${filePath}: ${result.message}`,
      { path: filePath, issues: result.issues }
    );
  }
  return new PatternCatalog(buildMatchers(result.data));
}

/**
 * Converts validated catalog entries into matchers.
 */
export function buildMatchers(file: PatternCatalogFile): CallMatcher[] {
  const defaultSchemes = file.filesystem_schemes;
  return file.matchers.map((entry) => toMatcher(entry, defaultSchemes));
}

function toMatcher(entry: MatcherEntry, defaultSchemes: string[]): CallMatcher {
  const requiredPrefix = entry.prefix ? entry.prefix.split('.') : null;

  switch (entry.kind) {
    case 'filesystem-path':
      return {
        kind: 'filesystem-path',
        name: entry.name,
        requiredPrefix,
        slots: entry.slots.map(toSlot),
        schemes: new Set((entry.schemes ?? defaultSchemes).map((s) => s.toLowerCase())),
        defaultsToManagedStorage: entry.defaults_to_managed_storage,
      };
    case 'direct-table-name':
      return { kind: 'direct-table-name', name: entry.name, requiredPrefix, slot: toSlot(entry.slot) };
    case 'embedded-sql':
      return { kind: 'embedded-sql', name: entry.name, requiredPrefix, slot: toSlot(entry.slot) };
  }
}

function toSlot(entry: ArgumentSlotEntry): ArgumentSlot {
  return {
    position: entry.position ?? null,
    keyword: entry.keyword ?? null,
  };
}
