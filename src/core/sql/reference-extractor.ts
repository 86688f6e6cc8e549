/**
 * Textual scan of SQL for table references introduced by FROM or JOIN.
 *
 * This is not a SQL parser. It finds the keyword (case-insensitive, as a
 * whole word), skips the whitespace after it and takes the maximal run of
 * identifier characters and dots that follows. Quoted regions and comments
 * are skipped so keywords inside them do not count. One linear pass.
 */

export interface TableReference {
  /** Dotted name as written, e.g. `schema.table` */
  identity: string;
  /** Offset of the name within the SQL text */
  offset: number;
  /** Length of the name within the SQL text */
  length: number;
}

const CLAUSE_KEYWORDS = new Set(['from', 'join']);
const QUOTES = new Set(["'", '"', '`']);

function isWordStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isWordChar(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}

/**
 * Extracts every FROM/JOIN table reference from SQL text, in order.
 */
export function extractTableReferences(sql: string): TableReference[] {
  const references: TableReference[] = [];
  const n = sql.length;
  let i = 0;

  while (i < n) {
    const ch = sql[i];

    if (QUOTES.has(ch)) {
      i = skipQuoted(sql, i);
      continue;
    }
    if (ch === '-' && sql[i + 1] === '-') {
      const newline = sql.indexOf('\n', i + 2);
      i = newline === -1 ? n : newline + 1;
      continue;
    }
    if (ch === '/' && sql[i + 1] === '*') {
      const close = sql.indexOf('*/', i + 2);
      i = close === -1 ? n : close + 2;
      continue;
    }

    if (!isWordStart(ch) || (i > 0 && isWordChar(sql[i - 1]))) {
      i++;
      continue;
    }

    let end = i;
    while (end < n && isWordChar(sql[end])) end++;
    const word = sql.slice(i, end).toLowerCase();
    i = end;

    if (!CLAUSE_KEYWORDS.has(word) || i >= n || !isWhitespace(sql[i])) {
      continue;
    }

    let start = i;
    while (start < n && isWhitespace(sql[start])) start++;
    let stop = start;
    while (stop < n && (isWordChar(sql[stop]) || sql[stop] === '.')) stop++;

    const identity = sql.slice(start, stop);
    if (identity.length > 0 && identity.split('.').every((part) => part.length > 0)) {
      references.push({ identity, offset: start, length: identity.length });
    }
    i = Math.max(stop, start);
  }

  return references;
}

/**
 * Returns the index just past a quoted region starting at `start`.
 * A doubled quote or a backslash escapes the delimiter.
 */
function skipQuoted(sql: string, start: number): number {
  const quote = sql[start];
  let i = start + 1;
  while (i < sql.length) {
    const ch = sql[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === quote) {
      if (sql[i + 1] === quote) {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return sql.length;
}

/**
 * Replaces references in SQL text, left to right. Each replacement shifts
 * the offsets of those after it by its length delta.
 */
export function replaceTableReferences(
  sql: string,
  replacements: ReadonlyArray<{ reference: TableReference; replacement: string }>
): string {
  const ordered = [...replacements].sort((a, b) => a.reference.offset - b.reference.offset);
  let result = sql;
  let delta = 0;

  for (const { reference, replacement } of ordered) {
    const start = reference.offset + delta;
    result = result.slice(0, start) + replacement + result.slice(start + reference.length);
    delta += replacement.length - reference.length;
  }

  return result;
}
