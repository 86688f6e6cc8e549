/**
 * Decoding and rendering of Python string literals.
 *
 * Only plain text constants are of interest: f-strings and bytes never
 * decode, because their value is not known statically as `str`.
 */

export interface StringLiteralParts {
  /** Lower-cased prefix letters (`r`, `u`, `b`, `f` and combinations) */
  prefix: string;
  /** Opening and closing delimiter */
  quote: string;
  /** Raw text between the delimiters */
  body: string;
}

const LITERAL_OPENING = /^([A-Za-z]{0,2})('''|"""|'|")/;

const SIMPLE_ESCAPES = new Map<string, string>([
  ['\\', '\\'],
  ["'", "'"],
  ['"', '"'],
  ['a', '\x07'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
  ['v', '\v'],
]);

const HEX_ESCAPE_LENGTHS = new Map<string, number>([
  ['x', 2],
  ['u', 4],
  ['U', 8],
]);

/**
 * Splits a single string literal token into prefix, delimiter and body.
 * Returns null when the text is not a complete literal.
 */
export function splitStringLiteral(text: string): StringLiteralParts | null {
  const match = LITERAL_OPENING.exec(text);
  if (!match) return null;

  const [opening, prefix, quote] = match;
  if (text.length < opening.length + quote.length || !text.endsWith(quote)) {
    return null;
  }

  return {
    prefix: prefix.toLowerCase(),
    quote,
    body: text.slice(opening.length, text.length - quote.length),
  };
}

/**
 * Decodes a string literal token to its runtime value.
 * Returns null for f-strings, bytes and malformed tokens.
 */
export function decodeStringLiteral(text: string): string | null {
  const parts = splitStringLiteral(text);
  if (!parts) return null;
  if (parts.prefix.includes('f') || parts.prefix.includes('b')) return null;
  if (parts.prefix.includes('r')) return parts.body;
  return decodeEscapes(parts.body);
}

function decodeEscapes(body: string): string {
  let out = '';
  let i = 0;

  while (i < body.length) {
    const ch = body[i];
    if (ch !== '\\' || i + 1 >= body.length) {
      out += ch;
      i++;
      continue;
    }

    const next = body[i + 1];

    // Line continuation
    if (next === '\n') {
      i += 2;
      continue;
    }
    if (next === '\r') {
      i += body[i + 2] === '\n' ? 3 : 2;
      continue;
    }

    const simple = SIMPLE_ESCAPES.get(next);
    if (simple !== undefined) {
      out += simple;
      i += 2;
      continue;
    }

    const octal = /^[0-7]{1,3}/.exec(body.slice(i + 1, i + 4));
    if (octal) {
      out += String.fromCharCode(parseInt(octal[0], 8));
      i += 1 + octal[0].length;
      continue;
    }

    const hexLength = HEX_ESCAPE_LENGTHS.get(next);
    if (hexLength !== undefined) {
      const digits = body.slice(i + 2, i + 2 + hexLength);
      const codePoint = parseInt(digits, 16);
      if (/^[0-9A-Fa-f]+$/.test(digits) && digits.length === hexLength && codePoint <= 0x10ffff) {
        out += String.fromCodePoint(codePoint);
        i += 2 + hexLength;
        continue;
      }
    }

    // Unknown escapes (and \N{...}) keep their backslash
    out += ch + next;
    i += 2;
  }

  return out;
}

/**
 * Renders a value as a Python string literal the way `repr()` does:
 * single quotes unless the value contains a single quote and no double quote.
 */
export function renderStringLiteral(value: string): string {
  const quote = value.includes("'") && !value.includes('"') ? '"' : "'";
  let out = quote;

  for (const ch of value) {
    const code = ch.codePointAt(0) ?? 0;
    if (ch === quote || ch === '\\') {
      out += `\\${ch}`;
    } else if (ch === '\n') {
      out += '\\n';
    } else if (ch === '\r') {
      out += '\\r';
    } else if (ch === '\t') {
      out += '\\t';
    } else if (code < 0x20 || code === 0x7f) {
      out += `\\x${code.toString(16).padStart(2, '0')}`;
    } else {
      out += ch;
    }
  }

  return out + quote;
}
