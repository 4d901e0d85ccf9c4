/**
 * Scanner for PostgreSQL composite "(a,b)" and array "{a,b}" text literals
 *
 * Fields are returned in order as raw text. An empty field region yields null;
 * a quoted empty string ("") yields ''. Malformed input never throws: scanning
 * stops and whatever was collected so far is returned.
 */

const COMPOSITE_OPEN = '(';
const COMPOSITE_CLOSE = ')';
const ARRAY_OPEN = '{';
const ARRAY_CLOSE = '}';

// Separators other than the space separators of the Zs category
const WHITESPACE_CONTROLS = new Set(['\t', '\n', '\u000B', '\f', '\r', '\u001C', '\u001D', '\u001E', '\u001F']);
const NON_BREAKING_SPACES = new Set(['\u00A0', '\u2007', '\u202F']);
const SPACE_SEPARATOR = /^[\p{Zs}\u2028\u2029]$/u;

/**
 * Whitespace test matching the server driver's definition: ASCII controls,
 * Unicode space/line/paragraph separators, but not the non-breaking spaces
 */
export function isWhitespace(ch: string): boolean {
  if (WHITESPACE_CONTROLS.has(ch)) {
    return true;
  }
  return SPACE_SEPARATOR.test(ch) && !NON_BREAKING_SPACES.has(ch);
}

/**
 * Split a delimited literal into its fields
 */
export function scan(text: string, open: string, close: string): (string | null)[] {
  const values: (string | null)[] = [];
  let buffer: string | null = null;
  let lastDelimIdx = -1;

  for (let charIdx = 0; charIdx < text.length; ++charIdx) {
    const ch = text[charIdx];
    if (ch === open) {
      lastDelimIdx = charIdx;
    } else if (ch === close) {
      addField(values, buffer, lastDelimIdx, charIdx);
      break;
    } else if (ch === '"') {
      const quoted = readQuoted(text, charIdx);
      buffer = quoted.value;
      charIdx = quoted.end;
    } else if (ch === ',') {
      addField(values, buffer, lastDelimIdx, charIdx);
      buffer = null;
      lastDelimIdx = charIdx;
    } else if (isWhitespace(ch)) {
      // Unquoted whitespace ends the scan; any remaining fields are dropped
      break;
    } else {
      buffer = (buffer ?? '') + ch;
    }
  }

  return values;
}

/**
 * Read a quoted field starting at the opening quote
 * Returns the unescaped text and the index of the closing quote (text length when unterminated)
 */
function readQuoted(text: string, start: number): { value: string; end: number } {
  let value = '';
  let index: number;

  for (index = start + 1; index < text.length; ++index) {
    const ch = text[index];
    if (ch === '"') {
      if (text[index + 1] !== '"') {
        break;
      }
      ++index;
      value += '"';
    } else if (ch === '\\' && index + 1 < text.length) {
      ++index;
      value += text[index];
    } else {
      value += ch;
    }
  }

  return { value, end: index };
}

function addField(values: (string | null)[], buffer: string | null, lastDelimIdx: number, charIdx: number): void {
  if (lastDelimIdx === charIdx - 1) {
    values.push(null);
  } else if (buffer !== null) {
    values.push(buffer);
  }
}

export function parseCompositeLiteral(text: string): (string | null)[] {
  return scan(text, COMPOSITE_OPEN, COMPOSITE_CLOSE);
}

export function parseArrayLiteral(text: string): (string | null)[] {
  return scan(text, ARRAY_OPEN, ARRAY_CLOSE);
}
