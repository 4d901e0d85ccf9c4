import { parseDouble } from './numeric-text';

/**
 * A point on a plane, PostgreSQL's point type
 */
export interface PgPoint {
  readonly x: number;
  readonly y: number;
}

/**
 * A rectangular box given by two opposite corners, PostgreSQL's box type
 */
export interface PgBox {
  readonly corners: readonly [PgPoint, PgPoint];
}

/**
 * Split text on a delimiter at parenthesis depth zero
 */
function splitTopLevel(text: string, delimiter: string): string[] {
  const tokens: string[] = [];
  let depth = 0;
  let start = 0;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '(' || ch === '[' || ch === '<') {
      depth++;
    } else if (ch === ')' || ch === ']' || ch === '>') {
      depth--;
    } else if (ch === delimiter && depth === 0) {
      tokens.push(text.substring(start, i));
      start = i + 1;
    }
  }
  tokens.push(text.substring(start));
  return tokens;
}

function removeParentheses(text: string): string {
  if (text.startsWith('(') && text.endsWith(')')) {
    return text.substring(1, text.length - 1);
  }
  return text;
}

/**
 * Parse a point literal such as "(1.5,2)" or "1.5,2"
 * Returns null when the text is not a point
 */
export function parsePoint(text: string): PgPoint | null {
  const tokens = splitTopLevel(removeParentheses(text.trim()), ',');
  if (tokens.length !== 2) {
    return null;
  }
  const x = parseDouble(tokens[0]);
  const y = parseDouble(tokens[1]);
  if (x === null || y === null) {
    return null;
  }
  return { x, y };
}

/**
 * Parse a box literal such as "(1,2),(3,4)"
 * Returns null when the text is not a box
 */
export function parseBox(text: string): PgBox | null {
  const tokens = splitTopLevel(text.trim(), ',');
  if (tokens.length !== 2) {
    return null;
  }
  const first = parsePoint(tokens[0]);
  const second = parsePoint(tokens[1]);
  if (!first || !second) {
    return null;
  }
  return { corners: [first, second] };
}

// Coordinates use JavaScript number formatting: integral values print without a fraction ("(1,2)"), which the server reads the same as "(1.0,2.0)"
export function formatPoint(point: PgPoint): string {
  return `(${point.x},${point.y})`;
}

export function formatBox(box: PgBox): string {
  return `${formatPoint(box.corners[0])},${formatPoint(box.corners[1])}`;
}
