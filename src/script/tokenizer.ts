/**
 * Line tokenizer
 *
 * Splits a Nesh Script line into:
 * - "quoted strings" (one token, spaces kept, escapes applied)
 * - $NAME variable references
 * - | option separators
 * - bare words
 */

import { ParseError } from './errors.js';
import type { Token } from './types.js';

const NAME_START = /[A-Za-z_]/;
const NAME_CHAR = /\w/;
const WORD_BREAK = /[\s"|]/;

/** Get character at position, or empty string if out of bounds */
function charAt(input: string, pos: number): string {
  return input[pos] ?? '';
}

/**
 * Parse a quoted string, handling escape sequences
 * Returns the parsed string and the position after the closing quote
 */
export function parseQuotedString(
  input: string,
  startPos: number
): { value: string; endPos: number } {
  if (charAt(input, startPos) !== '"') {
    throw new ParseError(
      `Expected opening quote at position ${startPos}`,
      '"'
    );
  }

  let result = '';
  let i = startPos + 1;

  while (i < input.length) {
    const char = charAt(input, i);

    if (char === '\\' && i + 1 < input.length) {
      const next = charAt(input, i + 1);
      if (next === 'n') {
        result += '\n';
        i += 2;
      } else if (next === 't') {
        result += '\t';
        i += 2;
      } else if (next === '"') {
        result += '"';
        i += 2;
      } else if (next === '\\') {
        result += '\\';
        i += 2;
      } else {
        // Unknown escape, keep as-is
        result += char;
        i++;
      }
    } else if (char === '"') {
      return { value: result, endPos: i + 1 };
    } else {
      result += char;
      i++;
    }
  }

  throw new ParseError('Unterminated string: missing closing quote', '"');
}

/**
 * Parse $NAME starting at the $
 */
function parseReference(
  input: string,
  startPos: number
): { name: string; endPos: number } {
  let i = startPos + 1;

  if (!NAME_START.test(charAt(input, i))) {
    throw new ParseError(
      `Malformed variable reference at position ${startPos}`,
      '$VARIABLE'
    );
  }

  while (i < input.length && NAME_CHAR.test(charAt(input, i))) i++;

  const after = charAt(input, i);
  if (after !== '' && !/[\s|]/.test(after)) {
    throw new ParseError(
      `Malformed variable reference at position ${startPos}`,
      '$VARIABLE'
    );
  }

  return { name: input.slice(startPos + 1, i), endPos: i };
}

/**
 * Tokenize one line
 */
export function tokenize(line: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  while (i < line.length) {
    const char = charAt(line, i);

    if (/\s/.test(char)) {
      i++;
    } else if (char === '"') {
      const { value, endPos } = parseQuotedString(line, i);
      tokens.push({ type: 'string', value, position: i });
      i = endPos;
    } else if (char === '|') {
      tokens.push({ type: 'pipe', position: i });
      i++;
    } else if (char === '$') {
      const { name, endPos } = parseReference(line, i);
      tokens.push({ type: 'reference', name, position: i });
      i = endPos;
    } else {
      const start = i;
      while (i < line.length && !WORD_BREAK.test(charAt(line, i))) i++;
      tokens.push({ type: 'word', value: line.slice(start, i), position: start });
    }
  }

  return tokens;
}

/**
 * Describe a token for error messages
 */
export function describeToken(token: Token | undefined): string {
  if (!token) return 'end of line';
  switch (token.type) {
    case 'word':
      return token.value;
    case 'string':
      return `"${token.value}"`;
    case 'reference':
      return `$${token.name}`;
    case 'pipe':
      return '|';
  }
}
