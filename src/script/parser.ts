/**
 * Grammar matcher
 *
 * Turns a token list into a CommandRecord:
 * - the first word is the verb, the command table picks the grammar
 * - each slot of the grammar consumes the next token(s), in order
 * - anything left over is an error
 */

import { resolveCommand } from './commands.js';
import { ParseError } from './errors.js';
import { describeToken, tokenize } from './tokenizer.js';
import {
  type Argument,
  type CommandRecord,
  type CommandTable,
  type Operand,
  type Token,
  type TypedValue,
  VARIABLE_KINDS,
  type VariableKind,
} from './types.js';

/**
 * Error for a slot that did not get the token it needs
 */
function expected(what: string, found: Token | undefined): ParseError {
  return new ParseError(`Expected ${what}, found ${describeToken(found)}`, what);
}

function isKeyword(token: Token | undefined, keyword: string): boolean {
  return token?.type === 'word' && token.value === keyword;
}

function isVariableKind(value: string): value is VariableKind {
  return VARIABLE_KINDS.some((kind) => kind === value);
}

/**
 * A quoted string or $REF
 */
function toOperand(token: Token | undefined): Operand | null {
  if (token?.type === 'string') return { type: 'literal', value: token.value };
  if (token?.type === 'reference') return { type: 'reference', name: token.name };
  return null;
}

/**
 * Parse "KIND value" starting at pos:
 *   TEXT "text" | TEXT $REF
 *   BOOL TRUE
 *   OPTION "A"|"B"|...
 */
export function parseTypedValue(
  tokens: Token[],
  pos: number
): { value: TypedValue; next: number } {
  const kindToken = tokens[pos];
  const kind = kindToken?.type === 'word' ? kindToken.value : '';
  if (!isVariableKind(kind)) {
    throw expected('TEXT, BOOL or OPTION', kindToken);
  }

  let i = pos + 1;
  switch (kind) {
    case 'TEXT': {
      const operand = toOperand(tokens[i]);
      if (!operand) throw expected('a quoted string or $VARIABLE', tokens[i]);
      return { value: { kind: 'TEXT', value: operand }, next: i + 1 };
    }
    case 'BOOL': {
      const literal = tokens[i];
      if (literal?.type !== 'word') throw expected('TRUE or FALSE', literal);
      return { value: { kind: 'BOOL', literal: literal.value }, next: i + 1 };
    }
    case 'OPTION': {
      const options: Operand[] = [];
      const first = toOperand(tokens[i]);
      if (!first) throw expected('a quoted option', tokens[i]);
      options.push(first);
      i++;
      while (tokens[i]?.type === 'pipe') {
        i++;
        const option = toOperand(tokens[i]);
        if (!option) throw expected('an option after |', tokens[i]);
        options.push(option);
        i++;
      }
      return { value: { kind: 'OPTION', options }, next: i };
    }
  }
}

/**
 * Match tokens against the command table
 */
export function parseTokens(
  tokens: Token[],
  table: CommandTable,
  source = ''
): CommandRecord {
  const first = tokens[0];
  if (first?.type !== 'word') {
    throw expected('a command', first);
  }

  const second = tokens[1];
  const { definition, consumed } = resolveCommand(
    table,
    first.value,
    second?.type === 'word' ? second.value : undefined
  );

  const args = new Map<string, Argument>();
  let pos: number = consumed;

  for (const slot of definition.params) {
    const token = tokens[pos];

    switch (slot.type) {
      case 'keyword':
        if (!isKeyword(token, slot.value)) throw expected(slot.value, token);
        pos++;
        break;
      case 'optional-keyword':
        if (isKeyword(token, slot.value)) pos++;
        break;
      case 'string': {
        const operand = toOperand(token);
        if (!operand) throw expected('a quoted string or $VARIABLE', token);
        args.set(slot.name, { type: 'string', value: operand });
        pos++;
        break;
      }
      case 'variable':
        if (token?.type !== 'reference') {
          throw expected('a $VARIABLE reference', token);
        }
        args.set(slot.name, { type: 'variable', name: token.name });
        pos++;
        break;
      case 'word':
        if (token?.type !== 'word') throw expected(`a value for ${slot.name}`, token);
        args.set(slot.name, { type: 'word', value: token.value });
        pos++;
        break;
      case 'typed-value': {
        const { value, next } = parseTypedValue(tokens, pos);
        args.set(slot.name, { type: 'typed', value });
        pos = next;
        break;
      }
    }
  }

  if (pos < tokens.length) {
    throw expected('end of line', tokens[pos]);
  }

  return { definition, action: definition.action, args, source };
}

/**
 * Tokenize and parse one line
 */
export function parseLine(line: string, table: CommandTable): CommandRecord {
  return parseTokens(tokenize(line), table, line);
}
