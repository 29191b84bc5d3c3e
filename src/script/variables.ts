/**
 * Typed variable store
 *
 * TEXT variables hold a sequence of segments (APPEND pushes one), rendered
 * PATH-style with ':'. BOOL takes only the canonical TRUE/FALSE literals.
 * OPTION remembers its declared option set and the selected member.
 */

import {
  BOOL_FALSE,
  BOOL_TRUE,
  TEXT_SEGMENT_SEPARATOR,
} from '../utils/constants.js';
import { escapeQuoted } from '../utils/formatting.js';
import {
  DuplicateVariableError,
  InvalidOptionError,
  ParseError,
  TypeMismatchError,
  UndefinedVariableError,
} from './errors.js';
import type {
  ResolvedValue,
  TextVariable,
  Variable,
  VariableStore,
} from './types.js';

/**
 * Create an empty variable store
 */
export function createVariableStore(): VariableStore {
  return { named: new Map() };
}

/**
 * Look up a variable, failing when it is not defined
 */
export function getVariable(store: VariableStore, name: string): Variable {
  const variable = store.named.get(name);
  if (!variable) {
    throw new UndefinedVariableError(name);
  }
  return variable;
}

/**
 * Parse a canonical BOOL literal
 */
export function parseBoolLiteral(name: string, literal: string): boolean {
  if (literal === BOOL_TRUE) return true;
  if (literal === BOOL_FALSE) return false;
  throw new TypeMismatchError(
    name,
    `expected ${BOOL_TRUE} or ${BOOL_FALSE}, found ${literal}`
  );
}

function textSegments(text: string): string[] {
  return text === '' ? [] : [text];
}

/**
 * Build a new variable from its declared value
 */
export function createVariable(name: string, value: ResolvedValue): Variable {
  switch (value.kind) {
    case 'TEXT':
      return { kind: 'TEXT', name, segments: textSegments(value.text) };
    case 'BOOL':
      return {
        kind: 'BOOL',
        name,
        value: parseBoolLiteral(name, value.literal),
      };
    case 'OPTION': {
      const options = [...new Set(value.options)];
      const [first] = options;
      if (first === undefined) {
        throw new ParseError('OPTION needs at least one option', '"option"');
      }
      return { kind: 'OPTION', name, options, value: first };
    }
  }
}

/**
 * Insert a variable (CREATE VAR)
 */
export function defineVariable(store: VariableStore, variable: Variable): void {
  if (store.named.has(variable.name)) {
    throw new DuplicateVariableError(variable.name);
  }
  store.named.set(variable.name, variable);
}

/**
 * Copy of a variable holding a new value of the same kind
 */
function withValue(existing: Variable, value: ResolvedValue): Variable {
  const { name } = existing;

  if (existing.kind === 'TEXT' && value.kind === 'TEXT') {
    return { ...existing, segments: textSegments(value.text) };
  }
  if (existing.kind === 'BOOL' && value.kind === 'BOOL') {
    return { ...existing, value: parseBoolLiteral(name, value.literal) };
  }
  if (existing.kind === 'OPTION' && value.kind === 'OPTION') {
    const [selected, ...extra] = value.options;
    if (selected === undefined || extra.length > 0) {
      throw new ParseError(
        'SET VAR takes exactly one option',
        'a single "option"'
      );
    }
    if (!existing.options.includes(selected)) {
      throw new InvalidOptionError(name, selected, existing.options);
    }
    return { ...existing, value: selected };
  }

  throw new TypeMismatchError(
    name,
    `expected ${existing.kind}, found ${value.kind}`
  );
}

/**
 * Overwrite an existing variable's value (SET VAR)
 *
 * Checks run in order: defined, same kind, valid value.
 */
export function assignVariable(
  store: VariableStore,
  name: string,
  value: ResolvedValue
): Variable {
  const existing = getVariable(store, name);
  const updated = withValue(existing, value);
  store.named.set(name, updated);
  return updated;
}

/**
 * Append a segment to a TEXT variable (APPEND)
 */
export function appendToVariable(
  store: VariableStore,
  name: string,
  text: string
): TextVariable {
  const existing = getVariable(store, name);
  if (existing.kind !== 'TEXT') {
    throw new TypeMismatchError(
      name,
      `cannot append to a ${existing.kind} variable`
    );
  }

  const updated: TextVariable = {
    ...existing,
    segments: [...existing.segments, text],
  };
  store.named.set(name, updated);
  return updated;
}

/**
 * Render a variable's value as text
 */
export function renderVariable(variable: Variable): string {
  switch (variable.kind) {
    case 'TEXT':
      return variable.segments.join(TEXT_SEGMENT_SEPARATOR);
    case 'BOOL':
      return variable.value ? BOOL_TRUE : BOOL_FALSE;
    case 'OPTION':
      return variable.value;
  }
}

/**
 * Resolve $NAME where a string is expected. Only TEXT coerces to a string.
 */
export function resolveTextReference(store: VariableStore, name: string): string {
  const variable = getVariable(store, name);
  if (variable.kind !== 'TEXT') {
    throw new TypeMismatchError(
      name,
      `expected TEXT, found ${variable.kind}`
    );
  }
  return renderVariable(variable);
}

const REFERENCE_PATTERN = /\$\{([A-Za-z_]\w*)\}/g;

/** A "quoted literal" (closing quote optional) or a run outside quotes */
const SEGMENT_PATTERN = /"(?:[^"\\]|\\[\s\S])*"?|[^"]+/g;

/**
 * Replace ${NAME} with the rendered value of defined variables.
 * Inside a quoted literal the value is escaped so it stays one literal.
 * Unknown names are left for the system shell to expand.
 */
export function interpolateVariables(text: string, store: VariableStore): string {
  return text.replace(SEGMENT_PATTERN, (segment) => {
    const quoted = segment.startsWith('"');
    return segment.replace(REFERENCE_PATTERN, (match, name: string) => {
      const variable = store.named.get(name);
      if (!variable) return match;
      const value = renderVariable(variable);
      return quoted ? escapeQuoted(value) : value;
    });
  });
}

/**
 * Variables as environment entries for child processes
 */
export function exportVariables(store: VariableStore): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [name, variable] of store.named) {
    env[name] = renderVariable(variable);
  }
  return env;
}

/**
 * Get list of variables referenced with ${NAME} (for logging)
 */
export function getSubstitutionList(text: string, store: VariableStore): string[] {
  const vars: string[] = [];
  for (const name of store.named.keys()) {
    if (text.includes(`\${${name}}`)) {
      vars.push(`$${name}`);
    }
  }
  return vars;
}
