/**
 * Types for Nesh Script: tokens, grammar slots, command records and variables
 */

// ============================================================
// TOKENS
// ============================================================

export interface WordToken {
  type: 'word';
  value: string;
  position: number;
}

/** A "..." literal with escapes already applied */
export interface StringToken {
  type: 'string';
  value: string;
  position: number;
}

/** $NAME (name stored without the $) */
export interface ReferenceToken {
  type: 'reference';
  name: string;
  position: number;
}

/** | separating option-set members */
export interface PipeToken {
  type: 'pipe';
  position: number;
}

export type Token = WordToken | StringToken | ReferenceToken | PipeToken;

// ============================================================
// GRAMMAR
// ============================================================

/**
 * One typed position in a command grammar
 */
export type Slot =
  | { type: 'keyword'; value: string }
  | { type: 'optional-keyword'; value: string }
  | { type: 'string'; name: string }
  | { type: 'variable'; name: string }
  | { type: 'word'; name: string }
  | { type: 'typed-value'; name: string };

export type SlotType = Slot['type'];

export const BUILTIN_ACTIONS = [
  'create-dir',
  'create-var',
  'create-alias',
  'load-commands',
  'append',
  'set-language',
  'set-var',
  'run-command',
  'run-script',
  'save',
  'exit',
  'sleep',
  'reload',
] as const;

export type BuiltinAction = (typeof BUILTIN_ACTIONS)[number];

/** Built-in handlers plus user-defined step sequences */
export const ACTION_NAMES = [...BUILTIN_ACTIONS, 'sequence'] as const;

export type ActionName = (typeof ACTION_NAMES)[number];

/**
 * A registered grammar for one verb or verb/subcommand pair
 */
export interface CommandDefinition {
  verb: string;
  subcommand?: string;
  params: Slot[];
  action: ActionName;
  /** Nesh lines with {param} placeholders, for the sequence action */
  steps?: string[];
  description?: string;
  /** 'builtin' or the file the definition was loaded from */
  source: string;
}

// ============================================================
// PARSED COMMANDS
// ============================================================

/** A value position: either literal text or a variable to resolve later */
export type Operand =
  | { type: 'literal'; value: string }
  | { type: 'reference'; name: string };

export const VARIABLE_KINDS = ['TEXT', 'BOOL', 'OPTION'] as const;

export type VariableKind = (typeof VARIABLE_KINDS)[number];

/** Kind keyword plus its unresolved value, as written in the line */
export type TypedValue =
  | { kind: 'TEXT'; value: Operand }
  | { kind: 'BOOL'; literal: string }
  | { kind: 'OPTION'; options: Operand[] };

export type Argument =
  | { type: 'string'; value: Operand }
  | { type: 'variable'; name: string }
  | { type: 'word'; value: string }
  | { type: 'typed'; value: TypedValue };

/**
 * Output of the parser: which definition matched and what filled its slots
 */
export interface CommandRecord {
  definition: CommandDefinition;
  action: ActionName;
  args: Map<string, Argument>;
  source: string;
}

// ============================================================
// VARIABLES
// ============================================================

export interface TextVariable {
  kind: 'TEXT';
  name: string;
  segments: string[];
}

export interface BoolVariable {
  kind: 'BOOL';
  name: string;
  value: boolean;
}

export interface OptionVariable {
  kind: 'OPTION';
  name: string;
  /** Declared at CREATE VAR time */
  options: string[];
  value: string;
}

export type Variable = TextVariable | BoolVariable | OptionVariable;

/** A typed value after $references have been resolved */
export type ResolvedValue =
  | { kind: 'TEXT'; text: string }
  | { kind: 'BOOL'; literal: string }
  | { kind: 'OPTION'; options: string[] };

export interface VariableStore {
  named: Map<string, Variable>;
}

export interface AliasTable {
  named: Map<string, string>;
}

export interface CommandTable {
  /** Keyed by "VERB" or "VERB SUBCOMMAND", in load order */
  definitions: Map<string, CommandDefinition>;
}

// ============================================================
// SCRIPT FILES
// ============================================================

/** A non-blank, non-comment line of a script with its 1-based line number */
export interface ScriptLine {
  lineNumber: number;
  text: string;
}
