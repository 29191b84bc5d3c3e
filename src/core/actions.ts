/**
 * Action handlers for the built-in commands that do not nest
 *
 * Each handler reads its parameters from the CommandRecord, resolves
 * $references against the variable store at dispatch time, and applies its
 * effect to the InterpreterState or the outside world.
 */

import * as fs from 'fs';
import * as path from 'path';

import { resolveLanguage } from '../i18n/messages.js';
import { defineAlias } from '../script/aliases.js';
import {
  loadCommandDefinitions,
  mergeCommandDefinitions,
} from '../script/commands.js';
import {
  InvalidDurationError,
  IOError,
  NoResultError,
  ParseError,
  UnsupportedLanguageError,
} from '../script/errors.js';
import type {
  Argument,
  CommandRecord,
  Operand,
  ResolvedValue,
  VariableStore,
} from '../script/types.js';
import {
  appendToVariable,
  assignVariable,
  createVariable,
  defineVariable,
  exportVariables,
  getVariable,
  renderVariable,
  resolveTextReference,
} from '../script/variables.js';
import type { CommandResult } from '../types/shell.js';
import { MAX_TIMER_DELAY_MS, MS_PER_SECOND } from '../utils/constants.js';
import { escapeQuoted, expandHome, formatSize } from '../utils/formatting.js';
import { type InterpreterContext, notify } from './context.js';

// ============================================================
// ARGUMENTS
// ============================================================

function requireArg(record: CommandRecord, name: string): Argument {
  const arg = record.args.get(name);
  if (!arg) {
    throw new ParseError(`Missing parameter: ${name}`, name);
  }
  return arg;
}

export function resolveOperand(operand: Operand, store: VariableStore): string {
  return operand.type === 'literal'
    ? operand.value
    : resolveTextReference(store, operand.name);
}

/**
 * A parameter that must end up as text (string literal, $REF or bare word)
 */
export function textArg(
  record: CommandRecord,
  name: string,
  store: VariableStore
): string {
  const arg = requireArg(record, name);
  if (arg.type === 'string') return resolveOperand(arg.value, store);
  if (arg.type === 'word') return arg.value;
  throw new ParseError(`Parameter ${name} must be text`, name);
}

/**
 * A parameter naming a variable ($NAME, returned without the $)
 */
export function variableArg(record: CommandRecord, name: string): string {
  const arg = requireArg(record, name);
  if (arg.type !== 'variable') {
    throw new ParseError(`Parameter ${name} must be a $VARIABLE`, name);
  }
  return arg.name;
}

/**
 * A KIND value parameter with its $references resolved
 */
export function typedArg(
  record: CommandRecord,
  name: string,
  store: VariableStore
): ResolvedValue {
  const arg = requireArg(record, name);
  if (arg.type !== 'typed') {
    throw new ParseError(`Parameter ${name} must be TEXT, BOOL or OPTION`, name);
  }

  const { value } = arg;
  switch (value.kind) {
    case 'TEXT':
      return { kind: 'TEXT', text: resolveOperand(value.value, store) };
    case 'BOOL':
      return { kind: 'BOOL', literal: value.literal };
    case 'OPTION':
      return {
        kind: 'OPTION',
        options: value.options.map((option) => resolveOperand(option, store)),
      };
  }
}

/**
 * Render an argument back into Nesh Script text, for {param} placeholders in
 * command sequences. Text is escaped for use inside "...".
 */
export function renderArgument(arg: Argument, store: VariableStore): string {
  switch (arg.type) {
    case 'string':
      return escapeQuoted(resolveOperand(arg.value, store));
    case 'variable':
      return `$${arg.name}`;
    case 'word':
      return arg.value;
    case 'typed': {
      const { value } = arg;
      switch (value.kind) {
        case 'TEXT':
          return `TEXT "${escapeQuoted(resolveOperand(value.value, store))}"`;
        case 'BOOL':
          return `BOOL ${value.literal}`;
        case 'OPTION': {
          const options = value.options.map(
            (option) => `"${escapeQuoted(resolveOperand(option, store))}"`
          );
          return `OPTION ${options.join('|')}`;
        }
      }
    }
  }
}

// ============================================================
// CREATE
// ============================================================

export function createDirectory(
  record: CommandRecord,
  context: InterpreterContext
): void {
  const target = textArg(record, 'path', context.state.variables);
  if (target.trim() === '') {
    throw new ParseError('Directory path must not be empty', 'a path');
  }

  const dirPath = path.resolve(expandHome(target));
  try {
    fs.mkdirSync(dirPath, { recursive: true });
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new IOError(dirPath, msg, error);
  }
  notify(context, 'directory_created', { path: dirPath });
}

export function createVar(
  record: CommandRecord,
  context: InterpreterContext
): void {
  const store = context.state.variables;
  const name = variableArg(record, 'name');
  const variable = createVariable(name, typedArg(record, 'value', store));

  defineVariable(store, variable);
  notify(context, 'variable_created', {
    name,
    kind: variable.kind,
    value: renderVariable(variable),
  });
}

export function createAlias(
  record: CommandRecord,
  context: InterpreterContext
): void {
  const { variables, aliases } = context.state;
  const name = textArg(record, 'name', variables);
  const command = textArg(record, 'command', variables);

  defineAlias(aliases, name, command);
  notify(context, 'alias_created', { name, command });
}

export function loadCommands(
  record: CommandRecord,
  context: InterpreterContext
): void {
  const filePath = expandHome(textArg(record, 'path', context.state.variables));
  const definitions = loadCommandDefinitions(filePath);

  mergeCommandDefinitions(context.state.commands, definitions);
  context.logger.logEvent({
    event: 'commands_loaded',
    path: filePath,
    count: definitions.length,
  });
  notify(context, 'commands_loaded', {
    path: filePath,
    count: definitions.length,
  });
}

// ============================================================
// VARIABLES AND LANGUAGE
// ============================================================

export function append(record: CommandRecord, context: InterpreterContext): void {
  const store = context.state.variables;
  const value = textArg(record, 'value', store);
  const name = variableArg(record, 'name');

  const updated = appendToVariable(store, name, value);
  notify(context, 'variable_set', { name, value: renderVariable(updated) });
}

export function setVar(record: CommandRecord, context: InterpreterContext): void {
  const store = context.state.variables;
  const name = variableArg(record, 'name');

  // The target must exist before its new value is looked at
  getVariable(store, name);
  const updated = assignVariable(store, name, typedArg(record, 'value', store));
  notify(context, 'variable_set', { name, value: renderVariable(updated) });
}

export function setLanguage(
  record: CommandRecord,
  context: InterpreterContext
): void {
  const { state } = context;
  const requested = textArg(record, 'language', state.variables);
  const language = resolveLanguage(state.messages, requested);
  if (language === null) {
    throw new UnsupportedLanguageError(requested, [...state.messages.languages]);
  }

  state.language = language;
  notify(context, 'language_set', { language });
}

// ============================================================
// COMMANDS AND RESULTS
// ============================================================

/**
 * Run a system command with the Nesh variables in its environment and record
 * it as the LastResult. A failing command is a result, not an error.
 */
export async function executeSystemCommand(
  context: InterpreterContext,
  command: string,
  echo: boolean
): Promise<CommandResult> {
  const { state, logger } = context;
  const result = await context.executor(command, {
    cwd: process.cwd(),
    env: exportVariables(state.variables),
    echo,
  });

  state.lastResult = result;
  logger.logEvent({
    event: 'command_run',
    command,
    exitCode: result.exitCode,
    size: formatSize(result.output.length),
  });
  logger.log(result.output);
  return result;
}

export async function runCommand(
  record: CommandRecord,
  context: InterpreterContext
): Promise<void> {
  const command = textArg(record, 'command', context.state.variables);
  notify(context, 'run_cmd_executed', { command });

  const result = await executeSystemCommand(context, command, true);
  if (result.exitCode !== 0) {
    notify(context, 'command_failed', { command, exitCode: result.exitCode });
  }
}

export function save(record: CommandRecord, context: InterpreterContext): void {
  const { lastResult, variables } = context.state;
  if (lastResult === null) {
    throw new NoResultError();
  }

  const filePath = path.resolve(expandHome(textArg(record, 'path', variables)));
  try {
    fs.writeFileSync(filePath, lastResult.output, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new IOError(filePath, msg, error);
  }
  notify(context, 'result_saved', {
    path: filePath,
    size: formatSize(lastResult.output.length),
  });
}

// ============================================================
// SLEEP
// ============================================================

/**
 * Parse a non-negative number of seconds
 */
export function parseDuration(text: string): number {
  if (!/^(\d+\.?\d*|\.\d+)$/.test(text)) {
    throw new InvalidDurationError(text);
  }
  return Number(text);
}

export async function sleepFor(
  record: CommandRecord,
  context: InterpreterContext
): Promise<void> {
  const seconds = parseDuration(
    textArg(record, 'seconds', context.state.variables)
  );
  notify(context, 'sleep_executed', { seconds });

  if (seconds > 0) {
    await sleep(seconds * MS_PER_SECOND);
  }
}

/**
 * Sleep for a given number of milliseconds, in timer-sized steps
 */
async function sleep(ms: number): Promise<void> {
  let remaining = ms;
  while (remaining > 0) {
    const step = Math.min(remaining, MAX_TIMER_DELAY_MS);
    await new Promise((resolve) => setTimeout(resolve, step));
    remaining -= step;
  }
}
