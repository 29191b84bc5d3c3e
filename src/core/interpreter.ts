/**
 * Line interpreter with nested script support
 * Prepares, parses and dispatches Nesh lines; runs script files, command
 * sequences and the RC bootstrap
 */

import * as fs from 'fs';

import { loadMessageTable, resolveLanguage } from '../i18n/messages.js';
import { createAliasTable, expandAlias } from '../script/aliases.js';
import { BUILTIN_COMMANDS } from '../script/builtins.js';
import {
  commandKey,
  createCommandTable,
  loadCommandDefinitions,
  mergeCommandDefinitions,
} from '../script/commands.js';
import {
  NeshError,
  RecursionLimitError,
  ReloadError,
  ScriptError,
  UnsupportedLanguageError,
} from '../script/errors.js';
import { loadScript } from '../script/loader.js';
import { parseLine } from '../script/parser.js';
import type { ActionName, CommandRecord, ScriptLine } from '../script/types.js';
import {
  createVariableStore,
  getSubstitutionList,
  interpolateVariables,
} from '../script/variables.js';
import type { SubstitutionOrder } from '../types/shell.js';
import { MAX_NESTING_DEPTH } from '../utils/constants.js';
import { expandHome } from '../utils/formatting.js';
import {
  append,
  createAlias,
  createDirectory,
  createVar,
  loadCommands,
  renderArgument,
  runCommand,
  save,
  setLanguage,
  setVar,
  sleepFor,
  textArg,
} from './actions.js';
import {
  type InterpreterContext,
  type InterpreterState,
  notify,
  reportError,
} from './context.js';

/** Whether the caller should keep reading lines */
export type LineOutcome = 'continue' | 'exit';

export interface PreparedLine {
  text: string;
  /** Alias that was expanded, if any */
  alias: string | null;
}

/**
 * Apply alias expansion and ${NAME} interpolation in the configured order
 */
export function prepareLine(
  line: string,
  state: InterpreterState,
  order: SubstitutionOrder
): PreparedLine {
  const { variables, aliases } = state;

  if (order === 'alias-first') {
    const expanded = expandAlias(line, aliases);
    return {
      text: interpolateVariables(expanded.text, variables),
      alias: expanded.alias,
    };
  }

  const expanded = expandAlias(interpolateVariables(line, variables), aliases);
  return {
    text:
      expanded.alias === null
        ? expanded.text
        : interpolateVariables(expanded.text, variables),
    alias: expanded.alias,
  };
}

/**
 * Parse and dispatch a line that has already been prepared
 */
export async function executePrepared(
  text: string,
  context: InterpreterContext,
  depth = 0
): Promise<LineOutcome> {
  const record = parseLine(text, context.state.commands);
  return dispatch(record, context, depth);
}

/**
 * Run one Nesh line
 *
 * @param depth - Number of scripts or sequences around this line
 */
export async function executeLine(
  line: string,
  context: InterpreterContext,
  depth = 0
): Promise<LineOutcome> {
  const { state, config, logger } = context;
  const prepared = prepareLine(line, state, config.substitutionOrder);

  logger.logEvent({
    event: 'line',
    depth,
    line,
    text: prepared.text,
    alias: prepared.alias,
    substitutions: getSubstitutionList(line, state.variables),
  });

  return executePrepared(prepared.text, context, depth);
}

function assertNever(action: never): never {
  throw new Error(`Unhandled action: ${String(action)}`);
}

async function dispatch(
  record: CommandRecord,
  context: InterpreterContext,
  depth: number
): Promise<LineOutcome> {
  const action: ActionName = record.action;

  switch (action) {
    case 'create-dir':
      createDirectory(record, context);
      break;
    case 'create-var':
      createVar(record, context);
      break;
    case 'create-alias':
      createAlias(record, context);
      break;
    case 'load-commands':
      loadCommands(record, context);
      break;
    case 'append':
      append(record, context);
      break;
    case 'set-language':
      setLanguage(record, context);
      break;
    case 'set-var':
      setVar(record, context);
      break;
    case 'run-command':
      await runCommand(record, context);
      break;
    case 'run-script':
      return runScript(record, context, depth);
    case 'save':
      save(record, context);
      break;
    case 'exit':
      return 'exit';
    case 'sleep':
      await sleepFor(record, context);
      break;
    case 'reload':
      return reload(context);
    case 'sequence':
      return runSequence(record, context, depth);
    default:
      return assertNever(action);
  }

  return 'continue';
}

// ============================================================
// NESTED LINES
// ============================================================

/**
 * Run lines from a script file or sequence at the given nesting depth.
 *
 * The first failing line stops the run with a ScriptError naming where it
 * happened, unless scriptErrorMode is 'continue'. EXIT ends the whole shell,
 * or only these lines when nestedExit is 'script'. `render` turns a line
 * into the text to execute just before it runs.
 */
export async function runLines(
  lines: ScriptLine[],
  origin: string,
  context: InterpreterContext,
  depth: number,
  render: (text: string) => string = (text) => text
): Promise<LineOutcome> {
  const { config } = context;
  if (depth > MAX_NESTING_DEPTH) {
    throw new RecursionLimitError(MAX_NESTING_DEPTH);
  }

  for (const { lineNumber, text } of lines) {
    let outcome: LineOutcome;
    try {
      outcome = await executeLine(render(text), context, depth);
    } catch (error) {
      if (!(error instanceof NeshError)) throw error;

      const wrapped = new ScriptError(origin, lineNumber, error);
      if (config.scriptErrorMode === 'stop') throw wrapped;
      reportError(context, wrapped);
      continue;
    }

    if (outcome === 'exit') {
      return config.nestedExit === 'script' ? 'continue' : 'exit';
    }
  }

  return 'continue';
}

/**
 * Load and run a Nesh Script file
 */
export async function runScriptFile(
  scriptFile: string,
  context: InterpreterContext,
  depth = 1
): Promise<LineOutcome> {
  const lines = loadScript(scriptFile);
  context.logger.logEvent({
    event: 'script_start',
    path: scriptFile,
    depth,
    lines: lines.length,
  });
  return runLines(lines, scriptFile, context, depth);
}

async function runScript(
  record: CommandRecord,
  context: InterpreterContext,
  depth: number
): Promise<LineOutcome> {
  const scriptFile = expandHome(
    textArg(record, 'path', context.state.variables)
  );
  notify(context, 'run_nesh_executed', { path: scriptFile });
  return runScriptFile(scriptFile, context, depth + 1);
}

/**
 * Expand {param} placeholders in a sequence step from the parsed arguments
 */
export function renderStep(
  step: string,
  record: CommandRecord,
  context: InterpreterContext
): string {
  const { variables } = context.state;
  return step.replace(/\{([A-Za-z_]\w*)\}/g, (match, name: string) => {
    const arg = record.args.get(name);
    return arg ? renderArgument(arg, variables) : match;
  });
}

async function runSequence(
  record: CommandRecord,
  context: InterpreterContext,
  depth: number
): Promise<LineOutcome> {
  const { definition } = record;
  const steps = definition.steps ?? [];
  const origin = commandKey(definition.verb, definition.subcommand);

  // Each step sees the variables left by the steps before it
  const lines = steps.map((step, index) => ({
    lineNumber: index + 1,
    text: step,
  }));
  return runLines(lines, origin, context, depth + 1, (step) =>
    renderStep(step, record, context)
  );
}

// ============================================================
// BOOTSTRAP
// ============================================================

/**
 * Load messages and command definitions, reset variables and aliases, then
 * run the RC file. Used at startup and by REFLESH; a reload keeps the
 * current language while the new message table still has it.
 */
export async function bootstrap(
  context: InterpreterContext,
  reloading = false
): Promise<LineOutcome> {
  const { state, config, logger } = context;
  if (state.bootstrapping) {
    throw new ReloadError();
  }

  state.bootstrapping = true;
  try {
    // Later failures are reported with the new messages
    const messages = loadMessageTable(config.messagesPath);
    state.messages = messages;

    const language =
      (reloading ? resolveLanguage(messages, state.language) : null) ??
      resolveLanguage(messages, config.language);
    if (language === null) {
      throw new UnsupportedLanguageError(config.language, [
        ...messages.languages,
      ]);
    }
    state.language = language;

    const commands = createCommandTable(BUILTIN_COMMANDS);
    if (fs.existsSync(config.commandsPath)) {
      mergeCommandDefinitions(
        commands,
        loadCommandDefinitions(config.commandsPath)
      );
    }

    state.commands = commands;
    state.variables = createVariableStore();
    state.aliases = createAliasTable();

    const rcPath =
      config.rcPath !== null && fs.existsSync(config.rcPath)
        ? config.rcPath
        : null;
    logger.logEvent({
      event: 'bootstrap',
      language,
      commands: commands.definitions.size,
      rcPath,
    });

    if (rcPath === null) {
      return 'continue';
    }
    return await runScriptFile(rcPath, context, 1);
  } finally {
    state.bootstrapping = false;
  }
}

async function reload(context: InterpreterContext): Promise<LineOutcome> {
  const outcome = await bootstrap(context, true);
  notify(context, 'config_refreshed');
  return outcome;
}
