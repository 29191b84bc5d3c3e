/**
 * Interpreter state and context
 *
 * All mutable shell state lives in one InterpreterState owned by the running
 * shell and handed to every action handler.
 */

import {
  createMessageTable,
  describeError,
  formatMessage,
  type MessageTable,
} from '../i18n/messages.js';
import { printError, printMessage } from '../output/colors.js';
import type { Logger } from '../output/logger.js';
import { createAliasTable } from '../script/aliases.js';
import { BUILTIN_COMMANDS } from '../script/builtins.js';
import { createCommandTable } from '../script/commands.js';
import { NeshError } from '../script/errors.js';
import type {
  AliasTable,
  CommandTable,
  VariableStore,
} from '../script/types.js';
import { createVariableStore } from '../script/variables.js';
import type { MessageKey, MessageParams } from '../types/messages.js';
import type {
  CommandExecutor,
  CommandResult,
  NeshConfig,
} from '../types/shell.js';
import { DEFAULT_LANGUAGE } from '../utils/constants.js';

export interface InterpreterState {
  variables: VariableStore;
  aliases: AliasTable;
  commands: CommandTable;
  messages: MessageTable;
  language: string;
  /** Output of the most recent RUN CMD; null until one has run */
  lastResult: CommandResult | null;
  /** True while the startup / REFLESH bootstrap is running */
  bootstrapping: boolean;
}

export interface InterpreterContext {
  state: InterpreterState;
  config: NeshConfig;
  logger: Logger;
  executor: CommandExecutor;
}

/**
 * Fresh state with built-in commands and the given messages
 */
export function createInterpreterState(
  messages: MessageTable = createMessageTable({}),
  language = DEFAULT_LANGUAGE
): InterpreterState {
  return {
    variables: createVariableStore(),
    aliases: createAliasTable(),
    commands: createCommandTable(BUILTIN_COMMANDS),
    messages,
    language,
    lastResult: null,
    bootstrapping: false,
  };
}

/**
 * Render a message in the current language
 */
export function message(
  context: InterpreterContext,
  key: MessageKey,
  params: MessageParams = {}
): string {
  const { messages, language } = context.state;
  return formatMessage(messages, language, key, params);
}

/**
 * Print a confirmation message unless running quietly
 */
export function notify(
  context: InterpreterContext,
  key: MessageKey,
  params: MessageParams = {}
): void {
  if (context.config.verbosity === 'quiet') return;
  printMessage(message(context, key, params));
}

/**
 * Print and log an error
 */
export function reportError(context: InterpreterContext, error: unknown): void {
  const { messages, language } = context.state;
  printError(describeError(error, messages, language));

  const kind = error instanceof NeshError ? error.kind : 'InternalError';
  const text = error instanceof Error ? error.message : String(error);
  context.logger.logEvent({ event: 'error', kind, message: text });
}
