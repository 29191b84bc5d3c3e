/**
 * Shell configuration and process execution types
 */

import * as os from 'os';
import * as path from 'path';

import {
  COMMANDS_FILE_NAME,
  DEFAULT_LANGUAGE,
  HOME_DIR_NAME,
  LOG_DIR_NAME,
  MESSAGES_FILE_NAME,
  RC_FILE_NAME,
} from '../utils/constants.js';

export type Verbosity = 'quiet' | 'normal';

/** What EXIT does inside a nested script or command sequence */
export type NestedExitPolicy = 'shell' | 'script';

/** Whether alias lookup happens before or after ${NAME} interpolation */
export type SubstitutionOrder = 'alias-first' | 'variables-first';

/** What a script does after a failing line */
export type ScriptErrorMode = 'stop' | 'continue';

export type ShellMode = 'interactive' | 'script' | 'command';

/**
 * Shell configuration
 */
export interface NeshConfig {
  homeDir: string;
  /** null disables the RC file */
  rcPath: string | null;
  commandsPath: string;
  messagesPath: string;
  logDir: string;
  enableLog: boolean;
  language: string;
  verbosity: Verbosity;
  nestedExit: NestedExitPolicy;
  substitutionOrder: SubstitutionOrder;
  scriptErrorMode: ScriptErrorMode;
}

/**
 * Settings a user can override from the command line
 */
export interface ConfigOverrides {
  homeDir?: string;
  rcPath?: string | null;
  enableLog?: boolean;
  language?: string;
  verbosity?: Verbosity;
  nestedExit?: NestedExitPolicy;
  substitutionOrder?: SubstitutionOrder;
  scriptErrorMode?: ScriptErrorMode;
}

/**
 * Merge overrides with defaults. The home directory comes from the override,
 * then $NESH_HOME, then ~/.nesh; the files inside it follow.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): NeshConfig {
  const homeDir =
    overrides.homeDir ?? env['NESH_HOME'] ?? path.join(os.homedir(), HOME_DIR_NAME);

  return {
    homeDir,
    rcPath:
      overrides.rcPath === undefined
        ? path.join(os.homedir(), RC_FILE_NAME)
        : overrides.rcPath,
    commandsPath: path.join(homeDir, COMMANDS_FILE_NAME),
    messagesPath: path.join(homeDir, MESSAGES_FILE_NAME),
    logDir: path.join(homeDir, LOG_DIR_NAME),
    enableLog: overrides.enableLog ?? true,
    language: overrides.language ?? DEFAULT_LANGUAGE,
    verbosity: overrides.verbosity ?? 'normal',
    nestedExit: overrides.nestedExit ?? 'shell',
    substitutionOrder: overrides.substitutionOrder ?? 'alias-first',
    scriptErrorMode: overrides.scriptErrorMode ?? 'stop',
  };
}

/**
 * Parsed CLI arguments
 */
export interface ParsedArgs {
  mode: ShellMode;
  /** Script file (script mode) */
  scriptFile: string | null;
  /** Line to execute (command mode) */
  command: string | null;
  config: ConfigOverrides;
}

// ============================================================
// PROCESS EXECUTION
// ============================================================

/**
 * Captured outcome of a system command (the LastResult)
 */
export interface CommandResult {
  command: string;
  exitCode: number;
  output: string;
}

export interface ExecuteOptions {
  cwd: string;
  /** Extra variables layered over process.env */
  env: Record<string, string>;
  /** Write output to the terminal while capturing it */
  echo: boolean;
}

/**
 * Runs a command to completion. Never rejects for a failing command: a
 * non-zero status is part of the result.
 */
export type CommandExecutor = (
  command: string,
  options: ExecuteOptions
) => Promise<CommandResult>;
