/**
 * Centralized constants for the shell and interpreter
 */

// === Size Thresholds ===
/** Threshold for displaying size in K (1000 chars) */
export const SIZE_THRESHOLD_K = 1000;
/** Threshold for displaying size in M (1000000 chars) */
export const SIZE_THRESHOLD_M = 1000000;

// === Process Execution ===
/** Shell used to run RUN CMD and passthrough commands */
export const DEFAULT_SHELL = '/bin/sh';
/** Terminal column width when stdout is not a TTY */
export const PTY_COLS = 120;
/** Terminal row count when stdout is not a TTY */
export const PTY_ROWS = 40;
/** Exit status recorded when a command cannot be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

// === Time Constants ===
/** Milliseconds per second */
export const MS_PER_SECOND = 1000;
/** Longest delay a single setTimeout honours */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

// === Interpreter Limits ===
/** Deepest allowed RUN NESH FROM / command sequence nesting */
export const MAX_NESTING_DEPTH = 32;
/** Minimum similarity (0..1) for a "did you mean" suggestion */
export const SUGGESTION_CUTOFF = 0.6;

// === Variables ===
/** Canonical BOOL literals (case-sensitive) */
export const BOOL_TRUE = 'TRUE';
export const BOOL_FALSE = 'FALSE';
/** Separator used when rendering TEXT segments */
export const TEXT_SEGMENT_SEPARATOR = ':';

// === Shell Settings Read From Variables ===
/** When this variable renders as PWD_IN_PROMPT, the prompt shows the cwd */
export const PWD_SHOW_VARIABLE = 'NESH_PWD_SHOW';
export const PWD_IN_PROMPT = 'IN_PROMPT';
/** BOOL variable that hides passthrough command output when TRUE */
export const RESULT_HIDE_VARIABLE = 'NESHRC_RESULT_HIDE';

// === Languages ===
export const DEFAULT_LANGUAGE = 'ENGLISH';
/** Friendly language names accepted by SET LANGUAGE */
export const LANGUAGE_ALIASES: Record<string, string> = {
  english: 'ENGLISH',
  japanese: '日本語',
};

// === Files ===
export const RC_FILE_NAME = '.neshrc';
export const HOME_DIR_NAME = '.nesh';
export const COMMANDS_FILE_NAME = 'commands.json';
export const MESSAGES_FILE_NAME = 'messages.json';
export const LOG_DIR_NAME = 'logs';
