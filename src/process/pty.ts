/**
 * PTY process management for RUN CMD and passthrough commands
 */

import type { IPty } from 'node-pty';
import * as pty from 'node-pty';

import type {
  CommandExecutor,
  CommandResult,
  ExecuteOptions,
} from '../types/shell.js';
import {
  DEFAULT_SHELL,
  PTY_COLS,
  PTY_ROWS,
  SPAWN_FAILURE_EXIT_CODE,
} from '../utils/constants.js';
import { openStderrPipe, type StderrPipe } from './stderr.js';

/** Environment variable naming the FIFO that receives the command's stderr */
export const STDERR_PIPE_VARIABLE = 'NESH_STDERR_PIPE';

export interface CommandProcessOptions extends ExecuteOptions {
  command: string;
  shell?: string;
  /** Terminal input forwarded to the command while it runs */
  input?: NodeJS.ReadableStream;
}

/**
 * Normalize PTY output: CRLF to LF, no trailing newlines
 */
export function normalizeOutput(raw: string): string {
  return raw.replace(/\r\n?/g, '\n').replace(/\n+$/, '');
}

/**
 * Shell script that moves fd 2 onto the stderr FIFO, then runs the command
 */
export function commandScript(command: string): string {
  return `exec 2>"$${STDERR_PIPE_VARIABLE}"\n${command}`;
}

function startProcess(
  options: CommandProcessOptions
): { ptyProcess: IPty; stderr: StderrPipe } | Error {
  const { command, cwd, env, shell = DEFAULT_SHELL } = options;
  let stderr: StderrPipe | null = null;
  try {
    stderr = openStderrPipe(process.stderr);
    const ptyProcess = pty.spawn(shell, ['-c', commandScript(command)], {
      name: 'xterm-256color',
      cols: process.stdout.columns || PTY_COLS,
      rows: process.stdout.rows || PTY_ROWS,
      cwd,
      env: { ...process.env, ...env, [STDERR_PIPE_VARIABLE]: stderr.path },
    });
    return { ptyProcess, stderr };
  } catch (error) {
    stderr?.release();
    return error instanceof Error ? error : new Error(String(error));
  }
}

/**
 * Send input keystrokes to the command until it exits
 *
 * @returns Detach function
 */
function forwardInput(
  input: NodeJS.ReadableStream | undefined,
  ptyProcess: IPty
): () => void {
  if (!input) return () => undefined;

  const onInput = (data: Buffer | string): void => {
    ptyProcess.write(data.toString());
  };
  input.on('data', onInput);

  return () => {
    input.removeListener('data', onInput);
    // Nobody else reads the stream: stop it holding the event loop open
    if (input.listenerCount('data') === 0) input.pause();
  };
}

/**
 * Run a command through the shell in a PTY and wait for it to exit.
 * Only stdout is captured; stderr goes to this process's stderr. A command
 * that cannot start resolves with a failure status instead of rejecting.
 */
export function spawnCommand(
  options: CommandProcessOptions
): Promise<CommandResult> {
  const { command, echo } = options;

  return new Promise((resolve) => {
    const started = startProcess(options);
    if (started instanceof Error) {
      resolve({
        command,
        exitCode: SPAWN_FAILURE_EXIT_CODE,
        output: started.message,
      });
      return;
    }

    const { ptyProcess, stderr } = started;
    const detachInput = forwardInput(options.input, ptyProcess);
    let output = '';

    ptyProcess.onData((data: string) => {
      output += data;
      if (echo) {
        process.stdout.write(data);
      }
    });

    ptyProcess.onExit(({ exitCode }) => {
      detachInput();
      stderr.release();
      resolve({ command, exitCode, output: normalizeOutput(output) });
    });
  });
}

/**
 * Executor used by the shell. Keystrokes reach the command when stdin is a
 * terminal.
 */
export const ptyExecutor: CommandExecutor = (command, options) =>
  spawnCommand({
    command,
    ...options,
    ...(process.stdin.isTTY ? { input: process.stdin } : {}),
  });
