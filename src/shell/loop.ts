/**
 * Interactive shell: Nesh Script and system commands in one REPL
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import * as readline from 'readline';
import { Writable } from 'stream';

import { executeSystemCommand } from '../core/actions.js';
import {
  type InterpreterContext,
  type InterpreterState,
  message,
  reportError,
} from '../core/context.js';
import {
  executePrepared,
  type LineOutcome,
  prepareLine,
} from '../core/interpreter.js';
import { colorize, printMessage } from '../output/colors.js';
import { isKnownVerb, listVerbs } from '../script/commands.js';
import { IOError, UnknownCommandError } from '../script/errors.js';
import { renderVariable } from '../script/variables.js';
import {
  PWD_IN_PROMPT,
  PWD_SHOW_VARIABLE,
  RESULT_HIDE_VARIABLE,
} from '../utils/constants.js';
import { expandHome } from '../utils/formatting.js';
import { closestMatch } from '../utils/suggest.js';
import { complete } from './completer.js';

export interface ShellStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * readline output that goes quiet while a system command owns the
 * terminal. The command's PTY echoes the keys itself.
 */
export class PromptOutput extends Writable {
  muted = false;

  constructor(private readonly target: NodeJS.WritableStream) {
    super();
  }

  get columns(): number | undefined {
    return this.target === process.stdout ? process.stdout.columns : undefined;
  }

  override _write(
    chunk: Buffer,
    _encoding: BufferEncoding,
    callback: (error?: Error | null) => void
  ): void {
    if (!this.muted) this.target.write(chunk);
    callback();
  }
}

/**
 * Prompt text, prefixed with the working directory when NESH_PWD_SHOW is
 * IN_PROMPT
 */
export function buildPrompt(context: InterpreterContext): string {
  const prompt = message(context, 'prompt');
  const pwdShow = context.state.variables.named.get(PWD_SHOW_VARIABLE);
  if (!pwdShow || renderVariable(pwdShow) !== PWD_IN_PROMPT) {
    return prompt;
  }

  const shortCwd = process.cwd().replace(os.homedir(), '~');
  return `${colorize(shortCwd, 'cyan')} ${prompt}`;
}

function isResultHidden(state: InterpreterState): boolean {
  const hide = state.variables.named.get(RESULT_HIDE_VARIABLE);
  return hide?.kind === 'BOOL' && hide.value;
}

/**
 * Built-in cd: the working directory belongs to this process
 */
export function changeDirectory(target: string): void {
  const dirPath = path.resolve(
    target === '' ? os.homedir() : expandHome(target)
  );

  if (!fs.existsSync(dirPath)) {
    throw new IOError(dirPath, 'no such directory');
  }
  if (!fs.statSync(dirPath).isDirectory()) {
    throw new IOError(dirPath, 'not a directory');
  }
  process.chdir(dirPath);
}

/**
 * Route one interactive line
 *
 * Known verbs go to the interpreter, cd changes directory, an unknown
 * upper-case word is a Nesh typo, and anything else runs in the system shell.
 */
export async function handleInput(
  input: string,
  context: InterpreterContext
): Promise<LineOutcome> {
  const { state, config, logger } = context;
  const line = input.trim();
  if (line === '') {
    return 'continue';
  }

  const prepared = prepareLine(line, state, config.substitutionOrder);
  const text = prepared.text;
  const [head = '', ...rest] = text.split(/\s+/);

  if (text === 'exit' || text === 'quit') {
    return 'exit';
  }

  if (isKnownVerb(state.commands, head)) {
    logger.logEvent({
      event: 'line',
      depth: 0,
      line,
      text,
      alias: prepared.alias,
    });
    return executePrepared(text, context);
  }

  if (head === 'cd') {
    changeDirectory(rest.join(' '));
    return 'continue';
  }

  if (/^[A-Z][A-Z0-9_]*$/.test(head)) {
    const suggestion = closestMatch(head, listVerbs(state.commands));
    throw new UnknownCommandError(head, suggestion);
  }

  await executeSystemCommand(context, text, !isResultHidden(state));
  return 'continue';
}

/**
 * Run the REPL until EXIT, exit/quit or end of input
 *
 * @returns Process exit status
 */
export async function startShell(
  context: InterpreterContext,
  streams: ShellStreams = { input: process.stdin, output: process.stdout }
): Promise<number> {
  const terminal =
    streams.input === process.stdin && process.stdin.isTTY === true;
  const output = new PromptOutput(streams.output);
  const rl = readline.createInterface({
    input: streams.input,
    output,
    completer: (line: string): [string[], string] =>
      complete(line, context.state),
    terminal,
  });

  // Lines typed while a system command runs were input to that command
  let commandRunning = false;
  let emitted = 0;
  const typedIntoCommand = new Set<number>();
  rl.on('line', () => {
    if (commandRunning) typedIntoCommand.add(emitted);
    emitted++;
  });
  rl.on('history', (history: string[]) => {
    if (commandRunning) history.shift();
  });

  const shellContext: InterpreterContext = {
    ...context,
    executor: async (command, options) => {
      commandRunning = true;
      output.muted = terminal;
      try {
        return await context.executor(command, options);
      } finally {
        // Drop whatever was typed after the last Enter
        if (terminal) rl.write(null, { ctrl: true, name: 'u' });
        output.muted = false;
        commandRunning = false;
      }
    },
  };

  const showPrompt = (): void => {
    rl.setPrompt(buildPrompt(context));
    rl.prompt();
  };

  // Ctrl+C clears the current line. While a command runs the keystroke has
  // already gone to its PTY, which interrupts it.
  rl.on('SIGINT', () => {
    if (commandRunning) return;
    streams.output.write('\n');
    showPrompt();
  });

  context.logger.logEvent({ event: 'session_start', mode: 'interactive' });
  showPrompt();

  let consumed = 0;
  try {
    for await (const line of rl) {
      if (typedIntoCommand.delete(consumed++)) continue;

      let outcome: LineOutcome = 'continue';
      try {
        outcome = await handleInput(line, shellContext);
      } catch (error) {
        reportError(shellContext, error);
      }

      if (outcome === 'exit') break;
      showPrompt();
    }
  } finally {
    rl.close();
  }

  printMessage(message(context, 'exit_message'));
  return 0;
}
