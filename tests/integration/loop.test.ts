import * as fs from 'fs';
import * as path from 'path';
import { PassThrough } from 'stream';

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { bootstrap } from '../../src/core/interpreter.js';
import { startShell } from '../../src/shell/loop.js';
import type { CommandExecutor } from '../../src/types/shell.js';
import {
  createFakeExecutor,
  createTempDir,
  createTestContext,
} from '../helpers/mocks.js';

function streamsFor(input: string): {
  input: PassThrough;
  output: PassThrough;
  written: () => string;
} {
  const inputStream = new PassThrough();
  const output = new PassThrough();
  const chunks: string[] = [];
  output.on('data', (chunk: Buffer) => chunks.push(chunk.toString()));
  inputStream.end(input);
  return { input: inputStream, output, written: () => chunks.join('') };
}

describe('interactive session', () => {
  let tempDir: string;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = createTempDir();
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('runs lines until EXIT and says goodbye', async () => {
    const context = createTestContext();
    const streams = streamsFor(
      'CREATE VAR $X WITH TEXT "a"\nEXIT\nCREATE VAR $Y WITH TEXT "b"\n'
    );

    await expect(startShell(context, streams)).resolves.toBe(0);

    expect(context.state.variables.named.has('X')).toBe(true);
    expect(context.state.variables.named.has('Y')).toBe(false);
    expect(logSpy).toHaveBeenLastCalledWith('Exiting Nesh. Goodbye!');
    expect(streams.written()).toContain('nesh> ');
  });

  it('ends at the end of input', async () => {
    const context = createTestContext();

    await expect(
      startShell(context, streamsFor('CREATE VAR $X WITH TEXT "a"\n'))
    ).resolves.toBe(0);
    expect(context.state.variables.named.has('X')).toBe(true);
  });

  it('reports a failing line and keeps reading', async () => {
    const context = createTestContext();

    await startShell(
      context,
      streamsFor('APPEND "x" TO $NOPE\nCREATE VAR $AFTER WITH TEXT "y"\n')
    );

    expect(errorSpy).toHaveBeenCalledWith(
      '\x1b[31mUndefined variable: $NOPE\x1b[0m'
    );
    expect(context.state.variables.named.has('AFTER')).toBe(true);
  });

  it('runs an RC file, then system commands, then saves the result', async () => {
    const rcPath = path.join(tempDir, 'neshrc');
    fs.writeFileSync(
      rcPath,
      'CREATE VAR $GREETING WITH TEXT "hello"\nCREATE ALIAS hi FOR "echo ${GREETING}"\n',
      'utf-8'
    );
    const executor = createFakeExecutor((command) => ({
      output: command.replace(/^echo /, ''),
    }));
    const context = createTestContext({
      config: { homeDir: tempDir, rcPath },
      executor,
    });
    const outFile = path.join(tempDir, 'greeting.txt');

    await bootstrap(context);
    await startShell(context, streamsFor(`hi\nSAVE TO "${outFile}"\nquit\n`));

    expect(executor).toHaveBeenCalledWith('echo hello', {
      cwd: process.cwd(),
      env: { GREETING: 'hello' },
      echo: true,
    });
    expect(fs.readFileSync(outFile, 'utf-8')).toBe('hello');
  });

  it('treats lines typed while a system command runs as its input', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    output.resume();
    const executor = vi.fn<CommandExecutor>(async (command) => {
      input.write('forty two\n');
      await new Promise((resolve) => setImmediate(resolve));
      return { command, exitCode: 0, output: '' };
    });
    const context = createTestContext({ executor });

    const session = startShell(context, { input, output });
    input.write('read answer\n');
    await vi.waitFor(() => expect(executor).toHaveBeenCalledTimes(1));
    await executor.mock.results[0]?.value;
    await new Promise((resolve) => setImmediate(resolve));
    input.end('CREATE VAR $AFTER WITH TEXT "y"\n');

    await expect(session).resolves.toBe(0);
    expect(executor).toHaveBeenCalledTimes(1);
    expect(executor).toHaveBeenCalledWith('read answer', {
      cwd: process.cwd(),
      env: {},
      echo: true,
    });
    expect(context.state.variables.named.has('AFTER')).toBe(true);
  });
});
