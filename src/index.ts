#!/usr/bin/env node
/**
 * Nesh - a command-line shell that runs system commands and Nesh Script
 */

import * as path from 'path';

import { parseArgs } from './cli/args.js';
import {
  createInterpreterState,
  type InterpreterContext,
  reportError,
} from './core/context.js';
import { bootstrap, runScriptFile } from './core/interpreter.js';
import { createLogger } from './output/logger.js';
import { ptyExecutor } from './process/pty.js';
import { handleInput, startShell } from './shell/loop.js';
import type { ParsedArgs } from './types/index.js';
import { resolveConfig } from './types/index.js';

/**
 * Log file name for a session
 */
function sessionName(parsed: ParsedArgs): string {
  if (parsed.mode === 'script' && parsed.scriptFile) {
    return path.basename(parsed.scriptFile);
  }
  return parsed.mode === 'command' ? 'command' : 'nesh';
}

/**
 * Run the selected mode after bootstrap
 *
 * @returns Process exit status
 */
async function runMode(
  parsed: ParsedArgs,
  context: InterpreterContext
): Promise<number> {
  switch (parsed.mode) {
    case 'interactive':
      return startShell(context);
    case 'command': {
      context.logger.logEvent({ event: 'session_start', mode: 'command' });
      try {
        await handleInput(parsed.command ?? '', context);
        return 0;
      } catch (error) {
        reportError(context, error);
        return 1;
      }
    }
    case 'script': {
      const scriptFile = parsed.scriptFile ?? '';
      context.logger.logEvent({
        event: 'session_start',
        mode: 'script',
        path: scriptFile,
      });
      try {
        await runScriptFile(scriptFile, context, 1);
        return 0;
      } catch (error) {
        reportError(context, error);
        return 1;
      }
    }
  }
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv.slice(2));
  const config = resolveConfig(parsed.config);
  const logger = createLogger(
    config.enableLog,
    config.logDir,
    sessionName(parsed)
  );

  const context: InterpreterContext = {
    state: createInterpreterState(),
    config,
    logger,
    executor: ptyExecutor,
  };

  // Startup bootstrap: messages, commands.json, RC file
  let exitCode: number | null = null;
  try {
    const outcome = await bootstrap(context);
    if (outcome === 'exit') {
      exitCode = 0;
    }
  } catch (error) {
    reportError(context, error);
    if (parsed.mode !== 'interactive') {
      exitCode = 1;
    }
  }

  if (exitCode === null) {
    exitCode = await runMode(parsed, context);
  }

  logger.close();
  process.exit(exitCode);
}

// Run main
main().catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  console.error(`Error: ${message}`);
  process.exit(1);
});
