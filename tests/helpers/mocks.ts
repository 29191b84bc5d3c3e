/**
 * Shared mock factories for tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import { type Mock, vi } from 'vitest';

import {
  createInterpreterState,
  type InterpreterContext,
} from '../../src/core/context.js';
import { bundledMessagesPath, loadMessages } from '../../src/i18n/messages.js';
import type { Logger } from '../../src/output/logger.js';
import type {
  CommandExecutor,
  CommandResult,
  NeshConfig,
} from '../../src/types/shell.js';

/**
 * Create a mock logger
 */
export function createMockLogger(): Logger {
  return {
    log: vi.fn(),
    logEvent: vi.fn(),
    close: vi.fn(),
    filePath: null,
  };
}

/**
 * Create a config with optional overrides; files point into homeDir
 */
export function createMockConfig(overrides?: Partial<NeshConfig>): NeshConfig {
  const homeDir = overrides?.homeDir ?? path.join('/tmp', 'nesh-test-home');
  return {
    homeDir,
    rcPath: null,
    commandsPath: path.join(homeDir, 'commands.json'),
    messagesPath: path.join(homeDir, 'messages.json'),
    logDir: path.join(homeDir, 'logs'),
    enableLog: false,
    language: 'ENGLISH',
    verbosity: 'quiet',
    nestedExit: 'shell',
    substitutionOrder: 'alias-first',
    scriptErrorMode: 'stop',
    ...overrides,
  };
}

/**
 * Executor stand-in: records calls and answers with canned results
 */
export function createFakeExecutor(
  respond: (command: string) => Partial<CommandResult> = () => ({})
): Mock<CommandExecutor> {
  return vi.fn<CommandExecutor>(async (command) => ({
    command,
    exitCode: 0,
    output: '',
    ...respond(command),
  }));
}

/**
 * Interpreter context with the bundled messages, a mock logger and a fake
 * executor
 */
export function createTestContext(
  options: {
    config?: Partial<NeshConfig>;
    executor?: CommandExecutor;
  } = {}
): InterpreterContext {
  return {
    state: createInterpreterState(loadMessages(bundledMessagesPath())),
    config: createMockConfig(options.config),
    logger: createMockLogger(),
    executor: options.executor ?? createFakeExecutor(),
  };
}

/**
 * Scratch directory under the OS temp dir
 */
export function createTempDir(): string {
  return fs.mkdtempSync(path.join(fs.realpathSync(os.tmpdir()), 'nesh-'));
}
