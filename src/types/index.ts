export type { MessageKey, MessageParams } from './messages.js';
export type {
  CommandExecutor,
  CommandResult,
  ConfigOverrides,
  ExecuteOptions,
  NeshConfig,
  NestedExitPolicy,
  ParsedArgs,
  ScriptErrorMode,
  ShellMode,
  SubstitutionOrder,
  Verbosity,
} from './shell.js';
export { resolveConfig } from './shell.js';
