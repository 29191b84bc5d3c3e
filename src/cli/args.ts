/**
 * CLI argument parsing
 */

import { createRequire } from 'module';

import type {
  ConfigOverrides,
  NestedExitPolicy,
  ParsedArgs,
  ShellMode,
  SubstitutionOrder,
} from '../types/index.js';

const require = createRequire(import.meta.url);
const pkg = require('../../package.json') as { version: string };

const NESTED_EXIT_POLICIES = ['shell', 'script'] as const;
const SUBSTITUTION_ORDERS = ['alias-first', 'variables-first'] as const;

const USAGE = 'Usage: nesh [options] [script] | nesh -c "<line>"';

function isNestedExitPolicy(value: string): value is NestedExitPolicy {
  return NESTED_EXIT_POLICIES.some((policy) => policy === value);
}

function isSubstitutionOrder(value: string): value is SubstitutionOrder {
  return SUBSTITUTION_ORDERS.some((order) => order === value);
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error(USAGE);
  process.exit(1);
}

/**
 * Value for an option that takes one (--flag value or --flag=value)
 */
function takeValue(args: string[], i: number, flag: string): string {
  const value = args[i + 1];
  if (value === undefined || value.startsWith('-')) {
    fail(`${flag} requires a value`);
  }
  return value;
}

/**
 * Parse CLI arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  // Handle --version and --help early
  if (args.includes('--version') || args.includes('-V')) {
    console.log(pkg.version);
    process.exit(0);
  }
  if (args.includes('--help') || args.includes('-h')) {
    printUsage();
    process.exit(0);
  }

  const config: ConfigOverrides = {};
  let command: string | null = null;
  const positionalArgs: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const flag = eq === -1 ? arg : arg.slice(0, eq);
    const value = (): string => {
      if (eq !== -1) return arg.slice(eq + 1);
      const next = takeValue(args, i, flag);
      i++;
      return next;
    };

    if (flag === '-c' || flag === '--command') {
      command = value();
    } else if (flag === '--home') {
      config.homeDir = value();
    } else if (flag === '--rc') {
      config.rcPath = value();
    } else if (flag === '--no-rc') {
      config.rcPath = null;
    } else if (flag === '--lang') {
      config.language = value();
    } else if (flag === '--quiet') {
      config.verbosity = 'quiet';
    } else if (flag === '--no-log') {
      config.enableLog = false;
    } else if (flag === '--keep-going') {
      config.scriptErrorMode = 'continue';
    } else if (flag === '--nested-exit') {
      const policy = value();
      if (!isNestedExitPolicy(policy)) {
        fail(
          `--nested-exit must be one of: ${NESTED_EXIT_POLICIES.join(', ')}`
        );
      }
      config.nestedExit = policy;
    } else if (flag === '--substitution-order') {
      const order = value();
      if (!isSubstitutionOrder(order)) {
        fail(
          `--substitution-order must be one of: ${SUBSTITUTION_ORDERS.join(', ')}`
        );
      }
      config.substitutionOrder = order;
    } else if (flag.startsWith('-') && flag !== '-') {
      fail(`unknown option '${arg}'`);
    } else {
      positionalArgs.push(arg);
    }
  }

  if (command !== null && positionalArgs.length > 0) {
    fail('-c cannot be combined with a script file');
  }
  if (positionalArgs.length > 1) {
    fail(`unexpected argument '${positionalArgs[1] ?? ''}'`);
  }

  const scriptFile = positionalArgs[0] ?? null;
  const mode: ShellMode =
    command !== null
      ? 'command'
      : scriptFile !== null
        ? 'script'
        : 'interactive';

  return { mode, scriptFile, command, config };
}

/**
 * Print usage information
 */
export function printUsage(): void {
  console.log(`
Nesh - a shell for system commands and Nesh Script

Usage:
  nesh [options]                 Start the interactive shell
  nesh [options] <script>        Run a Nesh Script file
  nesh [options] -c "<line>"     Run a single line

Options:
  -c, --command <line>           Line to run (Nesh Script or system command)
  --home <dir>                   Directory holding commands.json and messages.json
                                 (default: $NESH_HOME or ~/.nesh)
  --rc <file>                    RC file to run at startup (default: ~/.neshrc)
  --no-rc                        Do not run an RC file
  --lang <language>              Display language (default: ENGLISH)
  --quiet                        Errors and command output only
  --no-log                       Disable logging to file (enabled by default)
  --nested-exit <shell|script>   What EXIT inside a nested script ends
                                 (default: shell)
  --substitution-order <alias-first|variables-first>
                                 Order of alias expansion and \${NAME}
                                 interpolation (default: alias-first)
  --keep-going                   Report failing script lines and continue
  -V, --version                  Print the version
  -h, --help                     Show this help
`);
}
