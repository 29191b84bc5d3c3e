/**
 * Error taxonomy for Nesh Script
 *
 * Every failure the interpreter reports is a NeshError. The `kind` names the
 * failure for logs and script traces; `messageKey` and `params` select the
 * localized text shown to the user.
 */

import type { MessageKey, MessageParams } from '../types/messages.js';

export type NeshErrorKind =
  | 'ParseError'
  | 'UnknownCommandError'
  | 'UnknownSubcommandError'
  | 'UndefinedVariableError'
  | 'DuplicateVariableError'
  | 'DuplicateAliasError'
  | 'TypeMismatchError'
  | 'InvalidOptionError'
  | 'IOError'
  | 'CommandDefinitionParseError'
  | 'NoResultError'
  | 'UnsupportedLanguageError'
  | 'InvalidDurationError'
  | 'ScriptError'
  | 'RecursionLimitError'
  | 'ReloadError';

interface ErrorDetails {
  kind: NeshErrorKind;
  messageKey: MessageKey;
  params?: MessageParams;
  cause?: unknown;
}

export class NeshError extends Error {
  readonly kind: NeshErrorKind;
  readonly messageKey: MessageKey;
  readonly params: MessageParams;

  constructor(message: string, details: ErrorDetails) {
    super(
      message,
      details.cause === undefined ? undefined : { cause: details.cause }
    );
    this.name = details.kind;
    this.kind = details.kind;
    this.messageKey = details.messageKey;
    this.params = details.params ?? {};
  }
}

// ============================================================
// PARSING
// ============================================================

export class ParseError extends NeshError {
  /** The token the grammar expected, when a slot mismatch caused the error */
  readonly expected: string | null;

  constructor(
    detail: string,
    expected: string | null = null,
    details: ErrorDetails = {
      kind: 'ParseError',
      messageKey: 'error_parse',
      params: { detail },
    }
  ) {
    super(detail, details);
    this.expected = expected;
  }
}

export class UnknownCommandError extends ParseError {
  readonly verb: string;
  readonly suggestion: string | null;

  constructor(verb: string, suggestion: string | null = null) {
    const hint = suggestion ? `. Did you mean ${suggestion}?` : '';
    super(`Unknown command: ${verb}${hint}`, null, {
      kind: 'UnknownCommandError',
      messageKey: suggestion
        ? 'error_unknown_command_suggest'
        : 'error_unknown_command',
      params: suggestion ? { verb, suggestion } : { verb },
    });
    this.verb = verb;
    this.suggestion = suggestion;
  }
}

export class UnknownSubcommandError extends ParseError {
  readonly verb: string;
  readonly subcommand: string;

  constructor(verb: string, subcommand: string, available: string[]) {
    const expected = available.join(', ');
    super(
      `Unknown subcommand for ${verb}: ${subcommand} (expected one of: ${expected})`,
      expected,
      {
        kind: 'UnknownSubcommandError',
        messageKey: 'error_unknown_subcommand',
        params: { verb, subcommand, expected },
      }
    );
    this.verb = verb;
    this.subcommand = subcommand;
  }
}

export class CommandDefinitionParseError extends NeshError {
  constructor(path: string, detail: string) {
    super(`Invalid command definition in ${path}: ${detail}`, {
      kind: 'CommandDefinitionParseError',
      messageKey: 'error_command_definition',
      params: { path, detail },
    });
  }
}

// ============================================================
// STATE STORES
// ============================================================

export class UndefinedVariableError extends NeshError {
  readonly variable: string;

  constructor(name: string) {
    super(`Undefined variable: $${name}`, {
      kind: 'UndefinedVariableError',
      messageKey: 'error_undefined_variable',
      params: { name },
    });
    this.variable = name;
  }
}

export class DuplicateVariableError extends NeshError {
  constructor(name: string) {
    super(`Variable already defined: $${name}`, {
      kind: 'DuplicateVariableError',
      messageKey: 'error_duplicate_variable',
      params: { name },
    });
  }
}

export class DuplicateAliasError extends NeshError {
  constructor(name: string) {
    super(`Alias already defined: ${name}`, {
      kind: 'DuplicateAliasError',
      messageKey: 'error_duplicate_alias',
      params: { name },
    });
  }
}

export class TypeMismatchError extends NeshError {
  constructor(name: string, detail: string) {
    super(`Type mismatch for $${name}: ${detail}`, {
      kind: 'TypeMismatchError',
      messageKey: 'error_type_mismatch',
      params: { name, detail },
    });
  }
}

export class InvalidOptionError extends NeshError {
  constructor(name: string, value: string, options: string[]) {
    const allowed = options.join(', ');
    super(`Invalid option for $${name}: ${value} (allowed: ${allowed})`, {
      kind: 'InvalidOptionError',
      messageKey: 'error_invalid_option',
      params: { name, value, options: allowed },
    });
  }
}

// ============================================================
// ACTIONS
// ============================================================

export class IOError extends NeshError {
  readonly path: string;

  constructor(path: string, detail: string, cause?: unknown) {
    super(`I/O error on ${path}: ${detail}`, {
      kind: 'IOError',
      messageKey: 'error_io',
      params: { path, detail },
      cause,
    });
    this.path = path;
  }
}

export class NoResultError extends NeshError {
  constructor() {
    super('No command result to save. Run RUN CMD first.', {
      kind: 'NoResultError',
      messageKey: 'error_no_result',
    });
  }
}

export class UnsupportedLanguageError extends NeshError {
  constructor(language: string, available: string[]) {
    super(`Unsupported language: ${language}`, {
      kind: 'UnsupportedLanguageError',
      messageKey: 'error_unsupported_language',
      params: { language, available: available.join(', ') },
    });
  }
}

export class InvalidDurationError extends NeshError {
  constructor(value: string) {
    super(`Invalid duration: ${value}`, {
      kind: 'InvalidDurationError',
      messageKey: 'error_invalid_duration',
      params: { value },
    });
  }
}

export class RecursionLimitError extends NeshError {
  constructor(limit: number) {
    super(`Script nesting limit of ${limit} exceeded`, {
      kind: 'RecursionLimitError',
      messageKey: 'error_recursion_limit',
      params: { limit },
    });
  }
}

export class ReloadError extends NeshError {
  constructor() {
    super('REFLESH cannot run while the RC file is loading', {
      kind: 'ReloadError',
      messageKey: 'error_reload',
    });
  }
}

/**
 * A failure inside a script file or command sequence, tagged with where it
 * happened. Nested scripts wrap again, so the chain reads outermost first.
 */
export class ScriptError extends NeshError {
  readonly path: string;
  readonly lineNumber: number;
  readonly inner: NeshError;

  constructor(path: string, lineNumber: number, inner: NeshError) {
    const root = inner instanceof ScriptError ? inner.root : inner;
    super(`${path}:${lineNumber}: ${inner.message}`, {
      kind: 'ScriptError',
      messageKey: 'error_script',
      params: { path, line: lineNumber, kind: root.kind },
      cause: inner,
    });
    this.path = path;
    this.lineNumber = lineNumber;
    this.inner = inner;
  }

  /** The innermost error that started the failure */
  get root(): NeshError {
    return this.inner instanceof ScriptError ? this.inner.root : this.inner;
  }
}
