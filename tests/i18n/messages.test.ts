import * as fs from 'fs';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  bundledMessagesPath,
  createMessageTable,
  describeError,
  fillTemplate,
  formatMessage,
  loadMessages,
  loadMessageTable,
  resolveLanguage,
} from '../../src/i18n/messages.js';
import {
  IOError,
  ScriptError,
  UndefinedVariableError,
} from '../../src/script/errors.js';
import { createTempDir } from '../helpers/mocks.js';

const table = createMessageTable({
  language_set: {
    ENGLISH: 'Language set to {language}',
    日本語: '言語を {language} に設定しました',
  },
  error_undefined_variable: { ENGLISH: 'Undefined variable: ${name}' },
  error_script: { ENGLISH: '{path}:{line}: [{kind}] {detail}' },
});

describe('fillTemplate', () => {
  it('fills known placeholders and keeps unknown ones', () => {
    expect(fillTemplate('{a} and {b}', { a: 1 })).toBe('1 and {b}');
  });
});

describe('formatMessage', () => {
  it('renders in the requested language', () => {
    expect(
      formatMessage(table, '日本語', 'language_set', { language: '日本語' })
    ).toBe('言語を 日本語 に設定しました');
  });

  it('falls back to ENGLISH for a missing translation', () => {
    expect(
      formatMessage(table, '日本語', 'error_undefined_variable', { name: 'X' })
    ).toBe('Undefined variable: $X');
  });

  it('falls back to the key for a missing message', () => {
    expect(formatMessage(table, 'ENGLISH', 'exit_message')).toBe(
      'exit_message'
    );
  });
});

describe('resolveLanguage', () => {
  it('accepts exact, upper-case and named languages', () => {
    expect(resolveLanguage(table, 'ENGLISH')).toBe('ENGLISH');
    expect(resolveLanguage(table, 'english')).toBe('ENGLISH');
    expect(resolveLanguage(table, 'Japanese')).toBe('日本語');
    expect(resolveLanguage(table, '日本語')).toBe('日本語');
  });

  it('returns null for an unknown language', () => {
    expect(resolveLanguage(table, 'KLINGON')).toBeNull();
  });
});

describe('describeError', () => {
  it('localizes Nesh errors', () => {
    expect(describeError(new UndefinedVariableError('X'), table, 'ENGLISH')).toBe(
      'Undefined variable: $X'
    );
  });

  it('prefixes script errors with their location', () => {
    const error = new ScriptError(
      'outer.nesh',
      4,
      new ScriptError('inner.nesh', 1, new UndefinedVariableError('X'))
    );

    expect(describeError(error, table, 'ENGLISH')).toBe(
      'outer.nesh:4: [UndefinedVariableError] inner.nesh:1: [UndefinedVariableError] Undefined variable: $X'
    );
  });

  it('uses the message of other errors', () => {
    expect(describeError(new Error('boom'), table, 'ENGLISH')).toBe('boom');
    expect(describeError('plain', table, 'ENGLISH')).toBe('plain');
  });
});

describe('loading messages', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('ships English and Japanese text for every message', () => {
    const bundled = loadMessages(bundledMessagesPath());

    expect([...bundled.languages].sort()).toEqual(['ENGLISH', '日本語']);
    for (const byLanguage of bundled.entries.values()) {
      expect(byLanguage.has('ENGLISH')).toBe(true);
      expect(byLanguage.has('日本語')).toBe(true);
    }
  });

  it('prefers the user messages file', () => {
    const file = path.join(tempDir, 'messages.json');
    fs.writeFileSync(
      file,
      JSON.stringify({ prompt: { ENGLISH: '> ', KLINGON: 'tlhIngan> ' } }),
      'utf-8'
    );

    const loaded = loadMessageTable(file);

    expect(formatMessage(loaded, 'KLINGON', 'prompt')).toBe('tlhIngan> ');
  });

  it('falls back to the bundled file', () => {
    const loaded = loadMessageTable(path.join(tempDir, 'missing.json'));

    expect(formatMessage(loaded, 'ENGLISH', 'exit_message')).toBe(
      'Exiting Nesh. Goodbye!'
    );
  });

  it('rejects a file of the wrong shape', () => {
    const file = path.join(tempDir, 'messages.json');
    fs.writeFileSync(file, JSON.stringify({ prompt: 'nesh> ' }), 'utf-8');

    expect(() => loadMessages(file)).toThrow(IOError);
  });

  it('rejects invalid JSON', () => {
    const file = path.join(tempDir, 'messages.json');
    fs.writeFileSync(file, '{', 'utf-8');

    expect(() => loadMessages(file)).toThrow(/cannot read messages/);
  });
});
