import * as fs from 'fs';
import * as path from 'path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { BUILTIN_COMMANDS } from '../../src/script/builtins.js';
import {
  commandKey,
  createCommandTable,
  getCommand,
  isKnownVerb,
  listSubcommands,
  listVerbs,
  loadCommandDefinitions,
  mergeCommandDefinitions,
  parseCommandDefinitions,
} from '../../src/script/commands.js';
import {
  CommandDefinitionParseError,
  IOError,
} from '../../src/script/errors.js';
import { parseLine } from '../../src/script/parser.js';
import { createTempDir } from '../helpers/mocks.js';

function definitionFile(commands: unknown[]): string {
  return JSON.stringify({ commands });
}

describe('command table', () => {
  it('keys definitions by verb and subcommand', () => {
    expect(commandKey('RUN', 'CMD')).toBe('RUN CMD');
    expect(commandKey('EXIT')).toBe('EXIT');
  });

  it('lists verbs in registration order', () => {
    const table = createCommandTable(BUILTIN_COMMANDS);

    expect(listVerbs(table)).toEqual([
      'CREATE',
      'APPEND',
      'SET',
      'RUN',
      'SAVE',
      'EXIT',
      'SLEEP',
      'REFLESH',
    ]);
    expect(listSubcommands(table, 'SET')).toEqual(['LANGUAGE', 'VAR']);
    expect(isKnownVerb(table, 'SLEEP')).toBe(true);
    expect(isKnownVerb(table, 'sleep')).toBe(false);
  });

  it('lets the last loaded definition win', () => {
    const table = createCommandTable(BUILTIN_COMMANDS);
    const first = parseCommandDefinitions(
      definitionFile([
        {
          verb: 'GREET',
          params: [{ type: 'string', name: 'command' }],
          action: 'run-command',
        },
      ]),
      'first.json'
    );
    const second = parseCommandDefinitions(
      definitionFile([
        {
          verb: 'GREET',
          params: [
            { type: 'keyword', value: 'WITH' },
            { type: 'string', name: 'command' },
          ],
          action: 'run-command',
        },
      ]),
      'second.json'
    );

    mergeCommandDefinitions(table, first);
    mergeCommandDefinitions(table, second);

    expect(getCommand(table, 'GREET')?.source).toBe('second.json');
    expect(parseLine('GREET WITH "echo hi"', table).action).toBe('run-command');
    expect(() => parseLine('GREET "echo hi"', table)).toThrow(
      'Expected WITH, found "echo hi"'
    );
  });
});

describe('parseCommandDefinitions', () => {
  it('reads a sequence definition', () => {
    const [definition] = parseCommandDefinitions(
      definitionFile([
        {
          verb: 'DEPLOY',
          subcommand: 'APP',
          description: 'Build and ship',
          params: [{ type: 'word', name: 'target' }],
          action: 'sequence',
          steps: ['RUN CMD "make {target}"'],
        },
      ]),
      'commands.json'
    );

    expect(definition).toEqual({
      verb: 'DEPLOY',
      subcommand: 'APP',
      description: 'Build and ship',
      params: [{ type: 'word', name: 'target' }],
      action: 'sequence',
      steps: ['RUN CMD "make {target}"'],
      source: 'commands.json',
    });
  });

  it('defaults params to an empty list', () => {
    const [definition] = parseCommandDefinitions(
      definitionFile([{ verb: 'QUIT', action: 'exit' }]),
      'commands.json'
    );

    expect(definition?.params).toEqual([]);
  });

  it('rejects malformed JSON', () => {
    expect(() => parseCommandDefinitions('{ nope', 'bad.json')).toThrow(
      CommandDefinitionParseError
    );
  });

  it('rejects an unknown action', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([{ verb: 'X', action: 'format-disk' }]),
        'bad.json'
      )
    ).toThrow(CommandDefinitionParseError);
  });

  it('rejects a lower-case verb', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([{ verb: 'greet', action: 'exit' }]),
        'bad.json'
      )
    ).toThrow('commands.0.verb: must be an upper-case keyword');
  });

  it('rejects a built-in action missing a parameter', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([{ verb: 'MKDIR', action: 'create-dir' }]),
        'bad.json'
      )
    ).toThrow(
      'Invalid command definition in bad.json: MKDIR: action create-dir needs parameter "path"'
    );
  });

  it('rejects a parameter with the wrong slot type', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([
          {
            verb: 'MKDIR',
            params: [{ type: 'word', name: 'path' }],
            action: 'create-dir',
          },
        ]),
        'bad.json'
      )
    ).toThrow('MKDIR: parameter "path" must be string');
  });

  it('rejects a sequence without steps', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([{ verb: 'NOTHING', action: 'sequence' }]),
        'bad.json'
      )
    ).toThrow('NOTHING: a sequence needs at least one step');
  });

  it('rejects a step placeholder with no parameter', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([
          { verb: 'ECHO', action: 'sequence', steps: ['RUN CMD "{text}"'] },
        ]),
        'bad.json'
      )
    ).toThrow('ECHO: step uses unknown parameter {text}');
  });

  it('rejects duplicate parameter names', () => {
    expect(() =>
      parseCommandDefinitions(
        definitionFile([
          {
            verb: 'TWICE',
            params: [
              { type: 'word', name: 'a' },
              { type: 'string', name: 'a' },
            ],
            action: 'sequence',
            steps: ['EXIT'],
          },
        ]),
        'bad.json'
      )
    ).toThrow('TWICE: duplicate parameter names');
  });
});

describe('loadCommandDefinitions', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = createTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('loads definitions from a file', () => {
    const file = path.join(tempDir, 'commands.json');
    fs.writeFileSync(
      file,
      definitionFile([{ verb: 'BYE', action: 'exit' }]),
      'utf-8'
    );

    const definitions = loadCommandDefinitions(file);

    expect(definitions).toHaveLength(1);
    expect(definitions[0]?.source).toBe(file);
  });

  it('raises IOError for a missing file', () => {
    expect(() =>
      loadCommandDefinitions(path.join(tempDir, 'missing.json'))
    ).toThrow(IOError);
  });
});
