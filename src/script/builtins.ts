/**
 * Built-in Nesh Script grammar
 */

import type { BuiltinAction, CommandDefinition, SlotType } from './types.js';

const BUILTIN = 'builtin';

export const BUILTIN_COMMANDS: CommandDefinition[] = [
  {
    verb: 'CREATE',
    subcommand: 'DIR',
    params: [{ type: 'string', name: 'path' }],
    action: 'create-dir',
    description: 'Create a directory (and its parents)',
    source: BUILTIN,
  },
  {
    verb: 'CREATE',
    subcommand: 'VAR',
    params: [
      { type: 'variable', name: 'name' },
      { type: 'keyword', value: 'WITH' },
      { type: 'optional-keyword', value: 'TYPE' },
      { type: 'typed-value', name: 'value' },
    ],
    action: 'create-var',
    description: 'Define a TEXT, BOOL or OPTION variable',
    source: BUILTIN,
  },
  {
    verb: 'CREATE',
    subcommand: 'ALIAS',
    params: [
      { type: 'word', name: 'name' },
      { type: 'keyword', value: 'FOR' },
      { type: 'string', name: 'command' },
    ],
    action: 'create-alias',
    description: 'Define a shorthand for a command line',
    source: BUILTIN,
  },
  {
    verb: 'CREATE',
    subcommand: 'CMD',
    params: [
      { type: 'keyword', value: 'FROM' },
      { type: 'string', name: 'path' },
    ],
    action: 'load-commands',
    description: 'Load command definitions from a JSON file',
    source: BUILTIN,
  },
  {
    verb: 'APPEND',
    params: [
      { type: 'string', name: 'value' },
      { type: 'keyword', value: 'TO' },
      { type: 'variable', name: 'name' },
    ],
    action: 'append',
    description: 'Append a segment to a TEXT variable',
    source: BUILTIN,
  },
  {
    verb: 'SET',
    subcommand: 'LANGUAGE',
    params: [{ type: 'string', name: 'language' }],
    action: 'set-language',
    description: 'Change the display language',
    source: BUILTIN,
  },
  {
    verb: 'SET',
    subcommand: 'VAR',
    params: [
      { type: 'variable', name: 'name' },
      { type: 'keyword', value: 'WITH' },
      { type: 'optional-keyword', value: 'TYPE' },
      { type: 'typed-value', name: 'value' },
    ],
    action: 'set-var',
    description: 'Change the value of a variable',
    source: BUILTIN,
  },
  {
    verb: 'RUN',
    subcommand: 'CMD',
    params: [{ type: 'string', name: 'command' }],
    action: 'run-command',
    description: 'Run a system command and keep its output',
    source: BUILTIN,
  },
  {
    verb: 'RUN',
    subcommand: 'NESH',
    params: [
      { type: 'keyword', value: 'FROM' },
      { type: 'string', name: 'path' },
    ],
    action: 'run-script',
    description: 'Run a Nesh Script file',
    source: BUILTIN,
  },
  {
    verb: 'SAVE',
    params: [
      { type: 'optional-keyword', value: 'TO' },
      { type: 'string', name: 'path' },
    ],
    action: 'save',
    description: 'Write the last command output to a file',
    source: BUILTIN,
  },
  {
    verb: 'EXIT',
    params: [],
    action: 'exit',
    description: 'Leave the shell',
    source: BUILTIN,
  },
  {
    verb: 'SLEEP',
    params: [
      { type: 'keyword', value: 'WITH' },
      { type: 'keyword', value: 'SECOND' },
      { type: 'word', name: 'seconds' },
    ],
    action: 'sleep',
    description: 'Pause for a number of seconds',
    source: BUILTIN,
  },
  {
    verb: 'REFLESH',
    params: [],
    action: 'reload',
    description: 'Reload commands, messages and the RC file',
    source: BUILTIN,
  },
];

/**
 * Parameters each built-in action reads, with the slot types that may fill
 * them. Definitions loaded from files are checked against this.
 */
export const ACTION_PARAMETERS: Record<
  BuiltinAction,
  Record<string, SlotType[]>
> = {
  'create-dir': { path: ['string'] },
  'create-var': { name: ['variable'], value: ['typed-value'] },
  'create-alias': { name: ['word'], command: ['string'] },
  'load-commands': { path: ['string'] },
  append: { value: ['string'], name: ['variable'] },
  'set-language': { language: ['string', 'word'] },
  'set-var': { name: ['variable'], value: ['typed-value'] },
  'run-command': { command: ['string'] },
  'run-script': { path: ['string'] },
  save: { path: ['string'] },
  exit: {},
  sleep: { seconds: ['word', 'string'] },
  reload: {},
};
