/**
 * Tab completion for the interactive shell
 */

import type { InterpreterState } from '../core/context.js';
import { getCommand, listSubcommands, listVerbs } from '../script/commands.js';
import type { CommandDefinition } from '../script/types.js';
import { VARIABLE_KINDS } from '../script/types.js';
import { BOOL_FALSE, BOOL_TRUE } from '../utils/constants.js';

function keywordsOf(definition: CommandDefinition | undefined): string[] {
  if (!definition) return [];
  return definition.params.flatMap((slot) =>
    slot.type === 'keyword' || slot.type === 'optional-keyword'
      ? [slot.value]
      : []
  );
}

/**
 * Candidates for the word being typed, given the words before it
 */
function candidatesFor(words: string[], state: InterpreterState): string[] {
  const { commands, aliases, variables } = state;
  const [verb, second] = words;

  if (verb === undefined) {
    return [...listVerbs(commands), ...aliases.named.keys()];
  }
  if (second === undefined) {
    return listSubcommands(commands, verb);
  }

  const definition =
    getCommand(commands, verb, second) ?? getCommand(commands, verb);
  return [
    ...keywordsOf(definition),
    ...VARIABLE_KINDS,
    BOOL_TRUE,
    BOOL_FALSE,
    ...[...variables.named.keys()].map((name) => `$${name}`),
  ];
}

/**
 * readline completer: verbs and aliases first, then subcommands, then
 * keywords, kinds and $variables
 */
export function complete(
  line: string,
  state: InterpreterState
): [string[], string] {
  const words = line.trimStart().split(/\s+/);
  const current = words.pop() ?? '';

  const candidates = new Set(candidatesFor(words, state));
  const hits = [...candidates].filter((c) => c.startsWith(current)).sort();
  return [hits, current];
}
