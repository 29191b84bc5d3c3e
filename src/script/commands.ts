/**
 * Command table: the registry of verb / verb-subcommand grammars
 *
 * Definitions are keyed by "VERB" or "VERB SUBCOMMAND". Loading merges into
 * the table and a later definition replaces an earlier one with the same key.
 */

import * as fs from 'fs';

import { z } from 'zod';

import { closestMatch } from '../utils/suggest.js';
import { ACTION_PARAMETERS } from './builtins.js';
import {
  CommandDefinitionParseError,
  IOError,
  UnknownCommandError,
  UnknownSubcommandError,
} from './errors.js';
import {
  ACTION_NAMES,
  type CommandDefinition,
  type CommandTable,
  type Slot,
} from './types.js';

// ============================================================
// REGISTRY
// ============================================================

export function commandKey(verb: string, subcommand?: string): string {
  return subcommand === undefined ? verb : `${verb} ${subcommand}`;
}

export function createCommandTable(
  definitions: CommandDefinition[] = []
): CommandTable {
  const table: CommandTable = { definitions: new Map() };
  mergeCommandDefinitions(table, definitions);
  return table;
}

/**
 * Merge definitions into the table, last-load-wins
 */
export function mergeCommandDefinitions(
  table: CommandTable,
  definitions: CommandDefinition[]
): void {
  for (const definition of definitions) {
    table.definitions.set(
      commandKey(definition.verb, definition.subcommand),
      definition
    );
  }
}

export function getCommand(
  table: CommandTable,
  verb: string,
  subcommand?: string
): CommandDefinition | undefined {
  return table.definitions.get(commandKey(verb, subcommand));
}

/**
 * Every verb in the table, in first-registration order
 */
export function listVerbs(table: CommandTable): string[] {
  const verbs = new Set<string>();
  for (const definition of table.definitions.values()) {
    verbs.add(definition.verb);
  }
  return [...verbs];
}

export function listSubcommands(table: CommandTable, verb: string): string[] {
  const subcommands: string[] = [];
  for (const definition of table.definitions.values()) {
    if (definition.verb === verb && definition.subcommand !== undefined) {
      subcommands.push(definition.subcommand);
    }
  }
  return subcommands;
}

export function isKnownVerb(table: CommandTable, word: string): boolean {
  for (const definition of table.definitions.values()) {
    if (definition.verb === word) return true;
  }
  return false;
}

/**
 * Pick the definition for a verb and the (possible) subcommand word after it.
 *
 * A matching "VERB SUB" entry wins, then a plain "VERB" entry. The subcommand
 * word alone decides; there is no backtracking between subcommands.
 */
export function resolveCommand(
  table: CommandTable,
  verb: string,
  candidate: string | undefined
): { definition: CommandDefinition; consumed: 1 | 2 } {
  if (candidate !== undefined) {
    const withSubcommand = getCommand(table, verb, candidate);
    if (withSubcommand) {
      return { definition: withSubcommand, consumed: 2 };
    }
  }

  const direct = getCommand(table, verb);
  if (direct) {
    return { definition: direct, consumed: 1 };
  }

  const subcommands = listSubcommands(table, verb);
  if (subcommands.length > 0) {
    throw new UnknownSubcommandError(
      verb,
      candidate ?? '(none)',
      subcommands
    );
  }

  throw new UnknownCommandError(verb, closestMatch(verb, listVerbs(table)));
}

// ============================================================
// DEFINITION FILES
// ============================================================

const keywordSchema = z
  .string()
  .regex(/^[A-Z][A-Z0-9_]*$/, 'must be an upper-case keyword');

const paramNameSchema = z
  .string()
  .regex(/^[A-Za-z_]\w*$/, 'must be an identifier');

const slotSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('keyword'), value: keywordSchema }),
  z.object({ type: z.literal('optional-keyword'), value: keywordSchema }),
  z.object({ type: z.literal('string'), name: paramNameSchema }),
  z.object({ type: z.literal('variable'), name: paramNameSchema }),
  z.object({ type: z.literal('word'), name: paramNameSchema }),
  z.object({ type: z.literal('typed-value'), name: paramNameSchema }),
]);

const definitionSchema = z.object({
  verb: keywordSchema,
  subcommand: keywordSchema.optional(),
  description: z.string().optional(),
  params: z.array(slotSchema).default([]),
  action: z.enum(ACTION_NAMES),
  steps: z.array(z.string()).optional(),
});

const definitionFileSchema = z.object({
  commands: z.array(definitionSchema),
});

type DefinitionEntry = z.infer<typeof definitionSchema>;

function paramSlots(params: Slot[]): Map<string, Slot> {
  const named = new Map<string, Slot>();
  for (const slot of params) {
    if (slot.type !== 'keyword' && slot.type !== 'optional-keyword') {
      named.set(slot.name, slot);
    }
  }
  return named;
}

/**
 * Check that a definition gives its action everything the action reads.
 * Returns a problem description, or null when the definition is usable.
 */
function checkDefinition(entry: DefinitionEntry): string | null {
  const label = commandKey(entry.verb, entry.subcommand);
  const named = paramSlots(entry.params);

  const names = entry.params.flatMap((slot) =>
    slot.type === 'keyword' || slot.type === 'optional-keyword'
      ? []
      : [slot.name]
  );
  if (new Set(names).size !== names.length) {
    return `${label}: duplicate parameter names`;
  }

  if (entry.action === 'sequence') {
    if (!entry.steps || entry.steps.length === 0) {
      return `${label}: a sequence needs at least one step`;
    }
    for (const step of entry.steps) {
      for (const match of step.matchAll(/\{([A-Za-z_]\w*)\}/g)) {
        const placeholder = match[1] ?? '';
        if (!named.has(placeholder)) {
          return `${label}: step uses unknown parameter {${placeholder}}`;
        }
      }
    }
    return null;
  }

  for (const [name, accepted] of Object.entries(
    ACTION_PARAMETERS[entry.action]
  )) {
    const slot = named.get(name);
    if (!slot) {
      return `${label}: action ${entry.action} needs parameter "${name}"`;
    }
    if (!accepted.includes(slot.type)) {
      return `${label}: parameter "${name}" must be ${accepted.join(' or ')}`;
    }
  }
  return null;
}

function toDefinition(entry: DefinitionEntry, source: string): CommandDefinition {
  const definition: CommandDefinition = {
    verb: entry.verb,
    params: entry.params,
    action: entry.action,
    source,
  };
  if (entry.subcommand !== undefined) definition.subcommand = entry.subcommand;
  if (entry.steps !== undefined) definition.steps = entry.steps;
  if (entry.description !== undefined) {
    definition.description = entry.description;
  }
  return definition;
}

/**
 * Parse the contents of a commands.json file
 */
export function parseCommandDefinitions(
  content: string,
  source: string
): CommandDefinition[] {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new CommandDefinitionParseError(source, msg);
  }

  const result = definitionFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new CommandDefinitionParseError(source, detail);
  }

  return result.data.commands.map((entry) => {
    const problem = checkDefinition(entry);
    if (problem) {
      throw new CommandDefinitionParseError(source, problem);
    }
    return toDefinition(entry, source);
  });
}

/**
 * Load an ordered list of definitions from a commands.json file
 */
export function loadCommandDefinitions(filePath: string): CommandDefinition[] {
  if (!fs.existsSync(filePath)) {
    throw new IOError(filePath, 'file not found');
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new IOError(filePath, msg, error);
  }

  return parseCommandDefinitions(content, filePath);
}
