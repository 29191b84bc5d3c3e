/**
 * Alias table
 */

import { DuplicateAliasError } from './errors.js';
import type { AliasTable } from './types.js';

export function createAliasTable(): AliasTable {
  return { named: new Map() };
}

/**
 * Register an alias (CREATE ALIAS). Aliases cannot be redefined.
 */
export function defineAlias(
  table: AliasTable,
  name: string,
  expansion: string
): void {
  if (table.named.has(name)) {
    throw new DuplicateAliasError(name);
  }
  table.named.set(name, expansion);
}

/**
 * Substitute an alias for the first word of a line.
 *
 * Anything after the alias name is appended to the expansion. The result is
 * never looked up again, so an alias naming itself (or another alias) cannot
 * loop.
 */
export function expandAlias(
  line: string,
  table: AliasTable
): { text: string; alias: string | null } {
  const trimmed = line.trim();
  const match = /^(\S+)(\s+[\s\S]*)?$/.exec(trimmed);
  const head = match?.[1];
  if (head === undefined) {
    return { text: trimmed, alias: null };
  }

  const expansion = table.named.get(head);
  if (expansion === undefined) {
    return { text: trimmed, alias: null };
  }

  const rest = match?.[2] ?? '';
  return { text: `${expansion}${rest}`, alias: head };
}
