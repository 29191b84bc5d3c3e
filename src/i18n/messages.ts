/**
 * Localized message table
 *
 * messages.json maps a message key to its text per language:
 *   { "variable_set": { "ENGLISH": "...", "日本語": "..." } }
 * Templates use {name} placeholders.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { z } from 'zod';

import { IOError, NeshError, ScriptError } from '../script/errors.js';
import type { MessageKey, MessageParams } from '../types/messages.js';
import { DEFAULT_LANGUAGE, LANGUAGE_ALIASES } from '../utils/constants.js';

export interface MessageTable {
  /** message key -> language -> template */
  entries: Map<string, Map<string, string>>;
  /** Every language that appears in at least one entry */
  languages: Set<string>;
}

const messageFileSchema = z.record(z.string(), z.record(z.string(), z.string()));

/**
 * Path of the messages.json shipped with the package
 * (src/i18n and dist/i18n both sit two levels below the package root)
 */
export function bundledMessagesPath(): string {
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, '..', '..', 'messages', 'messages.json');
}

/**
 * Build a table from already-parsed message data
 */
export function createMessageTable(
  data: Record<string, Record<string, string>>
): MessageTable {
  const entries = new Map<string, Map<string, string>>();
  const languages = new Set<string>();

  for (const [key, translations] of Object.entries(data)) {
    const byLanguage = new Map<string, string>();
    for (const [language, template] of Object.entries(translations)) {
      byLanguage.set(language, template);
      languages.add(language);
    }
    entries.set(key, byLanguage);
  }

  return { entries, languages };
}

/**
 * Load a messages.json file
 */
export function loadMessages(filePath: string): MessageTable {
  if (!fs.existsSync(filePath)) {
    throw new IOError(filePath, 'file not found');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new IOError(filePath, `cannot read messages: ${msg}`, error);
  }

  const result = messageFileSchema.safeParse(raw);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new IOError(filePath, `invalid messages file: ${detail}`);
  }

  return createMessageTable(result.data);
}

/**
 * Load the user's messages.json, or the bundled one when the user has none
 */
export function loadMessageTable(userPath: string): MessageTable {
  if (fs.existsSync(userPath)) {
    return loadMessages(userPath);
  }
  return loadMessages(bundledMessagesPath());
}

/**
 * Fill {name} placeholders; unknown placeholders stay as written
 */
export function fillTemplate(template: string, params: MessageParams): string {
  return template.replace(/\{(\w+)\}/g, (match, name: string) => {
    const value = params[name];
    return value === undefined ? match : String(value);
  });
}

/**
 * Render a message in the given language, falling back to ENGLISH and then
 * to the bare key
 */
export function formatMessage(
  table: MessageTable,
  language: string,
  key: MessageKey,
  params: MessageParams = {}
): string {
  const byLanguage = table.entries.get(key);
  const template =
    byLanguage?.get(language) ?? byLanguage?.get(DEFAULT_LANGUAGE) ?? key;
  return fillTemplate(template, params);
}

/**
 * Map a requested language name onto a language in the table.
 * Accepts the exact key, its upper-case form, and the english/japanese names.
 */
export function resolveLanguage(
  table: MessageTable,
  requested: string
): string | null {
  if (table.languages.has(requested)) return requested;

  const upper = requested.toUpperCase();
  if (table.languages.has(upper)) return upper;

  const alias = LANGUAGE_ALIASES[requested.toLowerCase()];
  if (alias && table.languages.has(alias)) return alias;

  return null;
}

/**
 * Render any thrown value as a user-facing line
 */
export function describeError(
  error: unknown,
  table: MessageTable,
  language: string
): string {
  if (error instanceof ScriptError) {
    return formatMessage(table, language, 'error_script', {
      ...error.params,
      detail: describeError(error.inner, table, language),
    });
  }
  if (error instanceof NeshError) {
    return formatMessage(table, language, error.messageKey, error.params);
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
