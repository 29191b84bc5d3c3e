/**
 * Script file loading
 */

import * as fs from 'fs';

import { IOError } from './errors.js';
import type { ScriptLine } from './types.js';

/**
 * Check if a line is a comment or empty
 */
export function isCommentOrEmpty(line: string): boolean {
  const trimmed = line.trim();
  return trimmed === '' || trimmed.startsWith('#');
}

/**
 * Split script content into executable lines, keeping 1-based line numbers
 */
export function extractScriptLines(content: string): ScriptLine[] {
  const lines: ScriptLine[] = [];

  for (const [index, raw] of content.split(/\r?\n/).entries()) {
    if (isCommentOrEmpty(raw)) continue;
    lines.push({ lineNumber: index + 1, text: raw.trim() });
  }

  return lines;
}

/**
 * Load a Nesh Script file (RUN NESH FROM, the RC file, or a CLI script)
 *
 * @param scriptFile - Path to the script file
 * @returns Executable lines with their line numbers
 */
export function loadScript(scriptFile: string): ScriptLine[] {
  if (!fs.existsSync(scriptFile)) {
    throw new IOError(scriptFile, 'script not found');
  }

  let content: string;
  try {
    content = fs.readFileSync(scriptFile, 'utf-8');
  } catch (error) {
    const msg = error instanceof Error ? error.message : String(error);
    throw new IOError(scriptFile, msg, error);
  }

  return extractScriptLines(content);
}
