/**
 * Shared formatting utilities
 */

import * as os from 'os';
import * as path from 'path';

import { SIZE_THRESHOLD_K, SIZE_THRESHOLD_M } from './constants.js';

/**
 * Format character count for display
 * @param chars - Number of characters
 * @returns Formatted string: "N chars", "N.NK chars", or "N.NM chars"
 */
export function formatSize(chars: number): string {
  if (chars < SIZE_THRESHOLD_K) {
    return `${chars} chars`;
  } else if (chars < SIZE_THRESHOLD_M) {
    return `${(chars / SIZE_THRESHOLD_K).toFixed(1)}K chars`;
  }
  return `${(chars / SIZE_THRESHOLD_M).toFixed(1)}M chars`;
}

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Escape text so it can sit inside a "..." literal
 */
export function escapeQuoted(text: string): string {
  return text.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}
