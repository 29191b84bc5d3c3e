/**
 * File logging with ANSI stripping
 */

import * as fs from 'fs';
import * as path from 'path';

import { stripAnsi } from './colors.js';

/**
 * Shell event for structured logging
 */
export interface NeshEvent {
  type: 'nesh';
  event: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface Logger {
  log(msg: string): void;
  logEvent(event: Omit<NeshEvent, 'type' | 'timestamp'>): void;
  close(): void;
  filePath: string | null;
}

/**
 * Logger that discards everything (--no-log)
 */
export function createNullLogger(): Logger {
  return {
    log: () => undefined,
    logEvent: () => undefined,
    close: () => undefined,
    filePath: null,
  };
}

/**
 * Create a logger that writes to a timestamped log file
 */
export function createLogger(
  enabled: boolean,
  logDir: string,
  sessionName: string
): Logger {
  if (!enabled) {
    return createNullLogger();
  }

  // Ensure log directory exists
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }

  // Create timestamped filename
  const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
  const sanitizedName = path.basename(sessionName, path.extname(sessionName));
  const logFile = path.join(logDir, `${sanitizedName}-${timestamp}.log`);
  const logStream = fs.createWriteStream(logFile, { flags: 'a' });

  return {
    log(msg: string): void {
      const clean = stripAnsi(msg);
      logStream.write(clean + '\n');
    },
    logEvent(eventData: Omit<NeshEvent, 'type' | 'timestamp'>): void {
      const fullEvent = {
        type: 'nesh' as const,
        timestamp: new Date().toISOString(),
        ...eventData,
      };
      logStream.write(JSON.stringify(fullEvent) + '\n');
    },
    close(): void {
      logStream.end();
    },
    filePath: logFile,
  };
}
