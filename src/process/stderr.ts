/**
 * Named pipe that carries a PTY command's stderr past the capture
 *
 * A PTY merges both output streams into one terminal. The command line
 * redirects fd 2 into this FIFO instead, and everything read from it goes
 * straight to the target stream, so the recorded output holds stdout only.
 */

import { execFileSync } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

export interface StderrPipe {
  /** FIFO path the command opens for its stderr */
  path: string;
  /** Unblock the reader when the command exited without opening the FIFO */
  release(): void;
}

export function openStderrPipe(target: NodeJS.WritableStream): StderrPipe {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'nesh-'));
  const fifoPath = path.join(dir, 'stderr');
  const cleanup = (): void => fs.rmSync(dir, { recursive: true, force: true });

  try {
    execFileSync('mkfifo', [fifoPath]);
  } catch (error) {
    cleanup();
    throw error;
  }

  let opened = false;
  const reader = fs.createReadStream(fifoPath);
  reader.on('open', () => {
    opened = true;
  });
  reader.on('data', (chunk: Buffer | string) => {
    target.write(chunk);
  });
  reader.on('close', cleanup);
  reader.on('error', (error: Error) => {
    target.write(`${error.message}\n`);
    cleanup();
  });

  return {
    path: fifoPath,
    release(): void {
      if (opened) return;
      // The reader is still blocked in open(); pair it with a writer that
      // closes at once so it sees end of file
      fs.open(fifoPath, 'w', (error, fd) => {
        if (error) {
          target.write(`${error.message}\n`);
          return;
        }
        fs.close(fd, cleanup);
      });
    },
  };
}
