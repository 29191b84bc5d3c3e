import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  colorize,
  printError,
  printMessage,
  stripAnsi,
} from '../../src/output/colors.js';

describe('stripAnsi', () => {
  it('removes ANSI color codes', () => {
    const colored = '\x1b[31mRed Text\x1b[0m';
    expect(stripAnsi(colored)).toBe('Red Text');
  });

  it('handles multiple color codes', () => {
    const colored = '\x1b[1m\x1b[34mBold Blue\x1b[0m';
    expect(stripAnsi(colored)).toBe('Bold Blue');
  });

  it('returns plain text unchanged', () => {
    const plain = 'Plain text';
    expect(stripAnsi(plain)).toBe('Plain text');
  });
});

describe('colorize', () => {
  it('wraps text in the color and a reset', () => {
    expect(colorize('~/src', 'cyan')).toBe('\x1b[36m~/src\x1b[0m');
  });
});

describe('printing', () => {
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prints messages to stdout as they are', () => {
    printMessage('Directory created: /tmp/x');

    expect(logSpy).toHaveBeenCalledWith('Directory created: /tmp/x');
  });

  it('prints errors to stderr in red', () => {
    printError('Undefined variable: $X');

    expect(errorSpy).toHaveBeenCalledWith(
      '\x1b[31mUndefined variable: $X\x1b[0m'
    );
  });
});
