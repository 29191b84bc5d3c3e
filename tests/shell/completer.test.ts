import { beforeEach, describe, expect, it } from 'vitest';

import type { InterpreterState } from '../../src/core/context.js';
import { complete } from '../../src/shell/completer.js';
import { createTestContext } from '../helpers/mocks.js';

describe('complete', () => {
  let state: InterpreterState;

  beforeEach(() => {
    state = createTestContext().state;
  });

  it('completes verbs for the first word', () => {
    expect(complete('CR', state)).toEqual([['CREATE'], 'CR']);
    expect(complete('S', state)).toEqual([['SAVE', 'SET', 'SLEEP'], 'S']);
  });

  it('offers aliases with the verbs', () => {
    state.aliases.named.set('gs', 'git status');

    expect(complete('g', state)).toEqual([['gs'], 'g']);
  });

  it('completes subcommands for the second word', () => {
    expect(complete('CREATE ', state)).toEqual([
      ['ALIAS', 'CMD', 'DIR', 'VAR'],
      '',
    ]);
    expect(complete('RUN N', state)).toEqual([['NESH'], 'N']);
  });

  it('completes keywords and kinds later in the line', () => {
    expect(complete('CREATE VAR $X WITH T', state)).toEqual([
      ['TEXT', 'TRUE', 'TYPE'],
      'T',
    ]);
  });

  it('completes variable names', () => {
    state.variables.named.set('PATH_X', {
      kind: 'TEXT',
      name: 'PATH_X',
      segments: [],
    });

    expect(complete('APPEND "x" TO $', state)).toEqual([['$PATH_X'], '$']);
  });

  it('returns nothing for an unknown verb', () => {
    expect(complete('ls ', state)).toEqual([[], '']);
  });
});
