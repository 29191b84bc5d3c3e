import * as os from 'os';
import * as path from 'path';

import { describe, expect, it } from 'vitest';

import { resolveConfig } from '../../src/types/shell.js';

describe('resolveConfig', () => {
  it('uses ~/.nesh and ~/.neshrc by default', () => {
    const config = resolveConfig({}, {});
    const home = path.join(os.homedir(), '.nesh');

    expect(config).toEqual({
      homeDir: home,
      rcPath: path.join(os.homedir(), '.neshrc'),
      commandsPath: path.join(home, 'commands.json'),
      messagesPath: path.join(home, 'messages.json'),
      logDir: path.join(home, 'logs'),
      enableLog: true,
      language: 'ENGLISH',
      verbosity: 'normal',
      nestedExit: 'shell',
      substitutionOrder: 'alias-first',
      scriptErrorMode: 'stop',
    });
  });

  it('takes the home directory from NESH_HOME', () => {
    const config = resolveConfig({}, { NESH_HOME: '/srv/nesh' });

    expect(config.homeDir).toBe('/srv/nesh');
    expect(config.commandsPath).toBe(path.join('/srv/nesh', 'commands.json'));
  });

  it('prefers the --home override over NESH_HOME', () => {
    const config = resolveConfig(
      { homeDir: '/opt/nesh', rcPath: null },
      { NESH_HOME: '/srv/nesh' }
    );

    expect(config.homeDir).toBe('/opt/nesh');
    expect(config.rcPath).toBeNull();
  });
});
