import { homedir } from 'node:os';
import { join, resolve } from 'node:path';
import { describe, expect, it } from 'vitest';
import { DEFAULT_SETTINGS_FILE, settingsFilePath } from '../src/config/env.js';

describe('settingsFilePath', () => {
  it('defaults to the settings file in the home directory', () => {
    expect(settingsFilePath({ NODE_ENV: 'test', LOG_LEVEL: 'silent' })).toBe(
      join(homedir(), '.edit-assist', 'settings.json')
    );
    expect(DEFAULT_SETTINGS_FILE).toBe(join(homedir(), '.edit-assist', 'settings.json'));
  });

  it('resolves an override against the working directory', () => {
    expect(
      settingsFilePath({
        NODE_ENV: 'test',
        LOG_LEVEL: 'silent',
        EDIT_ASSIST_SETTINGS: 'config/qc.json',
      })
    ).toBe(resolve('config/qc.json'));
  });
});
