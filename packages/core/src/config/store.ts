/**
 * Settings Store
 *
 * JSON file persistence for the settings blob. Reading never writes;
 * the file only changes on an explicit save (the commit step of a run,
 * or the config command).
 */

import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { createLogger } from '@edit-assist/utils';
import { SettingsError } from '../errors/index.js';
import {
  defaultSettingsFile,
  parseSettingsFile,
  toSettings,
  type Settings,
  type SettingsFile,
} from './settings.js';

const log = createLogger({ module: 'settings-store' });

export class SettingsStore {
  constructor(readonly filePath: string) {}

  exists(): boolean {
    return existsSync(this.filePath);
  }

  /**
   * Stored settings with defaults filled in. A missing file yields the
   * defaults; an unreadable or invalid one throws SettingsError.
   */
  loadFile(): SettingsFile {
    if (!this.exists()) {
      return { ...defaultSettingsFile };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.filePath, 'utf-8'));
    } catch (error) {
      throw new SettingsError(
        'file',
        `${this.filePath} is not valid JSON (${error instanceof Error ? error.message : String(error)})`
      );
    }
    return parseSettingsFile(raw);
  }

  load(): Settings {
    return toSettings(this.loadFile());
  }

  save(file: SettingsFile): void {
    mkdirSync(dirname(this.filePath), { recursive: true });
    writeFileSync(this.filePath, `${JSON.stringify(file, null, 2)}\n`);
    log.debug({ path: this.filePath }, 'Settings saved');
  }

  reset(): SettingsFile {
    const file = { ...defaultSettingsFile };
    this.save(file);
    return file;
  }
}
