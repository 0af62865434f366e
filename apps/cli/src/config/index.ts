/**
 * CLI Configuration
 */

import { SettingsStore } from '@edit-assist/core';
import { settingsFilePath } from './env.js';

export function openSettingsStore(): SettingsStore {
  return new SettingsStore(settingsFilePath());
}
