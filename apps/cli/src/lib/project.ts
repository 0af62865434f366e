/**
 * Project Access
 */

import { resolve } from 'node:path';
import { ConnectionError } from '@edit-assist/core';
import { openProjectDocument, saveProjectDocument, type DocumentProject } from '@edit-assist/host';

export interface OpenedProject {
  filePath: string;
  project: DocumentProject;
  save: () => void;
}

export function openProject(path: string): OpenedProject {
  const filePath = resolve(path);
  const project = openProjectDocument(filePath).getCurrentProject();
  if (!project) {
    throw new ConnectionError('No project open', { filePath });
  }
  return {
    filePath,
    project,
    save: () => saveProjectDocument(project.document, filePath),
  };
}
