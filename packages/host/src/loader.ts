/**
 * Project Document Loader
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { ConnectionError } from '@edit-assist/core';
import { createLogger } from '@edit-assist/utils';
import { DocumentApplication, DocumentProject } from './documentHost.js';
import { projectDocumentSchema, type ProjectDocument } from './schema.js';

const log = createLogger({ module: 'document-loader' });

/**
 * Validate a raw project document and wrap it in a host.
 * Throws ConnectionError when the document cannot serve as a project.
 */
export function createDocumentHost(input: unknown, source = 'document'): DocumentApplication {
  const parsed = projectDocumentSchema.safeParse(input);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first?.path.join('.') || 'root';
    throw new ConnectionError(
      `Project ${source} is not a valid project document (${where}: ${first?.message ?? 'invalid'})`,
      { source, issues: parsed.error.issues.length }
    );
  }
  return new DocumentApplication(new DocumentProject(parsed.data));
}

export function openProjectDocument(filePath: string): DocumentApplication {
  if (!existsSync(filePath)) {
    throw new ConnectionError(`Project file not found: ${filePath}`, { filePath });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConnectionError(
      `Could not read project file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      { filePath }
    );
  }

  const host = createDocumentHost(raw, filePath);
  log.debug({ filePath }, 'Project document opened');
  return host;
}

export function saveProjectDocument(document: ProjectDocument, filePath: string): void {
  writeFileSync(filePath, `${JSON.stringify(document, null, 2)}\n`, 'utf-8');
  log.debug({ filePath }, 'Project document saved');
}
