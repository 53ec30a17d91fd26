/**
 * Template Signature Store
 *
 * Loads the reference database from a directory of signature documents.
 * Malformed documents are skipped; only an unusable directory is an error.
 */

import fs from 'fs';
import path from 'path';
import { SignatureDirectoryError } from '../errors';
import { logger } from '../logger';
import { signatureFilesSkippedCounter, templatesLoadedGauge } from '../metrics';
import { validateSignatureDocument } from '../schemas';
import type { TemplateDatabase, TemplateSignatureDocument } from '../types';
import type { DetectionCache } from './cache';

export interface SkippedSignatureFile {
  file: string;
  reason: string;
}

export interface TemplateDatabaseReport {
  database: TemplateDatabase;
  skipped: SkippedSignatureFile[];
}

export interface LoadTemplateDatabaseOptions {
  cache?: DetectionCache;
}

async function listSignatureFiles(signaturesDir: string): Promise<string[]> {
  let stat: fs.Stats;
  try {
    stat = await fs.promises.stat(signaturesDir);
  } catch {
    throw new SignatureDirectoryError(signaturesDir, 'does not exist');
  }
  if (!stat.isDirectory()) {
    throw new SignatureDirectoryError(signaturesDir, 'is not a directory');
  }

  const entries = await fs.promises.readdir(signaturesDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
    .map((entry) => entry.name)
    .sort();
}

async function readSignatureFile(
  filePath: string
): Promise<{ document: TemplateSignatureDocument } | { reason: string }> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(await fs.promises.readFile(filePath, 'utf-8'));
  } catch (err) {
    return { reason: err instanceof Error ? err.message : String(err) };
  }

  const result = validateSignatureDocument(parsed);
  if (!result.valid) {
    return { reason: `schema validation failed: ${result.errors.join('; ')}` };
  }
  return { document: result.value };
}

/**
 * Load every *.json signature document in the directory, in file name
 * order, and report the ones that were skipped.
 */
export async function loadTemplateDatabaseWithReport(signaturesDir: string): Promise<TemplateDatabaseReport> {
  const files = await listSignatureFiles(signaturesDir);
  const database = new Map<string, TemplateSignatureDocument>();
  const skipped: SkippedSignatureFile[] = [];

  for (const file of files) {
    const loaded = await readSignatureFile(path.join(signaturesDir, file));

    if ('reason' in loaded) {
      skipped.push({ file, reason: loaded.reason });
      signatureFilesSkippedCounter.inc();
      logger.warn('Skipping malformed signature file', { file, reason: loaded.reason });
      continue;
    }

    const templateId = loaded.document.template_id;
    if (database.has(templateId)) {
      logger.warn('Duplicate template_id, later file wins', { file, templateId });
      database.delete(templateId);
    }
    database.set(templateId, loaded.document);
  }

  templatesLoadedGauge.set(database.size);
  logger.info('Template database loaded', {
    signaturesDir,
    templates: database.size,
    skipped: skipped.length,
  });

  return { database, skipped };
}

/**
 * Load the template database, going through the cache's database slot when
 * a cache is supplied.
 */
export async function loadTemplateDatabase(
  signaturesDir: string,
  options: LoadTemplateDatabaseOptions = {}
): Promise<TemplateDatabase> {
  const cached = options.cache?.getTemplateDatabase();
  if (cached) {
    return cached;
  }

  const { database } = await loadTemplateDatabaseWithReport(signaturesDir);
  options.cache?.setTemplateDatabase(database);
  return database;
}
