// ============================================================================
// Collection Backup
// ============================================================================
// Dumps collections to <output_dir>/<collection>.json, one JSON array per
// collection. Output is restricted to the working directory or the OS temp
// directory.
// ============================================================================

import fs from 'fs/promises';
import path from 'path';
import { tmpdir } from 'os';
import type { DbHandle } from './arango.js';
import { log } from './config.js';
import { InvalidArgumentError, errorMessage } from './errors.js';

export interface BackupOptions {
  outputDir?: string;
  collections?: string[];
  docLimit?: number;
}

export interface BackupEntry {
  collection: string;
  path: string;
  count: number;
  error?: string;
}

export interface BackupReport {
  output_dir: string;
  written: BackupEntry[];
  total_collections: number;
  total_documents: number;
}

function isInside(child: string, parent: string): boolean {
  const rel = path.relative(parent, child);
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}

/**
 * Resolve a requested backup directory to an absolute path, rejecting
 * anything with `..` or outside the working and temp directories.
 */
export function validateOutputDirectory(outputDir: string): string {
  if (outputDir.includes('..')) {
    throw new InvalidArgumentError(`Invalid output directory: path traversal detected, '..' not allowed in '${outputDir}'`);
  }

  const absolute = path.resolve(outputDir);
  if (isInside(absolute, tmpdir()) || isInside(absolute, process.cwd())) {
    return absolute;
  }

  throw new InvalidArgumentError(
    `Invalid output directory: '${outputDir}' is not allowed. Must be within current working directory or temp directory.`
  );
}

/** Local time as YYYYMMDD_HHMMSS */
export function backupTimestamp(date: Date = new Date()): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/** One document per line inside a JSON array. */
export function formatDump(documents: unknown[]): string {
  if (documents.length === 0) return '[\n]';
  return '[' + documents.map(d => `\n  ${JSON.stringify(d)}`).join(',') + '\n]';
}

export async function backupCollectionsToDir(db: DbHandle, options: BackupOptions = {}): Promise<BackupReport> {
  const requested = options.outputDir?.trim() ? options.outputDir : path.join('backups', backupTimestamp());
  const outputDir = validateOutputDirectory(requested);
  await fs.mkdir(outputDir, { recursive: true });

  const existing = (await db.listCollections()).map(c => c.name);
  const targets = options.collections && options.collections.length > 0 ? options.collections : existing;

  const query = options.docLimit !== undefined
    ? 'FOR d IN @@collection LIMIT @limit RETURN d'
    : 'FOR d IN @@collection RETURN d';

  const written: BackupEntry[] = [];
  for (const name of targets) {
    // Unknown and system collections are skipped
    if (!existing.includes(name)) continue;

    const file = path.join(outputDir, `${name}.json`);
    try {
      const bindVars: Record<string, unknown> = { '@collection': name };
      if (options.docLimit !== undefined) bindVars.limit = options.docLimit;
      const documents = await db.query(query, bindVars);
      await fs.writeFile(file, formatDump(documents), 'utf-8');
      written.push({ collection: name, path: file, count: documents.length });
    } catch (err) {
      written.push({ collection: name, path: file, count: 0, error: errorMessage(err) });
    }
  }

  const report: BackupReport = {
    output_dir: outputDir,
    written,
    total_collections: written.length,
    total_documents: written.reduce((sum, entry) => sum + entry.count, 0),
  };
  log(`Backup: ${report.total_documents} document(s) from ${report.total_collections} collection(s) to ${outputDir}`);
  return report;
}
