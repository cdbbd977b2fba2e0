/**
 * Input Enumeration
 * 
 * Lists the tables and files staged in the data directory:
 *   <dataDir>/in/tables/<name>
 *   <dataDir>/in/files/<id>_<name> (+ optional <id>_<name>.manifest)
 *
 * Only the newest file per logical name is kept.
 */

import { readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { safeReadFile, createLogger, type Logger } from '@sftp-writer/utils';
import type { UploadTask } from '../types/task.js';

const MANIFEST_SUFFIX = '.manifest';

const fileManifestSchema = z.object({
  id: z.union([z.number(), z.string().regex(/^\d+$/).transform(Number)]),
  name: z.string().min(1),
}).passthrough();

interface FileEntry {
  id: number;
  name: string;
  sourcePath: string;
}

async function listRegularFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !entry.name.endsWith(MANIFEST_SUFFIX))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

/**
 * Split a staged file name of the form `<id>_<name>`
 */
export function parseStagedFileName(fileName: string): { id: number; name: string } {
  const match = /^(\d+)_(.+)$/.exec(fileName);
  if (match?.[1] && match[2]) {
    return { id: Number(match[1]), name: match[2] };
  }
  return { id: 0, name: fileName };
}

async function readFileEntry(dir: string, fileName: string, log: Logger): Promise<FileEntry> {
  const sourcePath = join(dir, fileName);
  const fallback = parseStagedFileName(fileName);
  const manifestContent = await safeReadFile(`${sourcePath}${MANIFEST_SUFFIX}`);

  if (manifestContent === null) {
    return { ...fallback, sourcePath };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(manifestContent);
  } catch (error) {
    log.warn({ err: error, fileName }, 'File manifest is not valid JSON, using file name');
    return { ...fallback, sourcePath };
  }

  const manifest = fileManifestSchema.safeParse(raw);
  if (!manifest.success) {
    log.warn({ fileName, issues: manifest.error.issues }, 'File manifest is incomplete, using file name');
    return { ...fallback, sourcePath };
  }

  return { id: manifest.data.id, name: manifest.data.name, sourcePath };
}

/**
 * Keep the entry with the highest id for every logical name
 */
export function selectLatestFiles<T extends { id: number; name: string }>(entries: T[]): T[] {
  const latest = new Map<string, T>();
  for (const entry of entries) {
    const current = latest.get(entry.name);
    if (!current || entry.id > current.id) {
      latest.set(entry.name, entry);
    }
  }
  return [...latest.values()].sort((a, b) => a.name.localeCompare(b.name));
}

export async function listInputTables(dataDir: string): Promise<UploadTask[]> {
  const dir = join(dataDir, 'in', 'tables');
  const names = await listRegularFiles(dir);
  return names.map(name => ({ sourcePath: join(dir, name), name, kind: 'table' as const }));
}

export async function listInputFiles(
  dataDir: string,
  options: { onlyLatest?: boolean; logger?: Logger } = {}
): Promise<UploadTask[]> {
  const log = options.logger ?? createLogger({ component: 'inputs' });
  const dir = join(dataDir, 'in', 'files');
  const fileNames = await listRegularFiles(dir);

  const entries: FileEntry[] = [];
  for (const fileName of fileNames) {
    entries.push(await readFileEntry(dir, fileName, log));
  }

  const selected = options.onlyLatest === false ? entries : selectLatestFiles(entries);
  return selected.map(entry => ({ sourcePath: entry.sourcePath, name: entry.name, kind: 'file' as const }));
}

/**
 * All upload tasks in upload order: tables, then files
 */
export async function enumerateInputs(
  dataDir: string,
  options: { logger?: Logger } = {}
): Promise<UploadTask[]> {
  const tables = await listInputTables(dataDir);
  const files = await listInputFiles(dataDir, { onlyLatest: true, logger: options.logger });
  return [...tables, ...files];
}
