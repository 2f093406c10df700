import type { Dirent } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import { StorageError, hasErrorCode } from '../../shared/errors';

export const sanitizeSegment = (value: string): string =>
  value.replace(/[^a-z0-9_\-=.]/gi, '_').replace(/^\.+/, '_').slice(0, 80) || 'artifact';

export const guardPath = (root: string, target: string) => {
  const relative = path.relative(root, target);
  if (relative.startsWith('..') || path.isAbsolute(relative)) {
    throw new StorageError(target, `Attempted to write outside of persistence root: ${target}`);
  }
};

/** Writes through a temp file and rename so readers never observe a partial file. */
export const writeFileAtomic = async (target: string, contents: string): Promise<void> => {
  await fs.mkdir(path.dirname(target), { recursive: true });
  const temp = `${target}.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}.tmp`;
  try {
    await fs.writeFile(temp, contents, 'utf-8');
    await fs.rename(temp, target);
  } catch (error) {
    await fs.rm(temp, { force: true });
    throw error;
  }
};

export const readFileIfExists = async (target: string): Promise<string | null> => {
  try {
    return await fs.readFile(target, 'utf-8');
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return null;
    throw error;
  }
};

/** JSON files under `dir`, recursively and sorted; leftover `.tmp` files are removed. */
export const listJsonFiles = async (dir: string): Promise<string[]> => {
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (error) {
    if (hasErrorCode(error, 'ENOENT')) return [];
    throw error;
  }
  const files: string[] = [];
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await listJsonFiles(full)));
    } else if (entry.name.endsWith('.tmp')) {
      // interrupted write
      await fs.rm(full, { force: true });
    } else if (entry.name.endsWith('.json')) {
      files.push(full);
    }
  }
  return files.sort();
};
