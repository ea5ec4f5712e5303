import { statSync } from 'fs';
import { readFile } from 'fs/promises';
import { basename, resolve } from 'path';
import type { DataSource } from './datasetCache';

/** A workbook on disk, versioned by modification time and size */
export const fileSource = (path: string): DataSource => {
  const absolutePath = resolve(path);
  return {
    id: absolutePath,
    name: basename(absolutePath),
    version: () => {
      const stats = statSync(absolutePath);
      return `${stats.mtimeMs}:${stats.size}`;
    },
    read: () => readFile(absolutePath),
  };
};
