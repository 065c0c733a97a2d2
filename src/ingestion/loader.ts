/**
 * Document loader: reads text and markdown files below a directory.
 */

import { promises as fs } from 'node:fs';
import { basename, extname, join, relative, sep } from 'node:path';
import { describeError } from '../core/errors.js';
import { silentLogger, type Logger } from '../types/logger.js';
import type { Document } from '../types/index.js';

export const DEFAULT_EXTENSIONS = ['.txt', '.md', '.markdown'];

export interface LoadOptions {
  /** File extensions to load, case-insensitive (default: .txt, .md, .markdown) */
  extensions?: string[];
  /** Clock used for `createdAt` */
  now?: () => Date;
  logger?: Logger;
}

/**
 * Recursively load every matching file below `directory`, in path order.
 * A missing directory yields no documents.
 */
export async function loadDocuments(directory: string, options: LoadOptions = {}): Promise<Document[]> {
  const logger = options.logger ?? silentLogger;
  const extensions = new Set((options.extensions ?? DEFAULT_EXTENSIONS).map((ext) => ext.toLowerCase()));
  const now = options.now ?? (() => new Date());

  try {
    const stat = await fs.stat(directory);
    if (!stat.isDirectory()) {
      logger.warn({ directory }, `Not a directory: ${directory}`);
      return [];
    }
  } catch (error) {
    logger.warn({ directory, err: error }, `Directory does not exist: ${directory}`);
    return [];
  }

  const files = (await walk(directory))
    .filter((file) => extensions.has(extname(file).toLowerCase()))
    .sort();

  const documents: Document[] = [];
  for (const file of files) {
    try {
      const text = await fs.readFile(file, 'utf-8');
      documents.push({
        text,
        metadata: {
          source: relative(directory, file).split(sep).join('/'),
          title: basename(file, extname(file)),
          createdAt: now().toISOString(),
        },
      });
      logger.debug({ file }, 'Loaded document');
    } catch (error) {
      logger.error({ file, err: error }, `Error loading ${file}: ${describeError(error)}`);
    }
  }

  logger.info({ directory, documents: documents.length }, `Loaded ${documents.length} documents`);
  return documents;
}

async function walk(directory: string): Promise<string[]> {
  const entries = await fs.readdir(directory, { withFileTypes: true });
  const files: string[] = [];

  for (const entry of entries) {
    const path = join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(path)));
    } else if (entry.isFile()) {
      files.push(path);
    }
  }

  return files;
}
