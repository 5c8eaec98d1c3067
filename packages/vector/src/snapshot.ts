import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { pino } from 'pino';
import { IndexBuildError, errorMessage, type Embedder } from '@rioplatense/core';
import { MemoryVectorIndex, type MemoryVectorIndexOptions } from './memory-index.js';

const logger = pino({ level: process.env.LOG_LEVEL || 'info' });

export async function saveIndexSnapshot(index: MemoryVectorIndex, path: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(index.toSnapshot()));
  logger.info({ event: 'index.snapshot.saved', path, documents: index.size() }, `Saved index snapshot to ${path}`);
}

/**
 * Returns null when no snapshot exists at `path`
 *
 * @throws IndexBuildError for an unreadable or invalid snapshot
 */
export async function loadIndexSnapshot(
  path: string,
  embedder: Embedder,
  options: MemoryVectorIndexOptions = {}
): Promise<MemoryVectorIndex | null> {
  if (!existsSync(path)) {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(await readFile(path, 'utf-8'));
  } catch (error) {
    throw new IndexBuildError(`Could not read index snapshot ${path}: ${errorMessage(error)}`, { cause: error });
  }

  const index = MemoryVectorIndex.fromSnapshot(embedder, data, options);
  logger.info({ event: 'index.snapshot.loaded', path, documents: index.size() }, `Loaded index snapshot from ${path}`);
  return index;
}
