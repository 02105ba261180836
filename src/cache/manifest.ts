/**
 * Cache manifest (`.cache_version`) reading and writing
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { CacheManifest } from '../types/cache.js';

export const MANIFEST_FILE = '.cache_version';
export const CACHE_VERSION = '1.0';

/**
 * Only `completed` decides validity; the other fields are informational
 * and may be missing from manifests written by older releases.
 */
export const CacheManifestSchema = z.object({
  version: z.string().optional(),
  timestamp: z.string().optional(),
  base_url: z.string().optional(),
  file_count: z.number().int().min(0).optional(),
  completed: z.boolean().default(false),
});

export type StoredManifest = z.infer<typeof CacheManifestSchema>;

export function createManifest(baseUrl: string, fileCount: number, now: Date = new Date()): CacheManifest {
  return {
    version: CACHE_VERSION,
    timestamp: now.toISOString(),
    base_url: baseUrl,
    file_count: fileCount,
    completed: true,
  };
}

/**
 * Read and validate the manifest in `cacheDir`; null when absent or malformed
 */
export async function readManifest(cacheDir: string): Promise<StoredManifest | null> {
  let content: string;
  try {
    content = await fs.readFile(path.join(cacheDir, MANIFEST_FILE), 'utf-8');
  } catch {
    return null;
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch {
    return null;
  }

  const result = CacheManifestSchema.safeParse(data);
  return result.success ? result.data : null;
}

export async function writeManifest(dir: string, manifest: CacheManifest): Promise<void> {
  await fs.writeFile(path.join(dir, MANIFEST_FILE), JSON.stringify(manifest, null, 2));
}
