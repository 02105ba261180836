/**
 * Path resolution confined to the archive root
 */

import * as fs from 'fs/promises';
import * as path from 'path';

function isInside(root: string, target: string): boolean {
  const relative = path.relative(root, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export type ResolvedEntry =
  | { kind: 'outside' }
  | { kind: 'missing'; absolutePath: string }
  | { kind: 'directory'; absolutePath: string }
  | { kind: 'file'; absolutePath: string; size: number };

/**
 * Resolve `requested` against `archiveRoot` and classify the result.
 *
 * `..` segments and absolute paths that land outside the root are
 * reported as `outside`, and so are symlinks whose target lies outside.
 */
export async function resolveInArchive(archiveRoot: string, requested: string): Promise<ResolvedEntry> {
  const root = path.resolve(archiveRoot);
  const candidate = path.resolve(root, requested);
  if (!isInside(root, candidate)) {
    return { kind: 'outside' };
  }

  let realRoot: string;
  let realCandidate: string;
  try {
    realRoot = await fs.realpath(root);
    realCandidate = await fs.realpath(candidate);
  } catch {
    return { kind: 'missing', absolutePath: candidate };
  }

  if (!isInside(realRoot, realCandidate)) {
    return { kind: 'outside' };
  }

  const stats = await fs.stat(realCandidate);
  if (stats.isDirectory()) {
    return { kind: 'directory', absolutePath: realCandidate };
  }
  return { kind: 'file', absolutePath: realCandidate, size: stats.size };
}
