import { stat } from 'node:fs/promises';
import path from 'node:path';

export type PathKind = 'file' | 'directory';

/** Prefix the CLI reads as "include this path's contents". */
export const REFERENCE_MARKER = '@';
export const DIRECTORY_SUFFIX = '/';

// A backslash is only a separator on Windows; on POSIX it can end a file name.
const TRAILING_SEPARATORS = path.sep === '\\' ? /[\\/]+$/ : /\/+$/;

export interface AnnotateOptions {
  /** Base for resolving relative paths during the probe. Defaults to process.cwd(). */
  cwd?: string;
  /** Skip the probe and annotate as this kind. */
  kind?: PathKind;
}

/**
 * Probes the filesystem on every call; nothing is cached. Missing or unreadable
 * paths count as files.
 */
export async function detectPathKind(target: string, cwd?: string): Promise<PathKind> {
  const resolved = path.resolve(cwd ?? process.cwd(), target);
  try {
    const stats = await stat(resolved);
    return stats.isDirectory() ? 'directory' : 'file';
  } catch {
    return 'file';
  }
}

export function formatReference(target: string, kind: PathKind): string {
  if (kind === 'file') return `${REFERENCE_MARKER}${target}`;
  const trimmed = target.replace(TRAILING_SEPARATORS, '');
  // A bare "/" trims to nothing; keep it as the root reference.
  return `${REFERENCE_MARKER}${trimmed}${DIRECTORY_SUFFIX}`;
}

export async function annotatePath(target: string, options: AnnotateOptions = {}): Promise<string> {
  const kind = options.kind ?? await detectPathKind(target, options.cwd);
  return formatReference(target, kind);
}

export async function annotatePaths(targets: readonly string[], options: AnnotateOptions = {}): Promise<string> {
  const tokens = await Promise.all(targets.map(t => annotatePath(t, options)));
  return tokens.join(' ');
}
