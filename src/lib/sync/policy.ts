/**
 * Path policy: exclude and critical globs, binary classification
 */

import fs from 'fs';
import picomatch from 'picomatch';

export type ContentClass = 'text' | 'binary';

/**
 * Build a matcher for a glob list. Dotfiles match like any other file.
 */
export function createMatcher(globs: readonly string[]): (relativePath: string) => boolean {
  if (globs.length === 0) {
    return () => false;
  }
  const isMatch = picomatch([...globs], { dot: true });
  return (relativePath) => isMatch(toPosix(relativePath));
}

function toPosix(relativePath: string): string {
  return relativePath.replace(/\\/g, '/').replace(/^\.\//, '');
}

/**
 * Normalize an extracted path list: forward slashes, no blanks, no duplicates, sorted
 */
export function normalizePaths(paths: Iterable<string>): string[] {
  const unique = new Set<string>();
  for (const p of paths) {
    const normalized = toPosix(p.trim());
    if (normalized) unique.add(normalized);
  }
  return [...unique].sort();
}

/**
 * Drop every path matching any exclude glob
 */
export function filterPaths(paths: readonly string[], excludeGlobs: readonly string[]): string[] {
  const isExcluded = createMatcher(excludeGlobs);
  return paths.filter((p) => !isExcluded(p));
}

/**
 * Whether a path needs an explicit confirmation before it is overwritten
 */
export function isCritical(relativePath: string, criticalGlobs: readonly string[]): boolean {
  return createMatcher(criticalGlobs)(relativePath);
}

/**
 * Classify content as text or binary.
 * Binary means a NUL byte or a byte sequence that is not valid UTF-8; empty content is text.
 */
export function classify(bytes: Uint8Array): ContentClass {
  if (bytes.length === 0) {
    return 'text';
  }
  if (bytes.includes(0)) {
    return 'binary';
  }
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    return 'text';
  } catch {
    return 'binary';
  }
}

/**
 * Classify a file on disk
 */
export function classifyFile(filePath: string): ContentClass {
  return classify(fs.readFileSync(filePath));
}
