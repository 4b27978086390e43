import path from 'path';

/**
 * True when `targetPath` resolves to `baseDir` itself or somewhere below it.
 */
export function isWithinBase(targetPath: string, baseDir: string): boolean {
  const platform = process.platform;
  const baseResolved = platform === 'win32' ? path.win32.resolve(baseDir) : path.resolve(baseDir);
  const targetResolved = platform === 'win32' ? path.win32.resolve(targetPath) : path.resolve(targetPath);

  // Windows paths are case-insensitive. Normalize for comparison.
  const base = platform === 'win32' ? baseResolved.toLowerCase() : baseResolved;
  const target = platform === 'win32' ? targetResolved.toLowerCase() : targetResolved;

  const rel = platform === 'win32' ? path.win32.relative(base, target) : path.relative(base, target);
  return !(rel === '..' || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel));
}

/**
 * Resolve `filePath` against `baseDir`, or `null` when it would escape it.
 */
export function resolveWithinBase(baseDir: string, filePath: string): string | null {
  const resolved = path.resolve(baseDir, filePath);
  return isWithinBase(resolved, baseDir) ? resolved : null;
}
