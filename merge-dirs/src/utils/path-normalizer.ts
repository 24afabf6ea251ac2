import path from 'node:path';

/**
 * Converts an absolute path under `root` to a forward-slash relative path
 * @example
 * toRelativePath('/data/photos', '/data/photos/2024/03/img.jpg')
 * // Returns: '2024/03/img.jpg'
 */
export function toRelativePath(root: string, absolutePath: string): string {
  return normalizeSeparators(path.relative(root, absolutePath));
}

export function normalizeSeparators(relativePath: string): string {
  return relativePath
    .replace(/\\/g, '/')
    .split('/')
    .filter(segment => segment.length > 0 && segment !== '.')
    .join('/');
}

/**
 * Appends one segment to a relative path; the root itself is the empty string
 */
export function joinRelative(parent: string, name: string): string {
  return parent === '' ? name : `${parent}/${name}`;
}

/**
 * Resolves a forward-slash relative path against a root using the host separator
 */
export function toNativePath(root: string, relativePath: string): string {
  return path.join(root, ...relativePath.split('/'));
}

/**
 * Key under which two relative paths are considered the same entry
 */
export function toComparisonKey(relativePath: string, caseSensitive: boolean): string {
  return caseSensitive ? relativePath : relativePath.toLowerCase();
}

/**
 * Default case sensitivity for the host filesystem
 */
export function hostIsCaseSensitive(platform: NodeJS.Platform = process.platform): boolean {
  return platform !== 'win32' && platform !== 'darwin';
}

/**
 * True when `child` is `parent` itself or lies somewhere below it
 */
export function isSameOrInside(parent: string, child: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  if (relative === '') {
    return true;
  }
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}

/** Relative path as shown in logs and reports */
export function displayPath(relativePath: string): string {
  return relativePath === '' ? '.' : relativePath;
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareKeys(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
