/**
 * File system operations - reading, existence checks and globbing.
 *
 * Resolution runs synchronously during initialization, so most helpers
 * here are the sync forms.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';
import fg from 'fast-glob';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file synchronously.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a regular file exists (sync).
 */
export function fileExistsSync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check if a path is a readable directory (sync).
 */
export function isDirectorySync(dirPath: string): boolean {
  try {
    if (!fs.statSync(dirPath).isDirectory()) return false;
    fs.accessSync(dirPath, fs.constants.R_OK);
    return true;
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Find files matching glob patterns, sorted for a stable scan order.
 */
export function globFilesSync(
  patterns: string | string[],
  options: {
    cwd: string;
    ignore?: string[];
    absolute?: boolean;
  }
): string[] {
  const matches = fg.sync(patterns, {
    cwd: options.cwd,
    ignore: options.ignore ?? [],
    absolute: options.absolute ?? true,
    onlyFiles: true,
    dot: false,
  });
  return matches.sort();
}

/**
 * Whether `candidate` is `parent` itself or lies underneath it.
 */
export function isPathInside(parent: string, candidate: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(candidate));
  if (relative === '') return true;
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}
