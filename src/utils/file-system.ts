/**
 * File system operations - reading, checking and globbing.
 */
import * as fs from 'node:fs';
import fg from 'fast-glob';

/**
 * Read a file synchronously as UTF-8.
 */
export function readFileSync(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

/**
 * Check if a regular file exists.
 */
export function fileExistsSync(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory.
 */
export function isDirectorySync(dirPath: string): boolean {
  try {
    return fs.statSync(dirPath).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

/**
 * Find files matching glob patterns. Results are absolute paths.
 */
export function globFilesSync(
  patterns: string | string[],
  options: { cwd?: string } = {}
): string[] {
  return fg.sync(patterns, {
    cwd: options.cwd || process.cwd(),
    absolute: true,
    onlyFiles: true,
  });
}
