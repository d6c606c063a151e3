/**
 * File system operations - reading, writing, and directory listing.
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
 * Write content to a file, creating parent directories as needed.
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content, 'utf-8');
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
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Check whether a directory has no entries.
 */
export async function isDirectoryEmpty(dirPath: string): Promise<boolean> {
  const entries = await fs.promises.readdir(dirPath);
  return entries.length === 0;
}

/**
 * Ensure a directory exists, creating it if necessary.
 */
export async function ensureDir(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

export interface ListSubdirectoriesOptions {
  /** Include directories whose name starts with a dot (default: false) */
  includeHidden?: boolean;
}

/**
 * List the immediate sub-directories of a directory, sorted by name.
 */
export async function listSubdirectories(
  dirPath: string,
  options: ListSubdirectoriesOptions = {}
): Promise<string[]> {
  const names = await fg('*', {
    cwd: dirPath,
    onlyDirectories: true,
    deep: 1,
    dot: options.includeHidden ?? false,
  });
  return names.sort();
}

/**
 * Get file stats.
 */
export async function getStats(filePath: string): Promise<fs.Stats> {
  return fs.promises.stat(filePath);
}

/**
 * Normalize and resolve a path relative to a base.
 */
export function resolvePath(basePath: string, ...segments: string[]): string {
  return path.resolve(basePath, ...segments);
}

/**
 * Check that `target` is `root` itself or lies beneath it.
 */
export function isPathInside(root: string, target: string): boolean {
  const relative = path.relative(path.resolve(root), path.resolve(target));
  if (relative === '') return true;
  return relative !== '..' && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
}
