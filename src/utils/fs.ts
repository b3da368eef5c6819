import { promises as fs, constants as fsConstants } from 'fs';
import { join } from 'path';
import { parse as parseJsonc, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory (following symlinks)
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check if a path is a regular file (following symlinks)
 */
export async function isFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Recursively create directories. When a mode is given it applies to every
 * directory created by this call; existing ones are left untouched.
 */
export async function ensureDir(path: string, mode?: number): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true, mode });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Read a file as text, or '' when the path is not a regular file
 */
export async function readTextFileOrEmpty(path: string): Promise<string> {
  if (!(await isFile(path))) {
    return '';
  }
  return readTextFile(path);
}

/**
 * Recursively list the regular files below a directory, as paths relative to it.
 * Junk files (.DS_Store, Thumbs.db, ...) are skipped; symlinks count when they
 * point at a regular file. Results are sorted so walks are reproducible.
 */
export async function walkFiles(dirPath: string): Promise<string[]> {
  const results: string[] = [];

  async function recurse(relativeDir: string): Promise<void> {
    const absoluteDir = join(dirPath, relativeDir);
    let entries;
    try {
      entries = await fs.readdir(absoluteDir, { withFileTypes: true });
    } catch (error) {
      throw new FileSystemError(`Failed to walk directory: ${absoluteDir}`, { dirPath: absoluteDir, error });
    }

    for (const entry of entries) {
      if (isJunk(entry.name)) {
        continue;
      }
      const relativePath = relativeDir ? join(relativeDir, entry.name) : entry.name;
      if (entry.isDirectory()) {
        await recurse(relativePath);
      } else if (entry.isFile()) {
        results.push(relativePath);
      } else if (entry.isSymbolicLink() && (await isFile(join(dirPath, relativePath)))) {
        results.push(relativePath);
      }
    }
  }

  await recurse('');
  return results.sort();
}

/**
 * Read a JSONC file (JSON with Comments) and parse it.
 * Also handles standard JSON files.
 */
export async function readJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const reasons = errors.map((e) => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new FileSystemError(`Failed to parse JSONC file: ${path}`, { path, reasons });
  }
  return result;
}
