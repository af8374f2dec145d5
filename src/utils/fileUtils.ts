import * as fs from 'node:fs';
import * as fsp from 'node:fs/promises';
import * as path from 'node:path';
import { randomBytes } from 'node:crypto';

/** The `code` of a Node system error, if `error` is one. */
export function errorCode(error: unknown): string | undefined {
  return error instanceof Error && 'code' in error && typeof error.code === 'string'
    ? error.code
    : undefined;
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fsp.access(filePath, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  try {
    await fsp.mkdir(dirPath, { recursive: true });
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') {
      throw error;
    }
  }
}

export async function readFile(filePath: string): Promise<string> {
  return fsp.readFile(filePath, 'utf-8');
}

/** Reads a text file, returning null when it does not exist. */
export async function readFileIfExists(
  filePath: string
): Promise<string | null> {
  try {
    return await readFile(filePath);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Writes `content` next to `filePath` under a unique temporary name and
 * returns that name. Pair with {@link commitTempFile}.
 */
export async function writeTempFile(
  filePath: string,
  content: string
): Promise<string> {
  const dir = path.dirname(filePath);
  await ensureDirectoryExists(dir);
  const tempPath = path.join(
    dir,
    `.${path.basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`
  );
  const handle = await fsp.open(tempPath, 'w');
  try {
    await handle.writeFile(content, 'utf-8');
    await handle.sync();
  } finally {
    await handle.close();
  }
  return tempPath;
}

/** Renames a temp file over its target; removes the temp file on failure. */
export async function commitTempFile(
  tempPath: string,
  filePath: string
): Promise<void> {
  try {
    await fsp.rename(tempPath, filePath);
  } catch (error) {
    await discardTempFile(tempPath);
    throw error;
  }
}

export async function discardTempFile(tempPath: string): Promise<void> {
  try {
    await fsp.rm(tempPath, { force: true });
  } catch (error) {
    console.warn(`Could not remove temporary file ${tempPath}:`, error);
  }
}

export async function atomicWriteFile(
  filePath: string,
  content: string
): Promise<void> {
  const tempPath = await writeTempFile(filePath, content);
  await commitTempFile(tempPath, filePath);
}

/**
 * Lists regular files below `directory`, recursively, as paths relative to
 * it. Entries accepted by `skip` are not descended into.
 */
export async function listFilesRecursive(
  directory: string,
  skip: (name: string, absolutePath: string) => boolean = () => false
): Promise<string[]> {
  const results: string[] = [];

  async function walk(current: string): Promise<void> {
    let entries: fs.Dirent[];
    try {
      entries = await fsp.readdir(current, { withFileTypes: true });
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return; // Directory doesn't exist, nothing to list
      }
      throw error;
    }

    for (const entry of entries) {
      const absolutePath = path.join(current, entry.name);
      if (skip(entry.name, absolutePath)) continue;
      if (entry.isDirectory()) {
        await walk(absolutePath);
      } else if (entry.isFile()) {
        results.push(path.relative(directory, absolutePath));
      }
    }
  }

  await walk(directory);
  return results;
}
