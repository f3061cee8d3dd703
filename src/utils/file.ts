import fs from 'fs-extra';
import path from 'path';
import * as glob from 'glob';

export async function ensureDirectoryExists(dirPath: string): Promise<void> {
  await fs.ensureDir(dirPath);
}

export function isLogFile(filePath: string): boolean {
  return path.extname(filePath).toLowerCase() === '.txt';
}

/**
 * Absolute paths of the `.txt` files directly inside `folder`, in the order
 * the file system reports them. Callers that need a stable order sort the
 * detections, not the files.
 */
export async function findLogFiles(folder: string): Promise<string[]> {
  const matches = await glob.glob('*.txt', {
    cwd: folder,
    nodir: true,
    absolute: true,
    nocase: true
  });
  return matches.filter(isLogFile);
}

/**
 * Removes whatever a previous run left in `dirPath` and leaves an empty folder.
 */
export async function resetDirectory(dirPath: string): Promise<void> {
  await fs.emptyDir(dirPath);
}

export async function writeJsonFile(filePath: string, data: unknown): Promise<void> {
  await ensureDirectoryExists(path.dirname(filePath));
  await fs.writeJson(filePath, data, { spaces: 2 });
}
