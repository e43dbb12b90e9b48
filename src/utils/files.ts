import { mkdirSync, renameSync, rmSync, writeFileSync } from 'fs';
import { dirname, join, basename } from 'path';

/**
 * Writes through a temporary sibling file and renames it into place, so the
 * target is either fully written or left untouched.
 */
export function writeFileAtomic(filePath: string, contents: string | Uint8Array): void {
  const directory = dirname(filePath);
  mkdirSync(directory, { recursive: true });

  const tempPath = join(directory, `.${basename(filePath)}.${process.pid}.tmp`);
  try {
    writeFileSync(tempPath, contents);
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw error;
  }
}
