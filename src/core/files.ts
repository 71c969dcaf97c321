import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * The file operations a sweep needs. The batch runner only talks to this
 * interface, so tests can drive it with an in-memory fake.
 */
export interface SourceFileSystem {
  readFile(filePath: string): Promise<string>;
  /** Replace the file's contents so readers see either the old or the new text */
  writeFileAtomic(filePath: string, content: string): Promise<void>;
  removeFile(filePath: string): Promise<void>;
}

let tempCounter = 0;

async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const tempPath = path.join(
    path.dirname(filePath),
    `.${path.basename(filePath)}.${process.pid}.${tempCounter++}.tmp`
  );

  try {
    await fs.writeFile(tempPath, content, 'utf-8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

export const nodeFileSystem: SourceFileSystem = {
  readFile: (filePath) => fs.readFile(filePath, 'utf-8'),
  writeFileAtomic,
  removeFile: (filePath) => fs.unlink(filePath),
};
