import { glob } from 'glob';
import { DEFAULT_CONCURRENCY } from './config.js';
import { nodeFileSystem, type SourceFileSystem } from './files.js';

/** Directories never worth searching in an Apple-platform project */
export const DEFAULT_IGNORE = ['.git', 'node_modules', '*.bundle', '.build', 'DerivedData', 'Pods'];

export interface SearchOptions {
  /** Directory to search */
  rootDir: string;
  /** Text every returned file must contain */
  flag: string;
  /** Extensions to include, with the leading dot */
  extensions: string[];
  /** Extra patterns to ignore (added to defaults) */
  ignore?: string[];
  /** Files read at the same time */
  concurrency?: number;
}

export interface SearchDependencies {
  fileSystem?: SourceFileSystem;
}

export interface SearchResult {
  /** Every source file with a wanted extension */
  sourceFiles: string[];
  /** The subset that mentions the flag, sorted */
  matchingFiles: string[];
}

export async function collectSourceFiles(
  rootDir: string,
  extensions: string[],
  ignore: string[] = []
): Promise<string[]> {
  if (extensions.length === 0) return [];

  const patterns = extensions.map((ext) => `**/*${ext}`);
  const ignorePatterns = [...DEFAULT_IGNORE, ...ignore].flatMap((p) => [`**/${p}`, `**/${p}/**`]);

  const files = await glob(patterns, {
    cwd: rootDir,
    absolute: true,
    nodir: true,
    dot: true,
    ignore: ignorePatterns,
  });

  return [...new Set(files)].sort();
}

/** Running out of file handles says nothing about the file itself */
function isResourceExhausted(error: unknown): boolean {
  return error instanceof Error && 'code' in error && (error.code === 'EMFILE' || error.code === 'ENFILE');
}

/**
 * Find source files under `rootDir` whose text contains the flag name.
 * Files that cannot be read are kept so the sweep reports them.
 */
export async function findFlaggedFiles(
  options: SearchOptions,
  deps: SearchDependencies = {}
): Promise<SearchResult> {
  const fileSystem = deps.fileSystem ?? nodeFileSystem;
  const batchSize = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const sourceFiles = await collectSourceFiles(options.rootDir, options.extensions, options.ignore);

  const mentionsFlag = async (filePath: string): Promise<boolean> => {
    try {
      const content = await fileSystem.readFile(filePath);
      return content.includes(options.flag);
    } catch (error) {
      if (isResourceExhausted(error)) throw error;
      return true;
    }
  };

  const matchingFiles: string[] = [];
  for (let i = 0; i < sourceFiles.length; i += batchSize) {
    const batch = sourceFiles.slice(i, i + batchSize);
    const matches = await Promise.all(batch.map(mentionsFlag));
    matchingFiles.push(...batch.filter((_, index) => matches[index]));
  }

  return { sourceFiles, matchingFiles };
}
