import * as fs from 'node:fs';
import * as path from 'node:path';

export interface FlagsweepConfig {
  // Patterns to ignore (added to defaults)
  ignore?: string[];

  // Extensions to search, e.g. [".swift"]; defaults to every supported one
  extensions?: string[];

  // Files processed at the same time
  concurrency?: number;
}

export interface ResolvedConfig {
  ignore: string[];
  extensions: string[];
  concurrency: number;
}

export const DEFAULT_CONCURRENCY = 8;

const CONFIG_FILES = ['.flagsweeprc', '.flagsweeprc.json', 'flagsweep.config.json'];

export function loadProjectConfig(rootDir: string): FlagsweepConfig {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(rootDir, configFile);
    if (fs.existsSync(configPath)) {
      try {
        const content = fs.readFileSync(configPath, 'utf-8');
        return toConfig(JSON.parse(content));
      } catch (error) {
        console.warn(`Warning: Failed to parse ${configFile}: ${error}`);
        return {};
      }
    }
  }

  // Also check package.json for "flagsweep" key
  const pkgPath = path.join(rootDir, 'package.json');
  if (fs.existsSync(pkgPath)) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
      if (isRecord(pkg) && pkg.flagsweep !== undefined) {
        return toConfig(pkg.flagsweep);
      }
    } catch (error) {
      console.warn(`Warning: Failed to parse package.json: ${error}`);
    }
  }

  return {};
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

/** Keep the fields that have the right shape, drop the rest */
function toConfig(raw: unknown): FlagsweepConfig {
  if (!isRecord(raw)) return {};

  const config: FlagsweepConfig = {};
  if (isStringArray(raw.ignore)) config.ignore = raw.ignore;
  if (isStringArray(raw.extensions)) {
    config.extensions = raw.extensions.map((ext) => (ext.startsWith('.') ? ext : `.${ext}`).toLowerCase());
  }
  if (isPositiveInteger(raw.concurrency)) config.concurrency = raw.concurrency;
  return config;
}

export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Fill in defaults. `fallbackConcurrency` comes from the environment or the
 * global settings and only applies when the project does not set one.
 */
export function mergeWithDefaults(
  config: FlagsweepConfig,
  supportedExtensions: string[],
  fallbackConcurrency?: number
): ResolvedConfig {
  const extensions = config.extensions
    ? config.extensions.filter((ext) => supportedExtensions.includes(ext))
    : supportedExtensions;

  return {
    ignore: config.ignore || [],
    extensions,
    concurrency: config.concurrency ?? fallbackConcurrency ?? DEFAULT_CONCURRENCY,
  };
}
