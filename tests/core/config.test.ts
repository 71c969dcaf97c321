import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { DEFAULT_CONCURRENCY, loadProjectConfig, mergeWithDefaults } from '../../src/core/config.js';

const SUPPORTED = ['.swift', '.m', '.mm', '.h'];

describe('Config', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'flagsweep-test-'));
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadProjectConfig', () => {
    it('returns empty config when no config file exists', () => {
      const config = loadProjectConfig(tempDir);
      expect(config).toEqual({});
    });

    it('loads .flagsweeprc file', () => {
      const configContent = {
        ignore: ['Generated'],
        extensions: ['.swift'],
      };
      fs.writeFileSync(path.join(tempDir, '.flagsweeprc'), JSON.stringify(configContent));

      const config = loadProjectConfig(tempDir);
      expect(config).toEqual(configContent);
    });

    it('loads .flagsweeprc.json file', () => {
      const configContent = {
        concurrency: 4,
      };
      fs.writeFileSync(path.join(tempDir, '.flagsweeprc.json'), JSON.stringify(configContent));

      const config = loadProjectConfig(tempDir);
      expect(config).toEqual(configContent);
    });

    it('loads flagsweep.config.json file', () => {
      const configContent = {
        ignore: ['Vendor'],
      };
      fs.writeFileSync(path.join(tempDir, 'flagsweep.config.json'), JSON.stringify(configContent));

      const config = loadProjectConfig(tempDir);
      expect(config).toEqual(configContent);
    });

    it('loads config from package.json flagsweep key', () => {
      const packageContent = {
        name: 'test-package',
        flagsweep: {
          ignore: ['Fixtures'],
          concurrency: 2,
        },
      };
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify(packageContent));

      const config = loadProjectConfig(tempDir);
      expect(config).toEqual(packageContent.flagsweep);
    });

    it('prefers .flagsweeprc over package.json', () => {
      const rcContent = { ignore: ['from-rc'] };
      const packageContent = {
        name: 'test',
        flagsweep: { ignore: ['from-package'] },
      };

      fs.writeFileSync(path.join(tempDir, '.flagsweeprc'), JSON.stringify(rcContent));
      fs.writeFileSync(path.join(tempDir, 'package.json'), JSON.stringify(packageContent));

      const config = loadProjectConfig(tempDir);
      expect(config.ignore).toEqual(['from-rc']);
    });

    it('normalizes extensions and drops fields with the wrong shape', () => {
      fs.writeFileSync(
        path.join(tempDir, '.flagsweeprc'),
        JSON.stringify({ extensions: ['SWIFT', '.M'], ignore: 'Pods', concurrency: 0 })
      );

      const config = loadProjectConfig(tempDir);
      expect(config).toEqual({ extensions: ['.swift', '.m'] });
    });

    it('handles invalid JSON gracefully', () => {
      fs.writeFileSync(path.join(tempDir, '.flagsweeprc'), 'not valid json');

      // Should not throw, returns empty config
      const config = loadProjectConfig(tempDir);
      expect(config).toEqual({});
      expect(console.warn).toHaveBeenCalledTimes(1);
    });

    it('handles invalid package.json gracefully', () => {
      fs.writeFileSync(path.join(tempDir, 'package.json'), 'not valid json');

      const config = loadProjectConfig(tempDir);
      expect(config).toEqual({});
    });
  });

  describe('mergeWithDefaults', () => {
    it('returns defaults when config is empty', () => {
      const result = mergeWithDefaults({}, SUPPORTED);

      expect(result).toEqual({ ignore: [], extensions: SUPPORTED, concurrency: DEFAULT_CONCURRENCY });
    });

    it('uses provided ignore patterns', () => {
      const result = mergeWithDefaults({ ignore: ['Generated'] }, SUPPORTED);

      expect(result.ignore).toEqual(['Generated']);
    });

    it('keeps only supported extensions', () => {
      const result = mergeWithDefaults({ extensions: ['.swift', '.kt'] }, SUPPORTED);

      expect(result.extensions).toEqual(['.swift']);
    });

    it('prefers project concurrency over the fallback', () => {
      expect(mergeWithDefaults({ concurrency: 3 }, SUPPORTED, 12).concurrency).toBe(3);
      expect(mergeWithDefaults({}, SUPPORTED, 12).concurrency).toBe(12);
    });
  });
});
