import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { loadOverrides, parseOverrideElements } from '../../../sources/overrides.js';
import { silentLogger, type Logger } from '../../../core/utils/logger.js';

function spyLogger(): Logger & { warn: ReturnType<typeof vi.fn> } {
  return { ...silentLogger, warn: vi.fn() };
}

describe('Override loader', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aerodrome-overrides-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('parseOverrideElements', () => {
    it('keeps well-typed elements and tags their source', () => {
      const { overrides, skipped } = parseOverrideElements(
        [{ icao: 'KJFK', timezone: 'America/Chicago' }, { icao: 'EGLL', name: null }],
        'fixes.json',
        silentLogger
      );

      expect(skipped).toBe(0);
      expect(overrides).toEqual([
        { icao: 'KJFK', timezone: 'America/Chicago', source: 'fixes.json' },
        { icao: 'EGLL', source: 'fixes.json' },
      ]);
    });

    it('skips non-objects and wrongly typed fields with a warning', () => {
      const logger = spyLogger();
      const { overrides, skipped } = parseOverrideElements(
        ['KJFK', { icao: 42 }, { icao: 'LFPG', country: 'FR' }],
        'fixes.json',
        logger
      );

      expect(skipped).toBe(2);
      expect(overrides).toEqual([{ icao: 'LFPG', country: 'FR', source: 'fixes.json' }]);
      expect(logger.warn).toHaveBeenCalledTimes(2);
    });

    it('leaves icao checking to reconciliation', () => {
      const { overrides } = parseOverrideElements([{ name: 'No code' }], 'x.json', silentLogger);
      expect(overrides).toEqual([{ name: 'No code', source: 'x.json' }]);
    });
  });

  describe('loadOverrides', () => {
    it('reads *.json files in file-name order', async () => {
      await writeFile(join(dir, 'b.json'), JSON.stringify([{ icao: 'EGLL', name: 'Heathrow' }]));
      await writeFile(join(dir, 'a.json'), JSON.stringify([{ icao: 'KJFK', timezone: 'America/Chicago' }]));
      await writeFile(join(dir, 'notes.txt'), 'ignored');

      const result = await loadOverrides(dir, silentLogger);

      expect(result.files).toBe(2);
      expect(result.overrides.map((o) => o.icao)).toEqual(['KJFK', 'EGLL']);
      expect(result.overrides[0].source).toBe('a.json');
    });

    it('skips unparsable and non-array files with a warning', async () => {
      const logger = spyLogger();
      await writeFile(join(dir, 'a.json'), '{ not json');
      await writeFile(join(dir, 'b.json'), JSON.stringify({ icao: 'KJFK' }));
      await writeFile(join(dir, 'c.json'), JSON.stringify([{ icao: 'LFPG' }, { icao: 7 }]));

      const result = await loadOverrides(dir, logger);

      expect(result.files).toBe(3);
      expect(result.skippedFiles).toBe(2);
      expect(result.skippedElements).toBe(1);
      expect(result.overrides).toEqual([{ icao: 'LFPG', source: 'c.json' }]);
      expect(logger.warn).toHaveBeenCalledTimes(3);
    });

    it('treats a missing directory as no overrides', async () => {
      const result = await loadOverrides(join(dir, 'missing'), silentLogger);

      expect(result).toEqual({ overrides: [], files: 0, skippedFiles: 0, skippedElements: 0 });
    });
  });
});
