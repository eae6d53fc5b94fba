import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { SourceUnavailableError } from '../../../core/errors.js';
import type { FetchText } from '../../../core/source-client.js';
import { silentLogger } from '../../../core/utils/logger.js';
import { formatIsoWithOffset } from '../../../core/utils/timestamps.js';
import { DEFAULT_COUNTRY_TIMEZONES_PATH } from '../../../sources/country-timezones.js';
import { DEFAULT_VERSION, readVersion, runSync, type SyncPaths } from '../../../sync/sync-service.js';

const PRIMARY_URL = 'https://feeds.example.test/airports.csv';
const SECONDARY_URL = 'https://feeds.example.test/airports.dat';

const PRIMARY = [
  'id,ident,type,name,latitude_deg,longitude_deg,elevation_ft,continent,iso_country,iso_region,municipality,scheduled_service,icao_code',
  '3622,KJFK,large_airport,"John F Kennedy International Airport",40.639801,-73.7789,13,NA,US,US-NY,"New York",yes,KJFK',
  '2434,EGLL,large_airport,"London Heathrow Airport",51.4706,-0.461941,83,EU,GB,GB-ENG,London,yes,EGLL',
  '1382,LFPG,large_airport,"Charles de Gaulle International Airport",49.012798,2.55,392,EU,FR,FR-IDF,Paris,yes,LFPG',
].join('\n');

const SECONDARY = [
  '507,"London Heathrow Airport","London","United Kingdom","LHR","EGLL",51.4706,-0.461941,83,0,"E","Europe/London","airport","OurAirports"',
  '3797,"John F Kennedy International Airport","New York","United States","JFK","KJFK",40.63980103,-73.77890015,13,-5,"A","America/New_York","airport","OurAirports"',
].join('\n');

describe('runSync', () => {
  let dir: string;
  let paths: SyncPaths;
  const now = new Date(2026, 9, 19, 9, 30, 0);

  function feeds(texts: Record<string, string>): FetchText {
    return vi.fn<FetchText>(async (url) => {
      const text = texts[url];
      if (text === undefined) {
        throw new SourceUnavailableError(url, new Error('HTTP 503: Service Unavailable'));
      }
      return text;
    });
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aerodrome-sync-'));
    paths = {
      staging: join(dir, 'aerodromes-staging.json'),
      overrides: join(dir, 'overrides'),
      versionFile: join(dir, 'VERSION'),
      countryTimezones: DEFAULT_COUNTRY_TIMEZONES_PATH,
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('reconciles both feeds with overrides and writes staging', async () => {
    await mkdir(paths.overrides);
    await writeFile(
      join(paths.overrides, 'timezone-fixes.json'),
      JSON.stringify([{ icao: 'KJFK', timezone: 'America/Chicago' }])
    );
    await writeFile(paths.versionFile, '2.1.0\n');

    const result = await runSync({
      paths,
      primaryUrl: PRIMARY_URL,
      secondaryUrl: SECONDARY_URL,
      fetchText: feeds({ [PRIMARY_URL]: PRIMARY, [SECONDARY_URL]: SECONDARY }),
      now: () => now,
      logger: silentLogger,
    });

    expect(result.document).toEqual({
      version: '2.1.0',
      last_updated: formatIsoWithOffset(now),
      total_count: 3,
      aerodromes: [
        { icao: 'EGLL', name: 'London Heathrow Airport', country: 'GB', timezone: 'Europe/London' },
        { icao: 'KJFK', name: 'John F Kennedy International Airport', country: 'US', timezone: 'America/Chicago' },
        { icao: 'LFPG', name: 'Charles de Gaulle International Airport', country: 'FR', timezone: 'Europe/Paris' },
      ],
    });
    expect(result.stats).toMatchObject({ matched: 1, fallback: 1, unresolved: 0, overridden: 1, overrides: 0 });
    expect(result.sources).toMatchObject({ primaryRows: 3, airports: 3, secondaryLines: 2, timezones: 2, overrideFiles: 1 });
    expect(await readFile(paths.staging, 'utf-8')).toBe(JSON.stringify(result.document, null, 2) + '\n');
  });

  it('runs without overrides or a version file', async () => {
    const result = await runSync({
      paths,
      primaryUrl: PRIMARY_URL,
      secondaryUrl: SECONDARY_URL,
      fetchText: feeds({ [PRIMARY_URL]: PRIMARY, [SECONDARY_URL]: SECONDARY }),
      now: () => now,
      logger: silentLogger,
    });

    expect(result.document.version).toBe(DEFAULT_VERSION);
    expect(result.document.aerodromes.find((a) => a.icao === 'KJFK')?.timezone).toBe('America/New_York');
    expect(result.sources.overrideFiles).toBe(0);
  });

  it('aborts without writing staging when a feed is unavailable', async () => {
    const fetchText = feeds({ [PRIMARY_URL]: PRIMARY });

    await expect(
      runSync({
        paths,
        primaryUrl: PRIMARY_URL,
        secondaryUrl: SECONDARY_URL,
        fetchText,
        now: () => now,
        logger: silentLogger,
      })
    ).rejects.toBeInstanceOf(SourceUnavailableError);

    await expect(readFile(paths.staging, 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });

  it('leaves an existing staging file alone when the primary feed fails', async () => {
    await writeFile(paths.staging, 'previous');

    await expect(
      runSync({
        paths,
        primaryUrl: PRIMARY_URL,
        secondaryUrl: SECONDARY_URL,
        fetchText: feeds({}),
        logger: silentLogger,
      })
    ).rejects.toThrow(`Source unavailable: ${PRIMARY_URL}`);

    expect(await readFile(paths.staging, 'utf-8')).toBe('previous');
  });
});

describe('readVersion', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'aerodrome-version-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('trims the version file', async () => {
    await writeFile(join(dir, 'VERSION'), '  3.0.1\n');
    expect(await readVersion(join(dir, 'VERSION'))).toBe('3.0.1');
  });

  it('defaults when the file is missing or blank', async () => {
    expect(await readVersion(join(dir, 'VERSION'))).toBe('1.0.0');
    await writeFile(join(dir, 'VERSION'), '\n');
    expect(await readVersion(join(dir, 'VERSION'))).toBe('1.0.0');
  });
});
