import { describe, it, expect } from 'vitest';
import { tokenizeLine } from '../../../sources/csv-line.js';
import { parseSecondarySource } from '../../../sources/secondary-source.js';

const HEATHROW =
  '507,"London Heathrow Airport","London","United Kingdom","LHR","EGLL",51.4706,-0.461941,83,0,"E","Europe/London","airport","OurAirports"';
const KENNEDY =
  '3797,"John F Kennedy International Airport","New York","United States","JFK","KJFK",40.63980103,-73.77890015,13,-5,"A","America/New_York","airport","OurAirports"';
const NO_ICAO =
  '5388,"Some Strip","Nowhere","Nowhere","XYZ",\\N,1.0,1.0,0,0,"U",\\N,"airport","OurAirports"';

describe('Secondary feed reader', () => {
  describe('tokenizeLine', () => {
    it('splits quoted comma-delimited fields', () => {
      const fields = tokenizeLine(HEATHROW);
      expect(fields?.length).toBe(14);
      expect(fields?.[5]).toBe('EGLL');
      expect(fields?.[11]).toBe('Europe/London');
    });
  });

  describe('parseSecondarySource', () => {
    it('maps ICAO codes to timezones', () => {
      const result = parseSecondarySource([HEATHROW, KENNEDY].join('\n'));

      expect(result.timezones).toEqual(
        new Map([
          ['EGLL', 'Europe/London'],
          ['KJFK', 'America/New_York'],
        ])
      );
      expect(result.lines).toBe(2);
      expect(result.rejected).toBe(0);
    });

    it('skips the header line and blank lines', () => {
      const text = [
        'Airport ID,Name,City,Country,IATA,ICAO,Latitude,Longitude,Altitude,Timezone,DST,Tz database time zone,Type,Source',
        '',
        HEATHROW,
        '',
      ].join('\r\n');

      const result = parseSecondarySource(text);

      expect(result.lines).toBe(1);
      expect(result.timezones.get('EGLL')).toBe('Europe/London');
    });

    it('counts unusable lines without affecting the rest', () => {
      const result = parseSecondarySource([NO_ICAO, 'short,line', KENNEDY].join('\n'));

      expect(result.lines).toBe(3);
      expect(result.rejected).toBe(2);
      expect([...result.timezones.keys()]).toEqual(['KJFK']);
    });
  });
});
