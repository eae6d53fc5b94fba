import { describe, it, expect } from 'vitest';
import { parsePrimarySource } from '../../../sources/primary-source.js';

const HEADER =
  'id,ident,type,name,latitude_deg,longitude_deg,elevation_ft,continent,iso_country,iso_region,municipality,scheduled_service,icao_code';

describe('parsePrimarySource', () => {
  it('keys normalized airports by ICAO', () => {
    const csv = [
      HEADER,
      '3622,KJFK,large_airport,"John F Kennedy International Airport",40.639801,-73.7789,13,NA,US,US-NY,"New York",yes,KJFK',
      '2434,EGLL,large_airport,"London Heathrow Airport",51.4706,-0.461941,83,EU,GB,GB-ENG,London,yes,EGLL',
    ].join('\n');

    const result = parsePrimarySource(csv);

    expect(result.rows).toBe(2);
    expect(result.rejected).toBe(0);
    expect([...result.airports.keys()]).toEqual(['KJFK', 'EGLL']);
    expect(result.airports.get('EGLL')).toEqual({
      name: 'London Heathrow Airport',
      countryCode: 'GB',
      latitude: 51.4706,
      longitude: -0.461941,
    });
  });

  it('counts closed and code-less rows as rejected', () => {
    const csv = [
      HEADER,
      '1,KOLD,closed,"Old Field",0,0,0,NA,US,US-TX,,no,KOLD',
      '2,00AK,small_airport,"Lowell Field",59.9,-151.7,450,NA,US,US-AK,,no,',
      '3,LFPG,large_airport,"Charles de Gaulle",49.0,2.55,392,EU,FR,FR-IDF,Paris,yes,LFPG',
    ].join('\n');

    const result = parsePrimarySource(csv);

    expect(result.rows).toBe(3);
    expect(result.rejected).toBe(2);
    expect([...result.airports.keys()]).toEqual(['LFPG']);
  });

  it('handles a byte order mark and CRLF line endings', () => {
    const csv = `\uFEFF${HEADER}\r\n3,LFPG,large_airport,"Charles de Gaulle",49.0,2.55,392,EU,FR,FR-IDF,Paris,yes,LFPG\r\n`;

    const result = parsePrimarySource(csv);

    expect(result.airports.get('LFPG')?.countryCode).toBe('FR');
  });

  it('keeps the later row when a code repeats', () => {
    const csv = [
      HEADER,
      '1,KJFK,large_airport,"First",0,0,0,NA,US,US-NY,,yes,KJFK',
      '2,KJFK,large_airport,"Second",0,0,0,NA,US,US-NY,,yes,KJFK',
    ].join('\n');

    expect(parsePrimarySource(csv).airports.get('KJFK')?.name).toBe('Second');
  });

  it('drops a row with an unclosed quote without losing the rows after it', () => {
    const csv = [
      HEADER,
      '2434,EGLL,large_airport,"London Heathrow Airport",51.4706,-0.461941,83,EU,GB,GB-ENG,London,yes,EGLL',
      '3622,KJFK,large_airport,"Kennedy,40.6,-73.8,13,NA,US,US-NY,,yes,KJFK',
      '3,LFPG,large_airport,"Charles de Gaulle",49.0,2.55,392,EU,FR,FR-IDF,Paris,yes,LFPG',
      '4,EDDF,large_airport,"Frankfurt am Main",50.03,8.56,364,EU,DE,DE-HE,Frankfurt,yes,EDDF',
    ].join('\n');

    const result = parsePrimarySource(csv);

    expect([...result.airports.keys()]).toEqual(['EGLL', 'LFPG', 'EDDF']);
    expect(result.rows).toBe(4);
    expect(result.rejected).toBe(1);
  });

  it('rejects every row when the header cannot be read', () => {
    const result = parsePrimarySource('id,"ident\n1,KJFK\n');

    expect(result.airports.size).toBe(0);
    expect(result.rows).toBe(1);
    expect(result.rejected).toBe(1);
  });
});
