import { describe, it, expect } from 'vitest';
import { formatBackupStamp, formatIsoWithOffset } from '../../../core/utils/timestamps.js';

describe('timestamps', () => {
  const date = new Date(2026, 9, 19, 14, 3, 7);

  it('formats backup stamps in local time', () => {
    expect(formatBackupStamp(date)).toBe('20261019_140307');
    expect(formatBackupStamp(new Date(2026, 0, 2, 3, 4, 5))).toBe('20260102_030405');
  });

  it('formats local time with a numeric offset', () => {
    const offset = -date.getTimezoneOffset();
    const sign = offset >= 0 ? '+' : '-';
    const hours = String(Math.floor(Math.abs(offset) / 60)).padStart(2, '0');
    const minutes = String(Math.abs(offset) % 60).padStart(2, '0');

    expect(formatIsoWithOffset(date)).toBe(`2026-10-19T14:03:07${sign}${hours}:${minutes}`);
  });

  it('parses back to the same instant', () => {
    expect(new Date(formatIsoWithOffset(date)).getTime()).toBe(date.getTime());
  });
});
