import { ConfigurationError } from '../errors';
import {
  createLocalTimeFormatter, eachDay, epochSecondsToIso, formatDatePath, formatIsoDate, parseCalendarDate,
} from '../time';

describe('time utilities', () => {
  describe('parseCalendarDate', () => {
    it('parses a calendar date as UTC midnight', () => {
      expect(parseCalendarDate('2025-01-01')).toBe(Date.UTC(2025, 0, 1));
      expect(parseCalendarDate(' 2024-02-29 ')).toBe(Date.UTC(2024, 1, 29));
    });

    it('rejects malformed and impossible dates', () => {
      expect(() => parseCalendarDate('2025-1-1')).toThrow(ConfigurationError);
      expect(() => parseCalendarDate('2025-02-29')).toThrow('Invalid date "2025-02-29", no such calendar day');
      expect(() => parseCalendarDate('2025-13-01')).toThrow(ConfigurationError);
    });
  });

  it('lists each day of an inclusive range', () => {
    const days = eachDay(parseCalendarDate('2024-12-31'), parseCalendarDate('2025-01-02')).map(formatIsoDate);

    expect(days).toEqual(['2024-12-31', '2025-01-01', '2025-01-02']);
    expect(eachDay(parseCalendarDate('2025-01-02'), parseCalendarDate('2025-01-01'))).toEqual([]);
  });

  it('formats date paths and ISO timestamps', () => {
    expect(formatDatePath(Date.UTC(2025, 0, 9))).toBe('2025/01/09');
    expect(epochSecondsToIso(1735689600.5)).toBe('2025-01-01T00:00:00.500Z');
  });

  describe('createLocalTimeFormatter', () => {
    it('formats with a 24 hour clock in the requested zone', () => {
      expect(createLocalTimeFormatter('UTC')(1735689600)).toEqual({ localDate: '2025-01-01', localTime: '00:00:00' });
      expect(createLocalTimeFormatter('Asia/Tokyo')(1735689600 + 15 * 3600 + 5)).toEqual({
        localDate: '2025-01-02',
        localTime: '00:00:05',
      });
    });

    it('throws ConfigurationError for an unknown zone', () => {
      expect(() => createLocalTimeFormatter('Not/AZone')).toThrow(ConfigurationError);
    });
  });
});
