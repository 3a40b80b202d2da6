import { ConfigurationError } from '../../utils/errors';
import { TraceQueryBuilder, normalizeAircraftIds, traceSuffix } from '../TraceQueryBuilder';

const builder = new TraceQueryBuilder({
  historyBaseUrl: 'https://globe.adsbexchange.com/globe_history/',
  recentBaseUrl: 'https://globe.adsbexchange.com/data/',
});

describe('normalizeAircraftIds', () => {
  it('trims, lower-cases, drops blanks and duplicates in first-seen order', () => {
    expect(normalizeAircraftIds([' 0D086E ', 'a1b2c3', '', '0d086e', '  '])).toEqual(['0d086e', 'a1b2c3']);
  });

  it('uses the last two characters as the shard suffix', () => {
    expect(traceSuffix('0d086e')).toBe('6e');
  });
});

describe('TraceQueryBuilder', () => {
  describe('range mode', () => {
    it('builds the dated history location for a single day', () => {
      const requests = builder.buildRequests(['0d086e'], { mode: 'range', start: '2025-01-01', end: '2025-01-01' });

      expect(requests).toEqual([{
        url: 'https://globe.adsbexchange.com/globe_history/2025/01/01/traces/6e/trace_full_0d086e.json',
        aircraftId: '0d086e',
        date: '2025-01-01',
      }]);
    });

    it('produces one request per aircraft per inclusive day, grouped by aircraft', () => {
      const requests = builder.buildRequests(['A1B2C3', '0d086e'], {
        mode: 'range',
        start: '2024-12-30',
        end: '2025-01-02',
      });

      expect(requests).toHaveLength(8);
      expect(requests.map((r) => `${r.aircraftId}@${r.date}`)).toEqual([
        'a1b2c3@2024-12-30',
        'a1b2c3@2024-12-31',
        'a1b2c3@2025-01-01',
        'a1b2c3@2025-01-02',
        '0d086e@2024-12-30',
        '0d086e@2024-12-31',
        '0d086e@2025-01-01',
        '0d086e@2025-01-02',
      ]);
      expect(requests[1].url).toBe(
        'https://globe.adsbexchange.com/globe_history/2024/12/31/traces/c3/trace_full_a1b2c3.json',
      );
    });

    it('crosses month ends and leap days', () => {
      const requests = builder.buildRequests(['0d086e'], { mode: 'range', start: '2024-02-28', end: '2024-03-01' });

      expect(requests.map((r) => r.date)).toEqual(['2024-02-28', '2024-02-29', '2024-03-01']);
    });

    it('rejects impossible dates and reversed ranges', () => {
      expect(() => builder.buildRequests(['0d086e'], { mode: 'range', start: '2025-02-30', end: '2025-03-01' }))
        .toThrow(ConfigurationError);
      expect(() => builder.buildRequests(['0d086e'], { mode: 'range', start: '2025-01-02', end: '2025-01-01' }))
        .toThrow(ConfigurationError);
      expect(() => builder.buildRequests(['0d086e'], { mode: 'range', start: '01/01/2025', end: '2025-01-01' }))
        .toThrow(ConfigurationError);
    });
  });

  describe('recent mode', () => {
    it('builds exactly one latest-trace location per aircraft', () => {
      const requests = builder.buildRequests(['0d086e', 'a1b2c3'], { mode: 'recent' });

      expect(requests).toEqual([
        {
          url: 'https://globe.adsbexchange.com/data/traces/6e/trace_full_0d086e.json',
          aircraftId: '0d086e',
          date: null,
        },
        {
          url: 'https://globe.adsbexchange.com/data/traces/c3/trace_full_a1b2c3.json',
          aircraftId: 'a1b2c3',
          date: null,
        },
      ]);
    });
  });

  it('throws ConfigurationError without identifiers', () => {
    expect(() => builder.buildRequests([], { mode: 'recent' })).toThrow(ConfigurationError);
    expect(() => builder.buildRequests(['  '], { mode: 'recent' })).toThrow('At least one aircraft identifier is required');
  });
});
