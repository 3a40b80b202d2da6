import { BASE_TIMESTAMP, createTracePoint } from '../../__tests__/fixtures/traceFixtures';
import type { FetchOutcome, TraceRequest } from '../../types/trace.types';
import { TraceAggregator, type TraceSource } from '../TraceAggregator';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
    error: jest.fn(),
  },
}));

const DAY = 24 * 60 * 60;

const request = (aircraftId: string, date: string): TraceRequest => ({
  url: `https://example.test/${date}/trace_full_${aircraftId}.json`,
  aircraftId,
  date,
});

/** Answers each request after `delayMs`, hits keyed by url */
const createSource = (
  hits: Record<string, { baseTimestamp: number; offsets: number[] }>,
  delays: Record<string, number> = {},
): TraceSource & { calls: string[] } => {
  const calls: string[] = [];
  return {
    calls,
    async fetchTrace(req: TraceRequest): Promise<FetchOutcome> {
      calls.push(req.url);
      await new Promise<void>((resolve) => {
        setTimeout(resolve, delays[req.url] ?? 0);
      });
      const hit = hits[req.url];
      if (!hit) {
        return { status: 'miss', miss: { request: req, reason: 'http-status', status: 404 } };
      }
      return {
        status: 'hit',
        request: req,
        points: hit.offsets.map((offsetSeconds) => createTracePoint({
          aircraftId: req.aircraftId,
          baseTimestamp: hit.baseTimestamp,
          offsetSeconds,
        })),
        dropped: [],
      };
    },
  };
};

describe('TraceAggregator', () => {
  it('merges hits sorted by anchor time and records misses', async () => {
    const day1 = request('0d086e', '2025-01-01');
    const day2 = request('0d086e', '2025-01-02');
    const other = request('a1b2c3', '2025-01-01');
    const source = createSource({
      [day2.url]: { baseTimestamp: BASE_TIMESTAMP + DAY, offsets: [0, 10] },
      [day1.url]: { baseTimestamp: BASE_TIMESTAMP, offsets: [5, 20, 40] },
    });
    const aggregator = new TraceAggregator({ fetcher: source, concurrency: 2 });

    const result = await aggregator.collectTraces([day2, other, day1]);

    expect(result.emptyReason).toBeNull();
    expect(result.points.map((p) => [p.baseTimestamp - BASE_TIMESTAMP, p.offsetSeconds])).toEqual([
      [0, 5],
      [0, 20],
      [0, 40],
      [DAY, 0],
      [DAY, 10],
    ]);
    expect(result.misses).toEqual([{ request: other, reason: 'http-status', status: 404 }]);
    expect(source.calls).toHaveLength(3);
  });

  it('is independent of completion order', async () => {
    const first = request('0d086e', '2025-01-01');
    const second = request('0d086e', '2025-01-02');
    const hits = {
      [first.url]: { baseTimestamp: BASE_TIMESTAMP, offsets: [0] },
      [second.url]: { baseTimestamp: BASE_TIMESTAMP + DAY, offsets: [0] },
    };
    const slowFirst = new TraceAggregator({
      fetcher: createSource(hits, { [first.url]: 30 }),
      concurrency: 4,
    });
    const sequential = new TraceAggregator({ fetcher: createSource(hits), concurrency: 1 });

    const parallel = await slowFirst.collectTraces([first, second]);
    const serial = await sequential.collectTraces([first, second]);

    expect(parallel.points).toEqual(serial.points);
  });

  it('returns an explicit empty result when nothing yields data', async () => {
    const aggregator = new TraceAggregator({ fetcher: createSource({}), concurrency: 3 });
    const requests = [request('0d086e', '2025-01-01'), request('0d086e', '2025-01-02')];

    const result = await aggregator.collectTraces(requests);

    expect(result.points).toEqual([]);
    expect(result.emptyReason).toBe('no-trace-data');
    expect(result.misses.map((miss) => miss.request)).toEqual(requests);
  });

  it('still fetches every request when the concurrency setting is unusable', async () => {
    const req = request('0d086e', '2025-01-01');
    const hits = { [req.url]: { baseTimestamp: BASE_TIMESTAMP, offsets: [0, 10] } };

    const results = await Promise.all([Number.NaN, 0, 2.7].map((concurrency) => {
      const source = createSource(hits);
      return new TraceAggregator({ fetcher: source, concurrency })
        .collectTraces([req])
        .then((result) => [source.calls.length, result.points.length, result.emptyReason]);
    }));

    expect(results).toEqual([[1, 2, null], [1, 2, null], [1, 2, null]]);
  });

  it('handles an empty request list', async () => {
    const aggregator = new TraceAggregator({ fetcher: createSource({}), concurrency: 3 });

    const result = await aggregator.collectTraces([]);

    expect(result).toEqual({
      points: [], misses: [], dropped: [], emptyReason: 'no-trace-data',
    });
  });
});
