import config from '../config';
import type {
  AggregatedTraces, DroppedRow, FetchMiss, FetchOutcome, TracePoint, TraceRequest,
} from '../types/trace.types';
import logger from '../utils/logger';
import { epochSecondsToIso } from '../utils/time';
import traceFetcher from './TraceFetcher';

export type TraceSource = {
  fetchTrace(request: TraceRequest): Promise<FetchOutcome>;
};

export interface TraceAggregatorOptions {
  fetcher?: TraceSource;
  concurrency: number;
}

/**
 * Fetches every request, keeps the hits and merges them into one table
 * ordered by payload anchor time.
 */
export class TraceAggregator {
  private readonly fetcher: TraceSource;

  private readonly concurrency: number;

  constructor(options: TraceAggregatorOptions = { concurrency: config.source.concurrency }) {
    this.fetcher = options.fetcher ?? traceFetcher;
    this.concurrency = Number.isFinite(options.concurrency) ? Math.max(1, Math.floor(options.concurrency)) : 1;
  }

  async collectTraces(requests: readonly TraceRequest[]): Promise<AggregatedTraces> {
    const outcomes = await this.fetchAll(requests);

    const batches: TracePoint[][] = [];
    const misses: FetchMiss[] = [];
    const dropped: DroppedRow[] = [];

    outcomes.forEach((outcome) => {
      if (outcome.status === 'miss') {
        misses.push(outcome.miss);
        logger.info(`No data for ${outcome.miss.request.aircraftId}`, {
          url: outcome.miss.request.url,
          reason: outcome.miss.reason,
          status: outcome.miss.status,
        });
        return;
      }
      batches.push(outcome.points);
      dropped.push(...outcome.dropped);
      const anchor = epochSecondsToIso(outcome.points[0].baseTimestamp).slice(0, 10);
      logger.info(`${outcome.request.aircraftId} flew on ${anchor}`, {
        url: outcome.request.url,
        points: outcome.points.length,
      });
    });

    // Array.prototype.sort is stable, so rows keep their in-payload order.
    const points = batches
      .flat()
      .sort((a, b) => a.baseTimestamp - b.baseTimestamp);

    if (points.length === 0) {
      logger.warn('No valid trace data collected', { requests: requests.length, misses: misses.length });
    }

    return {
      points,
      misses,
      dropped,
      emptyReason: points.length === 0 ? 'no-trace-data' : null,
    };
  }

  private async fetchAll(requests: readonly TraceRequest[]): Promise<FetchOutcome[]> {
    const outcomes: FetchOutcome[] = new Array(requests.length);
    let cursor = 0;

    const worker = async (): Promise<void> => {
      while (cursor < requests.length) {
        const index = cursor;
        cursor += 1;
        // eslint-disable-next-line no-await-in-loop
        outcomes[index] = await this.fetcher.fetchTrace(requests[index]);
      }
    };

    const workers = Array.from({ length: Math.min(this.concurrency, requests.length) }, () => worker());
    await Promise.all(workers);
    return outcomes;
  }
}

const traceAggregator = new TraceAggregator();
export default traceAggregator;
