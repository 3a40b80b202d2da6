import axios, { AxiosInstance } from 'axios';
import config from '../config';
import { tracePayloadSchema } from '../schemas/trace.schemas';
import type {
  DroppedRow, FetchMiss, FetchOutcome, TracePoint, TraceRequest,
} from '../types/trace.types';
import { DataCoercionError } from '../utils/errors';
import httpClient from '../utils/httpClient';
import logger from '../utils/logger';
import { parseTraceRow, toNullableString } from '../utils/traceRows';

export interface TraceFetcherOptions {
  client?: AxiosInstance;
  refererBaseUrl: string;
  timeoutMs: number;
}

/**
 * Retrieves one trace payload and flattens it into TracePoints.
 * Every failure mode comes back as a FetchMiss; nothing here throws for bad
 * upstream data and nothing is retried.
 */
export class TraceFetcher {
  private readonly client: AxiosInstance;

  private readonly refererBaseUrl: string;

  private readonly timeoutMs: number;

  constructor(options: TraceFetcherOptions = config.source) {
    this.client = options.client ?? httpClient;
    this.refererBaseUrl = options.refererBaseUrl;
    this.timeoutMs = options.timeoutMs;
  }

  async fetchTrace(request: TraceRequest): Promise<FetchOutcome> {
    let body: unknown;
    try {
      const response = await this.client.get<unknown>(request.url, {
        timeout: this.timeoutMs,
        retry: false,
        headers: {
          Accept: 'application/json',
          Referer: `${this.refererBaseUrl}?icao=${request.aircraftId}`,
        },
      });
      body = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.response) {
        return TraceFetcher.miss(request, 'http-status', {
          status: error.response.status,
          message: error.message,
        });
      }
      return TraceFetcher.miss(request, 'network', { message: (error as Error).message });
    }

    return this.parsePayload(request, body);
  }

  parsePayload(request: TraceRequest, body: unknown): FetchOutcome {
    if (typeof body !== 'object' || body === null || Array.isArray(body)) {
      return TraceFetcher.miss(request, 'invalid-payload', { message: 'Response body is not a JSON object' });
    }
    if (!('trace' in body)) {
      return TraceFetcher.miss(request, 'missing-trace');
    }

    const parsed = tracePayloadSchema.safeParse(body);
    if (!parsed.success) {
      return TraceFetcher.miss(request, 'invalid-payload', {
        message: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; '),
      });
    }

    const payload = parsed.data;
    const rows = payload.trace ?? [];
    if (rows.length === 0) {
      return TraceFetcher.miss(request, 'empty-trace');
    }

    const metadata = {
      aircraftId: request.aircraftId,
      baseTimestamp: payload.timestamp,
      registration: toNullableString(payload.r),
      model: toNullableString(payload.t),
      description: toNullableString(payload.desc),
    };

    const points: TracePoint[] = [];
    const dropped: DroppedRow[] = [];
    rows.forEach((row) => {
      try {
        points.push(parseTraceRow(row, metadata));
      } catch (error) {
        if (!(error instanceof DataCoercionError)) {
          throw error;
        }
        dropped.push({
          aircraftId: request.aircraftId,
          field: error.field,
          value: error.value,
          message: error.message,
        });
      }
    });

    if (points.length === 0) {
      return TraceFetcher.miss(request, 'empty-trace', {
        message: `All ${dropped.length} trace rows were unreadable`,
      });
    }

    if (dropped.length > 0) {
      logger.debug('Dropped unreadable trace rows', {
        url: request.url,
        dropped: dropped.length,
      });
    }

    return {
      status: 'hit',
      request,
      points,
      dropped,
    };
  }

  private static miss(
    request: TraceRequest,
    reason: FetchMiss['reason'],
    extra: Pick<FetchMiss, 'status' | 'message'> = {},
  ): FetchOutcome {
    return { status: 'miss', miss: { request, reason, ...extra } };
  }
}

const traceFetcher = new TraceFetcher();
export default traceFetcher;
