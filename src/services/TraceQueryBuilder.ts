import config from '../config';
import { traceQuerySchema } from '../schemas/trace.schemas';
import type { TraceQuery, TraceRequest } from '../types/trace.types';
import { ConfigurationError } from '../utils/errors';
import {
  eachDay, formatDatePath, formatIsoDate, parseCalendarDate,
} from '../utils/time';

export interface TraceQueryBuilderOptions {
  historyBaseUrl: string;
  recentBaseUrl: string;
}

/**
 * Canonical id form: trimmed, lower-case, blanks dropped, first occurrence kept.
 */
export function normalizeAircraftIds(ids: readonly string[]): string[] {
  const seen = new Set<string>();
  const normalized: string[] = [];
  ids.forEach((id) => {
    const canonical = id.trim().toLowerCase();
    if (canonical && !seen.has(canonical)) {
      seen.add(canonical);
      normalized.push(canonical);
    }
  });
  return normalized;
}

/** Trace files are sharded by the last two characters of the id */
export function traceSuffix(aircraftId: string): string {
  return aircraftId.slice(-2);
}

/**
 * Turns aircraft ids plus a date range (or "recent") into the ordered list of
 * trace locations to fetch. Pure, no I/O.
 */
export class TraceQueryBuilder {
  private readonly historyBaseUrl: string;

  private readonly recentBaseUrl: string;

  constructor(options: TraceQueryBuilderOptions = config.source) {
    this.historyBaseUrl = options.historyBaseUrl;
    this.recentBaseUrl = options.recentBaseUrl;
  }

  buildRequests(aircraftIds: readonly string[], query: TraceQuery): TraceRequest[] {
    const ids = normalizeAircraftIds(aircraftIds);
    if (ids.length === 0) {
      throw new ConfigurationError('At least one aircraft identifier is required');
    }

    const parsed = traceQuerySchema.safeParse(query);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid trace query: ${parsed.error.issues.map((i) => i.message).join('; ')}`);
    }

    const validQuery = parsed.data;
    if (validQuery.mode === 'recent') {
      return ids.map((aircraftId) => ({
        url: this.recentUrl(aircraftId),
        aircraftId,
        date: null,
      }));
    }

    const startMs = parseCalendarDate(validQuery.start);
    const endMs = parseCalendarDate(validQuery.end);
    if (startMs > endMs) {
      throw new ConfigurationError(`Start date ${validQuery.start} is after end date ${validQuery.end}`);
    }

    const days = eachDay(startMs, endMs);
    return ids.flatMap((aircraftId) => days.map((dayMs) => ({
      url: this.historyUrl(aircraftId, dayMs),
      aircraftId,
      date: formatIsoDate(dayMs),
    })));
  }

  private historyUrl(aircraftId: string, dayMs: number): string {
    return `${this.historyBaseUrl}${formatDatePath(dayMs)}/traces/${traceSuffix(aircraftId)}/trace_full_${aircraftId}.json`;
  }

  private recentUrl(aircraftId: string): string {
    return `${this.recentBaseUrl}traces/${traceSuffix(aircraftId)}/trace_full_${aircraftId}.json`;
  }
}

const traceQueryBuilder = new TraceQueryBuilder();
export default traceQueryBuilder;
