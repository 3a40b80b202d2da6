import { traceDetailsSchema } from '../schemas/trace.schemas';
import {
  GROUND_ALTITUDE, type Altitude, type TraceDetails, type TracePoint,
} from '../types/trace.types';
import { DataCoercionError } from './errors';

/**
 * Positional layout of one `trace` row. Only the named slots are kept; flags,
 * baro_rate, source_type, geom_rate, ias and roll are discarded.
 */
export const TRACE_COLUMNS = {
  offset: 0,
  latitude: 1,
  longitude: 2,
  altitude: 3,
  groundSpeed: 4,
  heading: 5,
  details: 8,
  geometricAltitude: 10,
} as const;

export const TRACE_ROW_WIDTH = 14;

export interface PayloadMetadata {
  aircraftId: string;
  baseTimestamp: number;
  registration: string | null;
  model: string | null;
  description: string | null;
}

export function toFiniteNumber(value: unknown, field: string): number {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return parsed;
    }
  }
  throw new DataCoercionError(field, value);
}

export function toNullableNumber(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toAltitude(value: unknown): Altitude {
  if (value === GROUND_ALTITUDE) {
    return GROUND_ALTITUDE;
  }
  return toNullableNumber(value);
}

export function toNullableString(value: unknown): string | null {
  if (typeof value !== 'string') {
    return null;
  }
  return value === '' ? null : value;
}

/** Accepts the details object as delivered, or its JSON text from a CSV cell */
export function toDetails(value: unknown): TraceDetails | null {
  let candidate = value;
  if (typeof value === 'string') {
    if (value.trim() === '') {
      return null;
    }
    try {
      candidate = JSON.parse(value);
    } catch {
      throw new DataCoercionError('details', value);
    }
  }
  if (candidate === null || candidate === undefined) {
    return null;
  }
  const parsed = traceDetailsSchema.safeParse(candidate);
  return parsed.success ? parsed.data : null;
}

export function extractCallSign(details: TraceDetails | null): string | null {
  const flight = details?.flight?.trim();
  return flight || null;
}

/**
 * Parse one positional trace row. Throws DataCoercionError when the offset or
 * position cannot be read as numbers.
 */
export function parseTraceRow(row: readonly unknown[], metadata: PayloadMetadata): TracePoint {
  const offsetSeconds = toFiniteNumber(row[TRACE_COLUMNS.offset], 'offsetSeconds');
  const latitude = toFiniteNumber(row[TRACE_COLUMNS.latitude], 'latitude');
  const longitude = toFiniteNumber(row[TRACE_COLUMNS.longitude], 'longitude');

  return {
    aircraftId: metadata.aircraftId,
    baseTimestamp: metadata.baseTimestamp,
    offsetSeconds,
    pointTime: metadata.baseTimestamp + offsetSeconds,
    latitude,
    longitude,
    altitude: toAltitude(row[TRACE_COLUMNS.altitude]),
    groundSpeed: toNullableNumber(row[TRACE_COLUMNS.groundSpeed]),
    heading: toNullableNumber(row[TRACE_COLUMNS.heading]),
    geometricAltitude: toNullableNumber(row[TRACE_COLUMNS.geometricAltitude]),
    details: toDetails(row[TRACE_COLUMNS.details]),
    registration: metadata.registration,
    model: metadata.model,
    description: metadata.description,
  };
}
