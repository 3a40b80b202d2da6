/**
 * Trace and leg type definitions
 */

import type { Point } from 'geojson';

export const GROUND_ALTITUDE = 'ground';
export const UNKNOWN_CALL_SIGN = 'unknown';

export type Altitude = number | typeof GROUND_ALTITUDE | null;

/** Per-ping metadata object carried in position 8 of a trace row */
export interface TraceDetails {
  flight?: string;
  [key: string]: unknown;
}

/** One observed ping, immutable once parsed */
export interface TracePoint {
  aircraftId: string;
  /** Epoch seconds the payload is anchored at */
  baseTimestamp: number;
  offsetSeconds: number;
  /** Epoch seconds, `baseTimestamp + offsetSeconds` */
  pointTime: number;
  latitude: number;
  longitude: number;
  altitude: Altitude;
  groundSpeed: number | null;
  heading: number | null;
  geometricAltitude: number | null;
  details: TraceDetails | null;
  registration: string | null;
  model: string | null;
  description: string | null;
}

export interface TraceRequest {
  url: string;
  aircraftId: string;
  /** `YYYY-MM-DD` for dated requests, null for the latest trace */
  date: string | null;
}

export type TraceQuery =
  | { mode: 'recent' }
  | { mode: 'range'; start: string; end: string };

export type FetchMissReason = 'http-status' | 'network' | 'invalid-payload' | 'missing-trace' | 'empty-trace';

/** A single request that yielded no usable data */
export interface FetchMiss {
  request: TraceRequest;
  reason: FetchMissReason;
  status?: number;
  message?: string;
}

export type EmptyReason = 'no-input' | 'no-trace-data' | 'no-valid-rows' | 'all-points-on-ground';

/** Row dropped because a value could not be coerced */
export interface DroppedRow {
  aircraftId: string | null;
  field: string;
  value: unknown;
  message: string;
}

export type FetchOutcome =
  | { status: 'hit'; request: TraceRequest; points: TracePoint[]; dropped: DroppedRow[] }
  | { status: 'miss'; miss: FetchMiss };

export interface AggregatedTraces {
  points: TracePoint[];
  misses: FetchMiss[];
  dropped: DroppedRow[];
  emptyReason: EmptyReason | null;
}

/** Read-only call sign → attribute lookup joined onto processed points */
export interface CallSignLookup {
  readonly column: string;
  get(callSign: string): string | undefined;
}

export interface LegPoint extends TracePoint {
  callSign: string;
  legId: number;
  flightLegKey: string;
  /** Display-only date in the configured zone, `YYYY-MM-DD` */
  localDate: string;
  /** Display-only clock time in the configured zone, `HH:MM:SS` */
  localTime: string;
  attributes: Record<string, string | null>;
  geometry: Point;
}

export interface SegmentOptions {
  gapThresholdSeconds: number;
  filterGround: boolean;
  timeZone?: string;
  callSignLookup?: CallSignLookup;
}

export interface SegmentationResult {
  points: LegPoint[];
  dropped: DroppedRow[];
  emptyReason: EmptyReason | null;
}

/** Columns every processed point carries; joined attributes may not reuse them */
export const LEG_POINT_COLUMN_NAMES = [
  'aircraftId', 'callSign', 'legId', 'flightLegKey', 'pointTime', 'baseTimestamp', 'offsetSeconds',
  'localDate', 'localTime', 'altitude', 'groundSpeed', 'heading', 'geometricAltitude',
  'registration', 'model', 'description', 'latitude', 'longitude',
] as const;

// Feature properties are type aliases so they satisfy GeoJsonProperties.
export type LegPointProperties = {
  aircraftId: string;
  callSign: string;
  legId: number;
  flightLegKey: string;
  pointTime: string;
  baseTimestamp: number;
  offsetSeconds: number;
  localDate: string;
  localTime: string;
  altitude: Altitude;
  groundSpeed: number | null;
  heading: number | null;
  geometricAltitude: number | null;
  registration: string | null;
  model: string | null;
  description: string | null;
  [column: string]: string | number | null;
};

export type LegLineProperties = {
  aircraftId: string;
  callSign: string;
  legId: number;
  flightLegKey: string;
  flightDate: string;
  pointCount: number;
  startTime: string;
  endTime: string;
};
