import Papa from 'papaparse';
import { z } from 'zod';
import { toPointProperties } from '../services/GeometryBuilder';
import {
  UNKNOWN_CALL_SIGN, type DroppedRow, type LegPoint, type TracePoint,
} from '../types/trace.types';
import {
  ConfigurationError, DataCoercionError, MissingColumnError, requireColumns,
} from './errors';
import {
  toAltitude, toDetails, toFiniteNumber, toNullableNumber, toNullableString,
} from './traceRows';

export const RAW_CSV_COLUMNS = [
  'aircraft_id',
  'base_timestamp',
  'offset_seconds',
  'point_time',
  'latitude',
  'longitude',
  'altitude',
  'ground_speed',
  'heading',
  'geometric_altitude',
  'details',
  'registration',
  'model',
  'description',
] as const;

const REQUIRED_RAW_COLUMNS = [
  'aircraft_id',
  'base_timestamp',
  'offset_seconds',
  'latitude',
  'longitude',
  'altitude',
  'details',
] as const;

type RawCsvColumn = typeof RAW_CSV_COLUMNS[number];
type CsvCell = string | number | null;

export interface ParsedRows<T> {
  points: T[];
  dropped: DroppedRow[];
}

function toDroppedRow(aircraftId: string | null, error: DataCoercionError): DroppedRow {
  return {
    aircraftId,
    field: error.field,
    value: error.value,
    message: error.message,
  };
}

export function toRawCsvRow(point: TracePoint): Record<RawCsvColumn, CsvCell> {
  return {
    aircraft_id: point.aircraftId,
    base_timestamp: point.baseTimestamp,
    offset_seconds: point.offsetSeconds,
    point_time: new Date(point.pointTime * 1000).toISOString(),
    latitude: point.latitude,
    longitude: point.longitude,
    altitude: point.altitude,
    ground_speed: point.groundSpeed,
    heading: point.heading,
    geometric_altitude: point.geometricAltitude,
    details: point.details ? JSON.stringify(point.details) : null,
    registration: point.registration,
    model: point.model,
    description: point.description,
  };
}

export function serializeRawCsv(points: readonly TracePoint[]): string {
  return Papa.unparse({
    fields: [...RAW_CSV_COLUMNS],
    data: points.map((point) => {
      const row = toRawCsvRow(point);
      return RAW_CSV_COLUMNS.map((column) => row[column]);
    }),
  });
}

/**
 * Reads a raw trace table written by `serializeRawCsv`. Missing columns are a
 * caller error; rows with unreadable values are dropped and reported.
 */
export function parseRawCsv(text: string): ParsedRows<TracePoint> {
  const result = Papa.parse<Record<string, string>>(text, {
    header: true,
    skipEmptyLines: true,
  });
  const fields = result.meta.fields ?? [];
  const missing = REQUIRED_RAW_COLUMNS.filter((column) => !fields.includes(column));
  if (missing.length > 0) {
    throw new MissingColumnError(missing, 'raw trace CSV');
  }

  const points: TracePoint[] = [];
  const dropped: DroppedRow[] = [];
  result.data.forEach((row) => {
    const aircraftId = (row.aircraft_id ?? '').trim().toLowerCase();
    try {
      if (!aircraftId) {
        throw new DataCoercionError('aircraftId', row.aircraft_id);
      }
      const baseTimestamp = toFiniteNumber(row.base_timestamp, 'baseTimestamp');
      const offsetSeconds = toFiniteNumber(row.offset_seconds, 'offsetSeconds');
      points.push({
        aircraftId,
        baseTimestamp,
        offsetSeconds,
        pointTime: baseTimestamp + offsetSeconds,
        latitude: toFiniteNumber(row.latitude, 'latitude'),
        longitude: toFiniteNumber(row.longitude, 'longitude'),
        altitude: toAltitude(row.altitude),
        groundSpeed: toNullableNumber(row.ground_speed),
        heading: toNullableNumber(row.heading),
        geometricAltitude: toNullableNumber(row.geometric_altitude),
        details: toDetails(row.details),
        registration: toNullableString(row.registration),
        model: toNullableString(row.model),
        description: toNullableString(row.description),
      });
    } catch (error) {
      if (!(error instanceof DataCoercionError)) {
        throw error;
      }
      dropped.push(toDroppedRow(aircraftId || null, error));
    }
  });

  return { points, dropped };
}

/** Processed points as a flat table; geometry is carried as latitude/longitude */
export function serializePointsCsv(points: readonly LegPoint[]): string {
  return Papa.unparse(points.map((point) => ({
    ...toPointProperties(point),
    latitude: point.latitude,
    longitude: point.longitude,
  })));
}

const LEG_POINT_COLUMNS = [
  'aircraftId',
  'callSign',
  'legId',
  'flightLegKey',
  'pointTime',
  'baseTimestamp',
  'offsetSeconds',
] as const;

const nullableNumber = z.number().nullable().default(null);
const nullableString = z.string().nullable().default(null);

const legPointPropertiesSchema = z.object({
  aircraftId: z.string(),
  callSign: z.string(),
  legId: z.number().int().positive(),
  flightLegKey: z.string(),
  pointTime: z.string(),
  baseTimestamp: z.number(),
  offsetSeconds: z.number(),
  localDate: z.string().default(''),
  localTime: z.string().default(''),
  altitude: z.union([z.number(), z.literal('ground'), z.null()]).default(null),
  groundSpeed: nullableNumber,
  heading: nullableNumber,
  geometricAltitude: nullableNumber,
  registration: nullableString,
  model: nullableString,
  description: nullableString,
});

const KNOWN_PROPERTIES = new Set(Object.keys(legPointPropertiesSchema.shape));

const pointFeatureSchema = z.object({
  type: z.literal('Feature'),
  geometry: z.object({
    type: z.literal('Point'),
    coordinates: z.tuple([z.number(), z.number()]).rest(z.number()),
  }),
  properties: z.record(z.unknown()),
});

const featureCollectionSchema = z.object({
  type: z.literal('FeatureCollection'),
  features: z.array(z.unknown()),
});

/**
 * Reads processed point features back into LegPoints. The materialized call
 * sign is restored into `details` so the points can be segmented again.
 */
export function parseLegPointsGeoJson(text: string): ParsedRows<LegPoint> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Processed points are not valid JSON: ${(error as Error).message}`);
  }
  const parsedCollection = featureCollectionSchema.safeParse(raw);
  if (!parsedCollection.success) {
    throw new ConfigurationError('Processed points must be a GeoJSON FeatureCollection');
  }
  const collection = parsedCollection.data;
  const points: LegPoint[] = [];
  const dropped: DroppedRow[] = [];

  collection.features.forEach((candidate) => {
    const feature = pointFeatureSchema.safeParse(candidate);
    if (!feature.success) {
      dropped.push({
        aircraftId: null,
        field: 'geometry',
        value: null,
        message: 'Feature is not a Point feature with properties',
      });
      return;
    }
    const { properties, geometry } = feature.data;
    requireColumns(properties, LEG_POINT_COLUMNS, 'processed GeoJSON');

    const parsed = legPointPropertiesSchema.safeParse(properties);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = String(issue.path[0] ?? 'properties');
      dropped.push(toDroppedRow(
        typeof properties.aircraftId === 'string' ? properties.aircraftId : null,
        new DataCoercionError(field, properties[field]),
      ));
      return;
    }

    const values = parsed.data;
    const attributes: Record<string, string | null> = {};
    Object.entries(properties).forEach(([key, value]) => {
      if (!KNOWN_PROPERTIES.has(key) && (typeof value === 'string' || value === null)) {
        attributes[key] = value;
      }
    });
    const [longitude, latitude] = geometry.coordinates;

    points.push({
      aircraftId: values.aircraftId,
      baseTimestamp: values.baseTimestamp,
      offsetSeconds: values.offsetSeconds,
      pointTime: values.baseTimestamp + values.offsetSeconds,
      latitude,
      longitude,
      altitude: values.altitude,
      groundSpeed: values.groundSpeed,
      heading: values.heading,
      geometricAltitude: values.geometricAltitude,
      details: values.callSign === UNKNOWN_CALL_SIGN ? null : { flight: values.callSign },
      registration: values.registration,
      model: values.model,
      description: values.description,
      callSign: values.callSign,
      legId: values.legId,
      flightLegKey: values.flightLegKey,
      localDate: values.localDate,
      localTime: values.localTime,
      attributes,
      geometry: { type: 'Point', coordinates: [longitude, latitude] },
    });
  });

  return { points, dropped };
}
