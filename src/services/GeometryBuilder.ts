import {
  featureCollection, lineString, point as pointFeature,
} from '@turf/helpers';
import type {
  Feature, FeatureCollection, LineString, Point, Position,
} from 'geojson';
import type { LegLineProperties, LegPoint, LegPointProperties } from '../types/trace.types';
import { requireColumns } from '../utils/errors';
import { epochSecondsToIso } from '../utils/time';

export type LegGeometry = Point | LineString;
export type LegFeatureCollection = FeatureCollection<LegGeometry, LegLineProperties>;
export type PointFeatureCollection = FeatureCollection<Point, LegPointProperties>;

const LEG_GROUPING_COLUMNS = ['aircraftId', 'flightLegKey', 'pointTime'] as const;

export function toPointProperties(point: LegPoint): LegPointProperties {
  return {
    aircraftId: point.aircraftId,
    callSign: point.callSign,
    legId: point.legId,
    flightLegKey: point.flightLegKey,
    pointTime: epochSecondsToIso(point.pointTime),
    baseTimestamp: point.baseTimestamp,
    offsetSeconds: point.offsetSeconds,
    localDate: point.localDate,
    localTime: point.localTime,
    altitude: point.altitude,
    groundSpeed: point.groundSpeed,
    heading: point.heading,
    geometricAltitude: point.geometricAltitude,
    registration: point.registration,
    model: point.model,
    description: point.description,
    ...point.attributes,
  };
}

export function buildPointFeatures(points: readonly LegPoint[]): PointFeatureCollection {
  return featureCollection(points.map((point) => pointFeature(
    point.geometry.coordinates,
    toPointProperties(point),
  )));
}

/** Feature id of a leg; leg keys repeat across airframes, e.g. `unknown_leg1` */
export function legFeatureId(aircraftId: string, flightLegKey: string): string {
  return `${aircraftId}_${flightLegKey}`;
}

/**
 * One feature per (aircraft, flight leg). Points are ordered by time; a
 * one-point leg stays a Point rather than a degenerate LineString. Scalar
 * properties come from the earliest point of the leg.
 */
export function buildLegFeatures(points: readonly LegPoint[]): LegFeatureCollection {
  const legs = new Map<string, LegPoint[]>();
  points.forEach((point) => {
    requireColumns(point, LEG_GROUPING_COLUMNS, 'GeometryBuilder');
    const id = legFeatureId(point.aircraftId, point.flightLegKey);
    const members = legs.get(id);
    if (members) {
      members.push(point);
    } else {
      legs.set(id, [point]);
    }
  });

  const features: Feature<LegGeometry, LegLineProperties>[] = [];
  legs.forEach((members, id) => {
    const ordered = [...members].sort((a, b) => a.pointTime - b.pointTime);
    const first = ordered[0];
    const last = ordered[ordered.length - 1];
    const properties: LegLineProperties = {
      aircraftId: first.aircraftId,
      callSign: first.callSign,
      legId: first.legId,
      flightLegKey: first.flightLegKey,
      flightDate: first.localDate,
      pointCount: ordered.length,
      startTime: epochSecondsToIso(first.pointTime),
      endTime: epochSecondsToIso(last.pointTime),
    };

    if (ordered.length === 1) {
      features.push(pointFeature(first.geometry.coordinates, properties, { id }));
      return;
    }
    features.push(lineString(
      ordered.map((member) => member.geometry.coordinates),
      properties,
      { id },
    ));
  });

  return featureCollection(features);
}

/** Coordinates of each leg back out in travel order */
export function flattenLegFeatures(collection: LegFeatureCollection): Position[][] {
  return collection.features.map(({ geometry }) => (
    geometry.type === 'Point' ? [geometry.coordinates] : geometry.coordinates
  ));
}
