import config from '../config';
import {
  GROUND_ALTITUDE,
  UNKNOWN_CALL_SIGN,
  type DroppedRow,
  type LegPoint,
  type SegmentOptions,
  type SegmentationResult,
  type TracePoint,
} from '../types/trace.types';
import { ConfigurationError, DataCoercionError, requireColumns } from '../utils/errors';
import logger from '../utils/logger';
import { createLocalTimeFormatter } from '../utils/time';
import { extractCallSign } from '../utils/traceRows';

export const REQUIRED_TRACE_COLUMNS = [
  'aircraftId',
  'baseTimestamp',
  'offsetSeconds',
  'latitude',
  'longitude',
  'altitude',
  'details',
] as const;

interface TimedPoint {
  point: TracePoint;
  pointTime: number;
}

interface AttributedPoint extends TimedPoint {
  callSign: string;
}

interface GroupState {
  lastTime: number;
  legId: number;
}

const compareProcessingOrder = (a: TracePoint, b: TracePoint): number => {
  if (a.aircraftId !== b.aircraftId) {
    return a.aircraftId < b.aircraftId ? -1 : 1;
  }
  if (a.baseTimestamp !== b.baseTimestamp) {
    return a.baseTimestamp - b.baseTimestamp;
  }
  return a.offsetSeconds - b.offsetSeconds;
};

export function composeFlightLegKey(callSign: string, legId: number): string {
  return `${callSign}_leg${legId}`;
}

/**
 * Forward-fills call signs in processing order. The carried value starts over
 * at every aircraft so one airframe never inherits another's call sign.
 */
export function fillCallSigns(points: readonly TimedPoint[]): AttributedPoint[] {
  const filled: AttributedPoint[] = [];
  let currentAircraft: string | null = null;
  let carried: string | null = null;

  points.forEach((entry) => {
    if (entry.point.aircraftId !== currentAircraft) {
      currentAircraft = entry.point.aircraftId;
      carried = null;
    }
    carried = extractCallSign(entry.point.details) ?? carried;
    filled.push({ ...entry, callSign: carried ?? UNKNOWN_CALL_SIGN });
  });

  return filled;
}

/**
 * Assigns 1-based leg ids per (aircraft, call sign) group. A new leg starts
 * only when the gap to the previous point of the same group strictly exceeds
 * the threshold.
 */
export function assignLegIds(points: readonly AttributedPoint[], gapThresholdSeconds: number): number[] {
  const groups = new Map<string, GroupState>();

  return points.map(({ point, pointTime, callSign }) => {
    const groupKey = `${point.aircraftId}\u0000${callSign}`;
    const state = groups.get(groupKey);
    if (!state) {
      groups.set(groupKey, { lastTime: pointTime, legId: 1 });
      return 1;
    }

    if (pointTime - state.lastTime > gapThresholdSeconds) {
      state.legId += 1;
    }
    state.lastTime = pointTime;
    return state.legId;
  });
}

/**
 * Rebuilds continuous time, call signs and flight legs from a trace table.
 */
export class LegSegmenter {
  private readonly defaults: SegmentOptions;

  constructor(defaults: SegmentOptions = { ...config.legs, timeZone: config.display.timeZone }) {
    this.defaults = defaults;
  }

  segment(points: readonly TracePoint[], overrides: Partial<SegmentOptions> = {}): SegmentationResult {
    const options: SegmentOptions = { ...this.defaults, ...overrides };
    const { gapThresholdSeconds, filterGround, callSignLookup } = options;

    if (!Number.isFinite(gapThresholdSeconds) || gapThresholdSeconds <= 0) {
      throw new ConfigurationError(`Gap threshold must be a positive number of seconds, got ${gapThresholdSeconds}`);
    }
    const toLocal = createLocalTimeFormatter(options.timeZone ?? 'UTC');

    if (points.length === 0) {
      return { points: [], dropped: [], emptyReason: 'no-input' };
    }

    points.forEach((point) => requireColumns(point, REQUIRED_TRACE_COLUMNS, 'LegSegmenter'));

    const dropped: DroppedRow[] = [];
    const readable: TracePoint[] = [];
    points.forEach((point) => {
      const invalidField = LegSegmenter.findUncoercibleTime(point);
      if (invalidField) {
        const error = new DataCoercionError(invalidField, point[invalidField]);
        dropped.push({
          aircraftId: point.aircraftId,
          field: error.field,
          value: error.value,
          message: error.message,
        });
        return;
      }
      readable.push(point);
    });

    // compareProcessingOrder needs finite times.
    const timed: TimedPoint[] = readable
      .sort(compareProcessingOrder)
      .map((point) => ({ point, pointTime: point.baseTimestamp + point.offsetSeconds }));

    if (timed.length === 0) {
      return { points: [], dropped, emptyReason: 'no-valid-rows' };
    }

    const attributed = fillCallSigns(timed);
    const legIds = assignLegIds(attributed, gapThresholdSeconds);

    const segmented = attributed.map(({ point, pointTime, callSign }, index): LegPoint => {
      const legId = legIds[index];
      const attributes: Record<string, string | null> = {};
      if (callSignLookup) {
        attributes[callSignLookup.column] = callSignLookup.get(callSign) ?? null;
      }
      return {
        ...point,
        pointTime,
        callSign,
        legId,
        flightLegKey: composeFlightLegKey(callSign, legId),
        ...toLocal(pointTime),
        attributes,
        geometry: { type: 'Point', coordinates: [point.longitude, point.latitude] },
      };
    });

    // Ground points are removed only after legs are numbered so they never split a leg.
    const result = filterGround
      ? segmented.filter((point) => point.altitude !== GROUND_ALTITUDE)
      : segmented;

    logger.info('Segmented trace into flight legs', {
      points: result.length,
      legs: new Set(result.map((point) => `${point.aircraftId}_${point.flightLegKey}`)).size,
      dropped: dropped.length,
      groundFiltered: segmented.length - result.length,
      gapThresholdSeconds,
    });

    return {
      points: result,
      dropped,
      emptyReason: result.length === 0 ? 'all-points-on-ground' : null,
    };
  }

  private static findUncoercibleTime(point: TracePoint): 'baseTimestamp' | 'offsetSeconds' | null {
    if (typeof point.baseTimestamp !== 'number' || !Number.isFinite(point.baseTimestamp)) {
      return 'baseTimestamp';
    }
    if (typeof point.offsetSeconds !== 'number' || !Number.isFinite(point.offsetSeconds)) {
      return 'offsetSeconds';
    }
    return null;
  }
}

const legSegmenter = new LegSegmenter();
export default legSegmenter;
