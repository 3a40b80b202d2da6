import type {
  AggregatedTraces,
  DroppedRow,
  EmptyReason,
  FetchMiss,
  LegPoint,
  SegmentOptions,
  TracePoint,
  TraceQuery,
} from '../types/trace.types';
import logger from '../utils/logger';
import aircraftRegistry, { AircraftRegistry, type AircraftSelection } from './AircraftRegistry';
import { buildLegFeatures, type LegFeatureCollection } from './GeometryBuilder';
import legSegmenter, { LegSegmenter } from './LegSegmenter';
import traceAggregator, { TraceAggregator } from './TraceAggregator';
import traceQueryBuilder, { TraceQueryBuilder } from './TraceQueryBuilder';

export interface PipelineRequest extends AircraftSelection {
  query: TraceQuery;
  segment?: Partial<SegmentOptions>;
}

export type PipelineResult =
  | {
    status: 'ok';
    points: LegPoint[];
    legs: LegFeatureCollection;
    misses: FetchMiss[];
    dropped: DroppedRow[];
  }
  | {
    status: 'empty';
    reason: EmptyReason;
    misses: FetchMiss[];
    dropped: DroppedRow[];
  };

export interface PipelineDependencies {
  registry: AircraftRegistry;
  queryBuilder: TraceQueryBuilder;
  aggregator: TraceAggregator;
  segmenter: LegSegmenter;
}

/**
 * Query → fetch → aggregate → segment → legs. Empty outcomes come back as
 * `status: 'empty'` with the cause, so a failed fetch and an all-ground trace
 * can be told apart.
 */
export class TracePipeline {
  private readonly deps: PipelineDependencies;

  constructor(deps: Partial<PipelineDependencies> = {}) {
    this.deps = {
      registry: deps.registry ?? aircraftRegistry,
      queryBuilder: deps.queryBuilder ?? traceQueryBuilder,
      aggregator: deps.aggregator ?? traceAggregator,
      segmenter: deps.segmenter ?? legSegmenter,
    };
  }

  async fetchTraces(selection: AircraftSelection, query: TraceQuery): Promise<AggregatedTraces> {
    const { aircraftIds } = await this.deps.registry.resolveAircraft(selection);
    const requests = this.deps.queryBuilder.buildRequests(aircraftIds, query);
    logger.info('Fetching traces', {
      aircraft: aircraftIds.length,
      requests: requests.length,
      mode: query.mode,
    });
    return this.deps.aggregator.collectTraces(requests);
  }

  async run(request: PipelineRequest): Promise<PipelineResult> {
    const traces = await this.fetchTraces(request, request.query);
    if (traces.emptyReason) {
      return {
        status: 'empty',
        reason: traces.emptyReason,
        misses: traces.misses,
        dropped: traces.dropped,
      };
    }
    return this.process(traces.points, request.segment, traces.misses, traces.dropped);
  }

  process(
    points: readonly TracePoint[],
    options: Partial<SegmentOptions> = {},
    misses: FetchMiss[] = [],
    fetchDropped: DroppedRow[] = [],
  ): PipelineResult {
    const segmented = this.deps.segmenter.segment(points, options);
    const dropped = [...fetchDropped, ...segmented.dropped];
    if (segmented.emptyReason) {
      logger.warn('Trace processing produced no rows', { reason: segmented.emptyReason });
      return {
        status: 'empty',
        reason: segmented.emptyReason,
        misses,
        dropped,
      };
    }
    return {
      status: 'ok',
      points: segmented.points,
      legs: buildLegFeatures(segmented.points),
      misses,
      dropped,
    };
  }
}

const tracePipeline = new TracePipeline();
export default tracePipeline;
