export { default as config } from './config';
export * from './types/trace.types';
export * from './utils/errors';
export { TraceQueryBuilder, normalizeAircraftIds, traceSuffix } from './services/TraceQueryBuilder';
export { TraceFetcher } from './services/TraceFetcher';
export { TraceAggregator, type TraceSource } from './services/TraceAggregator';
export {
  LegSegmenter, assignLegIds, composeFlightLegKey, fillCallSigns,
} from './services/LegSegmenter';
export {
  buildLegFeatures,
  buildPointFeatures,
  flattenLegFeatures,
  type LegFeatureCollection,
  type PointFeatureCollection,
} from './services/GeometryBuilder';
export { AircraftRegistry, createCallSignLookup } from './services/AircraftRegistry';
export { TracePipeline, type PipelineRequest, type PipelineResult } from './services/TracePipeline';
export { TraceFileRepository } from './repositories/TraceFileRepository';
export {
  parseLegPointsGeoJson, parseRawCsv, serializePointsCsv, serializeRawCsv,
} from './utils/traceSerialization';
