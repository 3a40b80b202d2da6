import { promises as fs } from 'fs';
import path from 'path';
import type { FeatureCollection } from 'geojson';
import { buildPointFeatures } from '../services/GeometryBuilder';
import type { LegPoint, TracePoint } from '../types/trace.types';
import logger from '../utils/logger';
import {
  parseLegPointsGeoJson,
  parseRawCsv,
  serializePointsCsv,
  serializeRawCsv,
  type ParsedRows,
} from '../utils/traceSerialization';

/**
 * File-backed storage for raw trace tables and processed outputs
 */
export class TraceFileRepository {
  async writeRawTable(filePath: string, points: readonly TracePoint[]): Promise<void> {
    await this.writeText(filePath, serializeRawCsv(points));
    logger.info('Saved raw trace table', { filePath, rows: points.length });
  }

  async readRawTable(filePath: string): Promise<ParsedRows<TracePoint>> {
    const parsed = parseRawCsv(await fs.readFile(filePath, 'utf8'));
    if (parsed.dropped.length > 0) {
      logger.warn('Dropped unreadable rows from raw trace table', {
        filePath,
        dropped: parsed.dropped.length,
      });
    }
    return parsed;
  }

  async writeProcessedPoints(filePath: string, points: readonly LegPoint[]): Promise<void> {
    await this.writeGeoJson(filePath, buildPointFeatures(points));
  }

  async readProcessedPoints(filePath: string): Promise<ParsedRows<LegPoint>> {
    return parseLegPointsGeoJson(await fs.readFile(filePath, 'utf8'));
  }

  async writePointsCsv(filePath: string, points: readonly LegPoint[]): Promise<void> {
    await this.writeText(filePath, serializePointsCsv(points));
    logger.info('Saved processed points as CSV', { filePath, rows: points.length });
  }

  async writeGeoJson(filePath: string, collection: FeatureCollection): Promise<void> {
    await this.writeText(filePath, JSON.stringify(collection));
    logger.info('Saved GeoJSON', { filePath, features: collection.features.length });
  }

  private async writeText(filePath: string, contents: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, contents, 'utf8');
  }
}

const traceFileRepository = new TraceFileRepository();
export default traceFileRepository;
