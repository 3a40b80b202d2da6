#!/usr/bin/env node
/**
 * leg-tracer command line
 *
 *   leg-tracer fetch --icao a1b2c3,0d086e --start 2025-01-01 --end 2025-01-07 [--output data]
 *   leg-tracer fetch --list aircraft.json --recent
 *   leg-tracer process --input data/raw_0d086e_2025-01-01_2025-01-07.csv [--filter-ground]
 *                      [--threshold 3600] [--timezone America/Los_Angeles]
 *                      [--list aircraft.json --key flight --value owner [--column owner]]
 *   leg-tracer export --input data/processed_0d086e_2025-01-01_2025-01-07.geojson --format csv|geojson|lines
 */

import path from 'path';
import { z } from 'zod';
import config from '../config';
import traceFileRepository, { TraceFileRepository } from '../repositories/TraceFileRepository';
import { calendarDateSchema } from '../schemas/trace.schemas';
import aircraftRegistry, { AircraftRegistry, createCallSignLookup } from '../services/AircraftRegistry';
import { buildLegFeatures, buildPointFeatures } from '../services/GeometryBuilder';
import tracePipeline, { TracePipeline } from '../services/TracePipeline';
import type { SegmentOptions, TraceQuery } from '../types/trace.types';
import { ConfigurationError, TraceError } from '../utils/errors';
import logger from '../utils/logger';

export type ParsedArgs = {
  command: string | null;
  options: Record<string, string | true>;
};

export interface CliDependencies {
  pipeline: TracePipeline;
  registry: AircraftRegistry;
  repository: TraceFileRepository;
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const options: Record<string, string | true> = {};
  let command: string | null = null;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg.startsWith('--')) {
      const [name, inlineValue] = arg.slice(2).split(/=(.*)/s, 2);
      const next = argv[i + 1];
      if (inlineValue !== undefined) {
        options[name] = inlineValue;
      } else if (next !== undefined && !next.startsWith('--')) {
        options[name] = next;
        i += 1;
      } else {
        options[name] = true;
      }
    } else if (command === null) {
      command = arg;
    }
  }

  return { command, options };
}

const stringOption = z.string().min(1);
const flagOption = z.literal(true).optional().transform((value) => value === true);

const fetchOptionsSchema = z.object({
  icao: stringOption.optional(),
  list: stringOption.optional(),
  start: calendarDateSchema.optional(),
  end: calendarDateSchema.optional(),
  recent: flagOption,
  output: stringOption.default('data'),
});

const processOptionsSchema = z.object({
  input: stringOption,
  'filter-ground': flagOption,
  threshold: z.coerce.number().positive().optional(),
  timezone: stringOption.optional(),
  list: stringOption.optional(),
  key: stringOption.default('flight'),
  value: stringOption.optional(),
  column: stringOption.optional(),
  output: stringOption.optional(),
});

const exportOptionsSchema = z.object({
  input: stringOption,
  format: z.enum(['csv', 'geojson', 'lines']).default('geojson'),
});

function parseOptions<T extends z.ZodTypeAny>(
  schema: T,
  options: Record<string, string | true>,
  command: string,
): z.infer<T> {
  const parsed = schema.safeParse(options);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `--${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid options for ${command}: ${details}`);
  }
  return parsed.data;
}

async function fetchCommand(options: Record<string, string | true>, deps: CliDependencies): Promise<number> {
  const opts = parseOptions(fetchOptionsSchema, options, 'fetch');

  let query: TraceQuery;
  if (opts.recent) {
    query = { mode: 'recent' };
  } else if (opts.start && opts.end) {
    query = { mode: 'range', start: opts.start, end: opts.end };
  } else {
    throw new ConfigurationError('fetch needs --start and --end, or --recent');
  }

  const aircraftIds = opts.icao ? opts.icao.split(',') : undefined;
  const traces = await deps.pipeline.fetchTraces({ aircraftIds, listSource: opts.list }, query);
  if (traces.emptyReason) {
    logger.warn('No flight data found', { reason: traces.emptyReason, misses: traces.misses.length });
    return 0;
  }

  const label = aircraftIds?.length === 1 ? aircraftIds[0].trim().toLowerCase() : 'aircraft';
  const span = query.mode === 'recent' ? 'recent' : `${query.start}_${query.end}`;
  const filePath = path.join(opts.output, `raw_${label}_${span}.csv`);
  await deps.repository.writeRawTable(filePath, traces.points);
  logger.info(`Saved raw data to ${filePath}`);
  return 0;
}

async function processCommand(options: Record<string, string | true>, deps: CliDependencies): Promise<number> {
  const opts = parseOptions(processOptionsSchema, options, 'process');
  const raw = await deps.repository.readRawTable(opts.input);

  const overrides: Partial<SegmentOptions> = {};
  if (opts['filter-ground']) {
    overrides.filterGround = true;
  }
  if (opts.threshold !== undefined) {
    overrides.gapThresholdSeconds = opts.threshold;
  }
  if (opts.timezone) {
    overrides.timeZone = opts.timezone;
  }
  if (opts.list) {
    if (!opts.value) {
      throw new ConfigurationError('--list for process needs --value naming the attribute to join');
    }
    const entries = await deps.registry.loadAircraftList(opts.list);
    overrides.callSignLookup = createCallSignLookup(entries, {
      keyField: opts.key,
      valueField: opts.value,
      column: opts.column,
    });
  }

  const result = deps.pipeline.process(raw.points, overrides, [], raw.dropped);
  if (result.status === 'empty') {
    logger.warn('Processing produced no rows', { reason: result.reason, dropped: result.dropped.length });
    return 0;
  }

  const base = path.basename(opts.input).replace(/^raw_/, 'processed_').replace(/\.csv$/i, '');
  const outputDir = opts.output ?? path.dirname(opts.input);
  const pointsPath = path.join(outputDir, `${base}.geojson`);
  const legsPath = path.join(outputDir, `${base}_legs.geojson`);
  await deps.repository.writeProcessedPoints(pointsPath, result.points);
  await deps.repository.writeGeoJson(legsPath, result.legs);
  logger.info(`Processed data saved as ${pointsPath} and ${legsPath}`, {
    points: result.points.length,
    legs: result.legs.features.length,
  });
  return 0;
}

async function exportCommand(options: Record<string, string | true>, deps: CliDependencies): Promise<number> {
  const opts = parseOptions(exportOptionsSchema, options, 'export');
  const { points, dropped } = await deps.repository.readProcessedPoints(opts.input);
  if (dropped.length > 0) {
    logger.warn('Skipped unreadable features', { dropped: dropped.length });
  }

  const base = path.join(
    path.dirname(opts.input),
    path.basename(opts.input).replace(/^processed_/, 'exported_').replace(/\.[^.]+$/, ''),
  );

  let outputFile: string;
  if (opts.format === 'csv') {
    outputFile = `${base}.csv`;
    await deps.repository.writePointsCsv(outputFile, points);
  } else if (opts.format === 'lines') {
    outputFile = `${base}_legs.geojson`;
    await deps.repository.writeGeoJson(outputFile, buildLegFeatures(points));
  } else {
    outputFile = `${base}.geojson`;
    await deps.repository.writeGeoJson(outputFile, buildPointFeatures(points));
  }

  logger.info(`Exported data as ${outputFile}`);
  return 0;
}

const COMMANDS: Record<string, (options: Record<string, string | true>, deps: CliDependencies) => Promise<number>> = {
  fetch: fetchCommand,
  process: processCommand,
  export: exportCommand,
};

export async function runCli(
  argv: readonly string[],
  deps: CliDependencies = {
    pipeline: tracePipeline,
    registry: aircraftRegistry,
    repository: traceFileRepository,
  },
): Promise<number> {
  const { command, options } = parseArgs(argv);
  const handler = command ? COMMANDS[command] : undefined;
  if (!handler) {
    logger.error(`Unknown command "${command ?? ''}". Use one of: ${Object.keys(COMMANDS).join(', ')}`);
    return 1;
  }

  try {
    return await handler(options, deps);
  } catch (error) {
    if (error instanceof TraceError) {
      logger.error(error.message, { code: error.code });
      return 1;
    }
    throw error;
  }
}

if (require.main === module) {
  logger.debug('Starting leg-tracer', { env: config.env });
  runCli(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      logger.error('leg-tracer failed', { error: (error as Error).message, stack: (error as Error).stack });
      process.exitCode = 1;
    });
}
