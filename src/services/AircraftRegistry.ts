import { promises as fs } from 'fs';
import type { AxiosInstance } from 'axios';
import { aircraftListSchema, type AircraftListEntry } from '../schemas/trace.schemas';
import { LEG_POINT_COLUMN_NAMES, type CallSignLookup } from '../types/trace.types';
import { ConfigurationError } from '../utils/errors';
import httpClient from '../utils/httpClient';
import logger from '../utils/logger';
import { normalizeAircraftIds } from './TraceQueryBuilder';

export interface AircraftSelection {
  aircraftIds?: readonly string[];
  /** URL or file path of a JSON array of `{ icao, ... }` objects */
  listSource?: string;
}

export interface ResolvedAircraft {
  aircraftIds: string[];
  entries: AircraftListEntry[];
}

export interface CallSignLookupOptions {
  keyField: string;
  valueField: string;
  column?: string;
}

class MapCallSignLookup implements CallSignLookup {
  readonly column: string;

  private readonly values: ReadonlyMap<string, string>;

  constructor(column: string, values: ReadonlyMap<string, string>) {
    this.column = column;
    this.values = values;
  }

  get(callSign: string): string | undefined {
    return this.values.get(callSign.trim());
  }
}

export function createCallSignLookup(
  entries: readonly Record<string, unknown>[],
  { keyField, valueField, column = valueField }: CallSignLookupOptions,
): CallSignLookup {
  if (LEG_POINT_COLUMN_NAMES.some((name) => name === column)) {
    throw new ConfigurationError(`Lookup column "${column}" would overwrite a built-in point column`);
  }
  const values = new Map<string, string>();
  entries.forEach((entry) => {
    const key = entry[keyField];
    const value = entry[valueField];
    if (typeof key === 'string' && key.trim() && typeof value === 'string') {
      values.set(key.trim(), value);
    }
  });
  return new MapCallSignLookup(column, values);
}

/**
 * Resolves which aircraft to trace, either from explicit ids or from an
 * external identifier list.
 */
export class AircraftRegistry {
  private readonly client: AxiosInstance;

  constructor(client: AxiosInstance = httpClient) {
    this.client = client;
  }

  async loadAircraftList(source: string): Promise<AircraftListEntry[]> {
    let raw: unknown;
    if (/^https?:\/\//i.test(source)) {
      const response = await this.client.get<unknown>(source);
      raw = response.data;
    } else {
      const text = await fs.readFile(source, 'utf8');
      try {
        raw = JSON.parse(text);
      } catch (error) {
        throw new ConfigurationError(`Aircraft list ${source} is not valid JSON: ${(error as Error).message}`);
      }
    }

    const parsed = aircraftListSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Aircraft list ${source} must be an array of objects with an "icao" field`,
      );
    }

    logger.info('Loaded aircraft list', { source, entries: parsed.data.length });
    return parsed.data;
  }

  async resolveAircraft(selection: AircraftSelection): Promise<ResolvedAircraft> {
    if (selection.listSource) {
      const entries = await this.loadAircraftList(selection.listSource);
      const aircraftIds = normalizeAircraftIds(entries.map((entry) => entry.icao));
      if (aircraftIds.length === 0) {
        throw new ConfigurationError(`Aircraft list ${selection.listSource} contains no identifiers`);
      }
      return { aircraftIds, entries };
    }

    const aircraftIds = normalizeAircraftIds(selection.aircraftIds ?? []);
    if (aircraftIds.length === 0) {
      throw new ConfigurationError('Either aircraft identifiers or an aircraft list source must be provided');
    }
    return { aircraftIds, entries: [] };
  }
}

const aircraftRegistry = new AircraftRegistry();
export default aircraftRegistry;
