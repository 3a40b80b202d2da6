import { z } from 'zod';

export const calendarDateSchema = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');

export const traceQuerySchema = z.discriminatedUnion('mode', [
  z.object({ mode: z.literal('recent') }),
  z.object({ mode: z.literal('range'), start: calendarDateSchema, end: calendarDateSchema }),
]);

/** Top-level shape of a `trace_full_<id>.json` payload */
export const tracePayloadSchema = z.object({
  icao: z.string().optional(),
  timestamp: z.number(),
  trace: z.array(z.array(z.unknown())).optional(),
  r: z.string().nullish(),
  t: z.string().nullish(),
  desc: z.string().nullish(),
}).passthrough();

export type TracePayload = z.infer<typeof tracePayloadSchema>;

export const traceDetailsSchema = z.object({
  flight: z.string().optional(),
}).passthrough();

export const aircraftListEntrySchema = z.object({
  icao: z.string(),
}).catchall(z.unknown());

export const aircraftListSchema = z.array(aircraftListEntrySchema);

export type AircraftListEntry = z.infer<typeof aircraftListEntrySchema>;
