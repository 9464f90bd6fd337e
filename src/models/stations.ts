import { z } from 'zod';
import { nullableBoolean, nullableNumber, nullableString, resource } from './common.js';

export const stationSchema = resource({
  id: z.string(),
  name: z.string(),
  description: nullableString,
  timezone: nullableString,
  active: nullableBoolean,
  created_at: nullableString,
  updated_at: nullableString,
});
export type Station = z.infer<typeof stationSchema>;

export const mountSchema = resource({
  id: z.string(),
  station_id: z.string(),
  name: z.string(),
  url: nullableString,
  format: nullableString,
  bitrate: nullableNumber,
  channels: nullableNumber,
  sample_rate: nullableNumber,
});
export type Mount = z.infer<typeof mountSchema>;

export const logEntrySchema = resource({
  timestamp: z.string(),
  level: z.string(),
  component: nullableString,
  message: z.string(),
  station_id: nullableString,
  fields: z.record(z.string(), z.unknown()).nullable(),
});
export type LogEntry = z.infer<typeof logEntrySchema>;

/** Log query result; system-wide queries add `station_names`. */
export const logResponseSchema = resource({
  entries: z.array(logEntrySchema).nullable(),
  count: nullableNumber,
  station_names: z.record(z.string(), z.string()).nullable(),
});
export type LogResponse = z.infer<typeof logResponseSchema>;

/** Severity filter accepted by the log endpoints. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
