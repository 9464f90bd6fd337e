import { z } from 'zod';
import { nullableBoolean, nullableNumber, nullableString, resource } from './common.js';

export const scheduleEntrySchema = resource({
  id: z.string(),
  station_id: z.string(),
  mount_id: nullableString,
  title: nullableString,
  start_time: nullableString,
  starts_at: nullableString,
  ends_at: nullableString,
  source_type: nullableString,
  source_id: nullableString,
  metadata: z.record(z.string(), z.unknown()).nullable(),
});
export type ScheduleEntry = z.infer<typeof scheduleEntrySchema>;

export const showSchema = resource({
  id: z.string(),
  station_id: z.string(),
  name: z.string(),
  description: nullableString,
  host_user_id: nullableString,
  default_duration_minutes: nullableNumber,
  color: nullableString,
  rrule: nullableString,
  dtstart: nullableString,
  dtend: nullableString,
  timezone: nullableString,
  active: nullableBoolean,
});
export type Show = z.infer<typeof showSchema>;

export const showInstanceSchema = resource({
  id: z.string(),
  show_id: z.string(),
  station_id: z.string(),
  starts_at: z.string(),
  ends_at: z.string(),
  host_user_id: nullableString,
  status: nullableString,
  exception_type: nullableString,
  exception_note: nullableString,
  show: showSchema.nullable(),
});
export type ShowInstance = z.infer<typeof showInstanceSchema>;
