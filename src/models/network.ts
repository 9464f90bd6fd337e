import { z } from 'zod';
import { nullableBoolean, nullableNumber, nullableString, resource } from './common.js';

export const networkSchema = resource({
  id: z.string(),
  name: z.string(),
  description: nullableString,
  owner_id: nullableString,
  active: nullableBoolean,
});
export type Network = z.infer<typeof networkSchema>;

export const networkShowSchema = resource({
  id: z.string(),
  network_id: nullableString,
  source_show_id: nullableString,
  name: z.string(),
  description: nullableString,
  feed_url: nullableString,
  feed_type: nullableString,
  delay_minutes: nullableNumber,
  duration_minutes: nullableNumber,
  active: nullableBoolean,
});
export type NetworkShow = z.infer<typeof networkShowSchema>;

export const networkSubscriptionSchema = resource({
  id: z.string(),
  station_id: z.string(),
  network_show_id: z.string(),
  local_time: nullableString,
  local_days: nullableString,
  timezone: nullableString,
  active: nullableBoolean,
  auto_schedule: nullableBoolean,
});
export type NetworkSubscription = z.infer<typeof networkSubscriptionSchema>;

export const sponsorSchema = resource({
  id: z.string(),
  station_id: z.string(),
  name: z.string(),
  contact_name: nullableString,
  contact_email: nullableString,
  contact_phone: nullableString,
  address: nullableString,
  notes: nullableString,
  active: nullableBoolean,
});
export type Sponsor = z.infer<typeof sponsorSchema>;
