import { z } from 'zod';
import { nullableBoolean, nullableString, resource } from './common.js';

export const liveTokenSchema = resource({
  token: z.string(),
  station_id: z.string(),
  mount_id: z.string(),
  expires_at: nullableString,
});
export type LiveToken = z.infer<typeof liveTokenSchema>;

export const liveSessionSchema = resource({
  id: z.string(),
  station_id: z.string(),
  mount_id: nullableString,
  user_id: nullableString,
  username: nullableString,
  active: nullableBoolean,
  connected_at: nullableString,
  disconnected_at: nullableString,
});
export type LiveSession = z.infer<typeof liveSessionSchema>;

export const webstreamSchema = resource({
  id: z.string(),
  station_id: z.string(),
  name: z.string(),
  description: nullableString,
  urls: z.array(z.string()).nullable(),
  url: nullableString,
  fallback_url: nullableString,
  format: nullableString,
  active: nullableBoolean,
  current_url: nullableString,
});
export type Webstream = z.infer<typeof webstreamSchema>;

/** Audio formats a webstream relay can carry. */
export type WebstreamFormat = 'mp3' | 'ogg' | 'aac';

export const nowPlayingSchema = resource({
  station_id: nullableString,
  media_id: nullableString,
  title: nullableString,
  artist: nullableString,
  album: nullableString,
  started_at: nullableString,
  ended_at: nullableString,
});
export type NowPlaying = z.infer<typeof nowPlayingSchema>;

export const spinSchema = resource({
  id: z.string(),
  station_id: z.string(),
  mount_id: nullableString,
  media_id: nullableString,
  artist: nullableString,
  title: nullableString,
  album: nullableString,
  started_at: nullableString,
  ended_at: nullableString,
  transition: nullableString,
});
export type Spin = z.infer<typeof spinSchema>;
