import { z } from 'zod';
import { nullableBoolean, nullableNumber, nullableString, resource } from './common.js';

export const mediaItemSchema = resource({
  id: z.string(),
  station_id: z.string(),
  title: nullableString,
  artist: nullableString,
  album: nullableString,
  genre: nullableString,
  mood: nullableString,
  year: nullableString,
  duration: nullableNumber,
  bpm: nullableNumber,
  explicit: nullableBoolean,
  analysis_state: nullableString,
});
export type MediaItem = z.infer<typeof mediaItemSchema>;

export const playlistSchema = resource({
  id: z.string(),
  station_id: z.string(),
  name: z.string(),
  description: nullableString,
});
export type Playlist = z.infer<typeof playlistSchema>;

export const smartBlockSchema = resource({
  id: z.string(),
  station_id: z.string(),
  name: z.string(),
  description: nullableString,
  rules: z.unknown(),
  sequence: z.unknown(),
});
export type SmartBlock = z.infer<typeof smartBlockSchema>;

/**
 * One filter of a smart block. Evaluated by the backend only; `value2` is the
 * upper bound for range operators such as `between`.
 */
export interface SmartBlockRule {
  field: string;
  operator: string;
  value: string;
  value2?: string;
}

/** Track orderings a smart block can produce. */
export type SmartBlockSort = 'random' | 'newest' | 'oldest' | 'title' | 'artist';
