import type { EndpointTransport } from '../core/types.js';
import { type Show, type ShowInstance, showInstanceSchema, showSchema } from '../models/scheduling.js';
import type { DateInput } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const showListSchema = showSchema.array();
const showInstanceListSchema = showInstanceSchema.array();

/** Input of {@link ShowMethods.create}. */
export interface CreateShowInput {
  stationId: string;
  name: string;
  /** RFC 5545 recurrence rule, e.g. `FREQ=WEEKLY;BYDAY=MO`. Expanded by the backend. */
  rrule: string;
  /** First occurrence, ISO-8601. */
  dtstart: string;
  /** Defaults to 60. */
  durationMinutes?: number;
  /** Defaults to an empty string. */
  description?: string;
  /** Calendar color. Defaults to `#3B82F6`. */
  color?: string;
}

/** Recurring shows and their materialized instances. */
export class ShowMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  list(stationId: string): SafeWrapAsync<Error, Show[]> {
    return this.#transport.list(
      { method: 'GET', path: '/shows', query: { station_id: stationId } },
      'shows',
      showListSchema,
    );
  }

  get(id: string): SafeWrapAsync<Error, Show> {
    return this.#transport.object({ method: 'GET', path: '/shows/{id}', params: { id } }, showSchema);
  }

  create(input: CreateShowInput): SafeWrapAsync<Error, Show> {
    return this.#transport.object(
      {
        method: 'POST',
        path: '/shows',
        json: {
          station_id: input.stationId,
          name: input.name,
          rrule: input.rrule,
          dtstart: input.dtstart,
          default_duration_minutes: input.durationMinutes ?? 60,
          description: input.description ?? '',
          color: input.color ?? '#3B82F6',
        },
      },
      showSchema,
    );
  }

  /** Occurrences of the station's shows between `start` and `end`. */
  instances(stationId: string, start: DateInput, end: DateInput): SafeWrapAsync<Error, ShowInstance[]> {
    return this.#transport.list(
      { method: 'GET', path: '/show-instances', query: { station_id: stationId, start, end } },
      'instances',
      showInstanceListSchema,
    );
  }
}
