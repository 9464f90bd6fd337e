import type { EndpointTransport } from '../core/types.js';
import { type JsonObject, jsonObjectSchema } from '../models/common.js';
import { type ScheduleEntry, scheduleEntrySchema } from '../models/scheduling.js';
import type { DateRange } from '../types/request.js';
import type { SafeWrapAsync } from '../utils/wrap.js';

const scheduleEntryListSchema = scheduleEntrySchema.array();

export class ScheduleMethods {
  readonly #transport: EndpointTransport;

  constructor(transport: EndpointTransport) {
    this.#transport = transport;
  }

  /** Entries scheduled over the next `hours` hours. */
  list(stationId: string, hours = 24): SafeWrapAsync<Error, ScheduleEntry[]> {
    return this.#transport.list(
      { method: 'GET', path: '/schedule', query: { station_id: stationId, hours } },
      'entries',
      scheduleEntryListSchema,
    );
  }

  /** Asks the backend to rebuild the station's schedule. */
  refresh(stationId: string): SafeWrapAsync<Error, JsonObject> {
    return this.#transport.object(
      { method: 'POST', path: '/schedule/refresh', json: { station_id: stationId } },
      jsonObjectSchema,
    );
  }

  /** Schedule as an iCalendar document, returned as text. */
  exportICal(stationId: string, range: DateRange = {}): SafeWrapAsync<Error, string> {
    return this.#transport.text({
      method: 'GET',
      path: '/schedule/export',
      query: { station_id: stationId, format: 'ical', start: range.start, end: range.end },
    });
  }
}
