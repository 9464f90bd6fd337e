import { assert, describe, expect, it } from 'vitest';
import { GrimnirClient } from '../core/client.js';
import { ApiError } from '../error/apiError.js';
import { createRecordingDispatcher } from '../testing/recordingDispatcher.js';

const ICAL = 'BEGIN:VCALENDAR\r\nVERSION:2.0\r\nEND:VCALENDAR\r\n';

function setup() {
  const dispatcher = createRecordingDispatcher();
  const client = new GrimnirClient({ baseUrl: 'https://radio.example.com', apiKey: 'test-key', dispatcher: dispatcher.provider });
  return { client, dispatcher };
}

describe('ScheduleMethods', () => {
  it('lists entries for the next 24 hours by default', async () => {
    const { client, dispatcher } = setup();
    dispatcher.reply({ entries: [{ id: 'e1', station_id: 's1', source_type: 'playlist' }] });

    const [err, entries] = await client.schedule.list('s1');

    expect(err).toBeNull();
    expect(entries).toStrictEqual([{ id: 'e1', station_id: 's1', source_type: 'playlist' }]);
    expect(dispatcher.lastRequest()?.query).toStrictEqual({ station_id: 's1', hours: 24 });
  });

  it('lists entries for a custom window', async () => {
    const { client, dispatcher } = setup();
    dispatcher.reply({ entries: [] });

    await client.schedule.list('s1', 72);

    expect(dispatcher.lastRequest()?.query).toStrictEqual({ station_id: 's1', hours: 72 });
  });

  it('refreshes the schedule', async () => {
    const { client, dispatcher } = setup();
    dispatcher.reply({ status: 'refreshed' });

    const [err, result] = await client.schedule.refresh('s1');

    expect(err).toBeNull();
    expect(result).toStrictEqual({ status: 'refreshed' });
    expect(dispatcher.lastRequest()).toStrictEqual({
      method: 'POST',
      path: '/schedule/refresh',
      json: { station_id: 's1' },
    });
  });

  it('exports iCal text verbatim', async () => {
    const { client, dispatcher } = setup();
    const start = new Date('2030-01-01T00:00:00Z');
    dispatcher.reply(ICAL);

    const [err, calendar] = await client.schedule.exportICal('s1', { start, end: '2030-01-08T00:00:00Z' });

    expect(err).toBeNull();
    expect(calendar).toBe(ICAL);
    expect(dispatcher.lastRequest()?.query).toStrictEqual({
      station_id: 's1',
      format: 'ical',
      start,
      end: '2030-01-08T00:00:00Z',
    });
  });

  it('returns an ApiError for a failed export', async () => {
    const { client, dispatcher } = setup();
    dispatcher.reply('station not found', 404);

    const [err, calendar] = await client.schedule.exportICal('missing');

    expect(calendar).toBeNull();
    assert(err instanceof ApiError);
    expect(err.rawBody).toBe('station not found');
    expect(err.endpointPath).toBe('/schedule/export');
  });
});
