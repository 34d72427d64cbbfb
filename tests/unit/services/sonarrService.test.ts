import { describe, it, expect } from 'vitest';
import { sonarrService } from '../../../src/services/sonarrService.js';
import { createFakeClient } from '../../helpers/fakeStarrHttp.js';

const now = new Date('2024-05-01T12:00:00Z');
const window = { start: '2024-05-01', end: '2024-05-08' };

describe('SonarrService', () => {
  describe('getQueue', () => {
    it('should format queue records with series and episode titles', async () => {
      const { client, http } = createFakeClient({
        '/api/v3/queue': {
          totalRecords: 25,
          records: [
            {
              series: { title: 'The Show' },
              episode: { seasonNumber: 1, episodeNumber: 2 },
              quality: { quality: { name: 'HDTV-1080p' } },
              status: 'downloading',
              size: 1000,
              sizeleft: 250,
              timeleft: '00:10:00',
            },
            { title: 'Orphan.Release.720p', size: 0 },
          ],
        },
      });

      const queue = await sonarrService.getQueue(client);

      expect(queue).toEqual({
        count: 25,
        items: [
          { title: 'The Show [S01E02]', quality: 'HDTV-1080p', status: 'downloading', progress: 75, eta: '00:10:00' },
          { title: 'Orphan.Release.720p', quality: 'Unknown', status: 'unknown', progress: 0, eta: 'pending' },
        ],
      });
      expect(http.paramsFor('/api/v3/queue')).toEqual({
        pageSize: 20,
        includeUnknownSeriesItems: false,
        includeSeries: true,
        includeEpisode: true,
      });
    });

    it('should show at most 10 items and count records when no total is given', async () => {
      const records = Array.from({ length: 12 }, (_, index) => ({ title: `Release ${index + 1}` }));
      const { client } = createFakeClient({ '/api/v3/queue': { records } });

      const queue = await sonarrService.getQueue(client);

      expect(queue.count).toBe(12);
      expect(queue.items).toHaveLength(10);
      expect(queue.items[9].title).toBe('Release 10');
    });

    it('should return an empty section when the request fails', async () => {
      const { client } = createFakeClient({});

      await expect(sonarrService.getQueue(client)).resolves.toEqual({ count: 0, items: [] });
    });
  });

  describe('getCalendar', () => {
    it('should format episodes with air dates, networks and days until airing', async () => {
      const { client, http } = createFakeClient({
        '/api/v3/calendar': [
          {
            seasonNumber: 2,
            episodeNumber: 5,
            airDate: '2024-05-02',
            airDateUtc: '2024-05-03T01:00:00Z',
            series: { title: 'The Show', network: 'HBO' },
          },
          { seasonNumber: 1, episodeNumber: 1, airDate: '2024-04-29', series: { title: 'Old Show' } },
          { seasonNumber: 1, episodeNumber: 1, series: { title: 'No Date' } },
        ],
      });

      const calendar = await sonarrService.getCalendar(client, '2024-05-01', window);

      expect(calendar).toEqual({
        count: 3,
        items: [
          { title: 'The Show [S02E05]', air_date: '2024-05-03', air_date_time: '2024-05-03T01:00:00Z', network: 'HBO', days_until: 2 },
          { title: 'Old Show [S01E01]', air_date: '2024-04-29', air_date_time: '2024-04-29', network: null, days_until: -2 },
          { title: 'No Date [S01E01]', air_date: null, air_date_time: null, network: null, days_until: 0 },
        ],
      });
      expect(http.paramsFor('/api/v3/calendar')).toEqual({
        start: '2024-05-01',
        end: '2024-05-08',
        unmonitored: false,
        includeSeries: true,
      });
    });

    it('should keep items with unparsable dates', async () => {
      const { client } = createFakeClient({
        '/api/v3/calendar': [{ seasonNumber: 1, episodeNumber: 3, airDateUtc: 'TBA', series: { title: 'Mystery' } }],
      });

      const calendar = await sonarrService.getCalendar(client, '2024-05-01', window);

      expect(calendar.items).toEqual([
        { title: 'Mystery [S01E03]', air_date: null, air_date_time: null, network: null, days_until: 0 },
      ]);
    });

    it('should report the full count but show only 10 items', async () => {
      const entries = Array.from({ length: 14 }, (_, index) => ({
        seasonNumber: 1,
        episodeNumber: index + 1,
        airDate: '2024-05-02',
        series: { title: 'Daily Show' },
      }));
      const { client } = createFakeClient({ '/api/v3/calendar': entries });

      const calendar = await sonarrService.getCalendar(client, '2024-05-01', window);

      expect(calendar.count).toBe(14);
      expect(calendar.items).toHaveLength(10);
    });
  });

  describe('getHealth', () => {
    it('should be ok when there are no health entries', async () => {
      const { client } = createFakeClient({ '/api/v3/health': [] });
      await expect(sonarrService.getHealth(client)).resolves.toEqual({ status: 'ok' });
    });

    it('should be a warning when entries exist without errors', async () => {
      const { client } = createFakeClient({ '/api/v3/health': [{ type: 'warning', message: 'Indexer unavailable' }] });
      await expect(sonarrService.getHealth(client)).resolves.toEqual({ status: 'warning' });
    });

    it('should be an error when any entry is an error', async () => {
      const { client } = createFakeClient({ '/api/v3/health': [{ type: 'notice' }, { type: 'error' }] });
      await expect(sonarrService.getHealth(client)).resolves.toEqual({ status: 'error' });
    });

    it('should be ok when the request fails', async () => {
      const { client } = createFakeClient({});
      await expect(sonarrService.getHealth(client)).resolves.toEqual({ status: 'ok' });
    });
  });

  describe('getRecentlyAdded', () => {
    it('should keep imports only, count up to 10 and show 6', async () => {
      const imports = Array.from({ length: 11 }, (_, index) => ({
        eventType: 'downloadFolderImported',
        series: { title: `Show ${index + 1}` },
        episode: { seasonNumber: 1, episodeNumber: index + 1 },
        date: '2024-05-01T11:00:00Z',
      }));
      const { client, http } = createFakeClient({
        '/api/v3/history': {
          records: [
            { eventType: 'grabbed', series: { title: 'Grabbed Show' }, date: '2024-05-01T11:59:00Z' },
            ...imports,
          ],
        },
      });

      const recent = await sonarrService.getRecentlyAdded(client, now);

      expect(recent.count).toBe(10);
      expect(recent.items).toHaveLength(6);
      expect(recent.items[0]).toEqual({ title: 'Show 1 [S01E01]', time_ago: '1 hour ago' });
      expect(http.paramsFor('/api/v3/history')).toEqual({
        pageSize: 50,
        sortKey: 'date',
        sortDirection: 'descending',
        includeSeries: true,
        includeEpisode: true,
      });
    });

    it('should fall back to the source title', async () => {
      const { client } = createFakeClient({
        '/api/v3/history': {
          records: [{ eventType: 'downloadFolderImported', sourceTitle: 'Some.Release.1080p', date: '2024-04-28T12:00:00Z' }],
        },
      });

      const recent = await sonarrService.getRecentlyAdded(client, now);

      expect(recent).toEqual({ count: 1, items: [{ title: 'Some.Release.1080p', time_ago: '3 days ago' }] });
    });

    it('should return an empty section when there is no history', async () => {
      const { client } = createFakeClient({ '/api/v3/history': { records: [] } });
      await expect(sonarrService.getRecentlyAdded(client, now)).resolves.toEqual({ count: 0, items: [] });
    });
  });

  describe('getStats', () => {
    it('should sum episode counts and library size over all series', async () => {
      const { client } = createFakeClient({
        '/api/v3/series': [
          { title: 'A', statistics: { totalEpisodeCount: 10, episodeFileCount: 8, sizeOnDisk: 1073741824 } },
          { title: 'B', statistics: { totalEpisodeCount: 5, episodeFileCount: 5, sizeOnDisk: 1073741824 } },
          { title: 'C' },
        ],
        '/api/v3/wanted/missing': { totalRecords: 2, records: [] },
      });

      await expect(sonarrService.getStats(client)).resolves.toEqual({
        total_series: 3,
        total_episodes: 15,
        episodes_on_disk: 13,
        episodes_missing: 2,
        monitored_missing: 2,
        library_size_bytes: 2147483648,
        library_size_formatted: '2.0 GB',
      });
    });

    it('should return empty stats when the series listing fails', async () => {
      const { client } = createFakeClient({ '/api/v3/wanted/missing': { totalRecords: 4 } });
      await expect(sonarrService.getStats(client)).resolves.toEqual({});
    });

    it('should report zero missing when the wanted request fails', async () => {
      const { client } = createFakeClient({ '/api/v3/series': [{ title: 'Bare Series' }] });

      await expect(sonarrService.getStats(client)).resolves.toEqual({
        total_series: 1,
        total_episodes: 0,
        episodes_on_disk: 0,
        episodes_missing: 0,
        monitored_missing: 0,
        library_size_bytes: 0,
        library_size_formatted: '--',
      });
    });

    it('should return empty stats for an empty library', async () => {
      const { client } = createFakeClient({
        '/api/v3/series': [],
        '/api/v3/wanted/missing': { totalRecords: 0 },
      });
      await expect(sonarrService.getStats(client)).resolves.toEqual({});
    });
  });
});
