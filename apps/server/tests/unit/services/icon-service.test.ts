import { describe, it, expect } from 'vitest';
import {
  filterIcons,
  ICON_RAW_BASE,
  IconService,
  iconUrl,
  parseIconIndex,
} from '@/services/icon-service.js';
import { createWidgetCache } from '@/services/widgets/widget-cache.js';
import { FakeHttp } from '../../helpers/fake-http.js';

const INDEX_URL = 'https://api.github.com/repos/homarr-labs/dashboard-icons/contents/png';

const listing = [
  { name: 'plex.png' },
  { name: 'Plexamp.PNG' },
  { name: 'jellyfin.png' },
  { name: 'README.md' },
  'junk',
];

describe('icon-service.ts', () => {
  it('should encode icon names into raw URLs', () => {
    expect(iconUrl('home assistant')).toBe(`${ICON_RAW_BASE}home%20assistant.png`);
  });

  it('should keep PNG files from the index', () => {
    expect(parseIconIndex(listing)).toEqual([
      { name: 'plex', url: `${ICON_RAW_BASE}plex.png` },
      { name: 'Plexamp', url: `${ICON_RAW_BASE}Plexamp.png` },
      { name: 'jellyfin', url: `${ICON_RAW_BASE}jellyfin.png` },
    ]);
    expect(parseIconIndex({ message: 'rate limited' })).toEqual([]);
  });

  it('should match names case-insensitively up to the limit', () => {
    const icons = parseIconIndex(listing);

    expect(filterIcons(icons, ' PLEX ', 50).map((icon) => icon.name)).toEqual(['plex', 'Plexamp']);
    expect(filterIcons(icons, 'plex', 1).map((icon) => icon.name)).toEqual(['plex']);
    expect(filterIcons(icons, '', 2)).toHaveLength(2);
  });

  describe('IconService', () => {
    it('should fetch the index once and filter from the cache', async () => {
      const http = new FakeHttp().on(INDEX_URL, { json: listing });
      const service = new IconService(createWidgetCache(), http.client);

      const first = await service.search('jelly');
      const second = await service.search('plex', 1);

      expect(first).toEqual({
        ok: true,
        data: [{ name: 'jellyfin', url: `${ICON_RAW_BASE}jellyfin.png` }],
      });
      expect(second).toEqual({ ok: true, data: [{ name: 'plex', url: `${ICON_RAW_BASE}plex.png` }] });
      expect(http.requests).toHaveLength(1);
      expect(http.requests[0].options.headers).toEqual({ Accept: 'application/vnd.github+json' });
    });

    it('should be unavailable when the index cannot be fetched', async () => {
      const service = new IconService(createWidgetCache(), new FakeHttp().client);

      expect(await service.search('plex')).toEqual({ ok: false, reason: 'unavailable' });
    });
  });
});
