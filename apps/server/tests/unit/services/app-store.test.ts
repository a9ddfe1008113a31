import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { AppStore } from '@/services/app-store.js';
import { LivenessProber } from '@/services/liveness-prober.js';
import { FakeHttp } from '../../helpers/fake-http.js';

describe('app-store.ts', () => {
  let dataDir: string;
  let http: FakeHttp;
  let store: AppStore;

  beforeEach(async () => {
    dataDir = await fs.mkdtemp(path.join(os.tmpdir(), 'app-store-test-'));
    http = new FakeHttp();
    store = new AppStore(dataDir, new LivenessProber(http.client));
  });

  afterEach(async () => {
    await fs.rm(dataDir, { recursive: true, force: true });
  });

  async function names(): Promise<string[]> {
    return (await store.list()).map((app) => app.name);
  }

  async function seed(...appNames: string[]): Promise<void> {
    for (const name of appNames) {
      await store.add(name, `http://${name}.lan`, '');
    }
  }

  describe('list', () => {
    it('should create an empty apps.json when missing', async () => {
      expect(await store.list()).toEqual([]);
      const raw = await fs.readFile(path.join(dataDir, 'apps.json'), 'utf-8');
      expect(JSON.parse(raw)).toEqual([]);
    });

    it('should read a malformed file as empty', async () => {
      await fs.writeFile(path.join(dataDir, 'apps.json'), '{not json');
      expect(await store.list()).toEqual([]);
    });

    it('should drop records without a name or url', async () => {
      await fs.writeFile(
        path.join(dataDir, 'apps.json'),
        JSON.stringify([{ name: 'ok', url: 'http://ok' }, { name: 'no-url' }, 42])
      );
      expect(await store.list()).toEqual([{ name: 'ok', url: 'http://ok', icon: '' }]);
    });
  });

  describe('add and delete', () => {
    it('should normalize, probe and delete (end-to-end)', async () => {
      http.on('http://192.168.1.5', { status: 200 });

      await store.add('plex', '192.168.1.5', 'plex.png');
      const listed = await store.listWithStatus();

      expect(listed).toHaveLength(1);
      expect(listed[0]).toMatchObject({
        name: 'plex',
        url: 'http://192.168.1.5',
        icon: 'plex.png',
        online: true,
      });

      expect(await store.delete('plex')).toBe(true);
      expect(await store.list()).toEqual([]);
    });

    it('should replace an app with the same name at the end', async () => {
      await seed('a', 'b');
      await store.add('a', 'http://new', '');

      expect(await store.list()).toEqual([
        { name: 'b', url: 'http://b.lan', icon: '' },
        { name: 'a', url: 'http://new', icon: '' },
      ]);
    });

    it('should report false when deleting an unknown app', async () => {
      expect(await store.delete('ghost')).toBe(false);
    });

    it('should delete everything', async () => {
      await seed('a', 'b');
      await store.deleteAll();
      expect(await store.list()).toEqual([]);
    });
  });

  describe('listWithStatus', () => {
    it('should keep order and mark unreachable apps offline', async () => {
      await seed('a', 'b', 'c');
      http.on('http://b.lan', { status: 204 });

      const listed = await store.listWithStatus();

      expect(listed.map((app) => [app.name, app.online])).toEqual([
        ['a', false],
        ['b', true],
        ['c', false],
      ]);
      expect(listed[0].response_time).toBe(0);
    });
  });

  describe('update', () => {
    it('should edit fields in place and normalize the url', async () => {
      await seed('a', 'b');

      expect(await store.update('a', { name: 'alpha', url: '10.0.0.2', icon: '' })).toBe(true);
      expect(await store.list()).toEqual([
        { name: 'alpha', url: 'http://10.0.0.2', icon: '' },
        { name: 'b', url: 'http://b.lan', icon: '' },
      ]);
    });

    it('should refuse a rename onto another app', async () => {
      await seed('a', 'b');

      expect(await store.update('a', { name: 'b' })).toBe(false);
      expect(await names()).toEqual(['a', 'b']);
    });

    it('should refuse an unknown app', async () => {
      expect(await store.update('ghost', { url: 'x' })).toBe(false);
    });
  });

  describe('reorder', () => {
    it('should move an app before another', async () => {
      await seed('a', 'b', 'c');
      expect(await store.reorder('c', 'a', 'before')).toBe(true);
      expect(await names()).toEqual(['c', 'a', 'b']);
    });

    it('should move an app after another', async () => {
      await seed('a', 'b', 'c');
      expect(await store.reorder('a', 'b', 'after')).toBe(true);
      expect(await names()).toEqual(['b', 'a', 'c']);
    });

    it('should succeed without change when moving onto itself', async () => {
      await seed('a', 'b');
      expect(await store.reorder('a', 'a')).toBe(true);
      expect(await names()).toEqual(['a', 'b']);
    });

    it('should report false for unknown names', async () => {
      await seed('a');
      expect(await store.reorder('a', 'ghost')).toBe(false);
      expect(await store.reorder('ghost', 'a')).toBe(false);
    });
  });

  describe('applyOrder', () => {
    it('should put named apps first and keep the rest in order', async () => {
      await seed('a', 'b', 'c');
      expect(await store.applyOrder(['b', 'a'])).toBe(true);
      expect(await names()).toEqual(['b', 'a', 'c']);
    });

    it('should ignore unknown and repeated names', async () => {
      await seed('a', 'b', 'c');
      expect(await store.applyOrder(['x', 'c', 'c'])).toBe(true);
      expect(await names()).toEqual(['c', 'a', 'b']);
    });

    it('should leave the list unchanged for only unknown names', async () => {
      await seed('a', 'b', 'c');
      await store.applyOrder(['x']);
      expect(await names()).toEqual(['a', 'b', 'c']);
    });

    it('should report false for an empty order or empty store', async () => {
      expect(await store.applyOrder([])).toBe(false);
      expect(await store.applyOrder(['a'])).toBe(false);
    });
  });

  describe('merge', () => {
    it('should skip duplicates by url or case-insensitive name', async () => {
      await store.add('Plex', '192.168.1.5', '');

      const added = await store.merge([
        { name: 'plex', url: 'http://other' },
        { name: 'Other Plex', url: '192.168.1.5' },
        { name: 'Jellyfin', url: '192.168.1.6:8096', icon: 'jf.png' },
        { name: 'jellyfin', url: 'http://dup' },
        { name: '', url: 'http://nameless' },
        { name: 'no-url' },
      ]);

      expect(added).toBe(1);
      expect(await store.list()).toEqual([
        { name: 'Plex', url: 'http://192.168.1.5', icon: '' },
        { name: 'Jellyfin', url: 'http://192.168.1.6:8096', icon: 'jf.png' },
      ]);
    });
  });

  describe('concurrency', () => {
    it('should apply overlapping writes one after another', async () => {
      await Promise.all([
        store.add('a', 'http://a', ''),
        store.add('b', 'http://b', ''),
        store.add('c', 'http://c', ''),
      ]);

      expect(await names()).toEqual(['a', 'b', 'c']);
    });

    it('should not let a first read erase a concurrent add', async () => {
      const file = path.join(dataDir, 'apps.json');
      for (let i = 0; i < 10; i++) {
        await fs.rm(file, { force: true });

        await Promise.all([store.list(), store.add(`app${i}`, `app${i}.lan`, '')]);

        expect(await names()).toEqual([`app${i}`]);
      }
    });
  });
});
