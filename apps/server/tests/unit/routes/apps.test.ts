import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { parseCandidates } from '@/routes/apps/routes/import.js';
import { DEFAULT_ICON } from '@/services/icon-service.js';
import { createTestApp, type TestApp } from '../../helpers/test-app.js';

describe('apps routes', () => {
  let t: TestApp;

  beforeEach(async () => {
    t = await createTestApp();
  });

  afterEach(async () => {
    await t.cleanup();
  });

  async function names(): Promise<string[]> {
    return (await t.apps.list()).map((app) => app.name);
  }

  describe('GET /api/apps', () => {
    it('should return an empty list with the default icon', async () => {
      const res = await request(t.app).get('/api/apps');

      expect(res.status).toBe(200);
      expect(res.body).toEqual({ success: true, apps: [], default_icon: DEFAULT_ICON });
    });

    it('should mark unreachable apps offline', async () => {
      await t.apps.add('NAS', 'nas.lan:5000', 'nas.png');

      const res = await request(t.app).get('/api/apps');

      expect(res.body.apps).toEqual([
        { name: 'NAS', url: 'http://nas.lan:5000', icon: 'nas.png', online: false, response_time: 0 },
      ]);
    });

    it('should report reachable apps online', async () => {
      t.http.on('http://nas.lan:5000', { status: 200 });
      await t.apps.add('NAS', 'nas.lan:5000', 'nas.png');

      const res = await request(t.app).get('/api/apps');

      expect(res.body.apps[0].online).toBe(true);
    });
  });

  describe('POST /api/apps/add', () => {
    it('should trim input, normalize the URL and default the icon', async () => {
      const res = await request(t.app)
        .post('/api/apps/add')
        .send({ name: ' Plex ', url: '192.168.1.5:32400' });

      expect(res.status).toBe(201);
      expect(res.body).toEqual({
        success: true,
        app: { name: 'Plex', url: 'http://192.168.1.5:32400', icon: DEFAULT_ICON },
      });
      expect(t.emitted).toEqual([
        { type: 'apps:changed', payload: { action: 'added', name: 'Plex' } },
      ]);
    });

    it('should accept form-encoded bodies', async () => {
      const res = await request(t.app)
        .post('/api/apps/add')
        .type('form')
        .send({ name: 'Router', url: 'https://192.168.1.1', icon: 'router.png' });

      expect(res.status).toBe(201);
      expect(await t.apps.get('Router')).toEqual({
        name: 'Router',
        url: 'https://192.168.1.1',
        icon: 'router.png',
      });
    });

    it('should reject a missing name or URL', async () => {
      const res = await request(t.app).post('/api/apps/add').send({ name: 'Plex', url: '  ' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'Name and URL/IP are required.' });
      expect(t.emitted).toEqual([]);
    });
  });

  describe('/api/apps/:name', () => {
    beforeEach(async () => {
      await t.apps.add('Plex', 'plex.lan', 'plex.png');
      await t.apps.add('Sonarr', 'sonarr.lan', 'sonarr.png');
    });

    it('should return one app', async () => {
      const res = await request(t.app).get('/api/apps/Plex');

      expect(res.body).toEqual({
        success: true,
        app: { name: 'Plex', url: 'http://plex.lan', icon: 'plex.png' },
      });
    });

    it('should 404 for an unknown app', async () => {
      const res = await request(t.app).get('/api/apps/Radarr');

      expect(res.status).toBe(404);
      expect(res.body).toEqual({ success: false, error: 'App not found' });
    });

    it('should rename an app in place', async () => {
      const res = await request(t.app).put('/api/apps/Plex').send({ name: 'Plex Server' });

      expect(res.body).toEqual({ success: true });
      expect(await names()).toEqual(['Plex Server', 'Sonarr']);
      expect(t.emitted).toEqual([
        { type: 'apps:changed', payload: { action: 'updated', name: 'Plex' } },
      ]);
    });

    it('should refuse a rename onto another app', async () => {
      const res = await request(t.app).put('/api/apps/Plex').send({ name: 'Sonarr' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'Update failed or name conflict' });
    });

    it('should delete one app', async () => {
      const res = await request(t.app).delete('/api/apps/Plex');

      expect(res.body).toEqual({ success: true });
      expect(await names()).toEqual(['Sonarr']);
      expect((await request(t.app).delete('/api/apps/Plex')).status).toBe(404);
    });

    it('should delete every app', async () => {
      const res = await request(t.app).delete('/api/apps');

      expect(res.body).toEqual({ success: true });
      expect(await names()).toEqual([]);
      expect(t.emitted).toEqual([{ type: 'apps:changed', payload: { action: 'cleared' } }]);
    });
  });

  describe('POST /api/apps/reorder', () => {
    beforeEach(async () => {
      await t.apps.add('a', 'a.lan', '');
      await t.apps.add('b', 'b.lan', '');
      await t.apps.add('c', 'c.lan', '');
    });

    it('should move one app next to another', async () => {
      const res = await request(t.app).post('/api/apps/reorder').send({ from: 'c', to: 'a' });

      expect(res.body).toEqual({ success: true });
      expect(await names()).toEqual(['c', 'a', 'b']);
    });

    it('should honour position=after', async () => {
      await request(t.app).post('/api/apps/reorder').send({ from: 'a', to: 'b', position: 'after' });

      expect(await names()).toEqual(['b', 'a', 'c']);
    });

    it('should apply a full ordering', async () => {
      const res = await request(t.app)
        .post('/api/apps/reorder')
        .send({ order: ['c', 'b'] });

      expect(res.body).toEqual({ success: true });
      expect(await names()).toEqual(['c', 'b', 'a']);
      expect(t.emitted).toEqual([{ type: 'apps:changed', payload: { action: 'reordered' } }]);
    });

    it('should reject a request without order or from/to', async () => {
      const res = await request(t.app).post('/api/apps/reorder').send({ from: 'a' });

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'order or from/to is required' });
    });

    it('should 404 when either app is unknown', async () => {
      const res = await request(t.app).post('/api/apps/reorder').send({ from: 'a', to: 'z' });

      expect(res.status).toBe(404);
      expect(await names()).toEqual(['a', 'b', 'c']);
    });
  });

  describe('POST /api/apps/import', () => {
    it('should parse a list or an { apps } wrapper', () => {
      expect(parseCandidates([{ name: 'x', url: 1 }])).toEqual([
        { name: 'x', url: undefined, icon: undefined },
      ]);
      expect(parseCandidates({ apps: [{ name: 'y' }, 'skip'] })).toEqual([
        { name: 'y', url: undefined, icon: undefined },
      ]);
      expect(parseCandidates('nope')).toBeNull();
    });

    it('should merge new candidates and skip duplicates', async () => {
      const res = await request(t.app)
        .post('/api/apps/import')
        .send({
          apps: [
            { name: 'Grafana', url: 'nas.lan:3000' },
            { name: 'GRAFANA', url: 'other.lan' },
            { url: 'nameless.lan' },
          ],
        });

      expect(res.body).toEqual({ success: true, imported: 1 });
      expect(await t.apps.list()).toEqual([
        { name: 'Grafana', url: 'http://nas.lan:3000', icon: '' },
      ]);
      expect(t.emitted).toEqual([{ type: 'apps:imported', payload: { count: 1 } }]);
    });

    it('should reject a request without a list', async () => {
      const res = await request(t.app).post('/api/apps/import');

      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, error: 'Expected a list of apps' });
    });
  });

  describe('GET /api/apps/autodiscover', () => {
    it('should list running containers with published ports', async () => {
      t.http.on('http://docker/containers/json', {
        json: [
          {
            Id: 'abc',
            Names: ['/grafana'],
            State: 'running',
            Ports: [{ PrivatePort: 3000, PublicPort: 3000, Type: 'tcp' }],
          },
        ],
      });

      const res = await request(t.app).get('/api/apps/autodiscover');

      expect(res.body).toEqual({
        success: true,
        apps: [
          {
            name: 'grafana',
            url: 'http://nas.lan:3000',
            icon: 'https://raw.githubusercontent.com/homarr-labs/dashboard-icons/main/png/grafana.png',
          },
        ],
      });
    });

    it('should return nothing when Docker is unreachable', async () => {
      const res = await request(t.app).get('/api/apps/autodiscover');

      expect(res.body).toEqual({ success: true, apps: [] });
    });
  });
});
