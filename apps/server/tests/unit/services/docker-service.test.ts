import { describe, it, expect } from 'vitest';
import {
  containersToCandidates,
  describeDockerError,
  DockerService,
  publishedTcpPort,
  SOCKET_UNAVAILABLE_MESSAGE,
} from '@/services/docker-service.js';
import { ICON_RAW_BASE } from '@/services/icon-service.js';
import { FakeHttp } from '../../helpers/fake-http.js';

const containers = [
  {
    Id: 'abcdef1234567890',
    Names: ['/grafana'],
    State: 'running',
    Image: 'grafana/grafana',
    Ports: [
      { PrivatePort: 3000, PublicPort: 3000, Type: 'tcp' },
      { PrivatePort: 8125, PublicPort: 8125, Type: 'udp' },
    ],
  },
  {
    Id: '1234567890abcdef',
    Names: ['/db'],
    State: 'running',
    Image: 'postgres:16',
    Ports: [{ PrivatePort: 5432, Type: 'tcp' }],
  },
  {
    Id: 'ffff',
    Names: ['/old'],
    State: 'exited',
    Image: 'nginx',
    Ports: [{ PrivatePort: 80, PublicPort: 8080, Type: 'tcp' }],
  },
];

function createService(http: FakeHttp): DockerService {
  return new DockerService({
    socketPath: '/nonexistent/docker.sock',
    discoveryHost: 'nas.lan',
    http: http.client,
  });
}

describe('docker-service.ts', () => {
  it('should pick the lowest published TCP port', () => {
    expect(
      publishedTcpPort({
        Ports: [
          { PublicPort: 9443, Type: 'tcp' },
          { PublicPort: 53, Type: 'udp' },
          { PublicPort: 8000 },
        ],
      })
    ).toBe(8000);
    expect(publishedTcpPort({ Ports: [{ PrivatePort: 80, Type: 'tcp' }] })).toBeNull();
  });

  it('should turn running containers with a port into candidates', () => {
    expect(containersToCandidates(containers, 'nas.lan')).toEqual([
      { name: 'grafana', url: 'http://nas.lan:3000', icon: `${ICON_RAW_BASE}grafana.png` },
    ]);
  });

  it('should explain socket errors', () => {
    const denied = Object.assign(new Error('connect EACCES'), { code: 'EACCES' });

    expect(describeDockerError(denied)).toBe(SOCKET_UNAVAILABLE_MESSAGE);
    expect(describeDockerError(new Error('boom'))).toBe('Unable to communicate with Docker: boom');
  });

  describe('DockerService', () => {
    it('should list every container', async () => {
      const http = new FakeHttp().on('http://docker/containers/json', { json: containers });

      const listing = await createService(http).listContainers();

      expect(listing).toEqual({
        containers: [
          { id: 'abcdef123456', name: 'grafana', status: 'running', image: 'grafana/grafana' },
          { id: '1234567890ab', name: 'db', status: 'running', image: 'postgres:16' },
          { id: 'ffff', name: 'old', status: 'exited', image: 'nginx' },
        ],
        error: null,
      });
      expect(http.urls()).toEqual(['http://docker/containers/json?all=1']);
    });

    it('should report an unreachable engine instead of throwing', async () => {
      const listing = await createService(new FakeHttp()).listContainers();

      expect(listing).toEqual({ containers: [], error: SOCKET_UNAVAILABLE_MESSAGE });
    });

    it('should report engine errors by status', async () => {
      const http = new FakeHttp().on('http://docker/containers/json', { status: 500 });

      const listing = await createService(http).listContainers();

      expect(listing.error).toBe(
        'Unable to communicate with Docker: HTTP 500 Error from http://docker/containers/json?all=1'
      );
    });

    it('should discover apps on the configured host', async () => {
      const http = new FakeHttp().on('http://docker/containers/json', { json: containers });

      expect(await createService(http).discoverApps()).toEqual([
        { name: 'grafana', url: 'http://nas.lan:3000', icon: `${ICON_RAW_BASE}grafana.png` },
      ]);
      expect(await createService(new FakeHttp()).discoverApps()).toEqual([]);
    });
  });
});
