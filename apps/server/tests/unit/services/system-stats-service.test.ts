import { describe, it, expect } from 'vitest';
import type { CpuInfo } from 'os';
import { humanBytes, SystemStatsService, type HostProbe } from '@/services/system-stats-service.js';

function cpu(busy: number, idle: number): CpuInfo {
  return { model: 'test', speed: 1000, times: { user: busy, nice: 0, sys: 0, idle, irq: 0 } };
}

function createHost(samples: CpuInfo[][]): HostProbe {
  let call = 0;
  return {
    cpus: () => samples[Math.min(call++, samples.length - 1)],
    totalmem: () => 8 * 1024 ** 3,
    freemem: () => 2 * 1024 ** 3,
    hostname: () => 'nas',
    platform: () => 'linux',
    uptime: () => 3600.75,
    loadavg: () => [0.123, 0.456, 1],
  };
}

describe('system-stats-service.ts', () => {
  it('should format sizes with binary prefixes', () => {
    expect(humanBytes(512)).toBe('512.0 B');
    expect(humanBytes(1536)).toBe('1.5 KB');
    expect(humanBytes(1024 ** 3)).toBe('1.0 GB');
  });

  it('should measure CPU usage between calls', () => {
    const host = createHost([
      [cpu(100, 900), cpu(100, 900)],
      [cpu(150, 950), cpu(200, 1000)],
      [cpu(150, 950), cpu(200, 1000)],
    ]);
    const service = new SystemStatsService(host);

    expect(service.stats()).toEqual({
      cpu_percent: 50,
      mem_percent: 75,
      mem_used: 6 * 1024 ** 3,
      mem_total: 8 * 1024 ** 3,
    });
    expect(service.stats().cpu_percent).toBe(0);
  });

  it('should describe the host', () => {
    const service = new SystemStatsService(createHost([[cpu(0, 0), cpu(0, 0)]]));

    expect(service.systemInfo()).toEqual({
      hostname: 'nas',
      platform: 'linux',
      uptime_seconds: 3600,
      cpu_cores: 2,
      load_average: [0.12, 0.46, 1],
    });
  });
});
