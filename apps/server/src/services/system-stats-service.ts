/**
 * System Stats Service - Host CPU, memory and identity
 *
 * CPU usage is the busy share of CPU ticks since the previous call (or since
 * the service was created, for the first call).
 */

import os from 'os';
import type { SystemInfo, SystemStats } from '@homelab/types';
import { roundTo } from '../lib/json.js';

/** The parts of the `os` module the service reads */
export type HostProbe = Pick<
  typeof os,
  'cpus' | 'totalmem' | 'freemem' | 'hostname' | 'platform' | 'uptime' | 'loadavg'
>;

interface CpuTicks {
  idle: number;
  total: number;
}

function readTicks(host: HostProbe): CpuTicks {
  let idle = 0;
  let total = 0;
  for (const cpu of host.cpus()) {
    const { user, nice, sys, idle: cpuIdle, irq } = cpu.times;
    idle += cpuIdle;
    total += user + nice + sys + cpuIdle + irq;
  }
  return { idle, total };
}

const BYTE_UNITS = ['B', 'KB', 'MB', 'GB', 'TB', 'PB'];

/**
 * Binary-prefixed size with one decimal
 *
 * @example
 * humanBytes(1536)    // => '1.5 KB'
 * humanBytes(1 << 30) // => '1.0 GB'
 */
export function humanBytes(bytes: number): string {
  let value = bytes;
  for (const unit of BYTE_UNITS) {
    if (value < 1024) return `${value.toFixed(1)} ${unit}`;
    value /= 1024;
  }
  return `${value.toFixed(1)} EB`;
}

export class SystemStatsService {
  private lastTicks: CpuTicks;

  constructor(private readonly host: HostProbe = os) {
    this.lastTicks = readTicks(host);
  }

  stats(): SystemStats {
    const ticks = readTicks(this.host);
    const totalDelta = ticks.total - this.lastTicks.total;
    const idleDelta = ticks.idle - this.lastTicks.idle;
    this.lastTicks = ticks;

    const cpuPercent = totalDelta > 0 ? ((totalDelta - idleDelta) / totalDelta) * 100 : 0;
    const memTotal = this.host.totalmem();
    const memUsed = memTotal - this.host.freemem();

    return {
      cpu_percent: roundTo(cpuPercent, 1),
      mem_percent: roundTo(memTotal > 0 ? (memUsed / memTotal) * 100 : 0, 1),
      mem_used: memUsed,
      mem_total: memTotal,
    };
  }

  systemInfo(): SystemInfo {
    return {
      hostname: this.host.hostname(),
      platform: this.host.platform(),
      uptime_seconds: Math.trunc(this.host.uptime()),
      cpu_cores: this.host.cpus().length,
      load_average: this.host.loadavg().map((load) => roundTo(load, 2)),
    };
  }
}
