/**
 * Integration result shapes for user-configured homelab services
 */

export interface PiholeDiagnosis {
  type: 'error' | 'warning';
  message: string;
}

export interface PiholeStats {
  domains_blocked: number;
  dns_queries_today: number;
  ads_blocked_today: number;
  ads_percentage_today: number;
  unique_clients: number;
  queries_cached: number;
  queries_forwarded: number;
  status: string;
  /** Days since the last gravity update, or 'N/A' */
  gravity_last_updated: number | string;
  /** v6 only */
  diagnosis_errors?: number;
  diagnosis_warnings?: number;
  diagnosis_items?: PiholeDiagnosis[];
  api_version: 5 | 6;
}

export interface PortainerStats {
  endpoints: number;
  total_containers: number;
  running_containers: number;
  stopped_containers: number;
  stacks: number;
  volumes: number;
  images: number;
}

export interface ProxmoxStats {
  nodes: number;
  total_vms: number;
  running_vms: number;
  total_containers: number;
  running_containers: number;
  cpu_usage: number;
  memory_usage: number;
  disk_usage: number;
}

export interface SpeedtestResult {
  download_mbps: number;
  upload_mbps: number;
  ping_ms: number;
  server: string;
  isp: string;
  tested_at: string;
}

export type MonitorStatus = 'up' | 'down' | 'paused';

export interface UptimeMonitor {
  name: string;
  status: MonitorStatus;
  uptime_24h: number;
}

export interface UptimeKumaStats {
  total_monitors: number;
  up: number;
  down: number;
  paused: number;
  health_percent: number;
  monitors: UptimeMonitor[];
}

export interface AudiobookshelfBook {
  title: string;
  author: string;
  cover: string;
  added_at: number | null;
  duration: number;
}

export interface AudiobookshelfStats {
  total_books: number;
  recent_books: AudiobookshelfBook[];
  library_name: string;
}
