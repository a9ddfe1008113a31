/**
 * App Store - Ordered bookmark registry persisted to apps.json
 *
 * Every mutation is queued on a single-writer FIFO (p-limit with concurrency
 * 1) and performs its own load → mutate → persist inside the queue, so
 * overlapping requests can never interleave their read-modify-write cycles.
 * Reads do not queue.
 *
 * Operations that cannot apply (unknown name, rename collision) report
 * `false` and write nothing.
 */

import pLimit from 'p-limit';
import type {
  BookmarkApp,
  BookmarkAppUpdate,
  BookmarkAppWithStatus,
  BookmarkCandidate,
  ReorderPosition,
} from '@homelab/types';
import { createLogger } from '@homelab/utils';
import {
  atomicWriteJson,
  getAppsPath,
  logRecoveryWarning,
  readJsonWithRecovery,
} from '@homelab/platform';
import { isObject } from '../lib/json.js';
import { LivenessProber, normalizeUrl } from './liveness-prober.js';

const logger = createLogger('AppStore');

/** Upper bound on concurrent liveness probes per listing */
export const MAX_PROBE_WORKERS = 8;

/**
 * Keep well-formed records from a parsed apps.json. Records without a
 * string name and url are dropped.
 */
function parseApps(data: unknown): BookmarkApp[] {
  if (!Array.isArray(data)) return [];
  const apps: BookmarkApp[] = [];
  for (const item of data) {
    if (!isObject(item)) continue;
    const { name, url, icon } = item;
    if (typeof name !== 'string' || typeof url !== 'string') continue;
    apps.push({ name, url, icon: typeof icon === 'string' ? icon : '' });
  }
  return apps;
}

export class AppStore {
  private readonly filePath: string;
  private readonly writeQueue = pLimit(1);

  constructor(
    dataDir: string,
    private readonly prober: LivenessProber = new LivenessProber()
  ) {
    this.filePath = getAppsPath(dataDir);
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  /**
   * Load the persisted list. A missing file is created as `[]` through the
   * writer queue; a malformed one reads as empty (and is left untouched until
   * the next write).
   */
  async list(): Promise<BookmarkApp[]> {
    const result = await readJsonWithRecovery(this.filePath, []);
    if (!result.recovered) return parseApps(result.data);
    if (result.reason === 'missing') {
      return this.writeQueue(() => this.load());
    }
    logRecoveryWarning(result, this.filePath, 'bookmarks');
    return [];
  }

  async get(name: string): Promise<BookmarkApp | null> {
    const apps = await this.list();
    return apps.find((app) => app.name === name) ?? null;
  }

  /**
   * Load the list and probe every entry concurrently with at most
   * min(8, n) probes in flight. Results keep persisted order; a probe that
   * fails marks only its own entry offline.
   */
  async listWithStatus(): Promise<BookmarkAppWithStatus[]> {
    const apps = await this.list();
    if (apps.length === 0) return [];

    const limit = pLimit(Math.min(MAX_PROBE_WORKERS, apps.length));
    return Promise.all(
      apps.map((app) =>
        limit(async (): Promise<BookmarkAppWithStatus> => {
          try {
            const { online, latencyMs } = await this.prober.probe(app.url);
            return { ...app, online, response_time: latencyMs };
          } catch (error) {
            logger.warn(`Probe failed for "${app.name}":`, error);
            return { ...app, online: false, response_time: 0 };
          }
        })
      )
    );
  }

  // ---------------------------------------------------------------------------
  // Mutations (single writer)
  // ---------------------------------------------------------------------------

  /**
   * Add a bookmark, replacing any existing entry with the same name.
   * The new entry goes to the end of the list.
   */
  add(name: string, url: string, icon: string): Promise<BookmarkApp> {
    return this.write(async (apps) => {
      const entry: BookmarkApp = { name, url: normalizeUrl(url), icon };
      const next = apps.filter((app) => app.name !== name);
      next.push(entry);
      await this.persist(next);
      logger.info(`Added "${name}" (${entry.url})`);
      return entry;
    });
  }

  delete(name: string): Promise<boolean> {
    return this.write(async (apps) => {
      const next = apps.filter((app) => app.name !== name);
      if (next.length === apps.length) return false;
      await this.persist(next);
      logger.info(`Deleted "${name}"`);
      return true;
    });
  }

  deleteAll(): Promise<void> {
    return this.write(async (apps) => {
      await this.persist([]);
      logger.info(`Deleted all ${apps.length} bookmarks`);
    });
  }

  /**
   * Change fields of an existing entry in place. Empty values are ignored;
   * a new URL is normalized.
   *
   * @returns false when `originalName` is unknown or the new name belongs
   * to a different entry
   */
  update(originalName: string, fields: BookmarkAppUpdate): Promise<boolean> {
    return this.write(async (apps) => {
      const index = apps.findIndex((app) => app.name === originalName);
      if (index === -1) return false;

      const newName = fields.name?.trim();
      if (newName && newName !== originalName && apps.some((app) => app.name === newName)) {
        logger.warn(`Cannot rename "${originalName}" to "${newName}": name already in use`);
        return false;
      }

      const updated: BookmarkApp = { ...apps[index] };
      if (newName) updated.name = newName;
      if (fields.url?.trim()) updated.url = normalizeUrl(fields.url.trim());
      if (fields.icon?.trim()) updated.icon = fields.icon.trim();

      const next = [...apps];
      next[index] = updated;
      await this.persist(next);
      return true;
    });
  }

  /**
   * Move `fromName` directly before or after `toName`.
   * Moving an entry relative to itself succeeds without writing.
   */
  reorder(
    fromName: string,
    toName: string,
    position: ReorderPosition = 'before'
  ): Promise<boolean> {
    return this.write(async (apps) => {
      const fromIndex = apps.findIndex((app) => app.name === fromName);
      if (fromIndex === -1 || !apps.some((app) => app.name === toName)) return false;
      if (fromName === toName) return true;

      const next = [...apps];
      const [moved] = next.splice(fromIndex, 1);
      const toIndex = next.findIndex((app) => app.name === toName);
      next.splice(position === 'after' ? toIndex + 1 : toIndex, 0, moved);

      await this.persist(next);
      return true;
    });
  }

  /**
   * Persist a full ordering by name. Repeated and unknown names are ignored
   * and entries missing from `names` keep their relative order at the end,
   * so no entry is ever dropped.
   *
   * @returns false for an empty request or an empty store
   */
  applyOrder(names: string[]): Promise<boolean> {
    if (names.length === 0) return Promise.resolve(false);

    return this.write(async (apps) => {
      const byName = new Map(apps.map((app) => [app.name, app]));
      const requested = new Set(names);
      const seen = new Set<string>();
      const next: BookmarkApp[] = [];

      for (const name of names) {
        if (seen.has(name)) continue;
        seen.add(name);
        const app = byName.get(name);
        if (app) next.push(app);
      }
      for (const app of apps) {
        if (!requested.has(app.name)) next.push(app);
      }

      if (next.length === 0) return false;
      await this.persist(next);
      return true;
    });
  }

  /**
   * Append discovered or imported candidates. A candidate is skipped when it
   * lacks a name or url, or when its normalized URL or case-insensitive name
   * is already present (earlier candidates in the same batch included).
   *
   * @returns Number of entries appended
   */
  merge(candidates: BookmarkCandidate[]): Promise<number> {
    return this.write(async (apps) => {
      const urls = new Set(apps.map((app) => normalizeUrl(app.url)));
      const names = new Set(apps.map((app) => app.name.toLowerCase()));
      const next = [...apps];
      let added = 0;

      for (const candidate of candidates) {
        const name = candidate.name?.trim();
        const url = candidate.url?.trim();
        if (!name || !url) continue;

        const normalized = normalizeUrl(url);
        if (urls.has(normalized) || names.has(name.toLowerCase())) continue;

        next.push({ name, url: normalized, icon: candidate.icon?.trim() ?? '' });
        urls.add(normalized);
        names.add(name.toLowerCase());
        added++;
      }

      if (added > 0) {
        await this.persist(next);
        logger.info(`Merged ${added} of ${candidates.length} candidates`);
      }
      return added;
    });
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private write<T>(mutation: (apps: BookmarkApp[]) => Promise<T>): Promise<T> {
    return this.writeQueue(async () => mutation(await this.load()));
  }

  /**
   * Read the list with the writer held, creating a missing file. Another
   * writer may have created it since the caller looked.
   */
  private async load(): Promise<BookmarkApp[]> {
    const result = await readJsonWithRecovery(this.filePath, []);
    if (!result.recovered) return parseApps(result.data);
    logRecoveryWarning(result, this.filePath, 'bookmarks');
    if (result.reason === 'missing') {
      await this.persist([]);
    }
    return [];
  }

  private persist(apps: BookmarkApp[]): Promise<void> {
    return atomicWriteJson(this.filePath, apps);
  }
}
