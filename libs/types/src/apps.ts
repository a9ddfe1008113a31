/**
 * Bookmark app types shared by the app store, routes and auto-discovery
 */

/**
 * A named URL bookmark as persisted in apps.json.
 * Names are unique; array order is display order.
 */
export interface BookmarkApp {
  name: string;
  /** Always carries a scheme once stored (http:// is prepended when missing) */
  url: string;
  /** Icon URL or identifier */
  icon: string;
}

/**
 * A bookmark annotated with live reachability. Computed per read, never persisted.
 */
export interface BookmarkAppWithStatus extends BookmarkApp {
  online: boolean;
  /** Probe latency in milliseconds (0 when offline) */
  response_time: number;
}

/** Fields that may be changed by an update; empty strings are ignored */
export type BookmarkAppUpdate = Partial<BookmarkApp>;

/** Where a reordered app is placed relative to its target */
export type ReorderPosition = 'before' | 'after';

/**
 * A bookmark proposed by auto-discovery or an import payload.
 * Entries lacking a name or url are skipped on merge.
 */
export interface BookmarkCandidate {
  name?: string;
  url?: string;
  icon?: string;
}

/** Result of a liveness probe */
export interface ProbeResult {
  online: boolean;
  latencyMs: number;
}
