/**
 * POST /import endpoint - Merge a batch of candidate apps
 *
 * Body: an array of { name, url, icon? } (or { apps: [...] }). Candidates
 * whose name or URL is already bookmarked are skipped.
 */

import type { Request, Response } from 'express';
import type { BookmarkCandidate } from '@homelab/types';
import type { AppStore } from '../../../services/app-store.js';
import type { EventEmitter } from '../../../lib/events.js';
import { getArray, isObject, objects } from '../../../lib/json.js';
import { getErrorMessage, logError } from '../common.js';

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function parseCandidates(body: unknown): BookmarkCandidate[] | null {
  const list = Array.isArray(body) ? body : isObject(body) ? getArray(body, 'apps') : null;
  if (!list) return null;
  return objects(list).map((item) => ({
    name: optionalString(item['name']),
    url: optionalString(item['url']),
    icon: optionalString(item['icon']),
  }));
}

export function createImportHandler(store: AppStore, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const candidates = parseCandidates(req.body);
      if (!candidates) {
        res.status(400).json({ success: false, error: 'Expected a list of apps' });
        return;
      }

      const imported = await store.merge(candidates);
      if (imported > 0) {
        events?.emit('apps:imported', { count: imported });
      }

      res.json({ success: true, imported });
    } catch (error) {
      logError(error, 'Import apps failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
