/**
 * POST /reorder endpoint - Change display order
 *
 * Body, either:
 * - { order: string[] } - full order; unknown names are dropped and
 *   omitted apps keep their place at the end
 * - { from, to, position?: 'before' | 'after' } - move one app next to another
 */

import type { Request, Response } from 'express';
import type { AppStore } from '../../../services/app-store.js';
import type { EventEmitter } from '../../../lib/events.js';
import { asObject, getArray, getString } from '../../../lib/json.js';
import { getErrorMessage, logError } from '../common.js';

export function createReorderHandler(store: AppStore, events?: EventEmitter) {
  return async (req: Request, res: Response): Promise<void> => {
    try {
      const body = asObject(req.body);
      const order = getArray(body, 'order').filter(
        (name): name is string => typeof name === 'string'
      );

      if (order.length > 0) {
        if (!(await store.applyOrder(order))) {
          res.status(400).json({ success: false, error: 'Nothing to reorder' });
          return;
        }
        events?.emit('apps:changed', { action: 'reordered' });
        res.json({ success: true });
        return;
      }

      const from = getString(body, 'from');
      const to = getString(body, 'to');
      if (!from || !to) {
        res.status(400).json({ success: false, error: 'order or from/to is required' });
        return;
      }

      const position = getString(body, 'position') === 'after' ? 'after' : 'before';
      if (!(await store.reorder(from, to, position))) {
        res.status(404).json({ success: false, error: 'App not found' });
        return;
      }

      events?.emit('apps:changed', { action: 'reordered' });
      res.json({ success: true });
    } catch (error) {
      logError(error, 'Reorder apps failed');
      res.status(500).json({ success: false, error: getErrorMessage(error) });
    }
  };
}
