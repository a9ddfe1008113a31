/**
 * Event emitter for streaming dashboard events to WebSocket clients
 */

import type { EventType, EventCallback } from '@homelab/types';
import { createLogger } from '@homelab/utils';

const logger = createLogger('Events');

// Re-export event types from shared package
export type { EventType, EventCallback };

export interface EventEmitter {
  emit: (type: EventType, payload: unknown) => void;
  subscribe: (callback: EventCallback) => () => void;
  /** Number of active subscribers */
  readonly subscriberCount: number;
}

export function createEventEmitter(): EventEmitter {
  const subscribers = new Set<EventCallback>();

  return {
    emit(type: EventType, payload: unknown) {
      logger.debug(`${type} -> ${subscribers.size} subscriber(s)`);
      for (const callback of subscribers) {
        try {
          callback(type, payload);
        } catch (error) {
          logger.error('Error in event subscriber:', error);
        }
      }
    },

    subscribe(callback: EventCallback) {
      subscribers.add(callback);
      return () => {
        subscribers.delete(callback);
      };
    },

    get subscriberCount() {
      return subscribers.size;
    },
  };
}
