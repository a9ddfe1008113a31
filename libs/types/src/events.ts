/**
 * Event types broadcast to dashboard clients over the /api/events WebSocket
 */

export type EventType =
  | 'apps:changed'
  | 'apps:imported'
  | 'settings:changed'
  | 'terminal:opened'
  | 'terminal:closed';

export type EventCallback = (type: EventType, payload: unknown) => void;
