import { describe, it, expect } from 'vitest';
import { createEventEmitter } from '@/lib/events.js';
import { EventSocketService } from '@/services/event-socket.js';

describe('event-socket.ts', () => {
  it('should follow the event bus until shutdown', async () => {
    const events = createEventEmitter();
    const socket = new EventSocketService(events);

    expect(events.subscriberCount).toBe(1);
    expect(socket.clientCount).toBe(0);
    expect(() => events.emit('apps:changed', { action: 'cleared' })).not.toThrow();

    await socket.shutdown();

    expect(events.subscriberCount).toBe(0);
  });
});
