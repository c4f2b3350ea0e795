/**
 * In-process publish/subscribe for merge request and pipeline events.
 * Handlers of one type run concurrently; a failing handler is logged and
 * does not stop the others.
 */

import { randomUUID } from 'crypto';
import type { AppEvent, EventType } from './types';
import { logger } from '../server/logger';

export type EventOf<T extends EventType> = Extract<AppEvent, { type: T }>;

type EventHandler<T extends AppEvent = AppEvent> = (event: T) => Promise<void>;

const log = logger.child({ service: 'events' });

export class EventBus {
  private readonly handlers = new Map<EventType, Set<EventHandler>>();

  /**
   * Subscribe to one event type. Returns a function that unsubscribes.
   */
  on<T extends EventType>(type: T, handler: EventHandler<EventOf<T>>): () => void {
    const wrapped = handler as EventHandler;
    const set = this.handlers.get(type) ?? new Set<EventHandler>();
    set.add(wrapped);
    this.handlers.set(type, set);

    return () => {
      set.delete(wrapped);
    };
  }

  async emit<T extends EventType>(type: T, actorId: string, payload: EventOf<T>['payload']): Promise<void> {
    await this.dispatch(createEvent(type, actorId, payload));
  }

  protected async dispatch(event: AppEvent): Promise<void> {
    const handlers = [...(this.handlers.get(event.type) ?? [])];
    const results = await Promise.allSettled(handlers.map((handler) => handler(event)));

    for (const result of results) {
      if (result.status === 'rejected') {
        log.error('Event handler failed', {
          eventType: event.type,
          eventId: event.id,
          error: result.reason instanceof Error ? result.reason.message : String(result.reason),
        });
      }
    }
  }
}

export const eventBus = new EventBus();

export function createEvent<T extends EventType>(
  type: T,
  actorId: string,
  payload: EventOf<T>['payload']
): EventOf<T> {
  return {
    id: randomUUID(),
    type,
    timestamp: new Date(),
    actorId,
    payload,
  } as EventOf<T>;
}
