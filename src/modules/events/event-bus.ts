import { generateId } from '../../utils/crypto';
import logger from '../../utils/logger';
import type { ContentEvent, ContentEventName, EventContext, EventHandler } from './types';

interface Registration {
  id: string;
  eventName: ContentEventName;
  handler: EventHandler;
}

/**
 * In-process event bus over the closed set of content events.
 *
 * Handlers registered for the same event run concurrently; a throwing or
 * rejecting handler is logged and never reaches the publisher or its siblings.
 */
export class EventBus {
  private registrations = new Map<string, Registration>();

  subscribe(eventName: ContentEventName, handler: EventHandler): string {
    const id = generateId('sub');
    this.registrations.set(id, { id, eventName, handler });
    return id;
  }

  unsubscribe(id: string): boolean {
    return this.registrations.delete(id);
  }

  handlerCount(eventName?: ContentEventName): number {
    let count = 0;
    for (const registration of this.registrations.values()) {
      if (!eventName || registration.eventName === eventName) count++;
    }
    return count;
  }

  /**
   * Resolves once every handler has settled; never rejects.
   */
  async publish(event: ContentEvent, context: EventContext = {}): Promise<void> {
    const handlers = [...this.registrations.values()].filter((r) => r.eventName === event.name);
    if (handlers.length === 0) {
      logger.debug({ eventName: event.name, entityId: event.entityId }, 'No handlers for event');
      return;
    }

    const results = await Promise.allSettled(
      handlers.map(async (registration) => registration.handler(event, context))
    );

    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        logger.error(
          {
            err: result.reason,
            eventName: event.name,
            entityId: event.entityId,
            handlerId: handlers[index].id,
            requestId: context.requestId,
          },
          'Event handler failed'
        );
      }
    });
  }
}

export const eventBus = new EventBus();
