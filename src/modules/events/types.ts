export const CONTENT_EVENT_NAMES = [
  'content.created',
  'content.updated',
  'content.deleted',
  'content.published',
] as const;

export type ContentEventName = (typeof CONTENT_EVENT_NAMES)[number];

export function isContentEventName(value: string): value is ContentEventName {
  return (CONTENT_EVENT_NAMES as readonly string[]).includes(value);
}

export interface FieldDiff {
  from?: unknown;
  to?: unknown;
}

interface ContentEventBase {
  entityId: string;
  contentType: string;
  userId?: string;
}

export interface ContentCreatedEvent extends ContentEventBase {
  name: 'content.created';
  data?: Record<string, unknown>;
}

export interface ContentUpdatedEvent extends ContentEventBase {
  name: 'content.updated';
  diff?: Record<string, FieldDiff>;
}

export interface ContentDeletedEvent extends ContentEventBase {
  name: 'content.deleted';
}

export interface ContentPublishedEvent extends ContentEventBase {
  name: 'content.published';
  entry?: Record<string, unknown>;
}

export type ContentEvent =
  | ContentCreatedEvent
  | ContentUpdatedEvent
  | ContentDeletedEvent
  | ContentPublishedEvent;

/** Who/what triggered the event; passed to every handler */
export interface EventContext {
  requestId?: string;
  userId?: string;
  source?: string;
}

export type EventHandler = (event: ContentEvent, context: EventContext) => void | Promise<void>;
