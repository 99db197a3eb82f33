import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import { formatAppMessage, type MessageParams, type MessageTone } from '../../../shared/src/messages';

export type AppMessageEntry = {
  id: string;
  createdAt: string;
  event: string;
  title: string;
  body: string;
  tone: MessageTone;
  params?: MessageParams;
  source?: string;
  read: boolean;
};

const MAX_MESSAGES = 200;
const emitter = new EventEmitter();
// Newest first.
const messages: AppMessageEntry[] = [];

export function listAppMessages(): AppMessageEntry[] {
  return messages.map((entry) => ({ ...entry }));
}

export function pushAppMessage(
  event: string,
  params?: MessageParams,
  options?: { source?: string; timestamp?: string }
): AppMessageEntry {
  const { definition, title, body } = formatAppMessage(event, params);
  const entry: AppMessageEntry = {
    id: randomUUID(),
    createdAt: options?.timestamp ?? new Date().toISOString(),
    event,
    title,
    body,
    tone: definition.tone,
    params,
    source: options?.source,
    read: false
  };
  messages.unshift(entry);
  messages.length = Math.min(messages.length, MAX_MESSAGES);
  emitter.emit('update', entry);
  return entry;
}

export function subscribeAppMessages(listener: (entry: AppMessageEntry) => void): () => void {
  emitter.on('update', listener);
  return () => {
    emitter.off('update', listener);
  };
}

export function markAllMessagesRead(): void {
  for (const entry of messages) {
    entry.read = true;
  }
}

/** Empties the feed. Listeners stay subscribed. */
export function clearAppMessages(): void {
  messages.length = 0;
}
