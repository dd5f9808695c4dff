import type { Session, SessionMessage } from './types.js';
import { sanitizeText } from './text-sanitizer.js';

/**
 * Groups messages by session id while readers walk their sources, then
 * produces immutable Session objects with sorted messages.
 */
export class SessionAccumulator {
  private readonly pending = new Map<string, { source: string; messages: SessionMessage[] }>();

  /**
   * Add one message. Text is sanitized here; messages that end up empty
   * are dropped and the call returns false.
   */
  add(sessionId: string, timestamp: number, rawText: string, source: string): boolean {
    const text = sanitizeText(rawText);
    if (text === '') return false;

    let entry = this.pending.get(sessionId);
    if (!entry) {
      entry = { source, messages: [] };
      this.pending.set(sessionId, entry);
    }
    entry.messages.push({ timestamp, text });
    return true;
  }

  /** Sessions keyed by id, messages in ascending timestamp order (stable). */
  build(): Map<string, Session> {
    const sessions = new Map<string, Session>();
    const ids = [...this.pending.keys()].sort();

    for (const id of ids) {
      const entry = this.pending.get(id);
      if (!entry) continue;
      const messages = entry.messages
        .map((message, index) => ({ message, index }))
        .sort((a, b) => a.message.timestamp - b.message.timestamp || a.index - b.index)
        .map(({ message }) => message);
      const lastTimestamp = messages.reduce((max, m) => Math.max(max, m.timestamp), 0);
      sessions.set(id, { id, messages, lastTimestamp, source: entry.source });
    }

    return sessions;
  }
}
