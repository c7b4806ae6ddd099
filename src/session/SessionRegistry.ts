/**
 * DocMatch – Per-user session isolation
 *
 * Each user key owns exactly one Session; images and results are never
 * shared between keys.
 */

import type { Session } from "./Session";
import { createSession } from "./Session";
import type { ImageStore } from "./ImageStore";

export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly store?: ImageStore) {}

  /** Session of the user, created on first interaction */
  get(userId: string): Session {
    let session = this.sessions.get(userId);
    if (!session) {
      session = createSession();
      this.sessions.set(userId, session);
    }
    return session;
  }

  has(userId: string): boolean {
    return this.sessions.has(userId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Abort any comparison in flight, release stored images, forget the user */
  async dispose(userId: string): Promise<void> {
    const session = this.sessions.get(userId);
    if (!session) return;
    this.sessions.delete(userId);
    session.inFlight?.abort();
    session.inFlight = null;
    session.cycle++;
    session.reserved = 0;
    await this.store?.release(session.id);
  }
}
