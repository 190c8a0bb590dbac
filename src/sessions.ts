import { randomUUID } from 'crypto';
import { createSessionState } from './session';
import type { ActionOutcome, SessionState } from './types';

interface SessionEntry {
  state: SessionState;
  lastUsed: number;
  // Tail of this session's action chain
  pending: Promise<unknown>;
}

export class SessionRegistry {
  private readonly sessions = new Map<string, SessionEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.sessions.size;
  }

  create(): string {
    this.evictIdle();
    const sessionId = randomUUID();
    this.sessions.set(sessionId, {
      state: createSessionState(),
      lastUsed: this.now(),
      pending: Promise.resolve(),
    });
    return sessionId;
  }

  get(sessionId: string): SessionState | undefined {
    return this.sessions.get(sessionId)?.state;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  // Runs after every earlier action on the session has settled
  dispatch(
    sessionId: string,
    action: (state: SessionState) => Promise<ActionOutcome>,
  ): Promise<ActionOutcome> | undefined {
    const entry = this.sessions.get(sessionId);
    if (!entry) return undefined;

    const run = entry.pending.then(async () => {
      const outcome = await action(entry.state);
      entry.state = outcome.state;
      entry.lastUsed = this.now();
      return outcome;
    });
    // A failed action must not block the ones queued after it
    entry.pending = run.catch(() => undefined);
    return run;
  }

  private evictIdle() {
    const cutoff = this.now() - this.ttlMs;
    for (const [sessionId, entry] of this.sessions) {
      if (entry.lastUsed < cutoff) {
        this.sessions.delete(sessionId);
      }
    }
  }
}
