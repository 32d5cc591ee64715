import crypto from 'node:crypto';
import { WorkflowSession } from '../workflow/session.js';

const SESSION_DURATION_MS = 60 * 60 * 1000; // 1 hour
const CLEANUP_INTERVAL_MS = 10 * 60 * 1000; // 10 minutes

interface SessionEntry {
  workflow: WorkflowSession;
  expiresAt: number;
}

/** In-memory workflow sessions. Secrets they hold are never written anywhere. */
export class SessionManager {
  private sessions = new Map<string, SessionEntry>();
  private cleanupTimer?: ReturnType<typeof setInterval>;

  constructor(private now: () => number = Date.now) {}

  createSession(): { id: string; workflow: WorkflowSession } {
    const id = crypto.randomBytes(32).toString('hex');
    const workflow = new WorkflowSession();
    this.sessions.set(id, { workflow, expiresAt: this.now() + SESSION_DURATION_MS });
    return { id, workflow };
  }

  getSession(id: string): WorkflowSession | null {
    const entry = this.sessions.get(id);
    if (!entry) return null;

    if (entry.expiresAt <= this.now()) {
      this.sessions.delete(id);
      return null;
    }

    return entry.workflow;
  }

  touchSession(id: string): void {
    const entry = this.sessions.get(id);
    if (entry) {
      entry.expiresAt = this.now() + SESSION_DURATION_MS;
    }
  }

  deleteSession(id: string): void {
    this.sessions.delete(id);
  }

  cleanExpiredSessions(): number {
    const now = this.now();
    let removed = 0;
    for (const [id, entry] of this.sessions) {
      if (entry.expiresAt <= now) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  startCleanupLoop(): void {
    this.cleanupTimer = setInterval(() => {
      this.cleanExpiredSessions();
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref();
  }

  stopCleanupLoop(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
  }
}
