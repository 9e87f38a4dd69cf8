import { CloseCodes, type CloseCode } from '../core/errors.js';
import type { SessionInfo, SessionStats } from '../types/index.js';
import { CLOSE_REASON_NAMES, Session, type SessionDependencies, type SessionOptions, type SessionTransport } from './session.js';

export interface SessionManagerOptions extends SessionOptions {
  /** How often the idle sweep runs. Defaults to a quarter of idleTimeoutMs. */
  sweepIntervalMs?: number;
}

/**
 * Registry of live sessions: creates them, sweeps idle ones and closes them all on shutdown.
 */
export class SessionManager {
  private readonly sessions = new Map<string, Session>();
  private readonly deps: SessionDependencies;
  private readonly options: SessionManagerOptions;
  private sweepTimer: NodeJS.Timeout | null = null;
  private totals = { created: 0, delivered: 0, rejected: 0 };
  private readonly closedByReason: Record<string, number> = {};

  constructor(deps: SessionDependencies, options: SessionManagerOptions) {
    this.deps = deps;
    this.options = options;
  }

  /**
   * Start the periodic idle sweep.
   */
  start(): void {
    if (this.sweepTimer) return;
    const interval = this.options.sweepIntervalMs ?? Math.max(Math.floor(this.options.idleTimeoutMs / 4), 100);
    this.sweepTimer = setInterval(() => this.sweepIdle(), interval);
    this.sweepTimer.unref();
    console.log(`🧹 Session idle sweep every ${interval}ms (timeout ${this.options.idleTimeoutMs}ms)`);
  }

  create(transport: SessionTransport): Session {
    const session = new Session(transport, this.deps, this.options);
    this.sessions.set(session.id, session);
    this.totals.created++;
    session.onClose((closed, code) => this.forget(closed, code));
    session.start();
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Close every session idle past the timeout. Returns how many were closed.
   */
  sweepIdle(now?: number): number {
    let closed = 0;
    for (const session of Array.from(this.sessions.values())) {
      if (session.checkIdle(now)) closed++;
    }
    if (closed > 0) {
      console.log(`🧹 Closed ${closed} idle sessions`);
    }
    return closed;
  }

  /**
   * Close every session, flushing what each has buffered.
   */
  async closeAll(code: CloseCode = CloseCodes.goingAway, reason = 'server shutting down'): Promise<void> {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    const sessions = Array.from(this.sessions.values());
    if (sessions.length > 0) {
      console.log(`🛑 Closing ${sessions.length} sessions...`);
    }
    await Promise.allSettled(sessions.map((session) => session.close(code, reason)));
  }

  list(): SessionInfo[] {
    return Array.from(this.sessions.values()).map((session) => session.getInfo());
  }

  getStats(): SessionStats {
    let active = 0;
    let subscriptions = 0;
    let delivered = this.totals.delivered;
    let rejected = this.totals.rejected;
    for (const session of this.sessions.values()) {
      const info = session.getInfo();
      if (info.state === 'active') active++;
      subscriptions += info.subscriptions.length;
      delivered += info.delivered;
      rejected += info.rejected;
    }
    return {
      total: this.totals.created,
      active,
      subscriptions,
      delivered,
      rejected,
      closedByReason: { ...this.closedByReason },
    };
  }

  private forget(session: Session, code: CloseCode): void {
    if (!this.sessions.delete(session.id)) return;
    const info = session.getInfo();
    this.totals.delivered += info.delivered;
    this.totals.rejected += info.rejected;
    const reason = CLOSE_REASON_NAMES[code];
    this.closedByReason[reason] = (this.closedByReason[reason] ?? 0) + 1;
  }
}
