import { randomUUID } from 'node:crypto';
import { Messages } from '../messages';

export interface SessionStartOptions {
  /** Seconds of inactivity after which the session is collected; 0 keeps it forever. */
  lifetime: number;
}

/**
 * Access to one server-side session: start or resume it, then read and write its map.
 * Writes must fail while the session is not active.
 */
export interface SessionTransport {
  readonly id: string | null;
  readonly active: boolean;
  start(options: SessionStartOptions): void;
  read(): Record<string, string>;
  has(key: string): boolean;
  write(key: string, raw: string): void;
  delete(key: string): void;
  destroy(): void;
}

interface SessionRecord {
  data: Map<string, string>;
  lifetime: number;
  touchedAt: number;
}

/**
 * Session records keyed by session id, held in process memory.
 * Expired sessions are collected lazily when they are next looked up.
 */
export class MemorySessionRepository {
  private readonly sessions = new Map<string, SessionRecord>();

  constructor(private readonly now: () => number = Date.now) {}

  /** Returns the live record for `id`, refreshing its activity time, or null. */
  load(id: string): Map<string, string> | null {
    const record = this.sessions.get(id);
    if (!record) return null;
    if (this.isExpired(record)) {
      this.sessions.delete(id);
      return null;
    }
    record.touchedAt = this.now();
    return record.data;
  }

  create(lifetime: number, id: string = randomUUID()): string {
    this.sessions.set(id, { data: new Map(), lifetime, touchedAt: this.now() });
    return id;
  }

  destroy(id: string): void {
    this.sessions.delete(id);
  }

  /** Drops every expired session. Returns how many were removed. */
  collect(): number {
    let removed = 0;
    for (const [id, record] of this.sessions) {
      if (this.isExpired(record)) {
        this.sessions.delete(id);
        removed += 1;
      }
    }
    return removed;
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(record: SessionRecord): boolean {
    return record.lifetime > 0 && this.now() - record.touchedAt >= record.lifetime * 1000;
  }
}

/**
 * SessionTransport over a MemorySessionRepository.
 * Constructed with the id the client presented (usually from a cookie); `start()`
 * resumes that session when it is still live and opens a fresh one otherwise.
 */
export class MemorySessionTransport implements SessionTransport {
  private sessionId: string | null = null;
  private data: Map<string, string> | null = null;

  constructor(
    private readonly repository: MemorySessionRepository,
    private readonly requestedId?: string,
  ) {}

  get id(): string | null {
    return this.sessionId;
  }

  get active(): boolean {
    return this.data !== null;
  }

  start(options: SessionStartOptions): void {
    if (this.data) return;
    const resumed = this.requestedId ? this.repository.load(this.requestedId) : null;
    if (this.requestedId && resumed) {
      this.sessionId = this.requestedId;
      this.data = resumed;
      return;
    }
    this.sessionId = this.repository.create(options.lifetime);
    this.data = this.repository.load(this.sessionId);
  }

  read(): Record<string, string> {
    return this.data ? Object.fromEntries(this.data) : {};
  }

  has(key: string): boolean {
    return this.data !== null && this.data.has(key);
  }

  write(key: string, raw: string): void {
    this.activeData().set(key, raw);
  }

  delete(key: string): void {
    this.activeData().delete(key);
  }

  destroy(): void {
    if (this.sessionId) this.repository.destroy(this.sessionId);
    this.sessionId = null;
    this.data = null;
  }

  private activeData(): Map<string, string> {
    if (!this.data) {
      throw new Error(Messages.sessionInactive());
    }
    return this.data;
  }
}
