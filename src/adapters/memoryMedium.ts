interface MemoryEntry {
  raw: string;
  /** Epoch milliseconds, or null for entries that never expire. */
  expiresAt: number | null;
}

/**
 * In-process medium backed by a plain Map, with per-entry expiry.
 *
 * Data lives only as long as the object does. Share one instance between
 * registries to carry values from one request to the next within a process.
 */
export class MemoryMedium {
  private entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  read(): Record<string, string> {
    const live = [...this.entries].filter(([name, entry]) => this.isLive(name, entry));
    return Object.fromEntries(live.map(([name, entry]) => [name, entry.raw]));
  }

  has(name: string): boolean {
    const entry = this.entries.get(name);
    return entry !== undefined && this.isLive(name, entry);
  }

  /** `ttl` in seconds; 0 keeps the entry until it is deleted. */
  write(name: string, raw: string, ttl: number): void {
    this.entries.set(name, {
      raw,
      expiresAt: ttl > 0 ? this.now() + ttl * 1000 : null,
    });
  }

  delete(name: string): boolean {
    return this.entries.delete(name);
  }

  snapshot(): Record<string, string> {
    return this.read();
  }

  restore(data: Record<string, string>): void {
    this.entries = new Map(Object.entries(data).map(([name, raw]) => [name, { raw, expiresAt: null }]));
  }

  private isLive(name: string, entry: MemoryEntry): boolean {
    if (entry.expiresAt === null || entry.expiresAt > this.now()) return true;
    this.entries.delete(name);
    return false;
  }
}
