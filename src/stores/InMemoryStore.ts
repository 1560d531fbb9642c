import { Config } from '../config';
import { AbstractStorage } from '../modules/storage';
import type { StoreContext } from '../modules/registry';
import type { StoreSnapshot } from '../types';

/**
 * Store backed by the registry's in-process MemoryMedium.
 *
 * Data lives only as long as the medium, suitable for tests, CLI tools, or
 * carrying values between registries that share one medium.
 */
export class InMemoryStore extends AbstractStorage {
  static readonly storeName: string = 'memory';
  static readonly defaultExpiry: number = Config.memoryExpiry;

  static snapshot(context: StoreContext): StoreSnapshot {
    return context.memory.read();
  }

  static create(context: StoreContext): InMemoryStore {
    return new InMemoryStore(context);
  }

  protected persist(name: string, raw: string, expiry: number): void {
    this.context.memory.write(name, raw, expiry);
  }

  protected erase(name: string): void {
    this.context.memory.delete(name);
  }

  protected contains(name: string): boolean {
    return this.context.memory.has(name);
  }
}
