// src/core/pages/PageCache.ts

import { ActionLogger } from '../logging/ActionLogger';

/**
 * Keyed store for loaded pages, handed to the page factory so each test
 * worker owns its own. No TTL: entries live until removed or cleared.
 */
export class PageCache<V> {
    private readonly entries = new Map<string, V>();

    constructor(private readonly name: string = 'page-cache') {}

    get(key: string): V | undefined {
        const value = this.entries.get(key);
        ActionLogger.logCacheOperation(value === undefined ? 'miss' : 'hit', { cache: this.name, key });
        return value;
    }

    set(key: string, value: V): void {
        this.entries.set(key, value);
        ActionLogger.logCacheOperation('store', { cache: this.name, key, size: this.entries.size });
    }

    has(key: string): boolean {
        return this.entries.has(key);
    }

    delete(key: string): boolean {
        const removed = this.entries.delete(key);
        if (removed) {
            ActionLogger.logCacheOperation('remove', { cache: this.name, key });
        }
        return removed;
    }

    /** Safe to call on an empty cache. */
    clear(): void {
        const size = this.entries.size;
        this.entries.clear();
        ActionLogger.logCacheOperation('clear', { cache: this.name, cleared: size });
    }

    keys(): string[] {
        return [...this.entries.keys()];
    }

    values(): V[] {
        return [...this.entries.values()];
    }

    get size(): number {
        return this.entries.size;
    }
}
