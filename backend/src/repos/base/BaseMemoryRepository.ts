/**
 * Abstract base class for in-memory repository implementations.
 *
 * Memory repositories inherit:
 * - A Map keyed by the record's stable id
 * - Test helpers: clear(), size()
 */

/**
 * @template TKey - The type of the storage key
 * @template TValue - The type of stored values
 */
export abstract class BaseMemoryRepository<TKey extends string, TValue> {
    protected records: Map<TKey, TValue> = new Map()

    /**
     * Clear all stored items (for testing and reseeding).
     */
    clear(): void {
        this.records.clear()
    }

    /**
     * Get current number of stored items (for testing/monitoring)
     */
    size(): number {
        return this.records.size
    }
}
