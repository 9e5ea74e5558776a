/**
 * LRU cache for decoded trace tiles.
 *
 * Holds the promise rather than the result so concurrent reads of the same
 * tile share one file read. A rejected load is dropped so the next read
 * retries it.
 *
 * Memory budget: maxSize × tileTraces × sampleCount × 4 bytes. The default
 * 8 tiles of 256 traces × 3000 samples ≈ 24 MB.
 */
export class TileCache {
  private cache = new Map<number, Promise<Float32Array>>();
  private maxSize: number;

  constructor(maxSize = 8) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`Tile cache size must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
  }

  getOrLoad(tileIndex: number, load: (tileIndex: number) => Promise<Float32Array>): Promise<Float32Array> {
    const cached = this.cache.get(tileIndex);
    if (cached) {
      // Move to end (most recently used)
      this.cache.delete(tileIndex);
      this.cache.set(tileIndex, cached);
      return cached;
    }

    while (this.cache.size >= this.maxSize) {
      const oldestKey = this.cache.keys().next().value;
      if (oldestKey === undefined) break;
      this.cache.delete(oldestKey);
    }

    const pending = load(tileIndex);
    this.cache.set(tileIndex, pending);
    pending.catch(() => {
      if (this.cache.get(tileIndex) === pending) this.cache.delete(tileIndex);
    });
    return pending;
  }

  has(tileIndex: number): boolean {
    return this.cache.has(tileIndex);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}
