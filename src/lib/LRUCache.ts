/**
 * Bounded LRU Cache - O(1) operations
 *
 * - O(1) get/set/delete via Map + doubly-linked list
 * - O(1) eviction of the least recently used entry once maxSize is reached
 * - Hit/miss counters for monitoring
 *
 * No timers: the cache lives exactly as long as its owner.
 */

interface LRUNode<K> {
  key: K;
  prev: LRUNode<K> | null;
  next: LRUNode<K> | null;
}

export interface LRUCacheConfig<K, V> {
  /** Maximum number of entries (triggers LRU eviction) */
  maxSize: number;
  /** Callback when an entry is evicted or deleted */
  onEvict?: (key: K, value: V) => void;
}

export interface LRUCacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  evictions: number;
}

export class LRUCache<K extends string, V> {
  private cache = new Map<K, V>();
  private lruNodes = new Map<K, LRUNode<K>>();

  // Doubly-linked list: head = oldest, tail = newest
  private lruHead: LRUNode<K> | null = null;
  private lruTail: LRUNode<K> | null = null;

  private config: LRUCacheConfig<K, V>;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(config: Partial<LRUCacheConfig<K, V>> = {}) {
    const maxSize = config.maxSize ?? 100;
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`LRUCache maxSize must be a positive integer, got ${maxSize}`);
    }
    this.config = { maxSize, onEvict: config.onEvict };
  }

  /**
   * Get value by key and mark it as recently used.
   */
  get(key: K): V | undefined {
    const value = this.cache.get(key);
    const node = this.lruNodes.get(key);
    if (value === undefined || !node) {
      this.misses++;
      return undefined;
    }

    this.hits++;
    this.moveToTail(node);
    return value;
  }

  /**
   * Set value with key. Evicts the LRU entry if at capacity.
   */
  set(key: K, value: V): void {
    const existing = this.lruNodes.get(key);
    if (existing) {
      this.cache.set(key, value);
      this.moveToTail(existing);
      return;
    }

    if (this.cache.size >= this.config.maxSize) {
      this.evictLRU();
    }

    this.cache.set(key, value);
    const node: LRUNode<K> = { key, prev: null, next: null };
    this.lruNodes.set(key, node);
    this.appendLRUNode(node);
  }

  /** Check presence without touching recency */
  has(key: K): boolean {
    return this.cache.has(key);
  }

  delete(key: K): boolean {
    const value = this.cache.get(key);
    const node = this.lruNodes.get(key);
    if (value === undefined || !node) {
      return false;
    }

    this.cache.delete(key);
    this.lruNodes.delete(key);
    this.removeLRUNode(node);
    this.config.onEvict?.(key, value);
    return true;
  }

  clear(): void {
    if (this.config.onEvict) {
      for (const [key, value] of this.cache.entries()) {
        this.config.onEvict(key, value);
      }
    }

    this.cache.clear();
    this.lruNodes.clear();
    this.lruHead = null;
    this.lruTail = null;
  }

  get size(): number {
    return this.cache.size;
  }

  /** Keys from least to most recently used */
  keys(): K[] {
    const keys: K[] = [];
    for (let node = this.lruHead; node; node = node.next) {
      keys.push(node.key);
    }
    return keys;
  }

  getStats(): LRUCacheStats {
    return {
      size: this.cache.size,
      maxSize: this.config.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private evictLRU(): void {
    if (!this.lruHead) {
      return;
    }
    this.evictions++;
    this.delete(this.lruHead.key);
  }

  private moveToTail(node: LRUNode<K>): void {
    if (node === this.lruTail) {
      return;
    }
    this.removeLRUNode(node);
    this.appendLRUNode(node);
  }

  private appendLRUNode(node: LRUNode<K>): void {
    node.prev = this.lruTail;
    node.next = null;

    if (this.lruTail) {
      this.lruTail.next = node;
    } else {
      // List was empty
      this.lruHead = node;
    }

    this.lruTail = node;
  }

  private removeLRUNode(node: LRUNode<K>): void {
    if (node.prev) {
      node.prev.next = node.next;
    } else {
      // Was head
      this.lruHead = node.next;
    }

    if (node.next) {
      node.next.prev = node.prev;
    } else {
      // Was tail
      this.lruTail = node.prev;
    }

    node.prev = null;
    node.next = null;
  }
}
