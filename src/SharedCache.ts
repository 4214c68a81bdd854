import ReadWriteLock from './ReadWriteLock'

export interface CacheEntry<T> {
  readonly value: T
  /** Milliseconds since the epoch at which the value was produced. */
  readonly createdAt: number
}

export interface SharedCacheOptions<T> {
  create: () => Promise<CacheEntry<T>>
  isFresh: (entry: CacheEntry<T>) => boolean
}

/**
 * Holds one value shared by every caller. A stale value is regenerated once,
 * callers that queued behind the regeneration get its result.
 */
export default class SharedCache<T> {
  private entry: CacheEntry<T>
  private readonly lock = new ReadWriteLock()
  private readonly options: SharedCacheOptions<T>

  public constructor(initial: CacheEntry<T>, options: SharedCacheOptions<T>) {
    this.entry = Object.freeze({ ...initial })
    this.options = options
  }

  public get current(): CacheEntry<T> {
    return this.entry
  }

  public async get(): Promise<CacheEntry<T>> {
    const entry = await this.lock.read(() => this.entry)

    if (this.options.isFresh(entry)) return entry

    return this.lock.write(async () => {
      if (this.options.isFresh(this.entry)) return this.entry

      this.entry = Object.freeze({ ...(await this.options.create()) })

      return this.entry
    })
  }
}
