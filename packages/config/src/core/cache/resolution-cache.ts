interface InFlight<T> {
  promise: Promise<T>
  followerCount: number
}

export type ResolutionSource = "cache" | "inflight" | "leader"

export type Resolution<T> = Readonly<{
  value: T
  source: ResolutionSource
}>

/**
 * Memoizes async resolutions by key.
 *
 * Concurrent callers for the same key share one in-flight promise.
 * Successful values are kept for the lifetime of the cache; failures are
 * not, so the next call retries.
 */
export class ResolutionCache<T> {
  private readonly settled = new Map<string, T>()
  private readonly flights = new Map<string, InFlight<T>>()

  async resolve(key: string, fn: () => Promise<T>): Promise<Resolution<T>> {
    if (this.settled.has(key)) {
      const value = this.settled.get(key)
      if (value !== undefined) return { value, source: "cache" }
    }

    const existing = this.flights.get(key)

    if (existing) {
      existing.followerCount++
      return { value: await existing.promise, source: "inflight" }
    }

    const flight: InFlight<T> = { promise: fn(), followerCount: 0 }
    this.flights.set(key, flight)

    try {
      const value = await flight.promise
      this.settled.set(key, value)
      return { value, source: "leader" }
    } finally {
      this.flights.delete(key)
    }
  }

  async get(key: string, fn: () => Promise<T>): Promise<T> {
    return (await this.resolve(key, fn)).value
  }

  has(key: string): boolean {
    return this.settled.has(key)
  }

  get size(): number {
    return this.settled.size
  }
}
