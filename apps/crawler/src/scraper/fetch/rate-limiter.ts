/**
 * In-process Rate Limiter
 *
 * One slot per registrable domain (eTLD+1), plus a randomized gap between
 * the end of one request and the start of the next. The gap applies whatever
 * the outcome of the previous request.
 *
 * Crawls run as a single worker, so there is no cross-process coordination.
 */

import type { RateLimiter, RateLimitConfig } from '../types.js'
import { DEFAULT_RATE_LIMIT } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'

export interface InMemoryRateLimiterOptions {
  defaultConfig?: RateLimitConfig

  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>
  random?: () => number
  now?: () => number
}

interface DomainSlot {
  /** Resolves when the previous holder released the slot */
  tail: Promise<void>
  /** Earliest time the next request may start */
  nextAllowedAt: number
}

export class InMemoryRateLimiter implements RateLimiter {
  private readonly config: RateLimitConfig
  private readonly slots = new Map<string, DomainSlot>()
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number
  private readonly now: () => number

  constructor(options: InMemoryRateLimiterOptions = {}) {
    this.config = options.defaultConfig ?? DEFAULT_RATE_LIMIT
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
    this.random = options.random ?? Math.random
    this.now = options.now ?? Date.now
  }

  /**
   * Run `task` while holding the slot for the URL's domain.
   */
  async schedule<T>(url: string, task: () => Promise<T>): Promise<T> {
    const domain = this.resolveDomain(url)
    const slot = this.slots.get(domain) ?? { tail: Promise.resolve(), nextAllowedAt: 0 }
    this.slots.set(domain, slot)

    let release: () => void = () => {}
    const previous = slot.tail
    slot.tail = new Promise<void>(resolve => {
      release = resolve
    })

    await previous

    try {
      const waitMs = slot.nextAllowedAt - this.now()
      if (waitMs > 0) {
        await this.sleep(waitMs)
      }
      return await task()
    } finally {
      slot.nextAllowedAt = this.now() + this.nextGap()
      release()
    }
  }

  private nextGap(): number {
    const span = Math.max(0, this.config.maxDelayMs - this.config.minDelayMs)
    return this.config.minDelayMs + this.random() * span
  }

  private resolveDomain(urlOrDomain: string): string {
    if (!urlOrDomain.includes('://')) {
      return urlOrDomain
    }
    try {
      return getRegistrableDomain(urlOrDomain)
    } catch {
      return urlOrDomain
    }
  }
}
