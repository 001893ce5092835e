/**
 * Per-host Politeness Scheduler
 *
 * Keeps an explicit "next allowed request" slot per registrable domain. acquire() claims the
 * next slot synchronously and then waits for it, so concurrent callers for one domain are
 * queued in order and callers for different domains never block each other.
 *
 * Jitter only ever lengthens the interval.
 */

import { setTimeout as delay } from 'node:timers/promises'
import type { RateLimiter } from '../types.js'
import { getRegistrableDomain } from '../utils/url.js'

export interface HostRateLimiterOptions {
  /** Default interval between requests to one domain */
  minDelayMs?: number

  /** Fraction of the interval added at random (0 disables jitter) */
  jitter?: number

  /** Injectable for tests */
  now?: () => number
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>
  random?: () => number
}

const defaultSleep = async (ms: number, signal?: AbortSignal): Promise<void> => {
  await delay(ms, undefined, { signal })
}

export class HostRateLimiter implements RateLimiter {
  private readonly defaultDelayMs: number
  private readonly jitter: number
  private readonly now: () => number
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>
  private readonly random: () => number

  /** Earliest timestamp the next request to each domain may start */
  private readonly nextAllowedAt = new Map<string, number>()
  private readonly domainDelays = new Map<string, number>()

  constructor(options: HostRateLimiterOptions = {}) {
    this.defaultDelayMs = options.minDelayMs ?? 2000
    this.jitter = options.jitter ?? 0
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? defaultSleep
    this.random = options.random ?? Math.random
  }

  async acquire(url: string, signal?: AbortSignal): Promise<void> {
    const domain = this.domainOf(url)
    const now = this.now()
    const slot = Math.max(now, this.nextAllowedAt.get(domain) ?? now)

    const interval = this.getMinDelay(domain) * (1 + this.jitter * this.random())
    this.nextAllowedAt.set(domain, slot + interval)

    const waitMs = slot - now
    if (waitMs > 0) {
      await this.sleep(waitMs, signal)
    }
  }

  setMinDelay(domain: string, minDelayMs: number): void {
    this.domainDelays.set(domain.toLowerCase(), Math.max(minDelayMs, this.defaultDelayMs))
  }

  getMinDelay(domain: string): number {
    return this.domainDelays.get(domain.toLowerCase()) ?? this.defaultDelayMs
  }

  private domainOf(urlOrDomain: string): string {
    if (!urlOrDomain.includes('://')) {
      return urlOrDomain.toLowerCase()
    }
    try {
      return getRegistrableDomain(urlOrDomain)
    } catch {
      return urlOrDomain
    }
  }
}
