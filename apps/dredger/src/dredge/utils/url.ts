/**
 * URL Canonicalization Utilities
 *
 * Canonical URLs key the memory store and the library dedupe set, so two spellings of
 * the same page must collapse to one string.
 *
 * Rules:
 * 1. Enforce https (upgrade http)
 * 2. Lowercase hostname
 * 3. Remove tracking parameters: utm_*, fbclid, gclid, mc_cid, mc_eid, ref, source, campaign
 * 4. Remove empty query parameters
 * 5. Sort query parameters alphabetically
 * 6. Remove fragment identifiers (#...)
 * 7. Remove trailing slash (except root path)
 */

import psl from 'psl'

const TRACKING_PARAMS = new Set([
  'utm_source',
  'utm_medium',
  'utm_campaign',
  'utm_term',
  'utm_content',
  'fbclid',
  'gclid',
  'mc_cid',
  'mc_eid',
  'ref',
  'source',
  'campaign',
])

/**
 * Canonicalize a URL for deduplication.
 *
 * @throws TypeError if the URL cannot be parsed
 */
export function canonicalizeUrl(url: string): string {
  const parsed = new URL(url.trim())

  parsed.protocol = 'https:'
  parsed.hostname = parsed.hostname.toLowerCase()

  const keysToDelete: string[] = []
  for (const [key, value] of parsed.searchParams.entries()) {
    if (TRACKING_PARAMS.has(key) || key.startsWith('utm_') || value === '') {
      keysToDelete.push(key)
    }
  }
  for (const key of keysToDelete) {
    parsed.searchParams.delete(key)
  }

  parsed.searchParams.sort()
  parsed.hash = ''

  if (parsed.pathname !== '/' && parsed.pathname.endsWith('/')) {
    parsed.pathname = parsed.pathname.replace(/\/+$/, '')
  }

  return parsed.toString()
}

/**
 * Canonicalize, returning null instead of throwing for unparseable input.
 */
export function tryCanonicalizeUrl(url: string): string | null {
  try {
    return canonicalizeUrl(url)
  } catch {
    return null
  }
}

/**
 * Validate that a URL is valid and has a supported protocol.
 */
export function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}

/**
 * Extract the registrable domain (eTLD+1) from a URL.
 * Politeness is scoped by registrable domain so www., cdn. and bare hosts share one budget.
 *
 * @returns The registrable domain (e.g., "example.co.uk" from "https://www.example.co.uk/x")
 */
export function getRegistrableDomain(url: string): string {
  const hostname = new URL(url).hostname.toLowerCase()
  const parsed = psl.parse(hostname)

  if (parsed.error) {
    return hostname
  }

  return parsed.domain ?? hostname
}

/**
 * Origin (scheme + host + port) of a site base URL, without a trailing slash.
 */
export function siteOrigin(url: string): string {
  return new URL(url).origin
}

/**
 * Final non-empty path segment, lowercased. Empty string for the root path.
 */
export function urlSlug(url: string): string {
  const segments = new URL(url).pathname.split('/').filter(Boolean)
  return (segments[segments.length - 1] ?? '').toLowerCase()
}
