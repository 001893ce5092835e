/**
 * Mealie Client
 *
 * Endpoints:
 * - GET  /api/recipes?page=N&perPage=100   listing (orgURL, or originalURL on older releases)
 * - POST /api/recipes/create/url            import (current)
 * - POST /api/recipes/create-url            import (older releases)
 *
 * The import endpoint is detected on first use: a 404/405 moves on to the next candidate and
 * the first one that answers otherwise is remembered.
 */

import { z } from 'zod'
import { tryCanonicalizeUrl } from '../utils/url.js'
import { HttpLibraryClient, MAX_LISTING_PAGES, type LibraryResponse } from './http-client.js'
import type { ImportReceipt, RecipeLibrary } from './types.js'

export const MEALIE_IMPORT_ENDPOINTS = ['/api/recipes/create/url', '/api/recipes/create-url'] as const

const PAGE_SIZE = 100

const listingSchema = z.object({
  items: z.array(
    z
      .object({
        orgURL: z.string().nullish(),
        originalURL: z.string().nullish(),
      })
      .passthrough()
  ),
  total_pages: z.number().optional(),
})

export class MealieLibrary extends HttpLibraryClient implements RecipeLibrary {
  readonly name = 'mealie'

  private workingEndpoint: string | null = null

  get detectedEndpoint(): string | null {
    return this.workingEndpoint
  }

  async listExistingRecipeUrls(signal?: AbortSignal): Promise<Set<string>> {
    const urls = new Set<string>()

    for (let page = 1; page <= MAX_LISTING_PAGES; page++) {
      let response: LibraryResponse
      try {
        response = await this.request('GET', `/api/recipes?page=${page}&perPage=${PAGE_SIZE}`, { signal })
      } catch (error) {
        this.log.warn('Library sync stopped', { page, synced: urls.size }, error)
        break
      }
      if (response.status !== 200) {
        this.log.warn('Library sync stopped', { page, status: response.status, synced: urls.size })
        break
      }

      const parsed = listingSchema.safeParse(response.body)
      if (!parsed.success) {
        this.log.warn('Unexpected listing shape, sync stopped', { page, synced: urls.size })
        break
      }

      const { items, total_pages: totalPages } = parsed.data
      if (items.length === 0) break

      for (const item of items) {
        const source = item.orgURL || item.originalURL
        if (!source || !source.startsWith('http')) continue
        const canonical = tryCanonicalizeUrl(source)
        if (canonical) urls.add(canonical)
      }

      if (totalPages !== undefined && page >= totalPages) break
    }

    this.log.info('Synced existing library URLs', { count: urls.size })
    return urls
  }

  async importFromUrl(url: string, signal?: AbortSignal): Promise<ImportReceipt> {
    const endpoints = this.workingEndpoint ? [this.workingEndpoint] : [...MEALIE_IMPORT_ENDPOINTS]
    let lastError = 'no endpoint answered'

    for (const endpoint of endpoints) {
      let response: LibraryResponse
      try {
        response = await this.request('POST', endpoint, { json: { url }, signal })
      } catch (error) {
        throw this.importFailed(url, error instanceof Error ? error.message : String(error), undefined, error)
      }

      // Wrong or retired endpoint, try the next one
      if (response.status === 404 || response.status === 405) {
        lastError = `HTTP ${response.status} on ${endpoint}`
        continue
      }

      if (this.workingEndpoint === null) {
        this.workingEndpoint = endpoint
        this.log.debug('Detected import endpoint', { endpoint })
      }

      if (response.status === 200 || response.status === 201) {
        const recipeId = typeof response.body === 'string' && response.body ? response.body : undefined
        return recipeId ? { library: this.name, recipeId } : { library: this.name }
      }

      // Already in the library
      if (response.status === 409) {
        return { library: this.name }
      }

      throw this.importFailed(url, `HTTP ${response.status}`, response.status)
    }

    throw this.importFailed(url, `All import endpoints failed. Last error: ${lastError}`)
  }

  async checkConnectivity(): Promise<void> {
    await this.checkEndpoint('/api/recipes?page=1&perPage=1')
  }
}
