/**
 * Tandoor Client
 *
 * Listing follows the paginated `next` links of /api/recipe/; imports go through
 * /api/recipe/import-url/.
 */

import { z } from 'zod'
import { tryCanonicalizeUrl } from '../utils/url.js'
import { HttpLibraryClient, MAX_LISTING_PAGES, type LibraryResponse } from './http-client.js'
import type { ImportReceipt, RecipeLibrary } from './types.js'

const PAGE_SIZE = 100

const listingSchema = z.object({
  results: z.array(z.object({ source_url: z.string().nullish() }).passthrough()),
  next: z.string().nullish(),
})

const importResponseSchema = z.object({ id: z.union([z.number(), z.string()]) }).passthrough()

export class TandoorLibrary extends HttpLibraryClient implements RecipeLibrary {
  readonly name = 'tandoor'

  async listExistingRecipeUrls(signal?: AbortSignal): Promise<Set<string>> {
    const urls = new Set<string>()
    let next: string | null = `/api/recipe/?page=1&limit=${PAGE_SIZE}`

    for (let page = 1; next && page <= MAX_LISTING_PAGES; page++) {
      let response: LibraryResponse
      try {
        response = await this.request('GET', next, { signal })
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

      for (const recipe of parsed.data.results) {
        const source = recipe.source_url
        if (!source || !source.startsWith('http')) continue
        const canonical = tryCanonicalizeUrl(source)
        if (canonical) urls.add(canonical)
      }

      next = parsed.data.next ?? null
    }

    this.log.info('Synced existing library URLs', { count: urls.size })
    return urls
  }

  async importFromUrl(url: string, signal?: AbortSignal): Promise<ImportReceipt> {
    let response: LibraryResponse
    try {
      response = await this.request('POST', '/api/recipe/import-url/', { json: { url }, signal })
    } catch (error) {
      throw this.importFailed(url, error instanceof Error ? error.message : String(error), undefined, error)
    }

    if (response.status !== 200 && response.status !== 201) {
      throw this.importFailed(url, `HTTP ${response.status}`, response.status)
    }

    const parsed = importResponseSchema.safeParse(response.body)
    return parsed.success ? { library: this.name, recipeId: String(parsed.data.id) } : { library: this.name }
  }

  async checkConnectivity(): Promise<void> {
    await this.checkEndpoint('/api/recipe/?page=1&limit=1')
  }
}
