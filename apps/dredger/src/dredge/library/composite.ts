/**
 * Fan-out over every enabled library. An import succeeds if any library accepts it;
 * the existing-URL set is the union of all listings.
 */

import { ImportError } from '../errors.js'
import type { ImportReceipt, RecipeLibrary } from './types.js'

export class CompositeLibrary implements RecipeLibrary {
  readonly name: string

  constructor(private readonly libraries: RecipeLibrary[]) {
    this.name = libraries.map((library) => library.name).join('+')
  }

  get size(): number {
    return this.libraries.length
  }

  async listExistingRecipeUrls(signal?: AbortSignal): Promise<Set<string>> {
    const union = new Set<string>()
    for (const library of this.libraries) {
      for (const url of await library.listExistingRecipeUrls(signal)) {
        union.add(url)
      }
    }
    return union
  }

  async importFromUrl(url: string, signal?: AbortSignal): Promise<ImportReceipt> {
    const receipts: ImportReceipt[] = []
    const failures: string[] = []
    let statusCode: number | undefined

    for (const library of this.libraries) {
      try {
        receipts.push(await library.importFromUrl(url, signal))
      } catch (error) {
        failures.push(error instanceof Error ? error.message : String(error))
        if (error instanceof ImportError) statusCode ??= error.statusCode
      }
    }

    const first = receipts[0]
    if (!first) {
      throw new ImportError(url, failures.join('; ') || 'No library configured', { statusCode })
    }

    return {
      library: receipts.map((receipt) => receipt.library).join(','),
      ...(first.recipeId ? { recipeId: first.recipeId } : {}),
    }
  }

  async checkConnectivity(): Promise<void> {
    for (const library of this.libraries) {
      await library.checkConnectivity()
    }
  }
}
