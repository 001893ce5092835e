/**
 * Recipe Library Interface
 *
 * The recipe manager that verified URLs are handed to. Only consulted on live runs.
 */

export interface ImportReceipt {
  /** Library that accepted the URL (comma-joined when several did) */
  library: string
  /** Slug or id the library assigned, when it returns one */
  recipeId?: string
}

export interface RecipeLibrary {
  readonly name: string

  /**
   * Canonical source URLs of every recipe the library already holds.
   * A listing that fails part-way returns what was read so far.
   */
  listExistingRecipeUrls(signal?: AbortSignal): Promise<Set<string>>

  /**
   * Ask the library to scrape and store a recipe.
   *
   * @throws ImportError when the library refuses or cannot be reached
   */
  importFromUrl(url: string, signal?: AbortSignal): Promise<ImportReceipt>

  /**
   * Verify address and credential before a live run.
   *
   * @throws LibraryConnectionError when unreachable or unauthorized
   */
  checkConnectivity(): Promise<void>
}
