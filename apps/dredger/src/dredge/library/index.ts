import type { Settings } from '../../config/settings.js'
import { CompositeLibrary } from './composite.js'
import { MealieLibrary } from './mealie.js'
import { TandoorLibrary } from './tandoor.js'
import type { RecipeLibrary } from './types.js'

export { CompositeLibrary } from './composite.js'
export { MealieLibrary, MEALIE_IMPORT_ENDPOINTS } from './mealie.js'
export { TandoorLibrary } from './tandoor.js'
export type { ImportReceipt, RecipeLibrary } from './types.js'

/**
 * Library clients for every enabled platform, or null when none is enabled.
 */
export function createLibrary(settings: Settings): RecipeLibrary | null {
  const libraries: RecipeLibrary[] = []

  if (settings.mealie.enabled) {
    libraries.push(
      new MealieLibrary({ baseUrl: settings.mealie.url, credential: settings.mealie.credential, timeoutMs: settings.fetchTimeoutMs })
    )
  }

  if (settings.tandoor.enabled) {
    libraries.push(
      new TandoorLibrary({ baseUrl: settings.tandoor.url, credential: settings.tandoor.credential, timeoutMs: settings.fetchTimeoutMs })
    )
  }

  if (libraries.length === 0) return null
  return new CompositeLibrary(libraries)
}
