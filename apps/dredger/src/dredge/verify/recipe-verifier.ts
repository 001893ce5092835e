/**
 * Recipe Verifier
 *
 * Decides whether a fetched page is a single recipe. Signals, first match wins:
 * 1. JSON-LD with @type Recipe (bare or schema.org IRI, in arrays or @graph)
 * 2. Microdata itemtype naming schema.org/Recipe
 * 3. Recipe plugin DOM signatures (signatures.json)
 *
 * A positive page whose <title> reads like a listicle is turned negative, and so is one
 * written in another language than the configured filter.
 */

import { readFileSync } from 'node:fs'
import * as cheerio from 'cheerio'
import { franc } from 'franc'
import { z } from 'zod'
import { ConfigurationError, VerificationError } from '../errors.js'
import type { VerificationResult } from '../types.js'

const signaturesSchema = z.object({
  plugins: z.array(z.object({ id: z.string().min(1), selector: z.string().min(1) })),
  listicleTitlePatterns: z.array(z.string().min(1)),
})

export type RecipeSignatures = z.infer<typeof signaturesSchema>

export function loadSignatures(file: URL = new URL('./signatures.json', import.meta.url)): RecipeSignatures {
  return signaturesSchema.parse(JSON.parse(readFileSync(file, 'utf8')))
}

const RECIPE_TYPE = /^(?:(?:https?:\/\/)?schema\.org\/|schema:)?Recipe$/i
const MICRODATA_RECIPE = /schema\.org\/Recipe(?:$|[\s/#])/i

/** Guards against pathological nesting in hostile JSON-LD */
const MAX_JSON_DEPTH = 8

/** ISO 639-1 codes accepted by LANGUAGE_FILTER, mapped to the ISO 639-3 codes franc returns */
const LANGUAGE_CODES: Record<string, string> = {
  en: 'eng',
  es: 'spa',
  fr: 'fra',
  de: 'deu',
  it: 'ita',
  pt: 'por',
  nl: 'nld',
  pl: 'pol',
  sv: 'swe',
  da: 'dan',
}

/** Text sampled for language detection, and the least that gives a usable answer */
const LANGUAGE_SAMPLE_CHARS = 1000
const LANGUAGE_MIN_CHARS = 50

/**
 * Resolve a LANGUAGE_FILTER value ('en' or 'eng') to an ISO 639-3 code.
 * @throws ConfigurationError for codes that are neither
 */
export function resolveLanguage(code: string): string {
  const normalized = code.trim().toLowerCase()
  if (/^[a-z]{3}$/.test(normalized)) return normalized

  const resolved = LANGUAGE_CODES[normalized]
  if (!resolved) {
    throw new ConfigurationError(`Unsupported LANGUAGE_FILTER: ${code}`, [
      `LANGUAGE_FILTER takes one of ${Object.keys(LANGUAGE_CODES).join(', ')} or an ISO 639-3 code`,
    ])
  }
  return resolved
}

export interface RecipeVerifierOptions {
  /** Pages detected in another language are negative; empty or unset allows all */
  language?: string
}

function isRecipeType(value: unknown): boolean {
  if (typeof value === 'string') return RECIPE_TYPE.test(value.trim())
  if (Array.isArray(value)) return value.some(isRecipeType)
  return false
}

/**
 * Walk a JSON-LD value looking for a node typed Recipe.
 */
export function containsRecipeNode(value: unknown, depth = 0): boolean {
  if (depth > MAX_JSON_DEPTH || value === null || typeof value !== 'object') {
    return false
  }

  if (Array.isArray(value)) {
    return value.some((item) => containsRecipeNode(item, depth + 1))
  }

  const node = Object.entries(value)
  if (node.some(([key, v]) => key === '@type' && isRecipeType(v))) {
    return true
  }

  return node.some(([key, v]) => key !== '@context' && containsRecipeNode(v, depth + 1))
}

export class RecipeVerifier {
  private readonly plugins: RecipeSignatures['plugins']
  private readonly listicleTitles: RegExp[]
  private readonly language: string | null
  private readonly candidateLanguages: string[]

  constructor(signatures: RecipeSignatures = loadSignatures(), options: RecipeVerifierOptions = {}) {
    this.plugins = signatures.plugins
    this.listicleTitles = signatures.listicleTitlePatterns.map((pattern) => new RegExp(pattern, 'i'))
    this.language = options.language ? resolveLanguage(options.language) : null

    // franc only weighs these, so eng is never read as sco
    const candidates = new Set(Object.values(LANGUAGE_CODES))
    if (this.language) candidates.add(this.language)
    this.candidateLanguages = [...candidates]
  }

  /**
   * @throws VerificationError if the page cannot be inspected
   */
  verify(body: string): VerificationResult {
    let $: cheerio.CheerioAPI
    try {
      $ = cheerio.load(body)
    } catch (error) {
      throw new VerificationError('Page could not be parsed', error)
    }

    const signal = this.findSignal($)
    if (!signal) {
      return { isRecipe: false, signalFound: null }
    }

    const title = $('title').first().text().trim()
    if (title && this.listicleTitles.some((pattern) => pattern.test(title))) {
      return { isRecipe: false, signalFound: 'listicle-title' }
    }

    if (this.language && !this.matchesLanguage($)) {
      return { isRecipe: false, signalFound: 'language-mismatch' }
    }

    return { isRecipe: true, signalFound: signal }
  }

  /** Too little text, or an undetermined language, passes */
  private matchesLanguage($: cheerio.CheerioAPI): boolean {
    $('script, style, noscript, template').remove()
    const text = $('body').text().replace(/\s+/g, ' ').trim().slice(0, LANGUAGE_SAMPLE_CHARS)
    if (text.length <= LANGUAGE_MIN_CHARS) return true

    const detected = franc(text, { only: this.candidateLanguages, minLength: LANGUAGE_MIN_CHARS })
    return detected === 'und' || detected === this.language
  }

  private findSignal($: cheerio.CheerioAPI): string | null {
    if (this.hasJsonLdRecipe($)) return 'json-ld'

    const microdata = $('[itemtype]')
      .toArray()
      .some((el) => MICRODATA_RECIPE.test($(el).attr('itemtype') ?? ''))
    if (microdata) return 'microdata'

    for (const plugin of this.plugins) {
      if ($(plugin.selector).length > 0) {
        return `plugin:${plugin.id}`
      }
    }

    return null
  }

  private hasJsonLdRecipe($: cheerio.CheerioAPI): boolean {
    const scripts = $('script[type="application/ld+json"]')

    for (let i = 0; i < scripts.length; i++) {
      const content = scripts.eq(i).html()
      if (!content) continue

      let data: unknown
      try {
        data = JSON.parse(content)
      } catch {
        // Malformed blocks are common; other signals still apply
        continue
      }

      if (containsRecipeNode(data)) return true
    }

    return false
  }
}
