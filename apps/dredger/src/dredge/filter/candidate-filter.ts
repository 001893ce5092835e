/**
 * Candidate Filter ("paranoid mode")
 *
 * Cheap URL-pattern heuristics that reject obvious non-recipes before anything is fetched.
 * Pure and synchronous. The rule table lives in rules.json beside this file.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { urlSlug } from '../utils/url.js'

export const RULE_CATEGORIES = ['listicle', 'keyword', 'section', 'archive', 'asset'] as const

export type RuleCategory = (typeof RULE_CATEGORIES)[number]

const ruleSchema = z.object({
  id: z.string().min(1),
  category: z.enum(RULE_CATEGORIES),
  /** slug = final path segment without extension; path = whole lowercased path */
  target: z.enum(['slug', 'path']),
  pattern: z.string().min(1),
})

const rulesFileSchema = z.object({ rules: z.array(ruleSchema) })

export type FilterRule = z.infer<typeof ruleSchema>

export interface FilterMatch {
  ruleId: string
  category: RuleCategory | 'invalid'
}

interface CompiledRule {
  rule: FilterRule
  regex: RegExp
}

const PAGE_EXTENSION = /\.(html?|php|aspx?)$/

/**
 * Load the bundled rule table.
 */
export function loadFilterRules(file: URL = new URL('./rules.json', import.meta.url)): FilterRule[] {
  return rulesFileSchema.parse(JSON.parse(readFileSync(file, 'utf8'))).rules
}

export class CandidateFilter {
  private readonly compiled: CompiledRule[]

  constructor(rules: FilterRule[] = loadFilterRules()) {
    this.compiled = rules.map((rule) => ({ rule, regex: new RegExp(rule.pattern, 'i') }))
  }

  /**
   * First rule the URL trips, or null if it should be fetched.
   */
  match(url: string): FilterMatch | null {
    let path: string
    let slug: string
    try {
      path = decodeURI(new URL(url).pathname).toLowerCase()
      slug = urlSlug(url).replace(PAGE_EXTENSION, '')
    } catch {
      return { ruleId: 'invalid-url', category: 'invalid' }
    }

    for (const { rule, regex } of this.compiled) {
      const subject = rule.target === 'slug' ? slug : path
      if (regex.test(subject)) {
        return { ruleId: rule.id, category: rule.category }
      }
    }

    return null
  }

  quickReject(url: string): boolean {
    return this.match(url) !== null
  }

  get ruleCount(): number {
    return this.compiled.length
  }
}
