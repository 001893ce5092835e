import { describe, it, expect } from 'vitest'
import { CandidateFilter, loadFilterRules } from '../candidate-filter.js'

describe('CandidateFilter', () => {
  const filter = new CandidateFilter()

  it('loads the bundled rule table', () => {
    const rules = loadFilterRules()
    expect(rules.length).toBe(filter.ruleCount)
    expect(new Set(rules.map((r) => r.id)).size).toBe(rules.length)
  })

  it.each([
    ['https://example.com/best-10-soups', 'listicle-best-n', 'listicle'],
    ['https://example.com/15-easy-weeknight-dinners/', 'listicle-count-first', 'listicle'],
    ['https://example.com/holiday-cookie-roundup', 'listicle-roundup', 'listicle'],
    ['https://example.com/travel-to-rome', 'keyword-travel', 'keyword'],
    ['https://example.com/lifestyle-home-office-makeover', 'keyword-lifestyle', 'keyword'],
    ['https://example.com/lifestyle/my-morning-routine', 'section-non-food', 'section'],
    ['https://example.com/travel/eating-our-way-through-rome', 'section-non-food', 'section'],
    ['https://example.com/2025/03/stand-mixer-review.html', 'keyword-review', 'keyword'],
    ['https://example.com/category/soups/', 'section-taxonomy', 'section'],
    ['https://example.com/privacy-policy', 'section-site-page', 'section'],
    ['https://example.com/', 'section-root', 'section'],
    ['https://example.com/2024/05/', 'archive-date', 'archive'],
    ['https://example.com/blog/page/3', 'archive-pagination', 'archive'],
    ['https://example.com/wp-content/uploads/soup.jpg', 'asset-binary', 'asset'],
    ['https://example.com/wp-json/wp/v2/posts', 'asset-platform-path', 'asset'],
  ])('rejects %s by %s', (url, ruleId, category) => {
    expect(filter.match(url)).toEqual({ ruleId, category })
    expect(filter.quickReject(url)).toBe(true)
  })

  it.each([
    'https://example.com/creamy-tomato-soup',
    'https://example.com/recipes/restore-your-sourdough-starter',
    'https://example.com/2025/03/chicken-tikka-masala/',
    'https://example.com/bishops-bread',
  ])('keeps %s', (url) => {
    expect(filter.match(url)).toBeNull()
    expect(filter.quickReject(url)).toBe(false)
  })

  it('accepts a custom rule table', () => {
    const custom = new CandidateFilter([{ id: 'no-cake', category: 'keyword', target: 'slug', pattern: 'cake' }])

    expect(custom.match('https://example.com/CHOCOLATE-CAKE')).toEqual({ ruleId: 'no-cake', category: 'keyword' })
    expect(custom.quickReject('https://example.com/best-10-soups')).toBe(false)
  })
})
