import { describe, it, expect } from 'vitest'
import { applyOverrides, isLibraryConfigured, loadSettings, validateSettings } from '../settings.js'
import { ConfigurationError } from '../../dredge/errors.js'

describe('loadSettings', () => {
  it('applies defaults to an empty environment', () => {
    const settings = loadSettings({})

    expect(settings.dryRun).toBe(true)
    expect(settings.targetRecipesPerSite).toBe(50)
    expect(settings.scanDepth).toBe(1000)
    expect(settings.crawlDelay).toBe(2)
    expect(settings.respectRobotsTxt).toBe(true)
    expect(settings.siteConcurrency).toBe(1)
    expect(settings.dataDir).toBe('data')
    expect(settings.sites).toEqual([])
    expect(settings.notificationWebhookUrl).toBe('')
    expect(settings.languageFilter).toBe('')
    expect(settings.mealie).toEqual({ enabled: true, url: 'http://localhost:9000', credential: 'your-token' })
    expect(settings.tandoor).toEqual({ enabled: false, url: 'http://localhost:8080', credential: 'your-key' })
  })

  it('parses booleans, numbers and lists', () => {
    const settings = loadSettings({
      DRY_RUN: 'FALSE',
      TARGET_RECIPES_PER_SITE: '5',
      SITES: ' https://a.example , ,https://b.example',
      MEALIE_URL: 'https://mealie.example/',
    })

    expect(settings.dryRun).toBe(false)
    expect(settings.targetRecipesPerSite).toBe(5)
    expect(settings.sites).toEqual(['https://a.example', 'https://b.example'])
    expect(settings.mealie.url).toBe('https://mealie.example')
  })

  it('normalizes the language filter and rejects values that are not ISO 639 codes', () => {
    expect(loadSettings({ LANGUAGE_FILTER: ' EN ' }).languageFilter).toBe('en')
    expect(loadSettings({ LANGUAGE_FILTER: 'spa' }).languageFilter).toBe('spa')
    expect(() => loadSettings({ LANGUAGE_FILTER: 'english' })).toThrow(ConfigurationError)
  })

  it('reports every invalid variable', () => {
    try {
      loadSettings({ DRY_RUN: 'maybe', SCAN_DEPTH: 'lots' })
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError)
      if (error instanceof ConfigurationError) {
        expect(error.code).toBe('CONFIGURATION_ERROR')
        expect(error.issues).toHaveLength(2)
        expect(error.issues[0]).toContain('DRY_RUN')
      }
    }
  })
})

describe('applyOverrides', () => {
  it('keeps settings the CLI did not set', () => {
    const settings = applyOverrides(loadSettings({}), { scanDepth: 10, dryRun: undefined })

    expect(settings.scanDepth).toBe(10)
    expect(settings.dryRun).toBe(true)
  })
})

describe('validateSettings', () => {
  it('warns about placeholder credentials', () => {
    expect(validateSettings(loadSettings({}))).toEqual(['MEALIE_API_TOKEN not configured (still set to default)'])
  })

  it('warns when a live run has no library', () => {
    const warnings = validateSettings(loadSettings({ DRY_RUN: 'false', MEALIE_ENABLED: 'false' }))
    expect(warnings).toEqual(['Both Mealie and Tandoor are disabled. Nothing will be imported'])
  })

  it('treats placeholder credentials as unconfigured', () => {
    const settings = loadSettings({ MEALIE_API_TOKEN: 'test-secret' })
    expect(isLibraryConfigured(settings.mealie, 'your-token')).toBe(true)
    expect(isLibraryConfigured(loadSettings({}).mealie, 'your-token')).toBe(false)
  })
})
