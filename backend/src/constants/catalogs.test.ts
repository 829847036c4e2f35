import { describe, expect, it } from 'vitest'
import { DAW_NAMES, DAW_PLUGIN_CATALOG, GENRE_CATALOG, parseDawPluginCatalog, parseGenreCatalog } from './catalogs.js'
import { CatalogError } from '../errors.js'

const defaults = {
  eq: 'eq default',
  compression: 'compression default',
  expansion: 'expansion default',
  effects: 'effects default',
  thirdParty: 'third-party default',
}

const profile = {
  genre: 'Test',
  characteristics: ['clean'],
  loudnessTargetDb: -12,
  compressionStyle: 'gentle',
  eqFocus: 'balance',
}

const advice = { general: { heading: 'General', lines: ['one'] } }

describe('bundled catalogs', () => {
  it('loads every genre rule and DAW', () => {
    expect(GENRE_CATALOG.keywordProfiles.map((rule) => rule.profile.genre)).toEqual([
      'Hip-Hop/Rap', 'Electronic/Dance', 'Rock', 'Pop', 'Acoustic/Folk',
    ])
    expect(GENRE_CATALOG.tempoBuckets.at(-1)?.aboveBpm).toBeNull()
    expect(DAW_NAMES).toHaveLength(8)
    expect(DAW_PLUGIN_CATALOG.daws['Logic Pro'].thirdParty).toBeUndefined()
  })

  it('is frozen', () => {
    expect(Object.isFrozen(GENRE_CATALOG.keywordProfiles[0].keywords)).toBe(true)
    expect(Object.isFrozen(DAW_PLUGIN_CATALOG.daws['FL Studio'])).toBe(true)
  })
})

describe('parseGenreCatalog', () => {
  const valid = {
    keywordProfiles: [{ keywords: ['Lo-Fi'], profile }],
    tempoBuckets: [{ aboveBpm: null, profile }],
    energyRules: { general: { lowBelowDb: -16, goodBelowDb: -12, low: 'low', good: 'good', hot: 'hot' } },
    eqAdvice: advice,
    compressionAdvice: advice,
  }

  it('lowercases keywords', () => {
    expect(parseGenreCatalog(valid).keywordProfiles[0].keywords).toEqual(['lo-fi'])
  })

  it('requires a catch-all tempo bucket', () => {
    expect(() => parseGenreCatalog({ ...valid, tempoBuckets: [{ aboveBpm: 100, profile }] })).toThrow(
      'genres.tempoBuckets must end with a catch-all bucket (aboveBpm: null)'
    )
  })

  it('requires general advice', () => {
    expect(() => parseGenreCatalog({ ...valid, eqAdvice: { Rock: advice.general } })).toThrow(
      'genres.eqAdvice needs a "general" entry'
    )
  })

  it('names the offending field', () => {
    const broken = { ...valid, keywordProfiles: [{ keywords: ['x'], profile: { ...profile, loudnessTargetDb: 'loud' } }] }

    expect(() => parseGenreCatalog(broken)).toThrow('genres.keywordProfiles[0].profile.loudnessTargetDb must be a number')
  })
})

describe('parseDawPluginCatalog', () => {
  it('keeps only the categories a DAW lists', () => {
    const catalog = parseDawPluginCatalog({
      defaults,
      daws: { Tracker: { eq: [{ name: 'Shelf', description: 'Two-band shelf' }] } },
    })

    expect(catalog).toEqual({
      defaults,
      daws: { Tracker: { eq: [{ name: 'Shelf', description: 'Two-band shelf' }] } },
    })
  })

  it('rejects malformed plugin entries', () => {
    expect(() => parseDawPluginCatalog({ defaults, daws: { Tracker: { eq: [{ name: 3 }] } } })).toThrow(CatalogError)
    expect(() => parseDawPluginCatalog({ defaults: {}, daws: {} })).toThrow('daw-plugins.defaults.eq must be a string')
  })
})
