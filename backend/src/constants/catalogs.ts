/**
 * Static lookup tables (genre profiles, DAW plugins) read once from
 * backend/catalogs/ at module load and frozen.
 */

import { readFileSync } from 'fs'
import path from 'path'
import { fileURLToPath } from 'url'
import { CatalogError } from '../errors.js'
import type {
  DawPluginCatalog,
  DawPlugins,
  GenreProfile,
  PluginCategory,
  PluginSuggestion,
} from '../types/index.js'

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

// Same depth from src/constants and dist/constants
const CATALOG_DIR = path.join(__dirname, '../../catalogs')

export const PLUGIN_CATEGORIES: readonly PluginCategory[] = ['eq', 'compression', 'expansion', 'effects', 'thirdParty']

export interface KeywordGenreRule {
  keywords: string[]
  profile: GenreProfile
}

export interface TempoGenreRule {
  /** Matches tempos strictly above this value; null matches everything */
  aboveBpm: number | null
  profile: GenreProfile
}

export interface EnergyRule {
  lowBelowDb: number
  goodBelowDb: number
  low: string
  good: string
  hot: string
}

export interface AdviceBlock {
  heading: string
  lines: string[]
}

export interface GenreCatalog {
  keywordProfiles: KeywordGenreRule[]
  tempoBuckets: TempoGenreRule[]
  energyRules: Record<string, EnergyRule>
  eqAdvice: Record<string, AdviceBlock>
  compressionAdvice: Record<string, AdviceBlock>
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function expectString(value: unknown, where: string): string {
  if (typeof value !== 'string') throw new CatalogError(`${where} must be a string`)
  return value
}

function expectNumber(value: unknown, where: string): number {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new CatalogError(`${where} must be a number`)
  }
  return value
}

function expectStringArray(value: unknown, where: string): string[] {
  if (!Array.isArray(value)) throw new CatalogError(`${where} must be an array`)
  return value.map((entry, index) => expectString(entry, `${where}[${index}]`))
}

function expectRecord(value: unknown, where: string): Record<string, unknown> {
  if (!isRecord(value)) throw new CatalogError(`${where} must be an object`)
  return value
}

function mapRecord<T>(value: unknown, where: string, parse: (entry: unknown, key: string) => T): Record<string, T> {
  const record = expectRecord(value, where)
  const result: Record<string, T> = {}
  for (const [key, entry] of Object.entries(record)) {
    result[key] = parse(entry, `${where}.${key}`)
  }
  return result
}

function parseProfile(value: unknown, where: string): GenreProfile {
  const record = expectRecord(value, where)
  return {
    genre: expectString(record.genre, `${where}.genre`),
    characteristics: expectStringArray(record.characteristics, `${where}.characteristics`),
    loudnessTargetDb: expectNumber(record.loudnessTargetDb, `${where}.loudnessTargetDb`),
    compressionStyle: expectString(record.compressionStyle, `${where}.compressionStyle`),
    eqFocus: expectString(record.eqFocus, `${where}.eqFocus`),
  }
}

function parseAdvice(value: unknown, where: string): AdviceBlock {
  const record = expectRecord(value, where)
  return {
    heading: expectString(record.heading, `${where}.heading`),
    lines: expectStringArray(record.lines, `${where}.lines`),
  }
}

export function parseGenreCatalog(raw: unknown): GenreCatalog {
  const root = expectRecord(raw, 'genres')

  if (!Array.isArray(root.keywordProfiles)) throw new CatalogError('genres.keywordProfiles must be an array')
  const keywordProfiles = root.keywordProfiles.map((entry, index) => {
    const where = `genres.keywordProfiles[${index}]`
    const record = expectRecord(entry, where)
    return {
      keywords: expectStringArray(record.keywords, `${where}.keywords`).map((keyword) => keyword.toLowerCase()),
      profile: parseProfile(record.profile, `${where}.profile`),
    }
  })

  if (!Array.isArray(root.tempoBuckets)) throw new CatalogError('genres.tempoBuckets must be an array')
  const tempoBuckets = root.tempoBuckets.map((entry, index) => {
    const where = `genres.tempoBuckets[${index}]`
    const record = expectRecord(entry, where)
    return {
      aboveBpm: record.aboveBpm === null ? null : expectNumber(record.aboveBpm, `${where}.aboveBpm`),
      profile: parseProfile(record.profile, `${where}.profile`),
    }
  })
  if (tempoBuckets.length === 0 || tempoBuckets[tempoBuckets.length - 1].aboveBpm !== null) {
    throw new CatalogError('genres.tempoBuckets must end with a catch-all bucket (aboveBpm: null)')
  }

  const energyRules = mapRecord(root.energyRules, 'genres.energyRules', (entry, where) => {
    const record = expectRecord(entry, where)
    return {
      lowBelowDb: expectNumber(record.lowBelowDb, `${where}.lowBelowDb`),
      goodBelowDb: expectNumber(record.goodBelowDb, `${where}.goodBelowDb`),
      low: expectString(record.low, `${where}.low`),
      good: expectString(record.good, `${where}.good`),
      hot: expectString(record.hot, `${where}.hot`),
    }
  })
  const eqAdvice = mapRecord(root.eqAdvice, 'genres.eqAdvice', parseAdvice)
  const compressionAdvice = mapRecord(root.compressionAdvice, 'genres.compressionAdvice', parseAdvice)

  for (const [name, table] of [['energyRules', energyRules], ['eqAdvice', eqAdvice], ['compressionAdvice', compressionAdvice]] as const) {
    if (!('general' in table)) throw new CatalogError(`genres.${name} needs a "general" entry`)
  }

  return { keywordProfiles, tempoBuckets, energyRules, eqAdvice, compressionAdvice }
}

function parseSuggestions(value: unknown, where: string): PluginSuggestion[] {
  if (!Array.isArray(value)) throw new CatalogError(`${where} must be an array`)
  return value.map((entry, index) => {
    const record = expectRecord(entry, `${where}[${index}]`)
    return {
      name: expectString(record.name, `${where}[${index}].name`),
      description: expectString(record.description, `${where}[${index}].description`),
    }
  })
}

export function parseDawPluginCatalog(raw: unknown): DawPluginCatalog {
  const root = expectRecord(raw, 'daw-plugins')
  const defaultsRecord = expectRecord(root.defaults, 'daw-plugins.defaults')

  const defaults: Record<PluginCategory, string> = {
    eq: expectString(defaultsRecord.eq, 'daw-plugins.defaults.eq'),
    compression: expectString(defaultsRecord.compression, 'daw-plugins.defaults.compression'),
    expansion: expectString(defaultsRecord.expansion, 'daw-plugins.defaults.expansion'),
    effects: expectString(defaultsRecord.effects, 'daw-plugins.defaults.effects'),
    thirdParty: expectString(defaultsRecord.thirdParty, 'daw-plugins.defaults.thirdParty'),
  }

  const daws = mapRecord(root.daws, 'daw-plugins.daws', (entry, where) => {
    const record = expectRecord(entry, where)
    const plugins: DawPlugins = {}
    for (const category of PLUGIN_CATEGORIES) {
      if (record[category] !== undefined) {
        plugins[category] = parseSuggestions(record[category], `${where}.${category}`)
      }
    }
    return plugins
  })

  return { defaults, daws }
}

function readCatalogFile(fileName: string): unknown {
  const filePath = path.join(CATALOG_DIR, fileName)
  try {
    return JSON.parse(readFileSync(filePath, 'utf-8'))
  } catch (error) {
    throw new CatalogError(`Failed to read ${filePath}: ${error instanceof Error ? error.message : String(error)}`)
  }
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const entry of Object.values(value)) deepFreeze(entry)
    Object.freeze(value)
  }
  return value
}

export const GENRE_CATALOG: GenreCatalog = deepFreeze(parseGenreCatalog(readCatalogFile('genres.json')))
export const DAW_PLUGIN_CATALOG: DawPluginCatalog = deepFreeze(parseDawPluginCatalog(readCatalogFile('daw-plugins.json')))

export const DAW_NAMES: readonly string[] = Object.freeze(Object.keys(DAW_PLUGIN_CATALOG.daws))

export const DEFAULT_DAW = process.env.DEFAULT_DAW?.trim() || 'FL Studio'
