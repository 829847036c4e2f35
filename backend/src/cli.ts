/**
 * mixbot-analyze: fixed-order analysis report plus generic mix notes for one
 * file, and DAW feedback when --daw or --vibe is given.
 */

import fs from 'fs/promises'
import type { AnalysisMetrics } from './types/index.js'
import { DecodeError } from './errors.js'
import { DEFAULT_DAW } from './constants/catalogs.js'
import { loadWaveform } from './services/waveform.js'
import { analyzeWaveform } from './services/audioAnalysis.js'
import { renderAnalysisReport, RULE } from './services/report.js'
import { buildMixNotes, renderMixNotes } from './services/mixNotes.js'
import { generateFeedback, resolveDawName } from './services/feedback.js'
import { renderFeedbackReport } from './services/feedbackReport.js'

export interface CliIO {
  log: (message: string) => void
  error: (message: string) => void
}

export interface AnalyzeCliOptions {
  file?: string
  daw?: string
  vibe?: string
  thresholdDb?: number
  minSilenceDuration?: number
  json: boolean
  help: boolean
}

export const USAGE = `
Analyze audio files for duration, silence, RMS, tempo, and clipping

Usage:
  mixbot-analyze <audio_file> [options]

Options:
  --daw <name>          Add mixing feedback tailored to this DAW (default: ${DEFAULT_DAW} when --vibe is set)
  --vibe <text>         Genre or artist reference for the feedback
  --threshold-db <dB>   Silence threshold (default: -40)
  --min-silence <s>     Shortest reported silence in seconds (default: 0.1)
  --json                Print metrics and feedback as JSON
  --help                Show this help message

Examples:
  mixbot-analyze song.wav
  mixbot-analyze music.mp3 --daw "Ableton Live" --vibe "deep house"
`.trim()

export class UsageError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

function takeValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1]
  if (value === undefined) throw new UsageError(`${flag} needs a value`)
  return value
}

function takeNumber(args: string[], index: number, flag: string): number {
  const raw = takeValue(args, index, flag)
  const value = Number(raw)
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new UsageError(`${flag} expects a number, got "${raw}"`)
  }
  return value
}

export function parseAnalyzeArgs(args: string[]): AnalyzeCliOptions {
  const options: AnalyzeCliOptions = { json: false, help: false }

  for (let i = 0; i < args.length; i++) {
    const arg = args[i]
    switch (arg) {
      case '--daw':
        options.daw = takeValue(args, i++, arg)
        break
      case '--vibe':
        options.vibe = takeValue(args, i++, arg)
        break
      case '--threshold-db':
        options.thresholdDb = takeNumber(args, i++, arg)
        break
      case '--min-silence':
        options.minSilenceDuration = takeNumber(args, i++, arg)
        if (options.minSilenceDuration < 0) throw new UsageError('--min-silence must not be negative')
        break
      case '--json':
        options.json = true
        break
      case '--help':
      case '-h':
        options.help = true
        break
      default:
        if (arg.startsWith('--')) throw new UsageError(`Unknown option: ${arg}`)
        if (options.file !== undefined) throw new UsageError(`Unexpected argument: ${arg}`)
        options.file = arg
    }
  }

  return options
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath)
    return true
  } catch {
    return false
  }
}

export async function runAnalyzeCli(args: string[], io: CliIO = console): Promise<number> {
  let options: AnalyzeCliOptions
  try {
    options = parseAnalyzeArgs(args)
  } catch (error) {
    if (error instanceof UsageError) {
      io.error(`Error: ${error.message}`)
      io.error(USAGE)
      return 1
    }
    throw error
  }

  if (options.help) {
    io.log(USAGE)
    return 0
  }
  if (!options.file) {
    io.error(USAGE)
    return 1
  }

  const filePath = options.file
  if (!(await pathExists(filePath))) {
    io.error(`Error: File '${filePath}' not found.`)
    return 1
  }

  let metrics: AnalysisMetrics
  try {
    const waveform = await loadWaveform(filePath)
    metrics = analyzeWaveform(waveform, {
      silence: { thresholdDb: options.thresholdDb, minSilenceDuration: options.minSilenceDuration },
    })
  } catch (error) {
    if (error instanceof DecodeError) {
      io.error(`Error loading audio file: ${error.message}`)
      return 1
    }
    throw error
  }

  const wantsFeedback = options.daw !== undefined || options.vibe !== undefined
  const daw = resolveDawName(options.daw, DEFAULT_DAW)
  const feedback = wantsFeedback ? generateFeedback(metrics, daw, options.vibe) : null

  if (options.json) {
    io.log(JSON.stringify({ file: filePath, metrics, ...(feedback ? { daw, ...feedback } : {}) }, null, 2))
    return 0
  }

  for (const line of renderAnalysisReport(filePath, metrics)) io.log(line)

  io.log('')
  io.log(RULE)
  io.log('🎵 MIXING & MASTERING FEEDBACK')
  io.log(RULE)
  for (const line of renderMixNotes(buildMixNotes(metrics))) io.log(line)

  if (feedback) {
    io.log('')
    io.log(renderFeedbackReport(feedback.sections, { daw, vibe: options.vibe, generatedAt: new Date() }))
  }

  return 0
}
