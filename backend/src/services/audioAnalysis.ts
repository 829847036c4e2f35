/**
 * Audio Analysis Service
 * Loads a file once and runs every feature extractor over the mono buffer.
 * Only a decode failure aborts; each extractor that throws degrades its own
 * metric and leaves a warning on the result.
 */

import type {
  AnalysisMetrics,
  AnalysisOptions,
  ClippingResult,
  SilencePeriod,
  TempoEstimate,
  Waveform,
} from '../types/index.js'
import { CLIPPING_THRESHOLD_DB } from '../constants/analysis.js'
import { loadWaveform, type LoadWaveformOptions } from './waveform.js'
import { calculateDuration, calculateRms, detectClipping } from './loudness.js'
import { detectSilence, summarizeSilence } from './silence.js'
import { estimateTempo } from './tempo.js'

export interface AnalysisResult {
  waveform: Waveform
  metrics: AnalysisMetrics
}

function runExtractor<T>(name: string, warnings: string[], extract: () => T, fallback: T): T {
  try {
    return extract()
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error)
    console.warn(`[audio-analysis] ${name} failed: ${message}`)
    warnings.push(`${name}: ${message}`)
    return fallback
  }
}

export function analyzeWaveform(waveform: Waveform, options: AnalysisOptions = {}): AnalysisMetrics {
  const { samples, sampleRate } = waveform
  const warnings: string[] = []

  const durationSeconds = calculateDuration(samples.length, sampleRate)

  const silencePeriods = runExtractor<SilencePeriod[]>(
    'silence detection',
    warnings,
    () => detectSilence(samples, sampleRate, options.silence),
    []
  )
  const silence = summarizeSilence(silencePeriods, durationSeconds)

  const rms = runExtractor('rms', warnings, () => calculateRms(samples), { linear: 0, db: -Infinity })

  const tempo = runExtractor<TempoEstimate | null>(
    'tempo estimation',
    warnings,
    () => estimateTempo(samples, sampleRate),
    null
  )

  const clipping = runExtractor<ClippingResult>(
    'clipping detection',
    warnings,
    () => detectClipping(samples, options.clipping),
    {
      isClipped: false,
      peakLinear: 0,
      peakDb: -Infinity,
      thresholdDb: options.clipping?.thresholdDb ?? CLIPPING_THRESHOLD_DB,
      flatSampleRatio: 0,
    }
  )

  const dynamicRangeDb = Number.isFinite(clipping.peakDb) && Number.isFinite(rms.db)
    ? clipping.peakDb - rms.db
    : null

  return Object.freeze({
    durationSeconds,
    sampleRate,
    sampleCount: samples.length,
    channelCount: waveform.channelCount,
    silencePeriods: Object.freeze(silencePeriods),
    silenceTotalSeconds: silence.totalSeconds,
    silencePercentage: silence.percentage,
    rmsLinear: rms.linear,
    rmsDb: rms.db,
    peakLinear: clipping.peakLinear,
    peakDb: clipping.peakDb,
    clippingThresholdDb: clipping.thresholdDb,
    flatSampleRatio: clipping.flatSampleRatio,
    isClipped: clipping.isClipped,
    tempoBpm: tempo?.bpm ?? null,
    tempoConfidence: tempo?.confidence ?? null,
    dynamicRangeDb,
    warnings: Object.freeze(warnings),
  })
}

export async function analyzeAudioFile(
  filePath: string,
  options: AnalysisOptions & LoadWaveformOptions = {}
): Promise<AnalysisResult> {
  const started = Date.now()
  const waveform = await loadWaveform(filePath, { timeoutMs: options.timeoutMs })
  const metrics = analyzeWaveform(waveform, options)
  console.log(
    `[audio-analysis] ${filePath}: ${metrics.durationSeconds.toFixed(2)}s @ ${metrics.sampleRate} Hz analyzed in ${Date.now() - started}ms`
  )
  return { waveform, metrics }
}
