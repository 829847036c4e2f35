import type { SilenceOptions, SilencePeriod } from '../types/index.js'
import {
  DEFAULT_MIN_SILENCE_DURATION,
  DEFAULT_SILENCE_THRESHOLD_DB,
  SILENCE_WINDOW_SECONDS,
} from '../constants/analysis.js'
import { dbToLinear } from './loudness.js'

type ScanState =
  | { kind: 'sound' }
  | { kind: 'silence'; start: number }

function windowRms(samples: Float32Array, start: number, length: number): number {
  let sumSquares = 0
  for (let i = start; i < start + length; i++) {
    sumSquares += samples[i] * samples[i]
  }
  return Math.sqrt(sumSquares / length)
}

/**
 * Scan 10 ms windows (5 ms hop) left to right and report every stretch whose
 * window RMS stays under the threshold for at least `minSilenceDuration`.
 * Shorter dips count as sound; nothing is merged across them.
 */
export function detectSilence(
  samples: Float32Array,
  sampleRate: number,
  options: SilenceOptions = {}
): SilencePeriod[] {
  if (sampleRate <= 0) {
    throw new RangeError(`Sample rate must be positive, got ${sampleRate}`)
  }

  const thresholdLinear = dbToLinear(options.thresholdDb ?? DEFAULT_SILENCE_THRESHOLD_DB)
  const minDuration = options.minSilenceDuration ?? DEFAULT_MIN_SILENCE_DURATION
  const windowSize = Math.max(1, Math.floor(SILENCE_WINDOW_SECONDS * sampleRate))
  const hopSize = Math.max(1, Math.floor(windowSize / 2))

  const periods: SilencePeriod[] = []
  const emit = (start: number, end: number) => {
    if (end - start >= minDuration) {
      periods.push({ start, end })
    }
  }

  let state: ScanState = { kind: 'sound' }
  for (let index = 0; index * hopSize < samples.length - windowSize; index++) {
    const time = (index * hopSize) / sampleRate
    const silent = windowRms(samples, index * hopSize, windowSize) < thresholdLinear

    switch (state.kind) {
      case 'sound':
        if (silent) state = { kind: 'silence', start: time }
        break
      case 'silence':
        if (!silent) {
          emit(state.start, time)
          state = { kind: 'sound' }
        }
        break
    }
  }

  if (state.kind === 'silence') {
    emit(state.start, samples.length / sampleRate)
  }

  return periods
}

export function summarizeSilence(
  periods: readonly SilencePeriod[],
  durationSeconds: number
): { totalSeconds: number; percentage: number } {
  const totalSeconds = periods.reduce((sum, period) => sum + (period.end - period.start), 0)
  if (durationSeconds <= 0) {
    return { totalSeconds, percentage: 0 }
  }
  const percentage = Math.min(100, Math.max(0, (totalSeconds / durationSeconds) * 100))
  return { totalSeconds, percentage }
}
