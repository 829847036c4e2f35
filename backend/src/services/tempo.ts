/**
 * Tempo estimation by onset-envelope autocorrelation.
 *
 * 1. Frame energy in dB (20 ms frames, 10 ms hop)
 * 2. Half-wave rectified first difference, gated at ONSET_FLOOR_DB, as the onset envelope
 * 3. Autocorrelation over lags for TEMPO_MIN_BPM..TEMPO_MAX_BPM, weighted by a
 *    log-normal prior around TEMPO_PRIOR_BPM so half/double tempo lose ties
 * 4. Parabolic interpolation around the winning lag
 */

import type { TempoEstimate } from '../types/index.js'
import { TempoEstimationError } from '../errors.js'
import {
  ONSET_FLOOR_DB,
  TEMPO_HOP_SECONDS,
  TEMPO_MAX_BPM,
  TEMPO_MIN_BPM,
  TEMPO_PRIOR_BPM,
  TEMPO_PRIOR_OCTAVES,
} from '../constants/analysis.js'

const ENERGY_FLOOR = 1e-10

export function onsetEnvelope(samples: Float32Array, hopSize: number): Float32Array {
  const frameSize = hopSize * 2
  if (samples.length < frameSize) return new Float32Array(0)

  const frameCount = Math.floor((samples.length - frameSize) / hopSize) + 1
  const envelope = new Float32Array(frameCount)

  let previousDb = 0
  for (let frame = 0; frame < frameCount; frame++) {
    const start = frame * hopSize
    let sumSquares = 0
    for (let i = start; i < start + frameSize; i++) {
      sumSquares += samples[i] * samples[i]
    }
    const energyDb = 10 * Math.log10(sumSquares / frameSize + ENERGY_FLOOR)

    if (frame > 0) {
      const rise = energyDb - previousDb
      envelope[frame] = rise >= ONSET_FLOOR_DB ? rise : 0
    }
    previousDb = energyDb
  }

  return envelope
}

function autocorrelation(envelope: Float32Array, lag: number): number {
  let sum = 0
  for (let i = 0; i + lag < envelope.length; i++) {
    sum += envelope[i] * envelope[i + lag]
  }
  return sum
}

function tempoPrior(bpm: number): number {
  const octaves = Math.log2(bpm / TEMPO_PRIOR_BPM) / TEMPO_PRIOR_OCTAVES
  return Math.exp(-0.5 * octaves * octaves)
}

export function estimateTempo(samples: Float32Array, sampleRate: number): TempoEstimate {
  if (sampleRate <= 0) {
    throw new TempoEstimationError(`Sample rate must be positive, got ${sampleRate}`)
  }

  const hopSize = Math.max(1, Math.floor(TEMPO_HOP_SECONDS * sampleRate))
  const framesPerSecond = sampleRate / hopSize
  const envelope = onsetEnvelope(samples, hopSize)

  const minLag = Math.max(2, Math.ceil((60 * framesPerSecond) / TEMPO_MAX_BPM))
  // At least two periods of the slowest tempo have to fit
  const maxLag = Math.min(
    Math.floor((60 * framesPerSecond) / TEMPO_MIN_BPM),
    Math.floor(envelope.length / 2)
  )
  if (maxLag <= minLag) {
    throw new TempoEstimationError('Audio is too short to estimate tempo')
  }

  const zeroLag = autocorrelation(envelope, 0)
  if (zeroLag <= 0) {
    throw new TempoEstimationError('No onsets detected')
  }

  let bestLag = 0
  let bestScore = 0
  for (let lag = minLag; lag <= maxLag; lag++) {
    const score = autocorrelation(envelope, lag) * tempoPrior((60 * framesPerSecond) / lag)
    if (score > bestScore) {
      bestScore = score
      bestLag = lag
    }
  }

  if (bestLag === 0) {
    throw new TempoEstimationError('No periodic onsets detected')
  }

  const center = autocorrelation(envelope, bestLag)
  const left = autocorrelation(envelope, bestLag - 1)
  const right = autocorrelation(envelope, bestLag + 1)
  const denominator = 2 * (left - 2 * center + right)
  const delta = denominator !== 0
    ? Math.max(-0.5, Math.min(0.5, (left - right) / denominator))
    : 0

  return {
    bpm: (60 * framesPerSecond) / (bestLag + delta),
    confidence: Math.min(1, Math.max(0, center / zeroLag)),
  }
}
