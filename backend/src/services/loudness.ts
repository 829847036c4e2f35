import type { ClippingOptions, ClippingResult } from '../types/index.js'
import {
  CLIPPING_THRESHOLD_DB,
  FLAT_SAMPLE_LEVEL,
  FLAT_SAMPLE_RATIO_LIMIT,
} from '../constants/analysis.js'

/** 20·log10 against full scale; exactly 0 maps to -Infinity */
export function linearToDb(linear: number): number {
  return linear > 0 ? 20 * Math.log10(linear) : -Infinity
}

export function dbToLinear(db: number): number {
  return Math.pow(10, db / 20)
}

export function calculateDuration(sampleCount: number, sampleRate: number): number {
  if (sampleRate <= 0) {
    throw new RangeError(`Sample rate must be positive, got ${sampleRate}`)
  }
  return sampleCount / sampleRate
}

export function calculateRms(samples: Float32Array): { linear: number; db: number } {
  if (samples.length === 0) {
    return { linear: 0, db: -Infinity }
  }

  let sumSquares = 0
  for (let i = 0; i < samples.length; i++) {
    sumSquares += samples[i] * samples[i]
  }
  const linear = Math.sqrt(sumSquares / samples.length)
  return { linear, db: linearToDb(linear) }
}

/**
 * Peak level plus the flat-top heuristic: a single transient near full scale
 * is fine, a run of samples pinned above `flatLevel` is not.
 */
export function detectClipping(samples: Float32Array, options: ClippingOptions = {}): ClippingResult {
  const thresholdDb = options.thresholdDb ?? CLIPPING_THRESHOLD_DB
  const flatLevel = options.flatLevel ?? FLAT_SAMPLE_LEVEL
  const flatRatioLimit = options.flatRatioLimit ?? FLAT_SAMPLE_RATIO_LIMIT

  let peakLinear = 0
  let flatSamples = 0
  for (let i = 0; i < samples.length; i++) {
    const magnitude = Math.abs(samples[i])
    if (magnitude > peakLinear) peakLinear = magnitude
    if (magnitude > flatLevel) flatSamples++
  }

  const peakDb = linearToDb(peakLinear)
  const flatSampleRatio = samples.length > 0 ? flatSamples / samples.length : 0

  return {
    isClipped: peakDb > thresholdDb || flatSampleRatio > flatRatioLimit,
    peakLinear,
    peakDb,
    thresholdDb,
    flatSampleRatio,
  }
}
