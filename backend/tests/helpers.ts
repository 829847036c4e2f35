import fs from 'fs'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import type { AnalysisMetrics } from '../src/types/index.js'
import { encodeWav, type WavEncoding } from '../src/services/wav.js'
import { TEST_DATA_DIR } from './setup.js'

export { TEST_DATA_DIR }

export function sineWave(
  frequency: number,
  durationSeconds: number,
  sampleRate = 44100,
  amplitude = 0.5
): Float32Array {
  const samples = new Float32Array(Math.round(durationSeconds * sampleRate))
  for (let i = 0; i < samples.length; i++) {
    samples[i] = amplitude * Math.sin((2 * Math.PI * frequency * i) / sampleRate)
  }
  return samples
}

export function silentBuffer(durationSeconds: number, sampleRate = 44100): Float32Array {
  return new Float32Array(Math.round(durationSeconds * sampleRate))
}

/** Zeroes `seconds` at both ends, in place */
export function muteEdges(samples: Float32Array, seconds: number, sampleRate = 44100): Float32Array {
  const edge = Math.floor(seconds * sampleRate)
  samples.fill(0, 0, edge)
  samples.fill(0, samples.length - edge)
  return samples
}

/**
 * Short 1 kHz bursts every `intervalSeconds`, each one hop (10 ms) long,
 * starting at `offsetSeconds`.
 */
export function clickTrack(
  intervalSeconds: number,
  clicks: number,
  options: { sampleRate?: number; offsetSeconds?: number; amplitude?: number; tailSeconds?: number } = {}
): Float32Array {
  const sampleRate = options.sampleRate ?? 44100
  const offset = options.offsetSeconds ?? 0.25
  const amplitude = options.amplitude ?? 0.8
  const tail = options.tailSeconds ?? 0.25
  const burstLength = Math.floor(0.01 * sampleRate)

  const samples = new Float32Array(Math.round((offset + intervalSeconds * (clicks - 1) + tail) * sampleRate))
  for (let k = 0; k < clicks; k++) {
    const start = Math.round((offset + k * intervalSeconds) * sampleRate)
    for (let i = 0; i < burstLength && start + i < samples.length; i++) {
      samples[start + i] = amplitude * Math.sin((2 * Math.PI * 1000 * i) / sampleRate)
    }
  }
  return samples
}

export function writeTestWav(
  channels: Float32Array[],
  options: { sampleRate?: number; encoding?: WavEncoding; name?: string } = {}
): string {
  const dir = path.join(TEST_DATA_DIR, 'fixtures')
  fs.mkdirSync(dir, { recursive: true })
  const filePath = path.join(dir, options.name ?? `${uuidv4()}.wav`)
  fs.writeFileSync(filePath, encodeWav(channels, options.sampleRate ?? 44100, options.encoding))
  return filePath
}

export function writeTestFile(name: string, contents: Buffer | string): string {
  const dir = path.join(TEST_DATA_DIR, 'fixtures')
  fs.mkdirSync(dir, { recursive: true })
  const filePath = path.join(dir, name)
  fs.writeFileSync(filePath, contents)
  return filePath
}

export function buildMetrics(overrides: Partial<AnalysisMetrics> = {}): AnalysisMetrics {
  return {
    durationSeconds: 180,
    sampleRate: 44100,
    sampleCount: 7938000,
    channelCount: 2,
    silencePeriods: [],
    silenceTotalSeconds: 0,
    silencePercentage: 0,
    rmsLinear: 0.2,
    rmsDb: -14,
    peakLinear: 0.7,
    peakDb: -3,
    clippingThresholdDb: -0.1,
    flatSampleRatio: 0,
    isClipped: false,
    tempoBpm: 100,
    tempoConfidence: 0.8,
    dynamicRangeDb: 11,
    warnings: [],
    ...overrides,
  }
}
