import fs from 'fs/promises'
import { DecodeError, UnsupportedWavEncodingError } from '../errors.js'
import type { Waveform } from '../types/index.js'
import { decodeWav, isWavBuffer } from './wav.js'
import { decodeToMonoPcm, probeAudioStream, DECODE_TIMEOUT_MS } from './ffmpeg.js'

export interface LoadWaveformOptions {
  /** Upper bound for an ffmpeg decode; WAV files decode in process */
  timeoutMs?: number
}

export function downmixToMono(channels: Float32Array[]): Float32Array {
  if (channels.length === 1) return channels[0]

  const length = channels.reduce((min, channel) => Math.min(min, channel.length), Infinity)
  const mono = new Float32Array(Number.isFinite(length) ? length : 0)
  for (let i = 0; i < mono.length; i++) {
    let sum = 0
    for (const channel of channels) sum += channel[i]
    mono[i] = sum / channels.length
  }
  return mono
}

async function readAudioFile(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath)
  } catch (error) {
    const code = (error as NodeJS.ErrnoException)?.code
    if (code === 'ENOENT') {
      throw new DecodeError(`File '${filePath}' not found.`, { cause: error })
    }
    if (code === 'EISDIR') {
      throw new DecodeError(`'${filePath}' is a directory, not an audio file.`, { cause: error })
    }
    throw new DecodeError(`Could not read '${filePath}': ${error instanceof Error ? error.message : String(error)}`, {
      cause: error,
    })
  }
}

async function decodeWithFfmpeg(filePath: string, options: LoadWaveformOptions): Promise<Waveform> {
  const timeoutMs = options.timeoutMs ?? DECODE_TIMEOUT_MS
  const stream = await probeAudioStream(filePath, timeoutMs)
  return {
    samples: await decodeToMonoPcm(filePath, stream.sampleRate, timeoutMs),
    sampleRate: stream.sampleRate,
    channelCount: stream.channels,
  }
}

// µ-law, A-law and ADPCM WAVs only decode through ffmpeg
async function decodeWavOrFallback(
  filePath: string,
  buffer: Buffer,
  options: LoadWaveformOptions
): Promise<Waveform> {
  try {
    const decoded = decodeWav(buffer)
    return {
      samples: downmixToMono(decoded.channels),
      sampleRate: decoded.sampleRate,
      channelCount: decoded.channels.length,
    }
  } catch (error) {
    if (!(error instanceof UnsupportedWavEncodingError)) throw error
    console.log(`[audio-analysis] ${error.message} in ${filePath}; decoding with ffmpeg`)
    return decodeWithFfmpeg(filePath, options)
  }
}

export async function loadWaveform(filePath: string, options: LoadWaveformOptions = {}): Promise<Waveform> {
  const buffer = await readAudioFile(filePath)

  const waveform = isWavBuffer(buffer)
    ? await decodeWavOrFallback(filePath, buffer, options)
    : await decodeWithFfmpeg(filePath, options)

  if (waveform.samples.length === 0) {
    throw new DecodeError(`'${filePath}' contains no audio samples`)
  }

  return waveform
}
