import { spawn } from 'child_process'
import { DecodeError } from '../errors.js'
import { parseNumberEnv } from '../config.js'

export const FFMPEG_BIN = process.env.FFMPEG_PATH || 'ffmpeg'
export const FFPROBE_BIN = process.env.FFPROBE_PATH || 'ffprobe'
export const DECODE_TIMEOUT_MS = parseNumberEnv(process.env.DECODE_TIMEOUT_MS, 120000)

export interface AudioStreamInfo {
  sampleRate: number
  channels: number
  format: string | null
  duration: number | null
}

interface ProcessOutput {
  stdout: Buffer
  stderr: string
}

function runProcess(bin: string, args: string[], timeoutMs: number): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    let settled = false
    const settle = (action: () => void) => {
      if (settled) return
      settled = true
      clearTimeout(timer)
      action()
    }

    const proc = spawn(bin, args)
    const chunks: Buffer[] = []
    let stderr = ''

    const timer = setTimeout(() => {
      proc.kill('SIGKILL')
      settle(() => reject(new DecodeError(`${bin} timed out after ${timeoutMs}ms`)))
    }, timeoutMs)

    proc.stdout.on('data', (data: Buffer) => {
      chunks.push(data)
    })

    proc.stderr.on('data', (data: Buffer) => {
      stderr += data.toString()
    })

    proc.on('error', (error) => {
      const err = error as NodeJS.ErrnoException
      const message = err.code === 'ENOENT'
        ? `${bin} is not installed; only WAV files can be decoded without it`
        : `Failed to start ${bin}: ${err.message}`
      settle(() => reject(new DecodeError(message, { cause: error })))
    })

    proc.on('close', (code) => {
      if (code !== 0) {
        settle(() => reject(new DecodeError(stderr.trim() || `${bin} exited with code ${code}`)))
        return
      }
      settle(() => resolve({ stdout: Buffer.concat(chunks), stderr }))
    })
  })
}

function readNumber(value: unknown): number | null {
  if (typeof value !== 'string' && typeof value !== 'number') return null
  const parsed = Number(value)
  return Number.isFinite(parsed) ? parsed : null
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

export function parseProbeOutput(raw: string): AudioStreamInfo {
  let parsed: unknown
  try {
    parsed = JSON.parse(raw)
  } catch {
    throw new DecodeError('ffprobe returned unreadable output')
  }

  const streams = isRecord(parsed) && Array.isArray(parsed.streams) ? parsed.streams : []
  const audioStream = streams.find(
    (stream): stream is Record<string, unknown> => isRecord(stream) && stream.codec_type === 'audio'
  )
  if (!audioStream) {
    throw new DecodeError('No audio stream found')
  }

  const sampleRate = readNumber(audioStream.sample_rate)
  const channels = readNumber(audioStream.channels)
  if (!sampleRate || sampleRate <= 0) {
    throw new DecodeError('Audio stream has no sample rate')
  }

  const formatSection: Record<string, unknown> = isRecord(parsed) && isRecord(parsed.format) ? parsed.format : {}
  const rawFormat = formatSection.format_name
  const format = typeof rawFormat === 'string' && rawFormat.trim()
    ? rawFormat.split(',')[0].trim().toLowerCase()
    : null

  return {
    sampleRate: Math.round(sampleRate),
    channels: channels && channels > 0 ? channels : 1,
    format,
    duration: readNumber(formatSection.duration),
  }
}

export async function probeAudioStream(
  inputPath: string,
  timeoutMs: number = DECODE_TIMEOUT_MS
): Promise<AudioStreamInfo> {
  const { stdout } = await runProcess(FFPROBE_BIN, [
    '-v', 'error',
    '-show_streams',
    '-show_format',
    '-print_format', 'json',
    inputPath,
  ], timeoutMs)

  return parseProbeOutput(stdout.toString())
}

/**
 * Decode any ffmpeg-readable file to mono 32-bit float PCM at the given rate.
 */
export async function decodeToMonoPcm(
  inputPath: string,
  sampleRate: number,
  timeoutMs: number = DECODE_TIMEOUT_MS
): Promise<Float32Array> {
  const { stdout } = await runProcess(FFMPEG_BIN, [
    '-v', 'error',
    '-i', inputPath,
    '-ac', '1', // Mono
    '-ar', String(sampleRate),
    '-f', 'f32le', // Raw float PCM
    '-',
  ], timeoutMs)

  const sampleCount = Math.floor(stdout.length / 4)
  const samples = new Float32Array(sampleCount)
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = stdout.readFloatLE(i * 4)
  }
  return samples
}
