/**
 * RIFF/WAVE codec.
 *
 * Decoding covers integer PCM (8/16/24/32-bit), IEEE float (32/64-bit) and
 * WAVE_FORMAT_EXTENSIBLE wrapping either. Everything else goes through ffmpeg.
 */

import { DecodeError, UnsupportedWavEncodingError } from '../errors.js'

const WAVE_FORMAT_PCM = 0x0001
const WAVE_FORMAT_IEEE_FLOAT = 0x0003
const WAVE_FORMAT_EXTENSIBLE = 0xfffe

export interface DecodedAudio {
  sampleRate: number
  channels: Float32Array[]
}

export type WavEncoding = 'pcm16' | 'pcm24' | 'float32'

interface FormatChunk {
  audioFormat: number
  channelCount: number
  sampleRate: number
  bitsPerSample: number
}

export function isWavBuffer(buffer: Buffer): boolean {
  return (
    buffer.length >= 12 &&
    buffer.toString('ascii', 0, 4) === 'RIFF' &&
    buffer.toString('ascii', 8, 12) === 'WAVE'
  )
}

function readFormatChunk(buffer: Buffer, offset: number, size: number): FormatChunk {
  if (size < 16) {
    throw new DecodeError(`Malformed fmt chunk (${size} bytes)`)
  }

  let audioFormat = buffer.readUInt16LE(offset)
  const channelCount = buffer.readUInt16LE(offset + 2)
  const sampleRate = buffer.readUInt32LE(offset + 4)
  const bitsPerSample = buffer.readUInt16LE(offset + 14)

  if (audioFormat === WAVE_FORMAT_EXTENSIBLE) {
    if (size < 26) {
      throw new DecodeError('Malformed WAVE_FORMAT_EXTENSIBLE fmt chunk')
    }
    // First two bytes of the sub-format GUID carry the actual format tag
    audioFormat = buffer.readUInt16LE(offset + 24)
  }

  return { audioFormat, channelCount, sampleRate, bitsPerSample }
}

function sampleReader(format: FormatChunk): (buffer: Buffer, offset: number) => number {
  const { audioFormat, bitsPerSample } = format

  if (audioFormat === WAVE_FORMAT_PCM) {
    switch (bitsPerSample) {
      case 8:
        return (buffer, offset) => (buffer.readUInt8(offset) - 128) / 128
      case 16:
        return (buffer, offset) => buffer.readInt16LE(offset) / 32768
      case 24:
        return (buffer, offset) => buffer.readIntLE(offset, 3) / 8388608
      case 32:
        return (buffer, offset) => buffer.readInt32LE(offset) / 2147483648
    }
  }

  if (audioFormat === WAVE_FORMAT_IEEE_FLOAT) {
    switch (bitsPerSample) {
      case 32:
        return (buffer, offset) => buffer.readFloatLE(offset)
      case 64:
        return (buffer, offset) => buffer.readDoubleLE(offset)
    }
  }

  throw new UnsupportedWavEncodingError(audioFormat, bitsPerSample)
}

export function decodeWav(buffer: Buffer): DecodedAudio {
  if (!isWavBuffer(buffer)) {
    throw new DecodeError('Not a RIFF/WAVE file')
  }

  let format: FormatChunk | null = null
  let dataOffset = -1
  let dataSize = 0

  let offset = 12
  while (offset + 8 <= buffer.length) {
    const id = buffer.toString('ascii', offset, offset + 4)
    const size = buffer.readUInt32LE(offset + 4)
    const body = offset + 8

    if (id === 'fmt ') {
      format = readFormatChunk(buffer, body, Math.min(size, buffer.length - body))
    } else if (id === 'data') {
      dataOffset = body
      // Streaming writers leave the size unset or too large
      dataSize = Math.min(size, buffer.length - body)
      break
    }

    // Chunks are word aligned
    offset = body + size + (size % 2)
  }

  if (!format) throw new DecodeError('Missing fmt chunk')
  if (dataOffset < 0) throw new DecodeError('Missing data chunk')
  if (format.channelCount < 1) throw new DecodeError('WAV declares zero channels')
  if (format.sampleRate <= 0) throw new DecodeError('WAV declares a sample rate of 0 Hz')

  const read = sampleReader(format)
  const bytesPerSample = format.bitsPerSample / 8
  const blockAlign = bytesPerSample * format.channelCount
  const frameCount = Math.floor(dataSize / blockAlign)

  const channels: Float32Array[] = []
  for (let ch = 0; ch < format.channelCount; ch++) {
    channels.push(new Float32Array(frameCount))
  }

  for (let frame = 0; frame < frameCount; frame++) {
    const frameOffset = dataOffset + frame * blockAlign
    for (let ch = 0; ch < format.channelCount; ch++) {
      channels[ch][frame] = read(buffer, frameOffset + ch * bytesPerSample)
    }
  }

  return { sampleRate: format.sampleRate, channels }
}

/**
 * Encode planar channel data as a WAV file. Integer encodings clamp to [-1, 1].
 */
export function encodeWav(
  channels: Float32Array[],
  sampleRate: number,
  encoding: WavEncoding = 'pcm16'
): Buffer {
  if (channels.length === 0) {
    throw new RangeError('encodeWav needs at least one channel')
  }

  const frameCount = channels[0].length
  const bytesPerSample = encoding === 'pcm16' ? 2 : encoding === 'pcm24' ? 3 : 4
  const blockAlign = channels.length * bytesPerSample
  const dataSize = frameCount * blockAlign
  const buffer = Buffer.alloc(44 + dataSize)

  buffer.write('RIFF', 0, 'ascii')
  buffer.writeUInt32LE(36 + dataSize, 4)
  buffer.write('WAVE', 8, 'ascii')

  buffer.write('fmt ', 12, 'ascii')
  buffer.writeUInt32LE(16, 16)
  buffer.writeUInt16LE(encoding === 'float32' ? WAVE_FORMAT_IEEE_FLOAT : WAVE_FORMAT_PCM, 20)
  buffer.writeUInt16LE(channels.length, 22)
  buffer.writeUInt32LE(sampleRate, 24)
  buffer.writeUInt32LE(sampleRate * blockAlign, 28) // byte rate
  buffer.writeUInt16LE(blockAlign, 32)
  buffer.writeUInt16LE(bytesPerSample * 8, 34)

  buffer.write('data', 36, 'ascii')
  buffer.writeUInt32LE(dataSize, 40)

  let offset = 44
  for (let frame = 0; frame < frameCount; frame++) {
    for (const channel of channels) {
      const value = channel[frame] ?? 0
      if (encoding === 'float32') {
        buffer.writeFloatLE(value, offset)
      } else {
        const clamped = Math.max(-1, Math.min(1, value))
        if (encoding === 'pcm16') {
          buffer.writeInt16LE(Math.round(clamped * 32767), offset)
        } else {
          buffer.writeIntLE(Math.round(clamped * 8388607), offset, 3)
        }
      }
      offset += bytesPerSample
    }
  }

  return buffer
}
