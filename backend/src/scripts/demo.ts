#!/usr/bin/env tsx
/**
 * Demo: synthesizes a short tone-plus-rhythm track, writes it to a temporary
 * WAV, runs the full analysis and prints the report and feedback.
 *
 * Usage:
 *   npx tsx src/scripts/demo.ts [--daw <name>] [--vibe <text>]
 *
 * Without --daw, feedback is printed for the first three catalog DAWs.
 */

import fs from 'fs/promises'
import os from 'os'
import path from 'path'
import { v4 as uuidv4 } from 'uuid'
import { encodeWav } from '../services/wav.js'
import { analyzeAudioFile } from '../services/audioAnalysis.js'
import { renderAnalysisReport, RULE } from '../services/report.js'
import { buildMixNotes, renderMixNotes } from '../services/mixNotes.js'
import { generateFeedback, resolveDawName } from '../services/feedback.js'
import { renderFeedbackReport } from '../services/feedbackReport.js'
import { DAW_NAMES } from '../constants/catalogs.js'

const SAMPLE_RATE = 44100
const DURATION_SECONDS = 5
const EDGE_SILENCE_SECONDS = 0.3
const DEMO_VIBE = 'Demo track - Electronic vibes'
const DEMO_DAW_COUNT = 3

function gaussian(): number {
  const u = 1 - Math.random()
  const v = Math.random()
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v)
}

function createDemoAudio(sampleRate = SAMPLE_RATE, durationSeconds = DURATION_SECONDS): Float32Array {
  const length = Math.floor(sampleRate * durationSeconds)
  const audio = new Float32Array(length)
  const edge = Math.floor(EDGE_SILENCE_SECONDS * sampleRate)

  for (let i = 0; i < length; i++) {
    const t = i / sampleRate
    // A4 with two harmonics, plus a 2 Hz swell standing in for a 120 BPM pulse
    const tone =
      0.4 * Math.sin(2 * Math.PI * 440 * t) +
      0.2 * Math.sin(2 * Math.PI * 880 * t) +
      0.1 * Math.sin(2 * Math.PI * 1320 * t) +
      0.15 * Math.sin(2 * Math.PI * 2 * t)
    audio[i] = (i < edge || i >= length - edge ? 0 : tone) + 0.02 * gaussian()
  }

  let peak = 0
  for (let i = 0; i < length; i++) peak = Math.max(peak, Math.abs(audio[i]))
  if (peak > 0) {
    for (let i = 0; i < length; i++) audio[i] = (audio[i] / peak) * 0.9
  }

  return audio
}

function readFlag(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag)
  return index >= 0 ? args[index + 1] : undefined
}

async function runDemo() {
  const args = process.argv.slice(2)
  const dawFlag = readFlag(args, '--daw')
  const daws = dawFlag ? [resolveDawName(dawFlag, dawFlag)] : DAW_NAMES.slice(0, DEMO_DAW_COUNT)
  const vibe = readFlag(args, '--vibe') ?? DEMO_VIBE

  console.log('🎵 Mixbot Mixing Assistant - Demo')
  console.log(RULE)
  console.log('📝 Creating demo audio file...')

  const audio = createDemoAudio()
  const tempPath = path.join(os.tmpdir(), `mixbot-demo-${uuidv4()}.wav`)
  await fs.writeFile(tempPath, encodeWav([audio], SAMPLE_RATE))
  console.log(`✅ Created demo audio: ${audio.length} samples at ${SAMPLE_RATE} Hz`)
  console.log()

  try {
    console.log('🔍 Running audio analysis...')
    console.log('-'.repeat(30))
    const { metrics } = await analyzeAudioFile(tempPath)

    for (const line of renderAnalysisReport(tempPath, metrics)) console.log(line)
    console.log()
    console.log(RULE)
    console.log('🎵 MIXING & MASTERING FEEDBACK')
    console.log(RULE)
    for (const line of renderMixNotes(buildMixNotes(metrics))) console.log(line)

    for (const daw of daws) {
      console.log()
      console.log(`🎛️ Feedback for ${daw}:`)
      console.log('-'.repeat(30))
      const feedback = generateFeedback(metrics, daw, vibe)
      console.log(renderFeedbackReport(feedback.sections, { daw, vibe, generatedAt: new Date() }))
    }
  } finally {
    await fs.rm(tempPath, { force: true })
  }
}

runDemo().catch((error) => {
  console.error('Demo failed:', error)
  process.exit(1)
})
