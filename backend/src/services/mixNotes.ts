/**
 * Generic mixing notes printed under the CLI report. Unlike the feedback
 * formatter these ignore genre and DAW.
 */

import type { AnalysisMetrics, MixNoteSection } from '../types/index.js'
import { formatDb } from './report.js'

const LONG_SILENCE_SECONDS = 5

function longestSilence(metrics: AnalysisMetrics): number {
  return metrics.silencePeriods.reduce((longest, period) => Math.max(longest, period.end - period.start), 0)
}

export function buildMixNotes(metrics: AnalysisMetrics): MixNoteSection[] {
  const { rmsDb, peakDb, dynamicRangeDb, tempoBpm, silencePercentage } = metrics

  const summary: MixNoteSection = {
    title: '📊 ANALYSIS SUMMARY:',
    lines: [
      `• RMS Level: ${formatDb(rmsDb, 1)} dB`,
      `• Peak Level: ${formatDb(peakDb, 1)} dB`,
      `• Dynamic Range: ${dynamicRangeDb === null ? 'n/a' : `${dynamicRangeDb.toFixed(1)} dB`}`,
      `• Tempo: ${tempoBpm === null ? 'unknown' : `${tempoBpm.toFixed(0)} BPM`}`,
      `• Silence: ${silencePercentage.toFixed(1)}% of track`,
    ],
  }

  const loudness: string[] = []
  if (rmsDb > -8) {
    loudness.push(
      '⚠️  RMS is quite high - consider reducing overall level',
      '   → Lower your master fader by 2-3 dB',
      '   → Check if individual tracks are too loud'
    )
  } else if (rmsDb < -16) {
    loudness.push(
      'ℹ️  RMS is quite low - you have headroom for mastering',
      '   → Consider gentle compression to bring up quiet parts',
      '   → Ensure your mix translates well on different systems'
    )
  } else {
    loudness.push('✅ RMS level is in a good range for mastering')
  }

  if (peakDb > -1) {
    loudness.push(
      '⚠️  Peak level is very close to clipping',
      '   → Reduce peak levels by 1-2 dB',
      '   → Check for transients that need taming'
    )
  } else if (peakDb < -6) {
    loudness.push('ℹ️  Peak level has good headroom', '   → You can safely increase overall level if needed')
  }

  if (dynamicRangeDb !== null && dynamicRangeDb > 15) {
    loudness.push(
      'ℹ️  Large dynamic range detected',
      '   → Consider compression to control dynamics',
      '   → Check if quiet parts are getting lost'
    )
  } else if (dynamicRangeDb !== null && dynamicRangeDb < 6) {
    loudness.push(
      '⚠️  Very compressed/limited sound',
      '   → Back off on compression/limiting',
      '   → Allow more natural dynamics'
    )
  }

  const clipping = metrics.isClipped
    ? [
        '❌ CLIPPING DETECTED - IMMEDIATE ACTION NEEDED:',
        '   → Reduce master fader by 3-5 dB',
        '   → Check individual tracks for clipping',
        '   → Use a limiter with -1 dB ceiling',
        '   → Consider using soft clipping for character',
      ]
    : ['✅ No clipping detected - good headroom management']

  const timing: string[] = []
  if (silencePercentage > 10) {
    timing.push(
      `ℹ️  High silence content (${silencePercentage.toFixed(1)}%)`,
      '   → Consider if long gaps serve the song',
      '   → Add subtle ambience to fill empty spaces',
      '   → Check if sections flow well together'
    )
  } else if (silencePercentage < 2) {
    timing.push('ℹ️  Very dense arrangement', '   → Consider adding breathing room', '   → Let important elements shine')
  }
  const longest = longestSilence(metrics)
  if (longest > LONG_SILENCE_SECONDS) {
    timing.push(
      `⚠️  Long silence detected (${longest.toFixed(1)}s)`,
      '   → Consider if this serves the song',
      '   → Add subtle elements to maintain interest'
    )
  }

  const tempo: string[] = []
  if (tempoBpm === null) {
    tempo.push('ℹ️  Tempo could not be estimated')
  } else if (tempoBpm < 80) {
    tempo.push('ℹ️  Slow tempo - focus on groove and feel', '   → Ensure timing is tight', '   → Consider subtle swing or groove')
  } else if (tempoBpm > 160) {
    tempo.push('ℹ️  Fast tempo - clarity is key', '   → Ensure each element has space', '   → Consider side-chain compression')
  } else {
    tempo.push('✅ Tempo is in a good range for most genres')
  }

  const compression: string[] = []
  if (dynamicRangeDb !== null && dynamicRangeDb > 12) {
    compression.push('   → Use gentle compression (2:1 ratio) to control dynamics')
  }
  compression.push('   → Consider parallel compression for thickness', '   → Use side-chain compression to create space')

  return [
    summary,
    { title: '🔊 LOUDNESS & DYNAMICS:', lines: loudness },
    { title: '🎚️ CLIPPING & DISTORTION:', lines: clipping },
    { title: '⏱️ TIMING & STRUCTURE:', lines: timing },
    { title: '🎵 TEMPO & RHYTHM:', lines: tempo },
    {
      title: '🎛️ SPECIFIC RECOMMENDATIONS:',
      lines: [
        'EQ Suggestions:',
        '   → High-pass filter at 20-30 Hz to remove rumble',
        '   → Cut 200-400 Hz if mix sounds muddy',
        '   → Boost 2-4 kHz for presence and clarity',
        '   → High-shelf 8-12 kHz for air and brightness',
        'Compression:',
        ...compression,
        'Effects:',
        '   → Add subtle reverb to glue elements together',
        '   → Use delay to create space and movement',
        '   → Consider saturation for warmth and character',
      ],
    },
    {
      title: '🎚️ MASTERING PREPARATION:',
      lines: [
        '→ Leave 1-2 dB headroom for mastering engineer',
        '→ Ensure mix translates on different speakers',
        '→ Check mono compatibility',
        '→ Consider using reference tracks for comparison',
      ],
    },
  ]
}

export function renderMixNotes(sections: readonly MixNoteSection[]): string[] {
  const lines: string[] = []
  for (const section of sections) {
    lines.push(section.title, ...section.lines.map((line) => `   ${line}`), '')
  }
  lines.push('💡 Remember: These are guidelines - trust your ears!', '   The best mix is the one that serves the song.')
  return lines
}
