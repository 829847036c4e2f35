/**
 * Plain-text analysis report, one string per printed line.
 */

import type { AnalysisMetrics, SilencePeriod } from '../types/index.js'
import { SILENCE_PERIODS_SHOWN } from '../constants/analysis.js'

export const RULE = '='.repeat(50)

/** Fixed-point with infinities spelled `inf`/`-inf` */
export function formatDb(value: number, digits = 2): string {
  if (Number.isNaN(value)) return 'nan'
  if (!Number.isFinite(value)) return value < 0 ? '-inf' : 'inf'
  return value.toFixed(digits)
}

function formatPeriods(periods: readonly SilencePeriod[]): string {
  const shown = periods
    .slice(0, SILENCE_PERIODS_SHOWN)
    .map((period) => `(${period.start.toFixed(2)}, ${period.end.toFixed(2)})`)
  return `[${shown.join(', ')}]`
}

export function renderAnalysisReport(filePath: string, metrics: AnalysisMetrics): string[] {
  const lines: string[] = [
    `Analyzing audio file: ${filePath}`,
    RULE,
    `Duration: ${metrics.durationSeconds.toFixed(2)} seconds (${(metrics.durationSeconds / 60).toFixed(2)} minutes)`,
    'Silence Detection:',
    `  - Total silence time: ${metrics.silenceTotalSeconds.toFixed(2)} seconds (${metrics.silencePercentage.toFixed(1)}%)`,
    `  - Number of silence periods: ${metrics.silencePeriods.length}`,
  ]

  if (metrics.silencePeriods.length > 0) {
    lines.push(`  - Silence periods: ${formatPeriods(metrics.silencePeriods)}`)
    if (metrics.silencePeriods.length > SILENCE_PERIODS_SHOWN) {
      lines.push(`    ... and ${metrics.silencePeriods.length - SILENCE_PERIODS_SHOWN} more`)
    }
  }

  lines.push(
    'RMS (Loudness):',
    `  - Linear: ${metrics.rmsLinear.toFixed(6)}`,
    `  - dB: ${formatDb(metrics.rmsDb)} dB`
  )

  if (metrics.tempoBpm !== null) {
    lines.push(`Tempo: ${metrics.tempoBpm.toFixed(1)} BPM (confidence: ${(metrics.tempoConfidence ?? 0).toFixed(2)})`)
  } else {
    lines.push('Tempo: Could not be estimated')
  }

  lines.push(
    'Clipping Detection:',
    `  - Peak level: ${formatDb(metrics.peakDb)} dB`,
    `  - Clipping threshold: ${formatDb(metrics.clippingThresholdDb)} dB`,
    `  - Likely clipped: ${metrics.isClipped ? 'YES' : 'NO'}`,
    '',
    'Additional Metrics:',
    `  - Sample rate: ${metrics.sampleRate} Hz`,
    `  - Number of samples: ${metrics.sampleCount.toLocaleString('en-US')}`,
    `  - Dynamic range: ${metrics.dynamicRangeDb === null ? 'n/a' : `${metrics.dynamicRangeDb.toFixed(2)} dB`}`
  )

  return lines
}
