import type { FeedbackSection } from '../types/index.js'

export interface FeedbackReportHeader {
  daw: string
  vibe?: string
  generatedAt: Date
}

const pad = (value: number) => String(value).padStart(2, '0')

function datePart(date: Date, separator: string): string {
  return [date.getFullYear(), pad(date.getMonth() + 1), pad(date.getDate())].join(separator)
}

function timePart(date: Date, separator: string): string {
  return [pad(date.getHours()), pad(date.getMinutes()), pad(date.getSeconds())].join(separator)
}

// Local time, same as the download timestamp a user sees in their file manager
export function formatTimestamp(date: Date): string {
  return `${datePart(date, '-')} ${timePart(date, ':')}`
}

export function feedbackReportFilename(date: Date): string {
  return `mixbot_feedback_${datePart(date, '')}_${timePart(date, '')}.txt`
}

export function renderFeedbackReport(sections: readonly FeedbackSection[], header: FeedbackReportHeader): string {
  const vibe = header.vibe?.trim()
  const lines = [
    'MIXBOT - Mixing Feedback Report',
    `Generated: ${formatTimestamp(header.generatedAt)}`,
    `DAW: ${header.daw}`,
    `Vibe/Reference: ${vibe ? vibe : 'Not specified'}`,
    '',
    '='.repeat(50),
  ]

  for (const section of sections) {
    lines.push('', `## ${section.title}`, '', section.body)
  }

  return lines.join('\n') + '\n'
}
