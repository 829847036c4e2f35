/**
 * Template-driven mixing feedback.
 *
 * Pure function of (metrics, DAW, vibe): the genre profile comes from the
 * catalog's keyword rules (first match wins) or, failing that, its tempo
 * buckets; every section is text substitution over that profile and the
 * DAW's plugin list.
 */

import type {
  AnalysisMetrics,
  Feedback,
  FeedbackSection,
  GenreProfile,
  PluginCategory,
} from '../types/index.js'
import { DAW_PLUGIN_CATALOG, GENRE_CATALOG, type GenreCatalog } from '../constants/catalogs.js'

export type FeedbackMetrics = Pick<AnalysisMetrics, 'rmsDb' | 'peakDb' | 'isClipped' | 'tempoBpm'>

// Stand-in when the beat tracker gave up
export const ASSUMED_TEMPO_BPM = 120

export function selectGenreProfile(
  tempoBpm: number | null,
  vibe?: string,
  catalog: GenreCatalog = GENRE_CATALOG
): GenreProfile {
  const vibeLower = (vibe ?? '').toLowerCase()

  if (vibeLower) {
    for (const rule of catalog.keywordProfiles) {
      if (rule.keywords.some((keyword) => vibeLower.includes(keyword))) {
        return rule.profile
      }
    }
  }

  const tempo = tempoBpm ?? ASSUMED_TEMPO_BPM
  for (const bucket of catalog.tempoBuckets) {
    if (bucket.aboveBpm === null || tempo > bucket.aboveBpm) {
      return bucket.profile
    }
  }

  // parseGenreCatalog guarantees a catch-all bucket
  return catalog.tempoBuckets[catalog.tempoBuckets.length - 1].profile
}

export function resolveDawName(input: string | undefined, fallback: string): string {
  const trimmed = (input ?? '').trim()
  if (!trimmed) return fallback
  const match = Object.keys(DAW_PLUGIN_CATALOG.daws).find(
    (name) => name.toLowerCase() === trimmed.toLowerCase()
  )
  return match ?? trimmed
}

export function formatPluginList(daw: string, category: PluginCategory): string {
  const suggestions = DAW_PLUGIN_CATALOG.daws[daw]?.[category]
  if (!suggestions || suggestions.length === 0) {
    return `- ${DAW_PLUGIN_CATALOG.defaults[category]}`
  }
  return suggestions.map((plugin) => `- **${plugin.name}**: ${plugin.description}`).join('\n')
}

function bulletList(lines: readonly string[]): string {
  return lines.map((line) => `- ${line}`).join('\n')
}

function overallSection(metrics: FeedbackMetrics, profile: GenreProfile, catalog: GenreCatalog): FeedbackSection {
  const rule = catalog.energyRules[profile.genre] ?? catalog.energyRules.general
  const tempo = metrics.tempoBpm ?? ASSUMED_TEMPO_BPM

  let energy: string
  let marker: string
  if (metrics.rmsDb < rule.lowBelowDb) {
    energy = rule.low
    marker = '❌'
  } else if (metrics.rmsDb < rule.goodBelowDb) {
    energy = rule.good
    marker = '✅'
  } else {
    energy = rule.hot
    marker = '🎵'
  }

  const tempoFit = tempo >= 80 && tempo <= 160 ? 'works well' : 'may need attention'

  return {
    key: 'overall',
    title: `🎵 Overall Assessment - ${profile.genre}`,
    body: [
      `${marker} Your track ${energy} with a ${metrics.isClipped ? 'concerning' : 'good'} dynamic range.`,
      `The ${tempo.toFixed(0)} BPM tempo ${tempoFit} for ${profile.genre.toLowerCase()}.`,
      '',
      '**Genre Characteristics Detected:**',
      ...profile.characteristics.map((characteristic) => `• ${characteristic}`),
    ].join('\n'),
  }
}

function loudnessSection(metrics: FeedbackMetrics, profile: GenreProfile, daw: string): FeedbackSection {
  const target = profile.loudnessTargetDb
  const genre = profile.genre
  const genreLower = genre.toLowerCase()

  if (metrics.rmsDb > target + 3) {
    return {
      key: 'loudness',
      title: `🔊 Loudness Issues - Too Hot for ${genre}`,
      body: [
        `Your track is too loud for ${genreLower} mastering. Target RMS should be around ${target} dB.`,
        `**In ${daw}:**`,
        bulletList([
          'Lower your master fader by 3-5 dB',
          "Check individual track levels - they're likely too hot",
          'Use a limiter with -1 dB ceiling before the master',
          'Consider using a VU meter plugin to monitor levels',
        ]),
      ].join('\n'),
    }
  }

  if (metrics.rmsDb < target - 3) {
    return {
      key: 'loudness',
      title: `🔊 Loudness - Too Quiet for ${genre}`,
      body: [
        `Your track has good headroom but is too quiet for ${genreLower}. Target RMS should be around ${target} dB.`,
        `**In ${daw}:**`,
        bulletList([
          `Consider ${profile.compressionStyle} compression to bring up quiet parts`,
          'Use parallel compression for thickness',
          'Ensure your mix translates well on different systems',
          'You can safely increase overall level by 2-3 dB',
        ]),
      ].join('\n'),
    }
  }

  return {
    key: 'loudness',
    title: `🔊 Loudness - Perfect for ${genre}`,
    body: [
      `Your RMS level is in the sweet spot for ${genreLower} mastering.`,
      `**In ${daw}:**`,
      bulletList([
        'Keep your current levels',
        'Consider subtle compression for consistency',
        "You're ready for the mastering stage",
      ]),
    ].join('\n'),
  }
}

function clippingSection(metrics: FeedbackMetrics, daw: string): FeedbackSection {
  if (metrics.isClipped) {
    return {
      key: 'clipping',
      title: '❌ CRITICAL: Clipping Detected',
      body: [
        'This will destroy your mix quality and cause distortion.',
        `**In ${daw}:**`,
        bulletList([
          'Immediately reduce master fader by 5-8 dB',
          'Check every track for red meters',
          'Use a limiter with -1 dB ceiling',
          'Consider using soft clipping for character instead',
          'Re-export your mix with proper headroom',
        ]),
      ].join('\n'),
    }
  }

  return {
    key: 'clipping',
    title: '✅ No Clipping - Good Headroom Management',
    body: [
      'Your track has proper headroom for mastering.',
      `**In ${daw}:**`,
      bulletList([
        'Maintain your current peak levels',
        'You can safely add effects without worry',
        'Consider using a limiter for consistency',
      ]),
    ].join('\n'),
  }
}

function eqSection(profile: GenreProfile, daw: string, catalog: GenreCatalog): FeedbackSection {
  const advice = catalog.eqAdvice[profile.genre] ?? catalog.eqAdvice.general

  return {
    key: 'eq',
    title: `🎛️ EQ Recommendations for ${daw} - ${profile.genre}`,
    body: [
      "Based on your track's characteristics:",
      '',
      `**${advice.heading}:**`,
      bulletList(advice.lines),
      '',
      `**${daw}-Specific EQ Plugins:**`,
      formatPluginList(daw, 'eq'),
      '',
      '**General EQ Tips:**',
      bulletList([
        'Use the built-in EQ with surgical precision',
        'Consider using a spectrum analyzer',
        'A/B with reference tracks',
        `Focus on ${profile.eqFocus} for ${profile.genre.toLowerCase()}`,
      ]),
    ].join('\n'),
  }
}

function compressionSection(
  metrics: FeedbackMetrics,
  profile: GenreProfile,
  daw: string,
  catalog: GenreCatalog
): FeedbackSection {
  const advice = catalog.compressionAdvice[profile.genre] ?? catalog.compressionAdvice.general
  const adviceBlock = [`**${advice.heading}:**`, bulletList(advice.lines)].join('\n')
  const dynamicRange = metrics.peakDb - metrics.rmsDb

  // NaN (both levels -Infinity) falls through to the balanced branch
  if (dynamicRange > 15) {
    return {
      key: 'compression',
      title: `🎚️ Compression Needed - High Dynamic Range for ${profile.genre}`,
      body: [
        'Your track has large dynamics that need control.',
        '',
        `**In ${daw}:**`,
        adviceBlock,
        '',
        `**${daw}-Specific Compression Plugins:**`,
        formatPluginList(daw, 'compression'),
      ].join('\n'),
    }
  }

  if (dynamicRange < 6) {
    return {
      key: 'compression',
      title: `🎚️ Over-Compression Warning for ${profile.genre}`,
      body: [
        'Your track is very compressed/limited.',
        '',
        `**In ${daw}:**`,
        bulletList([
          'Back off on compression/limiting',
          'Allow more natural dynamics',
          'Consider using expansion for breathing room',
          "Check if you're over-processing",
        ]),
        '',
        `**${daw}-Specific Expansion Plugins:**`,
        formatPluginList(daw, 'expansion'),
      ].join('\n'),
    }
  }

  return {
    key: 'compression',
    title: `🎚️ Compression - Good Balance for ${profile.genre}`,
    body: [
      'Your dynamics are well-controlled.',
      '',
      `**In ${daw}:**`,
      adviceBlock,
      '',
      `**${daw}-Specific Compression Plugins:**`,
      formatPluginList(daw, 'compression'),
    ].join('\n'),
  }
}

function effectsSection(metrics: FeedbackMetrics, daw: string): FeedbackSection {
  const tempo = metrics.tempoBpm ?? ASSUMED_TEMPO_BPM

  return {
    key: 'effects',
    title: `✨ Effects Recommendations for ${daw}`,
    body: [
      '**Reverb:**',
      bulletList([
        'Add subtle reverb to glue elements together',
        'Use different reverb types for different elements',
        'Keep reverb levels low to avoid muddiness',
      ]),
      '',
      '**Delay:**',
      bulletList([
        'Use delay to create space and movement',
        `Sync delays to your ${tempo.toFixed(0)} BPM tempo`,
        'Consider ping-pong delays for width',
      ]),
      '',
      '**Saturation:**',
      bulletList([
        'Add warmth and character with saturation',
        'Use on individual tracks, not the master',
        'Consider tape saturation for vintage feel',
      ]),
      '',
      `**${daw}-Specific Effects Plugins:**`,
      formatPluginList(daw, 'effects'),
      '',
      '**General Effects Tips:**',
      bulletList([
        'Use built-in effects for consistency',
        'Consider third-party plugins for character',
        'A/B with bypass to ensure improvements',
      ]),
    ].join('\n'),
  }
}

function vibeSection(vibe: string, daw: string): FeedbackSection {
  return {
    key: 'vibe',
    title: '🎭 Vibe-Specific Recommendations',
    body: [
      `Based on your "${vibe}" reference:`,
      '',
      '**Mood Matching:**',
      bulletList([
        "Study the reference track's frequency balance",
        'Match the overall energy and dynamics',
        'Pay attention to space and arrangement',
      ]),
      '',
      '**Genre Considerations:**',
      bulletList([
        'Apply genre-appropriate processing',
        'Use reference tracks for comparison',
        'Consider genre-specific mixing techniques',
      ]),
      '',
      `**${daw} Workflow:**`,
      bulletList([
        'Use reference tracks in your DAW',
        'A/B your mix with the reference',
        'Match levels and frequency balance',
      ]),
    ].join('\n'),
  }
}

function masteringSection(daw: string): FeedbackSection {
  return {
    key: 'mastering',
    title: `🎚️ Mastering Preparation for ${daw}`,
    body: [
      '**Export Settings:**',
      bulletList([
        'Leave 1-2 dB headroom for mastering engineer',
        'Export at 24-bit, 44.1kHz or higher',
        'Use WAV format for best quality',
      ]),
      '',
      '**Quality Checks:**',
      bulletList([
        'Ensure mix translates on different speakers',
        'Check mono compatibility',
        'Test on headphones and car speakers',
      ]),
      '',
      '**Reference Tracks:**',
      bulletList([
        'Use professional reference tracks',
        'Match levels and frequency balance',
        'Consider using a reference track plugin',
      ]),
      '',
      `**${daw} Export Tips:**`,
      bulletList([
        'Use the highest quality export settings',
        'Consider using a mastering limiter',
        'Check for any remaining clipping',
      ]),
      '',
      '**Recommended Third-Party Plugins:**',
      formatPluginList(daw, 'thirdParty'),
    ].join('\n'),
  }
}

export function generateFeedback(
  metrics: FeedbackMetrics,
  daw: string,
  vibe?: string,
  catalog: GenreCatalog = GENRE_CATALOG
): Feedback {
  const trimmedVibe = (vibe ?? '').trim()
  const genre = selectGenreProfile(metrics.tempoBpm, trimmedVibe, catalog)

  const sections: FeedbackSection[] = [
    overallSection(metrics, genre, catalog),
    loudnessSection(metrics, genre, daw),
    clippingSection(metrics, daw),
    eqSection(genre, daw, catalog),
    compressionSection(metrics, genre, daw, catalog),
    effectsSection(metrics, daw),
  ]
  if (trimmedVibe) {
    sections.push(vibeSection(trimmedVibe, daw))
  }
  sections.push(masteringSection(daw))

  return { genre, sections }
}
