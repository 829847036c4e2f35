export interface Waveform {
  /** Mono analysis buffer, nominally in [-1, 1] */
  readonly samples: Float32Array
  readonly sampleRate: number
  /** Channel count of the source before downmixing */
  readonly channelCount: number
}

export interface SilencePeriod {
  start: number
  end: number
}

export interface SilenceOptions {
  thresholdDb?: number
  minSilenceDuration?: number
}

export interface ClippingOptions {
  thresholdDb?: number
  flatLevel?: number
  flatRatioLimit?: number
}

export interface ClippingResult {
  isClipped: boolean
  peakLinear: number
  peakDb: number
  thresholdDb: number
  flatSampleRatio: number
}

export interface TempoEstimate {
  bpm: number
  confidence: number
}

export interface AnalysisOptions {
  silence?: SilenceOptions
  clipping?: ClippingOptions
}

export interface AnalysisMetrics {
  readonly durationSeconds: number
  readonly sampleRate: number
  readonly sampleCount: number
  readonly channelCount: number
  readonly silencePeriods: readonly SilencePeriod[]
  readonly silenceTotalSeconds: number
  readonly silencePercentage: number
  readonly rmsLinear: number
  readonly rmsDb: number
  readonly peakLinear: number
  readonly peakDb: number
  readonly clippingThresholdDb: number
  readonly flatSampleRatio: number
  readonly isClipped: boolean
  readonly tempoBpm: number | null
  readonly tempoConfidence: number | null
  /** Peak minus RMS; null when either level is -Infinity */
  readonly dynamicRangeDb: number | null
  readonly warnings: readonly string[]
}

export interface GenreProfile {
  genre: string
  characteristics: string[]
  loudnessTargetDb: number
  compressionStyle: string
  eqFocus: string
}

export type PluginCategory = 'eq' | 'compression' | 'expansion' | 'effects' | 'thirdParty'

export interface PluginSuggestion {
  name: string
  description: string
}

export type DawPlugins = Partial<Record<PluginCategory, PluginSuggestion[]>>

export interface DawPluginCatalog {
  defaults: Record<PluginCategory, string>
  daws: Record<string, DawPlugins>
}

export type FeedbackSectionKey =
  | 'overall'
  | 'loudness'
  | 'clipping'
  | 'eq'
  | 'compression'
  | 'effects'
  | 'vibe'
  | 'mastering'

export interface FeedbackSection {
  key: FeedbackSectionKey
  title: string
  body: string
}

export interface Feedback {
  genre: GenreProfile
  sections: FeedbackSection[]
}

export interface MixNoteSection {
  title: string
  lines: string[]
}
