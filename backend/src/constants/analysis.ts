import { parseNumberEnv } from '../config.js'

// Silence detector framing: 10 ms windows, 50% overlap
export const SILENCE_WINDOW_SECONDS = 0.01
export const DEFAULT_SILENCE_THRESHOLD_DB = parseNumberEnv(process.env.SILENCE_THRESHOLD_DB, -40)
export const DEFAULT_MIN_SILENCE_DURATION = parseNumberEnv(process.env.MIN_SILENCE_DURATION, 0.1)

export const CLIPPING_THRESHOLD_DB = -0.1
export const FLAT_SAMPLE_LEVEL = 0.99
export const FLAT_SAMPLE_RATIO_LIMIT = 0.001

// Tempo estimator framing and search range
export const TEMPO_HOP_SECONDS = 0.01
export const TEMPO_MIN_BPM = 40
export const TEMPO_MAX_BPM = 240
export const TEMPO_PRIOR_BPM = 120
export const TEMPO_PRIOR_OCTAVES = 1
export const ONSET_FLOOR_DB = 0.5

export const SUPPORTED_FORMATS = ['.wav', '.mp3', '.flac', '.aiff', '.aif', '.ogg', '.m4a']

export const SILENCE_PERIODS_SHOWN = 5
