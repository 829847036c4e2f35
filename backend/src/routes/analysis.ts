import { Router, json, type NextFunction, type Request, type Response } from 'express'
import multer from 'multer'
import path from 'path'
import fs from 'fs/promises'
import { v4 as uuidv4 } from 'uuid'
import { DecodeError, UnsupportedFormatError } from '../errors.js'
import { SUPPORTED_FORMATS } from '../constants/analysis.js'
import { DAW_NAMES } from '../constants/catalogs.js'
import { analyzeAudioFile } from '../services/audioAnalysis.js'
import { generateFeedback, resolveDawName, type FeedbackMetrics } from '../services/feedback.js'
import { feedbackReportFilename, renderFeedbackReport } from '../services/feedbackReport.js'
import { renderAnalysisReport } from '../services/report.js'

export interface AnalysisRouterOptions {
  dataDir: string
  maxUploadMb: number
  defaultDaw: string
}

class RequestValidationError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'RequestValidationError'
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readTextField(body: unknown, name: string): string | undefined {
  if (!isRecord(body)) return undefined
  const value = body[name]
  if (typeof value !== 'string') return undefined
  const trimmed = value.trim()
  return trimmed === '' ? undefined : trimmed
}

function readNumberField(body: unknown, name: string): number | undefined {
  const raw = readTextField(body, name)
  if (raw === undefined) return undefined
  const value = Number(raw)
  if (!Number.isFinite(value)) {
    throw new RequestValidationError(`${name} must be a number`)
  }
  return value
}

// JSON has no -Infinity; null stands in for a silent buffer's level
function readLevel(record: Record<string, unknown>, name: string): number {
  const value = record[name]
  if (value === null) return -Infinity
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new RequestValidationError(`metrics.${name} must be a number or null`)
  }
  return value
}

export function parseFeedbackMetrics(value: unknown): FeedbackMetrics {
  if (!isRecord(value)) throw new RequestValidationError('metrics must be an object')

  const isClipped = value.isClipped ?? false
  if (typeof isClipped !== 'boolean') throw new RequestValidationError('metrics.isClipped must be a boolean')

  const rawTempo = value.tempoBpm ?? null
  let tempoBpm: number | null = null
  if (rawTempo !== null) {
    if (typeof rawTempo !== 'number' || !Number.isFinite(rawTempo) || rawTempo <= 0) {
      throw new RequestValidationError('metrics.tempoBpm must be a positive number or null')
    }
    tempoBpm = rawTempo
  }

  return {
    rmsDb: readLevel(value, 'rmsDb'),
    peakDb: readLevel(value, 'peakDb'),
    isClipped,
    tempoBpm,
  }
}

type AnalyzeReply =
  | { kind: 'json'; status: number; body: unknown }
  | { kind: 'text'; filename: string; text: string }

async function analyzeUpload(
  uploadedFile: Express.Multer.File,
  body: unknown,
  asText: boolean,
  defaultDaw: string
): Promise<AnalyzeReply> {
  const daw = resolveDawName(readTextField(body, 'daw'), defaultDaw)
  const vibe = readTextField(body, 'vibe')
  const thresholdDb = readNumberField(body, 'thresholdDb')
  const minSilenceDuration = readNumberField(body, 'minSilenceDuration')
  if (minSilenceDuration !== undefined && minSilenceDuration < 0) {
    throw new RequestValidationError('minSilenceDuration must not be negative')
  }

  console.log(`[analyze] ${uploadedFile.originalname} (${uploadedFile.size} bytes) for ${daw}`)
  const { metrics } = await analyzeAudioFile(uploadedFile.path, {
    silence: { thresholdDb, minSilenceDuration },
  })
  const feedback = generateFeedback(metrics, daw, vibe)

  if (asText) {
    const generatedAt = new Date()
    return {
      kind: 'text',
      filename: feedbackReportFilename(generatedAt),
      text: renderFeedbackReport(feedback.sections, { daw, vibe, generatedAt }),
    }
  }

  return {
    kind: 'json',
    status: 200,
    body: {
      file: { name: uploadedFile.originalname, size: uploadedFile.size },
      daw,
      metrics,
      genre: feedback.genre,
      report: renderAnalysisReport(uploadedFile.originalname, metrics),
      feedback: feedback.sections,
    },
  }
}

export function createAnalysisRouter(options: AnalysisRouterOptions): Router {
  const router = Router()
  router.use(json())

  const uploadsDir = path.join(options.dataDir, 'uploads')

  const storage = multer.diskStorage({
    destination: (_req, _file, cb) => {
      fs.mkdir(uploadsDir, { recursive: true })
        .then(() => cb(null, uploadsDir))
        .catch((error: Error) => cb(error, uploadsDir))
    },
    filename: (_req, file, cb) => {
      const ext = path.extname(file.originalname).toLowerCase()
      cb(null, `${uuidv4()}${ext}`)
    },
  })

  const fileFilter = (
    _req: Express.Request,
    file: Express.Multer.File,
    cb: multer.FileFilterCallback
  ) => {
    console.log(`[multer] Received field: "${file.fieldname}", filename: "${file.originalname}"`)
    const ext = path.extname(file.originalname).toLowerCase()
    if (SUPPORTED_FORMATS.includes(ext)) {
      cb(null, true)
    } else {
      cb(new UnsupportedFormatError(`Unsupported file format: ${ext || '(none)'}. Supported: ${SUPPORTED_FORMATS.join(', ')}`))
    }
  }

  const upload = multer({
    storage,
    fileFilter,
    limits: {
      // busboy needs a whole byte count
      fileSize: Math.floor(options.maxUploadMb * 1024 * 1024),
      files: 1,
    },
  })

  router.get('/daws', (_req, res) => {
    res.json({ daws: DAW_NAMES, defaultDaw: options.defaultDaw })
  })

  router.post('/analyze', upload.single('file'), async (req: Request, res: Response) => {
    const uploadedFile = req.file
    if (!uploadedFile) {
      res.status(400).json({ error: 'No file uploaded. Send the audio as the "file" field.' })
      return
    }

    // The upload is gone before any reply goes out
    let reply: AnalyzeReply
    try {
      reply = await analyzeUpload(uploadedFile, req.body, req.query.format === 'text', options.defaultDaw)
    } catch (error) {
      if (error instanceof RequestValidationError) {
        reply = { kind: 'json', status: 400, body: { error: error.message } }
      } else if (error instanceof DecodeError) {
        console.warn(`[analyze] Could not decode ${uploadedFile.originalname}: ${error.message}`)
        reply = { kind: 'json', status: 422, body: { error: `Error loading audio file: ${error.message}` } }
      } else {
        console.error('[analyze] Analysis failed:', error)
        reply = { kind: 'json', status: 500, body: { error: 'Failed to analyze file' } }
      }
    } finally {
      await fs.rm(uploadedFile.path, { force: true }).catch((error: unknown) => {
        console.warn(`[analyze] Failed to remove upload ${uploadedFile.path}:`, error)
      })
    }

    if (reply.kind === 'text') {
      res.attachment(reply.filename)
      res.type('text/plain; charset=utf-8')
      res.send(reply.text)
      return
    }
    res.status(reply.status).json(reply.body)
  })

  router.post('/feedback', (req: Request, res: Response) => {
    const body: unknown = req.body
    if (!isRecord(body)) {
      res.status(400).json({ error: 'Expected a JSON body with "metrics"' })
      return
    }

    try {
      const metrics = parseFeedbackMetrics(body.metrics)
      const daw = resolveDawName(readTextField(body, 'daw'), options.defaultDaw)
      const vibe = readTextField(body, 'vibe')
      const feedback = generateFeedback(metrics, daw, vibe)
      res.json({ daw, genre: feedback.genre, feedback: feedback.sections })
    } catch (error) {
      if (error instanceof RequestValidationError) {
        res.status(400).json({ error: error.message })
        return
      }
      throw error
    }
  })

  // Error handling middleware for multer and body parsing
  router.use((err: unknown, _req: Request, res: Response, next: NextFunction): void => {
    if (err instanceof multer.MulterError) {
      console.error('[multer] Upload rejected:', err.message)
      if (err.code === 'LIMIT_FILE_SIZE') {
        res.status(413).json({ error: `File too large. Maximum is ${options.maxUploadMb}MB.` })
        return
      }
      if (err.code === 'LIMIT_UNEXPECTED_FILE') {
        res.status(400).json({ error: 'Unexpected field in request' })
        return
      }
      res.status(400).json({ error: `Upload error: ${err.message}` })
      return
    }
    if (err instanceof UnsupportedFormatError) {
      res.status(400).json({ error: err.message })
      return
    }
    if (err instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON' })
      return
    }
    if (err) {
      console.error('[analyze] Request failed:', err)
      res.status(500).json({ error: 'Request failed' })
      return
    }
    next()
  })

  return router
}
