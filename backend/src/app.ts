import express from 'express'
import cors from 'cors'
import path from 'path'
import fs from 'fs'

import { createAnalysisRouter } from './routes/analysis.js'
import { parseBooleanEnv, parseListEnv, parseNumberEnv } from './config.js'
import { DEFAULT_DAW } from './constants/catalogs.js'

export interface AppOptions {
  dataDir?: string
  frontendUrl?: string
  maxUploadMb?: number
  defaultDaw?: string
}

export function createApp(options: AppOptions = {}) {
  const app = express()
  const DATA_DIR = options.dataDir || process.env.DATA_DIR || './data'
  const FRONTEND_URL = options.frontendUrl || process.env.FRONTEND_URL || 'http://localhost:3000'
  const MAX_UPLOAD_MB = options.maxUploadMb ?? parseNumberEnv(process.env.MAX_UPLOAD_MB, 200)
  const CORS_ALLOW_NULL_ORIGIN = parseBooleanEnv(process.env.CORS_ALLOW_NULL_ORIGIN, false)
  const CORS_ALLOW_NO_ORIGIN = parseBooleanEnv(process.env.CORS_ALLOW_NO_ORIGIN, false)
  const CORS_ALLOW_ALL_ORIGINS = parseBooleanEnv(process.env.CORS_ALLOW_ALL_ORIGINS, false)
  const allowedOrigins = new Set([FRONTEND_URL, ...parseListEnv(process.env.CORS_EXTRA_ORIGINS)])

  // Ensure data directories exist
  const uploadsDir = path.join(DATA_DIR, 'uploads')
  if (!fs.existsSync(uploadsDir)) {
    fs.mkdirSync(uploadsDir, { recursive: true })
  }

  // Middleware
  app.use(cors({
    origin: (origin, callback) => {
      if (CORS_ALLOW_ALL_ORIGINS) {
        callback(null, true)
        return
      }
      if (!origin) {
        callback(null, CORS_ALLOW_NO_ORIGIN)
        return
      }
      if (origin === 'null') {
        callback(null, CORS_ALLOW_NULL_ORIGIN)
        return
      }
      callback(null, allowedOrigins.has(origin))
    },
    exposedHeaders: ['Content-Disposition'],
  }))

  app.use('/api', createAnalysisRouter({
    dataDir: DATA_DIR,
    maxUploadMb: MAX_UPLOAD_MB,
    defaultDaw: options.defaultDaw || DEFAULT_DAW,
  }))

  // Health check
  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok' })
  })

  return app
}
