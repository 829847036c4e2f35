import { describe, it, expect, beforeEach } from 'vitest'
import request from 'supertest'
import fs from 'fs'
import path from 'path'
import { createApp } from '../src/app.js'
import { TEST_DATA_DIR, clickTrack, silentBuffer, sineWave, writeTestFile, writeTestWav } from './helpers.js'

const UPLOADS_DIR = path.join(TEST_DATA_DIR, 'uploads')

function uploadsLeft(): string[] {
  return fs.existsSync(UPLOADS_DIR) ? fs.readdirSync(UPLOADS_DIR) : []
}

describe('Analysis API', () => {
  let app: ReturnType<typeof createApp>

  beforeEach(() => {
    app = createApp({ dataDir: TEST_DATA_DIR })
  })

  describe('GET /api/health', () => {
    it('reports ok', async () => {
      const res = await request(app).get('/api/health')

      expect(res.status).toBe(200)
      expect(res.body).toEqual({ status: 'ok' })
    })
  })

  describe('CORS', () => {
    it('allows the configured frontend origin', async () => {
      const res = await request(app).get('/api/health').set('Origin', 'http://localhost:3000')

      expect(res.headers['access-control-allow-origin']).toBe('http://localhost:3000')
    })

    it('does not allow other origins', async () => {
      const res = await request(app).get('/api/health').set('Origin', 'http://elsewhere.test')

      expect(res.headers['access-control-allow-origin']).toBeUndefined()
    })
  })

  describe('GET /api/daws', () => {
    it('lists the catalog DAWs and the default', async () => {
      const res = await request(app).get('/api/daws')

      expect(res.status).toBe(200)
      expect(res.body.defaultDaw).toBe('FL Studio')
      expect(res.body.daws).toEqual([
        'FL Studio',
        'Ableton Live',
        'Logic Pro',
        'Pro Tools',
        'Cubase',
        'Reaper',
        'Studio One',
        'Bitwig Studio',
      ])
    })
  })

  describe('POST /api/analyze', () => {
    it('analyzes an uploaded WAV and returns metrics with feedback', async () => {
      const filePath = writeTestWav([clickTrack(0.5, 16)], { name: 'clicks.wav' })

      const res = await request(app)
        .post('/api/analyze')
        .field('daw', 'ableton live')
        .field('vibe', 'deep house')
        .attach('file', filePath)

      expect(res.status).toBe(200)
      expect(res.body.file).toEqual({ name: 'clicks.wav', size: fs.statSync(filePath).size })
      expect(res.body.daw).toBe('Ableton Live')
      expect(res.body.metrics.sampleRate).toBe(44100)
      expect(res.body.metrics.tempoBpm).toBeCloseTo(120, 3)
      expect(res.body.genre.genre).toBe('Electronic/Dance')
      expect(res.body.report[0]).toBe('Analyzing audio file: clicks.wav')
      expect(res.body.feedback.map((section: { key: string }) => section.key)).toEqual([
        'overall', 'loudness', 'clipping', 'eq', 'compression', 'effects', 'vibe', 'mastering',
      ])
      expect(uploadsLeft()).toEqual([])
    })

    it('encodes infinite levels as null', async () => {
      const filePath = writeTestWav([silentBuffer(1)])

      const res = await request(app).post('/api/analyze').attach('file', filePath)

      expect(res.status).toBe(200)
      expect(res.body.daw).toBe('FL Studio')
      expect(res.body.metrics.rmsDb).toBeNull()
      expect(res.body.metrics.peakDb).toBeNull()
      expect(res.body.metrics.dynamicRangeDb).toBeNull()
      expect(res.body.metrics.tempoBpm).toBeNull()
      expect(res.body.metrics.silencePercentage).toBe(100)
    })

    it('applies the silence threshold from the form', async () => {
      // About -49 dBFS RMS
      const filePath = writeTestWav([sineWave(440, 1, 44100, 0.005)])

      const quiet = await request(app).post('/api/analyze').attach('file', filePath)
      const strict = await request(app).post('/api/analyze').field('thresholdDb', '-60').attach('file', filePath)

      expect(quiet.body.metrics.silencePeriods).toHaveLength(1)
      expect(strict.body.metrics.silencePeriods).toEqual([])
    })

    it('returns a downloadable report with format=text', async () => {
      const filePath = writeTestWav([clickTrack(0.5, 16)])

      const res = await request(app).post('/api/analyze?format=text').field('daw', 'Reaper').attach('file', filePath)

      expect(res.status).toBe(200)
      expect(res.headers['content-type']).toBe('text/plain; charset=utf-8')
      expect(res.headers['content-disposition']).toMatch(/^attachment; filename="mixbot_feedback_\d{8}_\d{6}\.txt"$/)
      expect(res.text.split('\n').slice(0, 1)).toEqual(['MIXBOT - Mixing Feedback Report'])
      expect(res.text).toContain('\nDAW: Reaper\n')
      expect(uploadsLeft()).toEqual([])
    })

    it('requires a file', async () => {
      const res = await request(app).post('/api/analyze').field('daw', 'Reaper')

      expect(res.status).toBe(400)
      expect(res.body.error).toBe('No file uploaded. Send the audio as the "file" field.')
    })

    it('rejects unsupported formats', async () => {
      const filePath = writeTestFile('notes.txt', 'not audio')

      const res = await request(app).post('/api/analyze').attach('file', filePath)

      expect(res.status).toBe(400)
      expect(res.body.error).toBe(
        'Unsupported file format: .txt. Supported: .wav, .mp3, .flac, .aiff, .aif, .ogg, .m4a'
      )
      expect(uploadsLeft()).toEqual([])
    })

    it('rejects a non-numeric threshold and still removes the upload', async () => {
      const filePath = writeTestWav([silentBuffer(0.5)])

      const res = await request(app).post('/api/analyze').field('thresholdDb', 'loud').attach('file', filePath)

      expect(res.status).toBe(400)
      expect(res.body.error).toBe('thresholdDb must be a number')
      expect(uploadsLeft()).toEqual([])
    })

    it('answers 422 for files that cannot be decoded and removes the upload', async () => {
      const filePath = writeTestFile('broken.wav', Buffer.from('RIFF\u0000\u0000\u0000\u0000WAVEjunk'))

      const res = await request(app).post('/api/analyze').attach('file', filePath)

      expect(res.status).toBe(422)
      expect(res.body.error).toBe('Error loading audio file: Missing fmt chunk')
      expect(uploadsLeft()).toEqual([])
    })

    it('answers 422 when a compressed format needs the missing decoder', async () => {
      const filePath = writeTestFile('song.mp3', Buffer.from('ID3 placeholder bytes'))

      const res = await request(app).post('/api/analyze').attach('file', filePath)

      expect(res.status).toBe(422)
      expect(res.body.error).toBe(
        'Error loading audio file: /nonexistent/mixbot-ffprobe is not installed; only WAV files can be decoded without it'
      )
      expect(uploadsLeft()).toEqual([])
    })

    it('answers 413 for uploads over the size limit', async () => {
      const smallApp = createApp({ dataDir: TEST_DATA_DIR, maxUploadMb: 0.001 })
      const filePath = writeTestWav([silentBuffer(1)])

      const res = await request(smallApp).post('/api/analyze').attach('file', filePath)

      expect(res.status).toBe(413)
      expect(res.body.error).toBe('File too large. Maximum is 0.001MB.')
    })

    it('answers 413 when the limit is a whole number of bytes', async () => {
      const smallApp = createApp({ dataDir: TEST_DATA_DIR, maxUploadMb: 1 / 1024 })
      const filePath = writeTestWav([silentBuffer(1)])

      const res = await request(smallApp).post('/api/analyze').attach('file', filePath)

      expect(res.status).toBe(413)
      expect(res.body.error).toBe('File too large. Maximum is 0.0009765625MB.')
    })
  })

  describe('POST /api/feedback', () => {
    it('builds feedback from posted metrics', async () => {
      const res = await request(app)
        .post('/api/feedback')
        .send({ metrics: { rmsDb: -14, peakDb: -3, isClipped: false, tempoBpm: 100 }, daw: 'reaper' })

      expect(res.status).toBe(200)
      expect(res.body.daw).toBe('Reaper')
      expect(res.body.genre.genre).toBe('Hip-Hop/Rap')
      expect(res.body.feedback).toHaveLength(7)
      expect(res.body.feedback[0].title).toBe('🎵 Overall Assessment - Hip-Hop/Rap')
    })

    it('reads null levels as digital silence', async () => {
      const res = await request(app)
        .post('/api/feedback')
        .send({ metrics: { rmsDb: null, peakDb: null, isClipped: false, tempoBpm: null }, vibe: 'pop' })

      expect(res.status).toBe(200)
      expect(res.body.genre.genre).toBe('Pop')
      expect(res.body.feedback.map((section: { key: string }) => section.key)).toContain('vibe')
      expect(res.body.feedback[4].title).toBe('🎚️ Compression - Good Balance for Pop')
    })

    it('rejects malformed metrics', async () => {
      const missing = await request(app).post('/api/feedback').send({ daw: 'Reaper' })
      const wrongType = await request(app)
        .post('/api/feedback')
        .send({ metrics: { rmsDb: 'loud', peakDb: -3 } })

      expect(missing.status).toBe(400)
      expect(missing.body.error).toBe('metrics must be an object')
      expect(wrongType.status).toBe(400)
      expect(wrongType.body.error).toBe('metrics.rmsDb must be a number or null')
    })

    it('rejects a body that is not JSON', async () => {
      const res = await request(app)
        .post('/api/feedback')
        .set('Content-Type', 'application/json')
        .send('{"metrics":')

      expect(res.status).toBe(400)
      expect(res.body.error).toBe('Request body is not valid JSON')
    })
  })
})
