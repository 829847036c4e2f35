import { describe, it, expect } from 'vitest'
import { runAnalyzeCli, parseAnalyzeArgs, USAGE } from '../src/cli.js'
import { TEST_DATA_DIR, clickTrack, silentBuffer, writeTestFile, writeTestWav } from './helpers.js'

function captureIO() {
  const logs: string[] = []
  const errors: string[] = []
  return {
    logs,
    errors,
    io: {
      log: (message: string) => {
        logs.push(message)
      },
      error: (message: string) => {
        errors.push(message)
      },
    },
  }
}

describe('parseAnalyzeArgs', () => {
  it('reads the file and every option', () => {
    expect(parseAnalyzeArgs([
      'mix.wav', '--daw', 'Cubase', '--vibe', 'indie rock', '--threshold-db', '-50', '--min-silence', '0.25', '--json',
    ])).toEqual({
      file: 'mix.wav',
      daw: 'Cubase',
      vibe: 'indie rock',
      thresholdDb: -50,
      minSilenceDuration: 0.25,
      json: true,
      help: false,
    })
  })

  it('rejects unknown options and stray arguments', () => {
    expect(() => parseAnalyzeArgs(['a.wav', '--loud'])).toThrow('Unknown option: --loud')
    expect(() => parseAnalyzeArgs(['a.wav', 'b.wav'])).toThrow('Unexpected argument: b.wav')
    expect(() => parseAnalyzeArgs(['a.wav', '--daw'])).toThrow('--daw needs a value')
  })
})

describe('mixbot-analyze', () => {
  it('prints usage with --help', async () => {
    const { io, logs } = captureIO()

    expect(await runAnalyzeCli(['--help'], io)).toBe(0)
    expect(logs).toEqual([USAGE])
  })

  it('exits 1 without a file argument', async () => {
    const { io, errors } = captureIO()

    expect(await runAnalyzeCli([], io)).toBe(1)
    expect(errors).toEqual([USAGE])
  })

  it('exits 1 on bad arguments', async () => {
    const { io, errors } = captureIO()

    expect(await runAnalyzeCli(['a.wav', '--threshold-db', 'abc'], io)).toBe(1)
    expect(errors[0]).toBe('Error: --threshold-db expects a number, got "abc"')
  })

  it('exits 1 when the file does not exist', async () => {
    const { io, errors } = captureIO()
    const missing = `${TEST_DATA_DIR}/fixtures/missing.wav`

    expect(await runAnalyzeCli([missing], io)).toBe(1)
    expect(errors).toEqual([`Error: File '${missing}' not found.`])
  })

  it('exits 1 when the file cannot be decoded', async () => {
    const { io, errors } = captureIO()
    const filePath = writeTestFile('cli-broken.wav', Buffer.from('RIFF\u0000\u0000\u0000\u0000WAVEjunk'))

    expect(await runAnalyzeCli([filePath], io)).toBe(1)
    expect(errors).toEqual(['Error loading audio file: Missing fmt chunk'])
  })

  it('prints the report and mix notes', async () => {
    const { io, logs, errors } = captureIO()
    const filePath = writeTestWav([clickTrack(0.5, 16)])

    expect(await runAnalyzeCli([filePath], io)).toBe(0)
    expect(errors).toEqual([])
    expect(logs[0]).toBe(`Analyzing audio file: ${filePath}`)
    expect(logs).toContain('Tempo: 120.0 BPM (confidence: 0.94)')
    expect(logs).toContain('🎵 MIXING & MASTERING FEEDBACK')
    expect(logs.at(-1)).toBe('   The best mix is the one that serves the song.')
    expect(logs.some((line) => line.startsWith('MIXBOT - Mixing Feedback Report'))).toBe(false)
  })

  it('appends DAW feedback when a DAW is named', async () => {
    const { io, logs } = captureIO()
    const filePath = writeTestWav([clickTrack(0.5, 16)])

    expect(await runAnalyzeCli([filePath, '--daw', 'logic pro'], io)).toBe(0)

    const report = logs.at(-1) ?? ''
    expect(report.startsWith('MIXBOT - Mixing Feedback Report\n')).toBe(true)
    expect(report).toContain('\nDAW: Logic Pro\n')
    expect(report).toContain('\nVibe/Reference: Not specified\n')
  })

  it('prints JSON with --json', async () => {
    const { io, logs } = captureIO()
    const filePath = writeTestWav([silentBuffer(1)])

    expect(await runAnalyzeCli([filePath, '--json', '--vibe', 'techno', '--min-silence', '2'], io)).toBe(0)
    expect(logs).toHaveLength(1)

    const output = JSON.parse(logs[0])
    expect(output.file).toBe(filePath)
    expect(output.metrics.rmsDb).toBeNull()
    // The whole clip is one second, shorter than --min-silence
    expect(output.metrics.silencePeriods).toEqual([])
    expect(output.daw).toBe('FL Studio')
    expect(output.genre.genre).toBe('Electronic/Dance')
  })
})
