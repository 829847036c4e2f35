#!/usr/bin/env node
/**
 * Usage:
 *   mixbot-analyze <audio_file> [--daw <name>] [--vibe <text>] [--json]
 *   npm run analyze -- <audio_file> [--daw <name>] [--vibe <text>] [--json]
 */

import { runAnalyzeCli } from '../cli.js'

runAnalyzeCli(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code
  })
  .catch((error) => {
    console.error('Analysis failed:', error)
    process.exit(1)
  })
