#!/usr/bin/env node
import { runCli } from './interfaces/cli/run.js'
import { createProcessIO } from './interfaces/cli/io.js'

const io = createProcessIO()

runCli({ argv: process.argv.slice(2), defaultWorkspace: process.cwd(), io }).then(
  (code) => {
    process.exitCode = code
  },
  (err: unknown) => {
    io.stderr(`Unexpected error: ${err instanceof Error ? err.stack ?? err.message : String(err)}\n`)
    process.exitCode = 1
  },
)
