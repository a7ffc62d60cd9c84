#!/usr/bin/env node

import { fileURLToPath } from 'node:url'
import { resolve } from 'node:path'

import { formatRunResultAsJson } from '@stepline/core'

import { runSmokePipeline } from './smokePipeline.js'

const writeLine = (line: string): void => {
  process.stdout.write(`${line}\n`)
}

const writeError = (line: string): void => {
  process.stderr.write(`${line}\n`)
}

const runCli = async (): Promise<void> => {
  const argv = new Set(process.argv.slice(2))
  const packageRoot = resolve(fileURLToPath(new URL('.', import.meta.url)), '..')

  // STEPLINE_SMOKE_FAIL reaches the stub through the inherited environment.
  const result = await runSmokePipeline({
    cwd: packageRoot,
    event: argv.has('--pull-request')
      ? { kind: 'pull_request', ref: 'feature/smoke' }
      : { kind: 'push', ref: 'main' },
  })

  if (!result) {
    writeLine('Smoke pipeline was not triggered')
    process.exitCode = 0
    return
  }

  if (argv.has('--json')) {
    writeLine(formatRunResultAsJson(result))
  } else {
    writeLine(`Smoke pipeline finished with exit code ${result.exitCode}`)
    writeLine(
      `Summary: jobs=${result.summary.jobs}, succeeded=${result.summary.succeeded}, failed=${result.summary.failed}, cancelled=${result.summary.cancelled}, skipped=${result.summary.skipped}`
    )
  }

  process.exitCode = result.exitCode
}

void runCli().catch((error: unknown) => {
  const message = error instanceof Error ? `${error.name}: ${error.message}` : String(error)
  writeError(message)
  process.exitCode = 1
})
