#!/usr/bin/env node

import { getCliHelpText, parseCliOptions } from './cliOptions.js'
import { formatErrorMessage, runCliPipeline } from './runPipeline.js'

const run = async (): Promise<void> => {
  const options = parseCliOptions(process.argv.slice(2), process.cwd())

  if (options.help) {
    process.stdout.write(`${getCliHelpText()}\n`)
    process.exitCode = 0
    return
  }

  const interrupt = new AbortController()
  const onSignal = (signal: NodeJS.Signals): void => {
    interrupt.abort(`interrupted by ${signal}`)
  }
  process.on('SIGINT', onSignal)
  process.on('SIGTERM', onSignal)

  try {
    process.exitCode = await runCliPipeline(options, interrupt.signal)
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
  }
}

void run().catch((error: unknown) => {
  process.stderr.write(`${formatErrorMessage(error)}\n`)
  process.exitCode = 1
})
