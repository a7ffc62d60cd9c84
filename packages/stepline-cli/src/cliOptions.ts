import { resolve } from 'node:path'

import type { TriggerEventKind } from '@stepline/core'

import type { CliOutputFormat } from './config/types.js'

/**
 * Parsed CLI runtime options.
 */
export interface CliOptions {
  /** Absolute working directory for config and execution. */
  readonly cwd: string
  /** Optional explicit config file path. */
  readonly configPath?: string
  /** Kind of the simulated event. */
  readonly event: TriggerEventKind
  /** Branch or ref of the simulated event. */
  readonly ref: string
  /** Selected job ids; every job when empty. */
  readonly jobs: readonly string[]
  /** Prints configured jobs and exits when true. */
  readonly listJobs: boolean
  /** Explicit admission limit. */
  readonly concurrency?: number
  /** Selected output format. */
  readonly format: CliOutputFormat
  /** Indicates whether output format was explicitly set via CLI flag. */
  readonly formatProvided?: true
  /** Emits full output for successful steps when true. */
  readonly verbose: boolean
  /** Enables rerun mode on file changes when true. */
  readonly watch: boolean
  /** Prints usage and exits when true. */
  readonly help: boolean
}

const VALUE_OPTIONS = ['--config', '--event', '--ref', '--job', '--concurrency', '--format', '--cwd'] as const

type ValueOption = (typeof VALUE_OPTIONS)[number]

/**
 * Parses process arguments for the stepline CLI.
 *
 * @param argv Raw argument list excluding node and script path.
 * @param baseCwd Base working directory.
 * @returns Parsed CLI options.
 * @throws Error when an argument is invalid.
 */
export const parseCliOptions = (argv: readonly string[], baseCwd: string): CliOptions => {
  let configPath: string | undefined
  let event: TriggerEventKind = 'push'
  let ref = 'main'
  const jobs: string[] = []
  let listJobs = false
  let concurrency: number | undefined
  let format: CliOutputFormat = 'pretty'
  let formatProvided = false
  let verbose = false
  let watch = false
  let help = false
  let cwd = baseCwd

  const applyValue = (option: ValueOption, value: string): void => {
    switch (option) {
      case '--config':
        configPath = value
        return
      case '--event':
        event = parseEventOption(value)
        return
      case '--ref':
        ref = value
        return
      case '--job':
        jobs.push(value)
        return
      case '--concurrency':
        concurrency = parseConcurrencyOption(value)
        return
      case '--format':
        format = parseFormatOption(value)
        formatProvided = true
        return
      case '--cwd':
        cwd = resolve(baseCwd, value)
        return
    }
  }

  for (let index = 0; index < argv.length; index += 1) {
    const argument = argv[index]
    if (!argument) {
      continue
    }

    if (argument === '--help' || argument === '-h') {
      help = true
      continue
    }

    if (argument === '--verbose') {
      verbose = true
      continue
    }

    if (argument === '--watch') {
      watch = true
      continue
    }

    if (argument === '--list-jobs') {
      listJobs = true
      continue
    }

    const separatorIndex = argument.indexOf('=')
    const optionName = separatorIndex === -1 ? argument : argument.slice(0, separatorIndex)
    const valueOption = VALUE_OPTIONS.find((candidate) => candidate === optionName)

    if (valueOption && separatorIndex !== -1) {
      applyValue(valueOption, argument.slice(separatorIndex + 1))
      continue
    }

    if (valueOption) {
      const nextValue = argv[index + 1]
      if (!nextValue) {
        throw new Error(`${valueOption} requires a value`)
      }
      applyValue(valueOption, nextValue)
      index += 1
      continue
    }

    throw new Error(`Unknown argument: ${argument}`)
  }

  return {
    cwd,
    configPath,
    event,
    ref,
    jobs,
    listJobs,
    concurrency,
    format,
    ...(formatProvided ? { formatProvided: true as const } : {}),
    verbose,
    watch,
    help,
  }
}

const parseEventOption = (value: string): TriggerEventKind => {
  if (value !== 'push' && value !== 'pull_request') {
    throw new Error('--event must be "push" or "pull_request"')
  }

  return value
}

const parseFormatOption = (value: string): CliOutputFormat => {
  if (value !== 'pretty' && value !== 'json') {
    throw new Error('--format must be "pretty" or "json"')
  }

  return value
}

const parseConcurrencyOption = (value: string): number => {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new Error('--concurrency must be a positive integer')
  }

  return parsed
}

/**
 * Returns help text for the stepline CLI.
 *
 * @returns Human-readable usage text.
 */
export const getCliHelpText = (): string => {
  return [
    'Usage: stepline [options]',
    '',
    'Options:',
    '  --config <path>       Config file path (default: stepline.config.ts, stepline.config.json, stepline.yml)',
    '  --event <kind>        Event kind: push | pull_request (default: push)',
    '  --ref <branch>        Branch or ref of the event (default: main)',
    '  --job <id>            Run only this job and the jobs it needs (repeatable)',
    '  --list-jobs           Print configured jobs and exit',
    '  --concurrency <n>     Maximum number of concurrently running jobs',
    '  --format <type>       Output format: pretty | json (default: pretty)',
    '  --verbose             Show stdout/stderr for successful steps',
    '  --watch               Re-run on file changes, cancelling the in-flight run',
    '  --cwd <path>          Base working directory',
    '  -h, --help            Show this help',
  ].join('\n')
}
