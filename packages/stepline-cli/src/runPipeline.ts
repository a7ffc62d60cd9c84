import { watch } from 'node:fs'
import { relative } from 'node:path'

import {
  createNodeCommandExecutor,
  createPipelineRun,
  createPipelineScheduler,
  formatRunResultAsJson,
  RunRegistry,
  shouldRun,
  type PipelineDocument,
  type PipelineScheduler,
  type TriggerEvent,
  type TriggerEventKind,
} from '@stepline/core'

import { loadStepLineConfig } from './config/loadConfig.js'
import { mapConfigToPipeline, type MappedPipeline } from './config/mapConfigToPipeline.js'
import type { CliConfigJob, CliOutputFormat } from './config/types.js'
import { PrettyReporter } from './reporters/prettyReporter.js'
import { createWatchIgnoreMatcher, normalizeWatchPath } from './watch/watchIgnoreMatcher.js'

/** Exit code of a run cancelled by SIGINT or SIGTERM. */
export const INTERRUPTED_EXIT_CODE = 130

const WATCH_DEBOUNCE_MS = 250

/**
 * Runtime options for a CLI execution.
 */
export interface RunCliPipelineOptions {
  /** Base working directory. */
  readonly cwd: string
  /** Optional explicit config path. */
  readonly configPath?: string
  /** Kind of the simulated event. */
  readonly event: TriggerEventKind
  /** Branch or ref of the simulated event. */
  readonly ref: string
  /** Selected job ids; every job when empty. */
  readonly jobs: readonly string[]
  /** Prints configured jobs and exits when true. */
  readonly listJobs: boolean
  /** Explicit admission limit, wins over config. */
  readonly concurrency?: number
  /** Output format selection. */
  readonly format: CliOutputFormat
  /** Set when the format came from a CLI flag and wins over config. */
  readonly formatProvided?: true
  /** Verbose output mode. */
  readonly verbose: boolean
  /** Enables watch mode. */
  readonly watch: boolean
}

interface WatchController {
  readonly supported: boolean
  close: () => void
  onError: (listener: (error: Error) => void) => void
}

/**
 * Executes the pipeline according to CLI options.
 *
 * @param options CLI runtime options.
 * @param signal Interrupt signal; aborting it cancels the current run.
 * @returns Final exit code.
 */
export const runCliPipeline = async (
  options: RunCliPipelineOptions,
  signal?: AbortSignal
): Promise<number> => {
  const loadedConfig = await loadStepLineConfig(options.cwd, options.configPath)
  const { config } = loadedConfig

  const effectiveFormat = options.formatProvided
    ? options.format
    : (config.output?.format ?? options.format)
  const effectiveVerbose = options.verbose || config.output?.verbose === true

  if (options.listJobs) {
    printConfiguredJobs(config.jobs, effectiveFormat)
    return 0
  }

  const pipeline = mapConfigToPipeline(config, options.cwd, options.jobs)
  const event: TriggerEvent = { kind: options.event, ref: options.ref }
  const registry = new RunRegistry()
  const scheduler = createCliScheduler(pipeline, event, registry, {
    format: effectiveFormat,
    verbose: effectiveVerbose,
    concurrency: options.concurrency,
  })

  const execute = async (): Promise<number> => {
    if (signal?.aborted) {
      return INTERRUPTED_EXIT_CODE
    }

    const run = createPipelineRun(event, pipeline.document)
    if (!run) {
      printNothingToRun(pipeline.document, event, effectiveFormat)
      return 0
    }

    const result = await scheduler.schedule(run, signal)
    if (effectiveFormat === 'json') {
      process.stdout.write(`${formatRunResultAsJson(result)}\n`)
    }
    return result.exitCode
  }

  if (!options.watch) {
    return await execute()
  }

  return await runWatchLoop({
    cwd: options.cwd,
    configFilePath: loadedConfig.configFilePath,
    watchExcludes: config.watch?.exclude,
    supersede: (): void => {
      registry.supersede(pipeline.document.name, event.ref, 'superseded by a file change')
    },
    execute,
    signal,
  })
}

const createCliScheduler = (
  pipeline: MappedPipeline,
  event: TriggerEvent,
  registry: RunRegistry,
  output: {
    readonly format: CliOutputFormat
    readonly verbose: boolean
    readonly concurrency?: number
  }
): PipelineScheduler => {
  return createPipelineScheduler(
    {
      executor: createNodeCommandExecutor(),
      reporters: output.format === 'pretty' ? [new PrettyReporter({ verbose: output.verbose })] : [],
      cwd: pipeline.cwd,
      env: {
        ...pipeline.env,
        STEPLINE_EVENT: event.kind,
        STEPLINE_REF: event.ref,
      },
      environmentProvider: ({ job, step }) => ({
        STEPLINE_JOB_ID: job.id,
        STEPLINE_STEP_ID: step.id,
      }),
      maxConcurrency: output.concurrency ?? pipeline.maxConcurrency,
      defaultStepTimeoutMs: pipeline.limits.stepTimeoutMs,
      maxOutputBytes: pipeline.limits.maxOutputBytes,
      killGraceMs: pipeline.limits.killGraceMs,
    },
    registry
  )
}

const printNothingToRun = (
  document: PipelineDocument,
  event: TriggerEvent,
  format: CliOutputFormat
): void => {
  const triggered = shouldRun(event, document.triggers)

  if (format === 'json') {
    const payload = {
      dispatched: false,
      pipeline: document.name,
      event,
      ...(triggered ? { reason: 'no_jobs_selected' } : {}),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  process.stdout.write(
    triggered
      ? `No job selected for ${event.kind} ${event.ref}; nothing to run.\n`
      : `No trigger matched ${event.kind} ${event.ref}; nothing to run.\n`
  )
}

const printConfiguredJobs = (jobs: readonly CliConfigJob[], format: CliOutputFormat): void => {
  if (format === 'json') {
    const payload = {
      jobs: jobs.map((job) => ({
        id: job.id,
        name: job.name,
        needs: job.needs ?? [],
        steps: job.steps.map((step) => step.id),
      })),
    }
    process.stdout.write(`${JSON.stringify(payload)}\n`)
    return
  }

  process.stdout.write('Configured jobs:\n')
  for (const job of jobs) {
    const suffix = job.needs && job.needs.length > 0 ? ` (needs: ${job.needs.join(', ')})` : ''
    process.stdout.write(`- ${job.id}: ${job.name}${suffix}\n`)
  }
}

interface WatchLoopOptions {
  readonly cwd: string
  readonly configFilePath: string
  readonly watchExcludes: readonly string[] | undefined
  /** Cancels the in-flight run of this pipeline and branch. */
  readonly supersede: () => void
  readonly execute: () => Promise<number>
  readonly signal: AbortSignal | undefined
}

const runWatchLoop = async (options: WatchLoopOptions): Promise<number> => {
  const initialExitCode = await options.execute()
  if (options.signal?.aborted) {
    return INTERRUPTED_EXIT_CODE
  }

  process.stdout.write('Watch mode enabled. Waiting for file changes...\n')

  let lastExitCode = initialExitCode
  let rerunQueued = false
  let queue: Promise<void> = Promise.resolve()
  let debounceHandle: NodeJS.Timeout | null = null
  const shouldIgnorePath = createWatchIgnoreMatcher(options.watchExcludes)

  // The in-flight run is cancelled right away; the fresh run starts once it
  // has settled so two runs never share the working tree.
  const rerun = (): void => {
    options.supersede()
    if (rerunQueued) {
      return
    }

    rerunQueued = true
    queue = queue
      .then(async () => {
        rerunQueued = false
        lastExitCode = await options.execute()
      })
      .catch((error: unknown) => {
        lastExitCode = 1
        process.stderr.write(`${formatErrorMessage(error)}\n`)
      })
  }

  const watcher = createWatcher(options.cwd, options.configFilePath, shouldIgnorePath, () => {
    if (debounceHandle) {
      clearTimeout(debounceHandle)
    }

    debounceHandle = setTimeout(rerun, WATCH_DEBOUNCE_MS)
  })
  if (!watcher.supported) {
    return initialExitCode
  }

  const stoppedBySignal = await new Promise<boolean>((resolve) => {
    let finished = false

    const stop = (interrupted: boolean): void => {
      if (finished) {
        return
      }
      finished = true

      options.signal?.removeEventListener('abort', onAbort)
      watcher.close()
      if (debounceHandle) {
        clearTimeout(debounceHandle)
      }
      resolve(interrupted)
    }

    const onAbort = (): void => {
      stop(true)
    }

    watcher.onError((watchError: Error) => {
      process.stderr.write(`Watch mode stopped (${formatWatchErrorMessage(watchError)}).\n`)
      stop(false)
    })

    options.signal?.addEventListener('abort', onAbort, { once: true })
    if (options.signal?.aborted) {
      stop(true)
    }
  })

  await queue
  return stoppedBySignal ? INTERRUPTED_EXIT_CODE : lastExitCode
}

const createWatcher = (
  cwd: string,
  configFilePath: string,
  shouldIgnorePath: (filePath: string) => boolean,
  onRelevantChange: () => void
): WatchController => {
  try {
    const watcher = watch(cwd, { recursive: true }, (_, fileName) => {
      if (!fileName) {
        return
      }

      const relativePath = fileName.toString()
      if (shouldIgnorePath(relativePath)) {
        return
      }

      const normalizedConfigPath = normalizeWatchPath(relative(cwd, configFilePath))
      const normalizedRelativePath = normalizeWatchPath(relativePath)
      const messagePath =
        normalizedRelativePath === normalizedConfigPath ? `${relativePath} (config)` : relativePath
      process.stdout.write(`\nChange detected: ${messagePath}\n`)
      onRelevantChange()
    })

    return {
      close: (): void => watcher.close(),
      supported: true,
      onError: (listener: (error: Error) => void): void => {
        watcher.on('error', listener)
      },
    }
  } catch {
    process.stdout.write(
      'Watch mode is not supported recursively on this platform. Running once without watch.\n'
    )

    return {
      close: (): void => undefined,
      supported: false,
      onError: (): void => undefined,
    }
  }
}

const formatWatchErrorMessage = (error: Error): string => {
  return 'code' in error && typeof error.code === 'string'
    ? `${error.code}: ${error.message}`
    : error.message
}

/**
 * Formats an error for stderr as `<name>: <message>`.
 *
 * @param error Thrown value.
 * @returns Single-line description.
 */
export const formatErrorMessage = (error: unknown): string => {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error)
}
