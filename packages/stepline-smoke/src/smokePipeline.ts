import { resolve } from 'node:path'

import {
  createNodeCommandExecutor,
  createPipelineRun,
  createPipelineScheduler,
  type PipelineDocument,
  type PipelineJob,
  type PipelineReporter,
  type PipelineStep,
  type RunResult,
  type TriggerEvent,
} from '@stepline/core'

/**
 * Runtime options for the smoke pipeline run.
 */
export interface SmokePipelineRunOptions {
  /** Absolute path to the smoke project root. */
  readonly cwd: string
  /** Event to evaluate, a push to main by default. */
  readonly event?: TriggerEvent
  /** Cargo subcommands the stub fails with exit code 101. */
  readonly failCommands?: readonly string[]
  /** Maximum concurrently running jobs. */
  readonly maxConcurrency?: number
  readonly reporters?: readonly PipelineReporter[]
  /** Cancels the run when aborted. */
  readonly signal?: AbortSignal
}

/**
 * Creates the two-job smoke pipeline. Every command runs the stub cargo
 * script through the current Node.js binary.
 *
 * @param cwd Absolute path to the smoke project root.
 * @returns Pipeline document.
 */
export const createSmokePipeline = (cwd: string): PipelineDocument => {
  const cargo = [process.execPath, resolve(cwd, 'stubs', 'cargo-stub.cjs')]

  const cargoStep = (id: string, name: string, args: readonly string[]): PipelineStep => {
    return { id, name, command: cargo, args }
  }

  const msrvTest: PipelineJob = {
    id: 'test',
    name: 'MSRV Test',
    steps: [
      cargoStep('check-no-features', 'Check (No Features)', ['check', '--no-default-features']),
      cargoStep('check-default-features', 'Check (Default Features)', ['check']),
      cargoStep('check-all-features', 'Check (All Features)', ['check', '--all-features']),
      cargoStep('test', 'Test', ['test', '--all-features']),
    ],
  }

  const codeQuality: PipelineJob = {
    id: 'quality',
    name: 'Code Quality',
    steps: [
      cargoStep('clippy', 'Clippy', ['clippy', '--all-features']),
      cargoStep('doc', 'Check Rustdoc', ['doc', '--all-features', '--no-deps']),
      cargoStep('fmt', 'Check Format', ['fmt', '--check']),
    ],
  }

  return {
    name: 'CI',
    triggers: [{ event: 'pull_request' }, { event: 'push', branches: ['main'] }],
    jobs: [msrvTest, codeQuality],
  }
}

/**
 * Runs the smoke pipeline against the stub cargo script.
 *
 * @param options Runtime options.
 * @returns Run result, or null when the event matches no trigger.
 */
export const runSmokePipeline = async (
  options: SmokePipelineRunOptions
): Promise<RunResult | null> => {
  const event = options.event ?? { kind: 'push', ref: 'main' }
  const run = createPipelineRun(event, createSmokePipeline(options.cwd))
  if (!run) {
    return null
  }

  const scheduler = createPipelineScheduler({
    executor: createNodeCommandExecutor(),
    reporters: options.reporters,
    cwd: options.cwd,
    env: options.failCommands ? { STEPLINE_SMOKE_FAIL: options.failCommands.join(',') } : {},
    maxConcurrency: options.maxConcurrency,
  })

  return await scheduler.schedule(run, options.signal)
}
