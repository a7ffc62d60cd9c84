import type { CommandExecutor } from './executor.js'
import type { JobResult, PipelineJob } from './job.js'
import type { PipelineReporter } from './reporter.js'
import type { PipelineStep } from './step.js'
import type { TriggerEvent } from './trigger.js'

/**
 * Terminal status of a run.
 */
export type RunStatus = 'success' | 'failure' | 'cancelled'

/**
 * One execution instance of a pipeline for a specific event.
 */
export interface PipelineRun {
  /** Generated run identifier. */
  readonly id: string
  /** Name of the pipeline document the run belongs to. */
  readonly pipelineName: string
  readonly event: TriggerEvent
  /** Jobs selected for this run, in declaration order. */
  readonly jobs: readonly PipelineJob[]
  /** Run creation timestamp in Unix milliseconds. */
  readonly createdAt: number
}

/**
 * Summary counts for one run.
 */
export interface RunSummary {
  /** Total number of jobs in the run. */
  readonly jobs: number
  readonly succeeded: number
  readonly failed: number
  readonly cancelled: number
  readonly skipped: number
  /** Total run duration in milliseconds. */
  readonly durationMs: number
}

/**
 * Final run data handed to reporters and callers.
 */
export interface RunResult {
  readonly runId: string
  readonly pipelineName: string
  readonly event: TriggerEvent
  readonly status: RunStatus
  /** Job results in the run's job declaration order. */
  readonly jobs: readonly JobResult[]
  readonly summary: RunSummary
  /** Process-style exit code: 0 success, 1 failure, 130 cancelled. */
  readonly exitCode: 0 | 1 | 130
  /** Cancellation reason when the run was cancelled externally. */
  readonly cancelReason?: string
  readonly startedAt: number
  readonly finishedAt: number
}

/**
 * Context handed to the environment provider for each step.
 */
export interface StepEnvironmentContext {
  readonly job: PipelineJob
  readonly step: PipelineStep
}

/**
 * External supplier of per-step environment values such as secrets.
 */
export type StepEnvironmentProvider = (
  context: StepEnvironmentContext
) => Readonly<Record<string, string>> | Promise<Readonly<Record<string, string>>>

/**
 * Runtime options used by the job runner.
 */
export interface JobRunnerOptions {
  /** Command executor implementation. */
  readonly executor: CommandExecutor
  /** Optional reporters for lifecycle hooks. */
  readonly reporters?: readonly PipelineReporter[]
  /** Default working directory when neither step nor job provide one. */
  readonly cwd?: string
  /** Base environment merged into each step execution. */
  readonly env?: NodeJS.ProcessEnv
  /** Per-step environment values merged over the base environment. */
  readonly environmentProvider?: StepEnvironmentProvider
  /** Timeout applied to steps that do not declare their own. */
  readonly defaultStepTimeoutMs?: number
  /** Maximum captured bytes per output stream. */
  readonly maxOutputBytes?: number
  /** Delay between SIGTERM and SIGKILL when a step is terminated. */
  readonly killGraceMs?: number
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Runtime options used by the pipeline scheduler.
 */
export interface PipelineSchedulerOptions extends JobRunnerOptions {
  /** Maximum number of jobs running at the same time. */
  readonly maxConcurrency?: number
}
