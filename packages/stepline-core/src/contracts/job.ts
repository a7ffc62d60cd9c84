import type { TriggerEventKind } from './trigger.js'
import type { PipelineStep, StepResult } from './step.js'

/**
 * Terminal status of a job.
 */
export type JobStatus = 'success' | 'failure' | 'cancelled' | 'skipped'

/**
 * Reason attached to a job that did not run any step.
 */
export type JobResultReason = 'dependency_not_successful'

/**
 * Immutable definition of one job.
 */
export interface PipelineJob {
  /** Stable job id, unique within the pipeline. */
  readonly id: string
  /** Display name used in output. */
  readonly name: string
  /** Steps executed strictly in this order. */
  readonly steps: readonly PipelineStep[]
  /** Ids of jobs that must succeed before this job starts. */
  readonly needs?: readonly string[]
  /** Restricts the job to these event kinds when set. */
  readonly events?: readonly TriggerEventKind[]
  /** Default working directory for the job's steps. */
  readonly cwd?: string
  /** Environment additions for every step of the job. */
  readonly env?: Readonly<Record<string, string>>
}

/**
 * Result recorded for one job of a run.
 */
export interface JobResult {
  /** Job identifier copied from the job definition. */
  readonly id: string
  /** Job display name copied from the job definition. */
  readonly name: string
  readonly status: JobStatus
  /** Set when the job was skipped without running. */
  readonly reason?: JobResultReason
  /** One entry per declared step, in declared order. */
  readonly steps: readonly StepResult[]
  readonly startedAt: number
  readonly finishedAt: number
  readonly durationMs: number
}
