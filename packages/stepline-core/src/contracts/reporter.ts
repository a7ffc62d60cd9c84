import type { JobResult, PipelineJob } from './job.js'
import type { PipelineRun, RunResult } from './run.js'
import type { PipelineStep, StepResult } from './step.js'

/**
 * Event hooks for run reporting.
 *
 * Jobs run concurrently, so hooks of different jobs interleave. Hooks of one
 * job are always called in step order.
 */
export interface PipelineReporter {
  /**
   * Called once before any job starts.
   *
   * @param run Run about to be scheduled.
   */
  onRunStart?(run: PipelineRun): Promise<void> | void

  /**
   * Called when a job has been admitted and is about to run its first step.
   *
   * @param job Job definition.
   */
  onJobStart?(job: PipelineJob): Promise<void> | void

  /**
   * Called before a single step starts.
   *
   * @param job Owning job.
   * @param step Step definition.
   * @param index Zero-based step index within the job.
   */
  onStepStart?(job: PipelineJob, step: PipelineStep, index: number): Promise<void> | void

  /**
   * Called after a step completes. Not called for skipped steps.
   *
   * @param job Owning job.
   * @param result Step execution result.
   * @param index Zero-based step index within the job.
   */
  onStepComplete?(job: PipelineJob, result: StepResult, index: number): Promise<void> | void

  /**
   * Called once a job has a terminal result, including skipped jobs.
   *
   * @param result Job result.
   */
  onJobComplete?(result: JobResult): Promise<void> | void

  /**
   * Called once after every job has reported.
   *
   * @param result Run result.
   */
  onRunComplete?(result: RunResult): Promise<void> | void
}
