import type { JobResult, JobStatus, PipelineJob } from '../contracts/job.js'
import type { JobRunnerOptions } from '../contracts/run.js'
import type { PipelineStep, StepResult, StepResultReason } from '../contracts/step.js'
import { executeStep } from '../execution/stepExecutor.js'

type SkipReason = Extract<StepResultReason, 'previous_step_failed' | 'job_cancelled' | 'job_skipped'>

/**
 * Sequential, fail-fast executor for the steps of one job.
 */
export class JobRunner {
  private readonly options: Required<Pick<JobRunnerOptions, 'now'>> &
    Omit<JobRunnerOptions, 'now'>

  /**
   * Creates a job runner.
   *
   * @param options Runtime options.
   */
  public constructor(options: JobRunnerOptions) {
    this.options = {
      ...options,
      now: options.now ?? Date.now,
    }
  }

  /**
   * Executes the job's steps in order. The first step that does not succeed
   * stops the job; the remaining steps are recorded as skipped. Once the
   * signal is aborted no further step starts.
   *
   * @param job Job definition.
   * @param signal Cancellation token of the enclosing run.
   * @returns Job result with one entry per declared step.
   */
  public async run(job: PipelineJob, signal?: AbortSignal): Promise<JobResult> {
    const jobStartedAt = this.options.now()
    const stepResults: StepResult[] = []
    let status: JobStatus = signal?.aborted ? 'cancelled' : 'success'
    let skipReason: SkipReason | null = signal?.aborted ? 'job_cancelled' : null

    await this.emitJobStart(job)

    for (const [index, step] of job.steps.entries()) {
      if (skipReason === null && signal?.aborted) {
        status = 'cancelled'
        skipReason = 'job_cancelled'
      }

      if (skipReason !== null) {
        stepResults.push(this.buildSkippedResult(step, skipReason))
        continue
      }

      await this.emitStepStart(job, step, index)

      const stepResult = await executeStep(this.options.executor, step, {
        cwd: job.cwd ?? this.options.cwd ?? process.cwd(),
        env: await this.resolveEnvironment(job, step),
        signal,
        defaultTimeoutMs: this.options.defaultStepTimeoutMs,
        maxOutputBytes: this.options.maxOutputBytes,
        killGraceMs: this.options.killGraceMs,
        now: this.options.now,
      })
      stepResults.push(stepResult)

      await this.emitStepComplete(job, stepResult, index)

      if (stepResult.status === 'cancelled') {
        status = 'cancelled'
        skipReason = stepResult.reason === 'timeout' ? 'previous_step_failed' : 'job_cancelled'
      } else if (stepResult.status !== 'success') {
        status = 'failure'
        skipReason = 'previous_step_failed'
      }
    }

    const jobFinishedAt = this.options.now()
    const result: JobResult = {
      id: job.id,
      name: job.name,
      status,
      steps: stepResults,
      startedAt: jobStartedAt,
      finishedAt: jobFinishedAt,
      durationMs: jobFinishedAt - jobStartedAt,
    }

    await this.emitJobComplete(result)

    return result
  }

  /**
   * Builds the result of a job that never ran because a dependency did not
   * succeed. Emits `onJobComplete` for it.
   *
   * @param job Job definition.
   * @returns Skipped job result.
   */
  public async skip(job: PipelineJob): Promise<JobResult> {
    const timestamp = this.options.now()
    const result: JobResult = {
      id: job.id,
      name: job.name,
      status: 'skipped',
      reason: 'dependency_not_successful',
      steps: job.steps.map((step) => this.buildSkippedResult(step, 'job_skipped')),
      startedAt: timestamp,
      finishedAt: timestamp,
      durationMs: 0,
    }

    await this.emitJobComplete(result)

    return result
  }

  private async resolveEnvironment(
    job: PipelineJob,
    step: PipelineStep
  ): Promise<NodeJS.ProcessEnv> {
    const provided = (await this.options.environmentProvider?.({ job, step })) ?? {}

    return { ...this.options.env, ...provided, ...job.env }
  }

  private buildSkippedResult(step: PipelineStep, reason: SkipReason): StepResult {
    const timestamp = this.options.now()

    return {
      id: step.id,
      name: step.name,
      status: 'skipped',
      reason,
      startedAt: timestamp,
      finishedAt: timestamp,
      durationMs: 0,
      output: {
        exitCode: null,
        signal: null,
        stdout: '',
        stderr: '',
        truncated: false,
      },
    }
  }

  private async emitJobStart(job: PipelineJob): Promise<void> {
    for (const reporter of this.options.reporters ?? []) {
      await reporter.onJobStart?.(job)
    }
  }

  private async emitStepStart(job: PipelineJob, step: PipelineStep, index: number): Promise<void> {
    for (const reporter of this.options.reporters ?? []) {
      await reporter.onStepStart?.(job, step, index)
    }
  }

  private async emitStepComplete(
    job: PipelineJob,
    result: StepResult,
    index: number
  ): Promise<void> {
    for (const reporter of this.options.reporters ?? []) {
      await reporter.onStepComplete?.(job, result, index)
    }
  }

  private async emitJobComplete(result: JobResult): Promise<void> {
    for (const reporter of this.options.reporters ?? []) {
      await reporter.onJobComplete?.(result)
    }
  }
}

/**
 * Creates a job runner instance.
 *
 * @param options Runtime options.
 * @returns Job runner.
 */
export const createJobRunner = (options: JobRunnerOptions): JobRunner => {
  return new JobRunner(options)
}
