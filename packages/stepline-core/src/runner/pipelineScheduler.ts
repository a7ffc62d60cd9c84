import type { JobResult, PipelineJob } from '../contracts/job.js'
import type {
  PipelineRun,
  PipelineSchedulerOptions,
  RunResult,
  RunStatus,
  RunSummary,
} from '../contracts/run.js'
import { JobRunner } from './jobRunner.js'
import { RunRegistry, type RunHandle } from './runRegistry.js'
import { Semaphore } from './semaphore.js'
import { assertSchedulableRun } from './validateRun.js'

/** Default admission limit for concurrently running jobs. */
export const DEFAULT_MAX_CONCURRENCY = 4

/**
 * Concurrent executor for the jobs of a run.
 *
 * Independent jobs start together, bounded by `maxConcurrency`. A failing
 * job never cancels its siblings; cancellation comes only from the caller's
 * signal or the registry.
 */
export class PipelineScheduler {
  private readonly options: Required<Pick<PipelineSchedulerOptions, 'now'>> &
    Omit<PipelineSchedulerOptions, 'now'>
  private readonly registry: RunRegistry
  private readonly limiter: Semaphore
  private readonly jobRunner: JobRunner

  /**
   * Creates a scheduler.
   *
   * @param options Runtime options.
   * @param registry Registry that tracks this scheduler's active runs.
   * @throws PipelineContractError when `maxConcurrency` is not a positive integer.
   */
  public constructor(options: PipelineSchedulerOptions, registry: RunRegistry = new RunRegistry()) {
    this.options = {
      ...options,
      now: options.now ?? Date.now,
    }
    this.registry = registry
    this.limiter = new Semaphore(options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY)
    this.jobRunner = new JobRunner(this.options)
  }

  /** Registry of runs currently executing on this scheduler. */
  public get runs(): RunRegistry {
    return this.registry
  }

  /**
   * Executes every job of a run and aggregates the verdict.
   *
   * @param run Run to execute.
   * @param signal Optional external cancellation signal.
   * @returns Run result.
   * @throws PipelineContractError when the run cannot be scheduled.
   */
  public async schedule(run: PipelineRun, signal?: AbortSignal): Promise<RunResult> {
    assertSchedulableRun(run)

    const handle = this.registry.register(run, signal)
    const runStartedAt = this.options.now()

    try {
      await this.emitRunStart(run)

      const jobsById = new Map(run.jobs.map((job) => [job.id, job]))
      const pendingById = new Map<string, Promise<JobResult>>()

      const startJob = (job: PipelineJob): Promise<JobResult> => {
        const existing = pendingById.get(job.id)
        if (existing) {
          return existing
        }

        const pending = this.runJob(job, handle, (jobId) => {
          const needed = jobsById.get(jobId)
          if (!needed) {
            return Promise.reject(new Error(`Unknown job: ${jobId}`))
          }
          return startJob(needed)
        }).catch((error: unknown) => {
          handle.cancel('internal_error')
          throw error
        })
        pendingById.set(job.id, pending)
        return pending
      }

      const settled = await Promise.allSettled(run.jobs.map(startJob))
      const rejection = settled.find(
        (outcome): outcome is PromiseRejectedResult => outcome.status === 'rejected'
      )
      if (rejection) {
        throw rejection.reason
      }

      const runFinishedAt = this.options.now()
      const jobResults = handle.jobResults()
      const status = aggregateRunStatus(jobResults, handle.signal.aborted)

      const result: RunResult = {
        runId: run.id,
        pipelineName: run.pipelineName,
        event: run.event,
        status,
        jobs: jobResults,
        summary: buildSummary(jobResults, runFinishedAt - runStartedAt),
        exitCode: toExitCode(status),
        ...(status === 'cancelled' && handle.cancelReason
          ? { cancelReason: handle.cancelReason }
          : {}),
        startedAt: runStartedAt,
        finishedAt: runFinishedAt,
      }

      await this.emitRunComplete(result)

      return result
    } finally {
      this.registry.release(run.id)
    }
  }

  private async runJob(
    job: PipelineJob,
    handle: RunHandle,
    resolveNeed: (jobId: string) => Promise<JobResult>
  ): Promise<JobResult> {
    const needed = await Promise.all((job.needs ?? []).map(resolveNeed))
    if (needed.some((result) => result.status !== 'success')) {
      const skipped = await this.jobRunner.skip(job)
      handle.recordJobResult(skipped)
      return skipped
    }

    const release = await this.limiter.acquire()
    try {
      const result = await this.jobRunner.run(job, handle.signal)
      handle.recordJobResult(result)
      return result
    } finally {
      release()
    }
  }

  private async emitRunStart(run: PipelineRun): Promise<void> {
    for (const reporter of this.options.reporters ?? []) {
      await reporter.onRunStart?.(run)
    }
  }

  private async emitRunComplete(result: RunResult): Promise<void> {
    for (const reporter of this.options.reporters ?? []) {
      await reporter.onRunComplete?.(result)
    }
  }
}

/**
 * Creates a pipeline scheduler instance.
 *
 * @param options Runtime options.
 * @param registry Optional shared registry.
 * @returns Pipeline scheduler.
 */
export const createPipelineScheduler = (
  options: PipelineSchedulerOptions,
  registry?: RunRegistry
): PipelineScheduler => {
  return new PipelineScheduler(options, registry)
}

/**
 * Aggregates job results into the run verdict: success iff every job
 * succeeded, otherwise cancelled when the run was cancelled externally,
 * otherwise failure.
 *
 * @param jobResults Recorded job results.
 * @param cancelledExternally Whether the run's signal was aborted.
 * @returns Run status.
 */
export const aggregateRunStatus = (
  jobResults: readonly JobResult[],
  cancelledExternally: boolean
): RunStatus => {
  if (jobResults.every((result) => result.status === 'success')) {
    return 'success'
  }

  return cancelledExternally ? 'cancelled' : 'failure'
}

/**
 * Maps a run status to a process exit code.
 *
 * @param status Run status.
 * @returns 0, 1 or 130.
 */
export const toExitCode = (status: RunStatus): RunResult['exitCode'] => {
  switch (status) {
    case 'success':
      return 0
    case 'failure':
      return 1
    case 'cancelled':
      return 130
  }
}

const buildSummary = (jobResults: readonly JobResult[], durationMs: number): RunSummary => {
  const count = (status: JobResult['status']): number =>
    jobResults.filter((result) => result.status === status).length

  return {
    jobs: jobResults.length,
    succeeded: count('success'),
    failed: count('failure'),
    cancelled: count('cancelled'),
    skipped: count('skipped'),
    durationMs,
  }
}
