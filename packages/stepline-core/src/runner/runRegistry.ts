import type { JobResult } from '../contracts/job.js'
import type { PipelineRun } from '../contracts/run.js'
import { PipelineContractError } from '../errors.js'
import { normalizeRef } from '../trigger/triggerEvaluator.js'

/**
 * Mutable view of one active run. Results are written only through
 * `recordJobResult`.
 */
export interface RunHandle {
  readonly run: PipelineRun
  /** Cancellation token broadcast to every job of the run. */
  readonly signal: AbortSignal
  /** Reason passed to the first `cancel` call. */
  readonly cancelReason: string | undefined
  /**
   * Cancels the run. Later calls keep the first reason.
   *
   * @param reason Human-readable cancellation reason.
   */
  cancel(reason: string): void
  /**
   * Stores the terminal result of one job.
   *
   * @param result Job result.
   * @throws PipelineContractError for unknown or already recorded jobs.
   */
  recordJobResult(result: JobResult): void
  /**
   * Returns recorded results in the run's job declaration order.
   */
  jobResults(): readonly JobResult[]
}

class ActiveRun implements RunHandle {
  public readonly run: PipelineRun
  private readonly controller = new AbortController()
  private readonly results = new Map<string, JobResult>()
  private readonly detachParent: () => void
  private reason: string | undefined

  public constructor(run: PipelineRun, parentSignal?: AbortSignal) {
    this.run = run

    if (!parentSignal) {
      this.detachParent = (): void => undefined
      return
    }

    const onParentAbort = (): void => {
      this.cancel(describeAbortReason(parentSignal.reason))
    }
    parentSignal.addEventListener('abort', onParentAbort, { once: true })
    this.detachParent = (): void => {
      parentSignal.removeEventListener('abort', onParentAbort)
    }

    if (parentSignal.aborted) {
      onParentAbort()
    }
  }

  public get signal(): AbortSignal {
    return this.controller.signal
  }

  public get cancelReason(): string | undefined {
    return this.reason
  }

  public cancel(reason: string): void {
    if (this.controller.signal.aborted) {
      return
    }

    this.reason = reason
    this.controller.abort(reason)
  }

  public recordJobResult(result: JobResult): void {
    if (!this.run.jobs.some((job) => job.id === result.id)) {
      throw new PipelineContractError(`Run ${this.run.id} has no job ${result.id}`)
    }
    if (this.results.has(result.id)) {
      throw new PipelineContractError(`Run ${this.run.id} already recorded job ${result.id}`)
    }

    this.results.set(result.id, result)
  }

  public jobResults(): readonly JobResult[] {
    return this.run.jobs
      .map((job) => this.results.get(job.id))
      .filter((result): result is JobResult => result !== undefined)
  }

  public dispose(): void {
    this.detachParent()
  }
}

/**
 * Registry of active runs for one scheduler. Entries exist from
 * registration until the run reaches a terminal status and is released.
 */
export class RunRegistry {
  private readonly activeById = new Map<string, ActiveRun>()

  /**
   * Registers a run and links it to an optional parent cancellation signal.
   *
   * @param run Run to track.
   * @param parentSignal Cancels the run when aborted.
   * @returns Handle for the run.
   * @throws PipelineContractError when the run id is already active.
   */
  public register(run: PipelineRun, parentSignal?: AbortSignal): RunHandle {
    if (this.activeById.has(run.id)) {
      throw new PipelineContractError(`Run ${run.id} is already active`)
    }

    const entry = new ActiveRun(run, parentSignal)
    this.activeById.set(run.id, entry)
    return entry
  }

  /**
   * Looks up an active run.
   *
   * @param runId Run identifier.
   * @returns Handle, or undefined when the run is not active.
   */
  public get(runId: string): RunHandle | undefined {
    return this.activeById.get(runId)
  }

  /**
   * Lists active runs in registration order.
   *
   * @returns Active runs.
   */
  public activeRuns(): readonly PipelineRun[] {
    return [...this.activeById.values()].map((entry) => entry.run)
  }

  /**
   * Cancels active runs of a pipeline on the same branch, typically because
   * a newer push arrived.
   *
   * @param pipelineName Pipeline name.
   * @param ref Branch name or full ref.
   * @param reason Cancellation reason.
   * @returns Ids of the runs cancelled by this call.
   */
  public supersede(pipelineName: string, ref: string, reason = 'superseded'): readonly string[] {
    const branch = normalizeRef(ref)
    const cancelled: string[] = []

    for (const entry of this.activeById.values()) {
      if (entry.run.pipelineName !== pipelineName || normalizeRef(entry.run.event.ref) !== branch) {
        continue
      }
      if (entry.signal.aborted) {
        continue
      }

      entry.cancel(reason)
      cancelled.push(entry.run.id)
    }

    return cancelled
  }

  /**
   * Cancels every active run.
   *
   * @param reason Cancellation reason.
   */
  public cancelAll(reason: string): void {
    for (const entry of this.activeById.values()) {
      entry.cancel(reason)
    }
  }

  /**
   * Removes a run once it is terminal.
   *
   * @param runId Run identifier.
   */
  public release(runId: string): void {
    const entry = this.activeById.get(runId)
    if (!entry) {
      return
    }

    entry.dispose()
    this.activeById.delete(runId)
  }
}

const describeAbortReason = (reason: unknown): string => {
  if (typeof reason === 'string' && reason.length > 0) {
    return reason
  }
  if (reason instanceof Error && reason.message.length > 0) {
    return reason.message
  }
  return 'cancelled'
}
