import type { PipelineRun } from '../contracts/run.js'
import { PipelineContractError } from '../errors.js'

/**
 * Rejects runs the scheduler cannot execute.
 *
 * @param run Run to validate.
 * @throws PipelineContractError for empty runs, duplicate job ids, unknown
 * `needs` references and dependency cycles.
 */
export const assertSchedulableRun = (run: PipelineRun): void => {
  if (run.jobs.length === 0) {
    throw new PipelineContractError(`Run ${run.id} has no jobs to schedule`)
  }

  const jobIds = new Set<string>()
  for (const job of run.jobs) {
    if (jobIds.has(job.id)) {
      throw new PipelineContractError(`Run ${run.id} contains duplicate job id: ${job.id}`)
    }
    jobIds.add(job.id)
  }

  for (const job of run.jobs) {
    for (const need of job.needs ?? []) {
      if (!jobIds.has(need)) {
        throw new PipelineContractError(`Job ${job.id} needs unknown job: ${need}`)
      }
    }
  }

  const cycle = findDependencyCycle(run)
  if (cycle) {
    throw new PipelineContractError(`Job dependency cycle: ${cycle.join(' -> ')}`)
  }
}

const findDependencyCycle = (run: PipelineRun): readonly string[] | null => {
  const needsById = new Map(run.jobs.map((job) => [job.id, job.needs ?? []]))
  const state = new Map<string, 'visiting' | 'done'>()
  const path: string[] = []

  const visit = (jobId: string): readonly string[] | null => {
    const current = state.get(jobId)
    if (current === 'done') {
      return null
    }
    if (current === 'visiting') {
      return [...path.slice(path.indexOf(jobId)), jobId]
    }

    state.set(jobId, 'visiting')
    path.push(jobId)
    for (const need of needsById.get(jobId) ?? []) {
      const cycle = visit(need)
      if (cycle) {
        return cycle
      }
    }
    path.pop()
    state.set(jobId, 'done')
    return null
  }

  for (const job of run.jobs) {
    const cycle = visit(job.id)
    if (cycle) {
      return cycle
    }
  }

  return null
}
