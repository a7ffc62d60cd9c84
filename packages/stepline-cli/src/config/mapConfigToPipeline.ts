import { resolve } from 'node:path'

import type { PipelineDocument, PipelineJob, PipelineStep, TriggerRule } from '@stepline/core'

import type { CliConfigJob, CliConfigStep, StepLineConfig, StepLineLimitsConfig } from './types.js'

/**
 * Runtime inputs derived from a loaded config.
 */
export interface MappedPipeline {
  /** Pipeline document handed to the trigger evaluator. */
  readonly document: PipelineDocument
  /** Base working directory for step execution. */
  readonly cwd: string
  /** Base environment for step execution. */
  readonly env: Readonly<Record<string, string>>
  /** Config admission limit, when set. */
  readonly maxConcurrency?: number
  /** Execution limits. */
  readonly limits: StepLineLimitsConfig
}

/**
 * Maps loaded config to the core pipeline document.
 *
 * @param config Parsed CLI config.
 * @param cwd Base working directory.
 * @param selectedJobIds Jobs to keep, together with the jobs they need. Every job when empty.
 * @returns Pipeline document and execution settings.
 * @throws Error when a selected job id is not configured.
 */
export const mapConfigToPipeline = (
  config: StepLineConfig,
  cwd: string,
  selectedJobIds: readonly string[] = []
): MappedPipeline => {
  const runCwd = config.cwd ? resolve(cwd, config.cwd) : cwd
  const jobs = selectConfigJobs(config.jobs, selectedJobIds)

  return {
    document: {
      name: config.name,
      triggers: mapTriggers(config.on),
      jobs: jobs.map((job) => mapJob(job, runCwd)),
    },
    cwd: runCwd,
    env: { ...config.env },
    maxConcurrency: config.concurrency,
    limits: { ...config.limits },
  }
}

/**
 * Keeps the selected jobs plus everything they transitively need, in
 * declaration order.
 *
 * @param jobs Configured jobs.
 * @param selectedJobIds Requested job ids.
 * @returns Selected jobs.
 */
export const selectConfigJobs = (
  jobs: readonly CliConfigJob[],
  selectedJobIds: readonly string[]
): readonly CliConfigJob[] => {
  if (selectedJobIds.length === 0) {
    return jobs
  }

  const jobsById = new Map(jobs.map((job) => [job.id, job]))
  const keep = new Set<string>()
  const pending = [...selectedJobIds]

  while (pending.length > 0) {
    const jobId = pending.pop()
    if (jobId === undefined || keep.has(jobId)) {
      continue
    }

    const job = jobsById.get(jobId)
    if (!job) {
      const available = jobs.map((entry) => entry.id).join(', ')
      throw new Error(`Unknown job: ${jobId} (available: ${available})`)
    }

    keep.add(jobId)
    pending.push(...(job.needs ?? []))
  }

  return jobs.filter((job) => keep.has(job.id))
}

const mapTriggers = (on: StepLineConfig['on']): readonly TriggerRule[] => {
  const rules: TriggerRule[] = []

  for (const event of ['push', 'pull_request'] as const) {
    const filter = on[event]
    if (!filter) {
      continue
    }

    rules.push({
      event,
      branches: filter.branches,
      branchesIgnore: filter.branchesIgnore,
    })
  }

  return rules
}

const mapJob = (job: CliConfigJob, runCwd: string): PipelineJob => {
  const jobCwd = job.cwd ? resolve(runCwd, job.cwd) : undefined

  return {
    id: job.id,
    name: job.name,
    needs: job.needs,
    events: job.events,
    cwd: jobCwd,
    env: job.env,
    steps: job.steps.map((step) => mapStep(step, jobCwd ?? runCwd)),
  }
}

const mapStep = (step: CliConfigStep, baseCwd: string): PipelineStep => {
  return {
    id: step.id,
    name: step.name,
    command: step.command,
    args: step.args,
    cwd: step.cwd ? resolve(baseCwd, step.cwd) : undefined,
    env: step.env,
    timeoutMs: step.timeoutMs,
  }
}
