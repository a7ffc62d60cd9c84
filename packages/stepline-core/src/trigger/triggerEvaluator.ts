import { randomUUID } from 'node:crypto'

import type { PipelineJob } from '../contracts/job.js'
import type { PipelineRun } from '../contracts/run.js'
import type { PipelineDocument, TriggerEvent, TriggerRule } from '../contracts/trigger.js'
import { assertSchedulableRun } from '../runner/validateRun.js'
import { compileBranchPattern } from './globPattern.js'

const BRANCH_REF_PREFIX = 'refs/heads/'

/**
 * Strips the `refs/heads/` prefix from a branch ref.
 *
 * @param ref Branch name or full ref.
 * @returns Short branch name.
 */
export const normalizeRef = (ref: string): string => {
  return ref.startsWith(BRANCH_REF_PREFIX) ? ref.slice(BRANCH_REF_PREFIX.length) : ref
}

/**
 * Checks one rule against an event.
 *
 * @param event Incoming event.
 * @param rule Trigger rule.
 * @returns True when kind and branch filters match.
 */
export const matchesTriggerRule = (event: TriggerEvent, rule: TriggerRule): boolean => {
  if (rule.event !== event.kind) {
    return false
  }

  const branch = normalizeRef(event.ref)

  if (rule.branches && !rule.branches.some((pattern) => compileBranchPattern(pattern)(branch))) {
    return false
  }

  if (rule.branchesIgnore?.some((pattern) => compileBranchPattern(pattern)(branch))) {
    return false
  }

  return true
}

/**
 * Decides whether an event dispatches a run. Matching is existence-only:
 * several matching rules still mean one run.
 *
 * @param event Incoming event.
 * @param rules Pipeline trigger rules.
 * @returns True when at least one rule matches.
 */
export const shouldRun = (event: TriggerEvent, rules: readonly TriggerRule[]): boolean => {
  return rules.some((rule) => matchesTriggerRule(event, rule))
}

/**
 * Selects the jobs an event runs. Jobs restricted to other event kinds are
 * dropped, and so are jobs that need a dropped job.
 *
 * @param event Incoming event.
 * @param document Pipeline document.
 * @returns Selected jobs in declaration order; empty when no rule matches.
 */
export const selectJobs = (
  event: TriggerEvent,
  document: PipelineDocument
): readonly PipelineJob[] => {
  if (!shouldRun(event, document.triggers)) {
    return []
  }

  let selected = document.jobs.filter((job) => !job.events || job.events.includes(event.kind))

  for (;;) {
    const selectedIds = new Set(selected.map((job) => job.id))
    const remaining = selected.filter((job) =>
      (job.needs ?? []).every((need) => selectedIds.has(need))
    )
    if (remaining.length === selected.length) {
      return remaining
    }
    selected = remaining
  }
}

/**
 * Options for run creation.
 */
export interface CreatePipelineRunOptions {
  /** Run id factory. */
  readonly createId?: () => string
  /** Time source. */
  readonly now?: () => number
}

/**
 * Creates the run an event dispatches.
 *
 * @param event Incoming event.
 * @param document Pipeline document.
 * @param options Optional id and time sources.
 * @returns New run, or null when no trigger matches or no job is selected.
 * @throws PipelineContractError when the selected jobs have duplicate ids or broken `needs`.
 */
export const createPipelineRun = (
  event: TriggerEvent,
  document: PipelineDocument,
  options: CreatePipelineRunOptions = {}
): PipelineRun | null => {
  const jobs = selectJobs(event, document)
  if (jobs.length === 0) {
    return null
  }

  const run: PipelineRun = {
    id: (options.createId ?? randomUUID)(),
    pipelineName: document.name,
    event,
    jobs,
    createdAt: (options.now ?? Date.now)(),
  }

  assertSchedulableRun(run)
  return run
}
