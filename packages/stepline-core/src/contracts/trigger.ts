import type { PipelineJob } from './job.js'

/**
 * Event kinds that can dispatch a run.
 */
export type TriggerEventKind = 'push' | 'pull_request'

/**
 * Incoming event delivered by an ingestion layer.
 */
export interface TriggerEvent {
  readonly kind: TriggerEventKind
  /**
   * Branch name or full ref (`refs/heads/main`). For pull requests this is
   * the base branch.
   */
  readonly ref: string
}

/**
 * One entry of a pipeline's `on` section.
 */
export interface TriggerRule {
  readonly event: TriggerEventKind
  /** Branch patterns; the rule matches every branch when omitted. */
  readonly branches?: readonly string[]
  /** Branch patterns that never match, evaluated after `branches`. */
  readonly branchesIgnore?: readonly string[]
}

/**
 * Validated, immutable pipeline document.
 */
export interface PipelineDocument {
  /** Pipeline display name, also used to group superseded runs. */
  readonly name: string
  readonly triggers: readonly TriggerRule[]
  /** Jobs in declaration order. */
  readonly jobs: readonly PipelineJob[]
}
