export type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
  CommandOutcome,
} from './contracts/executor.js'
export type { JobResult, JobResultReason, JobStatus, PipelineJob } from './contracts/job.js'
export type { PipelineReporter } from './contracts/reporter.js'
export type {
  JobRunnerOptions,
  PipelineRun,
  PipelineSchedulerOptions,
  RunResult,
  RunStatus,
  RunSummary,
  StepEnvironmentContext,
  StepEnvironmentProvider,
} from './contracts/run.js'
export type {
  PipelineStep,
  StepExecutionOutput,
  StepResult,
  StepResultReason,
  StepStatus,
} from './contracts/step.js'
export type {
  PipelineDocument,
  TriggerEvent,
  TriggerEventKind,
  TriggerRule,
} from './contracts/trigger.js'

export { PipelineContractError } from './errors.js'
export { BoundedOutputBuffer } from './execution/boundedOutputBuffer.js'
export {
  createNodeCommandExecutor,
  DEFAULT_KILL_GRACE_MS,
  DEFAULT_MAX_OUTPUT_BYTES,
} from './execution/nodeCommandExecutor.js'
export type { StepExecutionContext } from './execution/stepExecutor.js'
export { classifyExecution, executeStep } from './execution/stepExecutor.js'
export { formatRunResultAsJson } from './reporters/jsonFormatter.js'
export { createJobRunner, JobRunner } from './runner/jobRunner.js'
export {
  aggregateRunStatus,
  createPipelineScheduler,
  DEFAULT_MAX_CONCURRENCY,
  PipelineScheduler,
  toExitCode,
} from './runner/pipelineScheduler.js'
export type { RunHandle } from './runner/runRegistry.js'
export { RunRegistry } from './runner/runRegistry.js'
export type { ReleasePermit } from './runner/semaphore.js'
export { Semaphore } from './runner/semaphore.js'
export { assertSchedulableRun } from './runner/validateRun.js'
export type { SegmentGlob } from './trigger/globPattern.js'
export {
  compileBranchPattern,
  hasWildcard,
  matchSegment,
  matchSegments,
  splitSegments,
} from './trigger/globPattern.js'
export type { CreatePipelineRunOptions } from './trigger/triggerEvaluator.js'
export {
  createPipelineRun,
  matchesTriggerRule,
  normalizeRef,
  selectJobs,
  shouldRun,
} from './trigger/triggerEvaluator.js'
