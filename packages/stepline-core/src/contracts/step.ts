/**
 * Terminal status of a pipeline step.
 */
export type StepStatus = 'success' | 'failure' | 'cancelled' | 'skipped'

/**
 * Failure, cancellation or skip reason assigned to a step result.
 */
export type StepResultReason =
  | 'launch_error'
  | 'exit_code'
  | 'signal'
  | 'cancelled'
  | 'timeout'
  | 'previous_step_failed'
  | 'job_cancelled'
  | 'job_skipped'

/**
 * Immutable definition of one runnable step.
 */
export interface PipelineStep {
  /** Stable machine identifier, unique within its job. */
  readonly id: string
  /** Human readable label used in logs and summaries. */
  readonly name: string
  /** Program and leading arguments, executed without a shell. */
  readonly command: readonly string[]
  /** Extra arguments appended to the command. */
  readonly args?: readonly string[]
  /** Optional working directory override. */
  readonly cwd?: string
  /** Environment additions for this step. */
  readonly env?: Readonly<Record<string, string>>
  /** Optional timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * Captured process output for one step execution.
 */
export interface StepExecutionOutput {
  /** Exit code returned by the process, or null when unavailable. */
  readonly exitCode: number | null
  /** Termination signal if process ended by signal. */
  readonly signal: NodeJS.Signals | null
  /** Captured stdout content. */
  readonly stdout: string
  /** Captured stderr content. */
  readonly stderr: string
  /** True when either stream exceeded the output cap. */
  readonly truncated: boolean
}

/**
 * Result recorded for each step of a job, including steps that never ran.
 */
export interface StepResult {
  /** Step identifier copied from the step definition. */
  readonly id: string
  /** Step display name copied from the step definition. */
  readonly name: string
  readonly status: StepStatus
  /** Reason for every non-success outcome. */
  readonly reason?: StepResultReason
  /** Step start timestamp in Unix milliseconds. */
  readonly startedAt: number
  /** Step finish timestamp in Unix milliseconds. */
  readonly finishedAt: number
  /** Total step duration in milliseconds. */
  readonly durationMs: number
  readonly output: StepExecutionOutput
  /** Launch failure message when the process could not be started. */
  readonly errorMessage?: string
}
