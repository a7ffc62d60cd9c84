import type { CommandExecutionResult, CommandExecutor } from '../contracts/executor.js'
import type { PipelineStep, StepResult, StepResultReason, StepStatus } from '../contracts/step.js'

/**
 * Per-call execution context for one step.
 */
export interface StepExecutionContext {
  /** Resolved working directory. */
  readonly cwd: string
  /** Resolved environment. */
  readonly env: NodeJS.ProcessEnv
  /** Cancellation token of the enclosing job. */
  readonly signal?: AbortSignal
  /** Timeout used when the step does not declare one. */
  readonly defaultTimeoutMs?: number
  readonly maxOutputBytes?: number
  readonly killGraceMs?: number
  /** Time source injection for deterministic tests. */
  readonly now?: () => number
}

/**
 * Runs one step through the executor and classifies the outcome.
 *
 * @param executor Process execution facility.
 * @param step Step definition.
 * @param context Resolved working directory, environment and cancellation token.
 * @returns Step result; never rejects for execution failures.
 */
export const executeStep = async (
  executor: CommandExecutor,
  step: PipelineStep,
  context: StepExecutionContext
): Promise<StepResult> => {
  const now = context.now ?? Date.now
  const startedAt = now()

  const execution = await executor({
    argv: [...step.command, ...(step.args ?? [])],
    cwd: step.cwd ?? context.cwd,
    env: { ...context.env, ...step.env },
    signal: context.signal,
    timeoutMs: step.timeoutMs ?? context.defaultTimeoutMs,
    maxOutputBytes: context.maxOutputBytes,
    killGraceMs: context.killGraceMs,
  })

  const classification = classifyExecution(execution)
  const finishedAt = now()

  return {
    id: step.id,
    name: step.name,
    status: classification.status,
    reason: classification.reason,
    startedAt,
    finishedAt,
    durationMs: finishedAt - startedAt,
    output: {
      exitCode: execution.exitCode,
      signal: execution.signal,
      stdout: execution.stdout,
      stderr: execution.stderr,
      truncated: execution.truncated,
    },
    ...(classification.reason === 'launch_error'
      ? { errorMessage: describeLaunchError(execution.error) }
      : {}),
  }
}

/**
 * Maps a raw command outcome to step status and reason.
 *
 * @param execution Command execution result.
 * @returns Status with reason for non-success outcomes.
 */
export const classifyExecution = (
  execution: CommandExecutionResult
): { readonly status: StepStatus; readonly reason?: StepResultReason } => {
  switch (execution.outcome) {
    case 'launch_failed':
      return { status: 'failure', reason: 'launch_error' }
    case 'cancelled':
      return { status: 'cancelled', reason: 'cancelled' }
    case 'timed_out':
      return { status: 'cancelled', reason: 'timeout' }
    case 'exited':
      if (execution.exitCode === 0) {
        return { status: 'success' }
      }
      if (execution.exitCode !== null) {
        return { status: 'failure', reason: 'exit_code' }
      }
      return { status: 'failure', reason: 'signal' }
  }
}

const describeLaunchError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message
  }

  return error === undefined ? 'Command could not be started' : String(error)
}
