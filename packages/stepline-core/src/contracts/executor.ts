import type { StepExecutionOutput } from './step.js'

/**
 * Input contract for command execution.
 */
export interface CommandExecutionRequest {
  /** Program followed by its arguments. */
  readonly argv: readonly string[]
  /** Working directory used for this process. */
  readonly cwd: string
  /** Environment variables merged for this process. */
  readonly env: NodeJS.ProcessEnv
  /** Cancellation signal; aborting terminates the process. */
  readonly signal?: AbortSignal
  /** Optional process timeout in milliseconds. */
  readonly timeoutMs?: number
  /** Maximum captured bytes per output stream. */
  readonly maxOutputBytes?: number
  /** Delay between SIGTERM and SIGKILL when terminating. */
  readonly killGraceMs?: number
}

/**
 * How a command execution ended.
 */
export type CommandOutcome = 'exited' | 'launch_failed' | 'cancelled' | 'timed_out'

/**
 * Output contract from one command execution.
 */
export interface CommandExecutionResult extends StepExecutionOutput {
  readonly outcome: CommandOutcome
  /** Total command duration in milliseconds. */
  readonly durationMs: number
  /** Original error object for spawn-level failures. */
  readonly error?: unknown
}

/**
 * Asynchronous abstraction for command execution.
 *
 * Implementations resolve for every outcome, and never resolve `cancelled`
 * or `timed_out` while the process is still running.
 */
export type CommandExecutor = (request: CommandExecutionRequest) => Promise<CommandExecutionResult>
