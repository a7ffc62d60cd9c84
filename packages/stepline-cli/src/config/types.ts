import type { TriggerEventKind } from '@stepline/core'

/**
 * Supported output formats for the CLI.
 */
export type CliOutputFormat = 'pretty' | 'json'

/**
 * Branch filters for one trigger event.
 */
export interface StepLineTriggerConfig {
  /** Branch patterns that dispatch a run. Every branch when omitted. */
  readonly branches?: readonly string[]
  /** Branch patterns that never dispatch a run. */
  readonly branchesIgnore?: readonly string[]
}

/**
 * Execution limits applied to every step.
 */
export interface StepLineLimitsConfig {
  /** Per-stream capture cap in bytes. */
  readonly maxOutputBytes?: number
  /** Delay between SIGTERM and SIGKILL on cancellation. */
  readonly killGraceMs?: number
  /** Timeout for steps that do not declare one. */
  readonly stepTimeoutMs?: number
}

/**
 * Watch behavior configuration for file-change reruns.
 */
export interface StepLineWatchConfig {
  /**
   * Optional exclusion patterns evaluated against changed paths relative to `cwd`.
   *
   * Supports:
   * - segment names (`target`, `node_modules`)
   * - path prefixes (`crates/core/generated`)
   * - glob patterns (for example `star-star-slash-star-dot-log`)
   */
  readonly exclude?: readonly string[]
}

/**
 * User-facing step definition loaded from config.
 */
export interface CliConfigStep {
  /** Stable step id, `<jobId>-step-<n>` when omitted. */
  readonly id: string
  /** Display name shown in output. */
  readonly name: string
  /** Program and leading arguments. */
  readonly command: readonly string[]
  /** Arguments appended to `command`. */
  readonly args?: readonly string[]
  /** Relative or absolute working directory for this step. */
  readonly cwd?: string
  /** Environment additions for this step. */
  readonly env?: Readonly<Record<string, string>>
  /** Step timeout in milliseconds. */
  readonly timeoutMs?: number
}

/**
 * User-facing job definition loaded from config.
 */
export interface CliConfigJob {
  /** Job id, taken from the `jobs` map key. */
  readonly id: string
  /** Display name, the job id when omitted. */
  readonly name: string
  /** Jobs that must succeed first. */
  readonly needs?: readonly string[]
  /** Event kinds this job runs for. Every event when omitted. */
  readonly events?: readonly TriggerEventKind[]
  /** Relative or absolute working directory for the job's steps. */
  readonly cwd?: string
  /** Environment additions for the job's steps. */
  readonly env?: Readonly<Record<string, string>>
  /** Ordered steps. */
  readonly steps: readonly CliConfigStep[]
}

/**
 * Top-level CLI config model.
 */
export interface StepLineConfig {
  /** Pipeline name, used for superseding runs of the same branch. */
  readonly name: string
  /** Trigger filters by event kind. */
  readonly on: Readonly<Partial<Record<TriggerEventKind, StepLineTriggerConfig>>>
  /** Jobs in declaration order. */
  readonly jobs: readonly CliConfigJob[]
  /** Maximum concurrently running jobs. */
  readonly concurrency?: number
  /** Base environment merged into all steps. */
  readonly env?: Readonly<Record<string, string>>
  /** Relative or absolute working directory for the whole pipeline. */
  readonly cwd?: string
  /** Execution limits. */
  readonly limits?: StepLineLimitsConfig
  /** Default output behavior from config. */
  readonly output?: {
    /** Preferred output format. */
    readonly format?: CliOutputFormat
    /** Emits all step output on success when true. */
    readonly verbose?: boolean
  }
  /** Watch-mode options for rerun filtering. */
  readonly watch?: StepLineWatchConfig
}

/**
 * Step as written in a config file.
 */
export interface StepLineConfigFileStep {
  readonly id?: string
  readonly name?: string
  /** Argv list, or a whitespace-separated command line. */
  readonly command: string | readonly string[]
  readonly args?: string | readonly string[]
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
  readonly timeoutMs?: number
}

/**
 * Job as written in a config file, keyed by job id.
 */
export interface StepLineConfigFileJob {
  readonly name?: string
  readonly needs?: string | readonly string[]
  readonly events?: readonly TriggerEventKind[]
  readonly cwd?: string
  readonly env?: Readonly<Record<string, string>>
  readonly steps: readonly StepLineConfigFileStep[]
}

/**
 * Trigger filter as written in a config file.
 */
export interface StepLineConfigFileTrigger {
  readonly branches?: string | readonly string[]
  readonly 'branches-ignore'?: string | readonly string[]
}

/**
 * Shape accepted from `stepline.config.ts`, `stepline.config.json` and
 * `stepline.yml`.
 */
export interface StepLineConfigFile {
  readonly name?: string
  readonly on:
    | TriggerEventKind
    | readonly TriggerEventKind[]
    | Readonly<Partial<Record<TriggerEventKind, StepLineConfigFileTrigger | null>>>
  readonly jobs: Readonly<Record<string, StepLineConfigFileJob>>
  readonly concurrency?: number
  readonly env?: Readonly<Record<string, string>>
  readonly cwd?: string
  readonly limits?: StepLineLimitsConfig
  readonly output?: StepLineConfig['output']
  readonly watch?: StepLineWatchConfig
}
