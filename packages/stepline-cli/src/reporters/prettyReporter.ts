import type {
  JobResult,
  PipelineJob,
  PipelineReporter,
  PipelineRun,
  PipelineStep,
  RunResult,
  StepResult,
} from '@stepline/core'

/**
 * Options for the pretty console reporter.
 */
export interface PrettyReporterOptions {
  /** Emits stdout/stderr also for successful steps. */
  readonly verbose: boolean
}

type Color = 'red' | 'green' | 'yellow' | 'blue'

/**
 * Compact console reporter with failure-focused detail output. Jobs run
 * concurrently, so every job line carries a `[Job Name]` prefix.
 */
export class PrettyReporter implements PipelineReporter {
  private readonly options: PrettyReporterOptions

  /**
   * Creates a pretty reporter.
   *
   * @param options Reporter options.
   */
  public constructor(options: PrettyReporterOptions) {
    this.options = options
  }

  public onRunStart(run: PipelineRun): void {
    process.stdout.write(
      colorize(
        `stepline: run ${run.id} for ${run.event.kind} ${run.event.ref} (${run.jobs.length} jobs)\n`,
        'blue'
      )
    )
  }

  public onJobStart(job: PipelineJob): void {
    writeJobLine(job.name, 'started', 'blue')
  }

  public onStepStart(job: PipelineJob, step: PipelineStep): void {
    writeJobLine(job.name, `-> ${step.name}`, 'blue')
  }

  public onStepComplete(job: PipelineJob, result: StepResult): void {
    const duration = `${result.durationMs}ms`
    if (result.status === 'success') {
      writeJobLine(job.name, `✓ ${result.name} ${duration}`, 'green')
      if (this.options.verbose) {
        this.printOutput(job.name, result)
      }
      return
    }

    writeJobLine(
      job.name,
      `✗ ${result.name} ${result.status} (${describeStepReason(result)}, ${duration})`,
      'red'
    )
    this.printOutput(job.name, result)
  }

  public onJobComplete(result: JobResult): void {
    if (result.status === 'skipped') {
      writeJobLine(result.name, `ℹ skipped (${result.reason ?? 'no reason'})`, 'yellow')
      return
    }

    for (const step of result.steps) {
      if (step.status === 'skipped') {
        writeJobLine(result.name, `ℹ ${step.name} skipped (${step.reason ?? 'no reason'})`, 'yellow')
      }
    }

    const duration = `${result.durationMs}ms`
    if (result.status === 'success') {
      writeJobLine(result.name, `✓ success ${duration}`, 'green')
      return
    }

    writeJobLine(
      result.name,
      `✗ ${result.status} ${duration}`,
      result.status === 'cancelled' ? 'yellow' : 'red'
    )
  }

  public onRunComplete(result: RunResult): void {
    const summary = result.summary
    process.stdout.write('\n')
    process.stdout.write(
      `Summary: jobs=${summary.jobs} succeeded=${summary.succeeded} failed=${summary.failed} cancelled=${summary.cancelled} skipped=${summary.skipped} duration=${summary.durationMs}ms\n`
    )

    if (result.status === 'success') {
      process.stdout.write(colorize('Result: ✅ PASS\n', 'green'))
      return
    }

    if (result.status === 'cancelled') {
      process.stdout.write(
        colorize(`Result: CANCELLED (${result.cancelReason ?? 'cancelled'})\n`, 'yellow')
      )
      return
    }

    process.stdout.write(colorize('Result: FAIL\n', 'red'))
  }

  private printOutput(jobName: string, result: StepResult): void {
    const stdout = result.output.stdout.trim()
    const stderr = result.output.stderr.trim()

    if (stdout) {
      writeJobLine(jobName, '  stdout:', 'yellow')
      writeIndented(jobName, stdout)
    }

    if (stderr) {
      writeJobLine(jobName, '  stderr:', 'yellow')
      writeIndented(jobName, stderr)
    }

    if (result.output.truncated) {
      writeJobLine(jobName, '  note: output truncated', 'yellow')
    }
  }
}

const describeStepReason = (result: StepResult): string => {
  switch (result.reason) {
    case 'exit_code':
      return `exit code ${result.output.exitCode ?? 'unknown'}`
    case 'signal':
      return `signal ${result.output.signal ?? 'unknown'}`
    case 'launch_error':
      return `launch error: ${result.errorMessage ?? 'unknown'}`
    default:
      return result.reason ?? 'no reason'
  }
}

const writeJobLine = (jobName: string, text: string, color: Color): void => {
  process.stdout.write(`[${jobName}] ${colorize(text, color)}\n`)
}

const writeIndented = (jobName: string, text: string): void => {
  for (const line of text.split(/\r?\n/u)) {
    process.stdout.write(`[${jobName}]     ${line}\n`)
  }
}

const colorize = (text: string, color: Color): string => {
  const colors: Record<Color, string> = {
    red: '\x1b[31m',
    green: '\x1b[32m',
    yellow: '\x1b[33m',
    blue: '\x1b[34m',
  }

  return `${colors[color]}${text}\x1b[0m`
}
