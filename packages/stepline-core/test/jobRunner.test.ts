import { describe, expect, it } from 'vitest'

import type {
  CommandExecutionRequest,
  CommandExecutionResult,
  CommandExecutor,
  PipelineJob,
  PipelineReporter,
  PipelineStep,
} from '../src/index.js'
import { createJobRunner } from '../src/index.js'

const exited = (exitCode: number): CommandExecutionResult => {
  return {
    outcome: 'exited',
    durationMs: 1,
    exitCode,
    signal: null,
    stdout: exitCode === 0 ? 'ok' : '',
    stderr: exitCode === 0 ? '' : 'error: lint failed',
    truncated: false,
  }
}

const ended = (outcome: 'cancelled' | 'timed_out' | 'launch_failed'): CommandExecutionResult => {
  return {
    outcome,
    durationMs: 1,
    exitCode: null,
    signal: outcome === 'launch_failed' ? null : 'SIGTERM',
    stdout: '',
    stderr: '',
    truncated: false,
    ...(outcome === 'launch_failed' ? { error: new Error('spawn cargo ENOENT') } : {}),
  }
}

const createClock = (): (() => number) => {
  let timestamp = 0
  return (): number => {
    timestamp += 1
    return timestamp
  }
}

/**
 * Executor answering by program subcommand (`argv[1]`), succeeding by default.
 */
const createScriptedExecutor = (
  outcomes: Readonly<Record<string, CommandExecutionResult>> = {}
): { executor: CommandExecutor; requests: CommandExecutionRequest[] } => {
  const requests: CommandExecutionRequest[] = []

  const executor: CommandExecutor = async (request) => {
    requests.push(request)
    return outcomes[request.argv[1] ?? ''] ?? exited(0)
  }

  return { executor, requests }
}

const cargoStep = (subcommand: string, args?: readonly string[]): PipelineStep => {
  return {
    id: subcommand,
    name: subcommand,
    command: ['cargo', subcommand],
    args,
  }
}

const qualityJob: PipelineJob = {
  id: 'quality',
  name: 'Code Quality',
  steps: [cargoStep('clippy', ['--all-features']), cargoStep('doc'), cargoStep('fmt', ['--check'])],
}

describe('JobRunner', () => {
  it('stops at the first failing step and skips the rest', async () => {
    const { executor, requests } = createScriptedExecutor({ clippy: exited(101) })
    const runner = createJobRunner({ executor, now: createClock() })

    const result = await runner.run(qualityJob)

    expect(result.status).toBe('failure')
    expect(
      result.steps.map((step) => ({
        id: step.id,
        status: step.status,
        exitCode: step.output.exitCode,
      }))
    ).toEqual([
      { id: 'clippy', status: 'failure', exitCode: 101 },
      { id: 'doc', status: 'skipped', exitCode: null },
      { id: 'fmt', status: 'skipped', exitCode: null },
    ])
    expect(result.steps[0]?.reason).toBe('exit_code')
    expect(result.steps[1]?.reason).toBe('previous_step_failed')
    expect(requests.map((request) => request.argv)).toEqual([
      ['cargo', 'clippy', '--all-features'],
    ])
  })

  it('marks earlier steps passed and later steps skipped for every failing position', async () => {
    const subcommands = ['check', 'build', 'test', 'bench']
    const job: PipelineJob = {
      id: 'matrix',
      name: 'Matrix',
      steps: subcommands.map((subcommand) => cargoStep(subcommand)),
    }

    for (const [failingIndex, failing] of subcommands.entries()) {
      const { executor } = createScriptedExecutor({ [failing]: exited(1) })
      const result = await createJobRunner({ executor, now: createClock() }).run(job)

      expect(result.status).toBe('failure')
      expect(result.steps.map((step) => step.status)).toEqual(
        subcommands.map((_, index) => {
          if (index < failingIndex) {
            return 'success'
          }
          return index === failingIndex ? 'failure' : 'skipped'
        })
      )
    }
  })

  it('reports success when every step succeeds', async () => {
    const { executor, requests } = createScriptedExecutor()
    const runner = createJobRunner({ executor, now: createClock() })

    const result = await runner.run(qualityJob)

    expect(result.status).toBe('success')
    expect(result.steps.every((step) => step.status === 'success' && step.reason === undefined)).toBe(
      true
    )
    expect(requests).toHaveLength(3)
  })

  it('records a launch error as a failure without exit code', async () => {
    const { executor } = createScriptedExecutor({ doc: ended('launch_failed') })
    const result = await createJobRunner({ executor, now: createClock() }).run(qualityJob)

    expect(result.status).toBe('failure')
    expect(result.steps[1]).toMatchObject({
      status: 'failure',
      reason: 'launch_error',
      errorMessage: 'spawn cargo ENOENT',
    })
    expect(result.steps[1]?.output.exitCode).toBeNull()
    expect(result.steps[2]?.status).toBe('skipped')
  })

  it('turns a timed out step into a cancelled job', async () => {
    const { executor } = createScriptedExecutor({ clippy: ended('timed_out') })
    const result = await createJobRunner({ executor, now: createClock() }).run(qualityJob)

    expect(result.status).toBe('cancelled')
    expect(result.steps[0]).toMatchObject({ status: 'cancelled', reason: 'timeout' })
    expect(result.steps[1]).toMatchObject({ status: 'skipped', reason: 'previous_step_failed' })
  })

  it('does not start another step once cancellation is observed', async () => {
    const controller = new AbortController()
    const requests: CommandExecutionRequest[] = []
    const executor: CommandExecutor = async (request) => {
      requests.push(request)
      // The in-flight step still finishes successfully after the abort.
      controller.abort('superseded')
      return exited(0)
    }

    const result = await createJobRunner({ executor, now: createClock() }).run(
      qualityJob,
      controller.signal
    )

    expect(requests).toHaveLength(1)
    expect(result.status).toBe('cancelled')
    expect(result.steps.map((step) => [step.status, step.reason])).toEqual([
      ['success', undefined],
      ['skipped', 'job_cancelled'],
      ['skipped', 'job_cancelled'],
    ])
  })

  it('passes the cancellation signal to the executor and records the cancelled step', async () => {
    const controller = new AbortController()
    const { executor, requests } = createScriptedExecutor({ clippy: ended('cancelled') })

    const result = await createJobRunner({ executor, now: createClock() }).run(
      qualityJob,
      controller.signal
    )

    expect(requests[0]?.signal).toBe(controller.signal)
    expect(result.status).toBe('cancelled')
    expect(result.steps[0]).toMatchObject({ status: 'cancelled', reason: 'cancelled' })
    expect(result.steps[1]).toMatchObject({ status: 'skipped', reason: 'job_cancelled' })
  })

  it('skips every step when the signal is already aborted', async () => {
    const controller = new AbortController()
    controller.abort()
    const { executor, requests } = createScriptedExecutor()

    const result = await createJobRunner({ executor, now: createClock() }).run(
      qualityJob,
      controller.signal
    )

    expect(requests).toHaveLength(0)
    expect(result.status).toBe('cancelled')
    expect(result.steps.map((step) => step.reason)).toEqual([
      'job_cancelled',
      'job_cancelled',
      'job_cancelled',
    ])
  })

  it('merges environment layers and resolves working directories', async () => {
    const { executor, requests } = createScriptedExecutor()
    const runner = createJobRunner({
      executor,
      cwd: '/repo',
      env: { CI: 'true', LEVEL: 'base' },
      environmentProvider: ({ step }) => ({ LEVEL: 'provider', STEP_ID: step.id }),
      defaultStepTimeoutMs: 60_000,
      maxOutputBytes: 2048,
      killGraceMs: 250,
      now: createClock(),
    })

    await runner.run({
      id: 'test',
      name: 'MSRV Test',
      env: { LEVEL: 'job' },
      steps: [
        { id: 'check', name: 'Check', command: ['cargo', 'check'] },
        {
          id: 'test',
          name: 'Test',
          command: ['cargo', 'test'],
          cwd: '/repo/crates/core',
          env: { LEVEL: 'step' },
          timeoutMs: 1000,
        },
      ],
    })

    expect(requests[0]).toMatchObject({
      argv: ['cargo', 'check'],
      cwd: '/repo',
      env: { CI: 'true', LEVEL: 'job', STEP_ID: 'check' },
      timeoutMs: 60_000,
      maxOutputBytes: 2048,
      killGraceMs: 250,
    })
    expect(requests[1]).toMatchObject({
      cwd: '/repo/crates/core',
      env: { CI: 'true', LEVEL: 'step', STEP_ID: 'test' },
      timeoutMs: 1000,
    })
  })

  it('emits reporter hooks in step order', async () => {
    const events: string[] = []
    const reporter: PipelineReporter = {
      onJobStart: (job): void => {
        events.push(`job:start:${job.id}`)
      },
      onStepStart: (_job, step, index): void => {
        events.push(`step:start:${step.id}:${index}`)
      },
      onStepComplete: (_job, result): void => {
        events.push(`step:complete:${result.id}:${result.status}`)
      },
      onJobComplete: (result): void => {
        events.push(`job:complete:${result.id}:${result.status}`)
      },
    }
    const { executor } = createScriptedExecutor({ doc: exited(1) })

    await createJobRunner({ executor, reporters: [reporter], now: createClock() }).run(qualityJob)

    expect(events).toEqual([
      'job:start:quality',
      'step:start:clippy:0',
      'step:complete:clippy:success',
      'step:start:doc:1',
      'step:complete:doc:failure',
      'job:complete:quality:failure',
    ])
  })

  it('builds a skipped result for jobs whose dependencies did not succeed', async () => {
    const { executor, requests } = createScriptedExecutor()
    const completed: string[] = []

    const result = await createJobRunner({
      executor,
      reporters: [{ onJobComplete: (job): void => void completed.push(job.id) }],
      now: createClock(),
    }).skip(qualityJob)

    expect(requests).toHaveLength(0)
    expect(completed).toEqual(['quality'])
    expect(result.status).toBe('skipped')
    expect(result.reason).toBe('dependency_not_successful')
    expect(result.steps.map((step) => step.reason)).toEqual([
      'job_skipped',
      'job_skipped',
      'job_skipped',
    ])
  })
})
