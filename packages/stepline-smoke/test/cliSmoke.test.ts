import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import { runCliPipeline, type RunCliPipelineOptions } from '@stepline/cli'
import type { StepLineConfigFile } from '@stepline/cli/types'
import { afterEach, describe, expect, it, vi } from 'vitest'

const smokeRoot = fileURLToPath(new URL('..', import.meta.url))
const cargo = [process.execPath, resolve(smokeRoot, 'stubs', 'cargo-stub.cjs')]

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createOptions = (overrides: Partial<RunCliPipelineOptions> = {}): RunCliPipelineOptions => {
  return {
    cwd: smokeRoot,
    event: 'push',
    ref: 'main',
    jobs: [],
    listJobs: false,
    format: 'pretty',
    verbose: false,
    watch: false,
    ...overrides,
  }
}

const writeSmokeConfig = async (config: StepLineConfigFile): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), 'stepline-smoke-'))
  createdDirectories.push(directory)

  const configFilePath = resolve(directory, 'stepline.config.json')
  await writeFile(configFilePath, JSON.stringify(config, null, 2), 'utf8')
  return configFilePath
}

describe('stepline cli smoke', () => {
  it('keeps pretty output compact for the typed config', async () => {
    const { result: exitCode, output } = await captureStdout(() =>
      runCliPipeline(
        createOptions({ configPath: resolve(smokeRoot, 'smoke', 'stepline.typed.config.ts') })
      )
    )

    expect(exitCode).toBe(0)
    expect(normalizePrettyOutput(output)).toBe(
      [
        'stepline: run <run-id> for push main (1 jobs)',
        '[Code Quality] started',
        '[Code Quality] -> Clippy',
        '[Code Quality] ✓ Clippy <duration>',
        '[Code Quality] -> Format',
        '[Code Quality] ✓ Format <duration>',
        '[Code Quality] ✓ success <duration>',
        '',
        'Summary: jobs=1 succeeded=1 failed=0 cancelled=0 skipped=0 duration=<duration>',
        'Result: ✅ PASS',
      ].join('\n')
    )
  })

  it('prints the failing step output on pretty failure', async () => {
    const configPath = await writeSmokeConfig({
      name: 'Smoke',
      on: 'push',
      env: { STEPLINE_SMOKE_FAIL: 'fmt' },
      jobs: {
        quality: {
          name: 'Code Quality',
          steps: [
            { id: 'fmt', name: 'Format', command: cargo, args: ['fmt', '--check'] },
            { id: 'doc', name: 'Docs', command: cargo, args: ['doc'] },
          ],
        },
      },
    })

    const { result: exitCode, output } = await captureStdout(() =>
      runCliPipeline(createOptions({ configPath }))
    )

    expect(exitCode).toBe(1)
    expect(normalizePrettyOutput(output)).toBe(
      [
        'stepline: run <run-id> for push main (1 jobs)',
        '[Code Quality] started',
        '[Code Quality] -> Format',
        '[Code Quality] ✗ Format failure (exit code 101, <duration>)',
        '[Code Quality]   stderr:',
        '[Code Quality]     error: could not compile `smoke` (cargo fmt)',
        '[Code Quality] ℹ Docs skipped (previous_step_failed)',
        '[Code Quality] ✗ failure <duration>',
        '',
        'Summary: jobs=1 succeeded=0 failed=1 cancelled=0 skipped=0 duration=<duration>',
        'Result: FAIL',
      ].join('\n')
    )
  })

  it('skips jobs whose needs failed in json output', async () => {
    const configPath = await writeSmokeConfig({
      name: 'Smoke',
      on: { pull_request: null },
      env: { STEPLINE_SMOKE_FAIL: 'check' },
      jobs: {
        test: { name: 'MSRV Test', steps: [{ id: 'check', command: cargo, args: 'check' }] },
        quality: {
          name: 'Code Quality',
          needs: 'test',
          steps: [{ id: 'clippy', command: cargo, args: 'clippy' }],
        },
      },
    })

    const { result: exitCode, output } = await captureStdout(() =>
      runCliPipeline(
        createOptions({
          configPath,
          event: 'pull_request',
          ref: 'feature/smoke',
          format: 'json',
          formatProvided: true,
        })
      )
    )

    expect(exitCode).toBe(1)
    expect(JSON.parse(output)).toMatchObject({
      pipelineName: 'Smoke',
      status: 'failure',
      summary: { jobs: 2, succeeded: 0, failed: 1, cancelled: 0, skipped: 1 },
      jobs: [
        { id: 'test', status: 'failure', steps: [{ id: 'check', output: { exitCode: 101 } }] },
        {
          id: 'quality',
          status: 'skipped',
          reason: 'dependency_not_successful',
          steps: [{ id: 'clippy', status: 'skipped', reason: 'job_skipped' }],
        },
      ],
    })
  })
})

const captureStdout = async <T>(
  callback: () => Promise<T>
): Promise<{ result: T; output: string }> => {
  const chunks: string[] = []
  const writeSpy = vi
    .spyOn(process.stdout, 'write')
    .mockImplementation((chunk: string | Uint8Array) => {
      chunks.push(typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf8'))
      return true
    })

  try {
    const result = await callback()
    return { result, output: chunks.join('') }
  } finally {
    writeSpy.mockRestore()
  }
}

const stripAnsi = (value: string): string => {
  // eslint-disable-next-line no-control-regex
  return value.replace(/\x1b\[[0-9;]*m/g, '')
}

const normalizePrettyOutput = (value: string): string => {
  return stripAnsi(value)
    .replace(/run [0-9a-f-]{36}/g, 'run <run-id>')
    .replace(/\b\d+ms\b/g, '<duration>')
    .trimEnd()
}
