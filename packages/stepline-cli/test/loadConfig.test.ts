import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { resolve } from 'node:path'

import { afterEach, describe, expect, it } from 'vitest'

import { loadStepLineConfig, parseStepLineConfig } from '../src/config/loadConfig.js'

const createdDirectories: string[] = []

afterEach(async () => {
  for (const directory of createdDirectories.splice(0)) {
    await rm(directory, { recursive: true, force: true })
  }
})

const createDirectory = async (prefix: string): Promise<string> => {
  const directory = await mkdtemp(resolve(tmpdir(), prefix))
  createdDirectories.push(directory)
  return directory
}

describe('loadStepLineConfig', () => {
  it('loads stepline.yml with trigger filters and step defaults', async () => {
    const directory = await createDirectory('stepline-cli-yaml-')

    await writeFile(
      resolve(directory, 'stepline.yml'),
      [
        'name: CI',
        'on:',
        '  pull_request:',
        '  push:',
        '    branches: [main]',
        'concurrency: 2',
        'env: { CI: "true" }',
        'limits: { maxOutputBytes: 1048576, killGraceMs: 5000, stepTimeoutMs: 600000 }',
        'jobs:',
        '  test:',
        '    name: MSRV Test',
        '    steps:',
        '      - name: Check (No Features)',
        '        command: [cargo, check]',
        '        args: --no-default-features',
        '      - command: cargo test --all-features',
        '  quality:',
        '    name: Code Quality',
        '    needs: test',
        '    steps:',
        '      - id: clippy',
        '        command: cargo clippy',
      ].join('\n'),
      'utf8'
    )

    const loaded = await loadStepLineConfig(directory)

    expect(loaded.configFilePath).toBe(resolve(directory, 'stepline.yml'))
    expect(loaded.config).toEqual({
      name: 'CI',
      on: {
        pull_request: {},
        push: { branches: ['main'] },
      },
      concurrency: 2,
      env: { CI: 'true' },
      limits: { maxOutputBytes: 1048576, killGraceMs: 5000, stepTimeoutMs: 600000 },
      jobs: [
        {
          id: 'test',
          name: 'MSRV Test',
          steps: [
            {
              id: 'test-step-1',
              name: 'Check (No Features)',
              command: ['cargo', 'check'],
              args: ['--no-default-features'],
            },
            {
              id: 'test-step-2',
              name: 'cargo test --all-features',
              command: ['cargo', 'test', '--all-features'],
            },
          ],
        },
        {
          id: 'quality',
          name: 'Code Quality',
          needs: ['test'],
          steps: [{ id: 'clippy', name: 'cargo clippy', command: ['cargo', 'clippy'] }],
        },
      ],
    })
  })

  it('reports YAML syntax errors with file position', async () => {
    const directory = await createDirectory('stepline-cli-yaml-error-')
    await writeFile(resolve(directory, 'stepline.yml'), 'jobs: [unclosed\n', 'utf8')

    await expect(loadStepLineConfig(directory)).rejects.toThrow(
      new RegExp(`${resolve(directory, 'stepline.yml').replaceAll('.', '\\.')}:\\d+:\\d+ `)
    )
  })

  it('loads stepline.config.ts default export', async () => {
    const directory = await createDirectory('stepline-cli-ts-')

    await writeFile(
      resolve(directory, 'stepline.config.ts'),
      [
        "import type { StepLineConfigFile } from '@stepline/cli/types'",
        '',
        'const config: StepLineConfigFile = {',
        "  name: 'Typed',",
        "  on: ['push'],",
        "  jobs: { lint: { steps: [{ command: ['cargo', 'fmt'], args: '--check' }] } },",
        '}',
        '',
        'export default config',
      ].join('\n'),
      'utf8'
    )

    const loaded = await loadStepLineConfig(directory)

    expect(loaded.config.name).toBe('Typed')
    expect(loaded.config.on).toEqual({ push: {} })
    expect(loaded.config.jobs[0]?.steps[0]).toEqual({
      id: 'lint-step-1',
      name: 'cargo fmt',
      command: ['cargo', 'fmt'],
      args: ['--check'],
    })
  })

  it('prefers stepline.config.json over stepline.yml', async () => {
    const directory = await createDirectory('stepline-cli-json-')

    await writeFile(
      resolve(directory, 'stepline.config.json'),
      JSON.stringify({ name: 'From JSON', on: 'push', jobs: { build: { steps: [] } } }),
      'utf8'
    )
    await writeFile(resolve(directory, 'stepline.yml'), 'name: From YAML\n', 'utf8')

    const loaded = await loadStepLineConfig(directory)

    expect(loaded.config.name).toBe('From JSON')
    expect(loaded.config.jobs).toEqual([{ id: 'build', name: 'build', steps: [] }])
  })

  it('fails when no config file exists', async () => {
    const directory = await createDirectory('stepline-cli-empty-')

    await expect(loadStepLineConfig(directory)).rejects.toThrow(
      'No config file found. Expected one of stepline.config.ts, stepline.config.json, stepline.yml, stepline.yaml'
    )
  })
})

describe('parseStepLineConfig', () => {
  it('names the path of invalid values', () => {
    expect(() =>
      parseStepLineConfig({ on: 'push', jobs: { test: { steps: [{ command: [] }] } } })
    ).toThrow('jobs.test.steps[0].command must be a non-empty string or a non-empty array of strings')
    expect(() =>
      parseStepLineConfig({ on: 'push', jobs: { test: { steps: [{ command: 'cargo', env: { A: [] } }] } } })
    ).toThrow('jobs.test.steps[0].env.A must be a string')
    expect(() => parseStepLineConfig({ on: 'push', jobs: { test: { steps: 'cargo' } } })).toThrow(
      'jobs.test.steps must be an array'
    )
  })

  it('rejects unsupported events', () => {
    expect(() => parseStepLineConfig({ on: 'tag', jobs: {} })).toThrow(
      'on must name a supported event (push, pull_request)'
    )
    expect(() => parseStepLineConfig({ jobs: {} })).toThrow(
      'on must be an event name, a list of event names or an object'
    )
    expect(() =>
      parseStepLineConfig({ on: 'push', jobs: { a: { events: ['schedule'], steps: [] } } })
    ).toThrow('jobs.a.events[0] must name a supported event (push, pull_request)')
  })

  it('rejects empty job maps, unknown needs and duplicate step ids', () => {
    expect(() => parseStepLineConfig({ on: 'push', jobs: {} })).toThrow(
      'jobs must define at least one job'
    )
    expect(() =>
      parseStepLineConfig({ on: ['push'], jobs: { a: { needs: 'missing', steps: [] } } })
    ).toThrow('jobs.a.needs[0] references unknown job id: missing')
    expect(() =>
      parseStepLineConfig({
        on: 'push',
        jobs: { a: { steps: [{ id: 'x', command: 'a' }, { id: 'x', command: 'b' }] } },
      })
    ).toThrow('jobs.a.steps[1].id must be unique (duplicate: x)')
  })

  it('rejects non-positive limits', () => {
    expect(() =>
      parseStepLineConfig({ on: 'push', concurrency: 0, jobs: { a: { steps: [] } } })
    ).toThrow('concurrency must be a positive integer')
    expect(() =>
      parseStepLineConfig({ on: 'push', limits: { killGraceMs: -1 }, jobs: { a: { steps: [] } } })
    ).toThrow('limits.killGraceMs must be a positive integer')
  })

  it('accepts branch ignore lists and scalar env values', () => {
    const config = parseStepLineConfig({
      on: { push: { 'branches-ignore': 'release/*' } },
      env: { PORT: 8080, DEBUG: false },
      jobs: { a: { events: ['push'], steps: [] } },
    })

    expect(config.name).toBe('pipeline')
    expect(config.on).toEqual({ push: { branchesIgnore: ['release/*'] } })
    expect(config.env).toEqual({ PORT: '8080', DEBUG: 'false' })
    expect(config.jobs[0]?.events).toEqual(['push'])
  })
})
