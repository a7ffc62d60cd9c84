import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { dirname, resolve } from 'node:path'
import { pathToFileURL } from 'node:url'

import type { TriggerEventKind } from '@stepline/core'
import ts from 'typescript'
import YAML from 'yaml'

import type {
  CliConfigJob,
  CliConfigStep,
  StepLineConfig,
  StepLineLimitsConfig,
  StepLineTriggerConfig,
} from './types.js'

const CONFIG_FILE_NAMES = [
  'stepline.config.ts',
  'stepline.config.json',
  'stepline.yml',
  'stepline.yaml',
] as const

const EVENT_KINDS: readonly TriggerEventKind[] = ['push', 'pull_request']

const DEFAULT_PIPELINE_NAME = 'pipeline'

/**
 * Loads and validates a stepline config file.
 *
 * @param cwd Base working directory.
 * @param configPath Optional explicit config file path.
 * @returns Parsed config with resolved metadata.
 * @throws Error when config cannot be loaded or is invalid.
 */
export const loadStepLineConfig = async (
  cwd: string,
  configPath?: string
): Promise<{ config: StepLineConfig; configFilePath: string }> => {
  const resolvedConfigPath = await resolveConfigPath(cwd, configPath)
  if (!resolvedConfigPath) {
    throw new Error(`No config file found. Expected one of ${CONFIG_FILE_NAMES.join(', ')}`)
  }

  const loadedConfig = await loadConfigByExtension(resolvedConfigPath)
  const config = parseStepLineConfig(loadedConfig)

  return {
    config,
    configFilePath: resolvedConfigPath,
  }
}

const resolveConfigPath = async (cwd: string, configPath?: string): Promise<string | null> => {
  if (configPath) {
    return resolve(cwd, configPath)
  }

  for (const fileName of CONFIG_FILE_NAMES) {
    const candidate = resolve(cwd, fileName)
    try {
      await readFile(candidate, 'utf8')
      return candidate
    } catch {
      continue
    }
  }

  return null
}

const loadConfigByExtension = async (configFilePath: string): Promise<unknown> => {
  if (configFilePath.endsWith('.json')) {
    const content = await readFile(configFilePath, 'utf8')
    const parsed: unknown = JSON.parse(content)
    return parsed
  }

  if (configFilePath.endsWith('.yml') || configFilePath.endsWith('.yaml')) {
    return await loadYamlConfig(configFilePath)
  }

  if (configFilePath.endsWith('.ts')) {
    return await loadTypeScriptConfig(configFilePath)
  }

  throw new Error(`Unsupported config extension: ${configFilePath}`)
}

const loadYamlConfig = async (configFilePath: string): Promise<unknown> => {
  const content = await readFile(configFilePath, 'utf8')
  const document = YAML.parseDocument(content)

  const [firstError] = document.errors
  if (firstError) {
    const line = firstError.linePos?.[0]?.line ?? 0
    const col = firstError.linePos?.[0]?.col ?? 0
    throw new Error(`${configFilePath}:${line}:${col} ${firstError.message}`)
  }

  const parsed: unknown = document.toJS()
  return parsed
}

const loadTypeScriptConfig = async (configFilePath: string): Promise<unknown> => {
  const source = await readFile(configFilePath, 'utf8')
  const transpiled = ts.transpileModule(source, {
    compilerOptions: {
      module: ts.ModuleKind.ESNext,
      target: ts.ScriptTarget.ES2022,
      esModuleInterop: true,
    },
    fileName: configFilePath,
    reportDiagnostics: true,
  })

  if (transpiled.diagnostics && transpiled.diagnostics.length > 0) {
    const message = ts.formatDiagnosticsWithColorAndContext(transpiled.diagnostics, {
      getCurrentDirectory: (): string => dirname(configFilePath),
      getCanonicalFileName: (fileName: string): string => fileName,
      getNewLine: (): string => '\n',
    })
    throw new Error(`Failed to transpile ${configFilePath}\n${message}`)
  }

  const tempDirectory = await mkdtemp(resolve(tmpdir(), 'stepline-config-'))
  const tempFilePath = resolve(tempDirectory, 'config.mjs')

  try {
    await writeFile(tempFilePath, transpiled.outputText, 'utf8')
    const moduleUrl = `${pathToFileURL(tempFilePath).href}?v=${Date.now()}`
    const loadedModule: unknown = await import(moduleUrl)

    if (isRecord(loadedModule) && loadedModule.default !== undefined) {
      return unwrapNestedDefault(loadedModule.default)
    }

    if (isRecord(loadedModule) && loadedModule.config !== undefined) {
      return loadedModule.config
    }

    throw new Error(`Config module ${configFilePath} must export default or named "config"`)
  } finally {
    await rm(tempDirectory, { recursive: true, force: true })
  }
}

const unwrapNestedDefault = (value: unknown): unknown => {
  if (!isRecord(value)) {
    return value
  }

  if ('default' in value) {
    return value.default
  }

  return value
}

/**
 * Validates a raw config object.
 *
 * @param value Config value as loaded from TS, JSON or YAML.
 * @returns Typed config.
 * @throws Error naming the path of the first invalid value.
 */
export const parseStepLineConfig = (value: unknown): StepLineConfig => {
  if (!isRecord(value)) {
    throw new Error('Config must be an object')
  }

  const name = parseOptionalString(value.name, 'name') ?? DEFAULT_PIPELINE_NAME
  const on = parseTriggers(value.on)
  const jobs = parseJobs(value.jobs)

  const concurrency = parseOptionalPositiveInteger(value.concurrency, 'concurrency')
  const env = parseOptionalStringRecord(value.env, 'env')
  const cwd = parseOptionalString(value.cwd, 'cwd')
  const limits = parseLimitsConfig(value.limits)
  const output = parseOutputConfig(value.output)
  const watch = parseWatchConfig(value.watch)

  return {
    name,
    on,
    jobs,
    concurrency,
    env,
    cwd,
    limits,
    output,
    watch,
  }
}

const parseTriggers = (value: unknown): StepLineConfig['on'] => {
  const triggers: Partial<Record<TriggerEventKind, StepLineTriggerConfig>> = {}

  if (typeof value === 'string') {
    triggers[parseEventKind(value, 'on')] = {}
    return triggers
  }

  if (Array.isArray(value)) {
    if (value.length === 0) {
      throw new Error('on must list at least one event')
    }

    for (const [index, entry] of value.entries()) {
      triggers[parseEventKind(entry, `on[${index}]`)] = {}
    }
    return triggers
  }

  if (!isRecord(value)) {
    throw new Error('on must be an event name, a list of event names or an object')
  }

  const entries = Object.entries(value)
  if (entries.length === 0) {
    throw new Error('on must list at least one event')
  }

  for (const [key, filter] of entries) {
    triggers[parseEventKind(key, 'on')] = parseTriggerFilter(filter, `on.${key}`)
  }
  return triggers
}

const parseTriggerFilter = (value: unknown, path: string): StepLineTriggerConfig => {
  if (value === undefined || value === null) {
    return {}
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const branches = parseOptionalStringList(value.branches, `${path}.branches`)
  const branchesIgnore = parseOptionalStringList(
    value['branches-ignore'] ?? value.branchesIgnore,
    `${path}.branches-ignore`
  )

  return {
    branches,
    branchesIgnore,
  }
}

const parseJobs = (value: unknown): readonly CliConfigJob[] => {
  if (!isRecord(value)) {
    throw new Error('jobs must be an object mapping job ids to jobs')
  }

  const jobs = Object.entries(value).map(([id, job]) => parseConfigJob(id, job))
  if (jobs.length === 0) {
    throw new Error('jobs must define at least one job')
  }

  assertKnownJobReferences(jobs)
  return jobs
}

const parseConfigJob = (id: string, value: unknown): CliConfigJob => {
  const path = `jobs.${id}`
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const name = parseOptionalString(value.name, `${path}.name`) ?? id
  const needs = parseOptionalStringList(value.needs, `${path}.needs`)
  const events = parseOptionalEventKinds(value.events, `${path}.events`)
  const cwd = parseOptionalString(value.cwd, `${path}.cwd`)
  const env = parseOptionalStringRecord(value.env, `${path}.env`)

  if (!Array.isArray(value.steps)) {
    throw new Error(`${path}.steps must be an array`)
  }
  const steps = value.steps.map((step: unknown, index: number) =>
    parseConfigStep(step, id, index)
  )
  assertUniqueStepIds(steps, path)

  return {
    id,
    name,
    needs,
    events,
    cwd,
    env,
    steps,
  }
}

const parseConfigStep = (value: unknown, jobId: string, index: number): CliConfigStep => {
  const path = `jobs.${jobId}.steps[${index}]`
  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const command = parseArgv(value.command, `${path}.command`)
  const args = value.args === undefined ? undefined : parseArgv(value.args, `${path}.args`)
  const id = parseOptionalString(value.id, `${path}.id`) ?? `${jobId}-step-${index + 1}`
  const name = parseOptionalString(value.name, `${path}.name`) ?? command.join(' ')
  const cwd = parseOptionalString(value.cwd, `${path}.cwd`)
  const env = parseOptionalStringRecord(value.env, `${path}.env`)
  const timeoutMs = parseOptionalPositiveInteger(value.timeoutMs, `${path}.timeoutMs`)

  return {
    id,
    name,
    command,
    args,
    cwd,
    env,
    timeoutMs,
  }
}

const assertUniqueStepIds = (steps: readonly CliConfigStep[], path: string): void => {
  const seenById = new Set<string>()

  for (const [index, step] of steps.entries()) {
    if (seenById.has(step.id)) {
      throw new Error(`${path}.steps[${index}].id must be unique (duplicate: ${step.id})`)
    }

    seenById.add(step.id)
  }
}

const assertKnownJobReferences = (jobs: readonly CliConfigJob[]): void => {
  const knownJobIds = new Set(jobs.map((job) => job.id))

  for (const job of jobs) {
    for (const [index, need] of (job.needs ?? []).entries()) {
      if (!knownJobIds.has(need)) {
        throw new Error(`jobs.${job.id}.needs[${index}] references unknown job id: ${need}`)
      }
    }
  }
}

const parseLimitsConfig = (value: unknown): StepLineLimitsConfig | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('limits must be an object')
  }

  return {
    maxOutputBytes: parseOptionalPositiveInteger(value.maxOutputBytes, 'limits.maxOutputBytes'),
    killGraceMs: parseOptionalPositiveInteger(value.killGraceMs, 'limits.killGraceMs'),
    stepTimeoutMs: parseOptionalPositiveInteger(value.stepTimeoutMs, 'limits.stepTimeoutMs'),
  }
}

const parseOutputConfig = (value: unknown): StepLineConfig['output'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('output must be an object')
  }

  const format = value.format
  if (format !== undefined && format !== 'pretty' && format !== 'json') {
    throw new Error('output.format must be "pretty" or "json"')
  }

  const verbose = parseOptionalBoolean(value.verbose, 'output.verbose')

  return {
    format,
    verbose,
  }
}

const parseWatchConfig = (value: unknown): StepLineConfig['watch'] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error('watch must be an object')
  }

  const exclude = parseOptionalStringList(value.exclude, 'watch.exclude')

  return {
    exclude,
  }
}

const parseEventKind = (value: unknown, path: string): TriggerEventKind => {
  const kind = EVENT_KINDS.find((candidate) => candidate === value)
  if (!kind) {
    throw new Error(`${path} must name a supported event (${EVENT_KINDS.join(', ')})`)
  }

  return kind
}

const parseOptionalEventKinds = (
  value: unknown,
  path: string
): readonly TriggerEventKind[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be an array`)
  }

  return value.map((entry: unknown, index: number) => parseEventKind(entry, `${path}[${index}]`))
}

/**
 * Accepts an argv list or a whitespace-separated string.
 */
const parseArgv = (value: unknown, path: string): readonly string[] => {
  if (typeof value === 'string') {
    const parts = value.split(/\s+/u).filter((part) => part.length > 0)
    if (parts.length === 0) {
      throw new Error(`${path} must not be empty`)
    }
    return parts
  }

  if (!Array.isArray(value) || value.length === 0) {
    throw new Error(`${path} must be a non-empty string or a non-empty array of strings`)
  }

  return parseStringArray(value, path)
}

const parseOptionalString = (value: unknown, path: string): string | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new Error(`${path} must be a non-empty string`)
  }

  return value
}

const parseOptionalPositiveInteger = (value: unknown, path: string): number | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new Error(`${path} must be a positive integer`)
  }

  return value
}

const parseOptionalBoolean = (value: unknown, path: string): boolean | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value !== 'boolean') {
    throw new Error(`${path} must be a boolean`)
  }

  return value
}

/**
 * Accepts a single string or an array of strings.
 */
const parseOptionalStringList = (value: unknown, path: string): readonly string[] | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (typeof value === 'string' && value.length > 0) {
    return [value]
  }

  if (!Array.isArray(value)) {
    throw new Error(`${path} must be a string or an array of strings`)
  }

  return parseStringArray(value, path)
}

const parseStringArray = (value: readonly unknown[], path: string): readonly string[] => {
  const result: string[] = []
  for (const [index, entry] of value.entries()) {
    if (typeof entry !== 'string' || entry.length === 0) {
      throw new Error(`${path}[${index}] must be a non-empty string`)
    }
    result.push(entry)
  }

  return result
}

const parseOptionalStringRecord = (
  value: unknown,
  path: string
): Readonly<Record<string, string>> | undefined => {
  if (value === undefined) {
    return undefined
  }

  if (!isRecord(value)) {
    throw new Error(`${path} must be an object`)
  }

  const entries = Object.entries(value)
  const parsed: Record<string, string> = {}

  for (const [key, entryValue] of entries) {
    if (typeof entryValue === 'number' || typeof entryValue === 'boolean') {
      parsed[key] = String(entryValue)
      continue
    }
    if (typeof entryValue !== 'string') {
      throw new Error(`${path}.${key} must be a string`)
    }
    parsed[key] = entryValue
  }

  return parsed
}

const isRecord = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
