export type { CliOptions } from './cliOptions.js'
export { getCliHelpText, parseCliOptions } from './cliOptions.js'

export type {
  CliConfigJob,
  CliConfigStep,
  CliOutputFormat,
  StepLineConfig,
  StepLineConfigFile,
  StepLineConfigFileJob,
  StepLineConfigFileStep,
  StepLineConfigFileTrigger,
  StepLineLimitsConfig,
  StepLineTriggerConfig,
  StepLineWatchConfig,
} from './config/types.js'
export { loadStepLineConfig, parseStepLineConfig } from './config/loadConfig.js'
export type { MappedPipeline } from './config/mapConfigToPipeline.js'
export { mapConfigToPipeline, selectConfigJobs } from './config/mapConfigToPipeline.js'

export type { PrettyReporterOptions } from './reporters/prettyReporter.js'
export { PrettyReporter } from './reporters/prettyReporter.js'

export type { RunCliPipelineOptions } from './runPipeline.js'
export { formatErrorMessage, INTERRUPTED_EXIT_CODE, runCliPipeline } from './runPipeline.js'

export type { WatchExcludeRule } from './watch/watchIgnoreMatcher.js'
export {
  createWatchIgnoreMatcher,
  normalizeWatchPath,
  parseWatchExcludeRule,
} from './watch/watchIgnoreMatcher.js'
