/**
 * Shared Configuration
 *
 * Analyzer configuration loading plus the zod schemas used at every
 * boundary where data enters the analyzer.
 */

export * from './schemas';
export {
  DEFAULT_ANALYZER_CONFIG,
  loadAnalyzerConfig,
  mergeConfigInput,
  readConfigFromEnv,
} from './analyzer-config';
export {
  readEnvBoolean,
  readEnvList,
  readEnvNumber,
  readEnvString,
} from './utils/env-parsing';
