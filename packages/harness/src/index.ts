export { EnvSource, type EnvSourceOptions } from "./adapters/env/env-source"
export { JsonSource, type JsonSourceOptions } from "./adapters/json/json-source"
export { Config } from "./core/config"
export {
  CONFIG_FILE,
  DEFAULT_SAMPLES_DIR,
  type HarnessConfig,
  type HarnessEnv,
  harnessEnvSchema,
  loadHarnessConfig,
  mapEnvToConfig,
} from "./core/harness-config"
export { ConfigError, type LoadConfigOptions, loadConfig } from "./core/load-config"
export {
  type LoadedSamples,
  type LoadSamplesOptions,
  loadSamples,
  SampleError,
} from "./core/load-samples"
export {
  type SampleReport,
  type VerifyDeps,
  type VerifyOptions,
  type VerifyResult,
  verifySamples,
} from "./core/verify-samples"
export type { IConfig } from "./ports/config"
export type { RoundTripSample, SkippedSample, SkipReason } from "./ports/sample"
export type { ConfigSource } from "./ports/source"
