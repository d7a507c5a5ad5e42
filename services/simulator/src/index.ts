export {
  ConfigError,
  DEFAULT_KUBE_API_HOST,
  loadConfig,
  resolveConfig,
  type ConfigResolutionStep,
  type LoadConfigOptions,
  type ResolveConfigOptions,
  type ResolvedConfiguration,
} from "./config/loadConfig.js";
export {
  emptySettings,
  loadSettings,
  readSettingsFile,
  SETTINGS_FILE,
  type SettingsReadResult,
  type SettingsRecord,
} from "./config/settings.js";
export { InvalidURLError, validateUrls } from "./config/validateUrls.js";
export {
  CredentialError,
  loadAmbientClusterCredential,
  type ClientConfigLoadingOptions,
  type ClusterCredential,
} from "./kube/clientConfig.js";
export { DecodeError, decodeNestedObjects, decodeSchedulerConfig, type DecodeErrorReason } from "./scheduler/decode.js";
export { DEFAULT_SCHEDULER_NAME, defaultSchedulerConfig } from "./scheduler/defaults.js";
export type * from "./scheduler/pluginArgs.js";
export type * from "./scheduler/types.js";
export { Scheme, SchemeError } from "./scheduler/scheme.js";
