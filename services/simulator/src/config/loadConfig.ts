import fs from "node:fs";

import { loadAmbientClusterCredential, type ClusterCredential } from "../kube/clientConfig.js";
import { appLogger, type AppLogger } from "../observability/logger.js";
import { decodeSchedulerConfig } from "../scheduler/decode.js";
import { defaultSchedulerConfig } from "../scheduler/defaults.js";
import type { Policy } from "../scheduler/types.js";
import { toError } from "../utils/errorUtils.js";
import { loadSettings, SETTINGS_FILE, type SettingsRecord } from "./settings.js";
import { validateUrls } from "./validateUrls.js";

export const DEFAULT_KUBE_API_HOST = "127.0.0.1";

type ResolvedConfigurationBase = {
  listenPort: number;
  /** kube-apiserver address as `host:port`. */
  apiServerAddress: string;
  etcdEndpoint: string;
  allowedOrigins: readonly string[];
  initialPolicy: Policy;
  externalSchedulerEnabled: boolean;
};

export type ResolvedConfiguration = Readonly<
  ResolvedConfigurationBase &
    (
      | { importEnabled: true; externalClusterCredential: ClusterCredential }
      | { importEnabled: false; externalClusterCredential?: undefined }
    )
>;

export type ConfigResolutionStep =
  | "get CORS allowed origin list"
  | "get kube client config"
  | "get scheduler config";

export class ConfigError extends Error {
  readonly step: ConfigResolutionStep;

  constructor(step: ConfigResolutionStep, cause: unknown) {
    super(`${step}: ${toError(cause).message}`, { cause });
    this.name = "ConfigError";
    this.step = step;
  }
}

export type ResolveConfigOptions = {
  loadClusterCredential?: () => ClusterCredential;
  logger?: AppLogger;
};

export type LoadConfigOptions = ResolveConfigOptions & {
  settingsPath?: string;
};

function deepFreeze<T>(value: T): T {
  if (typeof value === "object" && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    Object.values(value).forEach(child => deepFreeze(child));
  }
  return value;
}

function runStep<T>(step: ConfigResolutionStep, resolve: () => T): T {
  try {
    return resolve();
  } catch (error) {
    throw new ConfigError(step, error);
  }
}

function kubeApiServerAddress(settings: SettingsRecord): string {
  const host = settings.clusterApiHost || DEFAULT_KUBE_API_HOST;
  return `${host}:${settings.clusterApiPort}`;
}

/** Drops `user:password@` from a URL so it can be logged. */
export function stripUserinfo(endpoint: string): string {
  return endpoint.replace(/^([a-z][a-z0-9+.-]*:\/\/)[^/?#@]*@/i, "$1");
}

function readSchedulerConfig(settings: SettingsRecord, logger: AppLogger): Policy {
  const configPath = settings.policyFilePath;
  if (configPath === "") {
    logger.debug("no scheduler config path set; using the default scheduler configuration");
    return defaultSchedulerConfig();
  }

  let data: Buffer;
  try {
    data = fs.readFileSync(configPath);
  } catch (error) {
    throw new Error(`read scheduler config file ${configPath}: ${toError(error).message}`, { cause: error });
  }
  return decodeSchedulerConfig(data);
}

/**
 * Builds the simulator configuration from loaded settings. Steps run in order
 * and the first failure aborts resolution with a {@link ConfigError} naming the
 * step; nothing partial is returned.
 */
export function resolveConfig(settings: SettingsRecord, options: ResolveConfigOptions = {}): ResolvedConfiguration {
  const logger = options.logger ?? appLogger;
  const loadClusterCredential = options.loadClusterCredential ?? (() => loadAmbientClusterCredential());

  const listenPort = settings.listenPort;
  const etcdEndpoint = settings.etcdEndpoint;
  const allowedOrigins = runStep("get CORS allowed origin list", () => validateUrls(settings.allowedOrigins));
  const apiServerAddress = kubeApiServerAddress(settings);

  const importEnabled = settings.importEnabled;
  const externalClusterCredential = importEnabled
    ? runStep("get kube client config", loadClusterCredential)
    : undefined;

  const initialPolicy = runStep("get scheduler config", () => readSchedulerConfig(settings, logger));
  const externalSchedulerEnabled = settings.externalSchedulerEnabled;

  const base: ResolvedConfigurationBase = {
    listenPort,
    apiServerAddress,
    etcdEndpoint,
    allowedOrigins: [...allowedOrigins],
    initialPolicy,
    externalSchedulerEnabled,
  };
  const config: ResolvedConfiguration = externalClusterCredential
    ? { ...base, importEnabled: true, externalClusterCredential }
    : { ...base, importEnabled: false };

  logger.info(
    {
      listenPort,
      apiServerAddress,
      etcdEndpoint: stripUserinfo(etcdEndpoint),
      allowedOrigins: config.allowedOrigins,
      importEnabled: config.importEnabled,
      externalClusterHost: config.externalClusterCredential?.host,
      externalSchedulerEnabled,
      schedulerProfiles: initialPolicy.profiles?.map(profile => profile.schedulerName ?? "") ?? [],
    },
    "resolved simulator configuration",
  );
  return deepFreeze(config);
}

/**
 * Loads the settings file (missing or invalid files fall back to defaults) and
 * resolves the simulator configuration from it.
 */
export function loadConfig(options: LoadConfigOptions = {}): ResolvedConfiguration {
  const { settingsPath = SETTINGS_FILE, ...resolveOptions } = options;
  return resolveConfig(loadSettings(settingsPath), resolveOptions);
}
