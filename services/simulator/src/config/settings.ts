import fs from "node:fs";
import YAML from "yaml";
import { z } from "zod";

import { appLogger, normalizeError } from "../observability/logger.js";
import { isFileNotFound, toError } from "../utils/errorUtils.js";

/**
 * Settings file location, relative to the working directory of the process.
 */
export const SETTINGS_FILE = "./config.yml";

export type SettingsRecord = Readonly<{
  listenPort: number;
  etcdEndpoint: string;
  allowedOrigins: readonly string[];
  /** Read from the file but not consumed by resolution. */
  clusterKubeconfigPath: string;
  clusterApiHost: string;
  clusterApiPort: number;
  policyFilePath: string;
  importEnabled: boolean;
  externalSchedulerEnabled: boolean;
}>;

export type SettingsReadResult =
  | { ok: true; settings: SettingsRecord }
  | { ok: false; reason: "unreadable" | "invalid"; error: Error };

// A key written without a value (`Port:`) parses as null and counts as absent.
const SettingsFileSchema = z.object({
  Port: z.number().int().nullish(),
  EtcdURL: z.string().nullish(),
  CorsAllowedOriginList: z.array(z.string()).nullish(),
  KubeConfig: z.string().nullish(),
  KubeApiHost: z.string().nullish(),
  KubeApiPort: z.number().int().nullish(),
  KubeSchedulerConfigPath: z.string().nullish(),
  ExternalImportEnabled: z.boolean().nullish(),
  ExternalSchedulerEnabled: z.boolean().nullish(),
});
type SettingsFile = z.infer<typeof SettingsFileSchema>;

export function emptySettings(): SettingsRecord {
  return toSettingsRecord({});
}

function toSettingsRecord(file: SettingsFile): SettingsRecord {
  return Object.freeze({
    listenPort: file.Port ?? 0,
    etcdEndpoint: file.EtcdURL ?? "",
    allowedOrigins: Object.freeze([...(file.CorsAllowedOriginList ?? [])]),
    clusterKubeconfigPath: file.KubeConfig ?? "",
    clusterApiHost: file.KubeApiHost ?? "",
    clusterApiPort: file.KubeApiPort ?? 0,
    policyFilePath: file.KubeSchedulerConfigPath ?? "",
    importEnabled: file.ExternalImportEnabled ?? false,
    externalSchedulerEnabled: file.ExternalSchedulerEnabled ?? false,
  });
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/**
 * Reads and validates the settings file without applying any fallback. The
 * caller decides what a failed read means.
 */
export function readSettingsFile(filePath: string): SettingsReadResult {
  let raw: string;
  try {
    raw = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    return { ok: false, reason: "unreadable", error: toError(error) };
  }

  let document: unknown;
  try {
    document = YAML.parse(raw, { version: "1.1" });
  } catch (error) {
    return { ok: false, reason: "invalid", error: toError(error) };
  }

  // An empty document parses as null (or undefined for whitespace only).
  const parsed = SettingsFileSchema.safeParse(document ?? {});
  if (!parsed.success) {
    return {
      ok: false,
      reason: "invalid",
      error: new Error(`settings file ${filePath} is invalid: ${formatIssues(parsed.error)}`),
    };
  }
  return { ok: true, settings: toSettingsRecord(parsed.data) };
}

/**
 * Loads the settings file, treating a missing or invalid file as an empty one.
 * Never throws.
 */
export function loadSettings(filePath: string = SETTINGS_FILE): SettingsRecord {
  const result = readSettingsFile(filePath);
  if (result.ok) {
    return result.settings;
  }
  if (result.reason === "unreadable" && isFileNotFound(result.error)) {
    appLogger.info({ path: filePath }, "settings file not found; using default settings");
  } else {
    appLogger.warn(
      { path: filePath, reason: result.reason, err: normalizeError(result.error) },
      "settings file could not be loaded; using default settings",
    );
  }
  return emptySettings();
}
