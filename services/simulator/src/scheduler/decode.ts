import { pluginArgsKindFor, pluginArgsScheme, type PluginArgs } from "./pluginArgs.js";
import { Scheme } from "./scheme.js";
import {
  RawSchedulerConfigurationSchema,
  SCHEDULER_CONFIGURATION_KIND,
  UnsupportedSchedulerConfigurationSchema,
  V1,
  V1BETA2,
  V1BETA3,
  type PluginConfig,
  type Policy,
  type RawSchedulerConfiguration,
  type SchedulerDocument,
  type SchedulerProfile,
} from "./types.js";

export type DecodeErrorReason = "unrecognized document" | "type mismatch" | "decode nested plugin args";

export class DecodeError extends Error {
  readonly reason: DecodeErrorReason;
  /** The offending element: a document type or a plugin name. */
  readonly element?: string;

  constructor(reason: DecodeErrorReason, detail: string, options: { element?: string; cause?: unknown } = {}) {
    super(`${reason}: ${detail}`, { cause: options.cause });
    this.name = "DecodeError";
    this.reason = reason;
    this.element = options.element;
  }
}

export const schedulerConfigScheme = new Scheme<SchedulerDocument>("scheduler configuration")
  .register(V1BETA2, SCHEDULER_CONFIGURATION_KIND, RawSchedulerConfigurationSchema)
  .register(V1BETA3, SCHEDULER_CONFIGURATION_KIND, UnsupportedSchedulerConfigurationSchema)
  .register(V1, SCHEDULER_CONFIGURATION_KIND, UnsupportedSchedulerConfigurationSchema);

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodePluginArgs(pluginName: string, payload: unknown): PluginArgs {
  const expectedKind = pluginArgsKindFor(pluginName);
  if (!pluginArgsScheme.recognizes({ apiVersion: V1BETA2, kind: expectedKind })) {
    throw new DecodeError(
      "decode nested plugin args",
      `plugin ${pluginName} has no registered args kind ${expectedKind}`,
      { element: pluginName },
    );
  }

  let args: PluginArgs;
  try {
    args = pluginArgsScheme.decodeObject(payload, { apiVersion: V1BETA2, kind: expectedKind });
  } catch (error) {
    throw new DecodeError(
      "decode nested plugin args",
      `decoding args for plugin ${pluginName}: ${describeError(error)}`,
      { element: pluginName, cause: error },
    );
  }

  if (args.kind !== expectedKind) {
    throw new DecodeError(
      "decode nested plugin args",
      `args for plugin ${pluginName} were not of type ${expectedKind}, got ${args.kind}`,
      { element: pluginName },
    );
  }
  return args;
}

function decodePluginConfig(entry: PluginConfig<unknown>): PluginConfig<PluginArgs> {
  // `args:` written without a value carries nothing to decode.
  if (entry.args === undefined || entry.args === null) {
    return { name: entry.name };
  }
  return { name: entry.name, args: decodePluginArgs(entry.name, entry.args) };
}

function decodeProfile(profile: SchedulerProfile<unknown>): SchedulerProfile<PluginArgs> {
  const { pluginConfig, ...rest } = profile;
  if (pluginConfig === undefined) {
    return rest;
  }
  return { ...rest, pluginConfig: pluginConfig.map(decodePluginConfig) };
}

/**
 * Replaces every raw plugin args payload with its typed form. Builds a new
 * configuration, so a failure leaves nothing half decoded.
 */
export function decodeNestedObjects(config: RawSchedulerConfiguration): Policy {
  const { profiles, ...rest } = config;
  if (profiles === undefined) {
    return rest;
  }
  return { ...rest, profiles: profiles.map(decodeProfile) };
}

/**
 * Decodes a KubeSchedulerConfiguration (v1beta2) document, including the args
 * of every configured plugin.
 */
export function decodeSchedulerConfig(data: Uint8Array | string): Policy {
  let document: SchedulerDocument;
  try {
    document = schedulerConfigScheme.decode(data);
  } catch (error) {
    throw new DecodeError("unrecognized document", describeError(error), { cause: error });
  }

  if (document.apiVersion !== V1BETA2) {
    throw new DecodeError(
      "type mismatch",
      `expected ${V1BETA2}, Kind=${SCHEDULER_CONFIGURATION_KIND}, got ${document.apiVersion}, Kind=${document.kind}`,
      { element: `${document.apiVersion}, Kind=${document.kind}` },
    );
  }

  return decodeNestedObjects(document);
}
