/**
 * Scheduler configuration schemas (kubescheduler.config.k8s.io).
 *
 * Only v1beta2 is decoded into a full structure. v1beta3 and v1 documents are
 * recognized by their type tag so that they can be reported as the wrong
 * version instead of an unknown document.
 */

import { z } from "zod";

import type { PluginArgs } from "./pluginArgs.js";

export const V1BETA2 = "kubescheduler.config.k8s.io/v1beta2";
export const V1BETA3 = "kubescheduler.config.k8s.io/v1beta3";
export const V1 = "kubescheduler.config.k8s.io/v1";
export const SCHEDULER_CONFIGURATION_KIND = "KubeSchedulerConfiguration";

export type TypeMeta = {
  apiVersion: string;
  kind: string;
};

// ============================================================================
// Plugins
// ============================================================================

export const EXTENSION_POINTS = [
  "queueSort",
  "preFilter",
  "filter",
  "postFilter",
  "preScore",
  "score",
  "reserve",
  "permit",
  "preBind",
  "bind",
  "postBind",
  "multiPoint",
] as const;
export type ExtensionPoint = (typeof EXTENSION_POINTS)[number];

export type Plugin = {
  name: string;
  weight?: number;
};

export type PluginSet = {
  enabled?: Plugin[];
  disabled?: Plugin[];
};

export type Plugins = Partial<Record<ExtensionPoint, PluginSet>>;

export type PluginConfig<TArgs> = {
  name: string;
  args?: TArgs;
};

// ============================================================================
// Profiles and extenders
// ============================================================================

export type SchedulerProfile<TArgs> = {
  schedulerName?: string;
  plugins?: Plugins;
  pluginConfig?: PluginConfig<TArgs>[];
};

export type ExtenderManagedResource = {
  name: string;
  ignoredByScheduler?: boolean;
};

export type Extender = {
  urlPrefix: string;
  filterVerb?: string;
  preemptVerb?: string;
  prioritizeVerb?: string;
  weight?: number;
  bindVerb?: string;
  enableHTTPS?: boolean;
  httpTimeout?: string;
  nodeCacheCapable?: boolean;
  tlsConfig?: Record<string, unknown>;
  managedResources?: ExtenderManagedResource[];
  ignorable?: boolean;
};

// ============================================================================
// KubeSchedulerConfiguration
// ============================================================================

export type KubeSchedulerConfiguration<TArgs> = {
  apiVersion: typeof V1BETA2;
  kind: typeof SCHEDULER_CONFIGURATION_KIND;
  parallelism?: number;
  leaderElection?: Record<string, unknown>;
  clientConnection?: Record<string, unknown>;
  healthzBindAddress?: string;
  metricsBindAddress?: string;
  enableProfiling?: boolean;
  enableContentionProfiling?: boolean;
  percentageOfNodesToScore?: number;
  podInitialBackoffSeconds?: number;
  podMaxBackoffSeconds?: number;
  profiles?: SchedulerProfile<TArgs>[];
  extenders?: Extender[];
};

/** A configuration as read from a document, plugin args not yet decoded. */
export type RawSchedulerConfiguration = KubeSchedulerConfiguration<unknown>;

/** A fully decoded configuration: every plugin args payload is typed. */
export type Policy = KubeSchedulerConfiguration<PluginArgs>;

/** A scheduler configuration of an API version this simulator does not run. */
export type UnsupportedSchedulerConfiguration = {
  apiVersion: typeof V1BETA3 | typeof V1;
  kind: typeof SCHEDULER_CONFIGURATION_KIND;
};

export type SchedulerDocument = RawSchedulerConfiguration | UnsupportedSchedulerConfiguration;

const int = () => z.number().int();

// Object schemas are strict: an unknown field fails the decode.
const Section = z.record(z.string(), z.unknown());

export const PluginSchema: z.ZodType<Plugin> = z.object({
  name: z.string(),
  weight: int().optional(),
}).strict();

export const PluginSetSchema: z.ZodType<PluginSet> = z.object({
  enabled: z.array(PluginSchema).optional(),
  disabled: z.array(PluginSchema).optional(),
}).strict();

export const PluginsSchema: z.ZodType<Plugins> = z.object({
  queueSort: PluginSetSchema.optional(),
  preFilter: PluginSetSchema.optional(),
  filter: PluginSetSchema.optional(),
  postFilter: PluginSetSchema.optional(),
  preScore: PluginSetSchema.optional(),
  score: PluginSetSchema.optional(),
  reserve: PluginSetSchema.optional(),
  permit: PluginSetSchema.optional(),
  preBind: PluginSetSchema.optional(),
  bind: PluginSetSchema.optional(),
  postBind: PluginSetSchema.optional(),
  multiPoint: PluginSetSchema.optional(),
}).strict();

export const RawPluginConfigSchema: z.ZodType<PluginConfig<unknown>> = z.object({
  name: z.string().min(1),
  args: z.unknown(),
}).strict();

export const RawSchedulerProfileSchema: z.ZodType<SchedulerProfile<unknown>> = z.object({
  schedulerName: z.string().optional(),
  plugins: PluginsSchema.optional(),
  pluginConfig: z.array(RawPluginConfigSchema).optional(),
}).strict();

export const ExtenderSchema: z.ZodType<Extender> = z.object({
  urlPrefix: z.string(),
  filterVerb: z.string().optional(),
  preemptVerb: z.string().optional(),
  prioritizeVerb: z.string().optional(),
  weight: int().optional(),
  bindVerb: z.string().optional(),
  enableHTTPS: z.boolean().optional(),
  httpTimeout: z.string().optional(),
  nodeCacheCapable: z.boolean().optional(),
  tlsConfig: Section.optional(),
  managedResources: z
    .array(z.object({ name: z.string(), ignoredByScheduler: z.boolean().optional() }).strict())
    .optional(),
  ignorable: z.boolean().optional(),
}).strict();

export const RawSchedulerConfigurationSchema: z.ZodType<RawSchedulerConfiguration> = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal(SCHEDULER_CONFIGURATION_KIND),
  parallelism: int().optional(),
  leaderElection: Section.optional(),
  clientConnection: Section.optional(),
  healthzBindAddress: z.string().optional(),
  metricsBindAddress: z.string().optional(),
  enableProfiling: z.boolean().optional(),
  enableContentionProfiling: z.boolean().optional(),
  percentageOfNodesToScore: int().optional(),
  podInitialBackoffSeconds: int().optional(),
  podMaxBackoffSeconds: int().optional(),
  profiles: z.array(RawSchedulerProfileSchema).optional(),
  extenders: z.array(ExtenderSchema).optional(),
}).strict();

export const UnsupportedSchedulerConfigurationSchema: z.ZodType<UnsupportedSchedulerConfiguration> = z.object({
  apiVersion: z.union([z.literal(V1BETA3), z.literal(V1)]),
  kind: z.literal(SCHEDULER_CONFIGURATION_KIND),
});
