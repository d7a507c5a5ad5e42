import type { PluginArgs, ResourceSpec } from "./pluginArgs.js";
import {
  SCHEDULER_CONFIGURATION_KIND,
  V1BETA2,
  type Plugin,
  type PluginConfig,
  type Plugins,
  type PluginSet,
  type Policy,
} from "./types.js";

export const DEFAULT_SCHEDULER_NAME = "default-scheduler";

function enabled(...plugins: (string | Plugin)[]): PluginSet {
  return {
    enabled: plugins.map(plugin => (typeof plugin === "string" ? { name: plugin } : { ...plugin })),
  };
}

function defaultResources(): ResourceSpec[] {
  return [
    { name: "cpu", weight: 1 },
    { name: "memory", weight: 1 },
  ];
}

function defaultPlugins(): Plugins {
  return {
    queueSort: enabled("PrioritySort"),
    preFilter: enabled(
      "NodeResourcesFit",
      "NodePorts",
      "VolumeRestrictions",
      "PodTopologySpread",
      "InterPodAffinity",
      "VolumeBinding",
      "NodeAffinity",
    ),
    filter: enabled(
      "NodeUnschedulable",
      "NodeName",
      "TaintToleration",
      "NodeAffinity",
      "NodePorts",
      "NodeResourcesFit",
      "VolumeRestrictions",
      "EBSLimits",
      "GCEPDLimits",
      "NodeVolumeLimits",
      "AzureDiskLimits",
      "VolumeBinding",
      "VolumeZone",
      "PodTopologySpread",
      "InterPodAffinity",
    ),
    postFilter: enabled("DefaultPreemption"),
    preScore: enabled("InterPodAffinity", "PodTopologySpread", "TaintToleration", "NodeAffinity"),
    score: enabled(
      { name: "NodeResourcesBalancedAllocation", weight: 1 },
      { name: "ImageLocality", weight: 1 },
      { name: "InterPodAffinity", weight: 1 },
      { name: "NodeResourcesFit", weight: 1 },
      { name: "NodeAffinity", weight: 1 },
      { name: "PodTopologySpread", weight: 2 },
      { name: "TaintToleration", weight: 1 },
    ),
    reserve: enabled("VolumeBinding"),
    preBind: enabled("VolumeBinding"),
    bind: enabled("DefaultBinder"),
  };
}

function defaultPluginConfig(): PluginConfig<PluginArgs>[] {
  return [
    {
      name: "DefaultPreemption",
      args: {
        apiVersion: V1BETA2,
        kind: "DefaultPreemptionArgs",
        minCandidateNodesPercentage: 10,
        minCandidateNodesAbsolute: 100,
      },
    },
    {
      name: "InterPodAffinity",
      args: { apiVersion: V1BETA2, kind: "InterPodAffinityArgs", hardPodAffinityWeight: 1 },
    },
    {
      name: "NodeAffinity",
      args: { apiVersion: V1BETA2, kind: "NodeAffinityArgs" },
    },
    {
      name: "NodeResourcesBalancedAllocation",
      args: { apiVersion: V1BETA2, kind: "NodeResourcesBalancedAllocationArgs", resources: defaultResources() },
    },
    {
      name: "NodeResourcesFit",
      args: {
        apiVersion: V1BETA2,
        kind: "NodeResourcesFitArgs",
        scoringStrategy: { type: "LeastAllocated", resources: defaultResources() },
      },
    },
    {
      name: "PodTopologySpread",
      args: { apiVersion: V1BETA2, kind: "PodTopologySpreadArgs", defaultingType: "System" },
    },
    {
      name: "VolumeBinding",
      args: { apiVersion: V1BETA2, kind: "VolumeBindingArgs", bindTimeoutSeconds: 600 },
    },
  ];
}

/**
 * The scheduler configuration used when no configuration file is given: one
 * `default-scheduler` profile with the in-tree plugins and their default args.
 * Every call returns a new object.
 */
export function defaultSchedulerConfig(): Policy {
  return {
    apiVersion: V1BETA2,
    kind: SCHEDULER_CONFIGURATION_KIND,
    parallelism: 16,
    percentageOfNodesToScore: 0,
    podInitialBackoffSeconds: 1,
    podMaxBackoffSeconds: 10,
    profiles: [
      {
        schedulerName: DEFAULT_SCHEDULER_NAME,
        plugins: defaultPlugins(),
        pluginConfig: defaultPluginConfig(),
      },
    ],
  };
}
