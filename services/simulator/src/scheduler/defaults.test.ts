import { describe, expect, it } from "vitest";

import { decodeNestedObjects } from "./decode.js";
import { DEFAULT_SCHEDULER_NAME, defaultSchedulerConfig } from "./defaults.js";
import { V1BETA2 } from "./types.js";

describe("defaultSchedulerConfig", () => {
  it("describes a single default-scheduler profile", () => {
    const config = defaultSchedulerConfig();

    expect(config.apiVersion).toBe(V1BETA2);
    expect(config.kind).toBe("KubeSchedulerConfiguration");
    expect(config.parallelism).toBe(16);
    expect(config.podInitialBackoffSeconds).toBe(1);
    expect(config.podMaxBackoffSeconds).toBe(10);
    expect(config.profiles?.map(profile => profile.schedulerName)).toEqual([DEFAULT_SCHEDULER_NAME]);
  });

  it("enables the in-tree plugins at each extension point", () => {
    const plugins = defaultSchedulerConfig().profiles?.[0]?.plugins;

    expect(plugins?.queueSort?.enabled).toEqual([{ name: "PrioritySort" }]);
    expect(plugins?.postFilter?.enabled).toEqual([{ name: "DefaultPreemption" }]);
    expect(plugins?.bind?.enabled).toEqual([{ name: "DefaultBinder" }]);
    expect(plugins?.score?.enabled?.find(plugin => plugin.name === "PodTopologySpread")).toEqual({
      name: "PodTopologySpread",
      weight: 2,
    });
    expect(plugins?.filter?.enabled).toHaveLength(15);
  });

  it("carries typed args for every configurable plugin", () => {
    const pluginConfig = defaultSchedulerConfig().profiles?.[0]?.pluginConfig ?? [];

    expect(pluginConfig.map(entry => [entry.name, entry.args?.kind])).toEqual([
      ["DefaultPreemption", "DefaultPreemptionArgs"],
      ["InterPodAffinity", "InterPodAffinityArgs"],
      ["NodeAffinity", "NodeAffinityArgs"],
      ["NodeResourcesBalancedAllocation", "NodeResourcesBalancedAllocationArgs"],
      ["NodeResourcesFit", "NodeResourcesFitArgs"],
      ["PodTopologySpread", "PodTopologySpreadArgs"],
      ["VolumeBinding", "VolumeBindingArgs"],
    ]);
    expect(pluginConfig[4]?.args).toEqual({
      apiVersion: V1BETA2,
      kind: "NodeResourcesFitArgs",
      scoringStrategy: {
        type: "LeastAllocated",
        resources: [
          { name: "cpu", weight: 1 },
          { name: "memory", weight: 1 },
        ],
      },
    });
  });

  it("matches the registered plugin args schemas", () => {
    const config = defaultSchedulerConfig();

    expect(decodeNestedObjects(config)).toEqual(config);
  });

  it("returns an independent object on every call", () => {
    const first = defaultSchedulerConfig();
    const second = defaultSchedulerConfig();

    expect(first).toEqual(second);
    expect(first).not.toBe(second);
    expect(first.profiles?.[0]?.plugins?.score).not.toBe(second.profiles?.[0]?.plugins?.score);
  });
});
