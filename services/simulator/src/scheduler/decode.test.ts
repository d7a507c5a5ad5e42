import { describe, expect, it } from "vitest";

import { DecodeError, decodeNestedObjects, decodeSchedulerConfig } from "./decode.js";
import { V1BETA2, type RawSchedulerConfiguration } from "./types.js";

function configWithPluginConfig(pluginConfig: string): string {
  return `
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
profiles:
  - schedulerName: default-scheduler
    pluginConfig:
${pluginConfig}
`;
}

function captureDecodeError(data: string | Uint8Array): DecodeError {
  try {
    decodeSchedulerConfig(data);
  } catch (error) {
    if (error instanceof DecodeError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected decoding to fail");
}

describe("decodeSchedulerConfig", () => {
  it("decodes plugin args into their typed form", () => {
    const policy = decodeSchedulerConfig(`
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
profiles:
  - schedulerName: default-scheduler
    plugins:
      score:
        enabled:
          - name: NodeResourcesFit
            weight: 3
    pluginConfig:
      - name: NodeResourcesFit
        args:
          scoringStrategy:
            type: MostAllocated
            resources:
              - name: cpu
                weight: 2
`);

    expect(policy).toEqual({
      apiVersion: V1BETA2,
      kind: "KubeSchedulerConfiguration",
      profiles: [
        {
          schedulerName: "default-scheduler",
          plugins: { score: { enabled: [{ name: "NodeResourcesFit", weight: 3 }] } },
          pluginConfig: [
            {
              name: "NodeResourcesFit",
              args: {
                apiVersion: V1BETA2,
                kind: "NodeResourcesFitArgs",
                scoringStrategy: { type: "MostAllocated", resources: [{ name: "cpu", weight: 2 }] },
              },
            },
          ],
        },
      ],
    });
  });

  it("decodes JSON documents given as bytes", () => {
    const document = {
      apiVersion: V1BETA2,
      kind: "KubeSchedulerConfiguration",
      parallelism: 8,
      profiles: [
        {
          schedulerName: "spread-scheduler",
          pluginConfig: [{ name: "VolumeBinding", args: { bindTimeoutSeconds: 30 } }],
        },
      ],
    };

    const policy = decodeSchedulerConfig(Buffer.from(JSON.stringify(document), "utf-8"));

    expect(policy.parallelism).toBe(8);
    expect(policy.profiles?.[0]?.pluginConfig?.[0]?.args).toEqual({
      apiVersion: V1BETA2,
      kind: "VolumeBindingArgs",
      bindTimeoutSeconds: 30,
    });
  });

  it("accepts args that declare their own matching type", () => {
    const policy = decodeSchedulerConfig(
      configWithPluginConfig(`
      - name: DefaultPreemption
        args:
          apiVersion: kubescheduler.config.k8s.io/v1beta2
          kind: DefaultPreemptionArgs
          minCandidateNodesPercentage: 20`),
    );

    const args = policy.profiles?.[0]?.pluginConfig?.[0]?.args;
    expect(args?.kind).toBe("DefaultPreemptionArgs");
    if (args?.kind === "DefaultPreemptionArgs") {
      expect(args.minCandidateNodesPercentage).toBe(20);
    }
  });

  it("keeps plugin config entries without args as they are", () => {
    const policy = decodeSchedulerConfig(
      configWithPluginConfig(`
      - name: PrioritySort
      - name: InterPodAffinity
        args:`),
    );

    expect(policy.profiles?.[0]?.pluginConfig).toEqual([{ name: "PrioritySort" }, { name: "InterPodAffinity" }]);
  });

  it("decodes every profile", () => {
    const policy = decodeSchedulerConfig(`
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
profiles:
  - schedulerName: first
    pluginConfig:
      - name: InterPodAffinity
        args:
          hardPodAffinityWeight: 5
  - schedulerName: second
    pluginConfig:
      - name: PodTopologySpread
        args:
          defaultingType: List
          defaultConstraints:
            - maxSkew: 1
              topologyKey: topology.kubernetes.io/zone
              whenUnsatisfiable: ScheduleAnyway
`);

    expect(policy.profiles?.map(profile => profile.pluginConfig?.[0]?.args?.kind)).toEqual([
      "InterPodAffinityArgs",
      "PodTopologySpreadArgs",
    ]);
  });

  it("rejects documents of an unregistered kind", () => {
    const error = captureDecodeError("apiVersion: v1\nkind: Pod\nmetadata:\n  name: nginx\n");

    expect(error.reason).toBe("unrecognized document");
    expect(error.message).toBe(
      'unrecognized document: no scheduler configuration kind "Pod" is registered for version "v1"',
    );
  });

  it("rejects documents without type fields", () => {
    const error = captureDecodeError("profiles: []\n");

    expect(error.reason).toBe("unrecognized document");
    expect(error.message).toBe("unrecognized document: scheduler configuration document is missing apiVersion or kind");
  });

  it("rejects malformed documents", () => {
    const error = captureDecodeError("apiVersion: [unterminated\n");

    expect(error.reason).toBe("unrecognized document");
  });

  it("rejects a registered kind whose fields do not match its schema", () => {
    const error = captureDecodeError(`
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
parallelism: many
`);

    expect(error.reason).toBe("unrecognized document");
    expect(error.message).toBe(
      "unrecognized document: invalid KubeSchedulerConfiguration: parallelism: Expected number, received string",
    );
  });

  it("rejects a misspelled top-level field", () => {
    const error = captureDecodeError(`
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
parallelizm: 8
`);

    expect(error.reason).toBe("unrecognized document");
    expect(error.message).toBe(
      "unrecognized document: invalid KubeSchedulerConfiguration: Unrecognized key(s) in object: 'parallelizm'",
    );
  });

  it("rejects a misspelled profile field", () => {
    const error = captureDecodeError(`
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
profiles:
  - schedulerNam: default-scheduler
`);

    expect(error.message).toBe(
      "unrecognized document: invalid KubeSchedulerConfiguration: profiles.0: Unrecognized key(s) in object: 'schedulerNam'",
    );
  });

  it("accepts the leader election and client connection sections", () => {
    const policy = decodeSchedulerConfig(`
apiVersion: kubescheduler.config.k8s.io/v1beta2
kind: KubeSchedulerConfiguration
leaderElection:
  leaderElect: false
clientConnection:
  kubeconfig: /etc/kubernetes/scheduler.conf
`);

    expect(policy.leaderElection).toEqual({ leaderElect: false });
    expect(policy.clientConnection).toEqual({ kubeconfig: "/etc/kubernetes/scheduler.conf" });
  });

  it("rejects scheduler configurations of another version", () => {
    const error = captureDecodeError(`
apiVersion: kubescheduler.config.k8s.io/v1beta3
kind: KubeSchedulerConfiguration
profiles:
  - schedulerName: default-scheduler
`);

    expect(error.reason).toBe("type mismatch");
    expect(error.element).toBe("kubescheduler.config.k8s.io/v1beta3, Kind=KubeSchedulerConfiguration");
  });

  it("rejects args for a plugin with no registered args kind", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: CustomPlugin
        args:
          threshold: 3`),
    );

    expect(error.reason).toBe("decode nested plugin args");
    expect(error.element).toBe("CustomPlugin");
    expect(error.message).toBe(
      "decode nested plugin args: plugin CustomPlugin has no registered args kind CustomPluginArgs",
    );
  });

  it("rejects args declared as another plugin's kind", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: NodeResourcesFit
        args:
          kind: VolumeBindingArgs
          bindTimeoutSeconds: 60`),
    );

    expect(error.element).toBe("NodeResourcesFit");
    expect(error.message).toBe(
      "decode nested plugin args: args for plugin NodeResourcesFit were not of type NodeResourcesFitArgs, got VolumeBindingArgs",
    );
  });

  it("rejects args declared with an unregistered version", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: VolumeBinding
        args:
          apiVersion: kubescheduler.config.k8s.io/v1beta3
          bindTimeoutSeconds: 60`),
    );

    expect(error.element).toBe("VolumeBinding");
    expect(error.message).toBe(
      'decode nested plugin args: decoding args for plugin VolumeBinding: no plugin args kind "VolumeBindingArgs" is registered for version "kubescheduler.config.k8s.io/v1beta3"',
    );
  });

  it("rejects args whose fields do not match the plugin's schema", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: VolumeBinding
        args:
          bindTimeoutSeconds: ten`),
    );

    expect(error.reason).toBe("decode nested plugin args");
    expect(error.message).toBe(
      "decode nested plugin args: decoding args for plugin VolumeBinding: invalid VolumeBindingArgs: bindTimeoutSeconds: Expected number, received string",
    );
  });

  it("rejects args with a misspelled field", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: VolumeBinding
        args:
          bindTimeoutSecond: 60`),
    );

    expect(error.reason).toBe("decode nested plugin args");
    expect(error.element).toBe("VolumeBinding");
    expect(error.message).toBe(
      "decode nested plugin args: decoding args for plugin VolumeBinding: invalid VolumeBindingArgs: Unrecognized key(s) in object: 'bindTimeoutSecond'",
    );
  });

  it("rejects a misspelled field nested inside args", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: NodeResourcesFit
        args:
          scoringStrategy:
            typ: MostAllocated`),
    );

    expect(error.message).toBe(
      "decode nested plugin args: decoding args for plugin NodeResourcesFit: invalid NodeResourcesFitArgs: scoringStrategy: Unrecognized key(s) in object: 'typ'",
    );
  });

  it("rejects args that are not a mapping", () => {
    const error = captureDecodeError(
      configWithPluginConfig(`
      - name: InterPodAffinity
        args: "hardPodAffinityWeight: 1"`),
    );

    expect(error.element).toBe("InterPodAffinity");
    expect(error.message).toBe(
      "decode nested plugin args: decoding args for plugin InterPodAffinity: plugin args document must be a mapping",
    );
  });
});

describe("decodeNestedObjects", () => {
  it("returns a new configuration and leaves the raw one untouched", () => {
    const raw: RawSchedulerConfiguration = {
      apiVersion: V1BETA2,
      kind: "KubeSchedulerConfiguration",
      profiles: [{ schedulerName: "default-scheduler", pluginConfig: [{ name: "NodeAffinity", args: {} }] }],
    };

    const policy = decodeNestedObjects(raw);

    expect(policy.profiles?.[0]?.pluginConfig?.[0]?.args).toEqual({ apiVersion: V1BETA2, kind: "NodeAffinityArgs" });
    expect(raw.profiles?.[0]?.pluginConfig?.[0]?.args).toEqual({});
  });

  it("passes configurations without profiles through", () => {
    const raw: RawSchedulerConfiguration = { apiVersion: V1BETA2, kind: "KubeSchedulerConfiguration", parallelism: 4 };

    expect(decodeNestedObjects(raw)).toEqual(raw);
  });
});
