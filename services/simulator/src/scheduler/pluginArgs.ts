import { z } from "zod";

import { Scheme } from "./scheme.js";
import { V1BETA2 } from "./types.js";

const int = () => z.number().int();

// ============================================================================
// Shared shapes
// ============================================================================

export const ResourceSpecSchema = z.object({
  name: z.string(),
  weight: int().optional(),
}).strict();
export type ResourceSpec = z.infer<typeof ResourceSpecSchema>;

export const UtilizationShapePointSchema = z.object({
  utilization: int(),
  score: int(),
}).strict();
export type UtilizationShapePoint = z.infer<typeof UtilizationShapePointSchema>;

const NodeSelectorRequirementSchema = z.object({
  key: z.string(),
  operator: z.string(),
  values: z.array(z.string()).optional(),
}).strict();

const NodeSelectorTermSchema = z.object({
  matchExpressions: z.array(NodeSelectorRequirementSchema).optional(),
  matchFields: z.array(NodeSelectorRequirementSchema).optional(),
}).strict();

export const NodeAffinitySchema = z.object({
  requiredDuringSchedulingIgnoredDuringExecution: z
    .object({ nodeSelectorTerms: z.array(NodeSelectorTermSchema) })
    .strict()
    .optional(),
  preferredDuringSchedulingIgnoredDuringExecution: z
    .array(z.object({ weight: int(), preference: NodeSelectorTermSchema }).strict())
    .optional(),
}).strict();
export type NodeAffinity = z.infer<typeof NodeAffinitySchema>;

const LabelSelectorSchema = z.object({
  matchLabels: z.record(z.string(), z.string()).optional(),
  matchExpressions: z
    .array(z.object({ key: z.string(), operator: z.string(), values: z.array(z.string()).optional() }).strict())
    .optional(),
}).strict();

export const TopologySpreadConstraintSchema = z.object({
  maxSkew: int(),
  topologyKey: z.string(),
  whenUnsatisfiable: z.string(),
  minDomains: int().optional(),
  labelSelector: LabelSelectorSchema.optional(),
}).strict();
export type TopologySpreadConstraint = z.infer<typeof TopologySpreadConstraintSchema>;

// ============================================================================
// Plugin args (v1beta2)
// ============================================================================

export const DefaultPreemptionArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("DefaultPreemptionArgs"),
  minCandidateNodesPercentage: int().optional(),
  minCandidateNodesAbsolute: int().optional(),
}).strict();
export type DefaultPreemptionArgs = z.infer<typeof DefaultPreemptionArgsSchema>;

export const InterPodAffinityArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("InterPodAffinityArgs"),
  hardPodAffinityWeight: int().optional(),
}).strict();
export type InterPodAffinityArgs = z.infer<typeof InterPodAffinityArgsSchema>;

export const NodeAffinityArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("NodeAffinityArgs"),
  addedAffinity: NodeAffinitySchema.optional(),
}).strict();
export type NodeAffinityArgs = z.infer<typeof NodeAffinityArgsSchema>;

export const NodeResourcesBalancedAllocationArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("NodeResourcesBalancedAllocationArgs"),
  resources: z.array(ResourceSpecSchema).optional(),
}).strict();
export type NodeResourcesBalancedAllocationArgs = z.infer<typeof NodeResourcesBalancedAllocationArgsSchema>;

export const NodeResourcesFitArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("NodeResourcesFitArgs"),
  ignoredResources: z.array(z.string()).optional(),
  ignoredResourceGroups: z.array(z.string()).optional(),
  scoringStrategy: z
    .object({
      type: z.string().optional(),
      resources: z.array(ResourceSpecSchema).optional(),
      requestedToCapacityRatio: z
        .object({ shape: z.array(UtilizationShapePointSchema).optional() })
        .strict()
        .optional(),
    })
    .strict()
    .optional(),
}).strict();
export type NodeResourcesFitArgs = z.infer<typeof NodeResourcesFitArgsSchema>;

export const PodTopologySpreadArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("PodTopologySpreadArgs"),
  defaultConstraints: z.array(TopologySpreadConstraintSchema).optional(),
  defaultingType: z.string().optional(),
}).strict();
export type PodTopologySpreadArgs = z.infer<typeof PodTopologySpreadArgsSchema>;

export const VolumeBindingArgsSchema = z.object({
  apiVersion: z.literal(V1BETA2),
  kind: z.literal("VolumeBindingArgs"),
  bindTimeoutSeconds: int().optional(),
  shape: z.array(UtilizationShapePointSchema).optional(),
}).strict();
export type VolumeBindingArgs = z.infer<typeof VolumeBindingArgsSchema>;

export type PluginArgs =
  | DefaultPreemptionArgs
  | InterPodAffinityArgs
  | NodeAffinityArgs
  | NodeResourcesBalancedAllocationArgs
  | NodeResourcesFitArgs
  | PodTopologySpreadArgs
  | VolumeBindingArgs;

/**
 * Plugin args kinds keyed by `apiVersion` and `kind`. A plugin named `X` takes
 * args of kind `XArgs`.
 */
export const pluginArgsScheme = new Scheme<PluginArgs>("plugin args")
  .register(V1BETA2, "DefaultPreemptionArgs", DefaultPreemptionArgsSchema)
  .register(V1BETA2, "InterPodAffinityArgs", InterPodAffinityArgsSchema)
  .register(V1BETA2, "NodeAffinityArgs", NodeAffinityArgsSchema)
  .register(V1BETA2, "NodeResourcesBalancedAllocationArgs", NodeResourcesBalancedAllocationArgsSchema)
  .register(V1BETA2, "NodeResourcesFitArgs", NodeResourcesFitArgsSchema)
  .register(V1BETA2, "PodTopologySpreadArgs", PodTopologySpreadArgsSchema)
  .register(V1BETA2, "VolumeBindingArgs", VolumeBindingArgsSchema);

export function pluginArgsKindFor(pluginName: string): string {
  return `${pluginName}Args`;
}
