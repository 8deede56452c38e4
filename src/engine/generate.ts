// src/engine/generate.ts
import type { TopologyParamsInput } from "./params";
import { VARIANTS } from "./topologies";
import { TOPOLOGY_KINDS } from "./types";
import type { GenerationResult, MemberRole, ModelPreview, RoleCounts, TopologyKind } from "./types";

export function isTopologyKind(value: string): value is TopologyKind {
  return TOPOLOGY_KINDS.some(kind => kind === value);
}

/**
 * Builds the joints, members and roles of one structure. Pure: the same
 * input always yields an identical, independent result. Throws
 * InvalidParameterError (or its InfeasibleTopologyError subclass) before
 * anything is built.
 */
export function generate<K extends TopologyKind>(kind: K, params: TopologyParamsInput<K>): GenerationResult {
  return VARIANTS[kind].generate(params);
}

/** Same as generate, for parameters that have not been typed yet (forms, job files). */
export function generateUnknown(kind: TopologyKind, params: unknown): GenerationResult {
  return VARIANTS[kind].generate(params);
}

/** Exact counts and derived figures without building any geometry. */
export function preview<K extends TopologyKind>(kind: K, params: TopologyParamsInput<K>): ModelPreview {
  return VARIANTS[kind].preview(params);
}

export function previewUnknown(kind: TopologyKind, params: unknown): ModelPreview {
  return VARIANTS[kind].preview(params);
}

/** Member ids grouped by role, in id order. Every member appears under exactly one role. */
export function roleSets(result: GenerationResult): Record<MemberRole, number[]> {
  const out: Record<MemberRole, number[]> = {
    "chord-top": [], "chord-bottom": [], diagonal: [], vertical: [], column: [],
    beam: [], rafter: [], purlin: [], bracing: [], "plate-edge": []
  };
  result.roles.forEach((role, id) => out[role].push(id));
  return out;
}

export function countRoles(result: GenerationResult): RoleCounts {
  const counts: RoleCounts = {};
  result.roles.forEach(role => { counts[role] = (counts[role] ?? 0) + 1; });
  return counts;
}
