// src/engine/invariants.ts
import type { GenerationResult } from "./types";

function isDense(ids: Iterable<number>): boolean {
  let expected = 1;
  for (const id of [...ids].sort((a, b) => a - b)) {
    if (id !== expected) return false;
    expected++;
  }
  return true;
}

/** Number of connected components of the member graph over all joints. */
export function countComponents(result: GenerationResult): number {
  const adjacency = new Map<number, number[]>();
  result.joints.forEach((_, id) => adjacency.set(id, []));
  result.members.forEach(([a, b]) => {
    adjacency.get(a)?.push(b);
    adjacency.get(b)?.push(a);
  });

  const seen = new Set<number>();
  let components = 0;
  for (const start of adjacency.keys()) {
    if (seen.has(start)) continue;
    components++;
    const stack = [start];
    seen.add(start);
    while (stack.length) {
      const current = stack.pop();
      if (current === undefined) break;
      for (const next of adjacency.get(current) ?? []) {
        if (!seen.has(next)) {
          seen.add(next);
          stack.push(next);
        }
      }
    }
  }
  return components;
}

/**
 * Every structural invariant a result must satisfy. An empty list means the
 * result is sound; anything else is a generator defect.
 */
export function verifyResult(result: GenerationResult, options: { connected: boolean }): string[] {
  const violations: string[] = [];

  if (!isDense(result.joints.keys())) violations.push("joint ids are not dense from 1");
  if (!isDense(result.members.keys())) violations.push("member ids are not dense from 1");
  if (!isDense(result.plates.keys())) violations.push("plate ids are not dense from 1");

  result.joints.forEach((xyz, id) => {
    if (!xyz.every(Number.isFinite)) violations.push(`joint ${id} has a non-finite coordinate`);
  });

  const pairs = new Map<string, number>();
  result.members.forEach(([a, b], id) => {
    if (!result.joints.has(a) || !result.joints.has(b)) violations.push(`member ${id} references a missing joint`);
    if (a === b) violations.push(`member ${id} is a self-loop`);
    const pk = a < b ? `${a}-${b}` : `${b}-${a}`;
    const first = pairs.get(pk);
    if (first !== undefined) violations.push(`member ${id} duplicates member ${first}`);
    else pairs.set(pk, id);
    if (!result.roles.has(id)) violations.push(`member ${id} has no role`);
  });
  result.roles.forEach((_, id) => {
    if (!result.members.has(id)) violations.push(`role assigned to missing member ${id}`);
  });

  result.plates.forEach(plate => {
    if (plate.joints.some(j => !result.joints.has(j))) violations.push(`plate ${plate.id} references a missing joint`);
    if (plate.edges.some(m => result.roles.get(m) !== "plate-edge")) {
      violations.push(`plate ${plate.id} is bounded by a member that is not a plate edge`);
    }
  });

  if (options.connected && result.joints.size > 0) {
    const components = countComponents(result);
    if (components !== 1) violations.push(`member graph has ${components} components`);
  }

  return violations;
}
