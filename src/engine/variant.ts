// src/engine/variant.ts
import type { z } from "zod";
import { ModelBuilder } from "./builder";
import { InvalidParameterError, InvariantViolationError } from "./errors";
import { verifyResult } from "./invariants";
import { MEMBER_ROLES } from "./types";
import type { GenerationResult, ModelPreview, RoleCounts, TopologyKind } from "./types";

/** Parameters turned into concrete dimensions and counts, ready to build. */
export interface Layout {
  warnings: string[];
}

export interface LayoutCounts {
  joints: number;
  plates: number;
  byRole: RoleCounts;
  derived: Record<string, number>;
}

/**
 * One topology family. Coordinate and connectivity synthesis live in `build`;
 * `predict` must agree with it exactly.
 */
export interface TopologyVariant<P, L extends Layout> {
  kind: TopologyKind;
  schema: z.ZodType<P, z.ZodTypeDef, unknown>;
  /** Whether every joint must be reachable from every other through members */
  connected: boolean;
  resolve(params: P): L;
  predict(layout: L): LayoutCounts;
  build(layout: L, builder: ModelBuilder): void;
}

export interface RunnableVariant {
  kind: TopologyKind;
  preview(params: unknown): ModelPreview;
  generate(params: unknown): GenerationResult;
}

/** Drops zero entries so predicted and generated role counts compare directly. */
export function compactCounts(counts: RoleCounts): RoleCounts {
  const out: RoleCounts = {};
  for (const role of MEMBER_ROLES) {
    const n = counts[role];
    if (n) out[role] = n;
  }
  return out;
}

function sumCounts(counts: RoleCounts): number {
  return Object.values(counts).reduce((a, b) => a + (b ?? 0), 0);
}

export function defineVariant<P, L extends Layout>(variant: TopologyVariant<P, L>): RunnableVariant {
  const resolve = (raw: unknown) => {
    const parsed = variant.schema.safeParse(raw);
    if (!parsed.success) throw InvalidParameterError.fromZod(parsed.error);
    return variant.resolve(parsed.data);
  };

  return {
    kind: variant.kind,

    preview(raw) {
      const layout = resolve(raw);
      const counts = variant.predict(layout);
      const byRole = compactCounts(counts.byRole);
      return {
        kind: variant.kind,
        joints: counts.joints,
        members: sumCounts(byRole),
        plates: counts.plates,
        byRole,
        derived: counts.derived,
        warnings: [...layout.warnings]
      };
    },

    generate(raw) {
      const layout = resolve(raw);
      const builder = new ModelBuilder();
      layout.warnings.forEach(w => builder.warn(w));
      variant.build(layout, builder);
      const result = builder.finish(variant.kind);
      const violations = verifyResult(result, { connected: variant.connected });
      if (violations.length) throw new InvariantViolationError(violations);
      return result;
    }
  };
}
