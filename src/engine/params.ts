// src/engine/params.ts
import { z } from "zod";
import type { TopologyKind } from "./types";

export const LIMITS = {
  span: 1000,
  length: 1000,
  width: 500,
  height: 100,
  baySpacing: 50,
  gridBay: 100,
  panels: 20,
  bays: 20,
  stories: 50,
  thickness: 10,
  divisions: 250
} as const;

const dimension = (max: number) =>
  z.number().finite().positive("must be positive").max(max, `must be at most ${max}`);

const count = (max: number) =>
  z.number().int("must be an integer").min(1, "must be at least 1").max(max, `must be at most ${max}`);

function requireOnePanelSource(p: { panelCount?: number; panelLength?: number }, ctx: z.RefinementCtx) {
  if ((p.panelCount === undefined) === (p.panelLength === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["panelCount"],
      message: "give exactly one of panelCount or panelLength"
    });
  }
}

function requireRidgeAboveEave(eave: number, ridge: number, ctx: z.RefinementCtx) {
  if (ridge <= eave) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["ridgeHeight"],
      message: `must exceed eaveHeight (${eave})`
    });
  }
}

export const TrussParamsSchema = z.object({
  span: dimension(LIMITS.span),
  height: dimension(LIMITS.height).optional(),
  eaveHeight: dimension(LIMITS.height).optional(),
  ridgeHeight: dimension(LIMITS.height).optional(),
  panelCount: count(LIMITS.panels).optional(),
  panelLength: dimension(LIMITS.span).optional()
}).superRefine((p, ctx) => {
  requireOnePanelSource(p, ctx);
  const pitched = p.eaveHeight !== undefined || p.ridgeHeight !== undefined;
  if (p.height !== undefined && pitched) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["height"],
      message: "give either height or eaveHeight with ridgeHeight, not both"
    });
  } else if (p.height === undefined && !pitched) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["height"],
      message: "required unless eaveHeight and ridgeHeight are given"
    });
  } else if (pitched) {
    if (p.eaveHeight === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["eaveHeight"], message: "required with ridgeHeight" });
    } else if (p.ridgeHeight === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["ridgeHeight"], message: "required with eaveHeight" });
    } else {
      requireRidgeAboveEave(p.eaveHeight, p.ridgeHeight, ctx);
    }
  }
});

export const BowstringParamsSchema = z.object({
  span: dimension(LIMITS.span),
  height: dimension(LIMITS.height),
  panelCount: count(LIMITS.panels).optional(),
  panelLength: dimension(LIMITS.span).optional()
}).superRefine(requireOnePanelSource);

export const PortalFrameParamsSchema = z.object({
  width: dimension(LIMITS.width),
  eaveHeight: dimension(LIMITS.height),
  ridgeHeight: dimension(LIMITS.height).optional()
}).superRefine((p, ctx) => {
  if (p.ridgeHeight !== undefined) requireRidgeAboveEave(p.eaveHeight, p.ridgeHeight, ctx);
});

export const RigidFrameParamsSchema = z.object({
  width: dimension(LIMITS.width),
  eaveHeight: dimension(LIMITS.height),
  ridgeHeight: dimension(LIMITS.height),
  baySpacing: dimension(LIMITS.baySpacing),
  numBays: count(LIMITS.bays).optional(),
  length: dimension(LIMITS.length).optional(),
  includePurlins: z.boolean().default(false),
  purlinSpacing: z.number().finite().positive("must be positive").optional(),
  includeBracing: z.boolean().default(false)
}).superRefine((p, ctx) => {
  requireRidgeAboveEave(p.eaveHeight, p.ridgeHeight, ctx);
  if (p.numBays === undefined && p.length === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["numBays"], message: "give numBays or length" });
  }
  if (p.includePurlins && p.purlinSpacing === undefined) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["purlinSpacing"],
      message: "required when includePurlins is true"
    });
  }
  if (p.includePurlins && p.purlinSpacing !== undefined && p.purlinSpacing > p.width) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ["purlinSpacing"],
      message: `must be at most the building width (${p.width})`
    });
  }
});

export const BuildingGridParamsSchema = z.object({
  stories: count(LIMITS.stories),
  baysX: count(LIMITS.bays),
  baysZ: count(LIMITS.bays),
  bayWidth: dimension(LIMITS.gridBay),
  bayDepth: dimension(LIMITS.gridBay),
  storyHeight: dimension(LIMITS.height)
});

export const WallSchema = z.object({
  height: dimension(LIMITS.height),
  width: dimension(LIMITS.width),
  thickness: dimension(LIMITS.thickness)
});

export const SlabSchema = z.object({
  length: dimension(LIMITS.length),
  width: dimension(LIMITS.width),
  thickness: dimension(LIMITS.thickness)
});

export const PlateMeshParamsSchema = z.object({
  wall: WallSchema,
  slab: SlabSchema,
  cellSize: dimension(LIMITS.height).default(1)
});

export const PARAMS_SCHEMAS = {
  "warren-truss": TrussParamsSchema,
  "pratt-truss": TrussParamsSchema,
  "howe-truss": TrussParamsSchema,
  "bowstring-arch": BowstringParamsSchema,
  "portal-frame": PortalFrameParamsSchema,
  "rigid-frame": RigidFrameParamsSchema,
  "building-grid": BuildingGridParamsSchema,
  "plate-mesh": PlateMeshParamsSchema
} satisfies Record<TopologyKind, z.ZodTypeAny>;

type Schemas = typeof PARAMS_SCHEMAS;
export type TopologyParams<K extends TopologyKind> = z.output<Schemas[K]>;
export type TopologyParamsInput<K extends TopologyKind> = z.input<Schemas[K]>;

export type TrussParams = z.output<typeof TrussParamsSchema>;
export type BowstringParams = z.output<typeof BowstringParamsSchema>;
export type PortalFrameParams = z.output<typeof PortalFrameParamsSchema>;
export type RigidFrameParams = z.output<typeof RigidFrameParamsSchema>;
export type BuildingGridParams = z.output<typeof BuildingGridParamsSchema>;
export type PlateMeshParams = z.output<typeof PlateMeshParamsSchema>;

/** Whole count of `step` that fits in `total`, tolerant of floating-point shortfall (0.3 / 0.1). */
export function fitCount(total: number, step: number): number {
  return Math.floor(total / step + 1e-9);
}
