// src/engine/topologies/frame.ts
import { key, type ModelBuilder } from "../builder";
import { InfeasibleTopologyError, InvalidParameterError } from "../errors";
import {
  LIMITS, PortalFrameParamsSchema, RigidFrameParamsSchema, fitCount,
  type PortalFrameParams, type RigidFrameParams
} from "../params";
import { defineVariant, type Layout, type LayoutCounts } from "../variant";

export interface FrameLayout extends Layout {
  stations: number;
  baySpacing: number;
  width: number;
  eaveHeight: number;
  /** Absent for a flat-roofed portal */
  ridgeHeight?: number;
  /** Slope divisions between eave and ridge; 0 means no intermediate purlins */
  purlinDivisions: number;
  bracing: boolean;
}

type Side = "left" | "right";
const SIDES: Side[] = ["left", "right"];

const at = (station: number, landmark: string) => key("station", station, landmark);
const slopeAt = (station: number, side: Side, k: number) => key("station", station, `${side}-slope`, k);

export function roofSlopeDegrees(layout: Pick<FrameLayout, "width" | "eaveHeight" | "ridgeHeight">): number {
  if (layout.ridgeHeight === undefined) return 0;
  return Math.atan2(layout.ridgeHeight - layout.eaveHeight, layout.width / 2) * 180 / Math.PI;
}

/** Intermediate purlin joints per slope at each station */
const slopeJoints = (layout: FrameLayout) => Math.max(layout.purlinDivisions - 1, 0);

function predictFrame(layout: FrameLayout): LayoutCounts {
  const { stations, purlinDivisions: n } = layout;
  const bays = stations - 1;
  const gabled = layout.ridgeHeight !== undefined;
  const perStation = (gabled ? 5 : 4) + 2 * slopeJoints(layout);
  return {
    joints: stations * perStation,
    plates: 0,
    byRole: {
      column: 2 * stations,
      rafter: gabled ? 2 * Math.max(n, 1) * stations : 0,
      beam: gabled ? 0 : stations,
      purlin: bays * (3 + 2 * slopeJoints(layout)),
      bracing: layout.bracing ? 4 * bays : 0
    },
    derived: {
      stations,
      bays,
      roofSlopeDegrees: roofSlopeDegrees(layout),
      purlinDivisions: n
    }
  };
}

function buildStation(layout: FrameLayout, s: number, b: ModelBuilder) {
  const { width: w, eaveHeight: eave, ridgeHeight: ridge } = layout;
  const x = s * layout.baySpacing;

  b.addJoint(x, 0, 0, at(s, "left-base"));
  b.addJoint(x, eave, 0, at(s, "left-eave"));
  if (ridge !== undefined) b.addJoint(x, ridge, w / 2, at(s, "ridge"));
  b.addJoint(x, eave, w, at(s, "right-eave"));
  b.addJoint(x, 0, w, at(s, "right-base"));

  if (ridge !== undefined) {
    for (const side of SIDES) {
      const eaveZ = side === "left" ? 0 : w;
      for (let k = 1; k <= slopeJoints(layout); k++) {
        const t = k / layout.purlinDivisions;
        b.addJoint(x, eave + (ridge - eave) * t, eaveZ + (w / 2 - eaveZ) * t, slopeAt(s, side, k));
      }
    }
  }

  b.addMember(b.joint(at(s, "left-base")), b.joint(at(s, "left-eave")), "column");
  if (ridge !== undefined) {
    for (const side of SIDES) {
      const chain = [b.joint(at(s, `${side}-eave`))];
      for (let k = 1; k <= slopeJoints(layout); k++) chain.push(b.joint(slopeAt(s, side, k)));
      chain.push(b.joint(at(s, "ridge")));
      b.addChain(chain, "rafter");
    }
  } else {
    b.addMember(b.joint(at(s, "left-eave")), b.joint(at(s, "right-eave")), "beam");
  }
  b.addMember(b.joint(at(s, "right-base")), b.joint(at(s, "right-eave")), "column");

  b.mark("baseJoints", b.joint(at(s, "left-base")), b.joint(at(s, "right-base")));
  b.mark("eaveJoints", b.joint(at(s, "left-eave")), b.joint(at(s, "right-eave")));
  if (ridge !== undefined) b.mark("ridgeJoints", b.joint(at(s, "ridge")));
}

function buildFrame(layout: FrameLayout, b: ModelBuilder) {
  for (let s = 0; s < layout.stations; s++) buildStation(layout, s, b);

  for (let s = 0; s + 1 < layout.stations; s++) {
    const line = (landmark: string) => b.addMember(b.joint(at(s, landmark)), b.joint(at(s + 1, landmark)), "purlin");
    line("left-eave");
    line("right-eave");
    line("ridge");
    for (let k = 1; k <= slopeJoints(layout); k++) {
      for (const side of SIDES) {
        b.addMember(b.joint(slopeAt(s, side, k)), b.joint(slopeAt(s + 1, side, k)), "purlin");
      }
    }
  }

  if (layout.bracing) {
    for (let s = 0; s + 1 < layout.stations; s++) {
      const brace = (from: string, to: string) => b.addMember(b.joint(at(s, from)), b.joint(at(s + 1, to)), "bracing");
      brace("left-eave", "ridge");
      brace("ridge", "left-eave");
      brace("ridge", "right-eave");
      brace("right-eave", "ridge");
    }
  }

  for (let s = 0; s < layout.stations; s++) {
    for (const side of SIDES) {
      for (let k = 1; k <= slopeJoints(layout); k++) b.mark("purlinJoints", b.joint(slopeAt(s, side, k)));
    }
  }
}

function resolveBays(p: RigidFrameParams, warnings: string[]): number {
  if (p.numBays !== undefined) {
    const covered = p.numBays * p.baySpacing;
    if (p.length !== undefined && covered > p.length + 1e-9) {
      warnings.push(`${p.numBays} bays at ${p.baySpacing} cover ${covered}, more than the length ${p.length}`);
    }
    return p.numBays;
  }
  if (p.length === undefined) {
    throw new InvalidParameterError([{ parameter: "numBays", constraint: "give numBays or length" }]);
  }
  const bays = fitCount(p.length, p.baySpacing);
  if (bays < 1) {
    throw new InfeasibleTopologyError([
      { parameter: "length", constraint: `length ${p.length} holds no bay of spacing ${p.baySpacing}` }
    ]);
  }
  if (bays > LIMITS.bays) {
    throw new InfeasibleTopologyError([
      { parameter: "length", constraint: `yields ${bays} bays, more than ${LIMITS.bays}` }
    ]);
  }
  return bays;
}

function resolvePurlins(p: RigidFrameParams, warnings: string[]): number {
  if (!p.includePurlins || p.purlinSpacing === undefined) return 0;
  const n = fitCount(p.width / 2, p.purlinSpacing);
  if (n === 0) {
    warnings.push(`purlin spacing ${p.purlinSpacing} exceeds the half-width ${p.width / 2}; intermediate purlins omitted`);
  }
  return n;
}

export const rigidFrame = defineVariant<RigidFrameParams, FrameLayout>({
  kind: "rigid-frame",
  schema: RigidFrameParamsSchema,
  connected: true,
  resolve: p => {
    const warnings: string[] = [];
    return {
      stations: resolveBays(p, warnings) + 1,
      baySpacing: p.baySpacing,
      width: p.width,
      eaveHeight: p.eaveHeight,
      ridgeHeight: p.ridgeHeight,
      purlinDivisions: resolvePurlins(p, warnings),
      bracing: p.includeBracing,
      warnings
    };
  },
  predict: predictFrame,
  build: buildFrame
});

export const portalFrame = defineVariant<PortalFrameParams, FrameLayout>({
  kind: "portal-frame",
  schema: PortalFrameParamsSchema,
  connected: true,
  resolve: p => ({
    stations: 1,
    baySpacing: 0,
    width: p.width,
    eaveHeight: p.eaveHeight,
    ridgeHeight: p.ridgeHeight,
    purlinDivisions: 0,
    bracing: false,
    warnings: []
  }),
  predict: predictFrame,
  build: buildFrame
});
