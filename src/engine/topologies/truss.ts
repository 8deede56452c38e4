// src/engine/topologies/truss.ts
import { key, type ModelBuilder } from "../builder";
import { InfeasibleTopologyError, InvalidParameterError } from "../errors";
import {
  BowstringParamsSchema, LIMITS, TrussParamsSchema, fitCount,
  type BowstringParams, type TrussParams
} from "../params";
import type { Incidence, TopologyKind } from "../types";
import { defineVariant, type Layout, type LayoutCounts } from "../variant";

export type TrussPattern = "warren" | "pratt" | "howe" | "bowstring";

export type TrussProfile =
  | { type: "flat"; height: number }
  | { type: "pitched"; eaveHeight: number; ridgeHeight: number }
  | { type: "arch"; rise: number };

export interface TrussLayout extends Layout {
  pattern: TrussPattern;
  span: number;
  panelCount: number;
  profile: TrussProfile;
}

type JointAt = (index: number) => number;

interface PatternRule {
  /** Top joint stations in panel units, measured from the left support */
  topStations(panels: number): number[];
  verticals: boolean;
  diagonals(panel: number, panels: number, bottom: JointAt, top: JointAt): Incidence[];
}

/**
 * Midspan tie-break: panels left of floor(p/2) are before midspan, and for an
 * odd count the middle panel is assigned to that side as well.
 */
export function beforeMidspan(panel: number, panels: number): boolean {
  const mid = Math.floor(panels / 2);
  return panel < mid || (panels % 2 === 1 && panel === mid);
}

const fullStations = (p: number) => Array.from({ length: p + 1 }, (_, i) => i);

const RULES: Record<TrussPattern, PatternRule> = {
  warren: {
    topStations: p => Array.from({ length: p }, (_, i) => i + 0.5),
    verticals: false,
    diagonals: (i, _p, bottom, top) => [[bottom(i), top(i)], [top(i), bottom(i + 1)]]
  },
  // diagonals run down toward midspan
  pratt: {
    topStations: fullStations,
    verticals: true,
    diagonals: (i, p, bottom, top) =>
      [beforeMidspan(i, p) ? [top(i), bottom(i + 1)] : [bottom(i), top(i + 1)]]
  },
  howe: {
    topStations: fullStations,
    verticals: true,
    diagonals: (i, p, bottom, top) =>
      [beforeMidspan(i, p) ? [bottom(i), top(i + 1)] : [top(i), bottom(i + 1)]]
  },
  bowstring: {
    topStations: fullStations,
    verticals: true,
    diagonals: (i, _p, bottom, top) => [[bottom(i), top(i + 1)]]
  }
};

export function topHeight(layout: TrussLayout, station: number): number {
  const { profile, panelCount: p } = layout;
  switch (profile.type) {
    case "flat":
      return profile.height;
    case "pitched": {
      const t = 1 - Math.abs((2 * station) / p - 1);
      return profile.eaveHeight + (profile.ridgeHeight - profile.eaveHeight) * t;
    }
    case "arch": {
      // folded onto the left half so both springings are exactly zero and the arch is symmetric
      const folded = Math.min(station, p - station);
      return folded <= 0 ? 0 : profile.rise * Math.sin((folded / p) * Math.PI);
    }
  }
}

function resolvePanelCount(span: number, panelCount?: number, panelLength?: number): number {
  if (panelCount !== undefined) return panelCount;
  if (panelLength === undefined) {
    throw new InvalidParameterError([{ parameter: "panelCount", constraint: "give exactly one of panelCount or panelLength" }]);
  }
  const n = fitCount(span, panelLength);
  if (n < 1) {
    throw new InfeasibleTopologyError([
      { parameter: "panelLength", constraint: `span ${span} holds no panel of length ${panelLength}` }
    ]);
  }
  if (n > LIMITS.panels) {
    throw new InfeasibleTopologyError([
      { parameter: "panelLength", constraint: `yields ${n} panels, more than ${LIMITS.panels}` }
    ]);
  }
  return n;
}

function resolveProfile(p: TrussParams): TrussProfile {
  if (p.height !== undefined) return { type: "flat", height: p.height };
  if (p.eaveHeight !== undefined && p.ridgeHeight !== undefined) {
    return { type: "pitched", eaveHeight: p.eaveHeight, ridgeHeight: p.ridgeHeight };
  }
  throw new InvalidParameterError([{ parameter: "height", constraint: "required unless eaveHeight and ridgeHeight are given" }]);
}

function predictTruss(layout: TrussLayout): LayoutCounts {
  const p = layout.panelCount;
  const rule = RULES[layout.pattern];
  const tops = rule.topStations(p).length;
  return {
    joints: p + 1 + tops,
    plates: 0,
    byRole: {
      "chord-bottom": p,
      "chord-top": tops - 1,
      vertical: rule.verticals ? p + 1 : 0,
      diagonal: layout.pattern === "warren" ? 2 * p : p
    },
    derived: { panelCount: p, panelLength: layout.span / p }
  };
}

function buildTruss(layout: TrussLayout, b: ModelBuilder) {
  const { span, panelCount: p } = layout;
  const rule = RULES[layout.pattern];
  const stations = rule.topStations(p);

  for (let i = 0; i <= p; i++) b.addJoint((i / p) * span, 0, 0, key("bottom", i));
  stations.forEach((s, i) => b.addJoint((s / p) * span, topHeight(layout, s), 0, key("top", i)));

  const bottom: JointAt = i => b.joint(key("bottom", i));
  const top: JointAt = i => b.joint(key("top", i));
  const bottomIds = fullStations(p).map(bottom);
  const topIds = stations.map((_, i) => top(i));

  b.addChain(bottomIds, "chord-bottom");
  b.addChain(topIds, "chord-top");
  if (rule.verticals) bottomIds.forEach((id, i) => b.addMember(id, top(i), "vertical"));
  for (let i = 0; i < p; i++) {
    for (const [start, end] of rule.diagonals(i, p, bottom, top)) b.addMember(start, end, "diagonal");
  }

  b.mark("supports", bottom(0), bottom(p));
  b.mark("bottomChord", ...bottomIds);
  b.mark("topChord", ...topIds);
}

function defineTruss(kind: TopologyKind, pattern: Exclude<TrussPattern, "bowstring">) {
  return defineVariant<TrussParams, TrussLayout>({
    kind,
    schema: TrussParamsSchema,
    connected: true,
    resolve: p => ({
      pattern,
      span: p.span,
      panelCount: resolvePanelCount(p.span, p.panelCount, p.panelLength),
      profile: resolveProfile(p),
      warnings: []
    }),
    predict: predictTruss,
    build: buildTruss
  });
}

export const warrenTruss = defineTruss("warren-truss", "warren");
export const prattTruss = defineTruss("pratt-truss", "pratt");
export const howeTruss = defineTruss("howe-truss", "howe");

export const bowstringArch = defineVariant<BowstringParams, TrussLayout>({
  kind: "bowstring-arch",
  schema: BowstringParamsSchema,
  connected: true,
  resolve: p => {
    const panelCount = resolvePanelCount(p.span, p.panelCount, p.panelLength);
    // one panel puts both arch joints on the supports
    if (panelCount < 2) {
      throw new InfeasibleTopologyError([
        { parameter: "panelCount", constraint: "a bowstring arch needs at least 2 panels" }
      ]);
    }
    return { pattern: "bowstring", span: p.span, panelCount, profile: { type: "arch", rise: p.height }, warnings: [] };
  },
  predict: predictTruss,
  build: buildTruss
});
