// src/config/defaults.ts
import type { TopologyParamsInput } from "../engine/params";
import type { Section, SupportType } from "../engine/schema";
import type { MemberRole, TopologyKind } from "../engine/types";

type DefaultParams = { [K in TopologyKind]: TopologyParamsInput<K> };

export const DEFAULT_PARAMS: DefaultParams = {
  "warren-truss": { span: 120, height: 20, panelCount: 8 },
  "pratt-truss": { span: 120, height: 20, panelCount: 8 },
  "howe-truss": { span: 120, height: 20, panelCount: 8 },
  "bowstring-arch": { span: 120, height: 20, panelCount: 8 },
  "portal-frame": { width: 6, eaveHeight: 4 },
  "rigid-frame": {
    width: 60,
    eaveHeight: 20,
    ridgeHeight: 28,
    baySpacing: 25,
    numBays: 4,
    length: 100,
    includePurlins: true,
    purlinSpacing: 5,
    includeBracing: true
  },
  "building-grid": { stories: 3, baysX: 3, baysZ: 2, bayWidth: 6, bayDepth: 5, storyHeight: 3.5 },
  "plate-mesh": {
    wall: { height: 10, width: 20, thickness: 1 },
    slab: { length: 20, width: 15, thickness: 1.5 },
    cellSize: 1
  }
};

// Approximate AISC / prismatic properties, dims in mm
export const SECTION_LIBRARY: Section[] = [
  { name: "W21X50", type: "W", dims: { bf: 166, tw: 9.7, tf: 13.6, d: 529 }, area_mm2: 9484 },
  { name: "W18X35", type: "W", dims: { bf: 152, tw: 7.6, tf: 10.8, d: 450 }, area_mm2: 6645 },
  { name: "W12X72", type: "W", dims: { bf: 306, tw: 10.9, tf: 17.0, d: 311 }, area_mm2: 13613 },
  { name: "C8X11.5", type: "C", dims: { bf: 57.4, tw: 5.6, tf: 9.9, d: 203 }, area_mm2: 2174 },
  { name: "L40404", type: "L", dims: { bf: 102, tw: 6.4, tf: 6.4, d: 102 }, area_mm2: 1245 },
  { name: "R300X450", type: "Rect", dims: { bf: 300, tw: 300, tf: 225, d: 450 }, area_mm2: 135000 },
  { name: "R450X450", type: "Rect", dims: { bf: 450, tw: 450, tf: 225, d: 450 }, area_mm2: 202500 }
];

const TRUSS_SECTIONS: Partial<Record<MemberRole, string>> = {
  "chord-top": "W21X50",
  "chord-bottom": "W21X50",
  vertical: "L40404",
  diagonal: "L40404"
};

const FRAME_SECTIONS: Partial<Record<MemberRole, string>> = {
  column: "W12X72",
  rafter: "W18X35",
  beam: "W18X35",
  purlin: "C8X11.5",
  bracing: "L40404"
};

/** Section assigned to each role when the caller names none. Plates carry thickness instead. */
export const DEFAULT_ROLE_SECTIONS: Record<TopologyKind, Partial<Record<MemberRole, string>>> = {
  "warren-truss": TRUSS_SECTIONS,
  "pratt-truss": TRUSS_SECTIONS,
  "howe-truss": TRUSS_SECTIONS,
  "bowstring-arch": TRUSS_SECTIONS,
  "portal-frame": FRAME_SECTIONS,
  "rigid-frame": FRAME_SECTIONS,
  "building-grid": { beam: "R300X450", column: "R450X450" },
  "plate-mesh": {}
};

const STEEL_DENSITY_KG_PER_M3 = 7850;
const CONCRETE_DENSITY_KG_PER_M3 = 2400;

export function defaultDensity(kind: TopologyKind): number {
  return kind === "building-grid" || kind === "plate-mesh" ? CONCRETE_DENSITY_KG_PER_M3 : STEEL_DENSITY_KG_PER_M3;
}

/** Landmark holding the restrained joints of each kind. */
export const SUPPORT_LANDMARKS: Record<TopologyKind, string> = {
  "warren-truss": "supports",
  "pratt-truss": "supports",
  "howe-truss": "supports",
  "bowstring-arch": "supports",
  "portal-frame": "baseJoints",
  "rigid-frame": "baseJoints",
  "building-grid": "baseJoints",
  "plate-mesh": "wallBase"
};

// trusses bear on their ends; frames, grids and walls are built into their bases
export function defaultSupport(kind: TopologyKind): SupportType {
  return SUPPORT_LANDMARKS[kind] === "supports" ? "pinned" : "fixed";
}
