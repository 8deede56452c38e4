// src/engine/types.ts
export type Vec3 = [number, number, number];

export const TOPOLOGY_KINDS = [
  "warren-truss",
  "pratt-truss",
  "howe-truss",
  "bowstring-arch",
  "portal-frame",
  "rigid-frame",
  "building-grid",
  "plate-mesh"
] as const;
export type TopologyKind = typeof TOPOLOGY_KINDS[number];

export const MEMBER_ROLES = [
  "chord-top",
  "chord-bottom",
  "diagonal",
  "vertical",
  "column",
  "beam",
  "rafter",
  "purlin",
  "bracing",
  "plate-edge"
] as const;
export type MemberRole = typeof MEMBER_ROLES[number];

/** Start and end joint ids */
export type Incidence = [number, number];

export type PlateComponent = "wall" | "slab";

export interface Plate {
  id: number;
  joints: [number, number, number, number];
  edges: [number, number, number, number];
  component: PlateComponent;
  thickness: number;
}

export type Landmarks = Readonly<Record<string, readonly number[]>>;

export interface GenerationResult {
  readonly kind: TopologyKind;
  readonly joints: ReadonlyMap<number, Readonly<Vec3>>;
  readonly members: ReadonlyMap<number, Readonly<Incidence>>;
  readonly roles: ReadonlyMap<number, MemberRole>;
  readonly plates: ReadonlyMap<number, Readonly<Plate>>;
  readonly landmarks: Landmarks;
  readonly warnings: readonly string[];
}

export type RoleCounts = Partial<Record<MemberRole, number>>;

export interface ModelPreview {
  kind: TopologyKind;
  joints: number;
  members: number;
  plates: number;
  byRole: RoleCounts;
  /** Kind-specific figures such as panel length or roof slope */
  derived: Record<string, number>;
  warnings: string[];
}
