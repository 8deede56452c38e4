// src/engine/topologies/plate.ts
import { key, type ModelBuilder } from "../builder";
import { InfeasibleTopologyError, InvalidParameterError } from "../errors";
import { LIMITS, PlateMeshParamsSchema, fitCount, type PlateMeshParams } from "../params";
import type { PlateComponent, Vec3 } from "../types";
import { defineVariant, type Layout, type LayoutCounts } from "../variant";

export interface PatchLayout {
  component: PlateComponent;
  /** Cells along the first and second lattice index */
  cellsU: number;
  cellsV: number;
  thickness: number;
  place(u: number, v: number): Vec3;
}

export interface PlateMeshLayout extends Layout {
  cellSize: number;
  patches: PatchLayout[];
}

function divisions(parameter: string, length: number, cell: number): number {
  const n = fitCount(length, cell);
  if (n < 1) {
    throw new InfeasibleTopologyError([{ parameter, constraint: `${length} is smaller than the cell size ${cell}` }]);
  }
  if (n > LIMITS.divisions) {
    throw new InvalidParameterError([
      { parameter, constraint: `yields ${n} cells, more than ${LIMITS.divisions} per side` }
    ]);
  }
  return n;
}

function resolvePlates(p: PlateMeshParams): PlateMeshLayout {
  const cell = p.cellSize;
  // slab centred under the wall along X, extending out from the wall face along +Z
  const slabX0 = -(p.slab.length - p.wall.width) / 2;
  return {
    cellSize: cell,
    patches: [
      {
        component: "wall",
        cellsU: divisions("wall.width", p.wall.width, cell),
        cellsV: divisions("wall.height", p.wall.height, cell),
        thickness: p.wall.thickness,
        place: (u, v) => [u * cell, v * cell, 0]
      },
      {
        component: "slab",
        cellsU: divisions("slab.length", p.slab.length, cell),
        cellsV: divisions("slab.width", p.slab.width, cell),
        thickness: p.slab.thickness,
        place: (u, v) => [slabX0 + u * cell, 0, v * cell]
      }
    ],
    warnings: []
  };
}

const edgesOf = ({ cellsU: nu, cellsV: nv }: PatchLayout) => nu * (nv + 1) + nv * (nu + 1);

function predictPlates(layout: PlateMeshLayout): LayoutCounts {
  const [wall, slab] = layout.patches;
  return {
    joints: layout.patches.reduce((n, p) => n + (p.cellsU + 1) * (p.cellsV + 1), 0),
    plates: layout.patches.reduce((n, p) => n + p.cellsU * p.cellsV, 0),
    byRole: { "plate-edge": layout.patches.reduce((n, p) => n + edgesOf(p), 0) },
    derived: {
      cellSize: layout.cellSize,
      wallCellsX: wall.cellsU,
      wallCellsY: wall.cellsV,
      slabCellsX: slab.cellsU,
      slabCellsZ: slab.cellsV
    }
  };
}

function buildPatch(patch: PatchLayout, b: ModelBuilder) {
  const { component, cellsU: nu, cellsV: nv } = patch;
  const at = (u: number, v: number) => b.joint(key(component, u, v));

  for (let u = 0; u <= nu; u++) {
    for (let v = 0; v <= nv; v++) {
      const id = b.addJoint(...patch.place(u, v), key(component, u, v));
      b.mark(`${component}Joints`, id);
      if (component === "wall" && v === 0) b.mark("wallBase", id);
    }
  }

  for (let u = 0; u < nu; u++) {
    for (let v = 0; v <= nv; v++) b.addMember(at(u, v), at(u + 1, v), "plate-edge");
  }
  for (let u = 0; u <= nu; u++) {
    for (let v = 0; v < nv; v++) b.addMember(at(u, v), at(u, v + 1), "plate-edge");
  }

  for (let u = 0; u < nu; u++) {
    for (let v = 0; v < nv; v++) {
      b.addPlate([at(u, v), at(u + 1, v), at(u + 1, v + 1), at(u, v + 1)], component, patch.thickness);
    }
  }
}

export const plateMesh = defineVariant<PlateMeshParams, PlateMeshLayout>({
  kind: "plate-mesh",
  schema: PlateMeshParamsSchema,
  // wall and slab are meshed independently and need not touch
  connected: false,
  resolve: resolvePlates,
  predict: predictPlates,
  build: (layout, b) => layout.patches.forEach(patch => buildPatch(patch, b))
});
