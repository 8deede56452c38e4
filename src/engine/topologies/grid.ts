// src/engine/topologies/grid.ts
import { key, type ModelBuilder } from "../builder";
import { BuildingGridParamsSchema, type BuildingGridParams } from "../params";
import { defineVariant, type Layout } from "../variant";

export interface GridLayout extends Layout, BuildingGridParams {}

const node = (level: number, i: number, j: number) => key("level", level, i, j);

function buildGrid(layout: GridLayout, b: ModelBuilder) {
  const { stories, baysX, baysZ, bayWidth, bayDepth, storyHeight } = layout;

  for (let level = 0; level <= stories; level++) {
    for (let i = 0; i <= baysX; i++) {
      for (let j = 0; j <= baysZ; j++) {
        const id = b.addJoint(i * bayWidth, level * storyHeight, j * bayDepth, node(level, i, j));
        if (level === 0) b.mark("baseJoints", id);
        if (level === stories) b.mark("roofJoints", id);
      }
    }
  }

  // floor beams, X before Z at each joint; the base level carries none
  for (let level = 1; level <= stories; level++) {
    for (let i = 0; i <= baysX; i++) {
      for (let j = 0; j <= baysZ; j++) {
        const here = b.joint(node(level, i, j));
        if (i < baysX) b.addMember(here, b.joint(node(level, i + 1, j)), "beam");
        if (j < baysZ) b.addMember(here, b.joint(node(level, i, j + 1)), "beam");
      }
    }
  }

  for (let level = 0; level < stories; level++) {
    for (let i = 0; i <= baysX; i++) {
      for (let j = 0; j <= baysZ; j++) {
        b.addMember(b.joint(node(level, i, j)), b.joint(node(level + 1, i, j)), "column");
      }
    }
  }
}

export const buildingGrid = defineVariant<BuildingGridParams, GridLayout>({
  kind: "building-grid",
  schema: BuildingGridParamsSchema,
  connected: true,
  resolve: p => ({ ...p, warnings: [] }),
  predict: ({ stories, baysX, baysZ }) => {
    const perLevel = (baysX + 1) * (baysZ + 1);
    return {
      joints: (stories + 1) * perLevel,
      plates: 0,
      byRole: {
        beam: stories * (baysX * (baysZ + 1) + baysZ * (baysX + 1)),
        column: stories * perLevel
      },
      derived: { levels: stories + 1, jointsPerLevel: perLevel }
    };
  },
  build: buildGrid
});
