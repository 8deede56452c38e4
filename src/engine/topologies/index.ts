// src/engine/topologies/index.ts
import type { TopologyKind } from "../types";
import type { RunnableVariant } from "../variant";
import { portalFrame, rigidFrame } from "./frame";
import { buildingGrid } from "./grid";
import { plateMesh } from "./plate";
import { bowstringArch, howeTruss, prattTruss, warrenTruss } from "./truss";

export const VARIANTS: Record<TopologyKind, RunnableVariant> = {
  "warren-truss": warrenTruss,
  "pratt-truss": prattTruss,
  "howe-truss": howeTruss,
  "bowstring-arch": bowstringArch,
  "portal-frame": portalFrame,
  "rigid-frame": rigidFrame,
  "building-grid": buildingGrid,
  "plate-mesh": plateMesh
};
