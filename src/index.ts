// src/index.ts
export * from "./engine/types";
export * from "./engine/errors";
export {
  LIMITS, PARAMS_SCHEMAS,
  type TopologyParams, type TopologyParamsInput,
  type TrussParams, type BowstringParams, type PortalFrameParams,
  type RigidFrameParams, type BuildingGridParams, type PlateMeshParams
} from "./engine/params";
export { generate, generateUnknown, preview, previewUnknown, roleSets, countRoles, isTopologyKind } from "./engine/generate";
export { verifyResult, countComponents } from "./engine/invariants";
export { buildWireframe, boundingBox, memberLength, ROLE_COLORS } from "./engine/mesh";
export { computeTakeoff, type Takeoff, type RoleTotal } from "./engine/bom";
export {
  toConvention, toStructuralModel, parseStructuralModel, replayToEngine,
  type EngineSink, type ExportOptions
} from "./engine/export";
export {
  StructuralModelSchema,
  type StructuralModel, type Section, type Units, type AxisConvention,
  type SupportType, type Supports, type LoadCase, type LoadCaseSpec
} from "./engine/schema";
export { DEFAULT_PARAMS, SECTION_LIBRARY, DEFAULT_ROLE_SECTIONS, SUPPORT_LANDMARKS, defaultSupport } from "./config/defaults";
export { createPreviewStore, type PreviewStore, type GenerationRequest } from "./store/usePreview";
export { importJson, exportJson, exportCsv } from "./utils/fileio";
