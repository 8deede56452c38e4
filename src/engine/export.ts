// src/engine/export.ts
import * as THREE from "three";
import { DEFAULT_ROLE_SECTIONS, SECTION_LIBRARY, SUPPORT_LANDMARKS, defaultDensity, defaultSupport } from "../config/defaults";
import { roundCoord } from "./builder";
import {
  StructuralModelSchema,
  LoadCaseSpecSchema,
  type AxisConvention, type LoadCase, type LoadCaseSpec, type ModelMember, type Section,
  type StructuralModel, type SupportType, type Units
} from "./schema";
import type { GenerationResult, MemberRole, Vec3 } from "./types";

// canonical frame is Y-up; Z-up targets swap the Y and Z components
const BASES: Record<AxisConvention, THREE.Matrix4> = {
  "y-up": new THREE.Matrix4(),
  "z-up": new THREE.Matrix4().makeBasis(
    new THREE.Vector3(1, 0, 0),
    new THREE.Vector3(0, 0, 1),
    new THREE.Vector3(0, 1, 0)
  )
};

export function toConvention(v: Readonly<Vec3>, convention: AxisConvention): Vec3 {
  const p = new THREE.Vector3(...v).applyMatrix4(BASES[convention]);
  return [roundCoord(p.x), roundCoord(p.y), roundCoord(p.z)];
}

export interface ExportOptions {
  name: string;
  units: Units;
  up?: AxisConvention;
  /** Section name per role; defaults to the kind's usual assignment */
  roleSections?: Partial<Record<MemberRole, string>>;
  /** Sections the role table may name; defaults to the bundled library */
  sections?: Section[];
  density_kg_per_m3?: number;
  /** Restraint at the support landmark; pinned for trusses, fixed otherwise */
  support?: SupportType;
  /** Uniform member loads by role, directions in the canonical Y-up frame */
  loads?: LoadCaseSpec[];
}

function loadCases(result: GenerationResult, specs: LoadCaseSpec[], up: AxisConvention): LoadCase[] {
  return specs.map(spec => {
    const parsed = LoadCaseSpecSchema.safeParse(spec);
    if (!parsed.success) throw new Error(`Load case ${spec.name}: ${parsed.error.message}`);
    const { name, loads } = parsed.data;
    return {
      name,
      loads: loads.map(({ role, direction, magnitude }) => {
        const members = [...result.roles].filter(([, r]) => r === role).map(([id]) => id).sort((a, b) => a - b);
        if (members.length === 0) throw new Error(`Load case ${name}: no ${role} members to load`);
        return { role, members, direction: toConvention(direction, up), magnitude };
      })
    };
  });
}

export function toStructuralModel(result: GenerationResult, options: ExportOptions): StructuralModel {
  const up = options.up ?? "y-up";
  const roleSections = options.roleSections ?? DEFAULT_ROLE_SECTIONS[result.kind];
  const library = new Map((options.sections ?? SECTION_LIBRARY).map(s => [s.name, s]));
  const position = (id: number): Vec3 => {
    const xyz = result.joints.get(id);
    if (!xyz) throw new Error(`Joint ${id} not found in result`);
    return toConvention(xyz, up);
  };

  const used = new Set<string>();
  const members = [...result.members].map(([id, [start, end]]): ModelMember => {
    const role = result.roles.get(id);
    if (role === undefined) throw new Error(`Member ${id} has no role`);
    const section = roleSections[role];
    if (section !== undefined) {
      if (!library.has(section)) throw new Error(`Section ${section} for role ${role} is not in the section library`);
      used.add(section);
    }
    return { id, role, joints: [start, end], start: position(start), end: position(end), section };
  });

  const model: StructuralModel = {
    project: {
      name: options.name,
      kind: result.kind,
      units: options.units,
      up,
      density_kg_per_m3: options.density_kg_per_m3 ?? defaultDensity(result.kind)
    },
    sections: [...library.values()].filter(s => used.has(s.name)),
    joints: [...result.joints.keys()].map(id => ({ id, position: position(id) })),
    members,
    plates: [...result.plates.values()].map(p => ({
      id: p.id,
      joints: [p.joints[0], p.joints[1], p.joints[2], p.joints[3]],
      component: p.component,
      thickness: p.thickness
    })),
    landmarks: Object.fromEntries(Object.entries(result.landmarks).map(([name, ids]) => [name, [...ids]])),
    supports: {
      type: options.support ?? defaultSupport(result.kind),
      joints: [...(result.landmarks[SUPPORT_LANDMARKS[result.kind]] ?? [])]
    },
    loads: loadCases(result, options.loads ?? [], up)
  };
  return model;
}

export function parseStructuralModel(json: unknown): StructuralModel {
  const parsed = StructuralModelSchema.safeParse(json);
  if (!parsed.success) throw new Error(parsed.error.message);
  return parsed.data;
}

/** The create calls of an analysis engine's automation interface. */
export interface EngineSink {
  createJoint(id: number, x: number, y: number, z: number): void | Promise<void>;
  createMember(id: number, start: number, end: number, role: MemberRole): void | Promise<void>;
  createPlate?(id: number, joints: readonly number[]): void | Promise<void>;
}

/**
 * Pushes a finished result into an engine one call at a time, joints first,
 * in id order. A failing call stops the replay and propagates.
 */
export async function replayToEngine(result: GenerationResult, sink: EngineSink, up: AxisConvention = "y-up") {
  for (const [id, xyz] of result.joints) {
    const [x, y, z] = toConvention(xyz, up);
    await sink.createJoint(id, x, y, z);
  }
  for (const [id, [start, end]] of result.members) {
    const role = result.roles.get(id);
    if (role === undefined) throw new Error(`Member ${id} has no role`);
    await sink.createMember(id, start, end, role);
  }
  if (sink.createPlate) {
    for (const [id, plate] of result.plates) await sink.createPlate(id, plate.joints);
  }
  return { joints: result.joints.size, members: result.members.size, plates: sink.createPlate ? result.plates.size : 0 };
}
