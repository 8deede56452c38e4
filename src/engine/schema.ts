import { z } from "zod";
import { MEMBER_ROLES, TOPOLOGY_KINDS } from "./types";

export const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);
export const UnitsSchema = z.union([z.literal("mm"), z.literal("m"), z.literal("in"), z.literal("ft")]);
export const AxisConventionSchema = z.union([z.literal("y-up"), z.literal("z-up")]);
export const MemberRoleSchema = z.enum(MEMBER_ROLES);

export const SectionDimsSchema = z.object({
  bf: z.number().positive(),
  tw: z.number().positive(),
  tf: z.number().positive(),
  d: z.number().positive(),
  r: z.number().optional()
});

export const SectionSchema = z.object({
  name: z.string(), // e.g., W18X35
  type: z.union([
    z.literal("W"), // Wide Flange (I)
    z.literal("C"), // Channel
    z.literal("L"), // Angle
    z.literal("HSS"),
    z.literal("Rect"), // Prismatic rectangle (concrete)
    z.literal("Custom")
  ]),
  dims: SectionDimsSchema, // mm
  area_mm2: z.number().positive().optional(),
  perimeter_mm: z.number().positive().optional()
});

export const JointSchema = z.object({
  id: z.number().int().positive(),
  position: Vec3Schema
});

export const MemberSchema = z.object({
  id: z.number().int().positive(),
  role: MemberRoleSchema,
  joints: z.tuple([z.number().int().positive(), z.number().int().positive()]),
  start: Vec3Schema,
  end: Vec3Schema,
  section: z.string().optional() // Section name
});

export const PlateSchema = z.object({
  id: z.number().int().positive(),
  joints: z.tuple([z.number().int(), z.number().int(), z.number().int(), z.number().int()]),
  component: z.union([z.literal("wall"), z.literal("slab")]),
  thickness: z.number().positive()
});

export const SupportTypeSchema = z.union([z.literal("fixed"), z.literal("pinned")]);

export const SupportsSchema = z.object({
  type: SupportTypeSchema,
  joints: z.array(z.number().int().positive())
});

// uniform load on every member of a role; direction in the model's axis convention
export const MemberLoadSchema = z.object({
  role: MemberRoleSchema,
  members: z.array(z.number().int().positive()),
  direction: Vec3Schema,
  magnitude: z.number().finite() // force per unit length
});

export const LoadCaseSchema = z.object({
  name: z.string().min(1),
  loads: z.array(MemberLoadSchema)
});

// load case as requested; direction in the canonical Y-up frame
export const LoadCaseSpecSchema = z.object({
  name: z.string().min(1),
  loads: z.array(z.object({
    role: MemberRoleSchema,
    direction: Vec3Schema,
    magnitude: z.number().finite()
  }))
});

export const ProjectSchema = z.object({
  name: z.string(),
  kind: z.enum(TOPOLOGY_KINDS),
  units: UnitsSchema,
  up: AxisConventionSchema,
  density_kg_per_m3: z.number().positive()
});

export const StructuralModelSchema = z.object({
  project: ProjectSchema,
  sections: z.array(SectionSchema),
  joints: z.array(JointSchema),
  members: z.array(MemberSchema),
  plates: z.array(PlateSchema),
  landmarks: z.record(z.string(), z.array(z.number().int().positive())),
  supports: SupportsSchema,
  loads: z.array(LoadCaseSchema).default([])
}).superRefine((model, ctx) => {
  const ids = new Set(model.joints.map(j => j.id));
  model.supports.joints.forEach((j, i) => {
    if (!ids.has(j)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["supports", "joints", i], message: `support joint ${j} does not exist` });
    }
  });
  const memberIds = new Set(model.members.map(m => m.id));
  model.loads.forEach((c, ci) => c.loads.forEach((l, li) => {
    l.members.forEach(id => {
      if (!memberIds.has(id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["loads", ci, "loads", li, "members"], message: `loaded member ${id} does not exist` });
      }
    });
  }));
  model.members.forEach((m, i) => {
    if (!m.joints.every(j => ids.has(j))) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["members", i, "joints"], message: "references a missing joint" });
    }
  });
  const sections = new Set(model.sections.map(s => s.name));
  model.members.forEach((m, i) => {
    if (m.section !== undefined && !sections.has(m.section)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["members", i, "section"], message: `unknown section ${m.section}` });
    }
  });
});

// TypeScript types inferred from Zod schemas
export type Units = z.infer<typeof UnitsSchema>;
export type AxisConvention = z.infer<typeof AxisConventionSchema>;
export type SectionDims = z.infer<typeof SectionDimsSchema>;
export type Section = z.infer<typeof SectionSchema>;
export type ModelJoint = z.infer<typeof JointSchema>;
export type ModelMember = z.infer<typeof MemberSchema>;
export type ModelPlate = z.infer<typeof PlateSchema>;
export type SupportType = z.infer<typeof SupportTypeSchema>;
export type Supports = z.infer<typeof SupportsSchema>;
export type LoadCase = z.infer<typeof LoadCaseSchema>;
export type LoadCaseSpec = z.infer<typeof LoadCaseSpecSchema>;
export type Project = z.infer<typeof ProjectSchema>;
export type StructuralModel = z.infer<typeof StructuralModelSchema>;
