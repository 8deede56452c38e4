// src/engine/bom.ts
import type { StructuralModel, ModelMember, Units } from "./schema";
import { length3 } from "./mesh";
import type { MemberRole } from "./types";

export const toMeters = (v: number, units: Units) =>
  units === "mm" ? v / 1000 : units === "m" ? v : units === "in" ? v / 39.37007874 : v * 0.3048;

export interface RoleTotal {
  role: MemberRole;
  count: number;
  length: number;
  weight_kg: number;
}

export interface Takeoff {
  rows: string[][];
  totals: RoleTotal[];
}

/** Member-by-member takeoff plus per-role totals. Lengths stay in model units. */
export function computeTakeoff(model: StructuralModel): Takeoff {
  const units = model.project.units;
  const sectionMap = new Map(model.sections.map(s => [s.name, s]));
  const rows: string[][] = [["ID", "Role", "Section", "Length", "Weight_kg"]];
  const totals = new Map<MemberRole, RoleTotal>();

  model.members.forEach((m: ModelMember) => {
    const sec = m.section !== undefined ? sectionMap.get(m.section) : undefined;
    const L = length3(m.start, m.end);
    const area_m2 = sec?.area_mm2 ? sec.area_mm2 / 1e6 : 0;
    const weight_kg = toMeters(L, units) * area_m2 * model.project.density_kg_per_m3;
    rows.push([String(m.id), m.role, m.section ?? "", L.toFixed(3), weight_kg.toFixed(2)]);

    const total = totals.get(m.role) ?? { role: m.role, count: 0, length: 0, weight_kg: 0 };
    total.count += 1;
    total.length += L;
    total.weight_kg += weight_kg;
    totals.set(m.role, total);
  });

  return { rows, totals: [...totals.values()] };
}
