// src/engine/builder.ts
import { InvariantViolationError } from "./errors";
import type {
  GenerationResult, Incidence, MemberRole, Plate, PlateComponent, TopologyKind, Vec3
} from "./types";

/** Symbolic joint key, e.g. key("station", 3, "ridge") -> "station:3:ridge" */
export const key = (...parts: Array<string | number>) => parts.join(":");

const pairKey = (a: number, b: number) => a < b ? `${a}-${b}` : `${b}-${a}`;

/** Round to 1e-6 and fold -0 into 0 so identical inputs serialize identically. */
export function roundCoord(v: number): number {
  const r = Math.round(v * 1e6) / 1e6;
  return r === 0 ? 0 : r;
}

/**
 * Per-call id allocator and collector. Every generation run owns one;
 * nothing here outlives the call that created it.
 */
export class ModelBuilder {
  private readonly joints = new Map<number, Vec3>();
  private readonly members = new Map<number, Incidence>();
  private readonly roles = new Map<number, MemberRole>();
  private readonly plates = new Map<number, Plate>();
  private readonly keyed = new Map<string, number>();
  private readonly pairs = new Map<string, number>();
  private readonly landmarks = new Map<string, number[]>();
  private readonly warnings: string[] = [];
  private nextJointId = 1;
  private nextMemberId = 1;
  private nextPlateId = 1;

  addJoint(x: number, y: number, z: number, jointKey?: string): number {
    if (jointKey !== undefined && this.keyed.has(jointKey)) {
      throw new InvariantViolationError([`joint key ${jointKey} allocated twice`]);
    }
    const id = this.nextJointId++;
    this.joints.set(id, [roundCoord(x), roundCoord(y), roundCoord(z)]);
    if (jointKey !== undefined) this.keyed.set(jointKey, id);
    return id;
  }

  joint(jointKey: string): number {
    const id = this.keyed.get(jointKey);
    if (id === undefined) throw new InvariantViolationError([`no joint under key ${jointKey}`]);
    return id;
  }

  addMember(start: number, end: number, role: MemberRole): number {
    if (!this.joints.has(start) || !this.joints.has(end)) {
      throw new InvariantViolationError([`member ${start}-${end} references a missing joint`]);
    }
    if (start === end) throw new InvariantViolationError([`member on joint ${start} is a self-loop`]);
    const id = this.nextMemberId++;
    this.members.set(id, [start, end]);
    this.roles.set(id, role);
    const pk = pairKey(start, end);
    if (!this.pairs.has(pk)) this.pairs.set(pk, id);
    return id;
  }

  /** Connects consecutive joints of a polyline, returning the member ids in order. */
  addChain(jointIds: number[], role: MemberRole): number[] {
    const ids: number[] = [];
    for (let i = 0; i + 1 < jointIds.length; i++) {
      ids.push(this.addMember(jointIds[i], jointIds[i + 1], role));
    }
    return ids;
  }

  memberBetween(a: number, b: number): number | undefined {
    return this.pairs.get(pairKey(a, b));
  }

  addPlate(corners: Plate["joints"], component: PlateComponent, thickness: number): number {
    const edges = corners.map((c, i) => {
      const next = corners[(i + 1) % corners.length];
      const edge = this.memberBetween(c, next);
      if (edge === undefined) throw new InvariantViolationError([`plate edge ${c}-${next} has no member`]);
      return edge;
    });
    const id = this.nextPlateId++;
    this.plates.set(id, { id, joints: corners, edges: [edges[0], edges[1], edges[2], edges[3]], component, thickness });
    return id;
  }

  mark(landmark: string, ...jointIds: number[]) {
    const list = this.landmarks.get(landmark) ?? [];
    list.push(...jointIds);
    this.landmarks.set(landmark, list);
  }

  warn(message: string) {
    this.warnings.push(message);
  }

  finish(kind: TopologyKind): GenerationResult {
    const joints = new Map<number, Readonly<Vec3>>();
    this.joints.forEach(([x, y, z], id) => joints.set(id, [x, y, z]));
    const members = new Map<number, Readonly<Incidence>>();
    this.members.forEach(([start, end], id) => members.set(id, [start, end]));
    const plates = new Map<number, Readonly<Plate>>();
    this.plates.forEach((p, id) => plates.set(id, Object.freeze({ ...p })));
    const landmarks: Record<string, readonly number[]> = {};
    this.landmarks.forEach((ids, name) => { landmarks[name] = Object.freeze([...ids]); });

    return Object.freeze({
      kind,
      joints,
      members,
      roles: new Map(this.roles),
      plates,
      landmarks: Object.freeze(landmarks),
      warnings: Object.freeze([...this.warnings])
    });
  }
}
