// src/engine/mesh.ts
import * as THREE from "three";
import type { GenerationResult, MemberRole, Vec3 } from "./types";

export function length3(a: Readonly<Vec3>, b: Readonly<Vec3>) {
  return new THREE.Vector3(...a).distanceTo(new THREE.Vector3(...b));
}

export const ROLE_COLORS: Record<MemberRole, number> = {
  "chord-top": 0x2d6cdf,
  "chord-bottom": 0x2d6cdf,
  diagonal: 0xffc107,
  vertical: 0xff9800,
  column: 0x2fbf71,
  beam: 0x2d6cdf,
  rafter: 0x1976d2,
  purlin: 0x9e9e9e,
  bracing: 0xe53935,
  "plate-edge": 0x606060
};

function endpoints(result: GenerationResult, memberId: number): [Readonly<Vec3>, Readonly<Vec3>] {
  const incidence = result.members.get(memberId);
  const start = incidence && result.joints.get(incidence[0]);
  const end = incidence && result.joints.get(incidence[1]);
  if (!start || !end) throw new Error(`Member ${memberId} not found in result`);
  return [start, end];
}

export function memberLength(result: GenerationResult, memberId: number): number {
  const [start, end] = endpoints(result, memberId);
  return length3(start, end);
}

export function boundingBox(result: GenerationResult): THREE.Box3 {
  const box = new THREE.Box3();
  result.joints.forEach(xyz => box.expandByPoint(new THREE.Vector3(...xyz)));
  return box;
}

/**
 * Line-segment preview geometry, one object per role, for a viewer to add
 * to its scene. Plate outlines come through their plate-edge members.
 */
export function buildWireframe(result: GenerationResult, colors: Record<MemberRole, number> = ROLE_COLORS): THREE.Group {
  const group = new THREE.Group();
  group.name = result.kind;

  const byRole = new Map<MemberRole, number[]>();
  result.roles.forEach((role, id) => {
    const list = byRole.get(role) ?? [];
    list.push(id);
    byRole.set(role, list);
  });

  byRole.forEach((ids, role) => {
    const positions = new Float32Array(ids.length * 6);
    ids.forEach((id, n) => {
      const [start, end] = endpoints(result, id);
      positions.set([...start, ...end], n * 6);
    });
    const geom = new THREE.BufferGeometry();
    geom.setAttribute("position", new THREE.BufferAttribute(positions, 3));
    const lines = new THREE.LineSegments(geom, new THREE.LineBasicMaterial({ color: colors[role] }));
    lines.name = role;
    lines.userData = { role, memberIds: ids };
    group.add(lines);
  });

  return group;
}
