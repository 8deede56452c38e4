import { describe, expect, it } from "vitest";
import { InvalidParameterError } from "../errors";
import { countRoles, generate, preview, roleSets } from "../generate";
import { countComponents } from "../invariants";

const params = { stories: 2, baysX: 2, baysZ: 1, bayWidth: 6, bayDepth: 5, storyHeight: 3.5 };

describe("building grid", () => {
  const r = generate("building-grid", params);

  it("counts joints per level and members per story", () => {
    expect(r.joints.size).toBe(18);
    expect(countRoles(r)).toEqual({ beam: 14, column: 12 });
    expect(preview("building-grid", params).derived).toEqual({ levels: 3, jointsPerLevel: 6 });
  });

  it("indexes joints level by level", () => {
    // id = level * 6 + i * 2 + j + 1
    expect(r.joints.get(10)).toEqual([6, 3.5, 5]);
    expect(r.joints.get(18)).toEqual([12, 7, 5]);
  });

  it("creates the X beam before the Z beam at each joint", () => {
    expect(r.members.get(1)).toEqual([7, 9]);
    expect(r.members.get(2)).toEqual([7, 8]);
  });

  it("puts no beams on the base level", () => {
    const beams = roleSets(r).beam.map(id => r.members.get(id));
    expect(beams.every(m => m !== undefined && m[0] > 6 && m[1] > 6)).toBe(true);
  });

  it("stacks columns between adjacent levels", () => {
    const columns = roleSets(r).column;
    expect(r.members.get(columns[0])).toEqual([1, 7]);
    expect(r.members.get(columns[columns.length - 1])).toEqual([12, 18]);
    expect(countComponents(r)).toBe(1);
  });

  it("marks base and roof joints", () => {
    expect(r.landmarks.baseJoints).toEqual([1, 2, 3, 4, 5, 6]);
    expect(r.landmarks.roofJoints).toEqual([13, 14, 15, 16, 17, 18]);
  });

  it("rejects fractional and zero counts", () => {
    expect(() => generate("building-grid", { ...params, stories: 0 })).toThrow(InvalidParameterError);
    expect(() => generate("building-grid", { ...params, baysX: 1.5 })).toThrow(InvalidParameterError);
    expect(() => generate("building-grid", { ...params, stories: 51 })).toThrow(InvalidParameterError);
  });
});
