import { describe, expect, it } from "vitest";
import { InfeasibleTopologyError, InvalidParameterError } from "../errors";
import { countRoles, generate, preview } from "../generate";
import { countComponents } from "../invariants";
import { beforeMidspan } from "./truss";

const heights = (ids: readonly number[], joints: ReadonlyMap<number, readonly number[]>) =>
  ids.map(id => joints.get(id)?.[1]);

describe("warren truss", () => {
  const r = generate("warren-truss", { span: 120, height: 20, panelCount: 8 });

  it("has 2p+1 joints and 4p-1 members", () => {
    expect(r.joints.size).toBe(17);
    expect(r.members.size).toBe(31);
    expect(countRoles(r)).toEqual({ "chord-bottom": 8, "chord-top": 7, diagonal: 16 });
  });

  it("places top joints over panel midpoints", () => {
    expect(r.joints.get(1)).toEqual([0, 0, 0]);
    expect(r.joints.get(9)).toEqual([120, 0, 0]);
    expect(r.joints.get(10)).toEqual([7.5, 20, 0]);
    expect(r.joints.get(17)).toEqual([112.5, 20, 0]);
  });

  it("zig-zags the diagonals bottom-top-bottom", () => {
    expect(r.members.get(16)).toEqual([1, 10]);
    expect(r.members.get(17)).toEqual([10, 2]);
  });

  it("is connected and marks its supports", () => {
    expect(countComponents(r)).toBe(1);
    expect(r.landmarks.supports).toEqual([1, 9]);
    expect(r.landmarks.topChord).toHaveLength(8);
  });

  it("derives the panel count from a panel length", () => {
    const p = preview("warren-truss", { span: 120, height: 20, panelLength: 30 });
    expect(p.derived).toEqual({ panelCount: 4, panelLength: 30 });
    expect(p.joints).toBe(9);
  });
});

describe("pratt and howe trusses", () => {
  it("have p+1 verticals and one diagonal per panel", () => {
    const r = generate("pratt-truss", { span: 120, height: 20, panelCount: 8 });
    expect(r.joints.size).toBe(18);
    expect(countRoles(r)).toEqual({ "chord-bottom": 8, "chord-top": 8, vertical: 9, diagonal: 8 });
  });

  it("assigns the middle panel of an odd count to the left-hand rule", () => {
    expect(beforeMidspan(1, 5)).toBe(true);
    expect(beforeMidspan(2, 5)).toBe(true);
    expect(beforeMidspan(3, 5)).toBe(false);
    expect(beforeMidspan(1, 4)).toBe(true);
    expect(beforeMidspan(2, 4)).toBe(false);
  });

  it("runs pratt diagonals down toward midspan", () => {
    // bottom i -> id i+1, top i -> id i+7; diagonals start at member 17
    const r = generate("pratt-truss", { span: 100, height: 10, panelCount: 5 });
    expect(r.members.get(17)).toEqual([7, 2]);
    expect(r.members.get(19)).toEqual([9, 4]);
    expect(r.members.get(20)).toEqual([4, 11]);
  });

  it("mirrors the diagonals for howe", () => {
    const r = generate("howe-truss", { span: 100, height: 10, panelCount: 5 });
    expect(r.members.get(19)).toEqual([3, 10]);
    expect(r.members.get(20)).toEqual([10, 5]);
  });

  it("follows a pitched top chord", () => {
    const r = generate("howe-truss", { span: 40, eaveHeight: 10, ridgeHeight: 14, panelCount: 4 });
    expect(heights([6, 7, 8, 9, 10], r.joints)).toEqual([10, 12, 14, 12, 10]);
    expect(r.joints.get(8)).toEqual([20, 14, 0]);
  });
});

describe("truss rejection", () => {
  it("rejects a ridge equal to the eave", () => {
    let caught: unknown;
    try {
      generate("pratt-truss", { span: 100, eaveHeight: 20, ridgeHeight: 20, panelCount: 4 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InvalidParameterError);
    expect(caught).not.toBeInstanceOf(InfeasibleTopologyError);
    if (caught instanceof InvalidParameterError) {
      expect(caught.issues).toEqual([{ parameter: "ridgeHeight", constraint: "must exceed eaveHeight (20)" }]);
    }
  });

  it("rejects height together with a pitched profile", () => {
    expect(() => generate("warren-truss", { span: 100, height: 10, eaveHeight: 5, ridgeHeight: 8, panelCount: 4 }))
      .toThrow(InvalidParameterError);
  });

  it("needs exactly one of panelCount and panelLength", () => {
    expect(() => generate("warren-truss", { span: 100, height: 10 })).toThrow(/panelCount/);
    expect(() => generate("warren-truss", { span: 100, height: 10, panelCount: 4, panelLength: 25 }))
      .toThrow(InvalidParameterError);
  });

  it("rejects non-positive and out-of-range values", () => {
    expect(() => generate("warren-truss", { span: -1, height: 10, panelCount: 4 })).toThrow(InvalidParameterError);
    expect(() => generate("warren-truss", { span: 100, height: 10, panelCount: 21 })).toThrow(InvalidParameterError);
    expect(() => generate("warren-truss", { span: 100, height: 10, panelCount: 2.5 })).toThrow(InvalidParameterError);
  });

  it("reports a panel longer than the span as infeasible", () => {
    expect(() => generate("pratt-truss", { span: 100, height: 10, panelLength: 150 })).toThrow(InfeasibleTopologyError);
    expect(() => generate("pratt-truss", { span: 100, height: 10, panelLength: 0.1 })).toThrow(InfeasibleTopologyError);
  });
});

describe("bowstring arch", () => {
  const r = generate("bowstring-arch", { span: 120, height: 20, panelCount: 8 });
  const tops = r.landmarks.topChord;

  it("follows a sine rise that is zero at both springings", () => {
    expect(tops).toEqual([10, 11, 12, 13, 14, 15, 16, 17, 18]);
    expect(heights([10, 12, 14, 16, 18], r.joints)).toEqual([0, 14.142136, 20, 14.142136, 0]);
  });

  it("is symmetric about midspan", () => {
    expect(r.joints.get(11)?.[1]).toBe(r.joints.get(17)?.[1]);
  });

  it("needs at least two panels to rise", () => {
    expect(() => generate("bowstring-arch", { span: 120, height: 20, panelCount: 1 }))
      .toThrow("panelCount: a bowstring arch needs at least 2 panels");
    expect(() => generate("bowstring-arch", { span: 120, height: 20, panelLength: 80 })).toThrow(InfeasibleTopologyError);
    expect(generate("bowstring-arch", { span: 120, height: 20, panelCount: 2 }).joints.get(5)).toEqual([60, 20, 0]);
  });

  it("keeps a vertical at every bottom joint and one diagonal per panel", () => {
    expect(countRoles(r)).toEqual({ "chord-bottom": 8, "chord-top": 8, vertical: 9, diagonal: 8 });
    expect(countComponents(r)).toBe(1);
  });
});
