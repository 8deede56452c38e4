import { describe, expect, it } from "vitest";
import { JobSchema, mergeParams, parseCliArgs, parseValue, setPath } from "./args";

describe("parseCliArgs", () => {
  it("collects the kind, overrides and outputs", () => {
    const opts = parseCliArgs([
      "pratt-truss", "--set", "span=100", "-s", "panelCount=5", "--up", "z", "--out", "out/model.json"
    ]);
    expect(opts.kind).toBe("pratt-truss");
    expect(opts.sets).toEqual({ span: 100, panelCount: 5 });
    expect(opts.up).toBe("z-up");
    expect(opts.out).toBe("out/model.json");
    expect(opts.preview).toBe(false);
    expect(opts.support).toBeUndefined();
    expect(parseCliArgs(["rigid-frame", "--support", "pinned"]).support).toBe("pinned");
  });

  it("nests dotted parameter names", () => {
    const opts = parseCliArgs(["plate-mesh", "--set", "wall.height=3", "--set", "wall.width=4", "--preview"]);
    expect(opts.sets).toEqual({ wall: { height: 3, width: 4 } });
    expect(opts.preview).toBe(true);
  });

  it("rejects malformed options", () => {
    expect(() => parseCliArgs(["warren-truss", "--set", "span"])).toThrow("--set expects key=value, got span");
    expect(() => parseCliArgs(["warren-truss", "--up", "x"])).toThrow("--up expects y or z, got x");
    expect(() => parseCliArgs(["warren-truss", "--units", "cm"])).toThrow(/--units/);
    expect(() => parseCliArgs(["warren-truss", "--support", "roller"])).toThrow("--support expects fixed or pinned, got roller");
    expect(() => parseCliArgs(["warren-truss", "howe-truss"])).toThrow(/one topology kind/);
  });
});

describe("parameter helpers", () => {
  it("reads numbers and booleans from strings", () => {
    expect(parseValue("12.5")).toBe(12.5);
    expect(parseValue("true")).toBe(true);
    expect(parseValue("false")).toBe(false);
    expect(parseValue("abc")).toBe("abc");
    expect(parseValue("")).toBe("");
  });

  it("writes dotted paths without dropping siblings", () => {
    const target: Record<string, unknown> = { slab: { length: 2, width: 3 } };
    setPath(target, "slab.width", 5);
    expect(target).toEqual({ slab: { length: 2, width: 5 } });
    expect(() => setPath(target, "slab..width", 1)).toThrow("Bad parameter name: slab..width");
  });

  it("merges overrides deeply", () => {
    const base = { span: 10, wall: { height: 2, width: 3 } };
    expect(mergeParams(base, { wall: { height: 5 } })).toEqual({ span: 10, wall: { height: 5, width: 3 } });
    expect(base.wall.height).toBe(2);
  });

  it("fills job defaults", () => {
    expect(JobSchema.parse({ kind: "howe-truss" })).toEqual({ kind: "howe-truss", params: {}, export: {} });
    expect(JobSchema.safeParse({ kind: "space-frame" }).success).toBe(false);
    expect(JobSchema.safeParse({ export: { support: "roller" } }).success).toBe(false);
    expect(JobSchema.safeParse({ export: { loads: [{ name: "dead", loads: [{ role: "rafter", direction: [0, -1, 0], magnitude: 2 }] }] } }).success)
      .toBe(true);
  });
});
