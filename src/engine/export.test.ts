import { describe, expect, it } from "vitest";
import { parseStructuralModel, replayToEngine, toConvention, toStructuralModel, type EngineSink } from "./export";
import { generate } from "./generate";

const truss = generate("warren-truss", { span: 10, height: 2, panelCount: 2 });

describe("toConvention", () => {
  it("keeps Y-up coordinates and swaps Y and Z for Z-up", () => {
    expect(toConvention([1, 2, 3], "y-up")).toEqual([1, 2, 3]);
    expect(toConvention([1, 2, 3], "z-up")).toEqual([1, 3, 2]);
    expect(toConvention([0.5, -4, 0], "z-up")).toEqual([0.5, 0, -4]);
  });
});

describe("toStructuralModel", () => {
  const model = toStructuralModel(truss, { name: "demo", units: "m" });

  it("carries joints, members and roles with their sections", () => {
    expect(model.project).toEqual({ name: "demo", kind: "warren-truss", units: "m", up: "y-up", density_kg_per_m3: 7850 });
    expect(model.joints).toHaveLength(5);
    expect(model.members[0]).toEqual({
      id: 1, role: "chord-bottom", joints: [1, 2], start: [0, 0, 0], end: [5, 0, 0], section: "W21X50"
    });
    expect(model.sections.map(s => s.name)).toEqual(["W21X50", "L40404"]);
    expect(model.landmarks.supports).toEqual([1, 3]);
  });

  it("transforms coordinates to the requested convention", () => {
    const zUp = toStructuralModel(truss, { name: "demo", units: "m", up: "z-up" });
    expect(zUp.project.up).toBe("z-up");
    expect(zUp.joints[3]).toEqual({ id: 4, position: [2.5, 0, 2] });
  });

  it("survives a JSON round trip through the schema", () => {
    expect(parseStructuralModel(JSON.parse(JSON.stringify(model)))).toEqual(model);
  });

  it("rejects a role mapped to an unknown section", () => {
    expect(() => toStructuralModel(truss, { name: "demo", units: "m", roleSections: { diagonal: "X1" } }))
      .toThrow("Section X1 for role diagonal is not in the section library");
  });

  it("restrains the support landmark, pinned for trusses", () => {
    expect(model.supports).toEqual({ type: "pinned", joints: [1, 3] });
    expect(model.loads).toEqual([]);
    const fixed = toStructuralModel(truss, { name: "demo", units: "m", support: "fixed" });
    expect(fixed.supports).toEqual({ type: "fixed", joints: [1, 3] });
  });

  it("fixes frame bases and wall bottoms", () => {
    const portal = generate("portal-frame", { width: 6, eaveHeight: 4, ridgeHeight: 5 });
    expect(toStructuralModel(portal, { name: "portal", units: "m" }).supports).toEqual({ type: "fixed", joints: [1, 5] });
    const wall = generate("plate-mesh", {
      wall: { height: 1, width: 2, thickness: 0.25 },
      slab: { length: 1, width: 1, thickness: 0.5 }
    });
    expect(toStructuralModel(wall, { name: "wall", units: "m" }).supports.joints).toEqual(wall.landmarks.wallBase);
  });

  it("loads every member of a role in the target convention", () => {
    const loaded = toStructuralModel(truss, {
      name: "demo",
      units: "m",
      up: "z-up",
      loads: [{ name: "wind", loads: [{ role: "diagonal", direction: [0, -1, 0], magnitude: 2.5 }] }]
    });
    expect(loaded.loads).toEqual([
      { name: "wind", loads: [{ role: "diagonal", members: [4, 5, 6, 7], direction: [0, 0, -1], magnitude: 2.5 }] }
    ]);
    expect(parseStructuralModel(JSON.parse(JSON.stringify(loaded)))).toEqual(loaded);
  });

  it("rejects a load on a role the topology does not have", () => {
    expect(() => toStructuralModel(truss, {
      name: "demo",
      units: "m",
      loads: [{ name: "snow", loads: [{ role: "purlin", direction: [0, -1, 0], magnitude: 1 }] }]
    })).toThrow("Load case snow: no purlin members to load");
  });

  it("exports plates with their component and thickness", () => {
    const mesh = generate("plate-mesh", {
      wall: { height: 1, width: 1, thickness: 0.25 },
      slab: { length: 1, width: 1, thickness: 0.5 }
    });
    const m = toStructuralModel(mesh, { name: "walls", units: "m" });
    expect(m.plates).toEqual([
      { id: 1, joints: [1, 3, 4, 2], component: "wall", thickness: 0.25 },
      { id: 2, joints: [5, 7, 8, 6], component: "slab", thickness: 0.5 }
    ]);
    expect(m.sections).toEqual([]);
    expect(m.project.density_kg_per_m3).toBe(2400);
  });
});

describe("parseStructuralModel", () => {
  it("rejects members that reference missing joints", () => {
    const model = toStructuralModel(truss, { name: "demo", units: "m" });
    const broken = { ...model, joints: model.joints.slice(1) };
    expect(() => parseStructuralModel(broken)).toThrow(/references a missing joint/);
  });

  it("rejects supports and loads on missing ids", () => {
    const model = toStructuralModel(truss, { name: "demo", units: "m" });
    expect(() => parseStructuralModel({ ...model, supports: { type: "pinned", joints: [1, 9] } }))
      .toThrow(/support joint 9 does not exist/);
    expect(() => parseStructuralModel({ ...model, supports: { type: "roller", joints: [1] } })).toThrow();
    const loads = [{ name: "dead", loads: [{ role: "diagonal", members: [4, 12], direction: [0, -1, 0], magnitude: 1 }] }];
    expect(() => parseStructuralModel({ ...model, loads })).toThrow(/loaded member 12 does not exist/);
  });

  it("rejects unknown sections", () => {
    const model = toStructuralModel(truss, { name: "demo", units: "m" });
    expect(() => parseStructuralModel({ ...model, sections: [] })).toThrow(/unknown section W21X50/);
  });
});

describe("replayToEngine", () => {
  function recorder() {
    const calls: string[] = [];
    const sink: EngineSink = {
      createJoint: async (id, x, y, z) => { calls.push(`joint ${id} ${x} ${y} ${z}`); },
      createMember: (id, start, end, role) => { calls.push(`member ${id} ${start}-${end} ${role}`); }
    };
    return { calls, sink };
  }

  it("pushes joints then members in id order", async () => {
    const { calls, sink } = recorder();
    const counts = await replayToEngine(truss, sink);
    expect(counts).toEqual({ joints: 5, members: 7, plates: 0 });
    expect(calls.slice(0, 2)).toEqual(["joint 1 0 0 0", "joint 2 5 0 0"]);
    expect(calls[5]).toBe("member 1 1-2 chord-bottom");
    expect(calls[calls.length - 1]).toBe("member 7 5-3 diagonal");
  });

  it("applies the axis convention to joints", async () => {
    const { calls, sink } = recorder();
    await replayToEngine(truss, sink, "z-up");
    expect(calls[3]).toBe("joint 4 2.5 0 2");
  });

  it("replays plates when the engine takes them", async () => {
    const plates: string[] = [];
    const { sink } = recorder();
    const mesh = generate("plate-mesh", {
      wall: { height: 1, width: 1, thickness: 0.25 },
      slab: { length: 1, width: 1, thickness: 0.5 }
    });
    const counts = await replayToEngine(mesh, { ...sink, createPlate: (id, joints) => { plates.push(`${id}:${joints.join(",")}`); } });
    expect(counts.plates).toBe(2);
    expect(plates).toEqual(["1:1,3,4,2", "2:5,7,8,6"]);
  });

  it("stops at the first failing call", async () => {
    const { calls, sink } = recorder();
    const failing: EngineSink = {
      ...sink,
      createMember: id => {
        if (id === 2) throw new Error("engine refused member 2");
        calls.push(`member ${id}`);
      }
    };
    await expect(replayToEngine(truss, failing)).rejects.toThrow("engine refused member 2");
    expect(calls).toHaveLength(6);
  });
});
