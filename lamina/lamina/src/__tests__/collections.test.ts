import { describe, expect, it } from "vitest";
import { FabricWithAngle, ModelingPly, OrientedSelectionSet } from "../kinds";
import { createModel, createScriptedModel, names } from "./helpers";

describe("Mapping", () => {
  it("should list children in creation order, keyed by id", async () => {
    const { model } = await createModel();
    const first = await model.createMaterial({ name: "Mat1" });
    const second = await model.createMaterial({ name: "Mat2" });

    expect(await model.materials.keys()).toEqual([first.id, second.id]);
    expect(await names(await model.materials.values())).toEqual(["Mat1", "Mat2"]);
    expect(await model.materials.size()).toBe(2);
    expect(await model.materials.get(second.id)).toBe(second);
    expect(await model.materials.get("missing")).toBeUndefined();
    expect(await model.materials.has(first.id)).toBe(true);

    const [[id, entry]] = await model.materials.entries();
    expect(id).toBe(first.id);
    expect(entry).toBe(first);
  });

  it("should find children by name", async () => {
    const { model } = await createModel();
    const group = await model.createModelingGroup({ name: "MG1" });
    const ply = await group.createModelingPly({ name: "MP1" });

    expect(await group.modelingPlies.findByName("MP1")).toBe(ply);
    expect(await group.modelingPlies.findByName("MP2")).toBeUndefined();
  });

  it("should iterate asynchronously", async () => {
    const { model } = await createModel();
    await model.createElementSet({ name: "E1" });
    await model.createElementSet({ name: "E2" });

    const seen: string[] = [];
    for await (const elementSet of model.elementSets) {
      seen.push(await elementSet.name.get());
    }

    expect(seen).toEqual(["E1", "E2"]);
  });

  it("should keep collections of different parents apart", async () => {
    const { model } = await createModel();
    const first = await model.createModelingGroup({ name: "MG1" });
    const second = await model.createModelingGroup({ name: "MG2" });
    await first.createModelingPly({ name: "MP1" });

    expect(await first.modelingPlies.size()).toBe(1);
    expect(await second.modelingPlies.size()).toBe(0);
  });

  it("should list freshly on every read", async () => {
    const { model, transport } = await createScriptedModel();
    await model.materials.size();
    await model.materials.size();

    expect(transport.calls.filter((call) => call === "list materials")).toHaveLength(2);
  });
});

describe("EdgePropertyList", () => {
  async function setup() {
    const { model, transport } = await createScriptedModel();
    const group = await model.createModelingGroup({ name: "MG1" });
    const ply = await group.createModelingPly({ name: "MP1" });
    const sets = await Promise.all(
      ["O1", "O2", "O3"].map((name) => model.createOrientedSelectionSet({ name })),
    );
    return { model, transport, ply, sets };
  }

  it("should start empty", async () => {
    const ply = new ModelingPly();

    expect(await ply.orientedSelectionSets.toArray()).toEqual([]);
    expect(await ply.orientedSelectionSets.length()).toBe(0);
  });

  it("should append, insert, move and remove entries", async () => {
    const { ply, sets } = await setup();
    const [o1, o2, o3] = sets;
    const list = ply.orientedSelectionSets;

    await list.append(o1, o2);
    await list.insert(0, o3);
    expect(await names(await list.toArray())).toEqual(["O3", "O1", "O2"]);

    await list.move(0, 2);
    expect(await names(await list.toArray())).toEqual(["O1", "O2", "O3"]);

    await list.remove(1);
    expect(await names(await list.toArray())).toEqual(["O1", "O3"]);
    expect(await list.at(-1)).toBe(o3);
    expect(await list.length()).toBe(2);

    await list.clear();
    expect(await list.length()).toBe(0);
  });

  it("should reject indices out of range", async () => {
    const { ply, sets } = await setup();
    await ply.orientedSelectionSets.replace(sets);

    await expect(ply.orientedSelectionSets.remove(3)).rejects.toThrow(RangeError);
    await expect(ply.orientedSelectionSets.insert(-1, sets[0])).rejects.toThrow(RangeError);
    await expect(ply.orientedSelectionSets.move(0, 5)).rejects.toThrow(RangeError);
    expect(await ply.orientedSelectionSets.length()).toBe(3);
  });

  it("should rewrite the whole field in one update per mutation", async () => {
    const { ply, sets, transport } = await setup();
    const before = transport.mutations().length;

    await ply.orientedSelectionSets.append(...sets);
    await ply.orientedSelectionSets.remove(0);

    expect(transport.mutations().slice(before)).toEqual([
      `update ${ply.path}#orientedSelectionSets`,
      `update ${ply.path}#orientedSelectionSets`,
    ]);
  });

  it("should keep concurrent appends", async () => {
    const { ply, sets } = await setup();

    await Promise.all(sets.map((set) => ply.orientedSelectionSets.append(set)));

    expect(await ply.orientedSelectionSets.toArray()).toEqual(sets);
  });

  it("should hold stackup layers with their angles", async () => {
    const { model } = await createModel();
    const f1 = await model.createFabric({ name: "F1" });
    const f2 = await model.createFabric({ name: "F2" });
    const stackup = await model.createStackup({
      name: "S1",
      fabrics: [new FabricWithAngle(f1, 0), new FabricWithAngle(f2, 45)],
    });

    await stackup.fabrics.append(new FabricWithAngle(f1, 90));
    const layers = await stackup.fabrics.toArray();

    expect(layers.map((layer) => [layer.fabric, layer.angle])).toEqual([
      [f1, 0],
      [f2, 45],
      [f1, 90],
    ]);
  });

  it("should edit the draft of an unstored owner", async () => {
    const { model } = await createModel();
    const rosette = await model.createRosette({ name: "R1" });
    const set = new OrientedSelectionSet();

    await expect(set.rosettes.append(rosette)).resolves.toBeUndefined();
    expect(await set.rosettes.toArray()).toEqual([rosette]);
  });
});
