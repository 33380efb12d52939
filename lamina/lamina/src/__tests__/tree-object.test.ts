import { describe, expect, it } from "vitest";
import {
  AlreadyStoredError,
  CrossModelLinkError,
  InvalidParentError,
  NotAvailableError,
  RemoteError,
  UnstoredObjectError,
} from "../errors";
import { Fabric, FabricWithAngle, Material, ModelingGroup, ModelingPly, Stackup, openModel } from "../kinds";
import { DraftSeed } from "../TreeObject";
import { createModel, createScriptedModel, generateDerivedObjects } from "./helpers";

describe("unstored objects", () => {
  it("should keep construction values locally", async () => {
    const fabric = new Fabric({ name: "F1", thickness: 0.2 });

    expect(fabric.isStored).toBe(false);
    expect(fabric.id).toBe("");
    expect(fabric.path).toBeNull();
    expect(fabric.session).toBeNull();
    expect(fabric.parent).toBeNull();
    expect(String(fabric)).toBe("Fabric(unstored)");
    expect(await fabric.name.get()).toBe("F1");
    expect(await fabric.thickness.get()).toBe(0.2);
    expect(await fabric.areaPrice.get()).toBe(0);
    expect(await fabric.material.get()).toBeNull();
  });

  it("should apply writes to the draft", async () => {
    const material = new Material({ name: "Mat1" });
    const fabric = new Fabric();

    await fabric.thickness.set(0.3);
    await fabric.material.set(material);

    expect(await fabric.thickness.get()).toBe(0.3);
    expect(await fabric.material.get()).toBe(material);
  });

  it("should reject unknown fields and invalid values", async () => {
    expect(() => new Fabric(new DraftSeed(new Map([["colour", "red"]])))).toThrow(TypeError);
    expect(() => new Fabric(new DraftSeed(new Map([["thickness", -1]])))).toThrow(
      /Invalid value for field "thickness"/,
    );
    expect(() => new ModelingPly(new DraftSeed(new Map([["plyMaterial", new Material()]])))).toThrow(
      'Field "plyMaterial" expects Fabric or Stackup, got Material',
    );
    await expect(new Fabric().thickness.set(-1)).rejects.toThrow(TypeError);
  });

  it("should not read derived values before storing", async () => {
    await expect(new Fabric().arealWeight.get()).rejects.toBeInstanceOf(NotAvailableError);
  });

  it("should list no children and refuse to create any", async () => {
    const group = new ModelingGroup({ name: "MG1" });

    expect(await group.modelingPlies.size()).toBe(0);
    await expect(group.modelingPlies.create({ name: "MP1" })).rejects.toBeInstanceOf(UnstoredObjectError);
  });
});

describe("store()", () => {
  it("should create the object under its parent", async () => {
    const { model } = await createModel();
    const material = await model.createMaterial({ name: "Mat1" });
    const fabric = new Fabric({ name: "F1", material, thickness: 0.002 });

    await fabric.store(model);

    expect(fabric.isStored).toBe(true);
    expect(fabric.path).toBe(`fabrics/${fabric.id}`);
    expect(fabric.parent).toBe(model);
    expect(String(fabric)).toBe(`Fabric(fabrics/${fabric.id})`);
    expect(await fabric.material.get()).toBe(material);
    expect(await fabric.thickness.get()).toBe(0.002);
    const [listed] = await model.fabrics.values();
    expect(listed).toBe(fabric);
  });

  it("should store each object only once", async () => {
    const { model } = await createModel();
    const fabric = new Fabric({ name: "F1" });
    await fabric.store(model);

    await expect(fabric.store(model)).rejects.toBeInstanceOf(AlreadyStoredError);
    expect(await model.fabrics.size()).toBe(1);
  });

  it("should refuse a second store while the first is in flight", async () => {
    const { model } = await createModel();
    const fabric = new Fabric({ name: "F1" });

    const first = fabric.store(model);
    await expect(fabric.store(model)).rejects.toBeInstanceOf(AlreadyStoredError);
    await first;

    expect(await model.fabrics.size()).toBe(1);
  });

  it("should send writes issued during store to the stored object", async () => {
    const { model } = await createModel();
    const fabric = new Fabric({ name: "F1", thickness: 1 });

    const storing = fabric.store(model);
    const read = fabric.thickness.get();
    await fabric.thickness.set(5);
    await storing;

    expect(await read).toBe(1);
    expect(await fabric.thickness.get()).toBe(5);
    const [stored] = await model.fabrics.values();
    expect(stored).toBe(fabric);
    expect(await model.fabrics.size()).toBe(1);
  });

  it("should keep writes issued during a failed store in the draft", async () => {
    const { model, transport } = await createScriptedModel();
    transport.failAfter("create", 0);
    const fabric = new Fabric({ name: "F1", thickness: 1 });

    const storing = fabric.store(model);
    const writing = fabric.thickness.set(5);

    await expect(storing).rejects.toBeInstanceOf(RemoteError);
    await writing;
    expect(fabric.isStored).toBe(false);
    expect(await fabric.thickness.get()).toBe(5);
    expect(transport.mutations()).toEqual(["create fabrics"]);
  });

  it("should reject a parent of the wrong kind", async () => {
    const { model } = await createModel();

    await expect(new ModelingPly({ name: "MP1" }).store(model)).rejects.toBeInstanceOf(InvalidParentError);
  });

  it("should reject an unstored parent", async () => {
    await expect(new ModelingPly().store(new ModelingGroup())).rejects.toBeInstanceOf(UnstoredObjectError);
  });

  it("should reject links to unstored objects", async () => {
    const { model } = await createModel();
    const fabric = new Fabric({ name: "F1", material: new Material({ name: "Mat1" }) });

    await expect(fabric.store(model)).rejects.toThrow("Cannot link to unstored objects");
    expect(fabric.isStored).toBe(false);
    expect(await model.fabrics.size()).toBe(0);
  });

  it("should reject links into another model", async () => {
    const first = await createModel();
    const second = await createModel();
    const foreign = await second.model.createMaterial({ name: "Mat1" });

    await expect(new Fabric({ material: foreign }).store(first.model)).rejects.toBeInstanceOf(CrossModelLinkError);

    const fabric = await first.model.createFabric({ name: "F1" });
    await expect(fabric.material.set(foreign)).rejects.toBeInstanceOf(CrossModelLinkError);
  });

  it("should dedupe names among siblings", async () => {
    const { model } = await createModel();
    const first = await model.createFabric({ name: "F1" });
    const second = await model.createFabric({ name: "F1" });
    const unnamed = await model.createFabric();

    expect(await first.name.get()).toBe("F1");
    expect(await second.name.get()).toBe("F1.2");
    expect(await unnamed.name.get()).toBe("Fabric");
  });
});

describe("stored objects", () => {
  it("should read and write fields remotely", async () => {
    const { model, transport } = await createScriptedModel();
    const fabric = await model.createFabric({ name: "F1" });

    await fabric.thickness.set(0.5);

    expect(await fabric.thickness.get()).toBe(0.5);
    expect(transport.calls.slice(-2)).toEqual([
      `update fabrics/${fabric.id}#thickness`,
      `read fabrics/${fabric.id}#thickness`,
    ]);
  });

  it("should accept either kind of ply material", async () => {
    const { model } = await createModel();
    const group = await model.createModelingGroup({ name: "MG1" });
    const stackup = await model.createStackup({ name: "S1" });
    const ply = await group.createModelingPly({ name: "MP1", plyMaterial: stackup });

    expect(ply.parent).toBe(group);
    expect(await ply.plyMaterial.get()).toBe(stackup);
    expect(await ply.numberOfLayers.get()).toBe(1);
    expect(await ply.active.get()).toBe(true);
  });

  it("should apply writes in the order they were issued", async () => {
    const { model } = await createModel();
    const fabric = await model.createFabric({ name: "F1" });

    const writes = [fabric.thickness.set(1), fabric.thickness.set(2), fabric.thickness.set(3)];
    const read = fabric.thickness.get();
    await Promise.all(writes);

    expect(await read).toBe(3);
    expect(await fabric.thickness.get()).toBe(3);
  });

  it("should read derived values once the model is updated", async () => {
    const { model } = await createModel({ onUpdate: generateDerivedObjects });
    const material = await model.createMaterial({ name: "Mat1", density: 1500 });
    const fabric = await model.createFabric({ name: "F1", material, thickness: 0.002 });

    await expect(fabric.arealWeight.get()).rejects.toBeInstanceOf(NotAvailableError);
    await model.update();

    expect(await fabric.arealWeight.get()).toBeCloseTo(3);
  });

  it("should share proxies within a session only", async () => {
    const { server, model } = await createModel();
    const fabric = await model.createFabric({ name: "F1" });
    const other = await openModel(server, { logLevel: "silent" });

    const [sameSession] = await model.fabrics.values();
    const [otherSession] = await other.fabrics.values();

    expect(sameSession).toBe(fabric);
    expect(otherSession).not.toBe(fabric);
    expect(otherSession.id).toBe(fabric.id);
  });

  it("should delete an object with its subtree", async () => {
    const { model } = await createModel();
    const group = await model.createModelingGroup({ name: "MG1" });
    const ply = await group.createModelingPly({ name: "MP1" });

    await group.delete();

    expect(await model.modelingGroups.size()).toBe(0);
    await expect(ply.name.get()).rejects.toMatchObject({ code: "NOT_FOUND" });
    await expect(ply.name.get()).rejects.toBeInstanceOf(RemoteError);
  });
});

describe("clone()", () => {
  it("should snapshot the source with a single read", async () => {
    const { model, transport } = await createScriptedModel();
    const material = await model.createMaterial({ name: "Mat1" });
    const fabric = await model.createFabric({ name: "F1", material, thickness: 0.4 });
    const before = transport.calls.length;

    const copy = await fabric.clone();

    expect(transport.calls.slice(before)).toEqual([`get fabrics/${fabric.id}`]);
    expect(copy).toBeInstanceOf(Fabric);
    expect(copy.isStored).toBe(false);
    expect(copy.id).toBe("");
    expect(copy.parent).toBeNull();
    expect(fabric.parent).toBe(model);
    expect(await copy.name.get()).toBe("F1");
    expect(await copy.thickness.get()).toBe(0.4);
    expect(await copy.material.get()).toBe(material);
  });

  it("should store the clone as a new object", async () => {
    const { model } = await createModel();
    const fabric = await model.createFabric({ name: "F1", thickness: 0.4 });

    const copy = await fabric.clone();
    await copy.store(model);

    expect(copy.id).not.toBe(fabric.id);
    expect(await copy.name.get()).toBe("F1.2");
    expect(await model.fabrics.size()).toBe(2);
  });

  it("should copy stackup layers", async () => {
    const { model } = await createModel();
    const fabric = await model.createFabric({ name: "F1" });
    const stackup = await model.createStackup({ name: "S1", symmetry: "even_symmetry" });
    await stackup.fabrics.append(...[0, 45].map((angle) => new FabricWithAngle(fabric, angle)));

    const copy = await stackup.clone();
    const layers = await copy.fabrics.toArray();

    expect(layers.map((layer) => layer.angle)).toEqual([0, 45]);
    expect(layers.every((layer) => layer.fabric === fabric)).toBe(true);
    expect(await copy.symmetry.get()).toBe("even_symmetry");
    expect(copy).toBeInstanceOf(Stackup);
  });
});
