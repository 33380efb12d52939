import type { JsonValue } from "type-fest";
import { openModel } from "../kinds/Model";
import type { CollectionPath, ResourcePath } from "../paths";
import { type DerivedObjectContext, InProcessModelServer, type InProcessModelServerOptions } from "../server";
import type { CreateRequest, ModelTransport, ObjectInfo } from "../transport";
import { type CreatableTreeObject, isSameKind } from "../TreeObject";

export async function createModel(options: InProcessModelServerOptions = {}) {
  const server = new InProcessModelServer(options);
  const model = await openModel(server, { logLevel: "silent" });
  return { server, model };
}

type Operation = keyof ModelTransport;

/** Forwards to another transport, recording every call and refusing the ones it is told to. */
export class ScriptedTransport implements ModelTransport {
  readonly calls: string[] = [];
  readonly #allowed = new Map<Operation, number>();

  constructor(private readonly inner: ModelTransport) {}

  /** Lets `allowed` more calls of `operation` through, then fails every later one. */
  failAfter(operation: Operation, allowed: number) {
    this.#allowed.set(operation, allowed);
  }

  mutations(): string[] {
    return this.calls.filter((call) => /^(create|update|delete|updateModel)\b/.test(call));
  }

  create(request: CreateRequest): Promise<ObjectInfo> {
    return this.#run("create", request.collection, () => this.inner.create(request));
  }

  get(path: ResourcePath): Promise<ObjectInfo> {
    return this.#run("get", path, () => this.inner.get(path));
  }

  read(path: ResourcePath, field: string): Promise<JsonValue> {
    return this.#run("read", `${path}#${field}`, () => this.inner.read(path, field));
  }

  update(path: ResourcePath, field: string, value: JsonValue): Promise<void> {
    return this.#run("update", `${path}#${field}`, () => this.inner.update(path, field, value));
  }

  delete(path: ResourcePath): Promise<void> {
    return this.#run("delete", path, () => this.inner.delete(path));
  }

  list(collection: CollectionPath): Promise<ObjectInfo[]> {
    return this.#run("list", collection, () => this.inner.list(collection));
  }

  updateModel(): Promise<void> {
    return this.#run("updateModel", "", () => this.inner.updateModel());
  }

  async #run<R>(operation: Operation, target: string, invoke: () => Promise<R>): Promise<R> {
    this.calls.push(`${operation} ${target}`.trimEnd());
    const allowed = this.#allowed.get(operation);
    if (allowed !== undefined) {
      if (allowed === 0) {
        throw new Error(`${operation} refused`);
      }
      this.#allowed.set(operation, allowed - 1);
    }
    return invoke();
  }
}

export async function createScriptedModel(options: InProcessModelServerOptions = {}) {
  const server = new InProcessModelServer(options);
  const transport = new ScriptedTransport(server);
  const model = await openModel(transport, { logLevel: "silent" });
  return { server, transport, model };
}

/** Update hook: one production ply per active modeling ply, and fabric areal weights. */
export function generateDerivedObjects(context: DerivedObjectContext) {
  for (const ply of context.objects("ModelingPly")) {
    const { name, plyAngle, numberOfLayers, active } = ply.properties;
    if (active === false) {
      continue;
    }
    context.createDerived(ply.path, "production_plies", "ProductionPly", {
      name: `P-${String(name)}`,
      angle: typeof plyAngle === "number" ? plyAngle : 0,
      thickness: typeof numberOfLayers === "number" ? numberOfLayers * 0.5 : 0.5,
    });
  }
  const materials = context.objects("Material");
  for (const fabric of context.objects("Fabric")) {
    const material = materials.find((candidate) => candidate.path === fabric.properties.material);
    const density = material?.properties.density;
    const thickness = fabric.properties.thickness;
    if (typeof density === "number" && typeof thickness === "number") {
      context.setProperty(fabric.path, "arealWeight", density * thickness);
    }
  }
}

export function copyOf<T extends CreatableTreeObject>(
  copies: ReadonlyMap<CreatableTreeObject, CreatableTreeObject>,
  original: T,
): T {
  const copy = copies.get(original);
  if (copy === undefined || !isSameKind(original, copy)) {
    throw new Error(`${original} was not copied`);
  }
  return copy;
}

export async function names(objects: Iterable<{ name: { get(): Promise<string> } }>): Promise<string[]> {
  return Promise.all([...objects].map((object) => object.name.get()));
}
