import * as Y from "yjs";
import { nanoid } from "nanoid";
import { z } from "zod";
import type { JsonObject, JsonValue } from "type-fest";
import { ConsistencyError, RemoteError } from "../errors";
import { type Logger, silentLogger } from "../logging";
import {
  childPath,
  type CollectionPath,
  type ResourcePath,
  ROOT_PATH,
  splitCollectionPath,
} from "../paths";
import type { CreateRequest, ModelTransport, ObjectInfo } from "../transport";
import { copyJson } from "../utils";
import { SERVER_GLOBALS } from "./SERVER_GLOBALS";

/** Returns a message when `properties` break the rule for objects of `kind`. */
export type ConsistencyRule = (kind: string, properties: Readonly<JsonObject>) => string | undefined;

/** What an update hook may do to the model while regenerating derived objects. */
export interface DerivedObjectContext {
  objects(kind?: string): ObjectInfo[];
  createDerived(parent: ResourcePath, collection: string, kind: string, properties: JsonObject): ObjectInfo;
  setProperty(path: ResourcePath, field: string, value: JsonValue): void;
}

export interface InProcessModelServerOptions {
  /** Name of the root model object. */
  name?: string;
  rules?: readonly ConsistencyRule[];
  onUpdate?: (context: DerivedObjectContext) => void;
  doc?: Y.Doc;
  logger?: Logger;
}

const parentReference = z.tuple([z.string(), z.string()]);
const duplicateSuffix = /\.\d+$/;

type ObjectMetadata = { kind: string; parent: [string, string] | null; sequence: number; derived: boolean };

/**
 * A model server living in the current process. Objects are kept in a Y.Doc,
 * keyed by id, each pointing at its parent; `snapshot()` and `load()` move whole
 * models around as Yjs updates.
 */
export class InProcessModelServer implements ModelTransport {
  readonly doc: Y.Doc;
  readonly #rules: readonly ConsistencyRule[];
  readonly #onUpdate: ((context: DerivedObjectContext) => void) | undefined;
  readonly #logger: Logger;

  constructor(options: InProcessModelServerOptions = {}) {
    this.doc = options.doc ?? new Y.Doc();
    this.#rules = options.rules ?? [];
    this.#onUpdate = options.onUpdate;
    this.#logger = options.logger ?? silentLogger;
    if (this.#metadata.get(SERVER_GLOBALS.metadataMapFields.rootId) === undefined) {
      this.doc.transact(() => {
        const rootId = nanoid();
        this.#metadata.set(SERVER_GLOBALS.metadataMapFields.rootId, rootId);
        this.#insert(rootId, "Model", null, { name: options.name ?? "Model" }, false);
      });
    }
  }

  /** Rebuilds a server from a {@link snapshot}; the result shares nothing with the original. */
  static load(snapshot: Uint8Array, options: Omit<InProcessModelServerOptions, "doc"> = {}): InProcessModelServer {
    const doc = new Y.Doc();
    Y.applyUpdate(doc, snapshot);
    return new InProcessModelServer({ ...options, doc });
  }

  snapshot(): Uint8Array {
    return Y.encodeStateAsUpdate(this.doc);
  }

  async create({ collection, kind, properties }: CreateRequest): Promise<ObjectInfo> {
    const { parent, collection: label } = splitCollectionPath(collection);
    const parentId = this.#locate(parent);
    const id = nanoid();
    const requested = typeof properties.name === "string" && properties.name !== "" ? properties.name : kind;
    const stored = { ...copyJson(properties), name: this.#uniqueName(parentId, label, requested) };
    this.#check(kind, stored);
    this.doc.transact(() => this.#insert(id, kind, [parentId, label], stored, false));
    this.#logger.debug(`created ${kind} "${stored.name}" in ${collection}`);
    return this.#info(id);
  }

  async get(path: ResourcePath): Promise<ObjectInfo> {
    return this.#info(this.#locate(path));
  }

  async read(path: ResourcePath, field: string): Promise<JsonValue> {
    const value = this.#properties(this.#locate(path)).get(field);
    return value === undefined ? null : copyJson(value);
  }

  async update(path: ResourcePath, field: string, value: JsonValue): Promise<void> {
    const id = this.#locate(path);
    const metadata = this.#describe(id);
    const properties = this.#properties(id);
    let next = copyJson(value);
    if (field === "name") {
      if (typeof next !== "string") {
        throw new RemoteError(`name of ${path} must be a string`, "INVALID_ARGUMENT");
      }
      if (metadata.parent !== null) {
        const [parentId, label] = metadata.parent;
        next = this.#uniqueName(parentId, label, next || metadata.kind, id);
      }
    }
    this.#check(metadata.kind, { ...properties.toJSON(), [field]: next });
    properties.set(field, next);
  }

  async delete(path: ResourcePath): Promise<void> {
    const id = this.#locate(path);
    if (path === ROOT_PATH) {
      throw new RemoteError("the model root cannot be deleted", "INVALID_ARGUMENT");
    }
    this.doc.transact(() => this.#remove(id));
  }

  async list(collection: CollectionPath): Promise<ObjectInfo[]> {
    const { parent, collection: label } = splitCollectionPath(collection);
    return this.#children(this.#locate(parent), label).map((id) => this.#info(id));
  }

  async updateModel(): Promise<void> {
    this.doc.transact(() => {
      for (const id of this.#ids()) {
        if (this.#objects.has(id) && this.#describe(id).derived) {
          this.#remove(id);
        }
      }
      this.#onUpdate?.({
        objects: (kind) =>
          this.#ids()
            .filter((id) => kind === undefined || this.#describe(id).kind === kind)
            .map((id) => this.#info(id)),
        createDerived: (parent, label, kind, properties) => {
          const parentId = this.#locate(parent);
          const id = nanoid();
          const requested = typeof properties.name === "string" && properties.name !== "" ? properties.name : kind;
          const stored = { ...copyJson(properties), name: this.#uniqueName(parentId, label, requested) };
          this.#insert(id, kind, [parentId, label], stored, true);
          return this.#info(id);
        },
        setProperty: (path, field, value) => {
          this.#properties(this.#locate(path)).set(field, copyJson(value));
        },
      });
    });
    this.#logger.debug("model updated");
  }

  get #objects(): Y.Map<Y.Map<JsonValue>> {
    return this.doc.getMap<Y.Map<JsonValue>>(SERVER_GLOBALS.objects);
  }

  get #propertyMaps(): Y.Map<Y.Map<JsonValue>> {
    return this.doc.getMap<Y.Map<JsonValue>>(SERVER_GLOBALS.properties);
  }

  get #metadata(): Y.Map<JsonValue> {
    return this.doc.getMap<JsonValue>(SERVER_GLOBALS.metadataMap);
  }

  get #rootId(): string {
    const rootId = this.#metadata.get(SERVER_GLOBALS.metadataMapFields.rootId);
    if (typeof rootId !== "string") {
      throw new RemoteError("the model has no root", "UNAVAILABLE");
    }
    return rootId;
  }

  #insert(id: string, kind: string, parent: [string, string] | null, properties: JsonObject, derived: boolean) {
    const sequence = this.#metadata.get(SERVER_GLOBALS.metadataMapFields.sequence);
    const next = typeof sequence === "number" ? sequence + 1 : 1;
    this.#metadata.set(SERVER_GLOBALS.metadataMapFields.sequence, next);

    const entry = new Y.Map<JsonValue>();
    entry.set(SERVER_GLOBALS.objectKind, kind);
    entry.set(SERVER_GLOBALS.objectParent, parent);
    entry.set(SERVER_GLOBALS.objectSequence, next);
    entry.set(SERVER_GLOBALS.objectDerived, derived);
    this.#objects.set(id, entry);

    const values = new Y.Map<JsonValue>();
    for (const [field, value] of Object.entries(properties)) {
      if (value !== undefined) {
        values.set(field, value);
      }
    }
    this.#propertyMaps.set(id, values);
  }

  #remove(id: string) {
    for (const childId of this.#ids()) {
      const parent = this.#describe(childId).parent;
      if (parent !== null && parent[0] === id && this.#objects.has(childId)) {
        this.#remove(childId);
      }
    }
    this.#objects.delete(id);
    this.#propertyMaps.delete(id);
  }

  #ids(): string[] {
    return [...this.#objects.keys()].sort((a, b) => this.#describe(a).sequence - this.#describe(b).sequence);
  }

  #describe(id: string): ObjectMetadata {
    const entry = this.#objects.get(id);
    if (!entry) {
      throw new RemoteError(`no object with id ${id}`, "NOT_FOUND");
    }
    const kind = entry.get(SERVER_GLOBALS.objectKind);
    const sequence = entry.get(SERVER_GLOBALS.objectSequence);
    const parent = entry.get(SERVER_GLOBALS.objectParent);
    if (typeof kind !== "string" || typeof sequence !== "number") {
      throw new RemoteError(`object ${id} is corrupt`, "UNAVAILABLE");
    }
    return {
      kind,
      sequence,
      parent: parent === null ? null : parentReference.parse(parent),
      derived: entry.get(SERVER_GLOBALS.objectDerived) === true,
    };
  }

  #properties(id: string): Y.Map<JsonValue> {
    const properties = this.#propertyMaps.get(id);
    if (!properties) {
      throw new RemoteError(`no object with id ${id}`, "NOT_FOUND");
    }
    return properties;
  }

  #children(parentId: string, label: string): string[] {
    return this.#ids().filter((id) => {
      const parent = this.#describe(id).parent;
      return parent !== null && parent[0] === parentId && parent[1] === label;
    });
  }

  #pathOf(id: string): ResourcePath {
    const { parent } = this.#describe(id);
    if (parent === null) {
      return ROOT_PATH;
    }
    const [parentId, label] = parent;
    return childPath(this.#pathOf(parentId), label, id);
  }

  // resolves a path to an id, checking every step of it
  #locate(path: ResourcePath): string {
    if (path === ROOT_PATH) {
      return this.#rootId;
    }
    const segments = path.split("/");
    if (segments.length % 2 !== 0 || segments.some((segment) => segment === "")) {
      throw new RemoteError(`malformed resource path "${path}"`, "INVALID_ARGUMENT");
    }
    let current = this.#rootId;
    for (let index = 0; index < segments.length; index += 2) {
      const [label, id] = segments.slice(index, index + 2);
      const parent = id === undefined || !this.#objects.has(id) ? null : this.#describe(id).parent;
      if (id === undefined || parent === null || parent[0] !== current || parent[1] !== label) {
        throw new RemoteError(`no object at "${path}"`, "NOT_FOUND");
      }
      current = id;
    }
    return current;
  }

  #info(id: string): ObjectInfo {
    return {
      id,
      path: this.#pathOf(id),
      kind: this.#describe(id).kind,
      properties: copyJson(this.#properties(id).toJSON()),
    };
  }

  #uniqueName(parentId: string, label: string, requested: string, except?: string): string {
    const taken = new Set(
      this.#children(parentId, label)
        .filter((id) => id !== except)
        .map((id) => this.#properties(id).get("name")),
    );
    if (!taken.has(requested)) {
      return requested;
    }
    const base = requested.replace(duplicateSuffix, "");
    for (let suffix = 2; ; suffix++) {
      const candidate = `${base}.${suffix}`;
      if (!taken.has(candidate)) {
        return candidate;
      }
    }
  }

  #check(kind: string, properties: Readonly<JsonObject>) {
    for (const rule of this.#rules) {
      const violation = rule(kind, properties);
      if (violation !== undefined) {
        throw new ConsistencyError(violation);
      }
    }
  }
}
