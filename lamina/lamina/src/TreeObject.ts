import invariant from "tiny-invariant";
import type { JsonValue } from "type-fest";
import { z } from "zod";
import { remote } from "./decorators";
import type { ModelSession } from "./ModelSession";
import type { Property } from "./properties";
import {
  type ChildrenFieldDescriptor,
  collectionOf,
  type DerivedFieldDescriptor,
  describeKind,
  type KindDescriptor,
  type StateFieldDescriptor,
} from "./schema";
import { collectionPath, type ResourcePath, ROOT_PATH, splitPath } from "./paths";
import {
  acceptDraftValue,
  buildDraft,
  decodeRecord,
  decodeValue,
  type DraftRecord,
  encodeDraft,
  encodeValue,
} from "./record";
import {
  deleteSymbol,
  instantiateSymbol,
  listChildrenSymbol,
  readDerivedSymbol,
  readFieldSymbol,
  snapshotSymbol,
  storeSymbol,
  updateFieldSymbol,
  writeFieldSymbol,
} from "./runtime-symbols";
import {
  AlreadyStoredError,
  CrossModelLinkError,
  InvalidParentError,
  NotAvailableError,
  UnstoredObjectError,
} from "./errors";
import { isInstanceOfAny } from "./utils";
import { DraftSeed, type ObjectSeed, StoredSeed } from "./seeds";

export { DraftSeed, StoredSeed, type ObjectSeed } from "./seeds";

type ObjectState =
  | { readonly status: "unstored"; readonly draft: DraftRecord }
  | { readonly status: "stored"; readonly session: ModelSession; readonly path: ResourcePath; readonly id: string };

export type StoredLocation = { readonly session: ModelSession; readonly path: ResourcePath };

/**
 * Local handle of one object of a remote model.
 *
 * An unstored object keeps its field values in a draft record and costs no I/O; a
 * stored one keeps only its address, so every field read and write is a remote call.
 * Remote calls of one object run in the order they were issued.
 */
export abstract class TreeObject {
  #state: ObjectState;
  #queue: Promise<unknown> = Promise.resolve();
  #storing = false;

  @remote.value(z.string(), "")
  accessor name!: Property<string>;

  constructor(init: object | ObjectSeed = {}) {
    if (init instanceof StoredSeed) {
      this.#state = { status: "stored", session: init.session, path: init.path, id: init.id };
    } else {
      const values = init instanceof DraftSeed ? init.values : new Map(Object.entries(init));
      this.#state = { status: "unstored", draft: buildDraft(describeKind(new.target), values) };
    }
  }

  /** Server-assigned id; `""` while unstored. */
  get id(): string {
    return this.#state.status === "stored" ? this.#state.id : "";
  }

  get isStored(): boolean {
    return this.#state.status === "stored";
  }

  get session(): ModelSession | null {
    return this.#state.status === "stored" ? this.#state.session : null;
  }

  get path(): ResourcePath | null {
    return this.#state.status === "stored" ? this.#state.path : null;
  }

  get kind(): KindDescriptor {
    return describeKind(this.constructor);
  }

  get parent(): TreeObject | null {
    const state = this.#state;
    if (state.status === "unstored" || state.path === ROOT_PATH) {
      return null;
    }
    return state.session.resolve(splitPath(state.path).parent);
  }

  toString(): string {
    const state = this.#state;
    return state.status === "stored" ? `${this.kind.name}(${state.path})` : `${this.kind.name}(unstored)`;
  }

  async [readFieldSymbol](field: StateFieldDescriptor): Promise<unknown> {
    return this.#run(
      (draft) => draft.get(field.name),
      async (session, path) =>
        decodeValue(field, await session.read(path, field.name), (target) => session.resolve(target)),
    );
  }

  async [readDerivedSymbol](field: DerivedFieldDescriptor): Promise<JsonValue> {
    return this.#run(
      () => {
        throw new NotAvailableError(`${this.kind.name}.${field.name} is computed by the server, store the object first`);
      },
      (session, path) => session.read(path, field.name),
    );
  }

  async [writeFieldSymbol](field: StateFieldDescriptor, value: unknown): Promise<void> {
    const accepted = acceptDraftValue(field, value);
    await this.#run(
      (draft) => {
        draft.set(field.name, accepted);
      },
      (session, path) =>
        session.update(path, field.name, encodeValue(field, accepted, (target) => linkPath(target, session))),
    );
  }

  /** Read-modify-write of one field, atomic with respect to this object's other calls. */
  async [updateFieldSymbol](field: StateFieldDescriptor, update: (current: unknown) => unknown): Promise<void> {
    await this.#run(
      (draft) => {
        draft.set(field.name, acceptDraftValue(field, update(draft.get(field.name))));
      },
      async (session, path) => {
        const current = decodeValue(field, await session.read(path, field.name), (target) => session.resolve(target));
        const next = acceptDraftValue(field, update(current));
        await session.update(path, field.name, encodeValue(field, next, (target) => linkPath(target, session)));
      },
    );
  }

  async [listChildrenSymbol](field: ChildrenFieldDescriptor): Promise<TreeObject[]> {
    return this.#run<TreeObject[]>(
      () => [],
      async (session, path) => {
        const collection = collectionPath(path, collectionOf(describeKind(field.target())));
        const infos = await session.list(collection);
        return infos.map((info) => session.resolve(info.path));
      },
    );
  }

  /** Current values of every state field; one read for a stored object. */
  async [snapshotSymbol](): Promise<DraftRecord> {
    return this.#run(
      (draft) => new Map(draft),
      async (session, path) => {
        const info = await session.get(path);
        return decodeRecord(this.kind, info.properties, (target) => session.resolve(target));
      },
    );
  }

  async [storeSymbol](parent: TreeObject): Promise<void> {
    const state = this.#state;
    const kind = this.kind;
    if (state.status === "stored" || this.#storing) {
      throw new AlreadyStoredError(`${this} is already stored`);
    }
    if (kind.derived) {
      throw new InvalidParentError(`${kind.name} objects are generated by the server`);
    }
    if (!isInstanceOfAny(parent, kind.parents())) {
      throw new InvalidParentError(`${kind.name} cannot be stored under ${parent.kind.name}`);
    }
    const { session, path: parentPath } = storedLocation(parent, `${kind.name} cannot be stored under ${parent}`);
    const properties = encodeDraft(kind, state.draft, (target) => linkPath(target, session));
    // calls issued from here on queue behind the create and then go remote
    this.#storing = true;
    await this.#enqueue(async () => {
      try {
        const info = await session.create({
          collection: collectionPath(parentPath, collectionOf(kind)),
          kind: kind.name,
          properties,
        });
        this.#state = { status: "stored", session, path: info.path, id: info.id };
        session.adopt(this);
      } finally {
        this.#storing = false;
      }
    });
  }

  [instantiateSymbol](record: DraftRecord): TreeObject {
    return new this.kind.construct(new DraftSeed(record));
  }

  async [deleteSymbol](): Promise<void> {
    await this.#run(
      () => {
        throw new UnstoredObjectError(`${this} is not stored`);
      },
      async (session, path) => {
        await session.delete(path);
        session.forget(path);
      },
    );
  }

  // Local while unstored; once a store is under way, calls wait for it and see its outcome.
  #run<R>(
    local: (draft: DraftRecord) => R,
    stored: (session: ModelSession, path: ResourcePath) => Promise<R>,
  ): Promise<R> {
    const state = this.#state;
    if (state.status === "unstored" && !this.#storing) {
      return Promise.resolve(local(state.draft));
    }
    return this.#enqueue(async () => {
      const current = this.#state;
      return current.status === "unstored" ? local(current.draft) : stored(current.session, current.path);
    });
  }

  #enqueue<R>(task: () => Promise<R>): Promise<R> {
    const run = this.#queue.then(task, task);
    // the caller observes failures through `run`; the queue only tracks completion
    this.#queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}

export function storedLocation(object: TreeObject, message: string): StoredLocation {
  const { session, path } = object;
  if (session === null || path === null) {
    throw new UnstoredObjectError(message);
  }
  return { session, path };
}

function linkPath(target: TreeObject, session: ModelSession): ResourcePath {
  const location = storedLocation(target, `Cannot link to unstored objects (${target})`);
  if (location.session !== session) {
    throw new CrossModelLinkError(`Cannot link to ${target}, it belongs to another model`);
  }
  return location.path;
}

export const isSameKind = <T extends TreeObject>(reference: T, candidate: TreeObject): candidate is T =>
  candidate.constructor === reference.constructor;

/** Kinds the client can create, store, clone and copy. */
export abstract class CreatableTreeObject extends TreeObject {
  /** Creates the object on the server under `parent`. Valid once per object. */
  async store(parent: TreeObject): Promise<void> {
    await this[storeSymbol](parent);
  }

  /** Unstored copy of the current field values; links still point at the same objects. */
  async clone<T extends CreatableTreeObject>(this: T): Promise<T> {
    const copy = this[instantiateSymbol](await this[snapshotSymbol]());
    invariant(isSameKind(this, copy), "clone changed the kind");
    return copy;
  }

  /** Deletes the object and its subtree on the server. */
  async delete(): Promise<void> {
    await this[deleteSymbol]();
  }
}
