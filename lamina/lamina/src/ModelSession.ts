import type { JsonValue } from "type-fest";
import { sessionOptionsSchema, type SessionOptions, type SessionOptionsInput } from "./config";
import { LaminaError, RemoteError } from "./errors";
import { createLogger, type Logger } from "./logging";
import { type CollectionPath, type ResourcePath, ROOT_PATH, splitPath } from "./paths";
import { describeRootKind, kindForCollection } from "./schema";
import { StoredSeed } from "./seeds";
import type { TreeObject } from "./TreeObject";
import type { CreateRequest, ModelTransport, ObjectInfo } from "./transport";

/**
 * The explicit handle of one opened model. It owns the transport, and an identity
 * map that gives every resource path at most one live proxy, so objects of this
 * model compare by identity. Two sessions never share proxies, even over one server.
 */
export class ModelSession {
  readonly options: SessionOptions;
  readonly logger: Logger;
  readonly root: TreeObject;
  readonly #objects = new Map<ResourcePath, WeakRef<TreeObject>>();
  readonly #collected = new FinalizationRegistry<ResourcePath>((path) => {
    if (this.#objects.get(path)?.deref() === undefined) {
      this.#objects.delete(path);
    }
  });

  private constructor(
    readonly transport: ModelTransport,
    options: SessionOptions,
    rootId: string,
    logger?: Logger,
  ) {
    this.options = options;
    this.logger = logger ?? createLogger({ level: options.logLevel, prefix: options.label });
    this.root = new (describeRootKind().construct)(new StoredSeed(this, ROOT_PATH, rootId));
    this.#remember(ROOT_PATH, this.root);
  }

  static async open(
    transport: ModelTransport,
    options: SessionOptionsInput = {},
    logger?: Logger,
  ): Promise<ModelSession> {
    const parsed = sessionOptionsSchema.parse(options);
    const root = await call(logger, "open", ROOT_PATH, () => transport.get(ROOT_PATH));
    return new ModelSession(transport, parsed, root.id, logger);
  }

  /** The proxy of a stored object of this model; no remote call is made. */
  resolve(path: ResourcePath): TreeObject {
    const cached = this.#objects.get(path)?.deref();
    if (cached) {
      return cached;
    }
    const { collection, id } = splitPath(path);
    const object = new (kindForCollection(collection).construct)(new StoredSeed(this, path, id));
    this.#remember(path, object);
    return object;
  }

  /** Registers a proxy that was just stored, so later lookups of its path return it. */
  adopt(object: TreeObject) {
    const path = object.path;
    if (path !== null && object.session === this) {
      this.#remember(path, object);
    }
  }

  /** Paths that currently have a cached proxy. */
  cachedPaths(): ResourcePath[] {
    return [...this.#objects.keys()];
  }

  /** Drops the proxies of a deleted object and its subtree. */
  forget(path: ResourcePath) {
    for (const cached of [...this.#objects.keys()]) {
      if (cached === path || cached.startsWith(`${path}/`)) {
        this.#objects.delete(cached);
      }
    }
  }

  create(request: CreateRequest): Promise<ObjectInfo> {
    return this.#call("create", request.collection, () => this.transport.create(request));
  }

  get(path: ResourcePath): Promise<ObjectInfo> {
    return this.#call("get", path, () => this.transport.get(path));
  }

  read(path: ResourcePath, field: string): Promise<JsonValue> {
    return this.#call("read", `${path}#${field}`, () => this.transport.read(path, field));
  }

  update(path: ResourcePath, field: string, value: JsonValue): Promise<void> {
    return this.#call("update", `${path}#${field}`, () => this.transport.update(path, field, value));
  }

  delete(path: ResourcePath): Promise<void> {
    return this.#call("delete", path, () => this.transport.delete(path));
  }

  list(collection: CollectionPath): Promise<ObjectInfo[]> {
    return this.#call("list", collection, () => this.transport.list(collection));
  }

  updateModel(): Promise<void> {
    return this.#call("updateModel", ROOT_PATH, () => this.transport.updateModel());
  }

  #remember(path: ResourcePath, object: TreeObject) {
    this.#objects.set(path, new WeakRef(object));
    this.#collected.register(object, path);
  }

  #call<R>(operation: string, target: string, invoke: () => Promise<R>): Promise<R> {
    return call(this.logger, operation, target, invoke);
  }
}

async function call<R>(
  logger: Logger | undefined,
  operation: string,
  target: string,
  invoke: () => Promise<R>,
): Promise<R> {
  logger?.debug(`${operation} ${target || "<model>"}`);
  try {
    return await invoke();
  } catch (error) {
    if (error instanceof LaminaError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new RemoteError(`${operation} ${target || "<model>"} failed: ${reason}`, "UNKNOWN", { cause: error });
  }
}
