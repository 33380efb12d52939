import type { JsonObject, JsonValue } from "type-fest";
import type { CollectionPath, ResourcePath } from "./paths";

export interface ObjectInfo {
  id: string;
  path: ResourcePath;
  /** Kind name, e.g. `"Fabric"`. */
  kind: string;
  properties: JsonObject;
}

export interface CreateRequest {
  collection: CollectionPath;
  kind: string;
  /** Link fields travel as resource paths or `null`. */
  properties: JsonObject;
}

/**
 * The remote side of a model. Every call is one round trip; implementations report
 * failures by rejecting, preferably with a `LaminaError` subclass.
 */
export interface ModelTransport {
  create(request: CreateRequest): Promise<ObjectInfo>;
  get(path: ResourcePath): Promise<ObjectInfo>;
  /** Resolves to `null` when the field holds no value. */
  read(path: ResourcePath, field: string): Promise<JsonValue>;
  update(path: ResourcePath, field: string, value: JsonValue): Promise<void>;
  delete(path: ResourcePath): Promise<void>;
  list(collection: CollectionPath): Promise<ObjectInfo[]>;
  /** Regenerates derived objects and values. */
  updateModel(): Promise<void>;
}
