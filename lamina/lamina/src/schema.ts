import type { JsonValue } from "type-fest";
import invariant from "tiny-invariant";
import type { TreeObject } from "./TreeObject";
import type { ObjectSeed } from "./seeds";
import type { EdgeType } from "./collections/edges";
import { RemoteError } from "./errors";

export type KindConstructor<T extends TreeObject = TreeObject> = new (seed: ObjectSeed) => T;

export interface ValueFieldDescriptor {
  type: "value";
  name: string;
  /** Validates a raw value, throwing `TypeError` when it does not fit the field. */
  decode: (raw: unknown) => JsonValue;
  defaultValue: JsonValue;
}

export interface DerivedFieldDescriptor {
  type: "derived";
  name: string;
  decode: (raw: unknown) => JsonValue;
}

export interface LinkFieldDescriptor {
  type: "link";
  name: string;
  targets: () => readonly KindConstructor[];
}

export interface EdgeListFieldDescriptor {
  type: "edges";
  name: string;
  edge: EdgeType<unknown>;
}

export interface ChildrenFieldDescriptor {
  type: "children";
  name: string;
  target: () => KindConstructor;
}

export type FieldDescriptor =
  | ValueFieldDescriptor
  | DerivedFieldDescriptor
  | LinkFieldDescriptor
  | EdgeListFieldDescriptor
  | ChildrenFieldDescriptor;

/** Fields that make up an object's own state: what `store()` sends and `clone()` copies. */
export type StateFieldDescriptor = ValueFieldDescriptor | LinkFieldDescriptor | EdgeListFieldDescriptor;

export const isStateField = (field: FieldDescriptor): field is StateFieldDescriptor =>
  field.type === "value" || field.type === "link" || field.type === "edges";

export interface KindOptions {
  /** Label of the parent's child collection holding objects of this kind. */
  collection: string;
  parents: () => readonly KindConstructor[];
  /** Derived kinds are generated by the server on update and never created or copied by clients. */
  derived?: boolean;
}

export interface KindDescriptor {
  name: string;
  /** `null` for the model root. */
  collection: string | null;
  parents: () => readonly KindConstructor[];
  derived: boolean;
  fields: readonly FieldDescriptor[];
  construct: KindConstructor;
}

const ownFields = new WeakMap<object, FieldDescriptor[]>();
const kindsByConstructor = new WeakMap<object, KindDescriptor>();
const kindsByName = new Map<string, KindDescriptor>();
const kindsByCollection = new Map<string, KindDescriptor>();
let rootKind: KindDescriptor | undefined;

export function declareField(metadata: DecoratorMetadataObject | undefined, field: FieldDescriptor) {
  invariant(metadata, "decorator metadata is unavailable, is env.ts loaded?");
  const fields = ownFields.get(metadata) ?? [];
  fields.push(field);
  ownFields.set(metadata, fields);
}

// subclass metadata objects inherit from their base class's one
function collectFields(metadata: object): FieldDescriptor[] {
  const layers: FieldDescriptor[][] = [];
  for (let layer: object | null = metadata; layer !== null; layer = Object.getPrototypeOf(layer)) {
    layers.unshift(ownFields.get(layer) ?? []);
  }
  const byName = new Map<string, FieldDescriptor>();
  for (const field of layers.flat()) {
    byName.set(field.name, field);
  }
  return [...byName.values()];
}

export function registerKind(
  construct: KindConstructor,
  name: string | undefined,
  metadata: DecoratorMetadataObject | undefined,
  options: KindOptions | null,
): KindDescriptor {
  invariant(name, "kind classes should have designated name");
  invariant(metadata, "decorator metadata is unavailable, is env.ts loaded?");
  invariant(!kindsByName.has(name), `kind "${name}" is registered twice`);
  const descriptor: KindDescriptor = {
    name,
    collection: options?.collection ?? null,
    parents: options?.parents ?? (() => []),
    derived: options?.derived ?? false,
    fields: collectFields(metadata),
    construct,
  };
  if (options === null) {
    invariant(!rootKind, `kind "${name}" cannot be a second root`);
    rootKind = descriptor;
  } else {
    invariant(!kindsByCollection.has(options.collection), `collection "${options.collection}" is owned twice`);
    kindsByCollection.set(options.collection, descriptor);
  }
  kindsByName.set(name, descriptor);
  kindsByConstructor.set(construct, descriptor);
  return descriptor;
}

export function describeKind(constructor: object): KindDescriptor {
  const descriptor = kindsByConstructor.get(constructor);
  invariant(descriptor, "class is not a registered kind, decorate it with @remote.kind");
  return descriptor;
}

export function kindForCollection(collection: string): KindDescriptor {
  const descriptor = kindsByCollection.get(collection);
  if (!descriptor) {
    throw new RemoteError(`no kind owns the collection "${collection}"`, "INVALID_ARGUMENT");
  }
  return descriptor;
}

export function describeRootKind(): KindDescriptor {
  invariant(rootKind, "no root kind is registered");
  return rootKind;
}

export function collectionOf(kind: KindDescriptor): string {
  invariant(kind.collection !== null, `${kind.name} is the model root and lives in no collection`);
  return kind.collection;
}
