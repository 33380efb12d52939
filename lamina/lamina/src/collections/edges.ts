import type { JsonValue } from "type-fest";
import type { ResourcePath } from "../paths";
import type { KindConstructor } from "../schema";
import type { TreeObject } from "../TreeObject";
import { RemoteError } from "../errors";
import { isInstanceOfAny } from "../utils";

/**
 * Describes the entries of an {@link EdgePropertyList}: how to recognise one, which
 * objects it links to, and how it travels over the wire.
 */
export interface EdgeType<E> {
  readonly name: string;
  is(value: unknown): value is E;
  targets(edge: E): readonly TreeObject[];
  /** Rebuilds the edge around remapped targets, or drops it when a target maps to `null`. */
  relink(edge: E, remap: (target: TreeObject) => TreeObject | null): E | null;
  toWire(edge: E, pathOf: (target: TreeObject) => ResourcePath): JsonValue;
  fromWire(wire: JsonValue, resolve: (path: ResourcePath) => TreeObject): E;
}

/** Entries that are plain links, as in a ply's list of oriented selection sets. */
export function linkEdge<T extends TreeObject>(targets: () => readonly KindConstructor<T>[]): EdgeType<T> {
  const accepts = (value: unknown): value is T => isInstanceOfAny(value, targets());
  return {
    name: "link",
    is: accepts,
    targets: (edge) => [edge],
    relink: (edge, remap) => {
      const target = remap(edge);
      if (target !== null && !accepts(target)) {
        throw new TypeError(`cannot relink to ${target.kind.name}`);
      }
      return target;
    },
    toWire: (edge, pathOf) => pathOf(edge),
    fromWire: (wire, resolve) => {
      const target = typeof wire === "string" ? resolve(wire) : null;
      if (!accepts(target)) {
        throw new RemoteError(`malformed link entry ${JSON.stringify(wire)}`, "UNKNOWN");
      }
      return target;
    },
  };
}
