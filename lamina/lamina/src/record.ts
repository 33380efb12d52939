import type { JsonObject, JsonValue } from "type-fest";
import type { ResourcePath } from "./paths";
import type { KindDescriptor, StateFieldDescriptor } from "./schema";
import { describeKind, isStateField } from "./schema";
import { TreeObject } from "./TreeObject";
import { RemoteError } from "./errors";
import { copyJson, isArrayOf, isInstanceOfAny, never } from "./utils";

/** Field values of an object by field name: JSON for values, objects for links, edge arrays for edge lists. */
export type DraftRecord = Map<string, unknown>;

export const stateFields = (kind: KindDescriptor): StateFieldDescriptor[] => kind.fields.filter(isStateField);

export function defaultDraftValue(field: StateFieldDescriptor): unknown {
  switch (field.type) {
    case "value":
      return copyJson(field.defaultValue);
    case "link":
      return null;
    case "edges":
      return [];
    default:
      return never(field);
  }
}

/** Validates a caller-supplied value for the draft, copying what could be shared. */
export function acceptDraftValue(field: StateFieldDescriptor, raw: unknown): unknown {
  if (raw === undefined) {
    return defaultDraftValue(field);
  }
  switch (field.type) {
    case "value":
      return copyJson(field.decode(raw));
    case "link": {
      if (raw === null || isInstanceOfAny(raw, field.targets())) {
        return raw;
      }
      const expected = field.targets().map((target) => describeKind(target).name).join(" or ");
      throw new TypeError(`Field "${field.name}" expects ${expected}, got ${describeValue(raw)}`);
    }
    case "edges":
      if (isArrayOf(raw, (item): item is unknown => field.edge.is(item))) {
        return [...raw];
      }
      throw new TypeError(`Field "${field.name}" expects a list of ${field.edge.name} entries`);
    default:
      return never(field);
  }
}

export function buildDraft(kind: KindDescriptor, values: ReadonlyMap<string, unknown>): DraftRecord {
  const fields = stateFields(kind);
  for (const key of values.keys()) {
    if (!fields.some((field) => field.name === key)) {
      throw new TypeError(`${kind.name} has no field "${key}" to initialise`);
    }
  }
  return new Map(fields.map((field) => [field.name, acceptDraftValue(field, values.get(field.name))]));
}

export function encodeValue(
  field: StateFieldDescriptor,
  value: unknown,
  pathOf: (target: TreeObject) => ResourcePath,
): JsonValue {
  switch (field.type) {
    case "value":
      return field.decode(value);
    case "link":
      return value instanceof TreeObject ? pathOf(value) : null;
    case "edges":
      return isArrayOf(value, (item): item is unknown => field.edge.is(item))
        ? value.map((edge) => field.edge.toWire(edge, pathOf))
        : [];
    default:
      return never(field);
  }
}

export function encodeDraft(
  kind: KindDescriptor,
  draft: DraftRecord,
  pathOf: (target: TreeObject) => ResourcePath,
): JsonObject {
  const properties: JsonObject = {};
  for (const field of stateFields(kind)) {
    properties[field.name] = encodeValue(field, draft.get(field.name), pathOf);
  }
  return properties;
}

export function decodeValue(
  field: StateFieldDescriptor,
  wire: JsonValue | undefined,
  resolve: (path: ResourcePath) => TreeObject,
): unknown {
  if (wire === undefined) {
    return defaultDraftValue(field);
  }
  switch (field.type) {
    case "value":
      return field.decode(wire);
    case "link":
      if (wire === null) {
        return null;
      }
      if (typeof wire !== "string") {
        throw new RemoteError(`malformed link in field "${field.name}"`, "UNKNOWN");
      }
      return resolve(wire);
    case "edges":
      if (!Array.isArray(wire)) {
        throw new RemoteError(`malformed edge list in field "${field.name}"`, "UNKNOWN");
      }
      return wire.map((item: JsonValue) => field.edge.fromWire(item, resolve));
    default:
      return never(field);
  }
}

export function decodeRecord(
  kind: KindDescriptor,
  properties: JsonObject,
  resolve: (path: ResourcePath) => TreeObject,
): DraftRecord {
  return new Map(stateFields(kind).map((field) => [field.name, decodeValue(field, properties[field.name], resolve)]));
}

/** Objects a field value links to, in field order. */
export function fieldTargets(field: StateFieldDescriptor, value: unknown): TreeObject[] {
  switch (field.type) {
    case "value":
      return [];
    case "link":
      return value instanceof TreeObject ? [value] : [];
    case "edges":
      return isArrayOf(value, (item): item is unknown => field.edge.is(item))
        ? value.flatMap((edge) => [...field.edge.targets(edge)])
        : [];
    default:
      return never(field);
  }
}

export function relinkValue(
  field: StateFieldDescriptor,
  value: unknown,
  remap: (target: TreeObject) => TreeObject | null,
): unknown {
  switch (field.type) {
    case "value":
      return value;
    case "link":
      return value instanceof TreeObject ? remap(value) : null;
    case "edges":
      return isArrayOf(value, (item): item is unknown => field.edge.is(item))
        ? value.flatMap((edge) => {
            const relinked = field.edge.relink(edge, remap);
            return relinked === null ? [] : [relinked];
          })
        : [];
    default:
      return never(field);
  }
}

function describeValue(value: unknown): string {
  if (value instanceof TreeObject) {
    return value.kind.name;
  }
  return value === null ? "null" : typeof value;
}
