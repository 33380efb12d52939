import { type DraftRecord, fieldTargets, stateFields } from "./record";
import { describeKind, type KindDescriptor } from "./schema";
import type { TreeObject } from "./TreeObject";
import { listChildrenSymbol, snapshotSymbol } from "./runtime-symbols";

export interface ChildTraversalOptions {
  /** Also list children of derived kinds, such as production plies. */
  includeDerived?: boolean;
}

/** Stored children of `object` across all of its child collections, collection by collection. */
export async function childObjects(
  object: TreeObject,
  { includeDerived = false }: ChildTraversalOptions = {},
): Promise<TreeObject[]> {
  const children: TreeObject[] = [];
  for (const field of object.kind.fields) {
    if (field.type !== "children" || (!includeDerived && describeKind(field.target()).derived)) {
      continue;
    }
    children.push(...(await object[listChildrenSymbol](field)));
  }
  return children;
}

/** Distinct objects a record links to, through single links, link lists and edges. */
export function recordLinks(kind: KindDescriptor, record: DraftRecord): TreeObject[] {
  const targets = new Set<TreeObject>();
  for (const field of stateFields(kind)) {
    for (const target of fieldTargets(field, record.get(field.name))) {
      targets.add(target);
    }
  }
  return [...targets];
}

export async function linkedObjects(object: TreeObject): Promise<TreeObject[]> {
  return recordLinks(object.kind, await object[snapshotSymbol]());
}
