import invariant from "tiny-invariant";
import { copyOptionsSchema, type LinkedObjectHandling } from "./config";
import { CrossModelLinkError, InvalidParentError, MissingParentError } from "./errors";
import type { ModelSession } from "./ModelSession";
import { type DraftRecord, relinkValue, stateFields } from "./record";
import { instantiateSymbol, snapshotSymbol, writeFieldSymbol } from "./runtime-symbols";
import type { KindDescriptor, StateFieldDescriptor } from "./schema";
import { childObjects, recordLinks } from "./traversal";
import { CreatableTreeObject, isSameKind, storedLocation, type TreeObject } from "./TreeObject";
import { isInstanceOfAny, never } from "./utils";

export type CopyProgressEvent =
  | { type: "planned"; objects: readonly CreatableTreeObject[] }
  | { type: "created"; original: CreatableTreeObject; copy: CreatableTreeObject }
  | { type: "patched"; copy: CreatableTreeObject; field: string };

export interface RecursiveCopyRequest {
  /**
   * Objects to copy with their children. A source mapped to another object, such as
   * a whole model, is not copied itself; its children are copied under its mapped value.
   */
  sourceObjects: Iterable<TreeObject>;
  /**
   * Original object to the object standing in for it. A source's parent maps to the
   * parent of its copy; any mapped object is treated as resolved and never copied,
   * and links to it point at its mapped value.
   */
  parentMapping: Iterable<readonly [TreeObject, TreeObject]>;
  linkedObjectHandling?: LinkedObjectHandling;
  /** Reports the plan and every remote step, so a failed copy can be inspected or undone. */
  onProgress?: (event: CopyProgressEvent) => void;
}

type Placement = { type: "mapped"; parent: TreeObject } | { type: "copied"; parent: CopyNode };

type LinkResolution =
  | { type: "existing"; target: TreeObject }
  | { type: "copied"; target: CopyNode }
  | { type: "discarded" };

interface CopyNode {
  original: CreatableTreeObject;
  kind: KindDescriptor;
  record: DraftRecord;
  parent: TreeObject;
  links: TreeObject[];
}

interface PlannedNode extends CopyNode {
  placement: Placement;
  destination: ModelSession;
  resolutions: Map<TreeObject, LinkResolution>;
}

/**
 * Copies `sourceObjects` with their children, and with their linked objects when
 * `linkedObjectHandling` is `"copy"`, returning originals to copies in creation order.
 *
 * Everything is validated before the first object is created. A remote failure
 * during creation leaves the copies made so far in place.
 */
export async function recursiveCopy(request: RecursiveCopyRequest): Promise<Map<CreatableTreeObject, CreatableTreeObject>> {
  const { linkedObjectHandling } = copyOptionsSchema.parse({ linkedObjectHandling: request.linkedObjectHandling });
  const sources = [...request.sourceObjects];
  const parentMapping = new Map(request.parentMapping);
  const report = request.onProgress ?? (() => undefined);
  if (sources.length === 0) {
    return new Map();
  }

  const sourceSession = validateRequest(sources, parentMapping, linkedObjectHandling);
  const closure = await collectClosure(sources, parentMapping, linkedObjectHandling);
  const plan = planCopies(closure, parentMapping, linkedObjectHandling);
  const order = creationOrder(plan);

  sourceSession.logger.info(`copying ${order.length} objects, linked objects: ${linkedObjectHandling}`);
  report({ type: "planned", objects: order.map((node) => node.original) });

  const created = new Map<CreatableTreeObject, CreatableTreeObject>();
  const deferred: { node: PlannedNode; field: StateFieldDescriptor }[] = [];
  const copyOf = (node: CopyNode) => created.get(node.original);

  for (const node of order) {
    const parent = node.placement.type === "mapped" ? node.placement.parent : copyOf(node.placement.parent);
    invariant(parent, `parent of ${node.original} was not created first`);

    const record: DraftRecord = new Map(node.record);
    for (const field of stateFields(node.kind)) {
      const missing: CopyNode[] = [];
      const value = relinkValue(field, node.record.get(field.name), (target) => {
        const resolution = resolutionOf(node, target);
        if (resolution.type !== "copied") {
          return resolvedTarget(resolution);
        }
        const copy = copyOf(resolution.target);
        if (copy === undefined) {
          missing.push(resolution.target);
        }
        return copy ?? null;
      });
      record.set(field.name, value);
      if (missing.length > 0) {
        deferred.push({ node, field });
      }
    }

    const copy = node.original[instantiateSymbol](record);
    invariant(isSameKind(node.original, copy), "copy changed the kind");
    await copy.store(parent);
    created.set(node.original, copy);
    sourceSession.logger.debug(`copied ${node.original} to ${copy}`);
    report({ type: "created", original: node.original, copy });
  }

  // links closing a cycle are written once both ends exist
  for (const { node, field } of deferred) {
    const copy = copyOf(node);
    invariant(copy, `${node.original} was not created`);
    const value = relinkValue(field, node.record.get(field.name), (target) => {
      const resolution = resolutionOf(node, target);
      if (resolution.type !== "copied") {
        return resolvedTarget(resolution);
      }
      const linked = copyOf(resolution.target);
      invariant(linked, `${resolution.target.original} was not created`);
      return linked;
    });
    await copy[writeFieldSymbol](field, value);
    report({ type: "patched", copy, field: field.name });
  }

  return created;
}

// Checks that need no remote call: source state, models involved, and mapped parents.
function validateRequest(
  sources: readonly TreeObject[],
  parentMapping: ReadonlyMap<TreeObject, TreeObject>,
  handling: LinkedObjectHandling,
): ModelSession {
  const sessions = new Set(sources.map((source) => storedLocation(source, `${source} is not stored`).session));
  const [sourceSession, ...others] = sessions;
  invariant(sourceSession);
  if (others.length > 0) {
    throw new CrossModelLinkError("source objects belong to more than one model");
  }
  for (const target of parentMapping.values()) {
    const { session } = storedLocation(target, `${target} is not stored and cannot stand in for an original`);
    if (handling === "keep" && session !== sourceSession) {
      throw new CrossModelLinkError('linked objects cannot be kept ("keep") when copying into another model');
    }
  }
  for (const source of sources) {
    if (!(source instanceof CreatableTreeObject) && !parentMapping.has(source)) {
      throw new InvalidParentError(`${source} cannot be copied, map it to an object to copy its children`);
    }
    const parent = source.parent;
    const mapped = parentMapping.has(source) || parent === null ? undefined : parentMapping.get(parent);
    if (mapped !== undefined) {
      checkParent(source.kind, mapped);
    }
  }
  return sourceSession;
}

function checkParent(kind: KindDescriptor, parent: TreeObject) {
  if (!isInstanceOfAny(parent, kind.parents())) {
    throw new InvalidParentError(`${kind.name} cannot be placed under ${parent.kind.name}`);
  }
}

// Reads every object to copy, following children always and links under "copy".
async function collectClosure(
  sources: readonly TreeObject[],
  parentMapping: ReadonlyMap<TreeObject, TreeObject>,
  handling: LinkedObjectHandling,
): Promise<Map<CreatableTreeObject, CopyNode>> {
  const nodes = new Map<CreatableTreeObject, CopyNode>();
  const containers = new Set(sources.filter((source) => (parentMapping.get(source) ?? source) !== source));
  const queue = sources.filter(
    (source): source is CreatableTreeObject => source instanceof CreatableTreeObject && !parentMapping.has(source),
  );
  for (const container of containers) {
    for (const child of await childObjects(container)) {
      if (child instanceof CreatableTreeObject) {
        queue.push(child);
      }
    }
  }
  for (const object of queue) {
    if (nodes.has(object) || parentMapping.has(object)) {
      continue;
    }
    const kind = object.kind;
    const parent = object.parent;
    invariant(parent, `${object} has no parent`);
    const record = await object[snapshotSymbol]();
    const links = recordLinks(kind, record);
    nodes.set(object, { original: object, kind, record, parent, links });

    for (const child of await childObjects(object)) {
      if (child instanceof CreatableTreeObject) {
        queue.push(child);
      }
    }
    if (handling === "copy") {
      for (const target of links) {
        if (target instanceof CreatableTreeObject && target.session === object.session) {
          queue.push(target);
        }
      }
    }
  }
  return nodes;
}

function planCopies(
  closure: ReadonlyMap<CreatableTreeObject, CopyNode>,
  parentMapping: ReadonlyMap<TreeObject, TreeObject>,
  handling: LinkedObjectHandling,
): PlannedNode[] {
  const placements = new Map<CopyNode, Placement>();
  for (const node of closure.values()) {
    const mapped = parentMapping.get(node.parent);
    const copiedParent = node.parent instanceof CreatableTreeObject ? closure.get(node.parent) : undefined;
    if (mapped !== undefined) {
      checkParent(node.kind, mapped);
      placements.set(node, { type: "mapped", parent: mapped });
    } else if (copiedParent !== undefined) {
      placements.set(node, { type: "copied", parent: copiedParent });
    } else {
      throw new MissingParentError(
        `Parent ${node.parent} of ${node.original} is neither in the parent mapping nor copied`,
      );
    }
  }

  const destinations = new Map<CopyNode, ModelSession>();
  const destinationOf = (node: CopyNode): ModelSession => {
    let destination = destinations.get(node);
    if (destination === undefined) {
      const placement = placements.get(node);
      invariant(placement);
      destination =
        placement.type === "mapped"
          ? storedLocation(placement.parent, `${placement.parent} is not stored`).session
          : destinationOf(placement.parent);
      destinations.set(node, destination);
    }
    return destination;
  };

  const resolveLink = (node: CopyNode, target: TreeObject): LinkResolution => {
    const destination = destinationOf(node);
    const mapped = parentMapping.get(target);
    if (mapped !== undefined) {
      if (mapped.session !== destination) {
        throw new CrossModelLinkError(`${node.original} would link across models to ${mapped}`);
      }
      return { type: "existing", target: mapped };
    }
    switch (handling) {
      case "discard":
        return { type: "discarded" };
      case "keep":
        if (target.session !== destination) {
          throw new CrossModelLinkError(`${node.original} keeps a link to ${target} of another model`);
        }
        return { type: "existing", target };
      case "copy": {
        const copied = target instanceof CreatableTreeObject ? closure.get(target) : undefined;
        if (copied !== undefined && destinationOf(copied) === destination) {
          return { type: "copied", target: copied };
        }
        if (copied === undefined && target.session === destination) {
          return { type: "existing", target };
        }
        throw new CrossModelLinkError(`${node.original} links to ${target}, which cannot follow it`);
      }
      default:
        return never(handling);
    }
  };

  return [...closure.values()].map((node) => {
    const placement = placements.get(node);
    invariant(placement);
    return {
      ...node,
      placement,
      destination: destinationOf(node),
      resolutions: new Map(node.links.map((target) => [target, resolveLink(node, target)])),
    };
  });
}

// Parents strictly first; link targets first unless that would close a cycle.
function creationOrder(plan: readonly PlannedNode[]): PlannedNode[] {
  const byOriginal = new Map(plan.map((node) => [node.original, node]));
  const planned = (node: CopyNode) => {
    const found = byOriginal.get(node.original);
    invariant(found);
    return found;
  };
  const order: PlannedNode[] = [];
  const emitted = new Set<PlannedNode>();
  const inProgress = new Set<PlannedNode>();

  const visit = (node: PlannedNode): boolean => {
    if (emitted.has(node)) {
      return true;
    }
    if (inProgress.has(node)) {
      return false;
    }
    inProgress.add(node);
    try {
      if (node.placement.type === "copied" && !visit(planned(node.placement.parent))) {
        return false;
      }
      for (const resolution of node.resolutions.values()) {
        if (resolution.type === "copied") {
          visit(planned(resolution.target));
        }
      }
      order.push(node);
      emitted.add(node);
      return true;
    } finally {
      inProgress.delete(node);
    }
  };

  for (const node of plan) {
    visit(node);
  }
  return order;
}

function resolutionOf(node: PlannedNode, target: TreeObject): LinkResolution {
  const resolution = node.resolutions.get(target);
  invariant(resolution, `link from ${node.original} to ${target} was not planned`);
  return resolution;
}

function resolvedTarget(resolution: Exclude<LinkResolution, { type: "copied" }>): TreeObject | null {
  return resolution.type === "existing" ? resolution.target : null;
}
