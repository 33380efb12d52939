import type { Model } from "./kinds/Model";
import { listChildrenSymbol } from "./runtime-symbols";
import { collectionOf, describeKind } from "./schema";
import { childObjects } from "./traversal";
import type { TreeObject } from "./TreeObject";

export interface TreeNode {
  label: string;
  children: TreeNode[];
}

const INDENT = "    ";

const collectionLabel = (collection: string) =>
  collection
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");

async function objectNode(object: TreeObject): Promise<TreeNode> {
  const children = await childObjects(object, { includeDerived: true });
  return {
    label: await object.name.get(),
    children: await Promise.all(children.map(objectNode)),
  };
}

/**
 * Outline of a model: one node per non-empty top-level collection, holding its
 * objects, which nest their own children (derived plies included) directly.
 */
export async function modelTree(model: Model): Promise<TreeNode> {
  const root: TreeNode = { label: "Model", children: [] };
  for (const field of model.kind.fields) {
    if (field.type !== "children") {
      continue;
    }
    const objects = await model[listChildrenSymbol](field);
    if (objects.length > 0) {
      root.children.push({
        label: collectionLabel(collectionOf(describeKind(field.target()))),
        children: await Promise.all(objects.map(objectNode)),
      });
    }
  }
  return root;
}

export function formatTree(node: TreeNode, level = 0): string {
  return [INDENT.repeat(level) + node.label, ...node.children.map((child) => formatTree(child, level + 1))].join("\n");
}
