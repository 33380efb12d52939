import invariant from "tiny-invariant";

/** Model-scoped address of a stored object; `""` is the model root. */
export type ResourcePath = string;

/** Address of one child collection of an object, e.g. `modeling_groups/<id>/modeling_plies`. */
export type CollectionPath = string;

export const ROOT_PATH: ResourcePath = "";

export const collectionPath = (parent: ResourcePath, collection: string): CollectionPath =>
  parent === ROOT_PATH ? collection : `${parent}/${collection}`;

export const childPath = (parent: ResourcePath, collection: string, id: string): ResourcePath =>
  `${collectionPath(parent, collection)}/${id}`;

export interface PathParts {
  parent: ResourcePath;
  collection: string;
  id: string;
}

export function splitPath(path: ResourcePath): PathParts {
  const segments = path.split("/");
  invariant(segments.length >= 2 && segments.length % 2 === 0, `malformed resource path "${path}"`);
  const id = segments[segments.length - 1];
  const collection = segments[segments.length - 2];
  invariant(id && collection, `malformed resource path "${path}"`);
  return { parent: segments.slice(0, -2).join("/"), collection, id };
}

export function splitCollectionPath(path: CollectionPath): { parent: ResourcePath; collection: string } {
  const separator = path.lastIndexOf("/");
  return separator === -1
    ? { parent: ROOT_PATH, collection: path }
    : { parent: path.slice(0, separator), collection: path.slice(separator + 1) };
}
