export { TreeObject, CreatableTreeObject, StoredSeed, DraftSeed, type ObjectSeed } from "./TreeObject";
export { ModelSession } from "./ModelSession";
export { remote } from "./decorators";
export { Property, DerivedProperty, LinkProperty, type InitOf } from "./properties";
export { Mapping } from "./collections/Mapping";
export { EdgePropertyList } from "./collections/EdgePropertyList";
export { type EdgeType, linkEdge } from "./collections/edges";
export { describeKind, type KindDescriptor, type FieldDescriptor, type KindOptions } from "./schema";
export {
  LaminaError,
  InvalidParentError,
  NotAvailableError,
  CrossModelLinkError,
  ConsistencyError,
  AlreadyStoredError,
  UnstoredObjectError,
  MissingParentError,
  RemoteError,
  type RemoteErrorCode,
} from "./errors";
export { recursiveCopy, type RecursiveCopyRequest, type CopyProgressEvent } from "./recursive-copy";
export { childObjects, linkedObjects, type ChildTraversalOptions } from "./traversal";
export { modelTree, formatTree, type TreeNode } from "./model-tree";
export {
  sessionOptionsSchema,
  copyOptionsSchema,
  type SessionOptions,
  type SessionOptionsInput,
  type LinkedObjectHandling,
} from "./config";
export { createLogger, silentLogger, logLevels, type Logger, type LogLevel } from "./logging";
export type { ModelTransport, ObjectInfo, CreateRequest } from "./transport";
export type { ResourcePath, CollectionPath } from "./paths";
export * from "./kinds";
export * from "./server";
