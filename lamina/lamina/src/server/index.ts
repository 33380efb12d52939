export {
  InProcessModelServer,
  type InProcessModelServerOptions,
  type ConsistencyRule,
  type DerivedObjectContext,
} from "./InProcessModelServer";
