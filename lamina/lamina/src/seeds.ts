import type { ModelSession } from "./ModelSession";
import type { ResourcePath } from "./paths";

/** Seeds a proxy for an object that already exists on the server. */
export class StoredSeed {
  constructor(
    readonly session: ModelSession,
    readonly path: ResourcePath,
    readonly id: string,
  ) {}
}

/** Seeds an unstored proxy from raw field values. */
export class DraftSeed {
  constructor(readonly values: ReadonlyMap<string, unknown>) {}
}

export type ObjectSeed = StoredSeed | DraftSeed;
