import { z } from "zod";
import { remote } from "../decorators";
import type { Mapping } from "../collections/Mapping";
import type { DerivedProperty } from "../properties";
import { type ObjectSeed, TreeObject } from "../TreeObject";
import { AnalysisPly } from "./AnalysisPly";
import { ModelingPly } from "./ModelingPly";

/** Generated by the server from a modeling ply on every model update. */
@remote.kind({ collection: "production_plies", parents: () => [ModelingPly], derived: true })
export class ProductionPly extends TreeObject {
  @remote.derived(z.number())
  accessor angle!: DerivedProperty<number>;

  @remote.derived(z.number())
  accessor thickness!: DerivedProperty<number>;

  @remote.children(() => AnalysisPly)
  accessor analysisPlies!: Mapping<AnalysisPly>;

  constructor(seed: ObjectSeed) {
    super(seed);
  }
}
