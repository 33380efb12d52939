import { z } from "zod";
import { remote } from "../decorators";
import type { DerivedProperty } from "../properties";
import { type ObjectSeed, TreeObject } from "../TreeObject";
import { ProductionPly } from "./ProductionPly";

@remote.kind({ collection: "analysis_plies", parents: () => [ProductionPly], derived: true })
export class AnalysisPly extends TreeObject {
  @remote.derived(z.number())
  accessor angle!: DerivedProperty<number>;

  @remote.derived(z.number())
  accessor thickness!: DerivedProperty<number>;

  constructor(seed: ObjectSeed) {
    super(seed);
  }
}
