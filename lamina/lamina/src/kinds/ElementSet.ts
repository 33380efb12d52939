import { z } from "zod";
import { remote } from "../decorators";
import type { InitOf, Property } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Model } from "./Model";

@remote.kind({ collection: "element_sets", parents: () => [Model] })
export class ElementSet extends CreatableTreeObject {
  @remote.value(z.boolean(), false)
  accessor middleOffset!: Property<boolean>;

  @remote.value(z.array(z.number().int()), [])
  accessor elementLabels!: Property<number[]>;

  constructor(init: InitOf<ElementSet> | ObjectSeed = {}) {
    super(init);
  }
}
