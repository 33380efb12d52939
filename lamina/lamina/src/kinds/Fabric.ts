import { z } from "zod";
import { remote } from "../decorators";
import type { DerivedProperty, InitOf, LinkProperty, Property } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Material } from "./Material";
import { Model } from "./Model";

@remote.kind({ collection: "fabrics", parents: () => [Model] })
export class Fabric extends CreatableTreeObject {
  @remote.link(() => [Material])
  accessor material!: LinkProperty<Material>;

  @remote.value(z.number().nonnegative(), 0)
  accessor thickness!: Property<number>;

  @remote.value(z.number(), 0)
  accessor areaPrice!: Property<number>;

  @remote.value(z.boolean(), false)
  accessor ignoreForPostprocessing!: Property<boolean>;

  /** Mass per area, computed from the material density and the thickness. */
  @remote.derived(z.number())
  accessor arealWeight!: DerivedProperty<number>;

  constructor(init: InitOf<Fabric> | ObjectSeed = {}) {
    super(init);
  }
}
