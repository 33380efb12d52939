import { z } from "zod";
import { remote } from "../decorators";
import type { EdgePropertyList } from "../collections/EdgePropertyList";
import type { Mapping } from "../collections/Mapping";
import type { InitOf, LinkProperty, Property } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Fabric } from "./Fabric";
import { ModelingGroup } from "./ModelingGroup";
import { OrientedSelectionSet } from "./OrientedSelectionSet";
import { ProductionPly } from "./ProductionPly";
import { Stackup } from "./Stackup";

export type PlyMaterial = Fabric | Stackup;

@remote.kind({ collection: "modeling_plies", parents: () => [ModelingGroup] })
export class ModelingPly extends CreatableTreeObject {
  @remote.link<PlyMaterial>(() => [Fabric, Stackup])
  accessor plyMaterial!: LinkProperty<PlyMaterial>;

  @remote.link.list(() => [OrientedSelectionSet])
  accessor orientedSelectionSets!: EdgePropertyList<OrientedSelectionSet>;

  @remote.value(z.number(), 0)
  accessor plyAngle!: Property<number>;

  @remote.value(z.number().int().min(1), 1)
  accessor numberOfLayers!: Property<number>;

  @remote.value(z.boolean(), true)
  accessor active!: Property<boolean>;

  @remote.children(() => ProductionPly)
  accessor productionPlies!: Mapping<ProductionPly>;

  constructor(init: InitOf<ModelingPly> | ObjectSeed = {}) {
    super(init);
  }
}
