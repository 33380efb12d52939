import { remote } from "../decorators";
import type { EdgePropertyList } from "../collections/EdgePropertyList";
import type { InitOf, Property } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { ElementSet } from "./ElementSet";
import { Model } from "./Model";
import { Rosette } from "./Rosette";
import { type Vector3, vector3Schema } from "./vectors";

@remote.kind({ collection: "oriented_selection_sets", parents: () => [Model] })
export class OrientedSelectionSet extends CreatableTreeObject {
  @remote.link.list(() => [ElementSet])
  accessor elementSets!: EdgePropertyList<ElementSet>;

  @remote.link.list(() => [Rosette])
  accessor rosettes!: EdgePropertyList<Rosette>;

  @remote.value(vector3Schema, [0, 0, 0])
  accessor orientationPoint!: Property<Vector3>;

  @remote.value(vector3Schema, [0, 0, 1])
  accessor orientationDirection!: Property<Vector3>;

  constructor(init: InitOf<OrientedSelectionSet> | ObjectSeed = {}) {
    super(init);
  }
}
