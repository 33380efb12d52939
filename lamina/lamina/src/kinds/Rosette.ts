import { remote } from "../decorators";
import type { InitOf, Property } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Model } from "./Model";
import { type Vector3, vector3Schema } from "./vectors";

/** A coordinate system that orients plies. */
@remote.kind({ collection: "rosettes", parents: () => [Model] })
export class Rosette extends CreatableTreeObject {
  @remote.value(vector3Schema, [0, 0, 0])
  accessor origin!: Property<Vector3>;

  @remote.value(vector3Schema, [1, 0, 0])
  accessor dir1!: Property<Vector3>;

  @remote.value(vector3Schema, [0, 1, 0])
  accessor dir2!: Property<Vector3>;

  constructor(init: InitOf<Rosette> | ObjectSeed = {}) {
    super(init);
  }
}
