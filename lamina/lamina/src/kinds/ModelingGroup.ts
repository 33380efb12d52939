import { remote } from "../decorators";
import type { Mapping } from "../collections/Mapping";
import type { InitOf } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Model } from "./Model";
import { ModelingPly } from "./ModelingPly";

@remote.kind({ collection: "modeling_groups", parents: () => [Model] })
export class ModelingGroup extends CreatableTreeObject {
  @remote.children(() => ModelingPly)
  accessor modelingPlies!: Mapping<ModelingPly>;

  constructor(init: InitOf<ModelingGroup> | ObjectSeed = {}) {
    super(init);
  }

  createModelingPly(init: InitOf<ModelingPly> = {}): Promise<ModelingPly> {
    return this.modelingPlies.create(init);
  }
}
