import invariant from "tiny-invariant";
import { remote } from "../decorators";
import type { Mapping } from "../collections/Mapping";
import type { SessionOptionsInput } from "../config";
import type { Logger } from "../logging";
import { ModelSession } from "../ModelSession";
import type { InitOf } from "../properties";
import { type ObjectSeed, StoredSeed, TreeObject } from "../TreeObject";
import type { ModelTransport } from "../transport";
import { ElementSet } from "./ElementSet";
import { Fabric } from "./Fabric";
import { Material } from "./Material";
import { ModelingGroup } from "./ModelingGroup";
import { OrientedSelectionSet } from "./OrientedSelectionSet";
import { Rosette } from "./Rosette";
import { Stackup } from "./Stackup";

/** Root of one remote model. Obtained from {@link openModel}, never constructed by hand. */
@remote.root()
export class Model extends TreeObject {
  @remote.children(() => Material)
  accessor materials!: Mapping<Material>;

  @remote.children(() => Fabric)
  accessor fabrics!: Mapping<Fabric>;

  @remote.children(() => Stackup)
  accessor stackups!: Mapping<Stackup>;

  @remote.children(() => ElementSet)
  accessor elementSets!: Mapping<ElementSet>;

  @remote.children(() => Rosette)
  accessor rosettes!: Mapping<Rosette>;

  @remote.children(() => OrientedSelectionSet)
  accessor orientedSelectionSets!: Mapping<OrientedSelectionSet>;

  @remote.children(() => ModelingGroup)
  accessor modelingGroups!: Mapping<ModelingGroup>;

  constructor(seed: ObjectSeed) {
    super(seed);
    invariant(seed instanceof StoredSeed, "models are opened through openModel()");
  }

  createMaterial(init: InitOf<Material> = {}): Promise<Material> {
    return this.materials.create(init);
  }

  createFabric(init: InitOf<Fabric> = {}): Promise<Fabric> {
    return this.fabrics.create(init);
  }

  createStackup(init: InitOf<Stackup> = {}): Promise<Stackup> {
    return this.stackups.create(init);
  }

  createElementSet(init: InitOf<ElementSet> = {}): Promise<ElementSet> {
    return this.elementSets.create(init);
  }

  createRosette(init: InitOf<Rosette> = {}): Promise<Rosette> {
    return this.rosettes.create(init);
  }

  createOrientedSelectionSet(init: InitOf<OrientedSelectionSet> = {}): Promise<OrientedSelectionSet> {
    return this.orientedSelectionSets.create(init);
  }

  createModelingGroup(init: InitOf<ModelingGroup> = {}): Promise<ModelingGroup> {
    return this.modelingGroups.create(init);
  }

  /** Asks the server to regenerate derived objects and values. */
  async update(): Promise<void> {
    const session = this.session;
    invariant(session, "models are always stored");
    await session.updateModel();
  }
}

export async function openModel(
  transport: ModelTransport,
  options: SessionOptionsInput = {},
  logger?: Logger,
): Promise<Model> {
  const session = await ModelSession.open(transport, options, logger);
  invariant(session.root instanceof Model, "the registered root kind is not Model");
  return session.root;
}
