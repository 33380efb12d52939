import { z } from "zod";
import invariant from "tiny-invariant";
import { remote } from "../decorators";
import type { EdgePropertyList } from "../collections/EdgePropertyList";
import type { EdgeType } from "../collections/edges";
import { RemoteError } from "../errors";
import type { InitOf, Property } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Fabric } from "./Fabric";
import { Model } from "./Model";

const fabricWithAngleWire = z.object({ fabric: z.string(), angle: z.number() });

/** One layer of a stackup: a fabric laid at an angle, in degrees. */
export class FabricWithAngle {
  constructor(
    readonly fabric: Fabric,
    readonly angle: number = 0,
  ) {}

  static readonly edge: EdgeType<FabricWithAngle> = {
    name: "FabricWithAngle",
    is: (value): value is FabricWithAngle => value instanceof FabricWithAngle,
    targets: (edge) => [edge.fabric],
    relink: (edge, remap) => {
      const fabric = remap(edge.fabric);
      if (fabric === null) {
        return null;
      }
      invariant(fabric instanceof Fabric, `a stackup layer cannot hold a ${fabric.kind.name}`);
      return new FabricWithAngle(fabric, edge.angle);
    },
    toWire: (edge, pathOf) => ({ fabric: pathOf(edge.fabric), angle: edge.angle }),
    fromWire: (wire, resolve) => {
      const parsed = fabricWithAngleWire.safeParse(wire);
      const fabric = parsed.success ? resolve(parsed.data.fabric) : null;
      if (!parsed.success || !(fabric instanceof Fabric)) {
        throw new RemoteError(`malformed stackup layer ${JSON.stringify(wire)}`, "UNKNOWN");
      }
      return new FabricWithAngle(fabric, parsed.data.angle);
    },
  };
}

export const symmetries = ["no_symmetry", "odd_symmetry", "even_symmetry"] as const;
export type Symmetry = (typeof symmetries)[number];

@remote.kind({ collection: "stackups", parents: () => [Model] })
export class Stackup extends CreatableTreeObject {
  @remote.edges(FabricWithAngle.edge)
  accessor fabrics!: EdgePropertyList<FabricWithAngle>;

  @remote.value(z.enum(symmetries), "no_symmetry")
  accessor symmetry!: Property<Symmetry>;

  constructor(init: InitOf<Stackup> | ObjectSeed = {}) {
    super(init);
  }
}
