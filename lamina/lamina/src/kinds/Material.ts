import { z } from "zod";
import { remote } from "../decorators";
import type { Property, InitOf } from "../properties";
import { CreatableTreeObject, type ObjectSeed } from "../TreeObject";
import { Model } from "./Model";

export const plyTypes = [
  "regular",
  "woven",
  "isotropic_core",
  "orthotropic_core",
  "honeycomb_core",
  "undefined",
] as const;
export type PlyType = (typeof plyTypes)[number];

export const isotropicConstantsSchema = z.object({ E: z.number(), nu: z.number() });

export const orthotropicConstantsSchema = z.object({
  E1: z.number(),
  E2: z.number(),
  E3: z.number(),
  G12: z.number(),
  G23: z.number(),
  G31: z.number(),
  nu12: z.number(),
  nu13: z.number(),
  nu23: z.number(),
});

export const engineeringConstantsSchema = z.union([isotropicConstantsSchema, orthotropicConstantsSchema]).nullable();
export type EngineeringConstants = z.output<typeof engineeringConstantsSchema>;

@remote.kind({ collection: "materials", parents: () => [Model] })
export class Material extends CreatableTreeObject {
  @remote.value(z.enum(plyTypes), "undefined")
  accessor plyType!: Property<PlyType>;

  @remote.value(z.number().nonnegative(), 0)
  accessor density!: Property<number>;

  @remote.value(engineeringConstantsSchema, null)
  accessor engineeringConstants!: Property<EngineeringConstants>;

  constructor(init: InitOf<Material> | ObjectSeed = {}) {
    super(init);
  }
}
