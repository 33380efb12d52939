import { z } from "zod";

export const vector3Schema = z.tuple([z.number(), z.number(), z.number()]);
export type Vector3 = z.output<typeof vector3Schema>;
