import invariant from "tiny-invariant";
import type { JsonValue } from "type-fest";
import type { DerivedFieldDescriptor, KindConstructor, LinkFieldDescriptor, ValueFieldDescriptor } from "./schema";
import type { TreeObject } from "./TreeObject";
import { draftType, readDerivedSymbol, readFieldSymbol, writeFieldSymbol } from "./runtime-symbols";
import { NotAvailableError } from "./errors";
import { isInstanceOfAny } from "./utils";

/** Marks handles whose value can be given at construction; `V` is the accepted value. */
export interface Draftable<V> {
  readonly [draftType]: V;
}

/** Construction values of a kind, e.g. `InitOf<Fabric>` is `{ name?: string; thickness?: number; material?: Material | null; ... }`. */
export type InitOf<T> = {
  [K in keyof T as T[K] extends Draftable<unknown> ? K : never]?: T[K] extends Draftable<infer V> ? V : never;
};

export class Property<V extends JsonValue> implements Draftable<V> {
  declare readonly [draftType]: V;

  constructor(
    private readonly owner: TreeObject,
    private readonly field: ValueFieldDescriptor,
    private readonly decode: (raw: unknown) => V,
  ) {}

  async get(): Promise<V> {
    return this.decode(await this.owner[readFieldSymbol](this.field));
  }

  async set(value: V): Promise<void> {
    await this.owner[writeFieldSymbol](this.field, value);
  }
}

/** A server-computed value; unreadable until the object is stored and the model updated. */
export class DerivedProperty<V extends JsonValue> {
  constructor(
    private readonly owner: TreeObject,
    private readonly field: DerivedFieldDescriptor,
    private readonly decode: (raw: unknown) => V,
  ) {}

  async get(): Promise<V> {
    const wire = await this.owner[readDerivedSymbol](this.field);
    if (wire === null) {
      throw new NotAvailableError(
        `${this.owner.kind.name}.${this.field.name} is not available before the model is updated`,
      );
    }
    return this.decode(wire);
  }
}

export class LinkProperty<T extends TreeObject> implements Draftable<T | null> {
  declare readonly [draftType]: T | null;

  constructor(
    private readonly owner: TreeObject,
    private readonly field: LinkFieldDescriptor,
    private readonly targets: () => readonly KindConstructor<T>[],
  ) {}

  async get(): Promise<T | null> {
    const target = await this.owner[readFieldSymbol](this.field);
    if (target === null) {
      return null;
    }
    invariant(isInstanceOfAny(target, this.targets()), `link "${this.field.name}" holds an unexpected kind`);
    return target;
  }

  async set(target: T | null): Promise<void> {
    await this.owner[writeFieldSymbol](this.field, target);
  }
}
