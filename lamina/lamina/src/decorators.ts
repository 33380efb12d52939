import "./env";
import invariant from "tiny-invariant";
import type { JsonValue } from "type-fest";
import type { ZodType, ZodTypeDef } from "zod";
import {
  type ChildrenFieldDescriptor,
  declareField,
  type DerivedFieldDescriptor,
  type EdgeListFieldDescriptor,
  type FieldDescriptor,
  type KindConstructor,
  type KindOptions,
  type LinkFieldDescriptor,
  registerKind,
  type ValueFieldDescriptor,
} from "./schema";
import type { TreeObject } from "./TreeObject";
import { weakMemo } from "./utils";
import { DerivedProperty, LinkProperty, Property } from "./properties";
import { EdgePropertyList } from "./collections/EdgePropertyList";
import { Mapping } from "./collections/Mapping";
import { type EdgeType, linkEdge } from "./collections/edges";

type FieldSchema<V> = ZodType<V, ZodTypeDef, unknown>;

type HandleDecorator<H> = <This extends TreeObject>(
  target: ClassAccessorDecoratorTarget<This, H>,
  context: ClassAccessorDecoratorContext<This, H>,
) => ClassAccessorDecoratorResult<This, H>;

function decoderFor<V>(schema: FieldSchema<V>, name: string) {
  return (raw: unknown): V => {
    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => issue.message).join("; ");
      throw new TypeError(`Invalid value for field "${name}": ${issues}`);
    }
    return parsed.data;
  };
}

// Each accessor hands out one handle per owner; handles keep no state of their own.
function handleDecorator<F extends FieldDescriptor, H>(
  describe: (name: string) => F,
  build: (owner: TreeObject, field: F) => H,
): HandleDecorator<H> {
  return (_target, context) => {
    const name = context.name;
    invariant(typeof name === "string" && !context.private && !context.static, "remote fields should be public");
    const field = describe(name);
    declareField(context.metadata, field);
    const handleFor = weakMemo((owner: TreeObject) => build(owner, field));
    return {
      get() {
        return handleFor(this);
      },
      set() {
        throw new TypeError(`"${name}" is a field handle, write through its set() method`);
      },
    };
  };
}

/** A plain value field validated by `schema`. */
function value<V extends JsonValue>(schema: FieldSchema<V>, defaultValue: V): HandleDecorator<Property<V>> {
  return handleDecorator(
    (name): ValueFieldDescriptor & { decode: (raw: unknown) => V } => {
      const decode = decoderFor(schema, name);
      return { type: "value", name, decode, defaultValue: decode(defaultValue) };
    },
    (owner, field) => new Property(owner, field, field.decode),
  );
}

/** A value only the server computes. */
function derived<V extends JsonValue>(schema: FieldSchema<V>): HandleDecorator<DerivedProperty<V>> {
  return handleDecorator(
    (name): DerivedFieldDescriptor & { decode: (raw: unknown) => V } => ({
      type: "derived",
      name,
      decode: decoderFor(schema, name),
    }),
    (owner, field) => new DerivedProperty(owner, field, field.decode),
  );
}

function link<T extends TreeObject>(targets: () => readonly KindConstructor<T>[]): HandleDecorator<LinkProperty<T>> {
  return handleDecorator(
    (name): LinkFieldDescriptor => ({ type: "link", name, targets }),
    (owner, field) => new LinkProperty(owner, field, targets),
  );
}

function edges<E>(edge: EdgeType<E>): HandleDecorator<EdgePropertyList<E>> {
  return handleDecorator(
    (name): EdgeListFieldDescriptor => ({ type: "edges", name, edge }),
    (owner, field) => new EdgePropertyList(owner, field, edge),
  );
}

function linkList<T extends TreeObject>(
  targets: () => readonly KindConstructor<T>[],
): HandleDecorator<EdgePropertyList<T>> {
  return edges(linkEdge(targets));
}

function children<T extends TreeObject>(target: () => KindConstructor<T>): HandleDecorator<Mapping<T>> {
  return handleDecorator(
    (name): ChildrenFieldDescriptor => ({ type: "children", name, target }),
    (owner, field) => new Mapping(owner, field, target),
  );
}

function kind(options: KindOptions) {
  return <C extends KindConstructor>(target: C, context: ClassDecoratorContext<C>) => {
    registerKind(target, context.name, context.metadata, options);
  };
}

/** Marks the kind at the top of every model tree. */
function root() {
  return <C extends KindConstructor>(target: C, context: ClassDecoratorContext<C>) => {
    registerKind(target, context.name, context.metadata, null);
  };
}

/**
 * Declares the remote schema of a kind:
 *
 * ```ts
 * @remote.kind({ collection: "fabrics", parents: () => [Model] })
 * class Fabric extends CreatableTreeObject {
 *   @remote.value(z.number(), 0) accessor thickness!: Property<number>;
 *   @remote.link(() => [Material]) accessor material!: LinkProperty<Material>;
 * }
 * ```
 */
export const remote = {
  kind,
  root,
  value,
  derived,
  link: Object.assign(link, { list: linkList }),
  edges,
  children,
};
